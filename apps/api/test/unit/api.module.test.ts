import "reflect-metadata";
import type { MiddlewareConsumer } from "@nestjs/common";
import { MODULE_METADATA } from "@nestjs/common/constants";
import { APP_FILTER, APP_PIPE } from "@nestjs/core";
import { describe, expect, it, vi } from "vitest";
import { AgentFilesModule } from "../../src/agent-files/agent-files.module";
import { AgentsModule } from "../../src/agents/agents.module";
import { ApiModule, SESSION_SCOPED_CONTROLLERS } from "../../src/api.module";
import { RunsModule } from "../../src/runs/runs.module";
import { SessionMiddleware } from "../../src/sessions/session.middleware";
import { ThreadsModule } from "../../src/threads/threads.module";

const providerTokens = (providers: unknown[]): unknown[] =>
  providers.map((provider) =>
    provider && typeof provider === "object" && "provide" in provider
      ? provider.provide
      : provider,
  );

describe("ApiModule", () => {
  it("imports every feature module", () => {
    const imports: unknown[] = Reflect.getMetadata(MODULE_METADATA.IMPORTS, ApiModule);

    expect(imports).toEqual(
      expect.arrayContaining([AgentsModule, AgentFilesModule, ThreadsModule, RunsModule]),
    );
  });

  it("registers the global pipe and filter", () => {
    const providers: unknown[] = Reflect.getMetadata(MODULE_METADATA.PROVIDERS, ApiModule);

    expect(providerTokens(providers)).toEqual(expect.arrayContaining([APP_PIPE, APP_FILTER]));
  });

  it("binds sessions for every session-scoped controller", () => {
    const forRoutes = vi.fn();
    const apply = vi.fn(() => ({ forRoutes }));
    const consumer = { apply } as unknown as MiddlewareConsumer;

    new ApiModule().configure(consumer);

    expect(apply).toHaveBeenCalledWith(SessionMiddleware);
    expect(forRoutes).toHaveBeenCalledWith(...SESSION_SCOPED_CONTROLLERS);
  });
});
