import type { QueryBus } from "@nestjs/cqrs";
import { plainToInstance } from "class-transformer";
import { describe, expect, it, vi } from "vitest";
import { AgentsController } from "../../../src/agents/agents.controller";
import { ListAgentsQueryDto } from "../../../src/agents/dto/list-agents-query.dto";
import { ListAgentsQuery } from "../../../src/agents/queries";
import { createSessionStore } from "../support/fakes";

describe("AgentsController", () => {
  it("delegates listing to the query bus with the refresh flag", async () => {
    const agents = [{ id: "asst_1", label: "Analyst" }];
    const queryBus = { execute: vi.fn().mockResolvedValue(agents) };
    const controller = new AgentsController(queryBus as unknown as QueryBus);
    const session = createSessionStore().resolve(undefined);

    await expect(controller.list(session, { refresh: true })).resolves.toEqual(agents);

    const [query] = queryBus.execute.mock.calls[0];
    expect(query).toBeInstanceOf(ListAgentsQuery);
    expect(query).toMatchObject({ session, refresh: true });
  });
});

describe("ListAgentsQueryDto", () => {
  it("reads refresh from query string values", () => {
    expect(plainToInstance(ListAgentsQueryDto, { refresh: "true" }).refresh).toBe(true);
    expect(plainToInstance(ListAgentsQueryDto, { refresh: "1" }).refresh).toBe(true);
    expect(plainToInstance(ListAgentsQueryDto, { refresh: "false" }).refresh).toBe(false);
  });
});
