import { describe, expect, it } from "vitest";
import type { LoggingConfig } from "@foundry-console/config";
import { LoggerService } from "../src/logger.service";

const quiet: LoggingConfig = {
  level: "silent",
  pretty: false,
};

describe("LoggerService", () => {
  it("reuses the root logger while the configuration is unchanged", () => {
    const service = new LoggerService();

    const first = service.configure(quiet);
    const second = service.configure(quiet);

    expect(second).toBe(first);
  });

  it("rebuilds the root logger when the level changes", () => {
    const service = new LoggerService();

    const silent = service.configure(quiet);
    const debug = service.configure({
      level: "debug",
      pretty: false,
    });

    expect(debug).not.toBe(silent);
    expect(debug.level).toBe("debug");
  });

  it("binds the scope on child loggers", () => {
    const service = new LoggerService();
    service.configure(quiet);

    const logger = service.getLogger("foundry");

    expect(logger.bindings()).toEqual({ scope: "foundry" });
  });
});
