import { describe, expect, it } from "vitest";
import { createOpenApiDocumentConfig } from "../../src/openapi-config";

describe("createOpenApiDocumentConfig", () => {
  it("describes the console API and its tags", () => {
    const config = createOpenApiDocumentConfig();

    expect(config.info.title).toBe("Foundry Console API");
    expect(config.tags?.map((tag) => tag.name)).toEqual([
      "agents",
      "agent files",
      "threads",
      "runs",
      "session",
      "health",
    ]);
  });
});
