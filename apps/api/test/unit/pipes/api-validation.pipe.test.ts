import "reflect-metadata";
import { BadRequestException } from "@nestjs/common";
import type { ValidationError } from "class-validator";
import { describe, expect, it } from "vitest";
import { ListAgentsQueryDto } from "../../../src/agents/dto/list-agents-query.dto";
import { SubmitRunDto } from "../../../src/runs/dto/submit-run.dto";
import {
  ApiValidationPipe,
  flattenValidationErrors,
} from "../../../src/validation.pipe";
import { createLogger } from "../support/fakes";

describe("flattenValidationErrors", () => {
  it("prefixes nested properties with their parent path", () => {
    const errors = [
      {
        property: "file",
        constraints: { isDefined: "file should not be null or undefined" },
        children: [
          {
            property: "name",
            constraints: { isString: "name must be a string" },
            children: [],
          },
        ],
      },
    ] as ValidationError[];

    expect(flattenValidationErrors(errors)).toEqual([
      { property: "file", constraints: { isDefined: "file should not be null or undefined" } },
      { property: "file.name", constraints: { isString: "name must be a string" } },
    ]);
  });
});

describe("ApiValidationPipe", () => {
  it("strips unknown fields from run submissions", async () => {
    const logger = createLogger();
    const pipe = new ApiValidationPipe(logger);

    const result = await pipe.transform(
      { prompt: "Summarize the sheet", extra: true },
      { type: "body", metatype: SubmitRunDto, data: undefined },
    );

    expect(result).toBeInstanceOf(SubmitRunDto);
    expect(result).toEqual({ prompt: "Summarize the sheet" });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("parses the refresh flag on agent list queries", async () => {
    const pipe = new ApiValidationPipe(createLogger());

    const result = await pipe.transform(
      { refresh: "true" },
      { type: "query", metatype: ListAgentsQueryDto, data: undefined },
    );

    expect(result).toEqual({ refresh: true });
  });

  it("rejects oversized prompts with flattened details", async () => {
    const logger = createLogger();
    const pipe = new ApiValidationPipe(logger);

    const failure = pipe.transform(
      { prompt: "x".repeat(32_001) },
      { type: "body", metatype: SubmitRunDto, data: undefined },
    );

    await expect(failure).rejects.toBeInstanceOf(BadRequestException);
    await expect(failure).rejects.toMatchObject({
      response: {
        message: "Validation failed",
        errors: [
          {
            property: "prompt",
            constraints: {
              maxLength: "prompt must be shorter than or equal to 32000 characters",
            },
          },
        ],
      },
    });
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ type: "body", metatype: "SubmitRunDto" }),
      "Validation pipeline rejected request",
    );
  });
});
