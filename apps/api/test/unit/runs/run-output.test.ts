import { describe, expect, it } from "vitest";
import { extractRunOutput } from "../../../src/runs/run-output";
import type {
  FoundryMessage,
  FoundryMessageContent,
} from "../../../src/foundry/foundry.types";

let nextId = 0;

const message = (
  role: string,
  runId: string | null,
  ...parts: FoundryMessageContent[]
): FoundryMessage => ({
  id: `msg-${(nextId += 1)}`,
  role,
  run_id: runId,
  content: parts,
});

const text = (value: string) => ({ type: "text", text: { value } });

describe("extractRunOutput", () => {
  it("joins assistant text from the run in order", () => {
    const output = extractRunOutput(
      [
        message("user", null, text("question")),
        message("assistant", "run-1", text("First part.")),
        message("assistant", "run-1", text("Second part.")),
      ],
      "run-1",
    );

    expect(output).toEqual({ type: "assistant", text: "First part.\n\nSecond part." });
  });

  it("skips assistant messages that carry no content", () => {
    const output = extractRunOutput(
      [
        { id: "msg-bare", role: "assistant", run_id: "run-1" },
        { id: "msg-null", role: "assistant", run_id: "run-1", content: null },
        message("assistant", "run-1", text("Only answer.")),
      ],
      "run-1",
    );

    expect(output).toEqual({ type: "assistant", text: "Only answer." });
  });

  it("ignores messages from other runs", () => {
    const output = extractRunOutput(
      [
        message("assistant", "run-0", text("old answer")),
        message("assistant", "run-1", text("new answer")),
      ],
      "run-1",
    );

    expect(output).toEqual({ type: "assistant", text: "new answer" });
  });

  it("skips non-text and empty parts", () => {
    const output = extractRunOutput(
      [
        message(
          "assistant",
          "run-1",
          { type: "image_file" },
          text(""),
          { type: "text" },
          text("chart ready"),
        ),
      ],
      "run-1",
    );

    expect(output).toEqual({ type: "assistant", text: "chart ready" });
  });

  it("reports no response when the run wrote no text", () => {
    expect(extractRunOutput([message("user", "run-1", text("hi"))], "run-1")).toEqual({
      type: "no-response",
    });
    expect(extractRunOutput([], "run-1")).toEqual({ type: "no-response" });
  });
});
