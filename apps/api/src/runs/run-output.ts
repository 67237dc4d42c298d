import type { RunOutput } from "@foundry-console/types";
import type { FoundryMessage } from "../foundry/foundry.types";

export const RUN_OUTPUT_SEPARATOR = "\n\n";

/**
 * Collects the text written by the assistant during one run. Messages from
 * other runs and non-text parts are skipped even when the listing was
 * already filtered remotely.
 */
export function extractRunOutput(messages: readonly FoundryMessage[], runId: string): RunOutput {
  const chunks = messages
    .filter((message) => message.role === "assistant" && message.run_id === runId)
    .flatMap((message) => message.content ?? [])
    .flatMap((part) => {
      const value = part.type === "text" ? part.text?.value : undefined;
      return value ? [value] : [];
    });

  if (chunks.length === 0) {
    return { type: "no-response" };
  }
  return { type: "assistant", text: chunks.join(RUN_OUTPUT_SEPARATOR) };
}
