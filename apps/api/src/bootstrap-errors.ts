import { ConfigurationError } from "@foundry-console/config";

/** Finds a configuration error anywhere in an error's cause chain. */
export function findConfigurationError(error: unknown): ConfigurationError | undefined {
  const seen = new Set<unknown>();
  let current: unknown = error;
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof ConfigurationError) {
      return current;
    }
    seen.add(current);
    current = current.cause;
  }
  return undefined;
}
