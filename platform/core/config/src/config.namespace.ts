import { registerAs } from "@nestjs/config";
import { CONFIG_NAMESPACE } from "./config.const";
import { loadSettings } from "./settings";
import type { ConsoleSettings } from "./types";

/**
 * Evaluated once the `.env` files have been merged into `process.env`.
 */
export const consoleConfig = registerAs(
  CONFIG_NAMESPACE,
  (): ConsoleSettings => loadSettings(process.env),
);
