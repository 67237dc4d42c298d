export const CONSOLE_SETTINGS = Symbol("FOUNDRY_CONSOLE_SETTINGS");
export const CONFIG_NAMESPACE = "console" as const;
