export * from "./config.const";
export * from "./config.module";
export * from "./config.namespace";
export * from "./settings";
export type * from "./types";
