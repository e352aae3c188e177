export * from "./config-file";
export * from "./config-path";
export * from "./config.const";
export * from "./config.module";
export * from "./default-config.loader";
export * from "./errors";
export * from "./runtime-env";
export * from "./types";
