export * from "./io.module";
export * from "./log-level";
export * from "./logger.decorator";
export * from "./logger.service";
export * from "./types";
