export * from "./config/defaults";
export * from "./errors";
export * from "./logger";
export * from "./metrics/metrics";
export * from "./frames/hash";
export * from "./frames/digest";
export * from "./frames/storage";
export * from "./frames/dedup";
export * from "./frames/extract";
export * from "./frames/search";
export * from "./frames/layout";
export * from "./frames/optimize";
export * from "./frames/pipeline";
