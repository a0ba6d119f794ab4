export * from "./stages.js";
export * from "./artifact.js";
export { PositionIndex } from "./position-index.js";
export * from "./errors.js";
export type { StageOutput, ToolchainAdapter } from "./adapter.js";
export { TernToolchainAdapter } from "./adapters/tern.js";
export * from "./pipeline.js";
export * from "./view-state.js";
export * from "./highlight.js";
export * from "./panel.js";
export * from "./logger.js";
export * from "./explorer.js";
