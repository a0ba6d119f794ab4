import type { StageDiagnostic, StageItem } from "./artifact.js";
import type { Capabilities, StageKind } from "./stages.js";

export type StageOutput = {
  items: readonly StageItem[];
  diagnostics: readonly StageDiagnostic[];
};

/**
 * Boundary to the toolchain that actually lexes, parses, optimizes and
 * assembles. `run` throws `CompilationFailedError` when the source is
 * rejected and `StageUnavailableError` for kinds outside `capabilities`;
 * anything else it throws is treated as a crash.
 */
export interface ToolchainAdapter {
  readonly capabilities: Capabilities;
  run(source: string, kind: StageKind): StageOutput;
}
