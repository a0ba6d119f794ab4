import type { StageDiagnostic } from "./artifact.js";
import { STAGE_INFO, type StageKind } from "./stages.js";

/** The toolchain rejected the source while producing `stage` */
export class CompilationFailedError extends Error {
  readonly stage: StageKind;
  readonly diagnostic?: StageDiagnostic;

  constructor({
    stage,
    message,
    diagnostic,
  }: {
    stage: StageKind;
    message: string;
    diagnostic?: StageDiagnostic;
  }) {
    super(message);
    this.name = "CompilationFailedError";
    this.stage = stage;
    this.diagnostic = diagnostic;
  }
}

/** The active toolchain version does not provide `stage` */
export class StageUnavailableError extends Error {
  readonly stage: StageKind;

  constructor(stage: StageKind) {
    super(`${STAGE_INFO[stage].title} is not available in this toolchain`);
    this.name = "StageUnavailableError";
    this.stage = stage;
  }
}

export type PipelineError =
  | {
      type: "compilation-failed";
      stage: StageKind;
      message: string;
      diagnostic?: StageDiagnostic;
    }
  | { type: "adapter-crash"; stage: StageKind; message: string; cause: unknown };

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const formatPipelineError = (error: PipelineError): string => {
  const title = STAGE_INFO[error.stage].title;
  return error.type === "compilation-failed"
    ? `${title} failed: ${error.message}`
    : `Toolchain crashed during ${title}: ${error.message}`;
};
