import { PositionIndex } from "./position-index.js";
import type { StageKind } from "./stages.js";

export type StageItem = {
  text: string;
  /** Source line the item came from; absent when it is unattributed */
  line?: number;
};

export type StageDiagnosticSeverity = "error" | "warning" | "note";

/** A non-fatal toolchain message about one stage */
export type StageDiagnostic = {
  code: string;
  severity: StageDiagnosticSeverity;
  message: string;
  line?: number;
  /** 1-based column of the diagnostic start */
  column?: number;
};

export type StageArtifact = {
  readonly kind: StageKind;
  readonly items: readonly StageItem[];
  readonly index: PositionIndex;
  /** Source revision the artifact was produced for */
  readonly revision: number;
  readonly diagnostics: readonly StageDiagnostic[];
};

export const createArtifact = ({
  kind,
  items,
  revision,
  diagnostics = [],
}: {
  kind: StageKind;
  items: readonly StageItem[];
  revision: number;
  diagnostics?: readonly StageDiagnostic[];
}): StageArtifact => {
  const frozenItems = Object.freeze(items.map((item) => Object.freeze({ ...item })));
  return Object.freeze({
    kind,
    items: frozenItems,
    index: PositionIndex.build(frozenItems),
    revision,
    diagnostics: Object.freeze([...diagnostics]),
  });
};
