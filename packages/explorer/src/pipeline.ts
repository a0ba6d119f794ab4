import { createArtifact, type StageArtifact } from "./artifact.js";
import type { ToolchainAdapter } from "./adapter.js";
import {
  CompilationFailedError,
  StageUnavailableError,
  describeError,
  type PipelineError,
} from "./errors.js";
import type { HighlightState } from "./highlight.js";
import { silentLogger, type Logger } from "./logger.js";
import type { PanelRegistry } from "./panel.js";
import {
  STAGE_KINDS,
  stageOrder,
  type Capabilities,
  type StageKind,
} from "./stages.js";

export type StageEntry = {
  readonly artifact: StageArtifact;
  /** The artifact belongs to an older revision than the latest source */
  readonly stale: boolean;
};

export type SetSourceResult =
  | { ok: true; revision: number }
  | { ok: false; error: PipelineError };

export type PipelineControllerOptions = {
  adapter: ToolchainAdapter;
  panels?: PanelRegistry;
  highlight: HighlightState;
  logger?: Logger;
};

/**
 * Owns every stage artifact. `setSource` runs each available stage in
 * pipeline order and publishes the results in a single assignment, so a
 * reader sees either the previous pipeline or the new one.
 */
export class PipelineController {
  readonly capabilities: Capabilities;
  private readonly adapter: ToolchainAdapter;
  private readonly panels: PanelRegistry;
  private readonly highlight: HighlightState;
  private readonly logger: Logger;

  private entries: ReadonlyMap<StageKind, StageEntry> = new Map();
  private currentRevision = 0;
  private currentSource = "";
  private error?: PipelineError;

  constructor({ adapter, panels = {}, highlight, logger = silentLogger }: PipelineControllerOptions) {
    this.adapter = adapter;
    this.capabilities = adapter.capabilities;
    this.panels = panels;
    this.highlight = highlight;
    this.logger = logger;
  }

  get revision(): number {
    return this.currentRevision;
  }

  /** Text of the last revision that was published */
  get source(): string {
    return this.currentSource;
  }

  get lastError(): PipelineError | undefined {
    return this.error;
  }

  entry(kind: StageKind): StageEntry | undefined {
    return this.entries.get(kind);
  }

  setSource(text: string): SetSourceResult {
    const revision = this.currentRevision + 1;
    const produced: StageArtifact[] = [];
    let failure: CompilationFailedError | undefined;

    for (const kind of STAGE_KINDS) {
      if (!this.capabilities.has(kind)) continue;

      try {
        const output = this.adapter.run(text, kind);
        produced.push(createArtifact({ kind, ...output, revision }));
      } catch (error) {
        if (error instanceof StageUnavailableError) {
          this.logger.debug(`skipping ${kind}: ${error.message}`);
          continue;
        }
        if (error instanceof CompilationFailedError) {
          failure = error;
          break;
        }

        const crash: PipelineError = {
          type: "adapter-crash",
          stage: kind,
          message: describeError(error),
          cause: error,
        };
        this.logger.error(`toolchain adapter crashed while producing ${kind}`, error);
        this.error = crash;
        return { ok: false, error: crash };
      }
    }

    this.publish(text, revision, produced, failure);

    if (!failure) {
      this.error = undefined;
      this.logger.debug(`published revision ${revision}`);
      return { ok: true, revision };
    }

    const error: PipelineError = {
      type: "compilation-failed",
      stage: failure.stage,
      message: failure.message,
      diagnostic: failure.diagnostic,
    };
    this.error = error;
    this.logger.info(`revision ${revision} stopped at ${failure.stage}`, failure.message);
    return { ok: false, error };
  }

  private publish(
    text: string,
    revision: number,
    produced: readonly StageArtifact[],
    failure: CompilationFailedError | undefined
  ) {
    const next = new Map(this.entries);
    produced.forEach((artifact) => next.set(artifact.kind, { artifact, stale: false }));

    if (failure) {
      const failedAt = stageOrder(failure.stage);
      next.forEach((entry, kind) => {
        if (stageOrder(kind) >= failedAt) next.set(kind, { ...entry, stale: true });
      });
    } else {
      this.highlight.line = undefined;
    }

    this.entries = next;
    this.currentRevision = revision;
    this.currentSource = text;

    produced.forEach((artifact) => {
      const panel = this.panels[artifact.kind];
      this.highlight.applied.delete(artifact.kind);
      if (!panel) return;
      panel.setContent(artifact.items);
      panel.clearHighlight();
    });
  }
}
