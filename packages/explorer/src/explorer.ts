import type { ToolchainAdapter } from "./adapter.js";
import { TernToolchainAdapter } from "./adapters/tern.js";
import type { PipelineError } from "./errors.js";
import { HighlightBroadcaster, HighlightState, type PanelState } from "./highlight.js";
import { silentLogger, type Logger } from "./logger.js";
import type { PanelRegistry } from "./panel.js";
import { PipelineController, type SetSourceResult, type StageEntry } from "./pipeline.js";
import type { Capabilities, StageKind, ToolchainVersion } from "./stages.js";
import { ViewState, type Layout } from "./view-state.js";

export type ExplorerOptions = {
  /** Ignored when `adapter` is given */
  toolchain?: ToolchainVersion;
  adapter?: ToolchainAdapter;
  panels?: PanelRegistry;
  /** Stages visible at startup */
  visible?: readonly StageKind[];
  logger?: Logger;
};

/** One explorer session: pipeline, view state and highlight wired together */
export class Explorer {
  readonly pipeline: PipelineController;
  readonly view: ViewState;
  readonly broadcaster: HighlightBroadcaster;
  private readonly logger: Logger;

  constructor({
    toolchain = "full",
    adapter,
    panels = {},
    visible,
    logger = silentLogger,
  }: ExplorerOptions = {}) {
    const highlight = new HighlightState();
    const resolved =
      adapter ??
      new TernToolchainAdapter({ version: toolchain, logger: logger.child("tern") });

    this.logger = logger;
    this.pipeline = new PipelineController({
      adapter: resolved,
      panels,
      highlight,
      logger: logger.child("pipeline"),
    });
    this.view = new ViewState({ capabilities: resolved.capabilities, visible });
    this.broadcaster = new HighlightBroadcaster({
      pipeline: this.pipeline,
      view: this.view,
      panels,
      state: highlight,
    });
  }

  get capabilities(): Capabilities {
    return this.pipeline.capabilities;
  }

  get lastError(): PipelineError | undefined {
    return this.pipeline.lastError;
  }

  get source(): string {
    return this.pipeline.source;
  }

  get currentLine(): number | undefined {
    return this.broadcaster.currentLine;
  }

  setSource(text: string): SetSourceResult {
    return this.pipeline.setSource(text);
  }

  selectLine(line: number): void {
    this.broadcaster.onLineSelected(line);
  }

  selectItem(kind: StageKind, index: number): void {
    this.broadcaster.onItemSelected(kind, index);
  }

  clearSelection(): void {
    this.broadcaster.clear();
  }

  toggle(kind: StageKind): boolean {
    const toggled = this.view.toggle(kind);
    if (!toggled) this.logger.debug(`${kind} is not available`);
    return toggled;
  }

  layout(): Layout {
    return this.view.layout();
  }

  entry(kind: StageKind): StageEntry | undefined {
    return this.pipeline.entry(kind);
  }

  panelState(kind: StageKind): PanelState {
    return this.broadcaster.panelState(kind);
  }
}

export const createExplorer = (options: ExplorerOptions = {}): Explorer =>
  new Explorer(options);
