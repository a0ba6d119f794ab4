import type { PanelRegistry } from "./panel.js";
import type { PipelineController } from "./pipeline.js";
import type { StageKind } from "./stages.js";
import type { ViewState } from "./view-state.js";

export type PanelState = "hidden" | "visible-unhighlighted" | "visible-highlighted";

/** Current selection shared by the controller and the broadcaster */
export class HighlightState {
  line?: number;
  /** Indices last applied to each panel; absent when it has no highlight */
  readonly applied = new Map<StageKind, readonly number[]>();
}

/**
 * Pushes the selected source line to every visible panel. Hidden panels and
 * panels whose artifact is stale are left as they are.
 */
export class HighlightBroadcaster {
  private readonly pipeline: PipelineController;
  private readonly view: ViewState;
  private readonly panels: PanelRegistry;
  private readonly state: HighlightState;

  constructor({
    pipeline,
    view,
    panels,
    state,
  }: {
    pipeline: PipelineController;
    view: ViewState;
    panels: PanelRegistry;
    state: HighlightState;
  }) {
    this.pipeline = pipeline;
    this.view = view;
    this.panels = panels;
    this.state = state;
  }

  get currentLine(): number | undefined {
    return this.state.line;
  }

  onLineSelected(line: number): void {
    this.state.line = line;

    this.view.visibleKinds().forEach((kind) => {
      const entry = this.pipeline.entry(kind);
      const panel = this.panels[kind];
      if (!entry || entry.stale || !panel) return;

      const indices = entry.artifact.index.lookup(line);
      if (indices.length > 0) {
        panel.highlight(indices);
        this.state.applied.set(kind, indices);
      } else {
        panel.clearHighlight();
        this.state.applied.delete(kind);
      }
    });
  }

  /** Selects the line an item was produced from; unattributed items clear */
  onItemSelected(kind: StageKind, index: number): void {
    const entry = this.pipeline.entry(kind);
    if (!entry || entry.stale) return;

    const line = entry.artifact.index.lineOf(index);
    if (line === undefined) {
      this.clear();
      return;
    }
    this.onLineSelected(line);
  }

  clear(): void {
    this.state.line = undefined;
    this.view.visibleKinds().forEach((kind) => {
      const panel = this.panels[kind];
      if (!panel) return;
      panel.clearHighlight();
      this.state.applied.delete(kind);
    });
  }

  panelState(kind: StageKind): PanelState {
    if (!this.view.isVisible(kind)) return "hidden";
    return this.state.applied.has(kind) ? "visible-highlighted" : "visible-unhighlighted";
  }
}
