import {
  DEFAULT_VISIBLE_STAGES,
  STAGE_KINDS,
  type Capabilities,
  type StageKind,
} from "./stages.js";

/** Panels never spread over more columns than this */
export const MAX_COLUMNS = 3;

export type Layout = {
  readonly columns: number;
  readonly rows: number;
  /** Visible kinds in pipeline order */
  readonly kinds: readonly StageKind[];
};

/**
 * Visibility flag per stage plus the panel grid derived from it. Every
 * mutation ends with an explicit `recompute`.
 */
export class ViewState {
  readonly capabilities: Capabilities;
  private readonly visible = new Set<StageKind>();
  private current: Layout = Object.freeze({ columns: 0, rows: 0, kinds: [] });

  constructor({
    capabilities,
    visible = DEFAULT_VISIBLE_STAGES,
  }: {
    capabilities: Capabilities;
    visible?: readonly StageKind[];
  }) {
    this.capabilities = capabilities;
    visible.forEach((kind) => {
      if (capabilities.has(kind)) this.visible.add(kind);
    });
    this.recompute();
  }

  isVisible(kind: StageKind): boolean {
    return this.visible.has(kind);
  }

  /** Flips a stage's visibility; returns false for unavailable stages */
  toggle(kind: StageKind): boolean {
    if (!this.capabilities.has(kind)) return false;

    if (this.visible.has(kind)) {
      this.visible.delete(kind);
    } else {
      this.visible.add(kind);
    }
    this.recompute();
    return true;
  }

  visibleKinds(): readonly StageKind[] {
    return this.current.kinds;
  }

  visibleCount(): number {
    return this.visible.size;
  }

  panelColumns(): number {
    return Math.min(this.visibleCount(), MAX_COLUMNS);
  }

  recompute(): Layout {
    const kinds = STAGE_KINDS.filter((kind) => this.visible.has(kind));
    const columns = this.panelColumns();
    const rows = columns === 0 ? 0 : Math.ceil(kinds.length / columns);
    this.current = Object.freeze({ columns, rows, kinds: Object.freeze(kinds) });
    return this.current;
  }

  layout(): Layout {
    return this.current;
  }
}
