import {
  Explorer,
  MemoryPanel,
  STAGE_KINDS,
  silentLogger,
  type Logger,
  type PipelineError,
  type StageKind,
  type ToolchainAdapter,
} from "@stagelens/explorer";
import { formatStageDiagnostic } from "../diagnostics.js";
import { createColorizer } from "./ansi.js";
import { panelTitle } from "./panel.js";

export type DumpOptions = {
  adapter: ToolchainAdapter;
  source: string;
  visible?: readonly StageKind[];
  /** Source line whose items are marked */
  line?: number;
  color?: boolean;
  logger?: Logger;
};

export type DumpResult = {
  text: string;
  error?: PipelineError;
};

/**
 * Runs the pipeline once and prints every visible panel in order. Items
 * that belong to `line` are marked with `*`.
 */
export const renderDump = ({
  adapter,
  source,
  visible,
  line,
  color = false,
  logger = silentLogger,
}: DumpOptions): DumpResult => {
  const panels: Partial<Record<StageKind, MemoryPanel>> = {};
  STAGE_KINDS.forEach((kind) => {
    panels[kind] = new MemoryPanel();
  });
  const explorer = new Explorer({ adapter, panels, visible, logger });
  const colorizer = createColorizer(color);

  const result = explorer.setSource(source);
  if (line !== undefined) explorer.selectLine(line);

  const sections = explorer.layout().kinds.map((kind) => {
    const entry = explorer.entry(kind);
    const title = colorizer.accent(`${panelTitle(kind)}${entry?.stale ? " [stale]" : ""}`);
    const panel = panels[kind];
    if (!entry || !panel) return [title, colorizer.muted("  (no output)")].join("\n");

    const highlighted = new Set(panel.highlighted);
    const items = panel.items.map((item, index) =>
      highlighted.has(index) ? colorizer.highlight(`* ${item.text}`) : `  ${item.text}`
    );
    const diagnostics = entry.artifact.diagnostics.map(
      (diagnostic) => `  ${formatStageDiagnostic(diagnostic, { color })}`
    );
    return [title, ...items, ...diagnostics].join("\n");
  });

  return {
    text: sections.length > 0 ? `${sections.join("\n\n")}\n` : "",
    error: result.ok ? undefined : result.error,
  };
};
