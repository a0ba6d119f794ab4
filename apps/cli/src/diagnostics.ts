import {
  STAGE_INFO,
  formatPipelineError,
  type PipelineError,
  type StageDiagnostic,
} from "@stagelens/explorer";
import { createColorizer, type Colorizer } from "./terminal/ansi.js";

const lineTextAt = ({
  source,
  lineNumber,
}: {
  source: string;
  lineNumber: number;
}): string | undefined => source.split("\n")[lineNumber - 1];

const formatSnippet = ({
  diagnostic,
  lineText,
  line,
  column,
  color,
}: {
  diagnostic: StageDiagnostic;
  lineText: string;
  line: number;
  column: number;
  color: Colorizer;
}): string => {
  const gutter = `${line}`;
  const padding = " ".repeat(gutter.length);
  const marker = `${" ".repeat(column - 1)}${color.pointer(diagnostic.severity, "^")}`;
  const message = color.muted(diagnostic.message);

  return [
    `${padding} |`,
    `${gutter} | ${lineText}`,
    `${padding} | ${marker} ${message}`,
  ].join("\n");
};

/** Renders a pipeline failure, with the offending source line when it is known */
export const formatPipelineFailure = (
  error: PipelineError,
  {
    source,
    file,
    color = true,
  }: {
    source: string;
    file: string;
    color?: boolean;
  }
): string => {
  const colorizer = createColorizer(color);
  const label = colorizer.severityLabel("error");

  if (error.type === "adapter-crash") {
    return `${file} ${label} ${formatPipelineError(error)}`;
  }

  const diagnostic = error.diagnostic;
  if (!diagnostic?.line) {
    return `${file} ${label} ${formatPipelineError(error)}`;
  }

  const line = diagnostic.line;
  const column = diagnostic.column ?? 1;
  const header = `${file}:${line}:${column} ${colorizer.severityLabel(
    diagnostic.severity
  )} [${STAGE_INFO[error.stage].title}] ${colorizer.accent(diagnostic.code)}: ${
    diagnostic.message
  }`;
  const lineText = lineTextAt({ source, lineNumber: line });
  const snippet =
    lineText === undefined
      ? undefined
      : formatSnippet({ diagnostic, lineText, line, column, color: colorizer });

  return [header, snippet].filter(Boolean).join("\n");
};

export const formatStageDiagnostic = (
  diagnostic: StageDiagnostic,
  options: { color?: boolean } = {}
): string => {
  const color = createColorizer(options.color ?? true);
  const where = diagnostic.line ? ` line ${diagnostic.line}` : "";
  return `${color.severityLabel(diagnostic.severity)} ${color.accent(diagnostic.code)}${where}: ${
    diagnostic.message
  }`;
};
