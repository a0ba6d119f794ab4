import type { StageDiagnosticSeverity } from "@stagelens/explorer";

export type Colorizer = {
  severityLabel: (severity: StageDiagnosticSeverity) => string;
  pointer: (severity: StageDiagnosticSeverity, text: string) => string;
  accent: (text: string) => string;
  muted: (text: string) => string;
  /** Items that belong to the selected source line */
  highlight: (text: string) => string;
  /** Title of the focused panel */
  focus: (text: string) => string;
};

const ESC = "\u001B[";

const wrap = (code: string) => (text: string) => `${ESC}${code}m${text}${ESC}0m`;

export const CLEAR_SCREEN = `${ESC}2J${ESC}H`;
export const ENTER_ALT_SCREEN = `${ESC}?1049h`;
export const LEAVE_ALT_SCREEN = `${ESC}?1049l`;
export const HIDE_CURSOR = `${ESC}?25l`;
export const SHOW_CURSOR = `${ESC}?25h`;

const colorForSeverity = (
  severity: StageDiagnosticSeverity
): ((text: string) => string) => {
  switch (severity) {
    case "warning":
      return wrap("33");
    case "note":
      return wrap("36");
    default:
      return wrap("31");
  }
};

export const createColorizer = (enabled: boolean): Colorizer => {
  if (!enabled) {
    const identity = (text: string) => text;
    return {
      severityLabel: (severity) => severity.toUpperCase(),
      pointer: (_severity, text) => text,
      accent: identity,
      muted: identity,
      highlight: identity,
      focus: identity,
    };
  }

  const bold = wrap("1");
  return {
    severityLabel: (severity) => bold(colorForSeverity(severity)(severity.toUpperCase())),
    pointer: (severity, text) => colorForSeverity(severity)(text),
    accent: wrap("35"),
    muted: wrap("2"),
    highlight: wrap("30;43"),
    focus: wrap("1;7"),
  };
};

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\u001B\[[0-9;?]*[A-Za-z]/g;

export const stripAnsi = (text: string): string => text.replace(ANSI_PATTERN, "");

/** Pads or truncates plain text to exactly `width` columns */
export const fit = (text: string, width: number): string => {
  if (width <= 0) return "";
  if (text.length <= width) return text.padEnd(width);
  return `${text.slice(0, width - 1)}…`;
};
