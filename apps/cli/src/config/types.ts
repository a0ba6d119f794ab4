import type { StageKind, ToolchainVersion } from "@stagelens/explorer";

export type StagelensConfig = {
  /** Source file to load instead of the built-in snippet */
  file?: string;
  toolchain: ToolchainVersion;
  /** Stages visible at startup; absent means the explorer's defaults */
  stages?: StageKind[];
  /** Print the visible stages and exit instead of starting the terminal UI */
  dump: boolean;
  /** Source line highlighted in dump mode */
  line?: number;
  color: boolean;
};
