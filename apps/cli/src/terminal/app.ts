import { emitKeypressEvents, type Key } from "node:readline";
import {
  Explorer,
  STAGE_INFO,
  STAGE_KINDS,
  formatPipelineError,
  silentLogger,
  stageFromKey,
  type Logger,
  type StageKind,
  type ToolchainAdapter,
} from "@stagelens/explorer";
import {
  CLEAR_SCREEN,
  ENTER_ALT_SCREEN,
  HIDE_CURSOR,
  LEAVE_ALT_SCREEN,
  SHOW_CURSOR,
  createColorizer,
  fit,
  type Colorizer,
} from "./ansi.js";
import { editSource } from "./editor.js";
import { renderGrid } from "./layout.js";
import { TerminalPanel } from "./panel.js";

export const APP_TITLE = "Compiler Pipeline Explorer";

export type AppAction = "quit" | "edit";

export type TerminalAppOptions = {
  adapter: ToolchainAdapter;
  visible?: readonly StageKind[];
  /** Shown in the header */
  file: string;
  color?: boolean;
  logger?: Logger;
};

const createPanels = (): Record<StageKind, TerminalPanel> => ({
  source: new TerminalPanel("source"),
  tokens: new TerminalPanel("tokens"),
  ast: new TerminalPanel("ast"),
  "optimized-ast": new TerminalPanel("optimized-ast"),
  "pseudo-bytecode": new TerminalPanel("pseudo-bytecode"),
  "optimized-pseudo-bytecode": new TerminalPanel("optimized-pseudo-bytecode"),
  "final-bytecode": new TerminalPanel("final-bytecode"),
});

/** Key handling and screen composition for the interactive explorer */
export class TerminalApp {
  readonly explorer: Explorer;
  readonly panels: Readonly<Record<StageKind, TerminalPanel>>;
  private readonly file: string;
  private readonly color: Colorizer;
  private readonly logger: Logger;
  private focusedKind?: StageKind;
  private status?: string;

  constructor({ adapter, visible, file, color = false, logger = silentLogger }: TerminalAppOptions) {
    this.panels = createPanels();
    this.explorer = new Explorer({ adapter, panels: this.panels, visible, logger });
    this.file = file;
    this.color = createColorizer(color);
    this.logger = logger.child("app");
  }

  /** Focused panel; falls back to the first visible one */
  get focused(): StageKind | undefined {
    const kinds = this.explorer.layout().kinds;
    if (this.focusedKind && kinds.includes(this.focusedKind)) return this.focusedKind;
    return kinds[0];
  }

  handleKey(text: string | undefined, key?: Key): AppAction | undefined {
    if (key?.ctrl && key.name === "c") return "quit";

    const name = key?.name ?? text;
    this.status = undefined;

    switch (name) {
      case "q":
      case "escape":
        return "quit";
      case "e":
        return "edit";
      case "tab":
        this.cycleFocus();
        return undefined;
      case "up":
      case "k":
        this.moveCursor(-1);
        return undefined;
      case "down":
      case "j":
        this.moveCursor(1);
        return undefined;
    }

    const kind = text ? stageFromKey(text) : undefined;
    if (kind && !this.explorer.toggle(kind)) {
      this.status = `${STAGE_INFO[kind].title} is not available in this toolchain`;
    }
    return undefined;
  }

  screen(width: number, height: number): string[] {
    const header = this.color.accent(
      fit(`${APP_TITLE}  ${this.file}${this.lineLabel()}`, width)
    );
    const footer = this.footer(width);
    const grid = renderGrid({
      layout: this.explorer.layout(),
      panels: this.panels,
      width,
      height: Math.max(1, height - 1 - footer.length),
      focused: this.focused,
      isStale: (kind) => this.explorer.entry(kind)?.stale ?? false,
      color: this.color,
    });
    return [header, ...grid, ...footer];
  }

  async run({
    input,
    output,
  }: {
    input: NodeJS.ReadStream;
    output: NodeJS.WriteStream;
  }): Promise<void> {
    emitKeypressEvents(input);
    output.write(ENTER_ALT_SCREEN);

    try {
      for (;;) {
        const action = await this.nextAction(input, output);
        if (action === "quit") return;

        output.write(`${CLEAR_SCREEN}${SHOW_CURSOR}`);
        const result = await editSource({ current: this.explorer.source, input, output });
        if (result.changed) {
          this.logger.debug("source replaced from the editor");
          this.explorer.setSource(result.text);
        }
      }
    } finally {
      output.write(`${SHOW_CURSOR}${LEAVE_ALT_SCREEN}`);
      input.pause();
    }
  }

  private nextAction(input: NodeJS.ReadStream, output: NodeJS.WriteStream): Promise<AppAction> {
    return new Promise((resolve) => {
      const draw = () => {
        const width = output.isTTY ? output.columns : 100;
        const height = output.isTTY ? output.rows : 30;
        output.write(`${CLEAR_SCREEN}${HIDE_CURSOR}${this.screen(width, height).join("\n")}`);
      };

      const onKeypress = (text: string | undefined, key: Key | undefined) => {
        const action = this.handleKey(text, key);
        if (!action) {
          draw();
          return;
        }
        input.off("keypress", onKeypress);
        output.off("resize", draw);
        if (input.isTTY) input.setRawMode(false);
        resolve(action);
      };

      if (input.isTTY) input.setRawMode(true);
      input.on("keypress", onKeypress);
      output.on("resize", draw);
      input.resume();
      draw();
    });
  }

  private cycleFocus() {
    const kinds = this.explorer.layout().kinds;
    if (kinds.length === 0) return;
    const current = this.focused;
    const index = current ? kinds.indexOf(current) : -1;
    this.focusedKind = kinds[(index + 1) % kinds.length];
  }

  private moveCursor(delta: number) {
    const kind = this.focused;
    if (!kind) return;
    const index = this.panels[kind].moveCursor(delta);
    if (index !== undefined) this.explorer.selectItem(kind, index);
  }

  private lineLabel(): string {
    const line = this.explorer.currentLine;
    return line === undefined ? "" : `  line ${line}`;
  }

  private footer(width: number): string[] {
    const stageKeys = STAGE_KINDS.filter((kind) => this.explorer.capabilities.has(kind)).map(
      (kind) => `${STAGE_INFO[kind].key}:${STAGE_INFO[kind].title}`
    );
    const keys = [...stageKeys, "e:edit", "tab:focus", "j/k:move", "q:quit"].join("  ");
    const error = this.explorer.lastError;
    const message = error ? formatPipelineError(error) : this.status ?? "";

    return [
      this.color.muted(fit(keys, width)),
      error ? this.color.pointer("error", fit(message, width)) : fit(message, width),
    ];
  }
}
