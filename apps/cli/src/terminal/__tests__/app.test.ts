import { describe, expect, it } from "vitest";
import { TernToolchainAdapter, type ToolchainVersion } from "@stagelens/explorer";
import { fit } from "../ansi.js";
import { APP_TITLE, TerminalApp } from "../app.js";

const createApp = (version: ToolchainVersion = "full") => {
  const app = new TerminalApp({
    adapter: new TernToolchainAdapter({ version }),
    visible: ["source", "tokens"],
    file: "<snippet>",
  });
  app.explorer.setSource("a = 1\nb = 2\n");
  return app;
};

describe("TerminalApp", () => {
  it("maps quit and edit keys", () => {
    const app = createApp();
    expect(app.handleKey("q", { name: "q" })).toBe("quit");
    expect(app.handleKey(undefined, { name: "escape" })).toBe("quit");
    expect(app.handleKey(undefined, { name: "c", ctrl: true })).toBe("quit");
    expect(app.handleKey("e", { name: "e" })).toBe("edit");
  });

  it("moves the cursor of the focused panel and broadcasts its line", () => {
    const app = createApp();

    app.handleKey("j", { name: "j" });
    expect(app.panels.source.cursor).toBe(0);
    expect(app.explorer.currentLine).toBe(1);
    expect([0, 1, 2, 3].map((index) => app.panels.tokens.isHighlighted(index))).toEqual([
      true,
      true,
      true,
      false,
    ]);

    app.handleKey(undefined, { name: "down" });
    expect(app.explorer.currentLine).toBe(2);
    expect(app.panels.tokens.isHighlighted(4)).toBe(true);
  });

  it("cycles focus across visible panels", () => {
    const app = createApp();
    expect(app.focused).toBe("source");

    app.handleKey(undefined, { name: "tab" });
    expect(app.focused).toBe("tokens");

    app.handleKey("k", { name: "k" });
    expect(app.panels.tokens.cursor).toBe(0);
    expect(app.explorer.currentLine).toBe(1);

    app.handleKey(undefined, { name: "tab" });
    expect(app.focused).toBe("source");
  });

  it("toggles stages with their keys", () => {
    const app = createApp();

    app.handleKey("4", { name: "4" });
    expect(app.explorer.layout().kinds).toEqual(["source", "tokens", "optimized-ast"]);

    app.handleKey("1", { name: "1" });
    expect(app.explorer.layout().kinds).toEqual(["tokens", "optimized-ast"]);
    expect(app.focused).toBe("tokens");
  });

  it("lists only available stages and explains unavailable ones", () => {
    const app = createApp("legacy");
    app.handleKey("4", { name: "4" });

    const screen = app.screen(80, 10);
    expect(screen).toHaveLength(10);
    expect(screen[0]).toBe(fit(`${APP_TITLE}  <snippet>`, 80));
    expect(screen[8]).toBe(
      "1:Source  2:Tokens  3:AST  7:Final Bytecode  e:edit  tab:focus  j/k:move  q:quit"
    );
    expect(screen[9]).toBe(fit("Optimized AST is not available in this toolchain", 80));
  });

  it("shows the selected line and the latest failure", () => {
    const app = createApp();
    app.handleKey("j", { name: "j" });
    app.explorer.setSource("a = 1 +\n");

    const screen = app.screen(80, 10);
    expect(screen[0]).toBe(fit(`${APP_TITLE}  <snippet>  line 1`, 80));
    expect(screen[9]).toBe(
      fit("AST failed: PS0001 at 1:8: expected expression, found end of line", 80)
    );
  });
});
