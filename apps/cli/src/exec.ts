import { readFileSync } from "node:fs";
import {
  TernToolchainAdapter,
  consoleSink,
  createBufferedSink,
  createLogger,
  describeError,
} from "@stagelens/explorer";
import { getConfig } from "./config/index.js";
import { DEFAULT_SNIPPET, DEFAULT_SNIPPET_PATH } from "./default-snippet.js";
import { formatPipelineFailure } from "./diagnostics.js";
import { createColorizer } from "./terminal/ansi.js";
import { TerminalApp } from "./terminal/app.js";
import { renderDump } from "./terminal/dump.js";

export const exec = () => main().catch(errorHandler);

async function main() {
  const config = getConfig();
  const file = config.file ?? DEFAULT_SNIPPET_PATH;
  const source = config.file ? readFileSync(config.file, "utf8") : DEFAULT_SNIPPET;

  if (config.dump) {
    const color = config.color && process.stdout.isTTY;
    const logger = createLogger({ sink: consoleSink });
    const adapter = new TernToolchainAdapter({
      version: config.toolchain,
      filePath: file,
      logger: logger.child("tern"),
    });
    const result = renderDump({
      adapter,
      source,
      visible: config.stages,
      line: config.line,
      color,
      logger,
    });

    process.stdout.write(result.text);
    if (result.error) {
      console.error(formatPipelineFailure(result.error, { source, file, color }));
      process.exitCode = 1;
    }
    return;
  }

  if (!process.stdin.isTTY) {
    throw new Error("the explorer needs an interactive terminal; use --dump to print the stages");
  }

  const logs = createBufferedSink();
  const logger = createLogger({ sink: logs.sink });
  const app = new TerminalApp({
    adapter: new TernToolchainAdapter({
      version: config.toolchain,
      filePath: file,
      logger: logger.child("tern"),
    }),
    visible: config.stages,
    file,
    color: config.color,
    logger,
  });

  try {
    app.explorer.setSource(source);
    await app.run({ input: process.stdin, output: process.stdout });
  } finally {
    logs.flush((line) => console.error(line));
  }
}

function errorHandler(error: unknown) {
  const color = createColorizer(Boolean(process.stderr.isTTY));
  console.error(`${color.severityLabel("error")} ${describeError(error)}`);
  process.exit(1);
}
