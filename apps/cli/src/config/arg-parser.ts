import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import {
  STAGE_INFO,
  STAGE_KINDS,
  TOOLCHAIN_VERSIONS,
  stageFromId,
  type StageKind,
  type ToolchainVersion,
} from "@stagelens/explorer";
import type { StagelensConfig } from "./types.js";

const require = createRequire(import.meta.url);

const readVersion = (): string => {
  const manifest: unknown = require("../../package.json");
  return typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
    ? manifest.version
    : "0.0.0";
};

const STAGE_IDS = STAGE_KINDS.map((kind) => STAGE_INFO[kind].id);

type CliOptions = {
  toolchain: ToolchainVersion;
  stages?: StageKind[];
  dump?: boolean;
  line?: number;
  color: boolean;
};

const parseToolchain = (value: string): ToolchainVersion => {
  const normalized = value.toLowerCase();
  const version = TOOLCHAIN_VERSIONS.find((candidate) => candidate === normalized);
  if (version) return version;
  throw new InvalidArgumentError(
    `invalid toolchain "${value}" (allowed: ${TOOLCHAIN_VERSIONS.join(", ")})`
  );
};

const parseStages = (value: string): StageKind[] => {
  const kinds = new Set<StageKind>();
  value
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id.length > 0)
    .forEach((id) => {
      const kind = stageFromId(id);
      if (!kind) {
        throw new InvalidArgumentError(
          `unknown stage "${id}" (allowed: ${STAGE_IDS.join(", ")})`
        );
      }
      kinds.add(kind);
    });
  return [...kinds];
};

const parseLine = (value: string): number => {
  const line = Number(value);
  if (!Number.isInteger(line) || line < 1) {
    throw new InvalidArgumentError(`line must be a positive integer, got "${value}"`);
  }
  return line;
};

const createBaseCommand = ({
  name,
  description,
}: {
  name: string;
  description: string;
}): Command =>
  new Command()
    .name(name)
    .description(description)
    .version(readVersion(), "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command");

export type ParseOptions = {
  /** Throw commander errors instead of printing them and exiting */
  throwOnError?: boolean;
};

export const parseArgs = (
  argv: readonly string[],
  { throwOnError = false }: ParseOptions = {}
): StagelensConfig => {
  const program = createBaseCommand({
    name: "stagelens",
    description: "Compiler Pipeline Explorer",
  });

  program
    .argument("[file]", "source file to explore (default: built-in snippet)")
    .option(
      "-t, --toolchain <version>",
      `toolchain version (${TOOLCHAIN_VERSIONS.join("|")})`,
      parseToolchain,
      "full"
    )
    .option(
      "-s, --stages <list>",
      `comma separated stages to show (${STAGE_IDS.join(", ")})`,
      parseStages
    )
    .option("-d, --dump", "print the visible stages and exit")
    .option("-l, --line <n>", "source line to highlight in dump mode", parseLine)
    .option("--no-color", "disable colored output");

  if (throwOnError) {
    program.exitOverride().configureOutput({ writeErr: () => {} });
  }

  program.parse(["node", "stagelens", ...argv]);
  const opts = program.opts<CliOptions>();

  return {
    file: program.args.at(0),
    toolchain: opts.toolchain,
    stages: opts.stages,
    dump: opts.dump ?? false,
    line: opts.line,
    color: opts.color,
  };
};

export const getConfigFromCli = (): StagelensConfig => parseArgs(process.argv.slice(2));
