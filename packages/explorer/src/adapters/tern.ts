import {
  DiagnosticError,
  assemble,
  dumpModule,
  formatAssembledInstruction,
  formatPseudoItem,
  formatToken,
  generatePseudoBytecode,
  optimizeModule,
  optimizePseudoBytecode,
  parseTokens,
  positionAt,
  sourceLines,
  tokenize,
  type Diagnostic,
  type DumpLine,
  type Module,
  type PseudoProgram,
} from "@stagelens/toolchain";
import type { StageDiagnostic, StageItem } from "../artifact.js";
import type { StageOutput, ToolchainAdapter } from "../adapter.js";
import { CompilationFailedError, StageUnavailableError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import {
  STAGE_KINDS,
  capabilitiesFor,
  stageOrder,
  type Capabilities,
  type StageKind,
  type ToolchainVersion,
} from "../stages.js";

type Failure = {
  stage: StageKind;
  message: string;
  diagnostic: StageDiagnostic;
};

type Compilation = {
  source: string;
  outputs: Map<StageKind, StageOutput>;
  failure?: Failure;
};

const dumpItems = (module: Module): StageItem[] =>
  dumpModule(module).map((line: DumpLine) => ({ text: line.text, line: line.line }));

const programItems = (program: PseudoProgram): StageItem[] =>
  program.items.map((item) => ({
    text: formatPseudoItem(item),
    line: item.kind === "instruction" ? item.line : undefined,
  }));

/**
 * Adapter over the Tern toolchain. One source text is compiled through
 * every phase once and the result is reused for each stage the controller
 * asks for, until a different source comes in.
 */
export class TernToolchainAdapter implements ToolchainAdapter {
  readonly version: ToolchainVersion;
  readonly capabilities: Capabilities;
  private readonly filePath: string;
  private readonly logger: Logger;
  private cached?: Compilation;

  constructor({
    version = "full",
    filePath = "<snippet>",
    logger = silentLogger,
  }: {
    version?: ToolchainVersion;
    filePath?: string;
    logger?: Logger;
  } = {}) {
    this.version = version;
    this.capabilities = capabilitiesFor(version);
    this.filePath = filePath;
    this.logger = logger;
  }

  run(source: string, kind: StageKind): StageOutput {
    if (!this.capabilities.has(kind)) {
      throw new StageUnavailableError(kind);
    }

    const compilation = this.compilationFor(source);
    const output = compilation.outputs.get(kind);
    if (output) return output;

    const failure = compilation.failure;
    if (failure && stageOrder(failure.stage) <= stageOrder(kind)) {
      throw new CompilationFailedError({
        stage: kind,
        message: failure.message,
        diagnostic: failure.diagnostic,
      });
    }

    throw new Error(`no output was produced for ${kind}`);
  }

  private compilationFor(source: string): Compilation {
    if (this.cached?.source === source) {
      this.logger.debug("reusing compilation");
      return this.cached;
    }
    const compilation = this.compile(source);
    this.cached = compilation;
    return compilation;
  }

  private compile(source: string): Compilation {
    const outputs = new Map<StageKind, StageOutput>();
    const compilation: Compilation = { source, outputs };
    const toStageDiagnostics = (diagnostics: readonly Diagnostic[]) =>
      diagnostics.map((diagnostic) => this.toStageDiagnostic(source, diagnostic));

    outputs.set("source", {
      items: sourceLines(source).map((text, index) => ({ text, line: index + 1 })),
      diagnostics: [],
    });

    let stage: StageKind = "tokens";
    try {
      const tokens = tokenize(source, this.filePath);
      outputs.set("tokens", {
        items: tokens.map((token) => ({
          text: formatToken(token),
          line: token.isLayout ? undefined : token.location.line,
        })),
        diagnostics: [],
      });

      stage = "ast";
      const module = parseTokens(tokens);
      outputs.set("ast", { items: dumpItems(module), diagnostics: [] });

      stage = "optimized-ast";
      const optimized = optimizeModule(module);
      outputs.set("optimized-ast", {
        items: dumpItems(optimized.module),
        diagnostics: toStageDiagnostics(optimized.diagnostics),
      });

      stage = "pseudo-bytecode";
      const generated = generatePseudoBytecode(optimized.module);
      outputs.set("pseudo-bytecode", {
        items: programItems(generated.program),
        diagnostics: toStageDiagnostics(generated.diagnostics),
      });

      stage = "optimized-pseudo-bytecode";
      const peephole = optimizePseudoBytecode(generated.program);
      this.logger.debug(
        `peephole applied ${peephole.rewrites} rewrites in ${peephole.rounds} rounds`
      );
      outputs.set("optimized-pseudo-bytecode", {
        items: programItems(peephole.program),
        diagnostics: [],
      });

      stage = "final-bytecode";
      const code = assemble(peephole.program, { filePath: this.filePath });
      outputs.set("final-bytecode", {
        items: code.instructions.map((instruction) => ({
          text: formatAssembledInstruction(instruction),
          line: instruction.line,
        })),
        diagnostics: [],
      });
    } catch (error) {
      if (!(error instanceof DiagnosticError)) throw error;
      const diagnostic = this.toStageDiagnostic(source, error.diagnostic);
      compilation.failure = {
        stage,
        message: this.formatFailure(source, error.diagnostic),
        diagnostic,
      };
      this.logger.info(`compilation stopped at ${stage}`, compilation.failure.message);
    }

    this.dropUnavailable(outputs);
    return compilation;
  }

  /** Phases the version lacks still run, but only available kinds are kept */
  private dropUnavailable(outputs: Map<StageKind, StageOutput>) {
    STAGE_KINDS.forEach((kind) => {
      if (!this.capabilities.has(kind)) outputs.delete(kind);
    });
  }

  private toStageDiagnostic(source: string, diagnostic: Diagnostic): StageDiagnostic {
    const position = positionAt(source, diagnostic.span.start);
    return {
      code: diagnostic.code,
      severity: diagnostic.severity,
      message: diagnostic.message,
      line: position.line,
      column: position.column + 1,
    };
  }

  /** `<CODE> at <line>:<column>: <message>` */
  private formatFailure(source: string, diagnostic: Diagnostic): string {
    const position = positionAt(source, diagnostic.span.start);
    return `${diagnostic.code} at ${position.line}:${position.column + 1}: ${diagnostic.message}`;
  }
}
