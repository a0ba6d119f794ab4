import {
  getDiagnosticDefinition,
  type DiagnosticCode,
  type DiagnosticParams,
} from "./registry.js";

export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase =
  | "lexer"
  | "parser"
  | "optimizer"
  | "codegen"
  | "assembler";

export interface SourceSpan {
  file: string;
  start: number;
  end: number;
}

export interface Diagnostic {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  span: SourceSpan;
  phase?: DiagnosticPhase;
}

export type DiagnosticInput = {
  code: string;
  message: string;
  span: SourceSpan;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
};

export type { DiagnosticCode, DiagnosticParams } from "./registry.js";

const codePhasePrefixes: Record<string, DiagnosticPhase> = {
  LX: "lexer",
  PS: "parser",
  OP: "optimizer",
  CG: "codegen",
  AS: "assembler",
};

const inferPhase = (code: string): DiagnosticPhase | undefined => {
  const prefix = code.slice(0, 2).toUpperCase();
  return codePhasePrefixes[prefix];
};

export const createDiagnostic = ({
  severity,
  phase,
  ...input
}: DiagnosticInput): Diagnostic => ({
  ...input,
  severity: severity ?? "error",
  phase: phase ?? inferPhase(input.code),
});

export const diagnosticFromCode = <K extends DiagnosticCode>({
  code,
  params,
  span,
}: {
  code: K;
  params: DiagnosticParams<K>;
  span: SourceSpan;
}): Diagnostic => {
  const definition = getDiagnosticDefinition(code);
  return createDiagnostic({
    code,
    message: definition.message(params),
    severity: definition.severity,
    phase: definition.phase,
    span,
  });
};

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const location = `${diagnostic.span.file}:${diagnostic.span.start}-${diagnostic.span.end}`;
  const severity = diagnostic.severity.toUpperCase();
  const phase = diagnostic.phase ? `[${diagnostic.phase}] ` : "";
  return `${location} ${severity} ${phase}${diagnostic.code}: ${diagnostic.message}`;
};

export class DiagnosticError extends Error {
  diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(formatDiagnostic(diagnostic));
    this.diagnostic = diagnostic;
  }
}

export class DiagnosticEmitter {
  #diagnostics: Diagnostic[] = [];

  report<K extends DiagnosticCode>(input: {
    code: K;
    params: DiagnosticParams<K>;
    span: SourceSpan;
  }): Diagnostic {
    const diagnostic = diagnosticFromCode(input);
    this.#diagnostics.push(diagnostic);
    return diagnostic;
  }

  error<K extends DiagnosticCode>(input: {
    code: K;
    params: DiagnosticParams<K>;
    span: SourceSpan;
  }): never {
    const diagnostic = this.report(input);
    throw new DiagnosticError(diagnostic);
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.#diagnostics;
  }
}

export const failWith = <K extends DiagnosticCode>(input: {
  code: K;
  params: DiagnosticParams<K>;
  span: SourceSpan;
}): never => {
  throw new DiagnosticError(diagnosticFromCode(input));
};
