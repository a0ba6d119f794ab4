import type { DiagnosticPhase, DiagnosticSeverity } from "./index.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
};

type DiagnosticParamsMap = {
  LX0001: { char: string };
  LX0002: Record<string, never>;
  LX0003: Record<string, never>;
  LX0004: Record<string, never>;
  LX0005: { bracket: string };
  PS0001: { expected: string; found: string };
  PS0002: { target: string };
  PS0003: { keyword: string };
  OP0001: { value: boolean };
  CG0001: { statement: "break" | "continue" };
  CG0002: Record<string, never>;
  AS0001: { label: string };
  AS0002: { opcode: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  LX0001: {
    code: "LX0001",
    message: (params) => `invalid character ${JSON.stringify(params.char)}`,
    severity: "error",
    phase: "lexer",
  },
  LX0002: {
    code: "LX0002",
    message: () => "unterminated string literal",
    severity: "error",
    phase: "lexer",
  },
  LX0003: {
    code: "LX0003",
    message: () => "Tabs are not supported, use four spaces for indentation",
    severity: "error",
    phase: "lexer",
  },
  LX0004: {
    code: "LX0004",
    message: () => "unindent does not match any outer indentation level",
    severity: "error",
    phase: "lexer",
  },
  LX0005: {
    code: "LX0005",
    message: (params) => `unmatched '${params.bracket}'`,
    severity: "error",
    phase: "lexer",
  },
  PS0001: {
    code: "PS0001",
    message: (params) => `expected ${params.expected}, found ${params.found}`,
    severity: "error",
    phase: "parser",
  },
  PS0002: {
    code: "PS0002",
    message: (params) => `cannot assign to ${params.target}`,
    severity: "error",
    phase: "parser",
  },
  PS0003: {
    code: "PS0003",
    message: (params) => `expected an indented block after '${params.keyword}'`,
    severity: "error",
    phase: "parser",
  },
  OP0001: {
    code: "OP0001",
    message: (params) =>
      `condition is always ${params.value ? "true" : "false"}`,
    severity: "warning",
    phase: "optimizer",
  },
  CG0001: {
    code: "CG0001",
    message: (params) => `'${params.statement}' outside loop`,
    severity: "error",
    phase: "codegen",
  },
  CG0002: {
    code: "CG0002",
    message: () => "constant expression statement has no effect",
    severity: "note",
    phase: "codegen",
  },
  AS0001: {
    code: "AS0001",
    message: (params) => `jump to undefined label ${params.label}`,
    severity: "error",
    phase: "assembler",
  },
  AS0002: {
    code: "AS0002",
    message: (params) => `${params.opcode} cannot jump backward`,
    severity: "error",
    phase: "assembler",
  },
};

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];
