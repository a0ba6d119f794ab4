export * from "./diagnostics/index.js";
export {
  diagnosticsRegistry,
  formatDiagnosticMessage,
  getDiagnosticDefinition,
} from "./diagnostics/registry.js";
export { SourceLocation } from "./syntax/location.js";
export {
  createLineStarts,
  positionAt,
  sourceLines,
  type Position,
} from "./syntax/source-lines.js";
export { SourceCursor } from "./parser/source-cursor.js";
export {
  Token,
  formatToken,
  LAYOUT_TOKEN_KINDS,
  type TokenKind,
} from "./parser/token.js";
export { Lexer, tokenize } from "./parser/lexer.js";
export { Parser, parse, parseTokens } from "./parser/parser.js";
export type * from "./ast/nodes.js";
export { constantKey, formatConstant, isTruthy } from "./ast/format.js";
export { dumpModule, type DumpLine } from "./ast/dump.js";
export {
  ConstantFolder,
  MAX_FOLDED_LENGTH,
  optimizeModule,
  type AstOptimizationResult,
} from "./optimizer/fold-constants.js";
export {
  optimizePseudoBytecode,
  type PeepholeResult,
} from "./optimizer/peephole.js";
export {
  CodeGenerator,
  generatePseudoBytecode,
  type CodegenResult,
} from "./codegen/generator.js";
export {
  formatPseudoItem,
  isInstruction,
  type PseudoArgument,
  type PseudoInstruction,
  type PseudoItem,
  type PseudoProgram,
} from "./codegen/instructions.js";
export { OPCODES, type Opcode, type AssembledOpcode } from "./codegen/opcodes.js";
export {
  assemble,
  formatAssembledInstruction,
  CODE_UNIT_SIZE,
  type AssembledInstruction,
  type CodeObject,
} from "./assembler/assemble.js";
