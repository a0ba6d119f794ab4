/** Numeric opcodes of the assembled instruction set */
export const OPCODES = {
  NOP: 0,
  POP_TOP: 1,
  UNARY_NEGATIVE: 2,
  UNARY_NOT: 3,
  UNARY_POSITIVE: 4,
  GET_ITER: 5,
  END_FOR: 6,
  BINARY_SUBSCR: 7,
  STORE_SUBSCR: 8,
  DELETE_SUBSCR: 9,
  RETURN_VALUE: 10,
  STORE_NAME: 90,
  DELETE_NAME: 91,
  UNPACK_SEQUENCE: 92,
  FOR_ITER: 93,
  STORE_ATTR: 95,
  DELETE_ATTR: 96,
  SWAP: 99,
  LOAD_CONST: 100,
  LOAD_NAME: 101,
  BUILD_TUPLE: 102,
  BUILD_LIST: 103,
  LOAD_ATTR: 106,
  COMPARE_OP: 107,
  JUMP_FORWARD: 110,
  POP_JUMP_IF_FALSE: 114,
  POP_JUMP_IF_TRUE: 115,
  COPY: 120,
  BINARY_OP: 122,
  JUMP_BACKWARD: 140,
  EXTENDED_ARG: 144,
  CALL: 171,
} as const;

export type AssembledOpcode = keyof typeof OPCODES;

/** Opcodes that only exist before assembly */
export type PseudoOpcode = "JUMP";

export type Opcode = AssembledOpcode | PseudoOpcode;

/** Opcodes at or above this value take an argument */
export const HAVE_ARGUMENT = 90;

export const hasArgument = (opcode: AssembledOpcode): boolean =>
  OPCODES[opcode] >= HAVE_ARGUMENT;

export const UNCONDITIONAL_JUMPS: ReadonlySet<Opcode> = new Set([
  "JUMP",
  "JUMP_FORWARD",
  "JUMP_BACKWARD",
]);

export const CONDITIONAL_JUMPS: ReadonlySet<Opcode> = new Set([
  "POP_JUMP_IF_FALSE",
  "POP_JUMP_IF_TRUE",
]);

export const isJump = (opcode: Opcode): boolean =>
  UNCONDITIONAL_JUMPS.has(opcode) ||
  CONDITIONAL_JUMPS.has(opcode) ||
  opcode === "FOR_ITER";

/** Control never falls through these */
export const isTerminator = (opcode: Opcode): boolean =>
  UNCONDITIONAL_JUMPS.has(opcode) || opcode === "RETURN_VALUE";

/** BINARY_OP arguments; in-place forms add INPLACE_OFFSET */
export const BINARY_OPERATOR_ARGS: Readonly<Record<string, number>> = {
  "+": 0,
  "//": 2,
  "*": 5,
  "%": 6,
  "**": 8,
  "-": 10,
  "/": 11,
};

export const INPLACE_OFFSET = 13;

export const COMPARE_OPERATOR_ARGS: Readonly<Record<string, number>> = {
  "<": 0,
  "<=": 1,
  "==": 2,
  "!=": 3,
  ">": 4,
  ">=": 5,
};
