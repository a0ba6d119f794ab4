import type { ConstantValue } from "../ast/nodes.js";
import { constantKey, formatConstant } from "../ast/format.js";
import {
  formatArgument,
  isInstruction,
  labelName,
  type PseudoArgument,
  type PseudoInstruction,
  type PseudoProgram,
} from "../codegen/instructions.js";
import {
  BINARY_OPERATOR_ARGS,
  COMPARE_OPERATOR_ARGS,
  INPLACE_OFFSET,
  OPCODES,
  hasArgument,
  type AssembledOpcode,
} from "../codegen/opcodes.js";
import { failWith } from "../diagnostics/index.js";

/** Each code unit is an opcode byte followed by an argument byte */
export const CODE_UNIT_SIZE = 2;

/**
 * One code unit of the listing. EXTENDED_ARG prefixes are items of their
 * own, carrying the argument byte they contribute and the line of the
 * instruction they widen; that instruction shows its full argument.
 */
export type AssembledInstruction = {
  /** Byte offset of the code unit */
  offset: number;
  opcode: AssembledOpcode;
  arg?: number;
  argrepr?: string;
  line?: number;
};

export type CodeObject = {
  instructions: readonly AssembledInstruction[];
  consts: readonly ConstantValue[];
  names: readonly string[];
  code: Uint8Array;
};

export type AssembleOptions = {
  /** File reported in assembler diagnostics */
  filePath?: string;
};

class Table<T> {
  readonly values: T[] = [];
  private readonly indices = new Map<string, number>();

  constructor(private readonly keyOf: (value: T) => string) {}

  indexOf(value: T): number {
    const key = this.keyOf(value);
    const existing = this.indices.get(key);
    if (existing !== undefined) return existing;
    const index = this.values.length;
    this.values.push(value);
    this.indices.set(key, index);
    return index;
  }
}

const extendedArgsFor = (arg: number | undefined): number => {
  if (arg === undefined) return 0;
  if (arg > 0xffffff) return 3;
  if (arg > 0xffff) return 2;
  if (arg > 0xff) return 1;
  return 0;
};

type Sized = {
  source: PseudoInstruction;
  opcode: AssembledOpcode;
  arg?: number;
  argrepr?: string;
  /** Index of the instruction in code units, including its prefixes */
  start: number;
  units: number;
};

/**
 * Turns a pseudo program into final bytecode. Labels become relative jump
 * deltas measured in code units from the end of the jumping instruction.
 * Since an argument above 255 needs EXTENDED_ARG prefixes, which move every
 * later offset, sizes are recomputed until they settle.
 */
export const assemble = (
  program: PseudoProgram,
  { filePath = "<input>" }: AssembleOptions = {}
): CodeObject => {
  const consts = new Table<ConstantValue>(constantKey);
  const names = new Table<string>((name) => name);
  const span = { file: filePath, start: 0, end: 0 };

  const labelOrder = new Map<number, number>();
  const instructions: PseudoInstruction[] = [];
  program.items.forEach((item) => {
    if (isInstruction(item)) {
      instructions.push(item);
    } else {
      labelOrder.set(item.label, instructions.length);
    }
  });

  const staticArg = (
    opcode: AssembledOpcode,
    arg: PseudoArgument | undefined
  ): { arg?: number; argrepr?: string } => {
    if (!arg) return {};
    switch (arg.kind) {
      case "const":
        return { arg: consts.indexOf(arg.value), argrepr: formatConstant(arg.value) };
      case "name":
        return { arg: names.indexOf(arg.name), argrepr: arg.name };
      case "count":
        return { arg: arg.value };
      case "operator": {
        const table = opcode === "COMPARE_OP" ? COMPARE_OPERATOR_ARGS : BINARY_OPERATOR_ARGS;
        const base = table[arg.op] ?? 0;
        return {
          arg: arg.inplace ? base + INPLACE_OFFSET : base,
          argrepr: formatArgument(arg),
        };
      }
      case "label":
        return {};
    }
  };

  const sized: Sized[] = instructions.map((source) => {
    const opcode: AssembledOpcode =
      source.opcode === "JUMP" ? "JUMP_FORWARD" : source.opcode;
    const resolved = staticArg(opcode, source.arg);
    return {
      source,
      opcode,
      ...resolved,
      start: 0,
      units: 1 + extendedArgsFor(resolved.arg),
    };
  });

  const targetOf = (entry: Sized): number | undefined => {
    if (entry.source.arg?.kind !== "label") return undefined;
    const label = entry.source.arg.label;
    const position = labelOrder.get(label);
    if (position === undefined) {
      return failWith({
        code: "AS0001",
        params: { label: labelName(label) },
        span,
      });
    }
    return position;
  };

  let changed = true;
  while (changed) {
    changed = false;

    let cursor = 0;
    sized.forEach((entry) => {
      entry.start = cursor;
      cursor += entry.units;
    });
    const startOf = (position: number) =>
      position < sized.length ? sized[position].start : cursor;

    sized.forEach((entry) => {
      const position = targetOf(entry);
      if (position === undefined) return;

      const target = startOf(position);
      const end = entry.start + entry.units;
      if (entry.source.opcode === "JUMP") {
        entry.opcode = target >= end ? "JUMP_FORWARD" : "JUMP_BACKWARD";
        entry.arg = Math.abs(target - end);
      } else {
        if (target < end) {
          failWith({
            code: "AS0002",
            params: { opcode: entry.source.opcode },
            span,
          });
        }
        entry.arg = target - end;
      }
      entry.argrepr = `to ${target * CODE_UNIT_SIZE}`;

      const units = 1 + extendedArgsFor(entry.arg);
      if (units !== entry.units) {
        entry.units = units;
        changed = true;
      }
    });
  }

  const code: number[] = [];
  const assembled = sized.flatMap((entry): AssembledInstruction[] => {
    const extendedArgs = entry.units - 1;
    const arg = hasArgument(entry.opcode) ? entry.arg ?? 0 : undefined;
    const line = entry.source.line;

    const prefixes: AssembledInstruction[] = [];
    for (let shift = extendedArgs; shift > 0; shift -= 1) {
      const byte = ((arg ?? 0) >> (8 * shift)) & 0xff;
      code.push(OPCODES.EXTENDED_ARG, byte);
      prefixes.push({
        offset: (entry.start + extendedArgs - shift) * CODE_UNIT_SIZE,
        opcode: "EXTENDED_ARG",
        arg: byte,
        line,
      });
    }
    code.push(OPCODES[entry.opcode], (arg ?? 0) & 0xff);

    return [
      ...prefixes,
      {
        offset: (entry.start + extendedArgs) * CODE_UNIT_SIZE,
        opcode: entry.opcode,
        arg,
        argrepr: entry.argrepr,
        line,
      },
    ];
  });

  return {
    instructions: assembled,
    consts: consts.values,
    names: names.values,
    code: Uint8Array.from(code),
  };
};

/** Listing line: `<offset> <OPNAME> <arg> (<argrepr>)` */
export const formatAssembledInstruction = (
  instruction: AssembledInstruction
): string => {
  const parts = [String(instruction.offset), instruction.opcode];
  if (instruction.arg !== undefined) parts.push(String(instruction.arg));
  if (instruction.argrepr !== undefined) parts.push(`(${instruction.argrepr})`);
  return parts.join(" ");
};
