import type { ConstantValue } from "../ast/nodes.js";
import { formatConstant } from "../ast/format.js";
import type { Opcode } from "./opcodes.js";

export type PseudoArgument =
  | { kind: "const"; value: ConstantValue }
  | { kind: "name"; name: string }
  | { kind: "label"; label: number }
  | { kind: "count"; value: number }
  | { kind: "operator"; op: string; inplace?: boolean };

export type PseudoInstruction = {
  kind: "instruction";
  opcode: Opcode;
  arg?: PseudoArgument;
  /** Source line the instruction was generated for */
  line?: number;
};

export type LabelMark = { kind: "label"; label: number };

export type PseudoItem = PseudoInstruction | LabelMark;

export type PseudoProgram = {
  items: readonly PseudoItem[];
};

export const instruction = (
  opcode: Opcode,
  arg?: PseudoArgument,
  line?: number
): PseudoInstruction => ({ kind: "instruction", opcode, arg, line });

export const isInstruction = (item: PseudoItem): item is PseudoInstruction =>
  item.kind === "instruction";

export const jumpTarget = (item: PseudoItem): number | undefined =>
  item.kind === "instruction" && item.arg?.kind === "label"
    ? item.arg.label
    : undefined;

export const labelName = (label: number) => `L${label}`;

export const formatArgument = (arg: PseudoArgument): string => {
  switch (arg.kind) {
    case "const":
      return formatConstant(arg.value);
    case "name":
      return arg.name;
    case "label":
      return labelName(arg.label);
    case "count":
      return String(arg.value);
    case "operator":
      return arg.inplace ? `${arg.op}=` : arg.op;
  }
};

/** One listing line: labels flush left, instructions indented */
export const formatPseudoItem = (item: PseudoItem): string => {
  if (item.kind === "label") return `${labelName(item.label)}:`;
  const arg = item.arg ? ` ${formatArgument(item.arg)}` : "";
  return `  ${item.opcode}${arg}`;
};
