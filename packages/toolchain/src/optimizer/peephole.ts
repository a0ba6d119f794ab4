import { isTruthy } from "../ast/format.js";
import {
  instruction,
  isInstruction,
  jumpTarget,
  type PseudoInstruction,
  type PseudoItem,
  type PseudoProgram,
} from "../codegen/instructions.js";
import {
  CONDITIONAL_JUMPS,
  UNCONDITIONAL_JUMPS,
  isTerminator,
} from "../codegen/opcodes.js";

export type PeepholeResult = {
  program: PseudoProgram;
  /** Number of rewrites applied across all rounds */
  rewrites: number;
  rounds: number;
};

type Pass = (items: PseudoItem[]) => number;

/** Upper bound on fixpoint rounds; every pass shrinks or retargets code */
const MAX_ROUNDS = 64;

const nop = (line?: number) => instruction("NOP", undefined, line);

const labelPositions = (items: readonly PseudoItem[]): Map<number, number> => {
  const positions = new Map<number, number>();
  items.forEach((item, index) => {
    if (item.kind === "label") positions.set(item.label, index);
  });
  return positions;
};

const referencedLabels = (items: readonly PseudoItem[]): Set<number> => {
  const labels = new Set<number>();
  items.forEach((item) => {
    const target = jumpTarget(item);
    if (target !== undefined) labels.add(target);
  });
  return labels;
};

/** First instruction at or after `index`, skipping label marks */
const instructionFrom = (
  items: readonly PseudoItem[],
  index: number
): PseudoInstruction | undefined => {
  for (let i = index; i < items.length; i += 1) {
    const item = items[i];
    if (isInstruction(item)) return item;
  }
  return undefined;
};

/**
 * `LOAD_CONST c; POP_JUMP_IF_X L` becomes `JUMP L` when the jump is always
 * taken and disappears when it never is.
 */
const foldConstantJumps: Pass = (items) => {
  let rewrites = 0;
  for (let i = 0; i + 1 < items.length; i += 1) {
    const load = items[i];
    const jump = items[i + 1];
    if (!isInstruction(load) || !isInstruction(jump)) continue;
    if (load.opcode !== "LOAD_CONST" || load.arg?.kind !== "const") continue;
    if (!CONDITIONAL_JUMPS.has(jump.opcode)) continue;

    const taken = isTruthy(load.arg.value) === (jump.opcode === "POP_JUMP_IF_TRUE");
    items[i] = nop(load.line);
    items[i + 1] = taken ? instruction("JUMP", jump.arg, jump.line) : nop(jump.line);
    rewrites += 1;
  }
  return rewrites;
};

/** `BUILD_TUPLE n; UNPACK_SEQUENCE n` for small n is a stack shuffle */
const simplifyPackUnpack: Pass = (items) => {
  let rewrites = 0;
  for (let i = 0; i + 1 < items.length; i += 1) {
    const build = items[i];
    const unpack = items[i + 1];
    if (!isInstruction(build) || !isInstruction(unpack)) continue;
    if (build.opcode !== "BUILD_TUPLE" && build.opcode !== "BUILD_LIST") continue;
    if (unpack.opcode !== "UNPACK_SEQUENCE") continue;
    if (build.arg?.kind !== "count" || unpack.arg?.kind !== "count") continue;

    const count = build.arg.value;
    if (count !== unpack.arg.value || count < 1 || count > 3) continue;

    items[i] = nop(build.line);
    items[i + 1] =
      count === 1
        ? nop(unpack.line)
        : instruction("SWAP", { kind: "count", value: count }, unpack.line);
    rewrites += 1;
  }
  return rewrites;
};

/**
 * A jump whose target is an unconditional jump goes straight to the final
 * destination. Conditional jumps are only threaded to targets ahead of
 * them, since they cannot be encoded backward.
 */
const threadJumps: Pass = (items) => {
  const positions = labelPositions(items);
  let rewrites = 0;

  items.forEach((item, index) => {
    if (!isInstruction(item) || item.arg?.kind !== "label") return;
    if (!UNCONDITIONAL_JUMPS.has(item.opcode) && !CONDITIONAL_JUMPS.has(item.opcode)) {
      return;
    }

    const start = positions.get(item.arg.label);
    if (start === undefined) return;
    const next = instructionFrom(items, start);
    if (!next || next.opcode !== "JUMP" || next.arg?.kind !== "label") return;
    if (next.arg.label === item.arg.label) return;

    const destination = positions.get(next.arg.label);
    if (destination === undefined) return;
    if (CONDITIONAL_JUMPS.has(item.opcode) && destination < index) return;

    items[index] = { ...item, arg: { kind: "label", label: next.arg.label } };
    rewrites += 1;
  });

  return rewrites;
};

/** Unconditional jumps over nothing but label marks */
const removeJumpsToNext: Pass = (items) => {
  let rewrites = 0;
  for (let i = items.length - 1; i >= 0; i -= 1) {
    const item = items[i];
    if (!isInstruction(item) || item.opcode !== "JUMP") continue;
    const target = jumpTarget(item);

    let j = i + 1;
    let reaches = false;
    while (j < items.length) {
      const candidate = items[j];
      if (candidate.kind !== "label") break;
      if (candidate.label === target) {
        reaches = true;
        break;
      }
      j += 1;
    }

    if (reaches) {
      items[i] = nop(item.line);
      rewrites += 1;
    }
  }
  return rewrites;
};

/** Instructions after a terminator are unreachable until a jump target */
const removeDeadCode: Pass = (items) => {
  const referenced = referencedLabels(items);
  let rewrites = 0;
  let dead = false;

  for (let i = 0; i < items.length; ) {
    const item = items[i];
    if (item.kind === "label") {
      if (referenced.has(item.label)) dead = false;
      i += 1;
      continue;
    }

    if (dead) {
      items.splice(i, 1);
      rewrites += 1;
      continue;
    }

    if (isTerminator(item.opcode)) dead = true;
    i += 1;
  }

  return rewrites;
};

const removeUnusedLabels: Pass = (items) => {
  const referenced = referencedLabels(items);
  let rewrites = 0;
  for (let i = items.length - 1; i >= 0; i -= 1) {
    const item = items[i];
    if (item.kind === "label" && !referenced.has(item.label)) {
      items.splice(i, 1);
      rewrites += 1;
    }
  }
  return rewrites;
};

/**
 * A NOP survives only while it is the sole instruction left for its line,
 * so the line still maps to something in the listing.
 */
const removeRedundantNops: Pass = (items) => {
  const perLine = new Map<number, number>();
  items.forEach((item) => {
    if (isInstruction(item) && item.line !== undefined) {
      perLine.set(item.line, (perLine.get(item.line) ?? 0) + 1);
    }
  });

  let rewrites = 0;
  for (let i = items.length - 1; i >= 0; i -= 1) {
    const item = items[i];
    if (!isInstruction(item) || item.opcode !== "NOP") continue;
    if (item.line !== undefined) {
      const count = perLine.get(item.line) ?? 0;
      if (count <= 1) continue;
      perLine.set(item.line, count - 1);
    }
    items.splice(i, 1);
    rewrites += 1;
  }
  return rewrites;
};

const PASSES: readonly Pass[] = [
  foldConstantJumps,
  simplifyPackUnpack,
  threadJumps,
  removeJumpsToNext,
  removeDeadCode,
  removeUnusedLabels,
  removeRedundantNops,
];

/** Runs every peephole pass until a round changes nothing */
export const optimizePseudoBytecode = (program: PseudoProgram): PeepholeResult => {
  const items = [...program.items];
  let rewrites = 0;
  let rounds = 0;

  while (rounds < MAX_ROUNDS) {
    rounds += 1;
    const changed = PASSES.reduce((total, pass) => total + pass(items), 0);
    rewrites += changed;
    if (changed === 0) break;
  }

  return { program: { items }, rewrites, rounds };
};
