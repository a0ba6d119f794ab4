import type { Expr, Module, Node, Stmt } from "../ast/nodes.js";
import { isTruthy } from "../ast/format.js";
import {
  DiagnosticEmitter,
  type Diagnostic,
} from "../diagnostics/index.js";
import type { Opcode } from "./opcodes.js";
import {
  instruction,
  type PseudoArgument,
  type PseudoItem,
  type PseudoProgram,
} from "./instructions.js";

type LoopContext = {
  kind: "for" | "while";
  continueLabel: number;
  breakLabel: number;
};

export type CodegenResult = {
  program: PseudoProgram;
  diagnostics: readonly Diagnostic[];
};

const isDocstring = (stmt: Stmt | undefined): boolean =>
  stmt?.kind === "Expr" &&
  stmt.value.kind === "Constant" &&
  typeof stmt.value.value === "string";

/**
 * Lowers a module into pseudo bytecode: stack machine instructions whose
 * jumps still refer to symbolic labels. Every instruction records the line
 * of the node it was generated for; the implicit return at the end of the
 * module has none.
 */
export class CodeGenerator {
  private readonly items: PseudoItem[] = [];
  private readonly loops: LoopContext[] = [];
  private readonly emitter: DiagnosticEmitter;
  private nextLabel = 1;

  constructor(emitter: DiagnosticEmitter = new DiagnosticEmitter()) {
    this.emitter = emitter;
  }

  generate(module: Module): CodegenResult {
    const [first, ...rest] = module.body;

    if (first && isDocstring(first) && first.kind === "Expr") {
      this.visitExpr(first.value);
      this.emit("STORE_NAME", { kind: "name", name: "__doc__" }, first);
      rest.forEach((stmt) => this.visitStmt(stmt));
    } else {
      module.body.forEach((stmt) => this.visitStmt(stmt));
    }

    this.items.push(instruction("LOAD_CONST", { kind: "const", value: null }));
    this.items.push(instruction("RETURN_VALUE"));

    return {
      program: { items: this.items },
      diagnostics: this.emitter.diagnostics,
    };
  }

  private visitStmt(stmt: Stmt): void {
    switch (stmt.kind) {
      case "Expr":
        if (stmt.value.kind === "Constant") {
          this.emitter.report({
            code: "CG0002",
            params: {},
            span: stmt.location.toSpan(),
          });
          this.emit("NOP", undefined, stmt);
          return;
        }
        this.visitExpr(stmt.value);
        this.emit("POP_TOP", undefined, stmt);
        return;

      case "Assign":
        this.visitExpr(stmt.value);
        stmt.targets.forEach((target, index) => {
          if (index < stmt.targets.length - 1) {
            this.emit("COPY", { kind: "count", value: 1 }, stmt);
          }
          this.store(target);
        });
        return;

      case "AugAssign":
        this.visitAugAssign(stmt);
        return;

      case "Delete":
        stmt.targets.forEach((target) => this.delete(target));
        return;

      case "Pass":
        this.emit("NOP", undefined, stmt);
        return;

      case "Break": {
        const loop = this.currentLoop(stmt, "break");
        if (loop.kind === "for") {
          this.emit("POP_TOP", undefined, stmt);
        }
        this.emit("JUMP", this.label(loop.breakLabel), stmt);
        return;
      }

      case "Continue": {
        const loop = this.currentLoop(stmt, "continue");
        this.emit("JUMP", this.label(loop.continueLabel), stmt);
        return;
      }

      case "If": {
        const elseLabel = this.newLabel();
        this.jumpIf(stmt.test, false, elseLabel);
        stmt.body.forEach((child) => this.visitStmt(child));

        if (stmt.orelse.length === 0) {
          this.mark(elseLabel);
          return;
        }

        const endLabel = this.newLabel();
        this.emit("JUMP", this.label(endLabel), stmt);
        this.mark(elseLabel);
        stmt.orelse.forEach((child) => this.visitStmt(child));
        this.mark(endLabel);
        return;
      }

      case "While": {
        const start = this.newLabel();
        const exit = this.newLabel();
        this.mark(start);
        this.jumpIf(stmt.test, false, exit);
        this.withLoop({ kind: "while", continueLabel: start, breakLabel: exit }, () =>
          stmt.body.forEach((child) => this.visitStmt(child))
        );
        this.emit("JUMP", this.label(start), stmt);
        this.mark(exit);
        return;
      }

      case "For": {
        const start = this.newLabel();
        const cleanup = this.newLabel();
        const exit = this.newLabel();
        this.visitExpr(stmt.iter);
        this.emit("GET_ITER", undefined, stmt);
        this.mark(start);
        this.emit("FOR_ITER", this.label(cleanup), stmt);
        this.store(stmt.target);
        this.withLoop({ kind: "for", continueLabel: start, breakLabel: exit }, () =>
          stmt.body.forEach((child) => this.visitStmt(child))
        );
        this.emit("JUMP", this.label(start), stmt);
        this.mark(cleanup);
        this.emit("END_FOR", undefined, stmt);
        this.mark(exit);
        return;
      }
    }
  }

  private visitAugAssign(stmt: Extract<Stmt, { kind: "AugAssign" }>): void {
    const operator: PseudoArgument = { kind: "operator", op: stmt.op, inplace: true };
    const target = stmt.target;

    switch (target.kind) {
      case "Name":
        this.emit("LOAD_NAME", { kind: "name", name: target.id }, target);
        this.visitExpr(stmt.value);
        this.emit("BINARY_OP", operator, stmt);
        this.emit("STORE_NAME", { kind: "name", name: target.id }, target);
        return;
      case "Attribute":
        this.visitExpr(target.value);
        this.emit("COPY", { kind: "count", value: 1 }, target);
        this.emit("LOAD_ATTR", { kind: "name", name: target.attr }, target);
        this.visitExpr(stmt.value);
        this.emit("BINARY_OP", operator, stmt);
        this.emit("SWAP", { kind: "count", value: 2 }, stmt);
        this.emit("STORE_ATTR", { kind: "name", name: target.attr }, target);
        return;
      case "Subscript":
        this.visitExpr(target.value);
        this.visitExpr(target.slice);
        this.emit("COPY", { kind: "count", value: 2 }, target);
        this.emit("COPY", { kind: "count", value: 2 }, target);
        this.emit("BINARY_SUBSCR", undefined, target);
        this.visitExpr(stmt.value);
        this.emit("BINARY_OP", operator, stmt);
        this.emit("SWAP", { kind: "count", value: 3 }, stmt);
        this.emit("SWAP", { kind: "count", value: 2 }, stmt);
        this.emit("STORE_SUBSCR", undefined, target);
        return;
    }
  }

  private visitExpr(expr: Expr): void {
    switch (expr.kind) {
      case "Name":
        this.emit("LOAD_NAME", { kind: "name", name: expr.id }, expr);
        return;

      case "Constant":
        this.emit("LOAD_CONST", { kind: "const", value: expr.value }, expr);
        return;

      case "BinOp":
        this.visitExpr(expr.left);
        this.visitExpr(expr.right);
        this.emit("BINARY_OP", { kind: "operator", op: expr.op }, expr);
        return;

      case "UnaryOp": {
        this.visitExpr(expr.operand);
        const opcode: Opcode =
          expr.op === "not"
            ? "UNARY_NOT"
            : expr.op === "-"
              ? "UNARY_NEGATIVE"
              : "UNARY_POSITIVE";
        this.emit(opcode, undefined, expr);
        return;
      }

      case "BoolOp": {
        const end = this.newLabel();
        const jump: Opcode =
          expr.op === "and" ? "POP_JUMP_IF_FALSE" : "POP_JUMP_IF_TRUE";
        expr.values.forEach((value, index) => {
          this.visitExpr(value);
          if (index === expr.values.length - 1) return;
          this.emit("COPY", { kind: "count", value: 1 }, expr);
          this.emit(jump, this.label(end), expr);
          this.emit("POP_TOP", undefined, expr);
        });
        this.mark(end);
        return;
      }

      case "Compare":
        this.visitCompare(expr);
        return;

      case "Call":
        this.visitExpr(expr.func);
        expr.args.forEach((arg) => this.visitExpr(arg));
        this.emit("CALL", { kind: "count", value: expr.args.length }, expr);
        return;

      case "Tuple":
      case "List":
        expr.elts.forEach((elt) => this.visitExpr(elt));
        this.emit(
          expr.kind === "Tuple" ? "BUILD_TUPLE" : "BUILD_LIST",
          { kind: "count", value: expr.elts.length },
          expr
        );
        return;

      case "Subscript":
        this.visitExpr(expr.value);
        this.visitExpr(expr.slice);
        this.emit("BINARY_SUBSCR", undefined, expr);
        return;

      case "Attribute":
        this.visitExpr(expr.value);
        this.emit("LOAD_ATTR", { kind: "name", name: expr.attr }, expr);
        return;
    }
  }

  private visitCompare(expr: Extract<Expr, { kind: "Compare" }>): void {
    this.visitExpr(expr.left);

    if (expr.ops.length === 1) {
      this.visitExpr(expr.comparators[0]);
      this.emit("COMPARE_OP", { kind: "operator", op: expr.ops[0] }, expr);
      return;
    }

    const cleanup = this.newLabel();
    const end = this.newLabel();
    const last = expr.ops.length - 1;

    expr.ops.forEach((op, index) => {
      this.visitExpr(expr.comparators[index]);
      if (index === last) {
        this.emit("COMPARE_OP", { kind: "operator", op }, expr);
        return;
      }
      this.emit("SWAP", { kind: "count", value: 2 }, expr);
      this.emit("COPY", { kind: "count", value: 2 }, expr);
      this.emit("COMPARE_OP", { kind: "operator", op }, expr);
      this.emit("COPY", { kind: "count", value: 1 }, expr);
      this.emit("POP_JUMP_IF_FALSE", this.label(cleanup), expr);
      this.emit("POP_TOP", undefined, expr);
    });

    this.emit("JUMP", this.label(end), expr);
    this.mark(cleanup);
    this.emit("SWAP", { kind: "count", value: 2 }, expr);
    this.emit("POP_TOP", undefined, expr);
    this.mark(end);
  }

  /** Emits a jump to `target` taken when `test` evaluates to `when` */
  private jumpIf(test: Expr, when: boolean, target: number): void {
    if (test.kind === "Constant") {
      if (isTruthy(test.value) === when) {
        this.emit("JUMP", this.label(target), test);
      } else {
        this.emit("NOP", undefined, test);
      }
      return;
    }

    if (test.kind === "UnaryOp" && test.op === "not") {
      this.jumpIf(test.operand, !when, target);
      return;
    }

    if (test.kind === "BoolOp") {
      const anyJumps = (test.op === "or") === when;
      if (anyJumps) {
        test.values.forEach((value) => this.jumpIf(value, when, target));
        return;
      }

      const next = this.newLabel();
      test.values.forEach((value, index) => {
        if (index === test.values.length - 1) {
          this.jumpIf(value, when, target);
        } else {
          this.jumpIf(value, !when, next);
        }
      });
      this.mark(next);
      return;
    }

    this.visitExpr(test);
    this.emit(
      when ? "POP_JUMP_IF_TRUE" : "POP_JUMP_IF_FALSE",
      this.label(target),
      test
    );
  }

  private store(target: Expr): void {
    switch (target.kind) {
      case "Name":
        this.emit("STORE_NAME", { kind: "name", name: target.id }, target);
        return;
      case "Tuple":
      case "List":
        this.emit(
          "UNPACK_SEQUENCE",
          { kind: "count", value: target.elts.length },
          target
        );
        target.elts.forEach((elt) => this.store(elt));
        return;
      case "Subscript":
        this.visitExpr(target.value);
        this.visitExpr(target.slice);
        this.emit("STORE_SUBSCR", undefined, target);
        return;
      case "Attribute":
        this.visitExpr(target.value);
        this.emit("STORE_ATTR", { kind: "name", name: target.attr }, target);
        return;
      default:
        throw new Error(`cannot store to ${target.kind}`);
    }
  }

  private delete(target: Expr): void {
    switch (target.kind) {
      case "Name":
        this.emit("DELETE_NAME", { kind: "name", name: target.id }, target);
        return;
      case "Tuple":
      case "List":
        target.elts.forEach((elt) => this.delete(elt));
        return;
      case "Subscript":
        this.visitExpr(target.value);
        this.visitExpr(target.slice);
        this.emit("DELETE_SUBSCR", undefined, target);
        return;
      case "Attribute":
        this.visitExpr(target.value);
        this.emit("DELETE_ATTR", { kind: "name", name: target.attr }, target);
        return;
      default:
        throw new Error(`cannot delete ${target.kind}`);
    }
  }

  private currentLoop(stmt: Stmt, statement: "break" | "continue"): LoopContext {
    const loop = this.loops[this.loops.length - 1];
    if (!loop) {
      return this.emitter.error({
        code: "CG0001",
        params: { statement },
        span: stmt.location.toSpan(),
      });
    }
    return loop;
  }

  private withLoop(loop: LoopContext, body: () => void) {
    this.loops.push(loop);
    try {
      body();
    } finally {
      this.loops.pop();
    }
  }

  private newLabel(): number {
    const label = this.nextLabel;
    this.nextLabel += 1;
    return label;
  }

  private label(label: number): PseudoArgument {
    return { kind: "label", label };
  }

  private mark(label: number) {
    this.items.push({ kind: "label", label });
  }

  private emit(opcode: Opcode, arg: PseudoArgument | undefined, node: Node) {
    this.items.push(instruction(opcode, arg, node.location.line));
  }
}

export const generatePseudoBytecode = (module: Module): CodegenResult =>
  new CodeGenerator().generate(module);
