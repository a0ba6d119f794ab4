import type {
  BinaryOperator,
  Constant,
  ConstantValue,
  Expr,
  Module,
  Stmt,
} from "../ast/nodes.js";
import { isTruthy } from "../ast/format.js";
import { DiagnosticEmitter, type Diagnostic } from "../diagnostics/index.js";

/** Folded strings and sequences longer than this stay unfolded */
export const MAX_FOLDED_LENGTH = 4096;

export type AstOptimizationResult = {
  module: Module;
  folds: number;
  diagnostics: readonly Diagnostic[];
};

const isTuple = (value: ConstantValue): value is readonly ConstantValue[] =>
  typeof value === "object" && value !== null;

const flooredModulo = (a: number, b: number) => {
  const remainder = a % b;
  return remainder !== 0 && Math.sign(remainder) !== Math.sign(b)
    ? remainder + b
    : remainder;
};

const foldNumbers = (
  left: number,
  op: BinaryOperator,
  right: number
): number | undefined => {
  switch (op) {
    case "+":
      return left + right;
    case "-":
      return left - right;
    case "*":
      return left * right;
    case "/":
      return right === 0 ? undefined : left / right;
    case "//":
      return right === 0 ? undefined : Math.floor(left / right);
    case "%":
      return right === 0 ? undefined : flooredModulo(left, right);
    case "**": {
      const result = left ** right;
      return Number.isFinite(result) ? result : undefined;
    }
  }
};

const repeat = (
  sequence: string | readonly ConstantValue[],
  times: number
): ConstantValue | undefined => {
  if (!Number.isInteger(times)) return undefined;
  const count = Math.max(times, 0);
  if (sequence.length * count > MAX_FOLDED_LENGTH) return undefined;
  if (typeof sequence === "string") return sequence.repeat(count);
  const repeated: ConstantValue[] = [];
  for (let i = 0; i < count; i += 1) {
    repeated.push(...sequence);
  }
  return repeated;
};

const foldBinary = (
  left: ConstantValue,
  op: BinaryOperator,
  right: ConstantValue
): ConstantValue | undefined => {
  if (typeof left === "number" && typeof right === "number") {
    const result = foldNumbers(left, op, right);
    // Integers past 2^53 would lose digits
    const unsafe =
      result !== undefined && Number.isInteger(result) && !Number.isSafeInteger(result);
    if (op !== "/" && unsafe) return undefined;
    return result;
  }

  if (op === "+") {
    if (typeof left === "string" && typeof right === "string") {
      const joined = left + right;
      return joined.length > MAX_FOLDED_LENGTH ? undefined : joined;
    }
    if (isTuple(left) && isTuple(right)) {
      const joined = [...left, ...right];
      return joined.length > MAX_FOLDED_LENGTH ? undefined : joined;
    }
    return undefined;
  }

  if (op === "*") {
    if (typeof right === "number" && (typeof left === "string" || isTuple(left))) {
      return repeat(left, right);
    }
    if (typeof left === "number" && (typeof right === "string" || isTuple(right))) {
      return repeat(right, left);
    }
  }

  return undefined;
};

/**
 * AST level optimizer. Folds constant unary and binary operations and
 * constant tuples, and replaces `if` statements whose test is a constant
 * with the branch that runs. Returns a new tree; the input is untouched.
 */
export class ConstantFolder {
  private folds = 0;
  private readonly emitter: DiagnosticEmitter;

  constructor(emitter: DiagnosticEmitter = new DiagnosticEmitter()) {
    this.emitter = emitter;
  }

  run(module: Module): AstOptimizationResult {
    const body = this.foldBody(module.body);
    return {
      module: { ...module, body },
      folds: this.folds,
      diagnostics: this.emitter.diagnostics,
    };
  }

  private foldBody(body: readonly Stmt[]): Stmt[] {
    return body.flatMap((stmt) => this.foldStmt(stmt));
  }

  private foldStmt(stmt: Stmt): Stmt[] {
    switch (stmt.kind) {
      case "Expr":
        return [{ ...stmt, value: this.foldExpr(stmt.value) }];
      case "Assign":
        return [
          {
            ...stmt,
            targets: stmt.targets.map((target) => this.foldExpr(target)),
            value: this.foldExpr(stmt.value),
          },
        ];
      case "AugAssign":
        return [{ ...stmt, value: this.foldExpr(stmt.value) }];
      case "Delete":
      case "Pass":
      case "Break":
      case "Continue":
        return [stmt];
      case "If": {
        const test = this.foldExpr(stmt.test);
        if (test.kind === "Constant") {
          const truthy = isTruthy(test.value);
          this.emitter.report({
            code: "OP0001",
            params: { value: truthy },
            span: test.location.toSpan(),
          });
          this.folds += 1;
          return this.foldBody(truthy ? stmt.body : stmt.orelse);
        }
        return [
          {
            ...stmt,
            test,
            body: this.foldBody(stmt.body),
            orelse: this.foldBody(stmt.orelse),
          },
        ];
      }
      case "While":
        return [
          { ...stmt, test: this.foldExpr(stmt.test), body: this.foldBody(stmt.body) },
        ];
      case "For":
        return [
          {
            ...stmt,
            target: this.foldExpr(stmt.target),
            iter: this.foldExpr(stmt.iter),
            body: this.foldBody(stmt.body),
          },
        ];
    }
  }

  private foldExpr(expr: Expr): Expr {
    switch (expr.kind) {
      case "Name":
      case "Constant":
        return expr;
      case "BinOp": {
        const left = this.foldExpr(expr.left);
        const right = this.foldExpr(expr.right);
        if (left.kind === "Constant" && right.kind === "Constant") {
          const value = foldBinary(left.value, expr.op, right.value);
          if (value !== undefined) return this.constant(expr, value);
        }
        return { ...expr, left, right };
      }
      case "UnaryOp": {
        const operand = this.foldExpr(expr.operand);
        if (operand.kind === "Constant") {
          if (expr.op === "not") {
            return this.constant(expr, !isTruthy(operand.value));
          }
          if (typeof operand.value === "number") {
            const value = expr.op === "-" ? -operand.value : operand.value;
            return this.constant(expr, value);
          }
          if (typeof operand.value === "bigint") {
            const value = expr.op === "-" ? -operand.value : operand.value;
            return this.constant(expr, value);
          }
        }
        return { ...expr, operand };
      }
      case "BoolOp":
        return { ...expr, values: expr.values.map((value) => this.foldExpr(value)) };
      case "Compare":
        return {
          ...expr,
          left: this.foldExpr(expr.left),
          comparators: expr.comparators.map((value) => this.foldExpr(value)),
        };
      case "Call":
        return {
          ...expr,
          func: this.foldExpr(expr.func),
          args: expr.args.map((arg) => this.foldExpr(arg)),
        };
      case "Tuple": {
        const elts = expr.elts.map((elt) => this.foldExpr(elt));
        if (expr.ctx === "load" && elts.every(isConstant)) {
          return this.constant(
            expr,
            elts.map((elt) => elt.value)
          );
        }
        return { ...expr, elts };
      }
      case "List":
        return { ...expr, elts: expr.elts.map((elt) => this.foldExpr(elt)) };
      case "Subscript":
        return {
          ...expr,
          value: this.foldExpr(expr.value),
          slice: this.foldExpr(expr.slice),
        };
      case "Attribute":
        return { ...expr, value: this.foldExpr(expr.value) };
    }
  }

  private constant(source: Expr, value: ConstantValue): Constant {
    this.folds += 1;
    return { kind: "Constant", value, location: source.location };
  }
}

const isConstant = (expr: Expr): expr is Constant => expr.kind === "Constant";

export const optimizeModule = (module: Module): AstOptimizationResult =>
  new ConstantFolder().run(module);
