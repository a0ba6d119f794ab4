import type { Expr, ExprContext, Module, Stmt } from "./nodes.js";
import { formatConstant } from "./format.js";

export type DumpLine = {
  depth: number;
  text: string;
  /** Source line of the node, absent for the module root and markers */
  line?: number;
};

const withContext = (label: string, ctx: ExprContext) =>
  ctx === "load" ? label : `${label} (${ctx})`;

const describeExpr = (expr: Expr): string => {
  switch (expr.kind) {
    case "Name":
      return withContext(`Name ${expr.id}`, expr.ctx);
    case "Constant":
      return `Constant ${formatConstant(expr.value)}`;
    case "BinOp":
      return `BinOp ${expr.op}`;
    case "UnaryOp":
      return `UnaryOp ${expr.op}`;
    case "BoolOp":
      return `BoolOp ${expr.op}`;
    case "Compare":
      return `Compare ${expr.ops.join(" ")}`;
    case "Call":
      return "Call";
    case "Tuple":
      return withContext("Tuple", expr.ctx);
    case "List":
      return withContext("List", expr.ctx);
    case "Subscript":
      return withContext("Subscript", expr.ctx);
    case "Attribute":
      return withContext(`Attribute .${expr.attr}`, expr.ctx);
  }
};

const exprChildren = (expr: Expr): readonly Expr[] => {
  switch (expr.kind) {
    case "Name":
    case "Constant":
      return [];
    case "BinOp":
      return [expr.left, expr.right];
    case "UnaryOp":
      return [expr.operand];
    case "BoolOp":
      return expr.values;
    case "Compare":
      return [expr.left, ...expr.comparators];
    case "Call":
      return [expr.func, ...expr.args];
    case "Tuple":
    case "List":
      return expr.elts;
    case "Subscript":
      return [expr.value, expr.slice];
    case "Attribute":
      return [expr.value];
  }
};

/**
 * Flattens a module into one line per node, indented by depth. Every node
 * line carries the line its node starts on.
 */
export const dumpModule = (module: Module): DumpLine[] => {
  const lines: DumpLine[] = [];

  const push = (depth: number, label: string, line?: number) => {
    lines.push({ depth, text: `${"  ".repeat(depth)}${label}`, line });
  };

  const visitExpr = (expr: Expr, depth: number) => {
    push(depth, describeExpr(expr), expr.location.line);
    exprChildren(expr).forEach((child) => visitExpr(child, depth + 1));
  };

  const visitBody = (body: readonly Stmt[], depth: number) => {
    body.forEach((stmt) => visitStmt(stmt, depth));
  };

  const visitStmt = (stmt: Stmt, depth: number) => {
    const line = stmt.location.line;
    switch (stmt.kind) {
      case "Expr":
        push(depth, "Expr", line);
        visitExpr(stmt.value, depth + 1);
        return;
      case "Assign":
        push(depth, "Assign", line);
        stmt.targets.forEach((target) => visitExpr(target, depth + 1));
        visitExpr(stmt.value, depth + 1);
        return;
      case "AugAssign":
        push(depth, `AugAssign ${stmt.op}=`, line);
        visitExpr(stmt.target, depth + 1);
        visitExpr(stmt.value, depth + 1);
        return;
      case "Delete":
        push(depth, "Delete", line);
        stmt.targets.forEach((target) => visitExpr(target, depth + 1));
        return;
      case "Pass":
      case "Break":
      case "Continue":
        push(depth, stmt.kind, line);
        return;
      case "If":
        push(depth, "If", line);
        visitExpr(stmt.test, depth + 1);
        visitBody(stmt.body, depth + 1);
        if (stmt.orelse.length > 0) {
          push(depth + 1, "orelse:");
          visitBody(stmt.orelse, depth + 2);
        }
        return;
      case "While":
        push(depth, "While", line);
        visitExpr(stmt.test, depth + 1);
        visitBody(stmt.body, depth + 1);
        return;
      case "For":
        push(depth, "For", line);
        visitExpr(stmt.target, depth + 1);
        visitExpr(stmt.iter, depth + 1);
        visitBody(stmt.body, depth + 1);
        return;
    }
  };

  push(0, "Module");
  visitBody(module.body, 1);
  return lines;
};
