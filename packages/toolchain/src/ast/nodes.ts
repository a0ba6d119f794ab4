import type { SourceLocation } from "../syntax/location.js";

/** Integer literals beyond the safe integer range are kept as `bigint` */
export type ConstantValue =
  | number
  | bigint
  | string
  | boolean
  | null
  | readonly ConstantValue[];

export type ExprContext = "load" | "store" | "del";

export type BinaryOperator = "+" | "-" | "*" | "/" | "//" | "%" | "**";
export type UnaryOperator = "-" | "+" | "not";
export type BoolOperator = "and" | "or";
export type ComparisonOperator = "==" | "!=" | "<" | ">" | "<=" | ">=";

type NodeBase = { location: SourceLocation };

export type Name = NodeBase & { kind: "Name"; id: string; ctx: ExprContext };
export type Constant = NodeBase & { kind: "Constant"; value: ConstantValue };
export type BinOp = NodeBase & {
  kind: "BinOp";
  left: Expr;
  op: BinaryOperator;
  right: Expr;
};
export type UnaryOp = NodeBase & {
  kind: "UnaryOp";
  op: UnaryOperator;
  operand: Expr;
};
export type BoolOp = NodeBase & {
  kind: "BoolOp";
  op: BoolOperator;
  values: readonly Expr[];
};
export type Compare = NodeBase & {
  kind: "Compare";
  left: Expr;
  ops: readonly ComparisonOperator[];
  comparators: readonly Expr[];
};
export type Call = NodeBase & {
  kind: "Call";
  func: Expr;
  args: readonly Expr[];
};
export type Tuple = NodeBase & {
  kind: "Tuple";
  elts: readonly Expr[];
  ctx: ExprContext;
};
export type List = NodeBase & {
  kind: "List";
  elts: readonly Expr[];
  ctx: ExprContext;
};
export type Subscript = NodeBase & {
  kind: "Subscript";
  value: Expr;
  slice: Expr;
  ctx: ExprContext;
};
export type Attribute = NodeBase & {
  kind: "Attribute";
  value: Expr;
  attr: string;
  ctx: ExprContext;
};

export type Expr =
  | Name
  | Constant
  | BinOp
  | UnaryOp
  | BoolOp
  | Compare
  | Call
  | Tuple
  | List
  | Subscript
  | Attribute;

export type ExprStmt = NodeBase & { kind: "Expr"; value: Expr };
export type Assign = NodeBase & {
  kind: "Assign";
  targets: readonly Expr[];
  value: Expr;
};
export type AugAssign = NodeBase & {
  kind: "AugAssign";
  target: Name | Subscript | Attribute;
  op: BinaryOperator;
  value: Expr;
};
export type Delete = NodeBase & { kind: "Delete"; targets: readonly Expr[] };
export type Pass = NodeBase & { kind: "Pass" };
export type Break = NodeBase & { kind: "Break" };
export type Continue = NodeBase & { kind: "Continue" };
export type If = NodeBase & {
  kind: "If";
  test: Expr;
  body: readonly Stmt[];
  orelse: readonly Stmt[];
};
export type While = NodeBase & {
  kind: "While";
  test: Expr;
  body: readonly Stmt[];
};
export type For = NodeBase & {
  kind: "For";
  target: Expr;
  iter: Expr;
  body: readonly Stmt[];
};

export type Stmt =
  | ExprStmt
  | Assign
  | AugAssign
  | Delete
  | Pass
  | Break
  | Continue
  | If
  | While
  | For;

export type Module = NodeBase & { kind: "Module"; body: readonly Stmt[] };

export type Node = Module | Stmt | Expr;
