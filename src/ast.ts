import { Value } from "./value";

export type ArithmeticOperator = "+" | "-" | "*" | "/" | "%";
export type LogicalOperator = "&&" | "||";
export type EqualityOperator = "==" | "!=";
export type RelationalOperator = "<" | ">" | "<=" | ">=";
export type BinaryOperator =
  | ArithmeticOperator
  | LogicalOperator
  | EqualityOperator
  | RelationalOperator;
export type UnaryOperator = "-" | "!";

export type Program = { tag: "program"; body: Stmt[]; line: number };

export type Block = { tag: "block"; body: Stmt[]; line: number };

export type AssignStmt = {
  tag: "assign";
  target: string;
  expr: Expr;
  line: number;
};
export type ExprStmt = { tag: "expr"; expr: Expr; line: number };

// the statements allowed in the header of a `for` loop
export type SimpleStmt = AssignStmt | ExprStmt;

export type FuncStmt = {
  tag: "func";
  name: string;
  parameters: string[];
  body: Block;
  line: number;
};

export type Stmt =
  | SimpleStmt
  | {
      tag: "if";
      condition: Expr;
      thenBlock: Block;
      elseBlock: Block | null;
      line: number;
    }
  | { tag: "while"; condition: Expr; body: Block; line: number }
  | {
      tag: "for";
      init: SimpleStmt | null;
      condition: Expr | null;
      update: SimpleStmt | null;
      body: Block;
      line: number;
    }
  | FuncStmt
  | { tag: "return"; expr: Expr | null; line: number }
  | { tag: "break"; line: number }
  | { tag: "continue"; line: number }
  | Block;

export type BinaryOpExpr = {
  tag: "binaryOp";
  operator: BinaryOperator;
  left: Expr;
  right: Expr;
  line: number;
};

export type Expr =
  | { tag: "literal"; value: Value; line: number }
  | { tag: "identifier"; name: string; line: number }
  | BinaryOpExpr
  | { tag: "unaryOp"; operator: UnaryOperator; operand: Expr; line: number }
  | { tag: "call"; callee: string; args: Expr[]; line: number };

export type Node = Program | Stmt | Expr;
