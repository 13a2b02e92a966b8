/**
 * Roadman AST node definitions.
 *
 * Nodes are read-only once the parser has built them; both the interpreter
 * and the transpiler switch over the `kind` tag.
 */

export interface Span {
  file: string;
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
}

// Base node with span
export interface BaseNode {
  readonly kind: string;
  readonly span: Span;
}

// --- Literals ---
export interface NumLiteral extends BaseNode {
  readonly kind: "NumLiteral";
  readonly value: number;
}

export interface StrLiteral extends BaseNode {
  readonly kind: "StrLiteral";
  readonly value: string;
}

export interface BoolLiteral extends BaseNode {
  readonly kind: "BoolLiteral";
  readonly value: boolean;
}

export type Literal = NumLiteral | StrLiteral | BoolLiteral;

// --- Operators ---
export type UnaryOp = "-" | "!";

export type BinaryOp =
  | "+" | "-" | "*" | "/" | "%"
  | "==" | "!=" | "<" | "<=" | ">" | ">="
  | "&&" | "||";

export const BINARY_OPS: readonly BinaryOp[] = [
  "+", "-", "*", "/", "%", "==", "!=", "<", "<=", ">", ">=", "&&", "||",
];

export function isBinaryOp(op: string): op is BinaryOp {
  return BINARY_OPS.some((o) => o === op);
}

export function isUnaryOp(op: string): op is UnaryOp {
  return op === "-" || op === "!";
}

// --- Expressions ---
export interface Variable extends BaseNode {
  readonly kind: "Variable";
  readonly name: string;
}

export interface UnaryExpr extends BaseNode {
  readonly kind: "UnaryExpr";
  readonly op: UnaryOp;
  readonly operand: Expr;
}

export interface BinaryExpr extends BaseNode {
  readonly kind: "BinaryExpr";
  readonly op: BinaryOp;
  readonly left: Expr;
  readonly right: Expr;
}

export interface Grouping extends BaseNode {
  readonly kind: "Grouping";
  readonly expr: Expr;
}

export interface Assignment extends BaseNode {
  readonly kind: "Assignment";
  readonly name: string;
  readonly value: Expr;
}

export interface CallExpr extends BaseNode {
  readonly kind: "CallExpr";
  readonly callee: Expr;
  readonly args: readonly Expr[];
}

export interface ListExpr extends BaseNode {
  readonly kind: "ListExpr";
  readonly elements: readonly Expr[];
}

export type Expr =
  | Literal
  | Variable
  | UnaryExpr
  | BinaryExpr
  | Grouping
  | Assignment
  | CallExpr
  | ListExpr;

// --- Statements ---
export interface ExprStmt extends BaseNode {
  readonly kind: "ExprStmt";
  readonly expr: Expr;
}

export interface Block extends BaseNode {
  readonly kind: "Block";
  readonly statements: readonly Stmt[];
}

/** `conste` (constant) or `gimme` (mutable) declaration. */
export interface VarDecl extends BaseNode {
  readonly kind: "VarDecl";
  readonly name: string;
  readonly initializer?: Expr;
  readonly constant: boolean;
}

export interface IfStmt extends BaseNode {
  readonly kind: "IfStmt";
  readonly condition: Expr;
  readonly thenBranch: Stmt;
  readonly elseBranch?: Stmt;
}

export interface WhileStmt extends BaseNode {
  readonly kind: "WhileStmt";
  readonly condition: Expr;
  readonly body: Stmt;
}

export interface BreakStmt extends BaseNode {
  readonly kind: "BreakStmt";
}

export interface FnDecl extends BaseNode {
  readonly kind: "FnDecl";
  readonly name: string;
  readonly params: readonly string[];
  readonly body: Block;
}

export interface ReturnStmt extends BaseNode {
  readonly kind: "ReturnStmt";
  readonly value?: Expr;
}

export type Stmt =
  | ExprStmt
  | Block
  | VarDecl
  | IfStmt
  | WhileStmt
  | BreakStmt
  | FnDecl
  | ReturnStmt;

// --- Program ---
export interface Program extends BaseNode {
  readonly kind: "Program";
  readonly statements: readonly Stmt[];
}

export type Node = Program | Stmt | Expr;
