/**
 * Roadman to JavaScript transpiler.
 * Renders an AST as JavaScript source without executing or checking it.
 */
import type * as AST from "./ast.js";

export interface TranspileOptions {
  /** Spaces per block level. */
  indent?: number;
}

const PRECEDENCE: Record<AST.BinaryOp, number> = {
  "||": 1,
  "&&": 2,
  "==": 3, "!=": 3,
  ">": 4, "<": 4, ">=": 4, "<=": 4,
  "+": 5, "-": 5,
  "*": 6, "/": 6, "%": 6,
};

// Native callables renamed to their JavaScript counterparts.
const CALL_RENAMES: ReadonlyMap<string, string> = new Map([["say", "console.log"]]);

function needsParens(child: AST.Expr, parentOp: AST.BinaryOp, isRight: boolean): boolean {
  if (child.kind === "Assignment") return true;
  if (child.kind !== "BinaryExpr") return false;
  const childPrec = PRECEDENCE[child.op];
  const parentPrec = PRECEDENCE[parentOp];
  if (childPrec < parentPrec) return true;
  // Same precedence on the right keeps left-associativity (a - (b - c)).
  return childPrec === parentPrec && isRight;
}

class Transpiler {
  private readonly unit: string;

  constructor(indent: number) {
    this.unit = " ".repeat(indent);
  }

  program(program: AST.Program): string {
    return program.statements.map((s) => this.stmt(s, 0)).join("\n");
  }

  /** Renders a statement; the caller supplies the indentation of its first line. */
  private stmt(s: AST.Stmt, depth: number): string {
    switch (s.kind) {
      case "ExprStmt":
        return `${this.expr(s.expr)};`;
      case "VarDecl": {
        const keyword = s.constant ? "const" : "let";
        if (s.initializer) return `${keyword} ${s.name} = ${this.expr(s.initializer)};`;
        // const requires an initializer in JavaScript.
        return s.constant ? `const ${s.name} = undefined;` : `let ${s.name};`;
      }
      case "FnDecl":
        return `function ${s.name}(${s.params.join(", ")}) ${this.block(s.body.statements, depth)}`;
      case "Block":
        return this.block(s.statements, depth);
      case "IfStmt": {
        const head = `if (${this.expr(s.condition)}) ${this.stmt(s.thenBranch, depth)}`;
        return s.elseBranch ? `${head} else ${this.stmt(s.elseBranch, depth)}` : head;
      }
      case "WhileStmt":
        return `while (${this.expr(s.condition)}) ${this.stmt(s.body, depth)}`;
      case "BreakStmt":
        return "break;";
      case "ReturnStmt":
        return s.value ? `return ${this.expr(s.value)};` : "return;";
    }
  }

  private block(stmts: readonly AST.Stmt[], depth: number): string {
    if (stmts.length === 0) return "{}";
    const inner = this.unit.repeat(depth + 1);
    const lines = stmts.map((s) => `${inner}${this.stmt(s, depth + 1)}`);
    return `{\n${lines.join("\n")}\n${this.unit.repeat(depth)}}`;
  }

  private expr(e: AST.Expr): string {
    switch (e.kind) {
      case "NumLiteral":
        return String(e.value);
      case "StrLiteral":
        return JSON.stringify(e.value);
      case "BoolLiteral":
        return String(e.value);
      case "Variable":
        return e.name;
      case "Grouping":
        return `(${this.expr(e.expr)})`;
      case "ListExpr":
        return `[${e.elements.map((el) => this.expr(el)).join(", ")}]`;
      case "Assignment":
        return `${e.name} = ${this.expr(e.value)}`;
      case "CallExpr": {
        const args = e.args.map((a) => this.expr(a)).join(", ");
        return `${this.callee(e.callee)}(${args})`;
      }
      case "BinaryExpr": {
        let leftStr = this.expr(e.left);
        let rightStr = this.expr(e.right);
        if (needsParens(e.left, e.op, false)) leftStr = `(${leftStr})`;
        if (needsParens(e.right, e.op, true)) rightStr = `(${rightStr})`;
        return `${leftStr} ${e.op} ${rightStr}`;
      }
      case "UnaryExpr": {
        const operandStr = this.expr(e.operand);
        // Parenthesize if operand is binary or unary to avoid ambiguity
        if (e.operand.kind === "BinaryExpr" || e.operand.kind === "UnaryExpr" || e.operand.kind === "Assignment") {
          return `${e.op}(${operandStr})`;
        }
        return `${e.op}${operandStr}`;
      }
    }
  }

  private callee(e: AST.Expr): string {
    if (e.kind === "Variable") return CALL_RENAMES.get(e.name) ?? e.name;
    if (e.kind === "BinaryExpr" || e.kind === "UnaryExpr" || e.kind === "Assignment") {
      return `(${this.expr(e)})`;
    }
    return this.expr(e);
  }
}

export function transpile(program: AST.Program, options: TranspileOptions = {}): string {
  return new Transpiler(options.indent ?? 2).program(program);
}
