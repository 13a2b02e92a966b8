/**
 * Roadman static checker.
 * Finds misplaced control flow and constant reassignment before a program runs.
 */
import type * as AST from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";

/** Name -> declared with `conste`. */
type Scope = Map<string, boolean>;

interface Context {
  scopes: Scope[];
  inLoop: boolean;
  inFunction: boolean;
  diags: Diagnostic[];
}

export function validate(program: AST.Program): Diagnostic[] {
  const ctx: Context = { scopes: [new Map()], inLoop: false, inFunction: false, diags: [] };
  for (const stmt of program.statements) {
    checkStmt(stmt, ctx);
  }
  return ctx.diags;
}

function isConstant(name: string, scopes: Scope[]): boolean {
  for (let i = scopes.length - 1; i >= 0; i--) {
    const constant = scopes[i]?.get(name);
    if (constant !== undefined) return constant;
  }
  return false;
}

function declare(name: string, constant: boolean, ctx: Context): void {
  ctx.scopes[ctx.scopes.length - 1]?.set(name, constant);
}

function checkStmt(stmt: AST.Stmt, ctx: Context): void {
  switch (stmt.kind) {
    case "ExprStmt":
      checkExpr(stmt.expr, ctx);
      break;
    case "VarDecl":
      if (stmt.initializer) checkExpr(stmt.initializer, ctx);
      declare(stmt.name, stmt.constant, ctx);
      break;
    case "FnDecl":
      declare(stmt.name, false, ctx);
      checkFunction(stmt, ctx);
      break;
    case "Block":
      checkBlock(stmt.statements, ctx, ctx.inLoop);
      break;
    case "IfStmt":
      checkExpr(stmt.condition, ctx);
      checkStmt(stmt.thenBranch, ctx);
      if (stmt.elseBranch) checkStmt(stmt.elseBranch, ctx);
      break;
    case "WhileStmt":
      checkExpr(stmt.condition, ctx);
      checkStmt(stmt.body, { ...ctx, inLoop: true });
      break;
    case "BreakStmt":
      if (!ctx.inLoop) {
        ctx.diags.push(
          makeDiag(
            "E_BREAK_OUTSIDE_LOOP",
            "'stopit' outside of a loop.",
            stmt.span,
            "Use 'stopit' only inside a 'loopz' body."
          )
        );
      }
      break;
    case "ReturnStmt":
      if (!ctx.inFunction) {
        ctx.diags.push(
          makeDiag(
            "E_RETURN_OUTSIDE_FN",
            "'returnz' outside of a function.",
            stmt.span,
            "Use 'returnz' only inside a 'fam' body."
          )
        );
      }
      if (stmt.value) checkExpr(stmt.value, ctx);
      break;
  }
}

function checkBlock(stmts: readonly AST.Stmt[], ctx: Context, inLoop: boolean, scope: Scope = new Map()): void {
  const inner: Context = { ...ctx, scopes: [...ctx.scopes, scope], inLoop };
  for (const stmt of stmts) {
    checkStmt(stmt, inner);
  }
}

function checkFunction(fn: AST.FnDecl, ctx: Context): void {
  const params: Scope = new Map();
  for (const param of fn.params) {
    if (params.has(param)) {
      ctx.diags.push(
        makeDiag(
          "E_DUP_PARAM",
          `Duplicate parameter '${param}' in function '${fn.name}'.`,
          fn.span,
          "Give each parameter a distinct name."
        )
      );
    }
    params.set(param, false);
  }
  // Loops do not reach into a function body.
  checkBlock(fn.body.statements, { ...ctx, inFunction: true }, false, params);
}

function checkExpr(expr: AST.Expr, ctx: Context): void {
  switch (expr.kind) {
    case "NumLiteral":
    case "StrLiteral":
    case "BoolLiteral":
    case "Variable":
      break;
    case "Grouping":
      checkExpr(expr.expr, ctx);
      break;
    case "UnaryExpr":
      checkExpr(expr.operand, ctx);
      break;
    case "BinaryExpr":
      checkExpr(expr.left, ctx);
      checkExpr(expr.right, ctx);
      break;
    case "Assignment":
      checkExpr(expr.value, ctx);
      if (isConstant(expr.name, ctx.scopes)) {
        ctx.diags.push(
          makeDiag(
            "E_CONST_ASSIGN",
            `Cannot assign to constant '${expr.name}'.`,
            expr.span,
            "Declare it with 'gimme' to make it mutable."
          )
        );
      }
      break;
    case "CallExpr":
      checkExpr(expr.callee, ctx);
      expr.args.forEach((arg) => checkExpr(arg, ctx));
      break;
    case "ListExpr":
      expr.elements.forEach((el) => checkExpr(el, ctx));
      break;
  }
}
