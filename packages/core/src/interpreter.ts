/**
 * Roadman tree-walking interpreter.
 *
 * Statements yield a completion (normal, return or break) instead of using
 * exceptions for control flow. Runtime errors are `RoadmanRuntimeError`s,
 * caught once in `interpret` and reported as diagnostics.
 */
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import type { Diagnostic, DiagnosticCode } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";
import { Environment } from "./environment.js";
import { BUILTIN_NATIVES } from "./natives.js";
import type { NativeFn, NativeHost, RoadmanValue, UserFn } from "./values.js";
import { arityOf, isCallable, isTruthy, typeName, valuesEqual } from "./values.js";

// --- Errors ---
export type RuntimeErrorCode = Extract<
  DiagnosticCode,
  "E_UNDEFINED" | "E_CONST_ASSIGN" | "E_TYPE" | "E_DIV_ZERO" | "E_NOT_CALLABLE" | "E_ARITY" | "E_STACK" | "E_CONTROL"
>;

export class RoadmanRuntimeError extends Error {
  code: RuntimeErrorCode;
  span?: Span;
  hint?: string;

  constructor(code: RuntimeErrorCode, message: string, span?: Span, hint?: string) {
    super(message);
    this.name = "RoadmanRuntimeError";
    this.code = code;
    this.span = span;
    this.hint = hint;
  }

  toDiagnostic(): Diagnostic {
    return makeDiag(this.code, this.message, this.span, this.hint);
  }
}

// --- Trace events ---
export type TraceEventType =
  | "run_start"
  | "run_end"
  | "stmt_start"
  | "stmt_end"
  | "fn_call_start"
  | "fn_call_end"
  | "loop_start"
  | "loop_end";

export type TraceData = Record<string, string | number | boolean>;

export interface TraceEvent {
  ts: string;
  runId: string;
  event: TraceEventType;
  span?: Span;
  data?: TraceData;
}

// --- Execution context ---
export interface InterpreterOptions {
  /** Receives each line written by `say`. Defaults to console.log. */
  output?: (line: string) => void;
  /** Extra host callables, registered after the built-ins. */
  natives?: readonly NativeFn[];
  maxCallDepth?: number;
  trace?: (event: TraceEvent) => void;
  runId?: string;
}

export interface ExecResult {
  diagnostics: Diagnostic[];
}

export const DEFAULT_MAX_CALL_DEPTH = 1000;

type Completion =
  | { type: "normal" }
  | { type: "return"; value: RoadmanValue; span: Span }
  | { type: "break"; span: Span };

const NORMAL: Completion = { type: "normal" };

const STRAY_BREAK = "'stopit' outside of a loop.";
const STRAY_RETURN = "'returnz' outside of a function.";

export class Interpreter {
  readonly globals = new Environment();
  private readonly host: NativeHost;
  private readonly maxCallDepth: number;
  private readonly trace?: (event: TraceEvent) => void;
  private readonly runId: string;
  private callDepth = 0;

  constructor(options: InterpreterOptions = {}) {
    const output = options.output ?? ((line: string) => console.log(line));
    this.host = { output };
    this.maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
    this.trace = options.trace;
    this.runId = options.runId ?? "run";
    for (const native of [...BUILTIN_NATIVES, ...(options.natives ?? [])]) {
      this.globals.define(native.name, native);
    }
  }

  /**
   * Runs a program in the global scope. State persists across calls, so a
   * REPL can feed one line at a time.
   */
  interpret(program: AST.Program): ExecResult {
    const runStartMs = Date.now();
    this.emit("run_start", program.span, { file: program.span.file });
    this.callDepth = 0;

    try {
      const completion = this.executeStatements(program.statements, this.globals);
      if (completion.type === "break") {
        throw new RoadmanRuntimeError("E_CONTROL", STRAY_BREAK, completion.span);
      }
      if (completion.type === "return") {
        throw new RoadmanRuntimeError("E_CONTROL", STRAY_RETURN, completion.span);
      }
      this.emit("run_end", program.span, { durationMs: Date.now() - runStartMs });
      return { diagnostics: [] };
    } catch (e) {
      const err = asRuntimeError(e, program.span);
      this.emit("run_end", program.span, {
        durationMs: Date.now() - runStartMs,
        error: err ? err.code : "E_INTERNAL",
        message: e instanceof Error ? e.message : String(e),
      });
      if (!err) throw e;
      return { diagnostics: [err.toDiagnostic()] };
    }
  }

  private emit(event: TraceEventType, span?: Span, data?: TraceData): void {
    if (this.trace) {
      this.trace({ ts: new Date().toISOString(), runId: this.runId, event, span, data });
    }
  }

  // --- Statements ---

  private executeStatements(stmts: readonly AST.Stmt[], env: Environment): Completion {
    for (const stmt of stmts) {
      this.emit("stmt_start", stmt.span);
      const completion = this.execute(stmt, env);
      this.emit("stmt_end", stmt.span);
      if (completion.type !== "normal") return completion;
    }
    return NORMAL;
  }

  private execute(stmt: AST.Stmt, env: Environment): Completion {
    switch (stmt.kind) {
      case "ExprStmt":
        this.evaluate(stmt.expr, env);
        return NORMAL;
      case "VarDecl": {
        const value = stmt.initializer ? this.evaluate(stmt.initializer, env) : null;
        env.define(stmt.name, value, stmt.constant);
        return NORMAL;
      }
      case "FnDecl":
        env.define(stmt.name, { kind: "fam", decl: stmt, closure: env });
        return NORMAL;
      case "Block":
        return this.executeStatements(stmt.statements, env.child());
      case "IfStmt":
        if (isTruthy(this.evaluate(stmt.condition, env))) {
          return this.execute(stmt.thenBranch, env);
        }
        return stmt.elseBranch ? this.execute(stmt.elseBranch, env) : NORMAL;
      case "WhileStmt":
        return this.executeWhile(stmt, env);
      case "BreakStmt":
        return { type: "break", span: stmt.span };
      case "ReturnStmt":
        return {
          type: "return",
          value: stmt.value ? this.evaluate(stmt.value, env) : null,
          span: stmt.span,
        };
    }
  }

  private executeWhile(stmt: AST.WhileStmt, env: Environment): Completion {
    this.emit("loop_start", stmt.span);
    let iterations = 0;
    let result: Completion = NORMAL;
    while (isTruthy(this.evaluate(stmt.condition, env))) {
      iterations++;
      const completion = this.execute(stmt.body, env);
      if (completion.type === "break") break;
      if (completion.type === "return") {
        result = completion;
        break;
      }
    }
    this.emit("loop_end", stmt.span, { iterations });
    return result;
  }

  // --- Expressions ---

  private evaluate(expr: AST.Expr, env: Environment): RoadmanValue {
    switch (expr.kind) {
      case "NumLiteral":
      case "StrLiteral":
      case "BoolLiteral":
        return expr.value;
      case "Grouping":
        return this.evaluate(expr.expr, env);
      case "ListExpr":
        return expr.elements.map((el) => this.evaluate(el, env));
      case "Variable": {
        const value = env.get(expr.name);
        if (value === undefined) {
          throw new RoadmanRuntimeError(
            "E_UNDEFINED",
            `Undefined variable '${expr.name}'.`,
            expr.span,
            "Declare it first with 'gimme' or 'conste'."
          );
        }
        return value;
      }
      case "Assignment": {
        const value = this.evaluate(expr.value, env);
        const outcome = env.assign(expr.name, value);
        if (outcome === "undefined") {
          throw new RoadmanRuntimeError(
            "E_UNDEFINED",
            `Undefined variable '${expr.name}'.`,
            expr.span,
            "Declare it first with 'gimme'."
          );
        }
        if (outcome === "constant") {
          throw new RoadmanRuntimeError(
            "E_CONST_ASSIGN",
            `Cannot assign to constant '${expr.name}'.`,
            expr.span,
            "Declare it with 'gimme' to make it mutable."
          );
        }
        return value;
      }
      case "UnaryExpr":
        return this.evaluateUnary(expr, env);
      case "BinaryExpr":
        return this.evaluateBinary(expr, env);
      case "CallExpr": {
        const callee = this.evaluate(expr.callee, env);
        const args = expr.args.map((a) => this.evaluate(a, env));
        return this.call(callee, args, expr);
      }
    }
  }

  private evaluateUnary(expr: AST.UnaryExpr, env: Environment): RoadmanValue {
    const operand = this.evaluate(expr.operand, env);
    if (expr.op === "!") return !isTruthy(operand);
    if (typeof operand !== "number") {
      throw new RoadmanRuntimeError("E_TYPE", "-: Operand must be a number.", expr.span, `Got ${typeName(operand)}.`);
    }
    return -operand;
  }

  private evaluateBinary(expr: AST.BinaryExpr, env: Environment): RoadmanValue {
    const left = this.evaluate(expr.left, env);

    switch (expr.op) {
      // Short-circuit: the deciding operand is the result.
      case "&&":
        return isTruthy(left) ? this.evaluate(expr.right, env) : left;
      case "||":
        return isTruthy(left) ? left : this.evaluate(expr.right, env);
      case "==":
        return valuesEqual(left, this.evaluate(expr.right, env));
      case "!=":
        return !valuesEqual(left, this.evaluate(expr.right, env));
      case "+":
        return add(expr, left, this.evaluate(expr.right, env));
      case "<":
      case "<=":
      case ">":
      case ">=":
        return compare(expr, left, this.evaluate(expr.right, env));
      case "-":
      case "*":
      case "/":
      case "%":
        return arithmetic(expr, left, this.evaluate(expr.right, env));
    }
  }

  private call(callee: RoadmanValue, args: RoadmanValue[], expr: AST.CallExpr): RoadmanValue {
    if (!isCallable(callee)) {
      throw new RoadmanRuntimeError(
        "E_NOT_CALLABLE",
        "Can only call functions.",
        expr.span,
        `Got ${typeName(callee)}.`
      );
    }
    const arity = arityOf(callee);
    if (args.length !== arity) {
      throw new RoadmanRuntimeError(
        "E_ARITY",
        `Expected ${arity} arguments but got ${args.length}.`,
        expr.span
      );
    }
    if (callee.kind === "native") {
      return callee.call(args, this.host);
    }
    return this.callUser(callee, args, expr.span);
  }

  private callUser(fn: UserFn, args: RoadmanValue[], span: Span): RoadmanValue {
    if (this.callDepth >= this.maxCallDepth) {
      throw new RoadmanRuntimeError(
        "E_STACK",
        "Stack overflow.",
        span,
        `Calls nested deeper than ${this.maxCallDepth} levels.`
      );
    }

    const fnEnv = fn.closure.child();
    fn.decl.params.forEach((param, i) => fnEnv.define(param, args[i] ?? null));

    this.emit("fn_call_start", span, { fn: fn.decl.name });
    this.callDepth++;
    try {
      const completion = this.executeStatements(fn.decl.body.statements, fnEnv);
      if (completion.type === "break") {
        throw new RoadmanRuntimeError("E_CONTROL", STRAY_BREAK, completion.span);
      }
      this.emit("fn_call_end", span, { fn: fn.decl.name });
      return completion.type === "return" ? completion.value : null;
    } finally {
      this.callDepth--;
    }
  }
}

function add(expr: AST.BinaryExpr, left: RoadmanValue, right: RoadmanValue): RoadmanValue {
  if (typeof left === "number" && typeof right === "number") return left + right;
  if (typeof left === "string" && typeof right === "string") return left + right;
  throw new RoadmanRuntimeError(
    "E_TYPE",
    "+: Operands must be two numbers or two strings.",
    expr.span,
    `Got ${typeName(left)} and ${typeName(right)}.`
  );
}

function compare(expr: AST.BinaryExpr, left: RoadmanValue, right: RoadmanValue): boolean {
  let order: number;
  if (typeof left === "number" && typeof right === "number") {
    if (Number.isNaN(left) || Number.isNaN(right)) return false;
    order = left < right ? -1 : left > right ? 1 : 0;
  } else if (typeof left === "string" && typeof right === "string") {
    order = left < right ? -1 : left > right ? 1 : 0;
  } else {
    throw new RoadmanRuntimeError(
      "E_TYPE",
      `${expr.op}: Operands must be two numbers or two strings.`,
      expr.span,
      `Got ${typeName(left)} and ${typeName(right)}.`
    );
  }
  switch (expr.op) {
    case "<":
      return order < 0;
    case "<=":
      return order <= 0;
    case ">":
      return order > 0;
    default:
      return order >= 0;
  }
}

function arithmetic(expr: AST.BinaryExpr, left: RoadmanValue, right: RoadmanValue): number {
  if (typeof left !== "number" || typeof right !== "number") {
    throw new RoadmanRuntimeError(
      "E_TYPE",
      `${expr.op}: Operands must be numbers.`,
      expr.span,
      `Got ${typeName(left)} and ${typeName(right)}.`
    );
  }
  switch (expr.op) {
    case "-":
      return left - right;
    case "*":
      return left * right;
    case "/":
      if (right === 0) throw new RoadmanRuntimeError("E_DIV_ZERO", "Division by zero.", expr.span);
      return left / right;
    default:
      if (right === 0) throw new RoadmanRuntimeError("E_DIV_ZERO", "Modulo by zero.", expr.span);
      return left % right;
  }
}

// The host stack can run out before maxCallDepth on deep recursion.
function asRuntimeError(e: unknown, span: Span): RoadmanRuntimeError | undefined {
  if (e instanceof RoadmanRuntimeError) return e;
  if (e instanceof RangeError && /call stack/i.test(e.message)) {
    return new RoadmanRuntimeError("E_STACK", "Stack overflow.", span, "Recursion ran out of host stack.");
  }
  return undefined;
}
