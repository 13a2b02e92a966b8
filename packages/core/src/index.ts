/**
 * @roadman/core - Roadman Language Core
 */
export * from "./ast.js";
export * from "./diagnostics.js";
export { tokenize, KEYWORDS } from "./lexer.js";
export type { Token, LexResult } from "./lexer.js";
export { parse, parseTokens, ParseError } from "./parser.js";
export type { ParseResult } from "./parser.js";
export { validate } from "./validator.js";
export { transpile } from "./transpiler.js";
export type { TranspileOptions } from "./transpiler.js";
export { Environment } from "./environment.js";
export type { AssignOutcome } from "./environment.js";
export { say, BUILTIN_NATIVES } from "./natives.js";
export {
  isTruthy,
  isCallable,
  valuesEqual,
  render,
  formatNumber,
  typeName,
} from "./values.js";
export type { RoadmanValue, Callable, NativeFn, UserFn, NativeHost } from "./values.js";
export {
  Interpreter,
  RoadmanRuntimeError,
  DEFAULT_MAX_CALL_DEPTH,
} from "./interpreter.js";
export type {
  InterpreterOptions,
  ExecResult,
  TraceEvent,
  TraceEventType,
  TraceData,
  RuntimeErrorCode,
} from "./interpreter.js";
