/**
 * Roadman runtime values, truthiness, equality and display.
 */
import type { FnDecl } from "./ast.js";
import type { Environment } from "./environment.js";

export type RoadmanValue = number | string | boolean | null | RoadmanValue[] | Callable;

/** What a native callable may use from the interpreter that calls it. */
export interface NativeHost {
  output(line: string): void;
}

export interface NativeFn {
  kind: "native";
  name: string;
  arity: number;
  call(args: RoadmanValue[], host: NativeHost): RoadmanValue;
}

export interface UserFn {
  kind: "fam";
  decl: FnDecl;
  closure: Environment;
}

export type Callable = NativeFn | UserFn;

export function isCallable(v: RoadmanValue): v is Callable {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function arityOf(fn: Callable): number {
  return fn.kind === "native" ? fn.arity : fn.decl.params.length;
}

export function isTruthy(v: RoadmanValue): boolean {
  if (v === null) return false;
  if (typeof v === "boolean") return v;
  if (typeof v === "number") return v !== 0;
  if (typeof v === "string") return v.length > 0;
  return true;
}

export function valuesEqual(a: RoadmanValue, b: RoadmanValue): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((el, i) => valuesEqual(el, b[i] ?? null));
  }
  return a === b;
}

export function typeName(v: RoadmanValue): string {
  if (v === null) return "none";
  if (Array.isArray(v)) return "list";
  if (isCallable(v)) return "function";
  return typeof v;
}

export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  if (Object.is(value, -0)) return "-0.0";

  const raw = String(value);
  const expanded = /e/i.test(raw) ? expandScientificNotation(raw) : raw;
  return expanded.includes(".") ? expanded : `${expanded}.0`;
}

function expandScientificNotation(value: string): string {
  const [mantissa = "", exponentPart = ""] = value.toLowerCase().split("e");
  const exponent = Number.parseInt(exponentPart, 10);
  if (!Number.isFinite(exponent)) return value;

  let sign = "";
  let digits = mantissa;
  if (digits.startsWith("-")) {
    sign = "-";
    digits = digits.slice(1);
  } else if (digits.startsWith("+")) {
    digits = digits.slice(1);
  }

  const dot = digits.indexOf(".");
  const intPart = dot >= 0 ? digits.slice(0, dot) : digits;
  const fracPart = dot >= 0 ? digits.slice(dot + 1) : "";
  const compact = intPart + fracPart;
  const decimalIndex = intPart.length + exponent;

  if (decimalIndex <= 0) {
    return `${sign}0.${"0".repeat(-decimalIndex)}${compact}`;
  }
  if (decimalIndex >= compact.length) {
    return `${sign}${compact}${"0".repeat(decimalIndex - compact.length)}.0`;
  }
  return `${sign}${compact.slice(0, decimalIndex)}.${compact.slice(decimalIndex)}`;
}

/** Text written by `say`. */
export function render(v: RoadmanValue): string {
  if (v === null) return "none";
  if (typeof v === "number") return formatNumber(v);
  if (typeof v === "string") return v;
  if (typeof v === "boolean") return v ? "true" : "false";
  if (Array.isArray(v)) return `[${v.map(render).join(", ")}]`;
  return v.kind === "native" ? `<native ${v.name}>` : `<fam ${v.decl.name}>`;
}
