/**
 * Roadman lexer built on Chevrotain.
 *
 * `tokenize` never throws: unscannable characters and unterminated strings
 * come back as diagnostics next to the tokens that could be read.
 */
import { createToken, Lexer, type IToken, type TokenType } from "chevrotain";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";

// Identifiers are declared first so keywords can fall back to them.
export const Ident = createToken({ name: "Ident", pattern: /[A-Za-z_][A-Za-z0-9_]*/ });

function keyword(name: string, spelling: string): TokenType {
  return createToken({ name, pattern: new RegExp(spelling), longer_alt: Ident });
}

// Keywords
export const Innit = keyword("Innit", "innit");
export const Elseway = keyword("Elseway", "elseway");
export const Loopz = keyword("Loopz", "loopz");
export const Stopit = keyword("Stopit", "stopit");
export const Switchup = keyword("Switchup", "switchup");
export const Casez = keyword("Casez", "casez");
export const Defend = keyword("Defend", "defend");
export const Conste = keyword("Conste", "conste");
export const Gimme = keyword("Gimme", "gimme");
export const Fam = keyword("Fam", "fam");
export const Returnz = keyword("Returnz", "returnz");
export const True = keyword("True", "true");
export const False = keyword("False", "false");

// Reserved type names
export const TypeDigit = keyword("TypeDigit", "digit");
export const TypeWord = keyword("TypeWord", "word");
export const TypeBoola = keyword("TypeBoola", "boola");
export const TypeListz = keyword("TypeListz", "listz");
export const TypeMapz = keyword("TypeMapz", "mapz");

export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ["innit", Innit],
  ["elseway", Elseway],
  ["loopz", Loopz],
  ["stopit", Stopit],
  ["switchup", Switchup],
  ["casez", Casez],
  ["defend", Defend],
  ["conste", Conste],
  ["gimme", Gimme],
  ["fam", Fam],
  ["returnz", Returnz],
  ["true", True],
  ["false", False],
  ["digit", TypeDigit],
  ["word", TypeWord],
  ["boola", TypeBoola],
  ["listz", TypeListz],
  ["mapz", TypeMapz],
]);

// Literals
export const NumberLit = createToken({ name: "NumberLit", pattern: /\d+(?:\.\d+)?/ });
export const StringLit = createToken({
  name: "StringLit",
  pattern: /"[^"]*"/,
  line_breaks: true,
  start_chars_hint: ['"'],
});
export const UnterminatedString = createToken({
  name: "UnterminatedString",
  pattern: /"[^"]*/,
  line_breaks: true,
  start_chars_hint: ['"'],
  group: "invalid",
});

// Operator categories, used by the parser's precedence levels
export const EqualityOp = createToken({ name: "EqualityOp", pattern: Lexer.NA });
export const ComparisonOp = createToken({ name: "ComparisonOp", pattern: Lexer.NA });
export const AdditiveOp = createToken({ name: "AdditiveOp", pattern: Lexer.NA });
export const MultiplicativeOp = createToken({ name: "MultiplicativeOp", pattern: Lexer.NA });
export const UnaryOp = createToken({ name: "UnaryOp", pattern: Lexer.NA });

// Two-character operators (before their one-character prefixes)
export const EqEq = createToken({ name: "EqEq", pattern: /==/, categories: EqualityOp });
export const BangEq = createToken({ name: "BangEq", pattern: /!=/, categories: EqualityOp });
export const LtEq = createToken({ name: "LtEq", pattern: /<=/, categories: ComparisonOp });
export const GtEq = createToken({ name: "GtEq", pattern: />=/, categories: ComparisonOp });
export const AndAnd = createToken({ name: "AndAnd", pattern: /&&/ });
export const OrOr = createToken({ name: "OrOr", pattern: /\|\|/ });

// One-character operators
export const Equals = createToken({ name: "Equals", pattern: /=/ });
export const Lt = createToken({ name: "Lt", pattern: /</, categories: ComparisonOp });
export const Gt = createToken({ name: "Gt", pattern: />/, categories: ComparisonOp });
export const Bang = createToken({ name: "Bang", pattern: /!/, categories: UnaryOp });
export const Plus = createToken({ name: "Plus", pattern: /\+/, categories: AdditiveOp });
export const Minus = createToken({
  name: "Minus",
  pattern: /-/,
  categories: [AdditiveOp, UnaryOp],
});
export const Star = createToken({ name: "Star", pattern: /\*/, categories: MultiplicativeOp });
export const Slash = createToken({ name: "Slash", pattern: /\//, categories: MultiplicativeOp });
export const Percent = createToken({ name: "Percent", pattern: /%/, categories: MultiplicativeOp });

// Punctuation
export const LParen = createToken({ name: "LParen", pattern: /\(/ });
export const RParen = createToken({ name: "RParen", pattern: /\)/ });
export const LBrace = createToken({ name: "LBrace", pattern: /\{/ });
export const RBrace = createToken({ name: "RBrace", pattern: /\}/ });
export const LBracket = createToken({ name: "LBracket", pattern: /\[/ });
export const RBracket = createToken({ name: "RBracket", pattern: /\]/ });
export const Comma = createToken({ name: "Comma", pattern: /,/ });
export const Dot = createToken({ name: "Dot", pattern: /\./ });
export const Semicolon = createToken({ name: "Semicolon", pattern: /;/ });
export const Colon = createToken({ name: "Colon", pattern: /:/ });

// Whitespace and comments
export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /[ \t]+/,
  group: Lexer.SKIPPED,
});
export const Newline = createToken({
  name: "Newline",
  pattern: /\r\n|\r|\n/,
  line_breaks: true,
  group: Lexer.SKIPPED,
});
export const LineComment = createToken({
  name: "LineComment",
  pattern: /\/\/[^\n\r]*/,
  group: Lexer.SKIPPED,
});
// An unterminated block comment runs to the end of input.
export const BlockComment = createToken({
  name: "BlockComment",
  pattern: /\/\*(?:[^*]|\*(?!\/))*(?:\*\/)?/,
  line_breaks: true,
  start_chars_hint: ["/"],
  group: Lexer.SKIPPED,
});

// Order matters: comments before Slash, keywords before Ident,
// two-character operators before one-character ones.
export const allTokens: TokenType[] = [
  WhiteSpace,
  Newline,
  LineComment,
  BlockComment,
  Innit,
  Elseway,
  Loopz,
  Stopit,
  Switchup,
  Casez,
  Defend,
  Conste,
  Gimme,
  Fam,
  Returnz,
  True,
  False,
  TypeDigit,
  TypeWord,
  TypeBoola,
  TypeListz,
  TypeMapz,
  Ident,
  NumberLit,
  StringLit,
  UnterminatedString,
  EqEq,
  BangEq,
  LtEq,
  GtEq,
  AndAnd,
  OrOr,
  Equals,
  Lt,
  Gt,
  Bang,
  Plus,
  Minus,
  Star,
  Slash,
  Percent,
  LParen,
  RParen,
  LBrace,
  RBrace,
  LBracket,
  RBracket,
  Comma,
  Dot,
  Semicolon,
  Colon,
  EqualityOp,
  ComparisonOp,
  AdditiveOp,
  MultiplicativeOp,
  UnaryOp,
];

export const RoadmanLexer = new Lexer(allTokens);

export interface Token {
  /** Token type name, e.g. `Ident`, `Gimme`, `NumberLit`, `EOF`. */
  kind: string;
  /** Lexeme; string contents without the surrounding quotes. */
  text: string;
  line: number;
  column: number;
  offset: number;
  endLine: number;
  /** Column of the last character (inclusive). */
  endColumn: number;
}

export interface LexResult {
  tokens: Token[];
  diagnostics: Diagnostic[];
}

function toToken(t: IToken): Token {
  const isString = t.tokenType === StringLit;
  return {
    kind: t.tokenType.name,
    text: isString ? t.image.slice(1, -1) : t.image,
    line: t.startLine ?? 1,
    column: t.startColumn ?? 1,
    offset: t.startOffset,
    endLine: t.endLine ?? t.startLine ?? 1,
    endColumn: t.endColumn ?? t.startColumn ?? 1,
  };
}

function endOfInput(source: string): Token {
  const lines = source.split(/\r\n|\r|\n/);
  const last = lines[lines.length - 1] ?? "";
  const line = lines.length;
  const column = last.length + 1;
  return { kind: "EOF", text: "", line, column, offset: source.length, endLine: line, endColumn: column };
}

export function tokenize(source: string, file: string = "<stdin>"): LexResult {
  const result = RoadmanLexer.tokenize(source);
  const diagnostics: Diagnostic[] = [];

  for (const err of result.errors) {
    const line = err.line ?? 1;
    const column = err.column ?? 1;
    // Chevrotain reports a run of unscannable characters as one error.
    const run = Array.from(source.slice(err.offset, err.offset + err.length));
    run.forEach((ch, i) => {
      diagnostics.push(
        makeDiag(
          "E_LEX",
          `Unexpected character '${ch}'.`,
          { file, startLine: line, startCol: column + i, endLine: line, endCol: column + i + 1 },
          "Remove the character or put it inside a string."
        )
      );
    });
  }

  for (const bad of result.groups["invalid"] ?? []) {
    const line = bad.startLine ?? 1;
    const column = bad.startColumn ?? 1;
    diagnostics.push(
      makeDiag(
        "E_LEX",
        "Unterminated string.",
        { file, startLine: line, startCol: column, endLine: line, endCol: column + 1 },
        "Close the string with a matching '\"'."
      )
    );
  }

  diagnostics.sort(
    (a, b) => (a.span?.startLine ?? 0) - (b.span?.startLine ?? 0) || (a.span?.startCol ?? 0) - (b.span?.startCol ?? 0)
  );

  const tokens = result.tokens.map(toToken);
  tokens.push(endOfInput(source));
  return { tokens, diagnostics };
}
