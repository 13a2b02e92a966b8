/**
 * Roadman parser using Chevrotain.
 * Produces a Roadman AST from tokens.
 *
 * Error recovery is off: the first grammar violation aborts the unit with a
 * `ParseError` describing what was expected at that point.
 */
import {
  CstParser,
  EOF,
  MismatchedTokenException,
  createTokenInstance,
  defaultParserErrorProvider,
  type CstElement,
  type CstNode,
  type IParserErrorMessageProvider,
  type IToken,
  type TokenType,
} from "chevrotain";
import {
  allTokens,
  tokenize,
  type Token,
  Ident,
  NumberLit,
  StringLit,
  True,
  False,
  Conste,
  Gimme,
  Fam,
  Innit,
  Elseway,
  Loopz,
  Stopit,
  Returnz,
  EqualityOp,
  ComparisonOp,
  AdditiveOp,
  MultiplicativeOp,
  UnaryOp,
  AndAnd,
  OrOr,
  Equals,
  LParen,
  RParen,
  LBrace,
  RBrace,
  LBracket,
  RBracket,
  Comma,
  Semicolon,
} from "./lexer.js";
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import { isBinaryOp, isUnaryOp } from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";

// --- Error messages ---

const EXPECT_EXPRESSION = "Expect expression.";
const INVALID_TARGET = "Invalid assignment target.";

// Keyed by "<rule>:<expected token>".
const MISMATCH_REASONS: ReadonlyMap<string, string> = new Map([
  ["varDecl:Ident", "Expect variable name."],
  ["varDecl:Semicolon", "Expect ';' after variable declaration."],
  ["fnDecl:Ident", "Expect function name."],
  ["fnDecl:LParen", "Expect '(' after function name."],
  ["parameters:Ident", "Expect parameter name."],
  ["parameters:RParen", "Expect ')' after parameters."],
  ["block:LBrace", "Expect '{' before function body."],
  ["block:RBrace", "Expect '}' after block."],
  ["ifStmt:LParen", "Expect '(' after 'innit'."],
  ["ifStmt:RParen", "Expect ')' after if condition."],
  ["whileStmt:LParen", "Expect '(' after 'loopz'."],
  ["whileStmt:RParen", "Expect ')' after loop condition."],
  ["returnStmt:Semicolon", "Expect ';' after return value."],
  ["breakStmt:Semicolon", "Expect ';' after 'stopit'."],
  ["exprStmt:Semicolon", "Expect ';' after expression."],
  ["argumentList:RParen", "Expect ')' after arguments."],
  ["grouping:RParen", "Expect ')' after expression."],
  ["listLiteral:RBracket", "Expect ']' after list elements."],
]);

const NO_VIABLE_REASONS: ReadonlyMap<string, string> = new Map([
  ["parameters", "Expect parameter name."],
]);

const errorMessageProvider: IParserErrorMessageProvider = {
  buildMismatchTokenMessage(options) {
    // A block only stops early on a token that cannot start a declaration.
    if (options.ruleName === "block" && options.expected === RBrace && options.actual.tokenType !== EOF) {
      return EXPECT_EXPRESSION;
    }
    return (
      MISMATCH_REASONS.get(`${options.ruleName}:${options.expected.name}`) ??
      defaultParserErrorProvider.buildMismatchTokenMessage(options)
    );
  },
  buildNotAllInputParsedMessage() {
    return EXPECT_EXPRESSION;
  },
  buildNoViableAltMessage(options) {
    return NO_VIABLE_REASONS.get(options.ruleName) ?? EXPECT_EXPRESSION;
  },
  buildEarlyExitMessage(options) {
    return defaultParserErrorProvider.buildEarlyExitMessage(options);
  },
};

// --- Grammar ---

class RoadmanCstParser extends CstParser {
  constructor() {
    super(allTokens, {
      recoveryEnabled: false,
      nodeLocationTracking: "full",
      errorMessageProvider,
    });
    this.performSelfAnalysis();
  }

  program = this.RULE("program", () => {
    this.MANY(() => {
      this.SUBRULE(this.declaration);
    });
  });

  declaration = this.RULE("declaration", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.varDecl) },
      { ALT: () => this.SUBRULE(this.fnDecl) },
      { ALT: () => this.SUBRULE(this.statement) },
    ]);
  });

  varDecl = this.RULE("varDecl", () => {
    this.OR([
      { ALT: () => this.CONSUME(Conste) },
      { ALT: () => this.CONSUME(Gimme) },
    ]);
    this.CONSUME(Ident);
    this.OPTION(() => {
      this.CONSUME(Equals);
      this.SUBRULE(this.expression);
    });
    this.CONSUME(Semicolon);
  });

  fnDecl = this.RULE("fnDecl", () => {
    this.CONSUME(Fam);
    this.CONSUME(Ident);
    this.CONSUME(LParen);
    this.SUBRULE(this.parameters);
    this.SUBRULE(this.block);
  });

  // Consumes the closing ')' as well.
  parameters = this.RULE("parameters", () => {
    this.OR([
      { ALT: () => this.CONSUME(RParen) },
      {
        ALT: () => {
          this.CONSUME(Ident);
          this.MANY(() => {
            this.CONSUME(Comma);
            this.CONSUME2(Ident);
          });
          this.CONSUME2(RParen);
        },
      },
    ]);
  });

  statement = this.RULE("statement", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.ifStmt) },
      { ALT: () => this.SUBRULE(this.whileStmt) },
      { ALT: () => this.SUBRULE(this.returnStmt) },
      { ALT: () => this.SUBRULE(this.breakStmt) },
      { ALT: () => this.SUBRULE(this.block) },
      { ALT: () => this.SUBRULE(this.exprStmt) },
    ]);
  });

  ifStmt = this.RULE("ifStmt", () => {
    this.CONSUME(Innit);
    this.CONSUME(LParen);
    this.SUBRULE(this.expression);
    this.CONSUME(RParen);
    this.SUBRULE(this.statement);
    this.OPTION(() => {
      this.CONSUME(Elseway);
      this.SUBRULE2(this.statement);
    });
  });

  whileStmt = this.RULE("whileStmt", () => {
    this.CONSUME(Loopz);
    this.CONSUME(LParen);
    this.SUBRULE(this.expression);
    this.CONSUME(RParen);
    this.SUBRULE(this.statement);
  });

  returnStmt = this.RULE("returnStmt", () => {
    this.CONSUME(Returnz);
    this.OPTION(() => {
      this.SUBRULE(this.expression);
    });
    this.CONSUME(Semicolon);
  });

  breakStmt = this.RULE("breakStmt", () => {
    this.CONSUME(Stopit);
    this.CONSUME(Semicolon);
  });

  block = this.RULE("block", () => {
    this.CONSUME(LBrace);
    this.MANY(() => {
      this.SUBRULE(this.declaration);
    });
    this.CONSUME(RBrace);
  });

  exprStmt = this.RULE("exprStmt", () => {
    this.SUBRULE(this.expression);
    this.CONSUME(Semicolon);
  });

  expression = this.RULE("expression", () => {
    this.SUBRULE(this.assignment);
  });

  assignment = this.RULE("assignment", () => {
    const target = this.SUBRULE(this.logicalOr);
    this.OPTION(() => {
      const equals = this.CONSUME(Equals);
      // Only a bare identifier can be assigned.
      this.ACTION(() => {
        if (!isBareIdentifier(target)) {
          const error = new MismatchedTokenException(INVALID_TARGET, equals, equals);
          this.errors = [...this.errors, error];
          throw error;
        }
      });
      this.SUBRULE(this.assignment);
    });
  });

  logicalOr = this.RULE("logicalOr", () => {
    this.SUBRULE(this.logicalAnd);
    this.MANY(() => {
      this.CONSUME(OrOr);
      this.SUBRULE2(this.logicalAnd);
    });
  });

  logicalAnd = this.RULE("logicalAnd", () => {
    this.SUBRULE(this.equality);
    this.MANY(() => {
      this.CONSUME(AndAnd);
      this.SUBRULE2(this.equality);
    });
  });

  equality = this.RULE("equality", () => {
    this.SUBRULE(this.comparison);
    this.MANY(() => {
      this.CONSUME(EqualityOp);
      this.SUBRULE2(this.comparison);
    });
  });

  comparison = this.RULE("comparison", () => {
    this.SUBRULE(this.term);
    this.MANY(() => {
      this.CONSUME(ComparisonOp);
      this.SUBRULE2(this.term);
    });
  });

  term = this.RULE("term", () => {
    this.SUBRULE(this.factor);
    this.MANY(() => {
      this.CONSUME(AdditiveOp);
      this.SUBRULE2(this.factor);
    });
  });

  factor = this.RULE("factor", () => {
    this.SUBRULE(this.unary);
    this.MANY(() => {
      this.CONSUME(MultiplicativeOp);
      this.SUBRULE2(this.unary);
    });
  });

  unary = this.RULE("unary", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(UnaryOp);
          this.SUBRULE(this.unary);
        },
      },
      { ALT: () => this.SUBRULE(this.call) },
    ]);
  });

  call = this.RULE("call", () => {
    this.SUBRULE(this.primary);
    this.MANY(() => {
      this.SUBRULE(this.argumentList);
    });
  });

  // Consumes both parentheses.
  argumentList = this.RULE("argumentList", () => {
    this.CONSUME(LParen);
    this.OR([
      { ALT: () => this.CONSUME(RParen) },
      {
        ALT: () => {
          this.SUBRULE(this.expression);
          this.MANY(() => {
            this.CONSUME(Comma);
            this.SUBRULE2(this.expression);
          });
          this.CONSUME2(RParen);
        },
      },
    ]);
  });

  primary = this.RULE("primary", () => {
    this.OR([
      { ALT: () => this.CONSUME(NumberLit) },
      { ALT: () => this.CONSUME(StringLit) },
      { ALT: () => this.CONSUME(True) },
      { ALT: () => this.CONSUME(False) },
      { ALT: () => this.CONSUME(Ident) },
      { ALT: () => this.SUBRULE(this.grouping) },
      { ALT: () => this.SUBRULE(this.listLiteral) },
    ]);
  });

  grouping = this.RULE("grouping", () => {
    this.CONSUME(LParen);
    this.SUBRULE(this.expression);
    this.CONSUME(RParen);
  });

  listLiteral = this.RULE("listLiteral", () => {
    this.CONSUME(LBracket);
    this.OR([
      { ALT: () => this.CONSUME(RBracket) },
      {
        ALT: () => {
          this.SUBRULE(this.expression);
          this.MANY(() => {
            this.CONSUME(Comma);
            this.SUBRULE2(this.expression);
          });
          this.CONSUME2(RBracket);
        },
      },
    ]);
  });
}

// Singleton parser instance
const cstParser = new RoadmanCstParser();

// --- Errors ---

export class ParseError extends Error {
  readonly reason: string;
  readonly line: number;
  readonly column: number;
  /** Offending lexeme, or undefined when the error is at end of input. */
  readonly lexeme?: string;
  readonly diagnostic: Diagnostic;

  constructor(reason: string, line: number, column: number, lexeme: string | undefined, file: string) {
    const where = lexeme === undefined ? "at end" : `at '${lexeme}'`;
    super(`[line ${line}:${column}] Error ${where}: ${reason}`);
    this.name = "ParseError";
    this.reason = reason;
    this.line = line;
    this.column = column;
    this.lexeme = lexeme;
    this.diagnostic = makeDiag(
      "E_PARSE",
      this.message,
      {
        file,
        startLine: line,
        startCol: column,
        endLine: line,
        endCol: column + Math.max(lexeme?.length ?? 0, 1),
      },
      "Check syntax near this location."
    );
  }

  /** True when the parser ran out of input, e.g. an unclosed block. */
  get atEnd(): boolean {
    return this.lexeme === undefined;
  }
}

// --- CST helpers ---

function isNode(el: CstElement): el is CstNode {
  return "children" in el;
}

function isToken(el: CstElement): el is IToken {
  return "image" in el;
}

function nodesOf(cst: CstNode, key: string): CstNode[] {
  return (cst.children[key] ?? []).filter(isNode);
}

function tokensOf(cst: CstNode, key: string): IToken[] {
  return (cst.children[key] ?? []).filter(isToken);
}

function nodeOf(cst: CstNode, key: string): CstNode {
  const [node] = nodesOf(cst, key);
  if (!node) throw new Error(`Missing '${key}' in ${cst.name}`);
  return node;
}

function tokenOf(cst: CstNode, key: string): IToken {
  const [token] = tokensOf(cst, key);
  if (!token) throw new Error(`Missing '${key}' in ${cst.name}`);
  return token;
}

function tokenSpan(token: IToken, file: string): Span {
  return {
    file,
    startLine: token.startLine ?? 1,
    startCol: token.startColumn ?? 1,
    endLine: token.endLine ?? 1,
    endCol: (token.endColumn ?? 1) + 1,
  };
}

// Empty nodes carry NaN positions.
function pos(value: number | undefined, fallback: number): number {
  return value === undefined || Number.isNaN(value) ? fallback : value;
}

function cstSpan(node: CstNode, file: string): Span {
  const loc = node.location;
  if (loc) {
    return {
      file,
      startLine: pos(loc.startLine, 1),
      startCol: pos(loc.startColumn, 1),
      endLine: pos(loc.endLine, 1),
      endCol: pos(loc.endColumn, 0) + 1,
    };
  }
  return { file, startLine: 1, startCol: 1, endLine: 1, endCol: 1 };
}

function joinSpans(from: Span, to: Span): Span {
  return {
    file: from.file,
    startLine: from.startLine,
    startCol: from.startCol,
    endLine: to.endLine,
    endCol: to.endCol,
  };
}

// --- CST to AST visitor ---

function visitProgram(cst: CstNode, file: string): AST.Program {
  return {
    kind: "Program",
    span: cstSpan(cst, file),
    statements: nodesOf(cst, "declaration").map((d) => visitDeclaration(d, file)),
  };
}

function visitDeclaration(cst: CstNode, file: string): AST.Stmt {
  const [varDecl] = nodesOf(cst, "varDecl");
  if (varDecl) return visitVarDecl(varDecl, file);
  const [fnDecl] = nodesOf(cst, "fnDecl");
  if (fnDecl) return visitFnDecl(fnDecl, file);
  return visitStatement(nodeOf(cst, "statement"), file);
}

function visitVarDecl(cst: CstNode, file: string): AST.VarDecl {
  const [init] = nodesOf(cst, "expression");
  return {
    kind: "VarDecl",
    span: cstSpan(cst, file),
    name: tokenOf(cst, "Ident").image,
    initializer: init ? visitExpression(init, file) : undefined,
    constant: tokensOf(cst, "Conste").length > 0,
  };
}

function visitFnDecl(cst: CstNode, file: string): AST.FnDecl {
  return {
    kind: "FnDecl",
    span: cstSpan(cst, file),
    name: tokenOf(cst, "Ident").image,
    params: tokensOf(nodeOf(cst, "parameters"), "Ident").map((t) => t.image),
    body: visitBlock(nodeOf(cst, "block"), file),
  };
}

function visitStatement(cst: CstNode, file: string): AST.Stmt {
  const [ifStmt] = nodesOf(cst, "ifStmt");
  if (ifStmt) return visitIfStmt(ifStmt, file);
  const [whileStmt] = nodesOf(cst, "whileStmt");
  if (whileStmt) return visitWhileStmt(whileStmt, file);
  const [returnStmt] = nodesOf(cst, "returnStmt");
  if (returnStmt) {
    const [value] = nodesOf(returnStmt, "expression");
    return {
      kind: "ReturnStmt",
      span: cstSpan(returnStmt, file),
      value: value ? visitExpression(value, file) : undefined,
    };
  }
  const [breakStmt] = nodesOf(cst, "breakStmt");
  if (breakStmt) return { kind: "BreakStmt", span: cstSpan(breakStmt, file) };
  const [block] = nodesOf(cst, "block");
  if (block) return visitBlock(block, file);
  const exprStmt = nodeOf(cst, "exprStmt");
  return {
    kind: "ExprStmt",
    span: cstSpan(exprStmt, file),
    expr: visitExpression(nodeOf(exprStmt, "expression"), file),
  };
}

function visitIfStmt(cst: CstNode, file: string): AST.IfStmt {
  const [thenBranch, elseBranch] = nodesOf(cst, "statement");
  if (!thenBranch) throw new Error("Missing 'statement' in ifStmt");
  return {
    kind: "IfStmt",
    span: cstSpan(cst, file),
    condition: visitExpression(nodeOf(cst, "expression"), file),
    thenBranch: visitStatement(thenBranch, file),
    elseBranch: elseBranch ? visitStatement(elseBranch, file) : undefined,
  };
}

function visitWhileStmt(cst: CstNode, file: string): AST.WhileStmt {
  return {
    kind: "WhileStmt",
    span: cstSpan(cst, file),
    condition: visitExpression(nodeOf(cst, "expression"), file),
    body: visitStatement(nodeOf(cst, "statement"), file),
  };
}

function visitBlock(cst: CstNode, file: string): AST.Block {
  return {
    kind: "Block",
    span: cstSpan(cst, file),
    statements: nodesOf(cst, "declaration").map((d) => visitDeclaration(d, file)),
  };
}

function visitExpression(cst: CstNode, file: string): AST.Expr {
  return visitAssignment(nodeOf(cst, "assignment"), file);
}

function visitAssignment(cst: CstNode, file: string): AST.Expr {
  const target = visitBinaryLevel(nodeOf(cst, "logicalOr"), file);
  const [equals] = tokensOf(cst, "Equals");
  if (!equals) return target;
  if (target.kind !== "Variable") {
    throw new ParseError(
      INVALID_TARGET,
      equals.startLine ?? 1,
      equals.startColumn ?? 1,
      equals.image,
      file
    );
  }
  const value = visitAssignment(nodeOf(cst, "assignment"), file);
  return { kind: "Assignment", span: joinSpans(target.span, value.span), name: target.name, value };
}

/** True when an expression subtree reduced to a single identifier. */
function isBareIdentifier(node: CstNode): boolean {
  let current: CstElement = node;
  while (isNode(current)) {
    const [group, ...rest]: (CstElement[] | undefined)[] = Object.values(current.children);
    const child: CstElement | undefined = group?.length === 1 ? group[0] : undefined;
    if (rest.length > 0 || !child) return false;
    current = child;
  }
  return current.tokenType === Ident;
}

// Each binary level: operand (operator operand)*, folded to the left.
const BINARY_LEVELS: ReadonlyMap<string, { operand: string; operator: string }> = new Map([
  ["logicalOr", { operand: "logicalAnd", operator: "OrOr" }],
  ["logicalAnd", { operand: "equality", operator: "AndAnd" }],
  ["equality", { operand: "comparison", operator: "EqualityOp" }],
  ["comparison", { operand: "term", operator: "ComparisonOp" }],
  ["term", { operand: "factor", operator: "AdditiveOp" }],
  ["factor", { operand: "unary", operator: "MultiplicativeOp" }],
]);

function visitBinaryLevel(cst: CstNode, file: string): AST.Expr {
  const level = BINARY_LEVELS.get(cst.name);
  if (!level) return visitUnary(cst, file);

  const operands = nodesOf(cst, level.operand);
  const operators = tokensOf(cst, level.operator);
  const [first, ...rest] = operands;
  if (!first) throw new Error(`Missing '${level.operand}' in ${cst.name}`);

  let left = visitBinaryLevel(first, file);
  rest.forEach((operandCst, i) => {
    const op = operators[i]?.image ?? "";
    if (!isBinaryOp(op)) {
      throw new Error(`Unexpected operator '${op}' in ${cst.name}`);
    }
    const right = visitBinaryLevel(operandCst, file);
    left = { kind: "BinaryExpr", span: joinSpans(left.span, right.span), op, left, right };
  });
  return left;
}

function visitUnary(cst: CstNode, file: string): AST.Expr {
  const [opToken] = tokensOf(cst, "UnaryOp");
  if (opToken) {
    const op = opToken.image;
    if (!isUnaryOp(op)) throw new Error(`Unexpected unary operator '${op}'`);
    const operand = visitUnary(nodeOf(cst, "unary"), file);
    return { kind: "UnaryExpr", span: joinSpans(tokenSpan(opToken, file), operand.span), op, operand };
  }
  return visitCall(nodeOf(cst, "call"), file);
}

function visitCall(cst: CstNode, file: string): AST.Expr {
  let expr = visitPrimary(nodeOf(cst, "primary"), file);
  for (const argsCst of nodesOf(cst, "argumentList")) {
    expr = {
      kind: "CallExpr",
      span: joinSpans(expr.span, cstSpan(argsCst, file)),
      callee: expr,
      args: nodesOf(argsCst, "expression").map((e) => visitExpression(e, file)),
    };
  }
  return expr;
}

function visitPrimary(cst: CstNode, file: string): AST.Expr {
  const [num] = tokensOf(cst, "NumberLit");
  if (num) return { kind: "NumLiteral", span: tokenSpan(num, file), value: Number(num.image) };
  const [str] = tokensOf(cst, "StringLit");
  if (str) return { kind: "StrLiteral", span: tokenSpan(str, file), value: str.image.slice(1, -1) };
  const [t] = tokensOf(cst, "True");
  if (t) return { kind: "BoolLiteral", span: tokenSpan(t, file), value: true };
  const [f] = tokensOf(cst, "False");
  if (f) return { kind: "BoolLiteral", span: tokenSpan(f, file), value: false };
  const [ident] = tokensOf(cst, "Ident");
  if (ident) return { kind: "Variable", span: tokenSpan(ident, file), name: ident.image };
  const [grouping] = nodesOf(cst, "grouping");
  if (grouping) {
    return {
      kind: "Grouping",
      span: cstSpan(grouping, file),
      expr: visitExpression(nodeOf(grouping, "expression"), file),
    };
  }
  const list = nodeOf(cst, "listLiteral");
  return {
    kind: "ListExpr",
    span: cstSpan(list, file),
    elements: nodesOf(list, "expression").map((e) => visitExpression(e, file)),
  };
}

// --- Public API ---

const TOKEN_TYPES: ReadonlyMap<string, TokenType> = new Map(allTokens.map((t) => [t.name, t]));

function toChevrotainToken(token: Token): IToken {
  const type = TOKEN_TYPES.get(token.kind);
  if (!type) throw new Error(`Unknown token kind '${token.kind}'`);
  const image = type === StringLit ? `"${token.text}"` : token.text;
  return createTokenInstance(
    type,
    image,
    token.offset,
    token.offset + image.length - 1,
    token.line,
    token.endLine,
    token.column,
    token.endColumn
  );
}

function endPosition(tokens: Token[]): { line: number; column: number } {
  const eof = tokens.find((t) => t.kind === "EOF");
  if (eof) return { line: eof.line, column: eof.column };
  const last = tokens[tokens.length - 1];
  return last ? { line: last.endLine, column: last.endColumn + 1 } : { line: 1, column: 1 };
}

/**
 * Parse a token sequence (as produced by `tokenize`) into a Program.
 * Throws `ParseError` on the first grammar violation.
 */
export function parseTokens(tokens: Token[], file: string = "<stdin>"): AST.Program {
  cstParser.input = tokens.filter((t) => t.kind !== "EOF").map(toChevrotainToken);
  const cst = cstParser.program();

  const [err] = cstParser.errors;
  if (err) {
    const token = err.token;
    if (token.tokenType === EOF) {
      const end = endPosition(tokens);
      throw new ParseError(err.message, end.line, end.column, undefined, file);
    }
    throw new ParseError(err.message, token.startLine ?? 1, token.startColumn ?? 1, token.image, file);
  }

  return visitProgram(cst, file);
}

export interface ParseResult {
  program?: AST.Program;
  diagnostics: Diagnostic[];
  /** Set when parsing stopped because the input ended too early. */
  incomplete?: boolean;
}

export function parse(source: string, file: string = "<stdin>"): ParseResult {
  const { tokens, diagnostics } = tokenize(source, file);
  try {
    const program = parseTokens(tokens, file);
    return { program, diagnostics };
  } catch (e) {
    if (e instanceof ParseError) {
      return { diagnostics: [...diagnostics, e.diagnostic], incomplete: e.atEnd };
    }
    throw e;
  }
}
