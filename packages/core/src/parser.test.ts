/**
 * Tests for the Roadman parser.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { parse, parseTokens, ParseError } from "./parser.js";
import { tokenize } from "./lexer.js";
import type * as AST from "./ast.js";

function program(source: string): AST.Program {
  const result = parse(source, "test.rdm");
  assert.deepEqual(result.diagnostics, []);
  assert.ok(result.program);
  return result.program;
}

function firstExpr(source: string): AST.Expr {
  const [stmt] = program(source).statements;
  assert.ok(stmt && stmt.kind === "ExprStmt");
  return stmt.expr;
}

function parseError(source: string): ParseError {
  try {
    parseTokens(tokenize(source, "test.rdm").tokens, "test.rdm");
  } catch (e) {
    if (e instanceof ParseError) return e;
    throw e;
  }
  throw new Error(`expected a parse error for ${JSON.stringify(source)}`);
}

describe("Roadman Parser", () => {
  it("parses an empty program", () => {
    assert.deepEqual(program("").statements, []);
  });

  it("binds * tighter than +", () => {
    const e = firstExpr("1 + 2 * 3;");
    assert.ok(e.kind === "BinaryExpr");
    assert.equal(e.op, "+");
    assert.equal(e.left.kind, "NumLiteral");
    assert.ok(e.right.kind === "BinaryExpr");
    assert.equal(e.right.op, "*");
  });

  it("keeps a leading product on the left", () => {
    const e = firstExpr("1 * 2 + 3;");
    assert.ok(e.kind === "BinaryExpr");
    assert.equal(e.op, "+");
    assert.ok(e.left.kind === "BinaryExpr");
    assert.equal(e.left.op, "*");
    assert.equal(e.right.kind, "NumLiteral");
  });

  it("folds same-precedence operators to the left", () => {
    const e = firstExpr("10 - 4 - 3;");
    assert.ok(e.kind === "BinaryExpr" && e.left.kind === "BinaryExpr");
    assert.equal(e.op, "-");
    assert.equal(e.left.op, "-");
    assert.ok(e.right.kind === "NumLiteral");
    assert.equal(e.right.value, 3);
  });

  it("orders logical and comparison levels", () => {
    const e = firstExpr("a || b && c == d < e + f;");
    assert.ok(e.kind === "BinaryExpr");
    assert.equal(e.op, "||");
    assert.ok(e.right.kind === "BinaryExpr");
    assert.equal(e.right.op, "&&");
    assert.ok(e.right.right.kind === "BinaryExpr");
    assert.equal(e.right.right.op, "==");
    assert.ok(e.right.right.right.kind === "BinaryExpr");
    assert.equal(e.right.right.right.op, "<");
    assert.ok(e.right.right.right.right.kind === "BinaryExpr");
    assert.equal(e.right.right.right.right.op, "+");
  });

  it("parses nested unary operators", () => {
    const e = firstExpr("!-x;");
    assert.ok(e.kind === "UnaryExpr");
    assert.equal(e.op, "!");
    assert.ok(e.operand.kind === "UnaryExpr");
    assert.equal(e.operand.op, "-");
    assert.equal(e.operand.operand.kind, "Variable");
  });

  it("parses right-associative assignment", () => {
    const e = firstExpr("a = b = 3;");
    assert.ok(e.kind === "Assignment");
    assert.equal(e.name, "a");
    assert.ok(e.value.kind === "Assignment");
    assert.equal(e.value.name, "b");
  });

  it("keeps groupings as nodes", () => {
    const e = firstExpr("(1 + 2) * 3;");
    assert.ok(e.kind === "BinaryExpr");
    assert.ok(e.left.kind === "Grouping");
    assert.equal(e.left.expr.kind, "BinaryExpr");
  });

  it("parses chained calls and list literals", () => {
    const e = firstExpr('make()(1, [2, "three"], []);');
    assert.ok(e.kind === "CallExpr");
    assert.ok(e.callee.kind === "CallExpr");
    assert.equal(e.callee.args.length, 0);
    assert.equal(e.args.length, 3);
    const list = e.args[1];
    assert.ok(list && list.kind === "ListExpr");
    assert.deepEqual(
      list.elements.map((el) => el.kind),
      ["NumLiteral", "StrLiteral"]
    );
    const empty = e.args[2];
    assert.ok(empty && empty.kind === "ListExpr");
    assert.equal(empty.elements.length, 0);
  });

  it("parses literals", () => {
    const [a, b, c, d] = program('1.5; "hi"; true; false;').statements;
    assert.ok(a?.kind === "ExprStmt" && a.expr.kind === "NumLiteral");
    assert.equal(a.expr.value, 1.5);
    assert.ok(b?.kind === "ExprStmt" && b.expr.kind === "StrLiteral");
    assert.equal(b.expr.value, "hi");
    assert.ok(c?.kind === "ExprStmt" && c.expr.kind === "BoolLiteral");
    assert.equal(c.expr.value, true);
    assert.ok(d?.kind === "ExprStmt" && d.expr.kind === "BoolLiteral");
    assert.equal(d.expr.value, false);
  });

  it("parses constant and mutable declarations", () => {
    const [c, g, bare] = program("conste a = 1; gimme b = 2; gimme c;").statements;
    assert.ok(c?.kind === "VarDecl" && g?.kind === "VarDecl" && bare?.kind === "VarDecl");
    assert.equal(c.constant, true);
    assert.equal(g.constant, false);
    assert.equal(g.name, "b");
    assert.equal(bare.initializer, undefined);
  });

  it("parses functions with parameters and a body", () => {
    const [fn] = program("fam add(a, b) { returnz a + b; }").statements;
    assert.ok(fn?.kind === "FnDecl");
    assert.equal(fn.name, "add");
    assert.deepEqual(fn.params, ["a", "b"]);
    assert.equal(fn.body.kind, "Block");
    assert.equal(fn.body.statements[0]?.kind, "ReturnStmt");
  });

  it("parses a bare return and break", () => {
    const [fn] = program("fam f() { loopz (true) { stopit; } returnz; }").statements;
    assert.ok(fn?.kind === "FnDecl");
    assert.deepEqual(fn.params, []);
    const [loop, ret] = fn.body.statements;
    assert.ok(loop?.kind === "WhileStmt" && loop.body.kind === "Block");
    assert.equal(loop.body.statements[0]?.kind, "BreakStmt");
    assert.ok(ret?.kind === "ReturnStmt");
    assert.equal(ret.value, undefined);
  });

  it("attaches elseway to the nearest innit", () => {
    const [outer] = program("innit (a) innit (b) say(1); elseway say(2);").statements;
    assert.ok(outer?.kind === "IfStmt");
    assert.equal(outer.elseBranch, undefined);
    assert.ok(outer.thenBranch.kind === "IfStmt");
    assert.ok(outer.thenBranch.elseBranch);
  });

  it("records spans", () => {
    const [decl] = program("gimme x = 1 +\n  2;").statements;
    assert.ok(decl?.kind === "VarDecl");
    assert.deepEqual(decl.span, { file: "test.rdm", startLine: 1, startCol: 1, endLine: 2, endCol: 5 });
    assert.deepEqual(decl.initializer?.span, {
      file: "test.rdm",
      startLine: 1,
      startCol: 11,
      endLine: 2,
      endCol: 4,
    });
  });

  describe("errors", () => {
    const cases: Array<[string, string]> = [
      ["gimme x = ;", "[line 1:11] Error at ';': Expect expression."],
      ["gimme = 1;", "[line 1:7] Error at '=': Expect variable name."],
      ["gimme x = 1", "[line 1:12] Error at end: Expect ';' after variable declaration."],
      ["fam (a) {}", "[line 1:5] Error at '(': Expect function name."],
      ["fam f {}", "[line 1:7] Error at '{': Expect '(' after function name."],
      ["fam f(1) {}", "[line 1:7] Error at '1': Expect parameter name."],
      ["fam f(a,) {}", "[line 1:9] Error at ')': Expect parameter name."],
      ["fam f(a b) {}", "[line 1:9] Error at 'b': Expect ')' after parameters."],
      ["fam f() say(1);", "[line 1:9] Error at 'say': Expect '{' before function body."],
      ["innit x) {}", "[line 1:7] Error at 'x': Expect '(' after 'innit'."],
      ["innit (x {}", "[line 1:10] Error at '{': Expect ')' after if condition."],
      ["loopz x) {}", "[line 1:7] Error at 'x': Expect '(' after 'loopz'."],
      ["loopz (x {}", "[line 1:10] Error at '{': Expect ')' after loop condition."],
      ["fam f() { returnz 1 }", "[line 1:21] Error at '}': Expect ';' after return value."],
      ["loopz (true) { stopit }", "[line 1:23] Error at '}': Expect ';' after 'stopit'."],
      ["{ say(1);", "[line 1:10] Error at end: Expect '}' after block."],
      ["{ say(1); )", "[line 1:11] Error at ')': Expect expression."],
      ["say(1)", "[line 1:7] Error at end: Expect ';' after expression."],
      ["say(1 2);", "[line 1:7] Error at '2': Expect ')' after arguments."],
      ["say(,);", "[line 1:5] Error at ',': Expect expression."],
      ["(1 + 2;", "[line 1:7] Error at ';': Expect ')' after expression."],
      ["[1, 2;", "[line 1:6] Error at ';': Expect ']' after list elements."],
      ["1 = 2;", "[line 1:3] Error at '=': Invalid assignment target."],
      ["(a) = 2;", "[line 1:5] Error at '=': Invalid assignment target."],
      [") x;", "[line 1:1] Error at ')': Expect expression."],
      ['say("hi" 1);', "[line 1:10] Error at '1': Expect ')' after arguments."],
    ];

    for (const [source, message] of cases) {
      it(`reports ${JSON.stringify(source)}`, () => {
        assert.equal(parseError(source).message, message);
      });
    }

    it("reports an invalid assignment target before a later error", () => {
      assert.equal(
        parseError("1 = 2;\ngimme = 3;").message,
        "[line 1:3] Error at '=': Invalid assignment target."
      );
    });

    it("rejects a called or negated target", () => {
      assert.equal(parseError("f() = 1;").message, "[line 1:5] Error at '=': Invalid assignment target.");
      assert.equal(parseError("-a = 1;").message, "[line 1:4] Error at '=': Invalid assignment target.");
    });

    it("quotes string lexemes in the message", () => {
      assert.equal(parseError('gimme "x" = 1;').message, `[line 1:7] Error at '"x"': Expect variable name.`);
    });

    it("flags errors at end of input", () => {
      assert.equal(parseError("fam f() {").atEnd, true);
      assert.equal(parseError("gimme x = ;").atEnd, false);
    });

    it("carries a diagnostic", () => {
      const err = parseError("say(1)");
      assert.equal(err.diagnostic.code, "E_PARSE");
      assert.equal(err.diagnostic.span?.file, "test.rdm");
      assert.equal(err.line, 1);
      assert.equal(err.column, 7);
      assert.equal(err.reason, "Expect ';' after expression.");
    });
  });

  describe("parse()", () => {
    it("returns the parse diagnostic instead of throwing", () => {
      const result = parse("gimme x = ;", "test.rdm");
      assert.equal(result.program, undefined);
      assert.equal(result.diagnostics.length, 1);
      assert.equal(result.diagnostics[0]?.message, "[line 1:11] Error at ';': Expect expression.");
      assert.equal(result.incomplete, false);
    });

    it("marks input that ended too early as incomplete", () => {
      const result = parse("fam f() {\n  say(1);", "test.rdm");
      assert.equal(result.incomplete, true);
    });

    it("does not treat an earlier invalid target as incomplete input", () => {
      const result = parse("1 = 2; say(", "test.rdm");
      assert.equal(result.incomplete, false);
      assert.deepEqual(
        result.diagnostics.map((d) => d.message),
        ["[line 1:3] Error at '=': Invalid assignment target."]
      );
    });

    it("returns lex diagnostics alongside a parsed program", () => {
      const result = parse("say(1); @", "test.rdm");
      assert.ok(result.program);
      assert.equal(result.program.statements.length, 1);
      assert.deepEqual(
        result.diagnostics.map((d) => d.message),
        ["Unexpected character '@'."]
      );
    });
  });
});
