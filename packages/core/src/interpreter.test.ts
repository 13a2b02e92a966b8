/**
 * Tests for the Roadman interpreter.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { parse } from "./parser.js";
import { Interpreter, type InterpreterOptions, type TraceEvent } from "./interpreter.js";
import type { Diagnostic } from "./diagnostics.js";

interface Run {
  lines: string[];
  diagnostics: Diagnostic[];
}

function runIn(interp: Interpreter, lines: string[], source: string): Run {
  const parsed = parse(source, "test.rdm");
  assert.deepEqual(parsed.diagnostics, []);
  assert.ok(parsed.program);
  const result = interp.interpret(parsed.program);
  return { lines, diagnostics: result.diagnostics };
}

function run(source: string, options: InterpreterOptions = {}): Run {
  const lines: string[] = [];
  const interp = new Interpreter({ ...options, output: (line) => lines.push(line) });
  return runIn(interp, lines, source);
}

function output(source: string): string[] {
  const result = run(source);
  assert.deepEqual(result.diagnostics, []);
  return result.lines;
}

function failure(source: string, options: InterpreterOptions = {}): Diagnostic {
  const result = run(source, options);
  assert.equal(result.diagnostics.length, 1);
  const [diag] = result.diagnostics;
  assert.ok(diag);
  return diag;
}

describe("Roadman Interpreter", () => {
  describe("arithmetic and output", () => {
    it("respects precedence and grouping", () => {
      assert.deepEqual(output("say(10 * (4 - 2) + 5 / 2);"), ["22.5"]);
    });

    it("renders whole numbers with a fractional part", () => {
      assert.deepEqual(output("say(2 + 3);"), ["5.0"]);
    });

    it("renders lists, strings and booleans", () => {
      assert.deepEqual(output('say([1, "two", true]);'), ["[1.0, two, true]"]);
    });

    it("concatenates strings", () => {
      assert.deepEqual(output('say("road" + "man");'), ["roadman"]);
    });

    it("takes the remainder with the sign of the dividend", () => {
      assert.deepEqual(output("say(7 % 3); say(-7 % 3);"), ["1.0", "-1.0"]);
    });

    it("negates and inverts", () => {
      assert.deepEqual(output('say(-(2 * 3)); say(!0); say(!"x");'), ["-6.0", "true", "false"]);
    });

    it("compares numbers and strings", () => {
      assert.deepEqual(output('say(1 < 2); say(2 <= 2); say("b" > "a"); say(3 >= 4);'), [
        "true",
        "true",
        "true",
        "false",
      ]);
    });

    it("compares lists structurally", () => {
      assert.deepEqual(output("say([1, [2]] == [1, [2]]); say([1] != [2]);"), ["true", "true"]);
    });

    it("short-circuits and yields the deciding operand", () => {
      assert.deepEqual(output('say(0 || "x"); say(1 && 2); say(false && missing);'), ["x", "2.0", "false"]);
    });
  });

  describe("variables and scope", () => {
    it("keeps the outer binding when a block shadows it", () => {
      const src = "gimme a = 10;\n{\n  gimme a = 20;\n  say(a);\n}\nsay(a);";
      assert.deepEqual(output(src), ["20.0", "10.0"]);
    });

    it("assigns through to enclosing scopes", () => {
      assert.deepEqual(output("gimme a = 1; { a = 2; } say(a);"), ["2.0"]);
    });

    it("evaluates an assignment to the assigned value", () => {
      assert.deepEqual(output("gimme a; say(a); say(a = 5);"), ["none", "5.0"]);
    });

    it("allows redefinition in the same scope", () => {
      assert.deepEqual(output("gimme x = 1; gimme x = 2; say(x);"), ["2.0"]);
    });

    it("keeps state across programs on one interpreter", () => {
      const lines: string[] = [];
      const interp = new Interpreter({ output: (line) => lines.push(line) });
      runIn(interp, lines, "gimme total = 1;");
      runIn(interp, lines, "fam bump() { total = total + 1; }");
      runIn(interp, lines, "bump(); say(total);");
      assert.deepEqual(lines, ["2.0"]);
    });
  });

  describe("control flow", () => {
    it("branches with innit and elseway", () => {
      const src = `
        fam check(n) {
          innit (n > 5) say("greater"); elseway say("smaller");
        }
        check(10);
        check(1);
      `;
      assert.deepEqual(output(src), ["greater", "smaller"]);
    });

    it("loops while the condition holds", () => {
      const src = "gimme i = 0; loopz (i < 3) { say(i); i = i + 1; }";
      assert.deepEqual(output(src), ["0.0", "1.0", "2.0"]);
    });

    it("ends the loop on stopit", () => {
      const src = "gimme i = 0; loopz (true) { innit (i == 2) stopit; say(i); i = i + 1; }";
      assert.deepEqual(output(src), ["0.0", "1.0"]);
    });

    it("only ends the innermost loop", () => {
      const src = `
        gimme i = 0;
        loopz (i < 2) {
          gimme j = 0;
          loopz (true) { innit (j == 1) stopit; j = j + 1; }
          say(i + j);
          i = i + 1;
        }
      `;
      assert.deepEqual(output(src), ["1.0", "2.0"]);
    });

    it("returns out of a loop inside a function", () => {
      const src = `
        fam firstOver(limit) {
          gimme n = 0;
          loopz (true) {
            innit (n * n > limit) returnz n;
            n = n + 1;
          }
        }
        say(firstOver(10));
      `;
      assert.deepEqual(output(src), ["4.0"]);
    });
  });

  describe("functions", () => {
    it("recurses", () => {
      const src = `
        fam factorial(n) {
          innit (n <= 1) { returnz 1; }
          returnz n * factorial(n - 1);
        }
        say(factorial(5));
      `;
      assert.deepEqual(output(src), ["120.0"]);
    });

    it("returns none without a returnz value", () => {
      assert.deepEqual(output("fam f() { returnz; } fam g() {} say(f()); say(g());"), ["none", "none"]);
    });

    it("gives each closure its own captured scope", () => {
      const src = `
        fam makeCounter() {
          gimme count = 0;
          fam increment() {
            count = count + 1;
            returnz count;
          }
          returnz increment;
        }
        gimme a = makeCounter();
        gimme b = makeCounter();
        say(a());
        say(a());
        say(b());
      `;
      assert.deepEqual(output(src), ["1.0", "2.0", "1.0"]);
    });

    it("renders function values", () => {
      assert.deepEqual(output("fam f() {} say(f); say(say);"), ["<fam f>", "<native say>"]);
    });

    it("calls host natives passed in options", () => {
      const lines: string[] = [];
      const interp = new Interpreter({
        output: (line) => lines.push(line),
        natives: [
          {
            kind: "native",
            name: "double",
            arity: 1,
            call: ([n = null]) => (typeof n === "number" ? n * 2 : null),
          },
        ],
      });
      runIn(interp, lines, "say(double(21));");
      assert.deepEqual(lines, ["42.0"]);
    });
  });

  describe("runtime errors", () => {
    it("reports division by zero and stops the program", () => {
      const result = run("say(1); say(1 / 0); say(2);");
      assert.deepEqual(result.lines, ["1.0"]);
      assert.equal(result.diagnostics[0]?.code, "E_DIV_ZERO");
      assert.equal(result.diagnostics[0]?.message, "Division by zero.");
    });

    it("reports modulo by zero", () => {
      assert.equal(failure("say(1 % 0);").message, "Modulo by zero.");
    });

    it("keeps the interpreter usable after an error", () => {
      const lines: string[] = [];
      const interp = new Interpreter({ output: (line) => lines.push(line) });
      const bad = runIn(interp, lines, "gimme x = 1 / 0;");
      assert.equal(bad.diagnostics.length, 1);
      const good = runIn(interp, lines, "say(3);");
      assert.deepEqual(good.diagnostics, []);
      assert.deepEqual(lines, ["3.0"]);
    });

    it("names expected and actual argument counts", () => {
      const diag = failure("fam f(a) {} f(1, 2);");
      assert.equal(diag.code, "E_ARITY");
      assert.equal(diag.message, "Expected 1 arguments but got 2.");
      assert.equal(failure("say();").message, "Expected 1 arguments but got 0.");
    });

    it("reports undefined variables with their location", () => {
      const diag = failure("say(y);");
      assert.equal(diag.code, "E_UNDEFINED");
      assert.equal(diag.message, "Undefined variable 'y'.");
      assert.equal(diag.span?.startLine, 1);
      assert.equal(diag.span?.startCol, 5);
    });

    it("reports assignment to an undeclared name", () => {
      assert.equal(failure("z = 1;").message, "Undefined variable 'z'.");
    });

    it("rejects assignment to a constant", () => {
      const diag = failure("conste k = 1; k = 2;");
      assert.equal(diag.code, "E_CONST_ASSIGN");
      assert.equal(diag.message, "Cannot assign to constant 'k'.");
    });

    it("rejects calling a non-function", () => {
      const diag = failure("gimme x = 1; x();");
      assert.equal(diag.code, "E_NOT_CALLABLE");
      assert.equal(diag.message, "Can only call functions.");
    });

    it("checks operand types", () => {
      assert.equal(failure('say(1 + "a");').message, "+: Operands must be two numbers or two strings.");
      assert.equal(failure('say("a" - 1);').message, "-: Operands must be numbers.");
      assert.equal(failure('say(1 < "b");').message, "<: Operands must be two numbers or two strings.");
      assert.equal(failure('say(-"x");').message, "-: Operand must be a number.");
    });

    it("reports stray stopit and returnz", () => {
      assert.equal(failure("stopit;").message, "'stopit' outside of a loop.");
      assert.equal(failure("fam f() { stopit; } f();").message, "'stopit' outside of a loop.");
      assert.equal(failure("returnz 1;").message, "'returnz' outside of a function.");
      assert.equal(failure("returnz 1;").code, "E_CONTROL");
    });

    it("stops runaway recursion at the call depth limit", () => {
      const diag = failure("fam r(n) { returnz r(n + 1); } r(0);", { maxCallDepth: 50 });
      assert.equal(diag.code, "E_STACK");
      assert.equal(diag.message, "Stack overflow.");
    });
  });

  describe("tracing", () => {
    function traced(source: string): TraceEvent[] {
      const events: TraceEvent[] = [];
      run(source, { trace: (ev) => events.push(ev), runId: "test-run" });
      return events;
    }

    it("emits run, statement and call events in order", () => {
      const events = traced("fam f() { returnz 1; } f();");
      assert.deepEqual(
        events.map((e) => e.event),
        [
          "run_start",
          "stmt_start",
          "stmt_end",
          "stmt_start",
          "fn_call_start",
          "stmt_start",
          "stmt_end",
          "fn_call_end",
          "stmt_end",
          "run_end",
        ]
      );
      assert.ok(events.every((e) => e.runId === "test-run"));
      assert.deepEqual(events[4]?.data, { fn: "f" });
    });

    it("counts loop iterations", () => {
      const events = traced("gimme i = 0; loopz (i < 2) i = i + 1;");
      const loopEnd = events.find((e) => e.event === "loop_end");
      assert.deepEqual(loopEnd?.data, { iterations: 2 });
    });

    it("records the error on run_end", () => {
      const events = traced("say(1 / 0);");
      const last = events[events.length - 1];
      assert.equal(last?.event, "run_end");
      assert.equal(last?.data?.["error"], "E_DIV_ZERO");
      assert.equal(last?.data?.["message"], "Division by zero.");
    });
  });
});
