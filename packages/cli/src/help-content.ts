/**
 * Roadman CLI help content: a terse language reference for terminal output.
 */

export const QUICKREF = `
ROADMAN QUICK REFERENCE (v0.1.0)
================================

DECLARATIONS
  gimme x = 1;                 # mutable binding (initializer optional)
  conste limit = 10;           # constant binding
  fam add(a, b) { returnz a + b; }

STATEMENTS
  innit (cond) stmt elseway stmt   # if / else
  loopz (cond) stmt                # while
  stopit;                          # leave the innermost loop
  returnz expr;                    # leave the function
  { ... }                          # block with its own scope
  say(expr);                       # print a value

VALUES
  number: 42  2.5       string: "hi"     bool: true/false
  list: [1, "two", true]            absence: none (printed, no literal)

OPERATORS (lowest to highest)
  =   ||   &&   == !=   < <= > >=   + -   * / %   ! -(unary)   f(args)

COMMANDS
  roadman run <file|->       run a program (--trace <path>, --json)
  roadman repl               interactive session
  roadman transpile <file>   print JavaScript (--out <path>, --indent <n>)
  roadman check <file>       lex, parse and check without running
  roadman tokens <file>      dump tokens
  roadman trace <file>       summarize a JSONL trace
  roadman config             show the effective configuration

EXIT CODES: 0=ok  2=lex/parse/check  4=runtime/io

Topics: roadman help syntax|types|flow|functions|errors|transpile|config
`.trimStart();

export const TOPICS: Record<string, string> = {

// ─── SYNTAX ─────────────────────────────────────────────────────────────────
syntax: `
ROADMAN SYNTAX REFERENCE
========================

COMMENTS
  // to end of line
  /* block, may span lines */

DECLARATIONS
  gimme name;                  # binds none
  gimme name = expr;
  conste name = expr;          # reassignment is an error
  fam name(p1, p2) { body }    # named function, closes over its scope

STATEMENTS (every simple statement ends with ';')
  expr;
  innit (expr) stmt
  innit (expr) stmt elseway stmt   # elseway binds to the nearest innit
  loopz (expr) stmt
  stopit;
  returnz;  returnz expr;
  { stmt* }

EXPRESSIONS
  42  3.5  "text"  true  false  [a, b, c]
  name   name = expr   (expr)   callee(args)
  -x  !x   a * b  a / b  a % b   a + b  a - b
  a < b  a <= b  a > b  a >= b   a == b  a != b   a && b  a || b

LEXICAL RULES
  - Identifiers: letters, digits and '_', not starting with a digit
  - Numbers: digits with an optional fraction (no exponent, no leading '.')
  - Strings: double quotes, no escapes, may span lines
  - Keywords are reserved; longer words such as 'truey' are identifiers

RESERVED WORDS
  innit elseway loopz stopit switchup casez defend conste gimme fam returnz
  true false digit word boola listz mapz

See 'roadman help syntax --index' for the keyword index.
`.trimStart(),

// ─── TYPES ──────────────────────────────────────────────────────────────────
types: `
ROADMAN VALUES
==============

KINDS
  number     one floating-point type; printed with a fraction: 5 -> 5.0
  string     "text"; printed without quotes
  boolean    true / false
  none       absence; what 'gimme x;' and a bare 'returnz;' produce
  list       [1, "two", true]; printed as [1.0, two, true]
  function   printed as <fam name> or <native name>

TRUTHINESS
  Falsy: none, false, 0, ""
  Everything else is truthy, including [] and "0".

EQUALITY
  == and != never fail. Lists compare element by element, functions by
  identity, values of different kinds are never equal.

OPERATOR TYPES
  + - * / %     numbers; + also joins two strings
  < <= > >=     two numbers or two strings
  -x            number
  !x            any value (negated truthiness)
  && ||         any values; the result is the operand that decided
`.trimStart(),

// ─── FLOW ───────────────────────────────────────────────────────────────────
flow: `
ROADMAN CONTROL FLOW
====================

CONDITIONALS
  innit (n > 5) say("big"); elseway say("small");
  innit (a) innit (b) x(); elseway y();   # elseway belongs to 'innit (b)'

LOOPS
  gimme i = 0;
  loopz (i < 3) { say(i); i = i + 1; }

BREAKING OUT
  stopit;    leaves the innermost loop; outside any loop it is an error
  returnz;   leaves the function, even from inside a loop

SHORT-CIRCUIT
  a || b     evaluates b only when a is falsy
  a && b     evaluates b only when a is truthy

SCOPES
  Every block and every call opens a new scope. A declaration shadows the
  outer name until the block ends; assignment updates the nearest binding.
`.trimStart(),

// ─── FUNCTIONS ──────────────────────────────────────────────────────────────
functions: `
ROADMAN FUNCTIONS
=================

DEFINING
  fam greet(name) { say("hi " + name); }
  A declaration binds the name in the current scope; call it afterwards.

CALLING
  greet("you");
  Argument count must match the parameter count exactly.
  Calls nest to a configurable depth (maxCallDepth, default 1000).

RETURNING
  returnz expr;   returnz;   falling off the end returns none.

CLOSURES
  fam makeCounter() {
    gimme count = 0;
    fam increment() { count = count + 1; returnz count; }
    returnz increment;
  }
  Each call to makeCounter creates a separate count.

BUILT-INS
  say(value)    print a value followed by a newline
`.trimStart(),

// ─── ERRORS ─────────────────────────────────────────────────────────────────
errors: `
ROADMAN DIAGNOSTICS
===================

FORMAT
  pretty:  error[CODE]: message
             --> file:line:col
  json:    {"code":"...","message":"...","span":{...}}
  Choose with --json or the 'diagnostics' config key.

LEXING AND PARSING (exit 2)
  E_LEX                 unexpected character, unterminated string
  E_PARSE               [line L:C] Error at 'x': reason (first error only)

CHECKS (exit 2)
  E_BREAK_OUTSIDE_LOOP  stopit with no enclosing loop
  E_RETURN_OUTSIDE_FN   returnz at top level
  E_DUP_PARAM           a parameter name used twice
  E_CONST_ASSIGN        assignment to a conste binding

RUNTIME (exit 4; the program stops, the REPL keeps going)
  E_UNDEFINED           read or assignment of an unknown name
  E_TYPE                operand of the wrong kind
  E_DIV_ZERO            division or modulo by zero
  E_NOT_CALLABLE        calling something that is not a function
  E_ARITY               wrong number of arguments
  E_STACK               call depth over maxCallDepth
  E_CONTROL             stopit/returnz reaching the top level
  E_CONST_ASSIGN        assignment to a constant from an earlier REPL line

HOST
  E_IO                  file read/write failure (exit 4)
  E_CONFIG              config file skipped (warning only)
`.trimStart(),

// ─── TRANSPILE ──────────────────────────────────────────────────────────────
transpile: `
ROADMAN TO JAVASCRIPT
=====================

  roadman transpile prog.rdm            # print to stdout
  roadman transpile prog.rdm --out p.js # write a file
  roadman transpile prog.rdm --indent 4

MAPPING
  gimme x = 1;     ->  let x = 1;
  conste k = 2;    ->  const k = 2;
  fam f(a) {...}   ->  function f(a) {...}
  innit/elseway    ->  if/else
  loopz            ->  while
  stopit/returnz   ->  break/return
  say(x)           ->  console.log(x)

NOTES
  Parentheses are added only where precedence needs them; explicit
  grouping is kept. Strings are emitted as JavaScript string literals.
  Output follows JavaScript semantics: numbers print without '.0' and
  division by zero gives Infinity instead of an error.
`.trimStart(),

// ─── CONFIG ─────────────────────────────────────────────────────────────────
config: `
ROADMAN CONFIGURATION
=====================

LOOKUP (first valid file wins)
  ./.roadmanrc.json
  ~/.roadman/config.json
  built-in defaults

KEYS
  version        1
  prompt         REPL prompt                      default "> "
  indent         transpiler indent, 0-8           default 2
  maxCallDepth   positive integer                 default 1000
  diagnostics    "pretty" or "json"               default "pretty"

Unknown keys or bad values make the whole file invalid; it is skipped with
a warning and the next location is tried.

  roadman config          # effective values and their source
  roadman config --json
`.trimStart(),

};

export const TOPIC_LIST = Object.keys(TOPICS);
