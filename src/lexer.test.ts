import { lex } from "./lexer";
import { ErrorCodes, LexError } from "./errors";

function thrown(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error("expected an error");
}

it("lexes a let statement with positions", () => {
  expect(lex("let x: int = 42;")).toEqual([
    { tag: "let", line: 1, col: 1 },
    { tag: "identifier", value: "x", line: 1, col: 5 },
    { tag: ":", line: 1, col: 6 },
    { tag: "int", line: 1, col: 8 },
    { tag: "=", line: 1, col: 12 },
    { tag: "integer", value: 42n, line: 1, col: 14 },
    { tag: ";", line: 1, col: 16 },
    { tag: "endOfInput", line: 1, col: 17 },
  ]);
});

it("always ends with endOfInput", () => {
  expect(lex("")).toEqual([{ tag: "endOfInput", line: 1, col: 1 }]);
  expect(lex("  \n ")).toEqual([{ tag: "endOfInput", line: 2, col: 2 }]);
});

it("tracks lines and columns across newlines", () => {
  expect(lex("func\n  main")).toMatchObject([
    { tag: "func", line: 1, col: 1 },
    { tag: "identifier", value: "main", line: 2, col: 3 },
    { tag: "endOfInput", line: 2, col: 7 },
  ]);
});

it("distinguishes = from == and !=", () => {
  const tags = lex("a == b != c = d").map((token) => token.tag);
  expect(tags).toEqual([
    "identifier",
    "==",
    "identifier",
    "!=",
    "identifier",
    "=",
    "identifier",
    "endOfInput",
  ]);
});

it("lexes every punctuation token", () => {
  const tags = lex("( ) { } , : ; + - * / > <").map((token) => token.tag);
  expect(tags).toEqual([
    "(",
    ")",
    "{",
    "}",
    ",",
    ":",
    ";",
    "+",
    "-",
    "*",
    "/",
    ">",
    "<",
    "endOfInput",
  ]);
});

it("matches keywords case-sensitively", () => {
  expect(lex("func Func string strings")).toMatchObject([
    { tag: "func" },
    { tag: "identifier", value: "Func" },
    { tag: "string" },
    { tag: "identifier", value: "strings" },
    { tag: "endOfInput" },
  ]);
});

it("lexes identifiers with underscores and digits", () => {
  expect(lex("_tmp x1 123abc")).toMatchObject([
    { tag: "identifier", value: "_tmp" },
    { tag: "identifier", value: "x1" },
    { tag: "integer", value: 123n },
    { tag: "identifier", value: "abc" },
    { tag: "endOfInput" },
  ]);
});

it("keeps string bodies verbatim", () => {
  expect(lex(`"hello, world" "a\\n"`)).toMatchObject([
    { tag: "stringLiteral", value: "hello, world" },
    { tag: "stringLiteral", value: "a\\n" },
    { tag: "endOfInput" },
  ]);
});

it("reads an unterminated string to the end of input", () => {
  expect(lex(`println("abc`)).toMatchObject([
    { tag: "identifier", value: "println" },
    { tag: "(" },
    { tag: "stringLiteral", value: "abc", line: 1, col: 9 },
    { tag: "endOfInput" },
  ]);
});

it("counts newlines inside strings", () => {
  expect(lex(`"a\nb" x`)).toMatchObject([
    { tag: "stringLiteral", value: "a\nb", line: 1, col: 1 },
    { tag: "identifier", value: "x", line: 2, col: 4 },
    { tag: "endOfInput", line: 2, col: 5 },
  ]);
});

it("parses the largest 64-bit integer", () => {
  expect(lex("9223372036854775807")[0]).toEqual({
    tag: "integer",
    value: 9223372036854775807n,
    line: 1,
    col: 1,
  });
});

it("rejects integers that overflow 64 bits", () => {
  const error = thrown(() => lex("return 9223372036854775808;"));
  expect(error).toBeInstanceOf(LexError);
  expect(error).toMatchObject({
    stage: "lex",
    code: ErrorCodes.IntegerOverflow,
    line: 1,
    col: 8,
    message: "integer literal 9223372036854775808 does not fit in 64 bits",
  });
});

it("skips unrecognized characters and a bare !", () => {
  expect(lex("1 @ ! 2").map((token) => token.tag)).toEqual([
    "integer",
    "integer",
    "endOfInput",
  ]);
});

it("rejects unrecognized characters in strict mode", () => {
  expect(thrown(() => lex("1 @ 2", { strict: true }))).toMatchObject({
    stage: "lex",
    code: ErrorCodes.UnexpectedCharacter,
    message: 'unexpected character "@"',
    line: 1,
    col: 3,
  });
});
