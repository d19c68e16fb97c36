import moo from "moo";
import { ErrorCodes, LexError, Position } from "./errors";
import { keywords, punctuation, Token, Keyword, Punctuation } from "./token";

export type LexOptions = {
  /** Reject unrecognized characters instead of skipping them. */
  strict?: boolean;
};

const maxInt64 = 9223372036854775807n;

const lexer = moo.compile({
  whitespace: { match: /[ \t\r\n]+/, lineBreaks: true },
  integer: /[0-9]+/,
  // unterminated strings run to the end of the input
  stringLiteral: { match: /"[^"]*"?/, lineBreaks: true },
  identifier: {
    match: /[A-Za-z_][A-Za-z0-9_]*/,
    type: moo.keywords(Object.fromEntries(keywords.map((k) => [k, k]))),
  },
  // longest first so that `==` wins over `=`
  ...Object.fromEntries(
    [...punctuation].sort((a, b) => b.length - a.length).map((op) => [op, op])
  ),
  unknown: { match: /[^]/, lineBreaks: true },
});

const simpleTags = new Map<string, Keyword | Punctuation>([
  ...keywords.map((k): [string, Keyword] => [k, k]),
  ...punctuation.map((op): [string, Punctuation] => [op, op]),
]);

export function lex(source: string, options: LexOptions = {}): Token[] {
  const tokens: Token[] = [];
  let line = 1;
  let col = 1;

  for (const tok of lexer.reset(source)) {
    const position: Position = { line: tok.line, col: tok.col };
    line = tok.line + tok.lineBreaks;
    col = tok.lineBreaks
      ? tok.text.length - tok.text.lastIndexOf("\n")
      : tok.col + tok.text.length;

    switch (tok.type) {
      case "whitespace":
        break;
      case "integer":
        tokens.push({
          tag: "integer",
          value: parseInteger(tok.text, position),
          ...position,
        });
        break;
      case "stringLiteral":
        tokens.push({
          tag: "stringLiteral",
          value: stringBody(tok.text),
          ...position,
        });
        break;
      case "identifier":
        tokens.push({ tag: "identifier", value: tok.value, ...position });
        break;
      case "unknown":
        if (options.strict) {
          throw new LexError(
            ErrorCodes.UnexpectedCharacter,
            `unexpected character ${JSON.stringify(tok.text)}`,
            position
          );
        }
        break;
      default: {
        const tag = simpleTags.get(tok.type ?? "");
        // istanbul ignore next
        if (!tag) throw new Error(`unmapped token type ${String(tok.type)}`);
        tokens.push({ tag, ...position });
      }
    }
  }

  tokens.push({ tag: "endOfInput", line, col });
  return tokens;
}

function parseInteger(text: string, position: Position): bigint {
  const value = BigInt(text);
  if (value > maxInt64) {
    throw new LexError(
      ErrorCodes.IntegerOverflow,
      `integer literal ${text} does not fit in 64 bits`,
      position
    );
  }
  return value;
}

function stringBody(text: string): string {
  const body = text.slice(1);
  return body.endsWith('"') ? body.slice(0, -1) : body;
}
