export const keywords = [
  "func",
  "let",
  "return",
  "if",
  "else",
  "int",
  "string",
] as const;

// prettier-ignore
export const punctuation = [
  "(", ")", "{", "}", ",", ":", ";",
  "+", "-", "*", "/", ">", "<", "=", "==", "!=",
] as const;

export type Keyword = (typeof keywords)[number];
export type Punctuation = (typeof punctuation)[number];

export type SimpleTag = Keyword | Punctuation | "endOfInput";

type SimpleToken = { [K in SimpleTag]: { tag: K } }[SimpleTag];

export type TokenKind =
  | SimpleToken
  | { tag: "integer"; value: bigint }
  | { tag: "stringLiteral"; value: string }
  | { tag: "identifier"; value: string };

export type Token = TokenKind & { line: number; col: number };

export type Tag = Token["tag"];

export type TokenOf<T extends Tag> = Extract<Token, { tag: T }>;

export function isTag<T extends Tag>(
  token: Token,
  tag: T
): token is TokenOf<T> {
  return token.tag === tag;
}

export function describe(token: Token): string {
  switch (token.tag) {
    case "integer":
      return `integer ${token.value}`;
    case "stringLiteral":
      return `string "${token.value}"`;
    case "identifier":
      return `identifier '${token.value}'`;
    case "endOfInput":
      return "end of input";
    default:
      return `'${token.tag}'`;
  }
}
