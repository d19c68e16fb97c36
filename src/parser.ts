import { Expr, Func, Operator, Param, Program, Stmt, Type } from "./ast";
import { ParseError, Position } from "./errors";
import { describe, isTag, Tag, Token, TokenOf } from "./token";

interface IParseState {
  token(): Token;
  peek(): Token;
  advance(): void;
}

type Parser<T> = (state: IParseState) => T;

const endOfInput: Token = { tag: "endOfInput", line: 0, col: 0 };
class ParseState implements IParseState {
  private index = 0;
  constructor(private tokens: Token[]) {}
  token(): Token {
    return this.tokens[this.index] ?? endOfInput;
  }
  peek(): Token {
    return this.tokens[this.index + 1] ?? endOfInput;
  }
  advance(): void {
    this.index++;
  }
}

export function parse(input: Token[]): Program {
  return matchProgram(new ParseState(input));
}

// prettier-ignore
const operators: readonly Operator[] = [
  "+", "-", "*", "/", ">", "<", "==", "!=",
];

const matchProgram: Parser<Program> = (state) => {
  const functions = parseUntil(state, matchFunction, checkEndOfInput);
  return { functions };
};

const matchFunction: Parser<Func> = (state) => {
  const start = position(match(state, "func"));
  const name = match(state, "identifier").value;
  match(state, "(");
  const parameters = commaList(state, checkParam, "parameter");
  match(state, ")");
  match(state, ":");
  const returnType = matchType(state);
  const body = matchBlock(state);
  return { name, parameters, returnType, body, ...start };
};

const checkParam: Parser<Param | null> = (state) => {
  const name = check(state, "identifier");
  if (!name) return null;
  match(state, ":");
  const type = matchType(state);
  return { name: name.value, type };
};

const matchType: Parser<Type> = (state) => {
  if (check(state, "int")) return "int";
  if (check(state, "string")) return "string";
  const token = state.token();
  throw new ParseError("type", describe(token), position(token));
};

const matchStatement: Parser<Stmt> = (state) => {
  const token = state.token();
  const start = position(token);
  switch (token.tag) {
    case "let": {
      state.advance();
      const name = match(state, "identifier").value;
      match(state, ":");
      const type = matchType(state);
      match(state, "=");
      const expr = matchExpr(state);
      match(state, ";");
      return { tag: "let", name, type, expr, ...start };
    }
    case "return": {
      state.advance();
      const expr = matchExpr(state);
      match(state, ";");
      return { tag: "return", expr, ...start };
    }
    case "if": {
      state.advance();
      const predicate = matchExpr(state);
      const thenBlock = matchBlock(state);
      match(state, "else");
      const elseBlock = matchBlock(state);
      return { tag: "if", predicate, thenBlock, elseBlock, ...start };
    }
    default: {
      const expr = matchExpr(state);
      match(state, ";");
      return { tag: "expr", expr, ...start };
    }
  }
};

// every operator binds equally tightly, left to right
const matchExpr: Parser<Expr> = (state) => {
  let left = matchPrimary(state);
  while (true) {
    const operator = checkOperator(state);
    if (!operator) return left;
    const right = matchPrimary(state);
    const { line, col } = left;
    left = { tag: "binaryOp", left, operator, right, line, col };
  }
};

const checkOperator: Parser<Operator | null> = (state) => {
  const tag = state.token().tag;
  const operator = operators.find((op) => op === tag);
  if (!operator) return null;
  state.advance();
  return operator;
};

const matchPrimary: Parser<Expr> = (state) => {
  const token = state.token();
  const start = position(token);
  switch (token.tag) {
    case "integer":
      state.advance();
      return { tag: "integer", value: token.value, ...start };
    case "stringLiteral":
      state.advance();
      return { tag: "string", value: token.value, ...start };
    case "identifier": {
      if (state.peek().tag !== "(") {
        state.advance();
        return { tag: "identifier", value: token.value, ...start };
      }
      state.advance();
      state.advance();
      const args = commaList(state, checkExpr, "expression");
      match(state, ")");
      return { tag: "call", callee: token.value, args, ...start };
    }
    case "(": {
      state.advance();
      const expr = matchExpr(state);
      match(state, ")");
      return expr;
    }
    default:
      throw new ParseError("expression", describe(token), start);
  }
};

const checkExpr: Parser<Expr | null> = (state) => {
  if (!startsExpr(state.token().tag)) return null;
  return matchExpr(state);
};

function startsExpr(tag: Tag): boolean {
  return (
    tag === "integer" ||
    tag === "stringLiteral" ||
    tag === "identifier" ||
    tag === "("
  );
}

const checkEndOfInput: Parser<boolean> = (state) => {
  return !!check(state, "endOfInput");
};

function checkEndBrace(state: IParseState): boolean {
  return !!check(state, "}");
}

const matchBlock: Parser<Stmt[]> = (state) => {
  match(state, "{");
  return parseUntil(state, matchStatement, checkEndBrace);
};

// utilities

function position(token: Token): Position {
  return { line: token.line, col: token.col };
}

function check<T extends Tag>(state: IParseState, tag: T): TokenOf<T> | null {
  const token = state.token();
  if (isTag(token, tag)) {
    state.advance();
    return token;
  } else {
    return null;
  }
}

function match<T extends Tag>(state: IParseState, tag: T): TokenOf<T> {
  const token = state.token();
  if (isTag(token, tag)) {
    state.advance();
    return token;
  } else {
    throw new ParseError(`'${tag}'`, describe(token), position(token));
  }
}

function parseUntil<T>(
  state: IParseState,
  parseValue: Parser<T>,
  parseEnd: Parser<boolean>
): T[] {
  const out: T[] = [];
  while (!parseEnd(state)) {
    out.push(parseValue(state));
  }
  return out;
}

// a comma must be followed by another item
function commaList<T>(
  state: IParseState,
  checkParser: Parser<T | null>,
  expected: string
): T[] {
  const out: T[] = [];
  let res = checkParser(state);
  while (res !== null) {
    out.push(res);
    if (!check(state, ",")) break;
    res = checkParser(state);
    if (res === null) {
      const token = state.token();
      throw new ParseError(expected, describe(token), position(token));
    }
  }
  return out;
}
