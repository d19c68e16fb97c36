import { Operator, Param, Type } from "./ast";

export type IRExpr =
  | { tag: "int"; value: bigint }
  | { tag: "str"; value: string }
  | { tag: "var"; name: string }
  | {
      tag: "binary";
      left: IRExpr;
      operator: Operator;
      right: IRExpr;
      type: Type;
    }
  | { tag: "call"; name: string; args: IRExpr[] };

export type IR =
  | { tag: "store"; name: string; expr: IRExpr }
  | { tag: "return"; expr: IRExpr }
  | { tag: "if"; predicate: IRExpr; thenBlock: IR[]; elseBlock: IR[] }
  | { tag: "println"; expr: IRExpr }
  | { tag: "print"; expr: IRExpr }
  | { tag: "callFunc"; name: string; args: IRExpr[] };

export type IRFunction = {
  name: string;
  parameters: Param[];
  returnType: Type;
  body: IR[];
};

export type IRProgram = { functions: IRFunction[] };

// builders, mostly for hand-written IR in tests

type IRExprLiteral = bigint | string | IRExpr;

export function expr_(value: IRExprLiteral): IRExpr {
  if (typeof value === "bigint") return { tag: "int", value };
  if (typeof value === "string") return { tag: "str", value };
  return value;
}

export function var_(name: string): IRExpr {
  return { tag: "var", name };
}

export function binary_(
  left: IRExprLiteral,
  operator: Operator,
  right: IRExprLiteral,
  type: Type = "int"
): IRExpr {
  return {
    tag: "binary",
    left: expr_(left),
    operator,
    right: expr_(right),
    type,
  };
}

export function call_(name: string, args: IRExprLiteral[]): IRExpr {
  return { tag: "call", name, args: args.map(expr_) };
}

export function store_(name: string, value: IRExprLiteral): IR {
  return { tag: "store", name, expr: expr_(value) };
}

export function return_(value: IRExprLiteral): IR {
  return { tag: "return", expr: expr_(value) };
}

export function if_(
  predicate: IRExprLiteral,
  thenBlock: IR[],
  elseBlock: IR[]
): IR {
  return { tag: "if", predicate: expr_(predicate), thenBlock, elseBlock };
}

export function println_(value: IRExprLiteral): IR {
  return { tag: "println", expr: expr_(value) };
}

export function print_(value: IRExprLiteral): IR {
  return { tag: "print", expr: expr_(value) };
}

export function callFunc_(name: string, args: IRExprLiteral[]): IR {
  return { tag: "callFunc", name, args: args.map(expr_) };
}

export function func_(
  name: string,
  parameters: Param[],
  returnType: Type,
  body: IR[]
): IRFunction {
  return { name, parameters, returnType, body };
}

export function program_(functions: IRFunction[]): IRProgram {
  return { functions };
}
