import { Position } from "./errors";

export type Type = "int" | "string";

export type Operator = "+" | "-" | "*" | "/" | ">" | "<" | "==" | "!=";

export type Program = { functions: Func[] };

export type Param = { name: string; type: Type };

export type Func = {
  name: string;
  parameters: Param[];
  returnType: Type;
  body: Stmt[];
} & Position;

export type Stmt = (
  | { tag: "let"; name: string; type: Type; expr: Expr }
  | { tag: "expr"; expr: Expr }
  | { tag: "return"; expr: Expr }
  | { tag: "if"; predicate: Expr; thenBlock: Stmt[]; elseBlock: Stmt[] }
) &
  Position;

export type Expr = (
  | { tag: "integer"; value: bigint }
  | { tag: "string"; value: string }
  | { tag: "identifier"; value: string }
  | { tag: "binaryOp"; left: Expr; operator: Operator; right: Expr }
  | { tag: "call"; callee: string; args: Expr[] }
) &
  Position;
