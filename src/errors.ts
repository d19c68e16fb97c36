export type Stage = "lex" | "parse" | "semantic" | "codegen" | "target";

/**
 * Stable error codes. Tooling may match on these; messages are free to change.
 */
export const ErrorCodes = {
  IntegerOverflow: "PLV100",
  UnexpectedCharacter: "PLV101",

  UnexpectedToken: "PLV200",

  UnknownVariable: "PLV300",
  UnknownFunction: "PLV301",
  ArityMismatch: "PLV302",
  ArgumentTypeMismatch: "PLV303",
  LetTypeMismatch: "PLV304",
  ConditionNotInt: "PLV305",
  ReturnTypeMismatch: "PLV306",
  OperandTypeMismatch: "PLV307",
  BuiltinAsValue: "PLV308",
  BuiltinArgumentMismatch: "PLV309",
  DuplicateFunction: "PLV310",
  ReservedFunctionName: "PLV311",
  DuplicateParameter: "PLV312",
  InvalidMainSignature: "PLV313",

  MissingMain: "PLV400",
  UnknownOperator: "PLV401",
  MissingSlot: "PLV402",

  UnsupportedTarget: "PLV500",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type Position = { line: number; col: number };

export class CompileError extends Error {
  readonly line: number | null;
  readonly col: number | null;
  constructor(
    public readonly stage: Stage,
    public readonly code: ErrorCode,
    message: string,
    position: Position | null = null
  ) {
    super(message);
    this.name = new.target.name;
    this.line = position ? position.line : null;
    this.col = position ? position.col : null;
  }
}

export class LexError extends CompileError {
  constructor(code: ErrorCode, message: string, position: Position) {
    super("lex", code, message, position);
  }
}

export class ParseError extends CompileError {
  constructor(
    public readonly expected: string,
    public readonly received: string,
    position: Position
  ) {
    super(
      "parse",
      ErrorCodes.UnexpectedToken,
      `expected ${expected}, received ${received}`,
      position
    );
  }
}

export class SemanticError extends CompileError {
  constructor(code: ErrorCode, message: string, position: Position | null) {
    super("semantic", code, message, position);
  }
}

export class CodegenError extends CompileError {
  constructor(code: ErrorCode, message: string) {
    super("codegen", code, message);
  }
}

export class TargetError extends CompileError {
  constructor(message: string) {
    super("target", ErrorCodes.UnsupportedTarget, message);
  }
}
