import { Expr, Func, Program, Stmt, Type } from "./ast";
import { ErrorCodes, Position, SemanticError } from "./errors";
import { IR, IRExpr, IRFunction, IRProgram } from "./ir";
import { noMatch } from "./utils";

export const builtins: ReadonlySet<string> = new Set(["println", "print"]);

/**
 * Destination for expression statements whose value is discarded. Not a valid
 * identifier, so it can never collide with a user binding.
 */
export const scratchVar = "$discard";

type Scope = Map<string, Type>;
type Checked = { expr: IRExpr; type: Type };

export function analyze(program: Program): IRProgram {
  return Analyzer.analyze(program.functions);
}

class Analyzer {
  private functions = new Map<string, Func>();
  static analyze(functions: Func[]): IRProgram {
    const analyzer = new Analyzer(functions);
    return { functions: functions.map((func) => analyzer.checkFunc(func)) };
  }
  private constructor(functions: Func[]) {
    for (const func of functions) {
      if (builtins.has(func.name)) {
        throw new SemanticError(
          ErrorCodes.ReservedFunctionName,
          `'${func.name}' is a builtin and cannot be redefined`,
          func
        );
      }
      if (this.functions.has(func.name)) {
        throw new SemanticError(
          ErrorCodes.DuplicateFunction,
          `function '${func.name}' is already defined`,
          func
        );
      }
      if (func.name === "main") checkMainSignature(func);
      this.functions.set(func.name, func);
    }
  }
  private checkFunc(func: Func): IRFunction {
    // one flat table per function: a `let` in a branch outlives the branch
    const scope: Scope = new Map();
    for (const param of func.parameters) {
      if (scope.has(param.name)) {
        throw new SemanticError(
          ErrorCodes.DuplicateParameter,
          `duplicate parameter '${param.name}' in '${func.name}'`,
          func
        );
      }
      scope.set(param.name, param.type);
    }
    return {
      name: func.name,
      parameters: func.parameters,
      returnType: func.returnType,
      body: this.checkBlock(func.body, scope, func),
    };
  }
  private checkBlock(block: Stmt[], scope: Scope, func: Func): IR[] {
    return block.map((stmt) => this.checkStmt(stmt, scope, func));
  }
  private checkStmt(stmt: Stmt, scope: Scope, func: Func): IR {
    switch (stmt.tag) {
      case "let": {
        const { expr, type } = this.checkExpr(stmt.expr, scope);
        if (type !== stmt.type) {
          throw new SemanticError(
            ErrorCodes.LetTypeMismatch,
            `let '${stmt.name}' expected ${stmt.type}, received ${type}`,
            stmt
          );
        }
        scope.set(stmt.name, stmt.type);
        return { tag: "store", name: stmt.name, expr };
      }
      case "return": {
        const { expr, type } = this.checkExpr(stmt.expr, scope);
        if (type !== func.returnType) {
          throw new SemanticError(
            ErrorCodes.ReturnTypeMismatch,
            `return in '${func.name}' expected ${func.returnType}, ` +
              `received ${type}`,
            stmt
          );
        }
        return { tag: "return", expr };
      }
      case "if": {
        const predicate = this.checkExpr(stmt.predicate, scope);
        if (predicate.type !== "int") {
          throw new SemanticError(
            ErrorCodes.ConditionNotInt,
            `if condition expected int, received ${predicate.type}`,
            stmt.predicate
          );
        }
        return {
          tag: "if",
          predicate: predicate.expr,
          thenBlock: this.checkBlock(stmt.thenBlock, scope, func),
          elseBlock: this.checkBlock(stmt.elseBlock, scope, func),
        };
      }
      case "expr": {
        const { expr } = stmt;
        if (expr.tag === "call" && builtins.has(expr.callee)) {
          const arg = this.checkBuiltinArg(expr.callee, expr.args, scope, expr);
          return expr.callee === "println"
            ? { tag: "println", expr: arg }
            : { tag: "print", expr: arg };
        }
        if (expr.tag === "call") {
          const args = this.checkCallArgs(expr.callee, expr.args, scope, expr);
          return { tag: "callFunc", name: expr.callee, args };
        }
        const discarded = this.checkExpr(expr, scope).expr;
        return { tag: "store", name: scratchVar, expr: discarded };
      }
      // istanbul ignore next
      default:
        return noMatch(stmt);
    }
  }
  private checkBuiltinArg(
    name: string,
    args: Expr[],
    scope: Scope,
    at: Position
  ): IRExpr {
    if (args.length !== 1) {
      throw new SemanticError(
        ErrorCodes.BuiltinArgumentMismatch,
        `'${name}' expected 1 argument, received ${args.length}`,
        at
      );
    }
    const { expr, type } = this.checkExpr(args[0], scope);
    if (type !== "string") {
      throw new SemanticError(
        ErrorCodes.BuiltinArgumentMismatch,
        `'${name}' expected string, received ${type}`,
        args[0]
      );
    }
    return expr;
  }
  private checkCallArgs(
    name: string,
    args: Expr[],
    scope: Scope,
    at: Position
  ): IRExpr[] {
    const callee = this.lookupFunc(name, at);
    if (callee.parameters.length !== args.length) {
      throw new SemanticError(
        ErrorCodes.ArityMismatch,
        `'${name}' expected ${callee.parameters.length} arguments, ` +
          `received ${args.length}`,
        at
      );
    }
    return args.map((arg, i) => {
      const { expr, type } = this.checkExpr(arg, scope);
      const expected = callee.parameters[i].type;
      if (type !== expected) {
        throw new SemanticError(
          ErrorCodes.ArgumentTypeMismatch,
          `argument ${i + 1} of '${name}' expected ${expected}, ` +
            `received ${type}`,
          arg
        );
      }
      return expr;
    });
  }
  private lookupFunc(name: string, at: Position): Func {
    const func = this.functions.get(name);
    if (func) return func;
    if (builtins.has(name)) {
      throw new SemanticError(
        ErrorCodes.BuiltinAsValue,
        `builtin '${name}' has no value and can only be called as a statement`,
        at
      );
    }
    throw new SemanticError(
      ErrorCodes.UnknownFunction,
      `unknown function '${name}'`,
      at
    );
  }
  private checkExpr(expr: Expr, scope: Scope): Checked {
    switch (expr.tag) {
      case "integer":
        return { expr: { tag: "int", value: expr.value }, type: "int" };
      case "string":
        return { expr: { tag: "str", value: expr.value }, type: "string" };
      case "identifier": {
        const type = scope.get(expr.value);
        if (!type) {
          throw new SemanticError(
            ErrorCodes.UnknownVariable,
            `unknown variable '${expr.value}'`,
            expr
          );
        }
        return { expr: { tag: "var", name: expr.value }, type };
      }
      case "binaryOp": {
        const left = this.checkExpr(expr.left, scope);
        const right = this.checkExpr(expr.right, scope);
        const type = binaryType(expr.operator, left.type, right.type);
        if (!type) {
          throw new SemanticError(
            ErrorCodes.OperandTypeMismatch,
            `operator '${expr.operator}' expected int operands, ` +
              `received ${left.type} and ${right.type}`,
            expr
          );
        }
        return {
          expr: {
            tag: "binary",
            left: left.expr,
            operator: expr.operator,
            right: right.expr,
            type,
          },
          type,
        };
      }
      case "call": {
        const args = this.checkCallArgs(expr.callee, expr.args, scope, expr);
        const { returnType } = this.lookupFunc(expr.callee, expr);
        const call: IRExpr = { tag: "call", name: expr.callee, args };
        return { expr: call, type: returnType };
      }
      // istanbul ignore next
      default:
        return noMatch(expr);
    }
  }
}

// the entry point calls `main` with no arguments and exits with its result
function checkMainSignature(func: Func): void {
  if (func.parameters.length > 0 || func.returnType !== "int") {
    throw new SemanticError(
      ErrorCodes.InvalidMainSignature,
      `'main' must take no parameters and return int`,
      func
    );
  }
}

function binaryType(operator: string, left: Type, right: Type): Type | null {
  if (operator === "+" && left === "string" && right === "string") {
    return "string";
  }
  if (left === "int" && right === "int") return "int";
  return null;
}
