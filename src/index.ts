import { analyze } from "./analyzer";
import { Program } from "./ast";
import { generate } from "./codegen";
import { defaultTarget, resolveTarget, TargetSpec } from "./codegen/target";
import { CompileError } from "./errors";
import { IRProgram } from "./ir";
import { lex } from "./lexer";
import { parse } from "./parser";

export { lex } from "./lexer";
export type { LexOptions } from "./lexer";
export { parse } from "./parser";
export { analyze } from "./analyzer";
export { generate } from "./codegen";
export {
  parseTarget,
  resolveTarget,
  formatTarget,
  defaultTarget,
} from "./codegen/target";
export type { Target, TargetSpec } from "./codegen/target";
export * from "./errors";
export type { Token } from "./token";
export type { Program } from "./ast";
export type { IRProgram } from "./ir";

export type CompileOptions = {
  target?: TargetSpec;
  /** Reject unrecognized characters instead of skipping them. */
  strict?: boolean;
};

export type CompileResult =
  | { ok: true; assembly: string; program: Program; ir: IRProgram }
  | { ok: false; error: CompileError };

export function compile(
  source: string,
  options: CompileOptions = {}
): CompileResult {
  try {
    return { ok: true, ...compileOrThrow(source, options) };
  } catch (error) {
    if (error instanceof CompileError) return { ok: false, error };
    throw error;
  }
}

export function compileOrThrow(source: string, options: CompileOptions = {}) {
  // resolve first so a bad target fails before any work is done
  const target = resolveTarget(options.target ?? defaultTarget);
  const program = parse(lex(source, { strict: options.strict }));
  const ir = analyze(program);
  const assembly = generate(ir, target);
  return { assembly, program, ir };
}

/**
 * `file:line:col: <stage> error <code>: message`, without the position when the
 * error has none.
 */
export function formatError(error: CompileError, file: string): string {
  const where =
    error.line === null ? file : `${file}:${error.line}:${error.col ?? 0}`;
  return `${where}: ${error.stage} error ${error.code}: ${error.message}`;
}
