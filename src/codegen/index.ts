import { IRProgram } from "../ir";
import { noMatch } from "../utils";
import { AArch64Compiler } from "./aarch64";
import { Compiler } from "./compiler";
import { defaultTarget, resolveTarget, Target, TargetSpec } from "./target";
import { X86_64Compiler } from "./x86-64";

export function generate(
  program: IRProgram,
  target: TargetSpec | Target = defaultTarget
): string {
  return compilerFor(resolve(target)).compileProgram(program);
}

function resolve(target: TargetSpec | Target): Target {
  return "entrySymbol" in target ? target : resolveTarget(target);
}

function compilerFor(target: Target): Compiler {
  switch (target.arch) {
    case "x86_64":
      return new X86_64Compiler(target);
    case "aarch64":
      return new AArch64Compiler(target);
    // istanbul ignore next
    default:
      return noMatch(target.arch);
  }
}
