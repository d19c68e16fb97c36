import { Operator, Type } from "../ast";
import { CodegenError, ErrorCodes } from "../errors";
import { IR, IRExpr, IRFunction, IRProgram } from "../ir";
import { noMatch } from "../utils";
import { Frame, InternedStringsState, LabelState } from "./state";
import { formatTarget, Target } from "./target";
import { Writer } from "./writer";

export const entryFunction = "main";

export type Format = "println" | "print";

/** Bytes in the buffer string concatenation allocates from. */
export const heapSize = 65536;

/** Exit status of a program whose concatenations outgrow the buffer. */
export const heapOverflowStatus = 1;

/** User functions get a prefix so they never clash with C or entry symbols. */
export function funcLabel(name: string): string {
  return `fn_${name}`;
}

/**
 * Walks the IR and decides what to emit; subclasses decide how each step is
 * spelled for their architecture.
 */
export abstract class Compiler {
  protected asm: Writer;
  protected labels: LabelState;
  protected strings = new InternedStringsState();
  protected formats = new Set<Format>();
  protected usesPrintRoutine = false;
  protected usesConcat = false;
  protected usesNewline = false;
  private currentFrame: Frame | null = null;

  constructor(
    protected target: Target,
    commentPrefix: string,
    labelPrefix: string
  ) {
    this.asm = new Writer(commentPrefix);
    this.labels = new LabelState(labelPrefix);
  }

  compileProgram(program: IRProgram): string {
    if (!program.functions.some((func) => func.name === entryFunction)) {
      throw new CodegenError(
        ErrorCodes.MissingMain,
        `no '${entryFunction}' function to use as the entry point`
      );
    }
    this.asm.comment(`generated by plover for ${formatTarget(this.target)}`);
    this.header();
    this.asm.blank();
    this.entry(funcLabel(entryFunction));
    for (const func of program.functions) {
      this.asm.blank();
      this.compileFunc(func);
    }
    this.runtime();
    this.data();
    return this.asm.compile();
  }

  protected get frame(): Frame {
    // istanbul ignore next
    if (!this.currentFrame) throw new Error("not in a function");
    return this.currentFrame;
  }

  private compileFunc(func: IRFunction): void {
    const frame = new Frame(func);
    this.currentFrame = frame;
    const exit = this.labels.create("return");

    this.prologue(funcLabel(func.name), frame);
    func.parameters.forEach((param, index) => {
      this.loadParameter(index);
      this.storeLocal(frame.offset(param.name));
    });
    this.block(func.body, exit);
    // falling off the end returns 0
    this.loadInt(0n);
    this.asm.label(exit);
    this.epilogue();

    this.currentFrame = null;
  }

  private block(block: IR[], exit: string): void {
    for (const stmt of block) {
      this.stmt(stmt, exit);
    }
  }

  private stmt(stmt: IR, exit: string): void {
    switch (stmt.tag) {
      case "store":
        this.expr(stmt.expr);
        this.storeLocal(this.frame.offset(stmt.name));
        return;
      case "return":
        this.expr(stmt.expr);
        this.jump(exit);
        return;
      case "if": {
        const thenLabel = this.labels.create("then");
        const elseLabel = this.labels.create("else");
        const endLabel = this.labels.create("endif");
        this.expr(stmt.predicate);
        this.branchIfNonZero(thenLabel);
        this.jump(elseLabel);
        this.asm.label(thenLabel);
        this.block(stmt.thenBlock, exit);
        this.jump(endLabel);
        this.asm.label(elseLabel);
        this.block(stmt.elseBlock, exit);
        this.asm.label(endLabel);
        return;
      }
      case "println":
        this.output(stmt.expr, "println");
        return;
      case "print":
        this.output(stmt.expr, "print");
        return;
      case "callFunc":
        this.call(stmt.name, stmt.args);
        return;
      // istanbul ignore next
      default:
        noMatch(stmt);
    }
  }

  private output(expr: IRExpr, format: Format): void {
    if (this.target.output === "libc") {
      this.formats.add(format);
      this.expr(expr);
      this.printf(format);
      return;
    }
    if (expr.tag === "str") {
      const label = this.strings.use(expr.value);
      this.writeStatic(label, byteLength(expr.value));
    } else {
      this.usesPrintRoutine = true;
      this.expr(expr);
      this.writeValue();
    }
    if (format === "println") {
      this.usesNewline = true;
      this.writeNewline();
    }
  }

  private expr(expr: IRExpr): void {
    switch (expr.tag) {
      case "int":
        this.loadInt(expr.value);
        return;
      case "str":
        this.loadAddress(this.strings.use(expr.value));
        return;
      case "var":
        this.loadLocal(this.frame.offset(expr.name));
        return;
      case "binary":
        this.expr(expr.left);
        this.pushResult();
        this.expr(expr.right);
        this.popOperands();
        this.binary(expr.operator, expr.type);
        return;
      case "call":
        this.call(expr.name, expr.args);
        return;
      // istanbul ignore next
      default:
        noMatch(expr);
    }
  }

  private binary(operator: Operator, type: Type): void {
    if (type === "string") {
      if (operator !== "+") {
        throw new CodegenError(
          ErrorCodes.UnknownOperator,
          `operator '${operator}' is not defined for strings`
        );
      }
      this.usesConcat = true;
      this.concat();
      return;
    }
    this.arithmetic(operator);
  }

  // arguments go on the stack right to left; the caller pops them
  private call(name: string, args: IRExpr[]): void {
    for (const arg of [...args].reverse()) {
      this.expr(arg);
      this.pushArgument();
    }
    this.callFunction(funcLabel(name));
    if (args.length > 0) this.dropArguments(args.length);
  }

  protected unknownOperator(operator: string): never {
    throw new CodegenError(
      ErrorCodes.UnknownOperator,
      `unknown binary operator '${operator}'`
    );
  }

  protected cSymbol(name: string): string {
    return `${this.target.cSymbolPrefix}${name}`;
  }

  protected abstract header(): void;
  protected abstract entry(mainLabel: string): void;
  protected abstract prologue(label: string, frame: Frame): void;
  protected abstract epilogue(): void;
  protected abstract loadParameter(index: number): void;
  protected abstract loadInt(value: bigint): void;
  protected abstract loadAddress(label: string): void;
  protected abstract loadLocal(offset: number): void;
  protected abstract storeLocal(offset: number): void;
  protected abstract pushResult(): void;
  protected abstract popOperands(): void;
  protected abstract arithmetic(operator: string): void;
  protected abstract concat(): void;
  protected abstract branchIfNonZero(label: string): void;
  protected abstract jump(label: string): void;
  protected abstract pushArgument(): void;
  protected abstract callFunction(label: string): void;
  protected abstract dropArguments(count: number): void;
  protected abstract writeStatic(label: string, length: number): void;
  protected abstract writeValue(): void;
  protected abstract writeNewline(): void;
  protected abstract printf(format: Format): void;
  protected abstract runtime(): void;
  protected abstract data(): void;
}

export function byteLength(value: string): number {
  return Buffer.byteLength(value, "utf8");
}
