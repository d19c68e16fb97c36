import {
  Compiler,
  Format,
  heapOverflowStatus,
  heapSize,
} from "./compiler";
import { Frame } from "./state";
import { Target } from "./target";

/** `sp` must stay 16-byte aligned, so every push takes a full 16 bytes. */
export const stackSlot = 16;

// largest negative offset an unscaled load/store can encode
const maxUnscaledOffset = 256;
// largest immediate `add`/`sub` can encode
const maxArithImmediate = 4095;

const conditions: Record<string, string> = {
  ">": "gt",
  "<": "lt",
  "==": "eq",
  "!=": "ne",
};

/** GNU assembler syntax. Results live in `x0`; `x1` holds the right operand. */
export class AArch64Compiler extends Compiler {
  constructor(target: Target) {
    super(target, "//", ".L");
  }
  protected header(): void {
    this.asm.op(".text");
    this.asm.op(`.globl ${this.target.entrySymbol}`);
    this.asm.op(".p2align 2");
  }
  protected entry(mainLabel: string): void {
    this.asm.label(this.target.entrySymbol);
    const { syscalls } = this.target;
    if (syscalls) {
      this.asm.ops(
        `bl ${mainLabel}`,
        `mov ${syscalls.register}, #${syscalls.exit}`,
        syscalls.instruction
      );
      return;
    }
    this.asm.ops(
      "stp x29, x30, [sp, #-16]!",
      "mov x29, sp",
      `bl ${mainLabel}`,
      "ldp x29, x30, [sp], #16",
      "ret"
    );
  }
  protected prologue(label: string, frame: Frame): void {
    this.asm.label(label).ops("stp x29, x30, [sp, #-16]!", "mov x29, sp");
    if (frame.size > maxArithImmediate) {
      this.moveImmediate("x9", BigInt(frame.size));
      this.asm.op("sub sp, sp, x9");
    } else if (frame.size > 0) {
      this.asm.op(`sub sp, sp, #${frame.size}`);
    }
  }
  protected epilogue(): void {
    this.asm.ops("mov sp, x29", "ldp x29, x30, [sp], #16", "ret");
  }
  protected loadParameter(index: number): void {
    // the saved x29/x30 pair sits between x29 and the arguments
    this.asm.op(`ldr x0, [x29, #${16 + index * stackSlot}]`);
  }
  protected loadInt(value: bigint): void {
    this.moveImmediate("x0", value);
  }
  private moveImmediate(register: string, value: bigint): void {
    if (value < 0x10000n) {
      this.asm.op(`mov ${register}, #${value}`);
      return;
    }
    this.asm.op(`movz ${register}, #${value & 0xffffn}`);
    for (let shift = 16n; shift < 64n; shift += 16n) {
      const chunk = (value >> shift) & 0xffffn;
      if (chunk !== 0n) {
        this.asm.op(`movk ${register}, #${chunk}, lsl #${shift}`);
      }
    }
  }
  protected loadAddress(label: string): void {
    this.addressOf("x0", label);
  }
  private addressOf(register: string, label: string): void {
    if (this.target.os === "macos") {
      this.asm.ops(
        `adrp ${register}, ${label}@PAGE`,
        `add ${register}, ${register}, ${label}@PAGEOFF`
      );
    } else {
      this.asm.ops(
        `adrp ${register}, ${label}`,
        `add ${register}, ${register}, :lo12:${label}`
      );
    }
  }
  private local(offset: number): string {
    if (offset <= maxUnscaledOffset) return `[x29, #-${offset}]`;
    if (offset <= maxArithImmediate) {
      this.asm.op(`sub x9, x29, #${offset}`);
    } else {
      this.moveImmediate("x9", BigInt(offset));
      this.asm.op("sub x9, x29, x9");
    }
    return "[x9]";
  }
  protected loadLocal(offset: number): void {
    this.asm.op(`ldr x0, ${this.local(offset)}`);
  }
  protected storeLocal(offset: number): void {
    this.asm.op(`str x0, ${this.local(offset)}`);
  }
  protected pushResult(): void {
    this.asm.op(`str x0, [sp, #-${stackSlot}]!`);
  }
  protected popOperands(): void {
    this.asm.ops("mov x1, x0", `ldr x0, [sp], #${stackSlot}`);
  }
  protected arithmetic(operator: string): void {
    switch (operator) {
      case "+":
        this.asm.op("add x0, x0, x1");
        return;
      case "-":
        this.asm.op("sub x0, x0, x1");
        return;
      case "*":
        this.asm.op("mul x0, x0, x1");
        return;
      case "/":
        this.asm.op("sdiv x0, x0, x1");
        return;
    }
    const condition = conditions[operator];
    if (!condition) this.unknownOperator(operator);
    this.asm.ops("cmp x0, x1", `cset x0, ${condition}`);
  }
  protected concat(): void {
    this.asm.op("bl rt_concat");
  }
  protected branchIfNonZero(label: string): void {
    this.asm.op(`cbnz x0, ${label}`);
  }
  protected jump(label: string): void {
    this.asm.op(`b ${label}`);
  }
  protected pushArgument(): void {
    this.asm.op(`str x0, [sp, #-${stackSlot}]!`);
  }
  protected callFunction(label: string): void {
    this.asm.op(`bl ${label}`);
  }
  protected dropArguments(count: number): void {
    this.asm.op(`add sp, sp, #${count * stackSlot}`);
  }
  protected writeStatic(label: string, length: number): void {
    this.syscallWrite(label, length);
  }
  protected writeValue(): void {
    this.asm.op("bl rt_print");
  }
  protected writeNewline(): void {
    this.syscallWrite("rt_newline", 1);
  }
  private syscallWrite(label: string, length: number): void {
    const { syscalls } = this.target;
    // istanbul ignore next
    if (!syscalls) throw new Error("syscall output on a libc target");
    this.asm.op("mov x0, #1");
    this.addressOf("x1", label);
    this.moveImmediate("x2", BigInt(length));
    this.asm.ops(
      `mov ${syscalls.register}, #${syscalls.write}`,
      syscalls.instruction
    );
  }
  protected printf(format: Format): void {
    const printf = this.cSymbol("printf");
    if (this.target.variadicOnStack) {
      this.asm.op(`str x0, [sp, #-${stackSlot}]!`);
      this.addressOf("x0", `fmt_${format}`);
      this.asm.ops(`bl ${printf}`, `add sp, sp, #${stackSlot}`);
      return;
    }
    const [fmtRegister, argRegister] = this.target.cArgRegisters;
    this.asm.op(`mov ${argRegister}, x0`);
    this.addressOf(fmtRegister, `fmt_${format}`);
    this.asm.op(`bl ${printf}`);
  }
  protected runtime(): void {
    if (this.usesPrintRoutine) this.printRoutine();
    if (this.usesConcat) this.concatRoutine();
  }
  // x0: NUL-terminated string
  private printRoutine(): void {
    const { syscalls } = this.target;
    // istanbul ignore next
    if (!syscalls) throw new Error("syscall output on a libc target");
    this.asm.blank().label("rt_print").ops("mov x1, x0", "mov x2, #0");
    this.asm.label(".Lrt_print_length").ops(
      "ldrb w9, [x1, x2]",
      "cbz w9, .Lrt_print_write",
      "add x2, x2, #1",
      "b .Lrt_print_length"
    );
    this.asm.label(".Lrt_print_write").ops(
      "mov x0, #1",
      `mov ${syscalls.register}, #${syscalls.write}`,
      syscalls.instruction,
      "ret"
    );
  }
  // x0, x1: NUL-terminated strings; returns a fresh copy of both in x0
  private concatRoutine(): void {
    this.asm.blank().label("rt_concat");
    this.addressOf("x9", "rt_heap");
    this.addressOf("x10", "rt_heap_used");
    // x12: bytes in use once both strings are copied, less the terminator
    this.asm.ops("ldr x11, [x10]", "mov x12, x11", "mov x13, x0");
    this.asm.label(".Lrt_concat_measure_left").ops(
      "ldrb w14, [x13], #1",
      "cbz w14, .Lrt_concat_measured_left",
      "add x12, x12, #1",
      "b .Lrt_concat_measure_left"
    );
    this.asm.label(".Lrt_concat_measured_left").op("mov x13, x1");
    this.asm.label(".Lrt_concat_measure_right").ops(
      "ldrb w14, [x13], #1",
      "cbz w14, .Lrt_concat_measured",
      "add x12, x12, #1",
      "b .Lrt_concat_measure_right"
    );
    this.asm.label(".Lrt_concat_measured");
    this.moveImmediate("x15", BigInt(heapSize));
    this.asm.ops(
      "cmp x12, x15",
      "b.hs .Lrt_concat_overflow",
      "add x12, x9, x11",
      "mov x13, x12"
    );
    this.asm.label(".Lrt_concat_left").ops(
      "ldrb w14, [x0], #1",
      "cbz w14, .Lrt_concat_right",
      "strb w14, [x12], #1",
      "b .Lrt_concat_left"
    );
    this.asm.label(".Lrt_concat_right").ops(
      "ldrb w14, [x1], #1",
      "strb w14, [x12], #1",
      "cbnz w14, .Lrt_concat_right",
      "sub x11, x12, x9",
      "str x11, [x10]",
      "mov x0, x13",
      "ret"
    );
    this.asm
      .label(".Lrt_concat_overflow")
      .op(`mov x0, #${heapOverflowStatus}`);
    const { syscalls } = this.target;
    if (syscalls) {
      this.asm.ops(
        `mov ${syscalls.register}, #${syscalls.exit}`,
        syscalls.instruction
      );
    } else {
      this.asm.op(`bl ${this.cSymbol("exit")}`);
    }
  }
  protected data(): void {
    const strings = this.strings.entries();
    const hasReadOnly =
      strings.length > 0 || this.usesNewline || this.formats.size > 0;
    if (hasReadOnly) {
      this.asm.blank().op(`.section ${this.target.readOnlySection}`);
    }
    for (const { label, value } of strings) {
      this.asm.label(label);
      for (const directive of gnuBytes(value)) this.asm.op(directive);
      if (this.target.syscalls) this.asm.op(`.set ${label}_len, . - ${label}`);
      this.asm.op(".byte 0");
    }
    if (this.usesNewline) this.asm.label("rt_newline").op(".byte 10");
    if (this.formats.has("println")) {
      this.asm.label("fmt_println").ops('.ascii "%s"', ".byte 10, 0");
    }
    if (this.formats.has("print")) {
      this.asm.label("fmt_print").ops('.ascii "%s"', ".byte 0");
    }
    if (this.usesConcat) {
      this.asm.blank().ops(".data", ".p2align 3");
      this.asm.label("rt_heap_used").op(".quad 0");
      this.asm.label("rt_heap").op(`.space ${heapSize}`);
    }
  }
}

/**
 * Render a string as GNU `.ascii`/`.byte` directives: printable runs quoted,
 * everything else (quotes, backslashes, control characters, non-ASCII bytes)
 * as numbers.
 */
export function gnuBytes(value: string): string[] {
  const directives: string[] = [];
  let run = "";
  let bytes: number[] = [];
  const flush = () => {
    if (run) directives.push(`.ascii "${run}"`);
    if (bytes.length) directives.push(`.byte ${bytes.join(", ")}`);
    run = "";
    bytes = [];
  };
  for (const byte of Buffer.from(value, "utf8")) {
    const printable =
      byte >= 0x20 && byte < 0x7f && byte !== 0x22 && byte !== 0x5c;
    if (printable) {
      if (bytes.length) flush();
      run += String.fromCharCode(byte);
    } else {
      if (run) flush();
      bytes.push(byte);
    }
  }
  flush();
  return directives;
}
