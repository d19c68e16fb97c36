import {
  Compiler,
  Format,
  heapOverflowStatus,
  heapSize,
} from "./compiler";
import { Frame, slotSize } from "./state";
import { Target } from "./target";

const compare: Record<string, string> = {
  ">": "setg",
  "<": "setl",
  "==": "sete",
  "!=": "setne",
};

/** NASM, Intel syntax. Results live in `rax`; `rcx` holds the right operand. */
export class X86_64Compiler extends Compiler {
  constructor(target: Target) {
    super(target, ";", ".");
  }
  protected header(): void {
    this.asm.raw("bits 64").raw("default rel").blank();
    this.asm.raw(`global ${this.target.entrySymbol}`);
    if (this.target.output === "libc") {
      this.asm.raw(`extern ${this.cSymbol("printf")}`);
    }
    this.asm.blank().raw("section .text");
  }
  protected entry(mainLabel: string): void {
    this.asm.label(this.target.entrySymbol);
    const { syscalls } = this.target;
    if (syscalls) {
      this.asm.ops(
        `call ${mainLabel}`,
        "mov rdi, rax",
        `mov rax, ${syscalls.exit}`,
        syscalls.instruction
      );
      return;
    }
    // the C runtime passes main's return value to exit()
    this.asm.ops(
      "push rbp",
      "mov rbp, rsp",
      `call ${mainLabel}`,
      "mov rsp, rbp",
      "pop rbp",
      "ret"
    );
  }
  protected prologue(label: string, frame: Frame): void {
    this.asm.label(label).ops("push rbp", "mov rbp, rsp");
    if (frame.size > 0) this.asm.op(`sub rsp, ${frame.size}`);
    // callers may arrive with pending pushes; C calls need 16-byte alignment
    this.asm.op("and rsp, -16");
  }
  protected epilogue(): void {
    this.asm.ops("mov rsp, rbp", "pop rbp", "ret");
  }
  protected loadParameter(index: number): void {
    // saved rbp and the return address sit between rbp and the arguments
    this.asm.op(`mov rax, [rbp+${16 + index * slotSize}]`);
  }
  protected loadInt(value: bigint): void {
    this.asm.op(`mov rax, ${value}`);
  }
  protected loadAddress(label: string): void {
    this.asm.op(`lea rax, [rel ${label}]`);
  }
  protected loadLocal(offset: number): void {
    this.asm.op(`mov rax, [rbp-${offset}]`);
  }
  protected storeLocal(offset: number): void {
    this.asm.op(`mov [rbp-${offset}], rax`);
  }
  protected pushResult(): void {
    this.asm.op("push rax");
  }
  protected popOperands(): void {
    this.asm.ops("mov rcx, rax", "pop rax");
  }
  protected arithmetic(operator: string): void {
    switch (operator) {
      case "+":
        this.asm.op("add rax, rcx");
        return;
      case "-":
        this.asm.op("sub rax, rcx");
        return;
      case "*":
        this.asm.op("imul rax, rcx");
        return;
      case "/":
        this.asm.ops("cqo", "idiv rcx");
        return;
    }
    const set = compare[operator];
    if (!set) this.unknownOperator(operator);
    this.asm.ops("cmp rax, rcx", `${set} al`, "movzx rax, al");
  }
  protected concat(): void {
    this.asm.op("call rt_concat");
  }
  protected branchIfNonZero(label: string): void {
    this.asm.ops("cmp rax, 0", `jne ${label}`);
  }
  protected jump(label: string): void {
    this.asm.op(`jmp ${label}`);
  }
  protected pushArgument(): void {
    this.asm.op("push rax");
  }
  protected callFunction(label: string): void {
    this.asm.op(`call ${label}`);
  }
  protected dropArguments(count: number): void {
    this.asm.op(`add rsp, ${count * slotSize}`);
  }
  // NASM resolves the forward `equ`, so the length comes from the data section
  protected writeStatic(label: string): void {
    this.syscallWrite(`lea rsi, [rel ${label}]`, `mov rdx, ${label}_len`);
  }
  protected writeValue(): void {
    this.asm.op("call rt_print");
  }
  protected writeNewline(): void {
    this.syscallWrite("lea rsi, [rel rt_newline]", "mov rdx, 1");
  }
  private syscallWrite(address: string, length: string): void {
    const { syscalls } = this.target;
    // istanbul ignore next
    if (!syscalls) throw new Error("syscall output on a libc target");
    this.asm.ops(
      `mov rax, ${syscalls.write}`,
      "mov rdi, 1",
      address,
      length,
      syscalls.instruction
    );
  }
  protected printf(format: Format): void {
    const [fmtRegister, argRegister] = this.target.cArgRegisters;
    const { shadowSpace } = this.target;
    this.asm.ops(
      `mov ${argRegister}, rax`,
      `lea ${fmtRegister}, [rel fmt_${format}]`
    );
    // variadic calls report vector register usage in al (System V only)
    if (shadowSpace === 0) this.asm.op("xor eax, eax");
    if (shadowSpace > 0) this.asm.op(`sub rsp, ${shadowSpace}`);
    const plt = this.target.os === "linux" ? " wrt ..plt" : "";
    this.asm.op(`call ${this.cSymbol("printf")}${plt}`);
    if (shadowSpace > 0) this.asm.op(`add rsp, ${shadowSpace}`);
  }
  protected runtime(): void {
    if (this.usesPrintRoutine) this.printRoutine();
    if (this.usesConcat) this.concatRoutine();
  }
  // rax: NUL-terminated string
  private printRoutine(): void {
    const { syscalls } = this.target;
    // istanbul ignore next
    if (!syscalls) throw new Error("syscall output on a libc target");
    this.asm.blank().label("rt_print").ops("mov rsi, rax", "xor rdx, rdx");
    this.asm.label(".length").ops(
      "cmp byte [rsi+rdx], 0",
      "je .write",
      "inc rdx",
      "jmp .length"
    );
    this.asm.label(".write").ops(
      `mov rax, ${syscalls.write}`,
      "mov rdi, 1",
      syscalls.instruction,
      "ret"
    );
  }
  // rax, rcx: NUL-terminated strings; returns a fresh copy of both in rax
  private concatRoutine(): void {
    this.asm.blank();
    if (!this.target.syscalls) this.asm.raw(`extern ${this.cSymbol("exit")}`);
    // rdx: bytes in use once both strings are copied, less the terminator
    this.asm
      .label("rt_concat")
      .ops("mov rdx, [rel rt_heap_used]", "mov r8, rax");
    this.asm.label(".measure_left").ops(
      "cmp byte [r8], 0",
      "je .measured_left",
      "inc r8",
      "inc rdx",
      "jmp .measure_left"
    );
    this.asm.label(".measured_left").op("mov r8, rcx");
    this.asm.label(".measure_right").ops(
      "cmp byte [r8], 0",
      "je .measured",
      "inc r8",
      "inc rdx",
      "jmp .measure_right"
    );
    this.asm.label(".measured").ops(
      `cmp rdx, ${heapSize}`,
      "jae .overflow",
      "lea rdx, [rel rt_heap]",
      "add rdx, [rel rt_heap_used]",
      "mov r8, rdx"
    );
    this.asm.label(".left").ops(
      "mov r9b, [rax]",
      "test r9b, r9b",
      "jz .right",
      "mov [rdx], r9b",
      "inc rax",
      "inc rdx",
      "jmp .left"
    );
    this.asm.label(".right").ops(
      "mov r9b, [rcx]",
      "mov [rdx], r9b",
      "inc rcx",
      "inc rdx",
      "test r9b, r9b",
      "jnz .right",
      "lea r9, [rel rt_heap]",
      "sub rdx, r9",
      "mov [rel rt_heap_used], rdx",
      "mov rax, r8",
      "ret"
    );
    this.asm.label(".overflow");
    this.exitWithStatus(heapOverflowStatus);
  }
  private exitWithStatus(status: number): void {
    const { syscalls } = this.target;
    if (syscalls) {
      this.asm.ops(
        `mov rdi, ${status}`,
        `mov rax, ${syscalls.exit}`,
        syscalls.instruction
      );
      return;
    }
    const [statusRegister] = this.target.cArgRegisters;
    const { shadowSpace } = this.target;
    this.asm.ops("and rsp, -16", `mov ${statusRegister}, ${status}`);
    if (shadowSpace > 0) this.asm.op(`sub rsp, ${shadowSpace}`);
    const plt = this.target.os === "linux" ? " wrt ..plt" : "";
    this.asm.op(`call ${this.cSymbol("exit")}${plt}`);
  }
  protected data(): void {
    const strings = this.strings.entries();
    const hasReadOnly =
      strings.length > 0 || this.usesNewline || this.formats.size > 0;
    if (hasReadOnly) {
      this.asm.blank().raw(`section ${this.target.readOnlySection}`);
    }
    for (const { label, value } of strings) {
      this.asm.label(label);
      if (value.length > 0) this.asm.op(`db ${nasmBytes(value)}`);
      if (this.target.syscalls) this.asm.raw(`${label}_len equ $ - ${label}`);
      this.asm.op("db 0");
    }
    if (this.usesNewline) this.asm.label("rt_newline").op("db 10");
    if (this.formats.has("println")) {
      this.asm.label("fmt_println").op('db "%s", 10, 0');
    }
    if (this.formats.has("print")) {
      this.asm.label("fmt_print").op('db "%s", 0');
    }
    if (this.usesConcat) {
      this.asm.blank().raw("section .bss");
      this.asm.label("rt_heap_used").op("resq 1");
      this.asm.label("rt_heap").op(`resb ${heapSize}`);
    }
  }
}

/**
 * Render a string as NASM `db` operands: printable runs quoted, everything else
 * (quotes, control characters, non-ASCII bytes) as numbers.
 */
export function nasmBytes(value: string): string {
  const parts: string[] = [];
  let run = "";
  for (const byte of Buffer.from(value, "utf8")) {
    if (byte >= 0x20 && byte < 0x7f && byte !== 0x22) {
      run += String.fromCharCode(byte);
      continue;
    }
    if (run) parts.push(`"${run}"`);
    run = "";
    parts.push(String(byte));
  }
  if (run) parts.push(`"${run}"`);
  return parts.join(", ");
}
