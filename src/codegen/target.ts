import { TargetError } from "../errors";

export type Arch = "x86_64" | "aarch64";
export type OS = "linux" | "macos" | "windows";
export type OutputStrategy = "syscall" | "libc";

export type TargetSpec = { arch: Arch; os: OS; output?: OutputStrategy };

export type Syscalls = {
  write: number;
  exit: number;
  /** Register holding the syscall number. */
  register: string;
  instruction: string;
};

export type Target = {
  arch: Arch;
  os: OS;
  output: OutputStrategy;
  /** Symbol the loader (or C runtime) jumps to. */
  entrySymbol: string;
  /** Prefix the platform puts on C symbols, e.g. `_printf` on macOS. */
  cSymbolPrefix: string;
  /** Integer argument registers of the platform C ABI, in order. */
  cArgRegisters: readonly string[];
  /** Bytes the caller reserves above the return address for C calls. */
  shadowSpace: number;
  /** Variadic C arguments are passed on the stack (Apple arm64). */
  variadicOnStack: boolean;
  syscalls: Syscalls | null;
  readOnlySection: string;
};

export const defaultTarget: TargetSpec = { arch: "x86_64", os: "linux" };

const arches: readonly Arch[] = ["x86_64", "aarch64"];
const systems: readonly OS[] = ["linux", "macos", "windows"];
const strategies: readonly OutputStrategy[] = ["syscall", "libc"];

const archAliases = new Map<string, Arch>([
  ["x86_64", "x86_64"],
  ["x86-64", "x86_64"],
  ["x64", "x86_64"],
  ["amd64", "x86_64"],
  ["aarch64", "aarch64"],
  ["arm64", "aarch64"],
]);

const osAliases = new Map<string, OS>([
  ["linux", "linux"],
  ["macos", "macos"],
  ["darwin", "macos"],
  ["windows", "windows"],
  ["win32", "windows"],
]);

const x86Syscalls: Record<OS, Syscalls | null> = {
  linux: { write: 1, exit: 60, register: "rax", instruction: "syscall" },
  macos: {
    write: 0x2000004,
    exit: 0x2000001,
    register: "rax",
    instruction: "syscall",
  },
  windows: null,
};

const armSyscalls: Record<OS, Syscalls | null> = {
  linux: { write: 64, exit: 93, register: "x8", instruction: "svc #0" },
  macos: { write: 4, exit: 1, register: "x16", instruction: "svc #0x80" },
  windows: null,
};

function defaultOutput(os: OS): OutputStrategy {
  return os === "linux" ? "syscall" : "libc";
}

function entrySymbol(os: OS, output: OutputStrategy): string {
  if (os === "windows") return "main";
  if (os === "macos") return "_main";
  return output === "syscall" ? "_start" : "main";
}

function cArgRegisters(arch: Arch, os: OS): readonly string[] {
  if (arch === "aarch64") {
    return ["x0", "x1", "x2", "x3", "x4", "x5", "x6", "x7"];
  }
  return os === "windows"
    ? ["rcx", "rdx", "r8", "r9"]
    : ["rdi", "rsi", "rdx", "rcx", "r8", "r9"];
}

function readOnlySection(arch: Arch, os: OS): string {
  if (os === "windows") return arch === "x86_64" ? ".rdata" : '.rdata,"dr"';
  if (os === "macos" && arch === "aarch64") return "__TEXT,__const";
  return ".rodata";
}

/**
 * Resolve a target spec into the descriptor the generator works from. Done once
 * per compilation.
 */
export function resolveTarget(spec: TargetSpec): Target {
  const { arch, os } = spec;
  const output = spec.output ?? defaultOutput(os);
  const syscalls = (arch === "x86_64" ? x86Syscalls : armSyscalls)[os];
  if (output === "syscall" && !syscalls) {
    throw new TargetError(`${arch}-${os} has no raw syscall output; use libc`);
  }
  return {
    arch,
    os,
    output,
    entrySymbol: entrySymbol(os, output),
    cSymbolPrefix: os === "macos" ? "_" : "",
    cArgRegisters: cArgRegisters(arch, os),
    shadowSpace: arch === "x86_64" && os === "windows" ? 32 : 0,
    variadicOnStack: arch === "aarch64" && os === "macos",
    syscalls: output === "syscall" ? syscalls : null,
    readOnlySection: readOnlySection(arch, os),
  };
}

/**
 * Parse `arch-os[-output]`, e.g. `x86_64-linux`, `arm64-macos`,
 * `aarch64-linux-libc`.
 */
export function parseTarget(text: string): TargetSpec {
  const [archName = "", osName = "", outputName, ...rest] = text
    .trim()
    .toLowerCase()
    .split("-")
    .reduce<string[]>(joinX86Alias, []);
  const arch = archAliases.get(archName);
  const os = osAliases.get(osName);
  if (!arch || !os || rest.length > 0) {
    const shape =
      `<${arches.join("|")}>-<${systems.join("|")}>` +
      `[-${strategies.join("|")}]`;
    throw new TargetError(`unknown target '${text}' (expected ${shape})`);
  }
  if (outputName === undefined) return { arch, os };
  const output = strategies.find((s) => s === outputName);
  if (!output) {
    const expected = strategies.join("|");
    throw new TargetError(
      `unknown output strategy '${outputName}' (expected ${expected})`
    );
  }
  return { arch, os, output };
}

// `x86-64` contains the separator; glue it back together
function joinX86Alias(parts: string[], part: string): string[] {
  if (part === "64" && parts[parts.length - 1] === "x86") {
    return [...parts.slice(0, -1), "x86-64"];
  }
  return [...parts, part];
}

export function formatTarget(target: Target): string {
  return `${target.arch}-${target.os}-${target.output}`;
}
