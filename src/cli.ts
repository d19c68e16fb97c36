#!/usr/bin/env node
import { readFile, writeFile } from "node:fs/promises";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";

import { analyze } from "./analyzer";
import { generate } from "./codegen";
import {
  defaultTarget,
  parseTarget,
  resolveTarget,
  Target,
} from "./codegen/target";
import { CompileError } from "./errors";
import { formatError } from "./index";
import { lex } from "./lexer";
import { parse } from "./parser";

const emitKinds = ["tokens", "ast", "ir", "asm"] as const;
type EmitKind = (typeof emitKinds)[number];

type CliOptions = {
  inputFile: string;
  outputPath: string | null;
  target: Target;
  strict: boolean;
  emit: EmitKind;
  verbose: boolean;
};

type CliExit = { code: number };

export type CliIO = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => console.error(text),
};

export function usage(): string {
  return [
    "ploverc [options] <file.plv>",
    "",
    "Options:",
    "  -o, --output <file>   Write output to <file> instead of stdout",
    "  -t, --target <triple> arch-os[-output], e.g. arm64-macos-libc",
    "      --strict          Reject unrecognized characters",
    "      --emit <kind>     tokens|ast|ir|asm (default: asm)",
    "  -v, --verbose         Print stage timings to stderr",
    "  -V, --version         Print version",
    "  -h, --help            Show help",
    "",
  ].join("\n");
}

class CliError extends Error {
  name = "CliError";
}

function fail(message: string): never {
  throw new CliError(message);
}

function version(): string {
  // the same relative path works from src/ and from dist/
  const text = readFileSync(resolve(__dirname, "..", "package.json"), "utf8");
  const pkg: unknown = JSON.parse(text);
  if (pkg && typeof pkg === "object" && "version" in pkg) {
    return String(pkg.version);
  }
  return "0.0.0";
}

function isEmitKind(value: string): value is EmitKind {
  return emitKinds.some((kind) => kind === value);
}

export function parseArgs(argv: string[], io: CliIO): CliOptions | CliExit {
  let outputPath: string | null = null;
  let targetText: string | null = null;
  let strict = false;
  let emit: EmitKind = "asm";
  let verbose = false;
  let inputFile: string | null = null;

  const valueOf = (flag: string, index: number): string => {
    const value = argv[index];
    if (value === undefined || value === "") fail(`${flag} expects a value`);
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "-h":
      case "--help":
        io.stdout(usage());
        return { code: 0 };
      case "-V":
      case "--version":
        io.stdout(`${version()}\n`);
        return { code: 0 };
      case "-o":
      case "--output":
        outputPath = valueOf(arg, ++i);
        continue;
      case "-t":
      case "--target":
        targetText = valueOf(arg, ++i);
        continue;
      case "--strict":
        strict = true;
        continue;
      case "--emit": {
        const kind = valueOf(arg, ++i);
        if (!isEmitKind(kind)) {
          const expected = emitKinds.join("|");
          fail(`unsupported --emit "${kind}" (expected ${expected})`);
        }
        emit = kind;
        continue;
      }
      case "-v":
      case "--verbose":
        verbose = true;
        continue;
    }
    if (arg.startsWith("-")) fail(`unknown option "${arg}"`);
    if (inputFile !== null) fail("expected exactly one <file.plv> argument");
    inputFile = arg;
  }

  if (inputFile === null) fail("expected exactly one <file.plv> argument");

  const target = resolveTarget(
    targetText === null ? defaultTarget : parseTarget(targetText)
  );
  return { inputFile, outputPath, target, strict, emit, verbose };
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// bigint literals have no JSON form
function toJSON(value: unknown): string {
  const json = JSON.stringify(
    value,
    (_, item: unknown) => (typeof item === "bigint" ? item.toString() : item),
    2
  );
  return `${json}\n`;
}

function render(options: CliOptions, source: string, io: CliIO): string {
  const timed = <T>(stage: string, run: () => T): T => {
    const start = process.hrtime.bigint();
    const result = run();
    if (options.verbose) {
      const micros = (process.hrtime.bigint() - start) / 1000n;
      io.stderr(`${stage}: ${micros}us`);
    }
    return result;
  };

  const tokens = timed("lex", () => lex(source, { strict: options.strict }));
  if (options.emit === "tokens") return toJSON(tokens);
  const program = timed("parse", () => parse(tokens));
  if (options.emit === "ast") return toJSON(program);
  const ir = timed("analyze", () => analyze(program));
  if (options.emit === "ir") return toJSON(ir);
  return timed("generate", () => generate(ir, options.target));
}

export async function runCli(
  argv: string[],
  io: CliIO = processIO
): Promise<number> {
  let inputFile = "ploverc";
  try {
    const parsed = parseArgs(argv, io);
    if ("code" in parsed) return parsed.code;
    inputFile = parsed.inputFile;

    const source = await readFile(parsed.inputFile, "utf8").catch(
      (error: unknown) =>
        fail(`cannot read ${parsed.inputFile}: ${messageOf(error)}`)
    );
    const output = render(parsed, source, io);
    if (parsed.outputPath === null) {
      io.stdout(output);
    } else {
      const { outputPath } = parsed;
      await writeFile(outputPath, output, "utf8").catch((error: unknown) =>
        fail(`cannot write ${outputPath}: ${messageOf(error)}`)
      );
    }
    return 0;
  } catch (error) {
    if (error instanceof CompileError) {
      io.stderr(formatError(error, inputFile));
      return 1;
    }
    if (error instanceof CliError) {
      io.stderr(`ploverc: ${error.message}`);
      io.stderr(usage());
      return 2;
    }
    throw error;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
