import { CodegenError, ErrorCodes } from "../errors";
import { IR, IRFunction } from "../ir";
import { alignTo } from "../utils";

export const slotSize = 8;

/**
 * Hands out label names for one generator run. The counter is shared by every
 * function, so labels never collide across the output.
 */
export class LabelState {
  private next = 0;
  constructor(private prefix: string) {}
  create(base: string): string {
    return `${this.prefix}${base}_${this.next++}`;
  }
}

export class InternedStringsState {
  private internedStrings: Map<string, string> = new Map();
  use(value: string): string {
    const label = this.internedStrings.get(value);
    if (label !== undefined) return label;

    const newLabel = `str_${this.internedStrings.size}`;
    this.internedStrings.set(value, newLabel);
    return newLabel;
  }
  entries(): Array<{ label: string; value: string }> {
    return Array.from(this.internedStrings, ([value, label]) => ({
      label,
      value,
    }));
  }
}

/**
 * Stack slots for one function. Parameters come first, then every stored name
 * in order of first appearance, both `if` branches included, so the frame
 * size is fixed before any code is written.
 */
export class Frame {
  private slots = new Map<string, number>();
  constructor(func: IRFunction) {
    for (const param of func.parameters) this.reserve(param.name);
    this.scan(func.body);
  }
  private reserve(name: string): void {
    if (this.slots.has(name)) return;
    this.slots.set(name, (this.slots.size + 1) * slotSize);
  }
  private scan(block: IR[]): void {
    for (const stmt of block) {
      if (stmt.tag === "store") {
        this.reserve(stmt.name);
      } else if (stmt.tag === "if") {
        this.scan(stmt.thenBlock);
        this.scan(stmt.elseBlock);
      }
    }
  }
  /** Distance below the frame pointer of `name`'s slot. */
  offset(name: string): number {
    const offset = this.slots.get(name);
    if (offset === undefined) {
      throw new CodegenError(
        ErrorCodes.MissingSlot,
        `no stack slot for variable '${name}'`
      );
    }
    return offset;
  }
  get slotCount(): number {
    return this.slots.size;
  }
  /** Bytes to reserve, kept 16-byte aligned. */
  get size(): number {
    return alignTo(this.slots.size * slotSize, 16);
  }
}
