export class Writer {
  private lines: string[] = [];
  constructor(private commentPrefix: string) {}
  compile(): string {
    return this.lines.join("\n") + "\n";
  }
  op(instruction: string): this {
    this.lines.push(`    ${instruction}`);
    return this;
  }
  ops(...instructions: string[]): this {
    for (const instruction of instructions) this.op(instruction);
    return this;
  }
  label(name: string): this {
    this.lines.push(`${name}:`);
    return this;
  }
  raw(text: string): this {
    this.lines.push(text);
    return this;
  }
  comment(text: string): this {
    this.lines.push(`${this.commentPrefix} ${text}`);
    return this;
  }
  blank(): this {
    this.lines.push("");
    return this;
  }
}
