/**
 * Accumulates output lines, each prefixed with `depth` indent units.
 */
export class LineWriter {
  private readonly buffer: string[] = [];
  private readonly indentCache: string[] = [""];

  constructor(private readonly indentUnit = "  ") {}

  push(depth: number, content: string): void {
    this.buffer.push(this.indentFor(depth) + content.trimEnd());
  }

  get lines(): readonly string[] {
    return this.buffer;
  }

  render(): string {
    return this.buffer.join("\n");
  }

  private indentFor(depth: number): string {
    let cached = this.indentCache[depth];
    if (cached === undefined) {
      cached = this.indentUnit.repeat(depth);
      this.indentCache[depth] = cached;
    }
    return cached;
  }
}
