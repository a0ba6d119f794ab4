import { SourceLocation } from "../syntax/location.js";

/** Read position over a source text; tracks the line and column it is on */
export class SourceCursor {
  readonly source: string;
  readonly filePath: string;
  private index = 0;
  private line = 1;
  private column = 0;

  constructor(source: string, filePath: string) {
    this.source = source;
    this.filePath = filePath;
  }

  get done(): boolean {
    return this.index >= this.source.length;
  }

  /** Character `offset` places ahead; empty past the end */
  peek(offset = 0): string {
    return this.source.charAt(this.index + offset);
  }

  startsWith(candidate: string): boolean {
    return this.source.startsWith(candidate, this.index);
  }

  advance(): string {
    if (this.done) throw new Error(`unexpected end of ${this.filePath}`);

    const char = this.source.charAt(this.index);
    this.index += 1;
    if (char === "\n") {
      this.line += 1;
      this.column = 0;
    } else {
      this.column += 1;
    }
    return char;
  }

  /** Consumes `count` characters and returns them */
  take(count: number): string {
    let taken = "";
    for (let i = 0; i < count; i += 1) taken += this.advance();
    return taken;
  }

  takeWhile(matches: (char: string) => boolean): string {
    let taken = "";
    while (!this.done && matches(this.peek())) taken += this.advance();
    return taken;
  }

  location(): SourceLocation {
    return new SourceLocation({
      startIndex: this.index,
      endIndex: this.index,
      line: this.line,
      column: this.column,
      filePath: this.filePath,
    });
  }
}
