import type { SourceSpan } from "../diagnostics/index.js";

export class SourceLocation {
  /** The exact character index the syntax starts */
  startIndex: number;
  /** The exact character index the syntax ends */
  endIndex: number;
  /** The line the syntax is located in (1-based) */
  line: number;
  /** The column within the line the syntax begins */
  column: number;
  endLine?: number;
  endColumn?: number;

  filePath: string;

  constructor(opts: {
    startIndex: number;
    endIndex: number;
    line: number;
    column: number;
    filePath: string;
  }) {
    this.startIndex = opts.startIndex;
    this.endIndex = opts.endIndex;
    this.line = opts.line;
    this.column = opts.column;
    this.filePath = opts.filePath;
  }

  setEndToStartOf(location?: SourceLocation) {
    if (!location) return;
    this.endIndex = location.startIndex;
    this.endColumn = location.column;
    this.endLine = location.line;
  }

  setEndToEndOf(location?: SourceLocation) {
    if (!location) return;
    this.endIndex = location.endIndex;
    this.endColumn = location.endColumn;
    this.endLine = location.endLine;
  }

  /** Location covering this one through the end of `end` */
  spanTo(end: SourceLocation): SourceLocation {
    const location = this.clone();
    location.setEndToEndOf(end);
    return location;
  }

  clone(): SourceLocation {
    const location = new SourceLocation(this);
    location.endLine = this.endLine;
    location.endColumn = this.endColumn;
    return location;
  }

  toSpan(): SourceSpan {
    return { file: this.filePath, start: this.startIndex, end: this.endIndex };
  }

  toString() {
    return `${this.filePath}:${this.line}:${this.column + 1}`;
  }
}
