// src/core/pos/source.ts
// Source texts and positions inside them

/**
 * A named piece of script text. Lines are split once on construction.
 */
export class Source {
  readonly lines: readonly string[];

  constructor(readonly fileName: string, readonly text: string) {
    this.lines = text.split("\n");
  }

  /** Position of a character offset in this source. */
  posAt(offset: number): Pos {
    let line = 0;
    let rest = Math.max(0, Math.min(offset, this.text.length));
    while (line < this.lines.length - 1 && rest > this.lines[line].length) {
      rest -= this.lines[line].length + 1;
      line++;
    }
    return new Pos(this, line, rest);
  }

  toString(): string {
    return this.fileName;
  }

  static readonly builtIn = new Source("built-in", "");
}

/**
 * A 0-based line/column inside a {@link Source}.
 */
export class Pos {
  constructor(
    readonly source: Source,
    readonly line: number,
    readonly column: number
  ) {}

  /** Text of the line this position points into, or "" when out of range. */
  get currentLine(): string {
    return this.source.lines[this.line] ?? "";
  }

  /** Same source and line; columns are ignored. */
  sameLine(other: Pos): boolean {
    return this.source === other.source && this.line === other.line;
  }

  toString(): string {
    return `${this.source.fileName}:${this.line + 1}:${this.column + 1}`;
  }

  static readonly builtIn = new Pos(Source.builtIn, 0, 0);
}
