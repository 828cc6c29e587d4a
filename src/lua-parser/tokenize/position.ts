// A Position is a line and column of a named input. Both count from 1;
// 0 means unknown.
export class Position {
  readonly file: string | null;
  readonly line: number;
  readonly col: number;

  constructor(file: string | null, line: number, col: number) {
    this.file = file;
    this.line = line;
    this.col = col;
  }

  // synthetic returns the position given to nodes built by rewrite steps.
  static synthetic(): Position {
    return new Position(null, 0, 0);
  }

  // after returns the position that follows the char c read at this one.
  after(c: string): Position {
    if (c === '\n') {
      return new Position(this.file, this.line + 1, 1);
    }
    return new Position(this.file, this.line, this.col + 1);
  }

  toString(): string {
    const file = this.file ?? '<invalid>';
    if (this.line === 0) {
      return file;
    }
    return this.col > 0 ? `${file}:${this.line}:${this.col}` : `${file}:${this.line}`;
  }
}
