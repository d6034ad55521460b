export interface Position {
  /** 1-based */
  line: number;
  /** 1-based, in UTF-16 code units */
  column: number;
  /** 0-based character offset into the file */
  offset: number;
}

export interface Span {
  start: Position;
  end: Position;
}

export interface LineRange {
  startLine: number;
  endLine: number;
}

/** Offset ↔ line/column lookups over one file's text. */
export class LineIndex {
  private readonly starts: number[];

  constructor(readonly text: string) {
    const starts = [0];
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 10) starts.push(i + 1);
    }
    this.starts = starts;
  }

  get lineCount(): number {
    return this.starts.length;
  }

  positionAt(offset: number): Position {
    const clamped = Math.max(0, Math.min(offset, this.text.length));
    let lo = 0;
    let hi = this.starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if ((this.starts[mid] ?? 0) <= clamped) lo = mid;
      else hi = mid - 1;
    }
    return { line: lo + 1, column: clamped - (this.starts[lo] ?? 0) + 1, offset: clamped };
  }

  span(start: number, end: number): Span {
    return { start: this.positionAt(start), end: this.positionAt(end) };
  }

  /** Offset of the first character of a 1-based line. */
  lineStart(line: number): number {
    if (line > this.starts.length) return this.text.length;
    return this.starts[Math.max(0, line - 1)] ?? 0;
  }

  /** Offset just past the last character of a line, excluding its newline (and a trailing CR). */
  lineEnd(line: number): number {
    const next = line < this.starts.length ? (this.starts[line] ?? this.text.length) - 1 : this.text.length;
    return next > 0 && this.text.charCodeAt(next - 1) === 13 && next - 1 >= this.lineStart(line) ? next - 1 : next;
  }

  lineText(line: number): string {
    return this.text.slice(this.lineStart(line), this.lineEnd(line));
  }

  /** Lines `from..to` (inclusive, clamped) joined by `\n`. */
  linesBetween(from: number, to: number): string {
    const out: string[] = [];
    for (let l = Math.max(1, from); l <= Math.min(this.lineCount, to); l++) out.push(this.lineText(l));
    return out.join('\n');
  }
}

export function rangesIntersect(a: LineRange, b: LineRange): boolean {
  return a.startLine <= b.endLine && b.startLine <= a.endLine;
}
