import { LineIndex, type Position } from '../finding/position.js';

/** A character-level replacement computed by a transform. */
export interface Edit {
  start: number;
  end: number;
  after: string;
}

/**
 * Replacement of a run of whole lines. `start`/`end` are offsets into the base content and cover
 * `before` exactly (without the trailing newline of the last line).
 */
export interface Hunk {
  start: number;
  end: number;
  before: string;
  after: string;
  /** 1-based line of `start` in the base content. */
  startLine: number;
  /** The hunk reaches the end of a base file that has no final newline. */
  eof: boolean;
}

export interface Patch {
  id: string;
  tfId: string;
  tier: number;
  file: string;
  /** Transform kind, or `agent-diff` for ingested diffs. */
  transform: string;
  /** Where the finding that produced the patch starts. */
  anchor: Position;
  /** Hash of the exact content the hunks were computed against. */
  baseSha256: string;
  hunks: Hunk[];
}

export function lineCount(s: string): number {
  return s === '' ? 0 : s.split('\n').length;
}

/** Widen edits to whole-line hunks, merging edits that share a line. */
export function editsToHunks(text: string, edits: Edit[]): Hunk[] {
  const lines = new LineIndex(text);
  const groups: Array<{ first: number; last: number; edits: Edit[] }> = [];

  for (const edit of [...edits].sort((a, b) => a.start - b.start || a.end - b.end)) {
    const first = lines.positionAt(edit.start).line;
    const last = lines.positionAt(edit.end).line;
    const open = groups[groups.length - 1];
    if (open && first <= open.last) {
      open.last = Math.max(open.last, last);
      open.edits.push(edit);
    } else {
      groups.push({ first, last, edits: [edit] });
    }
  }

  return groups.map((g) => {
    const start = lines.lineStart(g.first);
    const end = Math.max(lines.lineEnd(g.last), ...g.edits.map((e) => e.end));
    const before = text.slice(start, end);
    let after = before;
    for (const e of [...g.edits].reverse()) {
      after = after.slice(0, e.start - start) + e.after + after.slice(e.end - start);
    }
    return { start, end, before, after, startLine: g.first, eof: end === text.length && !text.endsWith('\n') };
  });
}

export function isIdentity(patch: Pick<Patch, 'hunks'>): boolean {
  return patch.hunks.every((h) => h.before === h.after);
}

export function patchSortKey(a: Patch, b: Patch): number {
  return (
    (a.file < b.file ? -1 : a.file > b.file ? 1 : 0) ||
    a.anchor.line - b.anchor.line ||
    a.anchor.column - b.anchor.column ||
    (a.tfId < b.tfId ? -1 : a.tfId > b.tfId ? 1 : 0) ||
    (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
  );
}
