import { sha256 } from '../../utils/fs.js';
import type { FileDiff } from '../../git/diff-parser.js';
import { LineIndex } from '../finding/position.js';
import type { Hunk, Patch } from '../patch/types.js';

export type DiffConversion =
  | { kind: 'patch'; patch: Patch }
  | { kind: 'already-applied' }
  | { kind: 'mismatch'; reason: string };

export interface PatchMeta {
  id: string;
  tfId: string;
  tier: number;
  file: string;
}

/**
 * Turn one file's unified diff into a patch against `text`. Every hunk must match the file exactly at
 * its stated line; a diff whose new side is already in place is reported as already applied.
 */
export function fileDiffToPatch(diff: FileDiff, text: string, meta: PatchMeta): DiffConversion {
  const view = new FileView(text);
  const hunks: Hunk[] = [];
  let alreadyApplied = 0;

  for (const h of diff.hunks) {
    const oldLines = h.lines.filter((l) => l.op !== '+').map((l) => l.text);
    const newLines = h.lines.filter((l) => l.op !== '-').map((l) => l.text);
    const header = `@@ -${h.oldStart},${h.oldCount} +${h.newStart},${h.newCount} @@`;

    const insertion = oldLines.length === 0;
    const oldMatches = insertion ? h.oldStart <= view.count : view.matches(h.oldStart, oldLines);
    const newMatches = newLines.length > 0 && view.matches(h.newStart, newLines);

    if ((insertion || !oldMatches) && newMatches) {
      alreadyApplied += 1;
      continue;
    }
    if (!oldMatches) return { kind: 'mismatch', reason: `${header} does not match ${meta.file}` };
    hunks.push(view.hunk(h.oldStart, oldLines.length, newLines));
  }

  if (diff.hunks.length > 0 && alreadyApplied === diff.hunks.length) return { kind: 'already-applied' };
  if (alreadyApplied > 0) return { kind: 'mismatch', reason: `${meta.file} is partially patched already` };
  if (hunks.length === 0) return { kind: 'mismatch', reason: `no hunks for ${meta.file}` };

  hunks.sort((a, b) => a.start - b.start);
  for (let i = 1; i < hunks.length; i++) {
    const prev = hunks[i - 1];
    const cur = hunks[i];
    if (prev && cur && cur.start <= prev.end) return { kind: 'mismatch', reason: `hunks overlap in ${meta.file}` };
  }

  const first = hunks[0];
  return {
    kind: 'patch',
    patch: {
      id: meta.id,
      tfId: meta.tfId,
      tier: meta.tier,
      file: meta.file,
      transform: 'agent-diff',
      anchor: view.index.positionAt(first ? first.start : 0),
      baseSha256: sha256(text),
      hunks
    }
  };
}

/** Line view of a file in which the trailing newline does not open an extra line. */
class FileView {
  readonly index: LineIndex;
  readonly count: number;
  readonly eol: string;

  constructor(readonly text: string) {
    this.index = new LineIndex(text);
    this.count = text === '' ? 0 : text.endsWith('\n') ? this.index.lineCount - 1 : this.index.lineCount;
    this.eol = text.includes('\r\n') ? '\r\n' : '\n';
  }

  matches(start: number, lines: string[]): boolean {
    if (lines.length === 0 || start < 1 || start + lines.length - 1 > this.count) return false;
    return lines.every((l, k) => this.index.lineText(start + k) === l);
  }

  /**
   * Whole-line hunk replacing `n` lines from `start` with `newLines`. Pure insertions and deletions
   * borrow a neighbouring line so that the hunk still covers at least one line.
   */
  hunk(start: number, n: number, newLines: string[]): Hunk {
    const added = newLines.join(this.eol);

    if (n > 0 && newLines.length > 0) return this.region(start, start + n - 1, added);
    if (n > 0) {
      const last = start + n - 1;
      if (last < this.count) return this.region(start, last + 1, this.index.lineText(last + 1));
      if (start > 1) return this.region(start - 1, last, this.index.lineText(start - 1));
      return { start: 0, end: this.text.length, before: this.text, after: '', startLine: 1, eof: !this.text.endsWith('\n') };
    }

    // Insertion after line `start` (0 = before the first line).
    if (start >= 1) return this.region(start, start, `${this.index.lineText(start)}${this.eol}${added}`);
    if (this.count >= 1) return this.region(1, 1, `${added}${this.eol}${this.index.lineText(1)}`);
    return { start: 0, end: 0, before: '', after: `${added}${this.eol}`, startLine: 1, eof: false };
  }

  private region(first: number, last: number, after: string): Hunk {
    const start = this.index.lineStart(first);
    const end = this.index.lineEnd(last);
    return {
      start,
      end,
      before: this.text.slice(start, end),
      after,
      startLine: first,
      eof: end === this.text.length && !this.text.endsWith('\n')
    };
  }
}
