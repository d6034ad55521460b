import { lineCount, patchSortKey, type Hunk, type Patch } from './types.js';

const NO_NEWLINE = '\\ No newline at end of file';

/**
 * Render one patch as a zero-context unified diff, preceded by a `# fixpoint-patch` header naming the
 * TF and the finding position. Hunk headers number lines against the patch's own base content.
 */
export function renderPatch(patch: Patch): string {
  const out: string[] = [
    `# fixpoint-patch ${patch.tfId} ${patch.file}:${patch.anchor.line}:${patch.anchor.column} ${patch.transform}`,
    `--- a/${patch.file}`,
    `+++ b/${patch.file}`
  ];

  let shift = 0;
  for (const hunk of [...patch.hunks].sort((a, b) => a.start - b.start)) {
    const oldCount = lineCount(hunk.before);
    const newCount = lineCount(hunk.after);
    out.push(`@@ -${rangeStart(hunk.startLine, oldCount)},${oldCount} +${rangeStart(hunk.startLine + shift, newCount)},${newCount} @@`);
    out.push(...body('-', hunk.before, hunk));
    out.push(...body('+', hunk.after, hunk));
    shift += newCount - oldCount;
  }

  return `${out.join('\n')}\n`;
}

/** Dry-run output: every patch, in patch order. Byte-identical for identical input. */
export function renderPatchStream(patches: Iterable<Patch>): string {
  return [...patches].sort(patchSortKey).map(renderPatch).join('');
}

function body(prefix: '-' | '+', text: string, hunk: Hunk): string[] {
  if (text === '') return [];
  const lines = text.split('\n').map((l) => `${prefix}${l}`);
  if (hunk.eof) lines.push(NO_NEWLINE);
  return lines;
}

// An empty side is numbered by the line before it, as diff does.
function rangeStart(line: number, count: number): number {
  return count === 0 ? line - 1 : line;
}
