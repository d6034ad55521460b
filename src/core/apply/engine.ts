import { mapLimit } from '../../utils/async.js';
import { compareStrings, sha256, writeTextAtomic } from '../../utils/fs.js';
import { ApplyConflict } from '../errors.js';
import { LineIndex, type LineRange } from '../finding/position.js';
import { isIdentity, patchSortKey, type Hunk, type Patch } from '../patch/types.js';
import type { RunContext } from '../scan/context.js';

export interface AppliedPatch {
  patch: Patch;
  /** Line ranges of the new content that the patch produced, in the patched file. */
  landed: LineRange[];
  /** False for identity patches, which leave the file as it was. */
  changed: boolean;
}

export interface ApplyResult {
  applied: AppliedPatch[];
  conflicts: ApplyConflict[];
  filesWritten: string[];
}

export interface ContentApply {
  content: string;
  applied: AppliedPatch[];
  conflicts: ApplyConflict[];
}

/** Overlap tie-break: lower tier first, then TF id, then position, then patch id. */
export function comparePrecedence(a: Patch, b: Patch): number {
  return a.tier - b.tier || compareStrings(a.tfId, b.tfId) || firstStart(a) - firstStart(b) || compareStrings(a.id, b.id);
}

export function hunksOverlap(a: Hunk, b: Hunk): boolean {
  return a.start === b.start || (a.start < b.end && b.start < a.end);
}

export function patchesOverlap(a: Patch, b: Patch): boolean {
  return a.hunks.some((ha) => b.hunks.some((hb) => hunksOverlap(ha, hb)));
}

/**
 * Apply patches for one file to its content. Pure: the caller decides whether to write.
 *
 * Patches whose base hash differs from `text` are rejected. Among overlapping patches the one with
 * the highest precedence wins and the others become conflicts naming it. Winners are applied in
 * position order; every hunk is re-checked against the content left by the patches before it.
 */
export function applyToContent(text: string, patches: Patch[]): ContentApply {
  const base = sha256(text);
  const conflicts: ApplyConflict[] = [];
  const winners: Patch[] = [];

  for (const patch of [...patches].sort(comparePrecedence)) {
    if (patch.baseSha256 !== base) {
      conflicts.push(conflict(patch, 'content drift: file changed since the patch was computed'));
      continue;
    }
    const winner = winners.find((w) => patchesOverlap(w, patch));
    if (winner) {
      conflicts.push(conflict(patch, `overlaps ${winner.id} (tier ${winner.tier}), which takes precedence`, winner.id));
      continue;
    }
    winners.push(patch);
  }

  const shifts: Array<{ at: number; delta: number }> = [];
  const shiftBefore = (pos: number) => shifts.reduce((sum, s) => (s.at < pos ? sum + s.delta : sum), 0);

  let content = text;
  const landedHunks: Array<{ patch: Patch; hunks: Hunk[] }> = [];

  for (const patch of winners.sort((a, b) => firstStart(a) - firstStart(b) || compareStrings(a.id, b.id))) {
    const hunks = [...patch.hunks].sort((a, b) => a.start - b.start);
    const mismatch = hunks.find((h) => {
      const at = h.start + shiftBefore(h.start);
      return content.slice(at, at + h.before.length) !== h.before;
    });
    if (mismatch) {
      conflicts.push(conflict(patch, `hunk at line ${mismatch.startLine} does not match the file`));
      continue;
    }

    for (const h of [...hunks].reverse()) {
      const at = h.start + shiftBefore(h.start);
      content = content.slice(0, at) + h.after + content.slice(at + h.before.length);
    }
    for (const h of hunks) {
      if (h.after.length !== h.before.length) shifts.push({ at: h.start, delta: h.after.length - h.before.length });
    }
    landedHunks.push({ patch, hunks });
  }

  const lines = new LineIndex(content);
  const applied = landedHunks.map(({ patch, hunks }) => ({
    patch,
    changed: !isIdentity(patch),
    landed: hunks.map((h) => {
      const at = h.start + shiftBefore(h.start);
      return { startLine: lines.positionAt(at).line, endLine: lines.positionAt(at + h.after.length).line };
    })
  }));

  return { content, applied, conflicts };
}

export interface ApplyOptions {
  concurrency?: number;
  /** Replaces a file's content; defaults to an atomic rename over the target. */
  write?: (path: string, content: string) => Promise<void>;
}

/**
 * Apply a batch of patches to the tree behind `ctx`. Files are handled concurrently; patches for the
 * same file strictly in sequence. Each changed file is replaced atomically. A file that cannot be read
 * or written turns its patches into conflicts; the rest of the batch still lands.
 */
export async function applyPatches(patches: Patch[], ctx: RunContext, opts: ApplyOptions = {}): Promise<ApplyResult> {
  const write = opts.write ?? writeTextAtomic;
  const byFile = new Map<string, Patch[]>();
  for (const p of patches) byFile.set(p.file, [...(byFile.get(p.file) ?? []), p]);
  const files = [...byFile.keys()].sort(compareStrings);

  const perFile = await mapLimit(files, opts.concurrency ?? 8, async (file) => {
    const group = byFile.get(file) ?? [];
    let text: string;
    try {
      text = await ctx.read(file);
    } catch (err) {
      const reason = `cannot read file: ${err instanceof Error ? err.message : String(err)}`;
      const failed: ContentApply = { content: '', applied: [], conflicts: group.map((p) => conflict(p, reason)) };
      return { file, written: false, result: failed };
    }

    let result = applyToContent(text, group);
    let written = result.content !== text;
    if (written) {
      try {
        await write(ctx.absPath(file), result.content);
        ctx.invalidate(file);
        ctx.logger.info(`applied ${result.applied.length} patch(es) to ${file}`);
      } catch (err) {
        const reason = `cannot write file: ${err instanceof Error ? err.message : String(err)}`;
        result = { content: text, applied: [], conflicts: group.map((p) => conflict(p, reason)) };
        written = false;
      }
    }
    for (const c of result.conflicts) ctx.logger.warn(`apply conflict: ${c.toLine()}`);
    return { file, written, result };
  });

  return {
    applied: perFile.flatMap((r) => r.result.applied).sort((a, b) => patchSortKey(a.patch, b.patch)),
    conflicts: perFile
      .flatMap((r) => r.result.conflicts)
      .sort((a, b) => compareStrings(a.file ?? '', b.file ?? '') || compareStrings(a.patchId, b.patchId)),
    filesWritten: perFile.filter((r) => r.written).map((r) => r.file)
  };
}

function conflict(patch: Patch, reason: string, winner: string | null = null): ApplyConflict {
  return new ApplyConflict(reason, { tfId: patch.tfId, file: patch.file, patchId: patch.id, winner });
}

function firstStart(p: Patch): number {
  return p.hunks.reduce((min, h) => Math.min(min, h.start), Number.POSITIVE_INFINITY);
}
