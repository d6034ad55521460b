import { cp, mkdtemp, rm, symlink } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join, relative, sep } from 'node:path';

import { fileExists, readJson, readText, safeReaddir, compareStrings } from '../../utils/fs.js';
import { diffTarget, parseUnifiedDiff } from '../../git/diff-parser.js';
import { applyPatches, type AppliedPatch } from '../apply/engine.js';
import { describeError } from '../errors.js';
import type { DetectFn } from '../detect/strategies.js';
import type { Patch } from '../patch/types.js';
import type { RunContext } from '../scan/context.js';
import { inFootprint } from '../scan/scanner.js';
import type { TfRegistry } from '../tf/registry.js';
import { TfIdSchema } from '../tf/types.js';
import type { CheckSpec } from '../verify/suite.js';
import { verify } from '../verify/verifier.js';
import type { WaiverLedger } from '../waiver/ledger.js';
import type { LedgerWaiver } from '../waiver/types.js';
import { fileDiffToPatch } from './diff-patch.js';
import { TaskPacketSchema } from './packets.js';
import { escapesTree, isProtectedPath } from './protected-paths.js';

export interface AgentDiff {
  /** Where the diff came from (file name or packet id); used in patch ids and rationales. */
  name: string;
  tfId: string;
  text: string;
}

export type IngestStatus = 'merged' | 'already-applied' | 'rejected';

export interface IngestOutcome {
  name: string;
  tfId: string;
  status: IngestStatus;
  files: string[];
  reason: string | null;
  /** Patches written to the tree, with the line ranges they landed on; empty unless merged. */
  applied: AppliedPatch[];
  waivers: LedgerWaiver[];
}

export interface IngestOptions {
  ctx: RunContext;
  registry: TfRegistry;
  ledger: WaiverLedger;
  context: string;
  checks?: CheckSpec[];
  timeoutMs?: number;
  now?: Date;
  detect?: DetectFn;
}

const COPY_EXCLUDED = new Set(['.git', 'node_modules']);

/**
 * Accept externally produced diffs. Each one is applied to an isolated copy of the tree and verified
 * there; only a diff that verifies is applied to the real tree. A rejected diff leaves the tree
 * untouched and records a waiver explaining why. Diffs are handled in order, each against the tree the
 * previous ones left.
 */
export async function ingest(diffs: AgentDiff[], opts: IngestOptions): Promise<IngestOutcome[]> {
  const outcomes: IngestOutcome[] = [];
  for (const diff of diffs) {
    const outcome = await ingestOne(diff, opts);
    opts.ctx.logger.info(`ingest ${diff.name}: ${outcome.status}${outcome.reason ? ` (${outcome.reason})` : ''}`);
    outcomes.push(outcome);
  }
  return outcomes;
}

async function ingestOne(diff: AgentDiff, opts: IngestOptions): Promise<IngestOutcome> {
  const { ctx, registry } = opts;
  const base = { name: diff.name, tfId: diff.tfId, applied: [], waivers: [] };

  const prepared = await preparePatches(diff, opts);
  if (prepared.kind === 'rejected') return reject(diff, prepared.files, prepared.reason, opts);
  if (prepared.kind === 'already-applied') return { ...base, status: 'already-applied', files: prepared.files, reason: null };

  const files = prepared.patches.map((p) => p.file);
  const sandbox = await mkdtemp(join(tmpdir(), 'fixpoint-ingest-'));
  try {
    await cp(ctx.root, sandbox, {
      recursive: true,
      filter: (src) => !relative(ctx.root, src).split(sep).some((part) => COPY_EXCLUDED.has(part))
    });
    // Checks resolve dependencies through the real tree's node_modules.
    const modules = join(ctx.root, 'node_modules');
    if (await fileExists(modules)) await symlink(modules, join(sandbox, 'node_modules'), 'dir');

    const isolated = ctx.fork(sandbox);
    const trial = await applyPatches(prepared.patches, isolated);
    const trialConflict = trial.conflicts[0];
    if (trialConflict) return reject(diff, files, trialConflict.reason, opts);

    const report = await verify({
      applied: trial.applied,
      registry,
      ctx: isolated,
      checks: opts.checks,
      timeoutMs: opts.timeoutMs,
      context: opts.context,
      now: opts.now,
      detect: opts.detect
    });
    if (!report.ok) {
      const first = report.errors[0];
      return reject(diff, files, `verification failed: ${first ? first.toLine() : report.suite.status}`, opts);
    }
  } finally {
    await rm(sandbox, { recursive: true, force: true });
  }

  const merged = await applyPatches(prepared.patches, ctx);
  const mergeConflict = merged.conflicts[0];
  if (mergeConflict) return reject(diff, files, mergeConflict.reason, opts);
  return { ...base, status: 'merged', files, reason: null, applied: merged.applied };
}

type Prepared =
  | { kind: 'ready'; patches: Patch[] }
  | { kind: 'already-applied'; files: string[] }
  | { kind: 'rejected'; files: string[]; reason: string };

async function preparePatches(diff: AgentDiff, opts: IngestOptions): Promise<Prepared> {
  const tf = opts.registry.get(diff.tfId);
  if (!tf || tf.status !== 'active') return { kind: 'rejected', files: [], reason: `${diff.tfId || 'TF'} is not an active TF` };

  const parsed = parseUnifiedDiff(diff.text);
  const firstError = parsed.errors[0];
  if (firstError) return { kind: 'rejected', files: [], reason: `malformed diff: ${firstError}` };
  if (parsed.files.length === 0) return { kind: 'rejected', files: [], reason: 'diff is empty' };

  const patches: Patch[] = [];
  const applied: string[] = [];
  const files = parsed.files.map((f) => diffTarget(f) ?? '<unknown>');

  for (const fd of parsed.files) {
    const file = diffTarget(fd);
    if (!file || fd.oldPath === null || fd.newPath === null || fd.oldPath !== fd.newPath) {
      return { kind: 'rejected', files, reason: 'diffs may only modify existing files' };
    }
    if (escapesTree(file)) return { kind: 'rejected', files, reason: `${file} is outside the tree` };
    if (isProtectedPath(file)) return { kind: 'rejected', files, reason: `${file} is a protected path` };
    if (!inFootprint(tf, file)) return { kind: 'rejected', files, reason: `${file} is outside the ${tf.id} footprint` };

    let text: string;
    try {
      text = await opts.ctx.read(file);
    } catch (err) {
      return { kind: 'rejected', files, reason: `cannot read ${file}: ${describeError(err)}` };
    }

    const conv = fileDiffToPatch(fd, text, { id: `${diff.name}:${file}`, tfId: tf.id, tier: tf.tier, file });
    if (conv.kind === 'mismatch') return { kind: 'rejected', files, reason: conv.reason };
    if (conv.kind === 'already-applied') applied.push(file);
    else patches.push(conv.patch);
  }

  if (patches.length === 0) return { kind: 'already-applied', files: applied };
  if (applied.length > 0) return { kind: 'rejected', files, reason: `${applied.join(', ')} already patched` };
  return { kind: 'ready', patches };
}

async function reject(diff: AgentDiff, files: string[], reason: string, opts: IngestOptions): Promise<IngestOutcome> {
  const waivers: LedgerWaiver[] = [];
  if (TfIdSchema.safeParse(diff.tfId).success) {
    const scopes = files.length ? [...new Set(files)].sort(compareStrings) : ['*'];
    for (const scope of scopes) {
      waivers.push(
        await opts.ledger.record(
          {
            tf_id: diff.tfId,
            scope,
            change_context: opts.context,
            expires_at: null,
            rationale: `agent diff ${diff.name} rejected: ${reason}`,
            source: 'agent-bridge'
          },
          opts.now
        )
      );
    }
  }
  return { name: diff.name, tfId: diff.tfId, status: 'rejected', files, reason, applied: [], waivers };
}

/**
 * Ingest every `*.diff` / `*.patch` in `dir`, in name order. The TF comes from the task packet with the
 * same stem (`task-001-BEX-001.diff` → `task-001-BEX-001.json`), or else from a TF id in the file name.
 */
export async function ingestDirectory(dir: string, opts: IngestOptions): Promise<IngestOutcome[]> {
  const entries = (await safeReaddir(dir)).filter((e) => /\.(diff|patch)$/.test(e)).sort(compareStrings);

  const diffs: AgentDiff[] = [];
  for (const entry of entries) {
    const stem = entry.replace(/\.(diff|patch)$/, '');
    diffs.push({ name: stem, tfId: await resolveTfId(dir, stem), text: await readText(join(dir, entry)) });
  }
  return ingest(diffs, opts);
}

async function resolveTfId(dir: string, stem: string): Promise<string> {
  const packetPath = join(dir, `${stem}.json`);
  if (await fileExists(packetPath)) {
    const packet = TaskPacketSchema.safeParse(await readJson(packetPath));
    if (packet.success) return packet.data.tf_id;
  }
  return /[A-Z]+-\d{3}/.exec(basename(stem))?.[0] ?? '';
}
