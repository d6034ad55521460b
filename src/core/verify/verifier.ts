import type { AppliedPatch } from '../apply/engine.js';
import { VerifyFail, VerifyTimeout, type FixpointError } from '../errors.js';
import { isScriptFile } from '../detect/syntax.js';
import type { DetectFn } from '../detect/strategies.js';
import { rangesIntersect } from '../finding/position.js';
import type { RunContext } from '../scan/context.js';
import { scanFile } from '../scan/scanner.js';
import type { TfRegistry } from '../tf/registry.js';
import type { Waiver } from '../waiver/types.js';
import { isWaiverActive, waiverCovers, type WaiverLedger } from '../waiver/ledger.js';
import { compareStrings } from '../../utils/fs.js';
import { runSuite, type CheckSpec, type SuiteResult } from './suite.js';

export type TfVerifyStatus = 'pass' | 'fail' | 'waived';

export interface TfVerifyResult {
  tfId: string;
  status: TfVerifyStatus;
  files: string[];
  failures: VerifyFail[];
}

export interface VerifyReport {
  /** External checkers: "unrelated code is broken" lives here. */
  suite: SuiteResult;
  /** Per-TF acceptance predicates: "this TF's patch regressed" lives here. */
  tfs: TfVerifyResult[];
  errors: FixpointError[];
  ok: boolean;
}

export interface VerifyOptions {
  applied: AppliedPatch[];
  registry: TfRegistry;
  ctx: RunContext;
  checks?: CheckSpec[];
  timeoutMs?: number;
  waivers?: Waiver[];
  context?: string;
  now?: Date;
  /** Record a waiver for every failing TF and file. Off unless asked for. */
  recordWaiversOnFailure?: { ledger: WaiverLedger } | null;
  detect?: DetectFn;
}

export const DEFAULT_VERIFY_TIMEOUT_MS = 120_000;

/**
 * Confirm applied patches: run the external suite against the patched tree, then each applied TF's
 * acceptance predicates on the files it touched. A failing TF covered by an active waiver is
 * reported as waived.
 */
export async function verify(opts: VerifyOptions): Promise<VerifyReport> {
  const { ctx, registry } = opts;
  const context = opts.context ?? '*';
  const now = opts.now ?? new Date();

  const suite = await runSuite(opts.checks ?? [], { cwd: ctx.root, timeoutMs: opts.timeoutMs ?? DEFAULT_VERIFY_TIMEOUT_MS });
  const errors: FixpointError[] = [];
  for (const check of suite.checks) {
    if (check.status === 'timeout') errors.push(new VerifyTimeout(`check "${check.name}" timed out`));
    else if (check.status === 'fail') errors.push(new VerifyFail(`check "${check.name}" failed${check.exitCode === null ? '' : ` (exit ${check.exitCode})`}`));
  }

  const byTf = new Map<string, AppliedPatch[]>();
  for (const a of opts.applied.filter((x) => x.changed)) byTf.set(a.patch.tfId, [...(byTf.get(a.patch.tfId) ?? []), a]);

  const active = (opts.waivers ?? []).filter((w) => isWaiverActive(w, { context, now }));
  const tfs: TfVerifyResult[] = [];

  for (const tfId of [...byTf.keys()].sort(compareStrings)) {
    const applied = byTf.get(tfId) ?? [];
    const tf = registry.get(tfId);
    const files = [...new Set(applied.map((a) => a.patch.file))].sort(compareStrings);
    const failures: VerifyFail[] = [];

    if (!tf) {
      failures.push(new VerifyFail('TF is not in the registry', { tfId }));
    } else {
      for (const file of files) {
        const landed = applied.filter((a) => a.patch.file === file).flatMap((a) => a.landed);

        if (tf.verify.predicates.includes('parses') && isScriptFile(file)) {
          const parsed = await ctx.parse(file);
          const first = parsed?.diagnostics[0];
          if (first) failures.push(new VerifyFail(`no longer parses: ${first.message}`, { tfId, file }));
        }

        if (tf.verify.predicates.includes('finding-absent')) {
          const rescan = await scanFile(file, [tf], ctx, opts.detect);
          const remaining = rescan.findings.filter((f) =>
            landed.some((r) => rangesIntersect(r, { startLine: f.span.start.line, endLine: f.span.end.line }))
          );
          if (remaining.length > 0) {
            const lines = remaining.map((f) => f.span.start.line).join(', ');
            failures.push(new VerifyFail(`finding still present after patch (line ${lines})`, { tfId, file }));
          }
          failures.push(...rescan.failures.map((d) => new VerifyFail(`detector failed on re-scan: ${d.reason}`, { tfId, file })));
        }
      }
    }

    let status: TfVerifyStatus = failures.length === 0 ? 'pass' : 'fail';
    if (status === 'fail' && failures.every((f) => active.some((w) => waiverCovers(w, tfId, f.file ?? '')))) status = 'waived';

    if (status === 'fail' && opts.recordWaiversOnFailure) {
      const reasonsByScope = new Map<string, string[]>();
      for (const f of failures) {
        const scope = f.file ?? '*';
        reasonsByScope.set(scope, [...(reasonsByScope.get(scope) ?? []), f.reason]);
      }
      for (const [scope, reasons] of [...reasonsByScope].sort((a, b) => compareStrings(a[0], b[0]))) {
        await opts.recordWaiversOnFailure.ledger.record(
          { tf_id: tfId, scope, change_context: context, expires_at: null, rationale: `verification failed: ${reasons.join('; ')}`, source: 'ledger' },
          now
        );
      }
      ctx.logger.warn(`${tfId}: verification failed; waiver recorded`);
      status = 'waived';
    }

    if (status === 'fail') errors.push(...failures);
    tfs.push({ tfId, status, files, failures });
  }

  const ok = (suite.status === 'pass' || suite.status === 'skipped') && tfs.every((t) => t.status !== 'fail');
  ctx.logger.debug('verify complete', { suite: suite.status, tfs: tfs.map((t) => `${t.tfId}:${t.status}`) });
  return { suite, tfs, errors, ok };
}
