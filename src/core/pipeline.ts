import { applyPatches, type ApplyResult } from './apply/engine.js';
import { emitTasks } from './bridge/packets.js';
import type { DetectFn } from './detect/strategies.js';
import { evaluateGate, type GateReport } from './gate/evaluator.js';
import { proposeAll, type ProposalSet } from './propose/proposer.js';
import type { RunContext } from './scan/context.js';
import { scan, type ScanResult } from './scan/scanner.js';
import type { SourceTree } from './scan/tree.js';
import type { TfRegistry } from './tf/registry.js';
import type { CheckSpec } from './verify/suite.js';
import { verify, type VerifyReport } from './verify/verifier.js';
import type { Waiver } from './waiver/types.js';

export interface PipelineOptions {
  tree: SourceTree;
  registry: TfRegistry;
  ctx: RunContext;
  /** Propose and report only; the tree is not written. */
  dryRun?: boolean;
  /** Where ambiguous findings are written as task packets; skipped when absent. */
  tasksDir?: string | null;
  checks?: CheckSpec[];
  timeoutMs?: number;
  waivers?: Waiver[];
  /** Change footprint for the gate; the whole tree when absent. */
  changedFiles?: string[];
  gateTiers?: number[];
  context?: string;
  now?: Date;
  detect?: DetectFn;
}

export interface PipelineResult {
  scan: ScanResult;
  proposals: ProposalSet;
  apply: ApplyResult | null;
  tasks: string[];
  verify: VerifyReport | null;
  /** Findings the gate saw: a re-scan after apply, or the original scan in a dry run. */
  findings: ScanResult;
  gate: GateReport;
}

/**
 * One pass over the tree: scan → propose → apply (and emit) → verify → gate. Each stage starts only
 * once the previous one has produced its complete output.
 */
export async function runPipeline(opts: PipelineOptions): Promise<PipelineResult> {
  const { tree, registry, ctx } = opts;
  const log = ctx.logger.child('pipeline');
  const context = opts.context ?? '*';
  const now = opts.now ?? new Date();

  const scanned = await scan(tree, registry, ctx, { detect: opts.detect });
  log.info(`scan: ${scanned.findings.length} finding(s) in ${scanned.filesScanned} file(s)`);

  const proposals = await proposeAll(scanned.findings, ctx, registry);
  log.info(`propose: ${proposals.patches.length} patch(es), ${proposals.ambiguous.length} ambiguous, ${proposals.rejected.length} rejected`);

  const tasks = opts.tasksDir ? await emitTasks(proposals.ambiguous, { tasksDir: opts.tasksDir, registry }) : [];

  let applied: ApplyResult | null = null;
  let verified: VerifyReport | null = null;
  let findings = scanned;

  if (!opts.dryRun) {
    applied = await applyPatches(proposals.patches, ctx);
    log.info(`apply: ${applied.applied.length} applied, ${applied.conflicts.length} conflict(s), ${applied.filesWritten.length} file(s) written`);

    verified = await verify({
      applied: applied.applied,
      registry,
      ctx,
      checks: opts.checks,
      timeoutMs: opts.timeoutMs,
      waivers: opts.waivers,
      context,
      now,
      detect: opts.detect
    });
    log.info(`verify: suite ${verified.suite.status}, ${verified.tfs.filter((t) => t.status === 'fail').length} TF(s) failing`);

    if (applied.filesWritten.length > 0) findings = await scan(tree, registry, ctx, { detect: opts.detect });
  }

  const gate = evaluateGate({
    findings: findings.findings,
    changedFiles: opts.changedFiles ?? tree.files,
    waivers: opts.waivers ?? [],
    tiers: opts.gateTiers,
    context,
    now
  });
  log.info(`gate: ${gate.decision} (${gate.remaining} remaining)`);

  return { scan: scanned, proposals, apply: applied, tasks, verify: verified, findings, gate };
}
