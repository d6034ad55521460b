import { resolveIn } from '../../config/index.js';
import { writeFindingsFile } from '../../core/finding/stream.js';
import { gateReportJson } from '../../core/gate/evaluator.js';
import { runPipeline } from '../../core/pipeline.js';
import { writeJson } from '../../utils/fs.js';
import { getRenderer } from '../ui/renderer.js';
import {
  openWorkspace,
  resolveChangedFiles,
  workspaceTree,
  workspaceWaivers,
  type CommandResult,
  type WorkspaceOptions
} from '../workspace.js';

export interface RunCommandOptions extends WorkspaceOptions {
  changed?: string;
  base?: string;
  context?: string;
  tier?: number[];
  dryRun?: boolean;
  /** Skip writing task packets for findings that need review. */
  emit?: boolean;
}

/** `fixpoint run`: one full pass: scan, propose, apply, emit, verify, gate. */
export async function runRunCommand(opts: RunCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  const ws = await openWorkspace(opts);
  const context = opts.context ?? '*';
  const tree = await workspaceTree(ws);
  const changed = await resolveChangedFiles(ws, { changed: opts.changed, base: opts.base });

  const res = await runPipeline({
    tree,
    registry: ws.registry,
    ctx: ws.ctx,
    dryRun: !!opts.dryRun,
    tasksDir: opts.emit === false ? null : resolveIn(ws.root, ws.config.agent.tasks_dir),
    checks: ws.config.verify.checks,
    timeoutMs: ws.config.verify.timeout_ms,
    waivers: await workspaceWaivers(ws, context),
    changedFiles: changed ?? undefined,
    gateTiers: opts.tier && opts.tier.length ? opts.tier : ws.config.gate.tiers,
    context
  });

  for (const f of res.scan.failures) r.warn(f.toLine());
  r.findings(res.scan.findings);
  r.proposals(res.proposals);
  if (res.apply) r.applyResult(res.apply);
  if (res.tasks.length) r.dim(`${res.tasks.length} task packet(s) written`);
  if (res.verify) r.verifyReport(res.verify);

  await writeFindingsFile(resolveIn(ws.root, ws.config.gate.findings_path), res.findings.findings);
  await writeJson(resolveIn(ws.root, ws.config.gate.report_path), gateReportJson(res.gate));
  r.gateReport(res.gate);
  return { ok: true, gateFailed: res.gate.decision === 'fail' };
}
