import { resolveIn } from '../../config/index.js';
import { ingestDirectory } from '../../core/bridge/agent-bridge.js';
import { WaiverLedger } from '../../core/waiver/ledger.js';
import { getRenderer } from '../ui/renderer.js';
import { openWorkspace, type CommandResult, type WorkspaceOptions } from '../workspace.js';

export interface IngestCommandOptions extends WorkspaceOptions {
  /** Directory of `*.diff` / `*.patch` files; `agent.tasks_dir` by default. */
  dir?: string;
  context?: string;
}

/**
 * `fixpoint ingest [dir]`: merge agent diffs that verify in isolation. Rejections leave the tree as
 * it was and are recorded as waivers.
 */
export async function runIngestCommand(opts: IngestCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  const ws = await openWorkspace(opts);
  const dir = resolveIn(ws.root, opts.dir ?? ws.config.agent.tasks_dir);
  const ledger = await WaiverLedger.open(resolveIn(ws.root, ws.config.waivers.ledger_path));

  const outcomes = await ingestDirectory(dir, {
    ctx: ws.ctx,
    registry: ws.registry,
    ledger,
    context: opts.context ?? '*',
    checks: ws.config.verify.checks,
    timeoutMs: ws.config.verify.timeout_ms
  });

  if (outcomes.length === 0) r.info(`no diffs found in ${dir}`);
  else r.ingestOutcomes(outcomes);
  return { ok: true };
}
