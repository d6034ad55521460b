import { resolveIn } from '../../config/index.js';
import { applyPatches } from '../../core/apply/engine.js';
import { proposeAll } from '../../core/propose/proposer.js';
import { verify } from '../../core/verify/verifier.js';
import { WaiverLedger } from '../../core/waiver/ledger.js';
import { getRenderer } from '../ui/renderer.js';
import {
  openWorkspace,
  resolveChangedFiles,
  scanWorkspace,
  workspaceWaivers,
  type CommandResult,
  type WorkspaceOptions
} from '../workspace.js';

export interface ApplyCommandOptions extends WorkspaceOptions {
  tf?: string[];
  changed?: string;
  base?: string;
  context?: string;
  /** Skip verification of the applied patches. */
  verify?: boolean;
  /** Record a waiver for each TF whose patches fail verification. */
  waiveFailures?: boolean;
}

/**
 * `fixpoint apply`: scan, propose and apply every resolved patch, then verify what landed.
 * Conflicts and verification failures are reported; only a stage error fails the command.
 */
export async function runApplyCommand(opts: ApplyCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  const ws = await openWorkspace(opts);
  const context = opts.context ?? '*';
  const files = await resolveChangedFiles(ws, { changed: opts.changed, base: opts.base });
  const { result } = await scanWorkspace(ws, { tfIds: opts.tf, files });

  const set = await proposeAll(result.findings, ws.ctx, ws.registry);
  r.proposals(set);
  const applied = await applyPatches(set.patches, ws.ctx);
  r.applyResult(applied);

  if (opts.verify === false || applied.applied.length === 0) return { ok: true };

  const report = await verify({
    applied: applied.applied,
    registry: ws.registry,
    ctx: ws.ctx,
    checks: ws.config.verify.checks,
    timeoutMs: ws.config.verify.timeout_ms,
    waivers: await workspaceWaivers(ws, context),
    context,
    recordWaiversOnFailure: opts.waiveFailures
      ? { ledger: await WaiverLedger.open(resolveIn(ws.root, ws.config.waivers.ledger_path)) }
      : null
  });
  r.verifyReport(report);
  return { ok: true };
}
