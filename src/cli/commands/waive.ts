import { resolveIn } from '../../config/index.js';
import { WaiverLedger } from '../../core/waiver/ledger.js';
import { WaiverSchema } from '../../core/waiver/types.js';
import { getRenderer } from '../ui/renderer.js';
import { openWorkspace, type CommandResult, type WorkspaceOptions } from '../workspace.js';

export interface WaiveCommandOptions extends WorkspaceOptions {
  tfId: string;
  reason: string;
  scope?: string;
  context?: string;
  expires?: string;
}

/** `fixpoint waive <tf-id>`: append a waiver to the ledger. */
export async function runWaiveCommand(opts: WaiveCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  const ws = await openWorkspace(opts);
  if (!ws.registry.get(opts.tfId)) return { ok: false, details: `unknown TF ${opts.tfId}` };

  const input = WaiverSchema.safeParse({
    tf_id: opts.tfId,
    scope: opts.scope,
    change_context: opts.context,
    expires_at: opts.expires ?? null,
    rationale: opts.reason,
    source: 'ledger'
  });
  if (!input.success) {
    const issue = input.error.issues[0];
    return { ok: false, details: `${issue?.path.join('.') || 'waiver'}: ${issue?.message ?? 'invalid waiver'}` };
  }

  const ledger = await WaiverLedger.open(resolveIn(ws.root, ws.config.waivers.ledger_path));
  const entry = await ledger.record(input.data);
  r.success(`waiver #${entry.seq} recorded for ${entry.tf_id} (scope ${entry.scope}, context ${entry.change_context})`);
  return { ok: true };
}
