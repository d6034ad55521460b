import { resolveIn } from '../../config/index.js';
import { emitTasks } from '../../core/bridge/packets.js';
import { proposeAll } from '../../core/propose/proposer.js';
import { getRenderer } from '../ui/renderer.js';
import { openWorkspace, resolveChangedFiles, scanWorkspace, type CommandResult, type WorkspaceOptions } from '../workspace.js';

export interface EmitCommandOptions extends WorkspaceOptions {
  tf?: string[];
  changed?: string;
  base?: string;
  /** Task directory; `agent.tasks_dir` by default. */
  out?: string;
}

/** `fixpoint emit`: write a task packet for every finding that needs review. */
export async function runEmitCommand(opts: EmitCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  const ws = await openWorkspace(opts);
  const files = await resolveChangedFiles(ws, { changed: opts.changed, base: opts.base });
  const { result } = await scanWorkspace(ws, { tfIds: opts.tf, files });

  const set = await proposeAll(result.findings, ws.ctx, ws.registry);
  const tasksDir = resolveIn(ws.root, opts.out ?? ws.config.agent.tasks_dir);
  const written = await emitTasks(set.ambiguous, { tasksDir, registry: ws.registry });

  r.proposals(set);
  r.blank();
  r.success(`${written.length} task packet(s) written to ${tasksDir}`);
  return { ok: true };
}
