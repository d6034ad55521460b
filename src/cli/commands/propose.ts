import { renderPatchStream } from '../../core/patch/render.js';
import { proposeAll } from '../../core/propose/proposer.js';
import { getRenderer } from '../ui/renderer.js';
import { openWorkspace, resolveChangedFiles, scanWorkspace, type CommandResult, type WorkspaceOptions } from '../workspace.js';

export interface ProposeCommandOptions extends WorkspaceOptions {
  tf?: string[];
  changed?: string;
  base?: string;
}

/** `fixpoint propose`: dry run: print the patch stream on stdout without touching the tree. */
export async function runProposeCommand(opts: ProposeCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  const ws = await openWorkspace(opts);
  const files = await resolveChangedFiles(ws, { changed: opts.changed, base: opts.base });
  const { result } = await scanWorkspace(ws, { tfIds: opts.tf, files });

  const set = await proposeAll(result.findings, ws.ctx, ws.registry);
  r.proposals(set);
  r.output(renderPatchStream(set.patches));
  return { ok: true };
}
