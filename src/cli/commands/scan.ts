import { formatFindingsStream, writeFindingsFile } from '../../core/finding/stream.js';
import { resolveIn } from '../../config/index.js';
import { getRenderer } from '../ui/renderer.js';
import { openWorkspace, resolveChangedFiles, scanWorkspace, type CommandResult, type WorkspaceOptions } from '../workspace.js';

export interface ScanCommandOptions extends WorkspaceOptions {
  tf?: string[];
  changed?: string;
  base?: string;
  /** Findings file; `gate.findings_path` by default. */
  out?: string;
  /** Print the findings stream on stdout as well. */
  stdout?: boolean;
}

/** `fixpoint scan`: run the active TFs over the tree and write the findings stream. */
export async function runScanCommand(opts: ScanCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  const ws = await openWorkspace(opts);
  const files = await resolveChangedFiles(ws, { changed: opts.changed, base: opts.base });
  const { result } = await scanWorkspace(ws, { tfIds: opts.tf, files });

  const out = resolveIn(ws.root, opts.out ?? ws.config.gate.findings_path);
  await writeFindingsFile(out, result.findings);

  r.findings(result.findings);
  r.blank();
  r.dim(`${result.filesScanned} file(s) scanned, findings written to ${out}`);
  if (opts.stdout) r.output(formatFindingsStream(result.findings));
  return { ok: true };
}
