import { resolveIn } from '../../config/index.js';
import { readFindingsFile } from '../../core/finding/stream.js';
import type { Finding } from '../../core/finding/types.js';
import { evaluateGate, gateReportJson } from '../../core/gate/evaluator.js';
import { fileExists, writeJson } from '../../utils/fs.js';
import { getRenderer } from '../ui/renderer.js';
import {
  openWorkspace,
  resolveChangedFiles,
  scanWorkspace,
  workspaceTree,
  workspaceWaivers,
  type CommandResult,
  type WorkspaceOptions
} from '../workspace.js';

export interface GateCommandOptions extends WorkspaceOptions {
  /** Findings stream to gate on; a fresh scan when the file does not exist. */
  findings?: string;
  changed?: string;
  base?: string;
  context?: string;
  tier?: number[];
  /** Print the JSON report on stdout. */
  json?: boolean;
}

/**
 * `fixpoint gate`: decide whether the change may merge. Writes the report to `gate.report_path`;
 * a failed gate is reported with exit status 1.
 */
export async function runGateCommand(opts: GateCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  const ws = await openWorkspace(opts);
  const context = opts.context ?? '*';

  const findingsPath = resolveIn(ws.root, opts.findings ?? ws.config.gate.findings_path);
  let findings: Finding[];
  if (await fileExists(findingsPath)) {
    const read = await readFindingsFile(findingsPath);
    for (const w of read.warnings) r.warn(w);
    findings = read.findings;
  } else {
    if (opts.findings) return { ok: false, details: `findings file not found: ${findingsPath}` };
    findings = (await scanWorkspace(ws)).result.findings;
  }

  const changed = (await resolveChangedFiles(ws, { changed: opts.changed, base: opts.base })) ?? (await workspaceTree(ws)).files;
  const report = evaluateGate({
    findings,
    changedFiles: changed,
    waivers: await workspaceWaivers(ws, context),
    tiers: opts.tier && opts.tier.length ? opts.tier : ws.config.gate.tiers,
    context,
    now: new Date()
  });

  const json = gateReportJson(report);
  await writeJson(resolveIn(ws.root, ws.config.gate.report_path), json);
  r.gateReport(report);
  if (opts.json) r.output(`${JSON.stringify(json, null, 2)}\n`);
  return { ok: true, gateFailed: report.decision === 'fail' };
}
