import { runSuite } from '../../core/verify/suite.js';
import { getRenderer } from '../ui/renderer.js';
import { openWorkspace, type CommandResult, type WorkspaceOptions } from '../workspace.js';

/** `fixpoint verify`: run the configured external checks against the working tree. */
export async function runVerifyCommand(opts: WorkspaceOptions): Promise<CommandResult> {
  const r = getRenderer();
  const ws = await openWorkspace(opts);
  const suite = await runSuite(ws.config.verify.checks, { cwd: ws.root, timeoutMs: ws.config.verify.timeout_ms });
  r.verifyReport({ suite, tfs: [], errors: [], ok: suite.status === 'pass' || suite.status === 'skipped' });

  if (suite.status === 'skipped') {
    r.dim('no checks configured under verify.checks');
    return { ok: true };
  }
  if (suite.status !== 'pass') {
    const failed = suite.checks.filter((c) => c.status !== 'pass').map((c) => `${c.name}: ${c.status}`);
    return { ok: false, details: failed.join('\n') };
  }
  return { ok: true };
}
