import { resolve } from 'node:path';

import { loadConfig, resolveIn, resolveTfDir } from '../../config/index.js';
import { readRegistry } from '../../core/tf/registry.js';
import { getRenderer } from '../ui/renderer.js';
import type { CommandResult } from '../workspace.js';

export interface ValidateCommandOptions {
  repoRoot?: string;
  configPath?: string;
  tfDir?: string;
  /** Fail on any violation, not only on fatal ones. */
  strict?: boolean;
}

/**
 * `fixpoint validate`: load the TF set and list every TF with its status. Violations on stub or
 * disabled TFs are shown but only fail the command under `--strict`.
 */
export async function runValidateCommand(opts: ValidateCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  const root = resolve(opts.repoRoot ?? process.cwd());
  const config = await loadConfig(root, opts.configPath);
  const tfDir = opts.tfDir ? resolveIn(root, opts.tfDir) : resolveTfDir(config, root);

  const load = await readRegistry(tfDir);
  r.registry(load.registry.all(), load.violations);

  if (load.fatal) return { ok: false, details: load.fatal.toLine() };
  if (opts.strict && load.violations.length > 0) {
    return { ok: false, details: `${load.violations.length} schema violation(s)` };
  }
  r.blank();
  r.success(`${load.registry.active().length} active TF(s) in ${tfDir}`);
  return { ok: true };
}
