import { resolve } from 'node:path';

import { loadConfig, resolveIn, resolveTfDir, type FixpointConfig } from '../config/index.js';
import { RunContext } from '../core/scan/context.js';
import { scan, type ScanResult } from '../core/scan/scanner.js';
import { collectTree, type SourceTree } from '../core/scan/tree.js';
import { readRegistry, type TfRegistry } from '../core/tf/registry.js';
import { documentPathFor, loadWaivers } from '../core/waiver/ledger.js';
import type { Waiver } from '../core/waiver/types.js';
import { changedFiles, git, isGitRepo } from '../git/operations.js';
import { parsePathList } from '../git/diff-parser.js';
import { readText } from '../utils/fs.js';
import { Logger } from '../utils/logger.js';
import { getRenderer } from './ui/renderer.js';

export interface WorkspaceOptions {
  repoRoot?: string;
  configPath?: string;
  /** Overrides `tf_dir` from the config. */
  tfDir?: string;
}

export interface Workspace {
  root: string;
  config: FixpointConfig;
  logger: Logger;
  registry: TfRegistry;
  ctx: RunContext;
}

export function cliLogger(): Logger {
  const verbose = process.env.FIXPOINT_VERBOSE === '1';
  const quiet = process.env.FIXPOINT_QUIET === '1';
  return new Logger({ level: verbose ? 'debug' : 'warn', json: quiet, scope: 'fixpoint' });
}

/**
 * Config, logger, registry and run context for one command. Registry violations are shown; a fatal
 * load throws the RegistryError so the command fails with exit status 2.
 */
export async function openWorkspace(opts: WorkspaceOptions = {}): Promise<Workspace> {
  const root = resolve(opts.repoRoot ?? process.cwd());
  const config = await loadConfig(root, opts.configPath);
  const logger = cliLogger();

  const tfDir = opts.tfDir ? resolveIn(root, opts.tfDir) : resolveTfDir(config, root);
  const load = await readRegistry(tfDir);
  const r = getRenderer();
  for (const v of load.violations) r.warn(v.toLine());
  if (load.fatal) throw load.fatal;

  logger.debug(`registry: ${load.registry.all().length} TF(s) from ${tfDir}`);
  return { root, config, logger, registry: load.registry, ctx: new RunContext({ root, logger }) };
}

export async function workspaceTree(ws: Workspace): Promise<SourceTree> {
  return collectTree(ws.root, ws.config.tree);
}

export async function workspaceWaivers(ws: Workspace, context: string): Promise<Waiver[]> {
  const { waivers, warnings } = await loadWaivers({
    ledgerPath: resolveIn(ws.root, ws.config.waivers.ledger_path),
    documentPath: context === '*' ? null : resolveIn(ws.root, documentPathFor(ws.config.waivers.document_pattern, context)),
    context
  });
  const r = getRenderer();
  for (const w of warnings) r.warn(w);
  return waivers;
}

export interface ChangeSource {
  /** File holding a newline-separated path list. */
  changed?: string;
  /** Base branch to diff HEAD against. */
  base?: string;
}

/**
 * The change footprint: an explicit list file, else `git diff` against `base`. Null when neither is
 * available, which callers treat as "the whole tree".
 */
export async function resolveChangedFiles(ws: Workspace, src: ChangeSource): Promise<string[] | null> {
  if (src.changed) return parsePathList(await readText(resolveIn(ws.root, src.changed)));
  if (!src.base) return null;

  const repo = git(ws.root);
  if (!(await isGitRepo(repo))) {
    ws.logger.warn(`${ws.root} is not a git repository; gating the whole tree`);
    return null;
  }
  return (await changedFiles(repo, src.base)).map((f) => f.path);
}

// ── Shared stage helpers ────────────────────────────────────────────────────

export interface CommandResult {
  ok: boolean;
  details?: unknown;
  /** The gate ran and failed: exit status 1 rather than 2. */
  gateFailed?: boolean;
}

export interface ScanSelection {
  tfIds?: string[];
  /** Only these files; the whole configured tree when absent. */
  files?: string[] | null;
}

/** Collect the tree and scan it, reporting skipped files and detector failures as warnings. */
export async function scanWorkspace(ws: Workspace, sel: ScanSelection = {}): Promise<{ tree: SourceTree; result: ScanResult }> {
  const tree = await workspaceTree(ws);
  const result = await scan(tree, ws.registry, ws.ctx, {
    tfIds: sel.tfIds && sel.tfIds.length ? sel.tfIds : undefined,
    files: sel.files ?? undefined
  });
  const r = getRenderer();
  for (const s of result.skipped) r.dim(`skipped ${s.file}: ${s.reason}`);
  for (const f of result.failures) r.warn(f.toLine());
  return { tree, result };
}
