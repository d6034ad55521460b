#!/usr/bin/env node
import { Command } from 'commander';
import { existsSync } from 'node:fs';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { FixpointError } from '../core/errors.js';
import { runApplyCommand } from './commands/apply.js';
import { runEmitCommand } from './commands/emit.js';
import { runGateCommand } from './commands/gate.js';
import { runIngestCommand } from './commands/ingest.js';
import { runProposeCommand } from './commands/propose.js';
import { runRunCommand } from './commands/run.js';
import { runScanCommand } from './commands/scan.js';
import { runValidateCommand } from './commands/validate.js';
import { runVerifyCommand } from './commands/verify.js';
import { runWaiveCommand } from './commands/waive.js';
import { createRenderer, getRenderer } from './ui/renderer.js';
import { cliLogger, type CommandResult } from './workspace.js';

/** Exit status: 0 stage completed, 1 gate failed, 2 stage error. */
export const EXIT_OK = 0;
export const EXIT_GATE_FAILED = 1;
export const EXIT_STAGE_ERROR = 2;

interface SharedOptions {
  config?: string;
  tfDir?: string;
}

interface ChangeOptions {
  changed?: string;
  base?: string;
}

export async function buildCli(argv: string[]): Promise<void> {
  const program = new Command();

  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('fixpoint')
    .description('Policy-driven static analysis: find, patch, verify and gate with declarative Task Functions')
    .version(version, '-v, --version');

  program
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Machine-friendly output (JSON events on stderr)');

  program.hook('preAction', (thisCommand) => {
    const o = thisCommand.opts<{ verbose?: boolean; quiet?: boolean }>();
    process.env.FIXPOINT_VERBOSE = o.verbose ? '1' : '0';
    process.env.FIXPOINT_QUIET = o.quiet ? '1' : '0';
    createRenderer({ quiet: !!o.quiet });
  });

  // ── Registry ─────────────────────────────────────────────────────────────

  withShared(program.command('validate'))
    .description('Load and validate the TF set')
    .option('--strict', 'Fail on any schema violation, including stub and disabled TFs')
    .action(async (opts: SharedOptions & { strict?: boolean }) => {
      await runAction('Validation failed', () =>
        runValidateCommand({ configPath: opts.config, tfDir: opts.tfDir, strict: !!opts.strict })
      );
    });

  // ── Stages ───────────────────────────────────────────────────────────────

  withChange(withShared(program.command('scan')))
    .description('Scan the tree and write the findings stream')
    .option('--tf <id>', 'Only this TF (repeatable)', collectRepeatable, [])
    .option('--out <path>', 'Findings file (default: gate.findings_path)')
    .option('--stdout', 'Also print the findings stream on stdout')
    .action(async (opts: SharedOptions & ChangeOptions & { tf: string[]; out?: string; stdout?: boolean }) => {
      await runAction('Scan failed', () =>
        runScanCommand({ ...shared(opts), ...change(opts), tf: opts.tf, out: opts.out, stdout: !!opts.stdout })
      );
    });

  withChange(withShared(program.command('propose')))
    .description('Print the patch stream for the current findings (dry run)')
    .option('--tf <id>', 'Only this TF (repeatable)', collectRepeatable, [])
    .action(async (opts: SharedOptions & ChangeOptions & { tf: string[] }) => {
      await runAction('Propose failed', () => runProposeCommand({ ...shared(opts), ...change(opts), tf: opts.tf }));
    });

  withChange(withShared(program.command('apply')))
    .description('Apply every resolved patch, then verify what landed')
    .option('--tf <id>', 'Only this TF (repeatable)', collectRepeatable, [])
    .option('--context <id>', 'Change context for waivers', '*')
    .option('--no-verify', 'Skip verification')
    .option('--waive-failures', 'Record a waiver for each TF that fails verification')
    .action(async (opts: SharedOptions & ChangeOptions & { tf: string[]; context: string; verify: boolean; waiveFailures?: boolean }) => {
      await runAction('Apply failed', () =>
        runApplyCommand({
          ...shared(opts),
          ...change(opts),
          tf: opts.tf,
          context: opts.context,
          verify: opts.verify,
          waiveFailures: !!opts.waiveFailures
        })
      );
    });

  withShared(program.command('verify'))
    .description('Run the configured verification checks')
    .action(async (opts: SharedOptions) => {
      await runAction('Verification failed', () => runVerifyCommand(shared(opts)));
    });

  withChange(withShared(program.command('gate')))
    .description('Evaluate the merge gate for a change')
    .option('--findings <path>', 'Findings stream (default: gate.findings_path, or a fresh scan)')
    .option('--context <id>', 'Change context for waivers', '*')
    .option('--tier <n>', 'Gating tier (repeatable; default: gate.tiers)', collectNumber, [])
    .option('--json', 'Print the JSON report on stdout')
    .action(async (opts: SharedOptions & ChangeOptions & { findings?: string; context: string; tier: number[]; json?: boolean }) => {
      await runAction('Gate failed to run', () =>
        runGateCommand({
          ...shared(opts),
          ...change(opts),
          findings: opts.findings,
          context: opts.context,
          tier: opts.tier,
          json: !!opts.json
        })
      );
    });

  // ── Agent bridge ─────────────────────────────────────────────────────────

  withChange(withShared(program.command('emit')))
    .description('Write task packets for findings that need review')
    .option('--tf <id>', 'Only this TF (repeatable)', collectRepeatable, [])
    .option('--out <dir>', 'Task directory (default: agent.tasks_dir)')
    .action(async (opts: SharedOptions & ChangeOptions & { tf: string[]; out?: string }) => {
      await runAction('Emit failed', () => runEmitCommand({ ...shared(opts), ...change(opts), tf: opts.tf, out: opts.out }));
    });

  withShared(program.command('ingest'))
    .description('Verify agent diffs in isolation and merge the ones that pass')
    .argument('[dir]', 'Directory of .diff/.patch files (default: agent.tasks_dir)')
    .option('--context <id>', 'Change context for rejection waivers', '*')
    .action(async (dir: string | undefined, opts: SharedOptions & { context: string }) => {
      await runAction('Ingest failed', () => runIngestCommand({ ...shared(opts), dir, context: opts.context }));
    });

  // ── Waivers ──────────────────────────────────────────────────────────────

  withShared(program.command('waive'))
    .description('Record a waiver in the ledger')
    .argument('<tf-id>', 'TF to waive')
    .requiredOption('--reason <text>', 'Rationale')
    .option('--scope <glob>', 'Files covered', '*')
    .option('--context <id>', 'Change context', '*')
    .option('--expires <date>', 'Expiry (ISO date or datetime)')
    .action(async (tfId: string, opts: SharedOptions & { reason: string; scope: string; context: string; expires?: string }) => {
      await runAction('Waive failed', () =>
        runWaiveCommand({
          ...shared(opts),
          tfId,
          reason: opts.reason,
          scope: opts.scope,
          context: opts.context,
          expires: opts.expires
        })
      );
    });

  // ── Full pass ────────────────────────────────────────────────────────────

  withChange(withShared(program.command('run')))
    .description('Scan, propose, apply, emit, verify and gate in one pass')
    .option('--context <id>', 'Change context for waivers', '*')
    .option('--tier <n>', 'Gating tier (repeatable; default: gate.tiers)', collectNumber, [])
    .option('--dry-run', 'Propose only; leave the tree untouched')
    .option('--no-emit', 'Do not write task packets')
    .action(async (opts: SharedOptions & ChangeOptions & { context: string; tier: number[]; dryRun?: boolean; emit: boolean }) => {
      await runAction('Run failed', () =>
        runRunCommand({
          ...shared(opts),
          ...change(opts),
          context: opts.context,
          tier: opts.tier,
          dryRun: !!opts.dryRun,
          emit: opts.emit
        })
      );
    });

  await program.parseAsync(argv);
}

async function runAction(title: string, fn: () => Promise<CommandResult>): Promise<void> {
  const r = getRenderer();
  let res: CommandResult;
  try {
    res = await fn();
  } catch (err) {
    if (err instanceof Error && err.stack) cliLogger().debug(err.stack);
    const details = err instanceof FixpointError ? err.toLine() : err instanceof Error ? err.message : String(err);
    r.error(title, details, 'Run with --verbose for more details.');
    process.exitCode = EXIT_STAGE_ERROR;
    return;
  }

  if (!res.ok) {
    r.error(title, String(res.details ?? 'unknown error'));
    process.exitCode = EXIT_STAGE_ERROR;
    return;
  }
  process.exitCode = res.gateFailed ? EXIT_GATE_FAILED : EXIT_OK;
}

function withShared(cmd: Command): Command {
  return cmd
    .option('--config <path>', 'Config file (default: .fixpoint/config.yaml)')
    .option('--tf-dir <dir>', 'TF directory (overrides tf_dir)');
}

function withChange(cmd: Command): Command {
  return cmd
    .option('--changed <file>', 'File listing the changed paths, one per line')
    .option('--base <branch>', 'Base branch; changed files come from git diff <base>...HEAD');
}

function shared(opts: SharedOptions): { configPath?: string; tfDir?: string } {
  return { configPath: opts.config, tfDir: opts.tfDir };
}

function change(opts: ChangeOptions): ChangeOptions {
  return { changed: opts.changed, base: opts.base };
}

function detectVersionSync(): string | null {
  try {
    const startDir = dirname(fileURLToPath(import.meta.url));

    let current = startDir;
    for (let i = 0; i < 8; i++) {
      const candidate = resolve(current, 'package.json');
      if (existsSync(candidate)) {
        const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
        if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
          return parsed.version;
        }
        return null;
      }
      const parent = resolve(current, '..');
      if (parent === current) break;
      current = parent;
    }
    return null;
  } catch {
    return null;
  }
}

function collectRepeatable(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function collectNumber(value: string, previous: number[]): number[] {
  return [...previous, Number(value)];
}

buildCli(process.argv).catch((err: unknown) => {
  getRenderer().error('fixpoint', err instanceof Error ? err.message : String(err));
  process.exitCode = EXIT_STAGE_ERROR;
});
