import { execa } from 'execa';

export interface CheckSpec {
  name: string;
  command: string;
  args: string[];
}

export type CheckStatus = 'pass' | 'fail' | 'timeout';

export interface CheckResult {
  name: string;
  status: CheckStatus;
  exitCode: number | null;
  durationMs: number;
  /** Tail of combined stdout/stderr. */
  output: string;
}

export type SuiteStatus = 'pass' | 'fail' | 'timeout' | 'skipped';

export interface SuiteResult {
  status: SuiteStatus;
  checks: CheckResult[];
}

const OUTPUT_TAIL = 4000;

/** Run one external checker to completion or until `timeoutMs`. The command runs without a shell. */
export async function runCheck(check: CheckSpec, opts: { cwd: string; timeoutMs: number }): Promise<CheckResult> {
  const started = Date.now();
  const res = await execa(check.command, check.args, {
    cwd: opts.cwd,
    timeout: opts.timeoutMs,
    reject: false,
    all: true,
    stdin: 'ignore',
    stdout: 'pipe',
    stderr: 'pipe'
  });

  const status: CheckStatus = res.timedOut ? 'timeout' : res.failed ? 'fail' : 'pass';
  const exit = res.exitCode === undefined ? '' : ` with exit code ${res.exitCode}`;
  const output = res.all || (res.failed ? `${check.command} failed${exit}` : '');
  return {
    name: check.name,
    status,
    exitCode: res.exitCode ?? null,
    durationMs: Date.now() - started,
    output: output.length > OUTPUT_TAIL ? output.slice(-OUTPUT_TAIL) : output
  };
}

/**
 * Run the configured checks one after another. The suite times out if any check did, otherwise fails
 * if any check failed.
 */
export async function runSuite(checks: CheckSpec[], opts: { cwd: string; timeoutMs: number }): Promise<SuiteResult> {
  if (checks.length === 0) return { status: 'skipped', checks: [] };

  const results: CheckResult[] = [];
  for (const check of checks) results.push(await runCheck(check, opts));

  const status: SuiteStatus = results.some((r) => r.status === 'timeout')
    ? 'timeout'
    : results.some((r) => r.status === 'fail')
      ? 'fail'
      : 'pass';
  return { status, checks: results };
}
