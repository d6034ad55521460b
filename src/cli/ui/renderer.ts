import type { ApplyResult } from '../../core/apply/engine.js';
import type { IngestOutcome } from '../../core/bridge/agent-bridge.js';
import type { SchemaViolation } from '../../core/errors.js';
import type { Finding } from '../../core/finding/types.js';
import { toRecord } from '../../core/finding/types.js';
import { gateReportJson, type GateReport } from '../../core/gate/evaluator.js';
import type { ProposalSet } from '../../core/propose/proposer.js';
import type { TaskFunction } from '../../core/tf/types.js';
import type { VerifyReport } from '../../core/verify/verifier.js';
import { formatMs, horizontalRule, keyValue, plural } from './format.js';
import { theme, INDENT } from './theme.js';

// ── Renderer Interface ──────────────────────────────────────────────────────

/**
 * The Renderer is the single output coordinator for the CLI. Human-facing output goes to stderr;
 * streams meant for other tools (findings, patches, reports) go to stdout through `output`.
 * - InteractiveRenderer: colored text
 * - QuietRenderer: JSON lines (--quiet)
 */
export interface Renderer {
  heading(title: string): void;
  text(message: string): void;
  blank(): void;
  info(message: string): void;
  success(message: string): void;
  dim(message: string): void;
  warn(message: string): void;
  error(title: string, details: string, tip?: string): void;

  registry(tfs: TaskFunction[], violations: readonly SchemaViolation[]): void;
  findings(findings: Finding[]): void;
  proposals(set: ProposalSet): void;
  applyResult(res: ApplyResult): void;
  verifyReport(report: VerifyReport): void;
  gateReport(report: GateReport): void;
  ingestOutcomes(outcomes: IngestOutcome[]): void;

  /** Raw machine output on stdout, identical in both modes. */
  output(text: string): void;
}

// ── Interactive Renderer ────────────────────────────────────────────────────

export class InteractiveRenderer implements Renderer {
  private writeln(msg: string = ''): void {
    process.stderr.write(msg + '\n');
  }

  heading(title: string): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.bold(title)}`);
    this.writeln(`${INDENT}${horizontalRule()}`);
  }

  text(message: string): void {
    this.writeln(message);
  }

  blank(): void {
    this.writeln();
  }

  info(message: string): void {
    this.writeln(`${INDENT}${theme.info('ℹ')} ${message}`);
  }

  success(message: string): void {
    this.writeln(`${INDENT}${theme.check} ${message}`);
  }

  dim(message: string): void {
    this.writeln(`${INDENT}${theme.dim(message)}`);
  }

  warn(message: string): void {
    this.writeln(`${INDENT}${theme.warning('⚠')} ${message}`);
  }

  error(title: string, details: string, tip?: string): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.error(theme.bold('ERROR'))}  ${title}`);
    for (const line of details.split('\n')) {
      this.writeln(`${INDENT}${INDENT}${line}`);
    }
    if (tip) this.writeln(`${INDENT}${theme.dim(`tip: ${tip}`)}`);
    this.writeln();
  }

  registry(tfs: TaskFunction[], violations: readonly SchemaViolation[]): void {
    this.heading('Task Functions');
    for (const tf of tfs) {
      const status = tf.status === 'active' ? theme.success(tf.status) : theme.dim(tf.status);
      this.writeln(`${INDENT}${theme.tier(tf.tier)(tf.id)}  ${tf.name} ${theme.dim(`tier ${tf.tier}`)} ${status}`);
    }
    for (const v of violations) this.writeln(`${INDENT}${theme.cross} ${v.toLine()}`);
  }

  findings(findings: Finding[]): void {
    this.heading(`Findings (${findings.length})`);
    for (const f of findings) {
      const where = `${f.file}:${f.span.start.line}:${f.span.start.column}`;
      const fix = f.resolved ? theme.success('auto') : theme.warning('review');
      this.writeln(`${INDENT}${theme.tier(f.tier)(f.tfId)} ${where} ${f.message} ${theme.dim(f.frame)} ${fix}`);
    }
  }

  proposals(set: ProposalSet): void {
    this.heading('Proposals');
    this.writeln(keyValue('Patches', String(set.patches.length)));
    this.writeln(keyValue('Ambiguous', String(set.ambiguous.length)));
    this.writeln(keyValue('Rejected', String(set.rejected.length)));
    for (const r of set.rejected) {
      this.writeln(`${INDENT}${theme.bullet} ${r.finding.tfId} ${r.finding.file}:${r.finding.span.start.line} ${theme.dim(r.reason)}`);
    }
  }

  applyResult(res: ApplyResult): void {
    this.heading('Apply');
    this.writeln(keyValue('Applied', String(res.applied.length)));
    this.writeln(keyValue('Files written', String(res.filesWritten.length)));
    for (const c of res.conflicts) this.writeln(`${INDENT}${theme.cross} ${c.toLine()}`);
  }

  verifyReport(report: VerifyReport): void {
    this.heading('Verify');
    this.writeln(keyValue('Suite', theme.status(report.suite.status)(report.suite.status)));
    for (const c of report.suite.checks) {
      this.writeln(`${INDENT}${INDENT}${theme.status(c.status)(c.status.padEnd(8))}${c.name} ${theme.dim(formatMs(c.durationMs))}`);
    }
    for (const t of report.tfs) {
      this.writeln(keyValue(t.tfId, `${theme.status(t.status)(t.status)} ${theme.dim(plural(t.files.length, 'file'))}`));
      for (const f of t.failures) this.writeln(`${INDENT}${INDENT}${theme.dim(f.toLine())}`);
    }
  }

  gateReport(report: GateReport): void {
    this.heading('Gate');
    this.writeln(keyValue('Findings', String(report.total)));
    this.writeln(keyValue('Gating tiers', report.tiers.join(', ')));
    this.writeln(keyValue('In tier', String(report.gatedTier)));
    this.writeln(keyValue('In change', `${report.inFootprint} ${theme.dim(`(${plural(report.changedFiles, 'file')})`)}`));
    this.writeln(keyValue('Waived', `${report.waived} ${theme.dim(`(${plural(report.waivers, 'active waiver')})`)}`));
    this.writeln(keyValue('Remaining', String(report.remaining)));
    for (const f of report.remainingFindings) {
      this.writeln(`${INDENT}${theme.cross} ${f.tfId} ${f.file}:${f.span.start.line}:${f.span.start.column} ${f.message}`);
    }
    this.blank();
    if (report.decision === 'pass') this.success('Gate passed');
    else this.writeln(`${INDENT}${theme.cross} ${theme.error('Gate failed')}`);
  }

  ingestOutcomes(outcomes: IngestOutcome[]): void {
    this.heading('Ingest');
    for (const o of outcomes) {
      const reason = o.reason ? ` ${theme.dim(o.reason)}` : '';
      this.writeln(`${INDENT}${theme.status(o.status)(o.status.padEnd(16))}${o.name} ${theme.dim(o.tfId)}${reason}`);
    }
  }

  output(text: string): void {
    process.stdout.write(text);
  }
}

// ── Quiet Renderer (JSON lines) ─────────────────────────────────────────────

export class QuietRenderer implements Renderer {
  private emit(type: string, data: Record<string, unknown> = {}): void {
    const event = { type, timestamp: new Date().toISOString(), ...data };
    process.stderr.write(JSON.stringify(event) + '\n');
  }

  heading(): void { /* no-op in quiet mode */ }
  blank(): void { /* no-op */ }

  text(message: string): void {
    this.emit('text', { message });
  }

  info(message: string): void {
    this.emit('info', { message });
  }

  success(message: string): void {
    this.emit('success', { message });
  }

  dim(message: string): void {
    this.emit('dim', { message });
  }

  warn(message: string): void {
    this.emit('warning', { message });
  }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, tip });
  }

  registry(tfs: TaskFunction[], violations: readonly SchemaViolation[]): void {
    this.emit('registry', {
      tfs: tfs.map((tf) => ({ id: tf.id, name: tf.name, status: tf.status, tier: tf.tier })),
      violations: violations.map((v) => ({ ...v.toJSON(), field: v.field }))
    });
  }

  findings(findings: Finding[]): void {
    this.emit('findings', { count: findings.length, findings: findings.map(toRecord) });
  }

  proposals(set: ProposalSet): void {
    this.emit('proposals', {
      patches: set.patches.map((p) => p.id),
      ambiguous: set.ambiguous.map((a) => ({ tf_id: a.finding.tfId, file: a.finding.file, line: a.finding.span.start.line, reason: a.reason })),
      rejected: set.rejected.map((r) => ({ tf_id: r.finding.tfId, file: r.finding.file, line: r.finding.span.start.line, reason: r.reason }))
    });
  }

  applyResult(res: ApplyResult): void {
    this.emit('apply', {
      applied: res.applied.map((a) => a.patch.id),
      conflicts: res.conflicts.map((c) => ({ ...c.toJSON(), patch_id: c.patchId, winner: c.winner })),
      files_written: res.filesWritten
    });
  }

  verifyReport(report: VerifyReport): void {
    this.emit('verify', {
      ok: report.ok,
      suite: report.suite,
      tfs: report.tfs.map((t) => ({ tf_id: t.tfId, status: t.status, files: t.files, failures: t.failures.map((f) => f.toJSON()) }))
    });
  }

  gateReport(report: GateReport): void {
    this.emit('gate', { ...gateReportJson(report) });
  }

  ingestOutcomes(outcomes: IngestOutcome[]): void {
    this.emit('ingest', {
      outcomes: outcomes.map((o) => ({
        name: o.name,
        tf_id: o.tfId,
        status: o.status,
        files: o.files,
        reason: o.reason,
        applied: o.applied.map((a) => ({ patch_id: a.patch.id, file: a.patch.file, landed: a.landed })),
        waivers: o.waivers.length
      }))
    });
  }

  output(text: string): void {
    process.stdout.write(text);
  }
}

// ── Singleton Access ────────────────────────────────────────────────────────

let _instance: Renderer | null = null;

export function getRenderer(): Renderer {
  if (!_instance) {
    _instance = process.env.FIXPOINT_QUIET === '1' ? new QuietRenderer() : new InteractiveRenderer();
  }
  return _instance;
}

export function createRenderer(opts: { quiet?: boolean } = {}): Renderer {
  const r = opts.quiet ? new QuietRenderer() : new InteractiveRenderer();
  _instance = r;
  return r;
}

/** Replace the active renderer (tests). */
export function setRenderer(r: Renderer): void {
  _instance = r;
}
