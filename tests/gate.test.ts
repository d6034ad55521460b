import { describe, expect, it } from 'vitest';

import type { Finding } from '../src/core/finding/types.js';
import { evaluateGate, gateReportJson } from '../src/core/gate/evaluator.js';
import { scan } from '../src/core/scan/scanner.js';
import type { Waiver } from '../src/core/waiver/types.js';
import { EMPTY_CATCH_TF, makeRegistry, tempTree } from './fixtures.js';

const now = new Date('2026-05-01T00:00:00Z');

function finding(tfId: string, file: string, line: number, tier: number): Finding {
  const pos = { line, column: 1, offset: 0 };
  return {
    tfId,
    file,
    span: { start: pos, end: pos },
    tier,
    confidence: 1,
    message: 'm',
    frame: '<module>',
    context: '',
    hints: [],
    resolved: false
  };
}

function waiver(overrides: Partial<Waiver>): Waiver {
  return { tf_id: 'X-001', scope: '*', change_context: '*', expires_at: null, rationale: 'r', source: 'ledger', ...overrides };
}

describe('gate scenarios', () => {
  const BARE_CATCH = { ...EMPTY_CATCH_TF, id: 'X-001', decision_rule: { transform: 'rethrow' } };

  async function scanned(): Promise<Finding[]> {
    const { tree, ctx } = await tempTree({ 'src/handler.ts': 'try {\n  run();\n} catch {}\n' });
    return (await scan(tree, makeRegistry(BARE_CATCH), ctx)).findings;
  }

  it('fails a change whose only file carries a top-tier finding and no waiver', async () => {
    const report = evaluateGate({ findings: await scanned(), changedFiles: ['src/handler.ts'], waivers: [], context: 'PR-1', now });

    expect(report.decision).toBe('fail');
    expect(report.remaining).toBe(1);
    expect(report.remainingFindings.map((f) => `${f.tfId} ${f.file}:${f.span.start.line}`)).toEqual(['X-001 src/handler.ts:3']);
  });

  it('passes the same change once an unexpired waiver for its context exists', async () => {
    const report = evaluateGate({
      findings: await scanned(),
      changedFiles: ['src/handler.ts'],
      waivers: [waiver({ change_context: 'PR-1', expires_at: '2026-06-01T00:00:00.000Z' })],
      context: 'PR-1',
      now
    });

    expect(report.decision).toBe('pass');
    expect(report.remaining).toBe(0);
    expect(report.waived).toBe(1);
    expect(report.waivers).toBe(1);
  });
});

describe('gate evaluator', () => {
  const findings = [finding('X-001', 'src/a.ts', 3, 1), finding('X-001', 'src/b.ts', 1, 1), finding('LOG-003', 'src/a.ts', 7, 3)];

  it('ignores findings outside the gating tiers and outside the change', () => {
    const report = evaluateGate({ findings, changedFiles: ['src/a.ts'], waivers: [], context: '*', now });

    expect(report).toMatchObject({ total: 3, gatedTier: 2, inFootprint: 1, remaining: 1, tiers: [1], changedFiles: 1 });
    expect(report.remainingFindings.map((f) => f.file)).toEqual(['src/a.ts']);
  });

  it('gates extra tiers when asked', () => {
    const report = evaluateGate({ findings, changedFiles: ['src/a.ts'], waivers: [], tiers: [3, 1, 3], context: '*', now });
    expect(report.tiers).toEqual([1, 3]);
    expect(report.remainingFindings.map((f) => f.tfId)).toEqual(['X-001', 'LOG-003']);
  });

  it('does not count expired, foreign-context or out-of-scope waivers', () => {
    const waivers = [
      waiver({ expires_at: '2026-04-30T00:00:00.000Z' }),
      waiver({ change_context: 'PR-2' }),
      waiver({ scope: 'lib/**' }),
      waiver({ tf_id: 'LOG-003' })
    ];
    const report = evaluateGate({ findings, changedFiles: ['src/a.ts'], waivers, context: 'PR-1', now });

    expect(report.decision).toBe('fail');
    expect(report.waivers).toBe(1);
    expect(report.waived).toBe(0);
  });

  it('waives only the files a scoped waiver matches', () => {
    const report = evaluateGate({
      findings,
      changedFiles: ['src/a.ts', 'src/b.ts'],
      waivers: [waiver({ scope: 'src/b.ts' })],
      context: '*',
      now
    });

    expect(report.waived).toBe(1);
    expect(report.remainingFindings.map((f) => f.file)).toEqual(['src/a.ts']);
  });

  it('is monotone: more waivers or fewer findings never turn a pass into a fail', () => {
    const pool = [waiver({ scope: 'src/a.ts' }), waiver({ scope: 'src/b.ts' }), waiver({ tf_id: 'LOG-003' })];
    const changedFiles = ['src/a.ts', 'src/b.ts'];
    const remaining = (fs: Finding[], ws: Waiver[]) =>
      evaluateGate({ findings: fs, changedFiles, waivers: ws, tiers: [1, 3], context: '*', now }).remaining;

    for (let mask = 0; mask < 1 << pool.length; mask++) {
      const ws = pool.filter((_, i) => mask & (1 << i));
      const base = remaining(findings, ws);
      for (const extra of pool) expect(remaining(findings, [...ws, extra])).toBeLessThanOrEqual(base);
      for (let drop = 0; drop < findings.length; drop++) {
        expect(remaining(findings.filter((_, i) => i !== drop), ws)).toBeLessThanOrEqual(base);
      }
    }
  });

  it('serialises the report with snake_case keys', () => {
    const report = evaluateGate({ findings, changedFiles: ['src/b.ts'], waivers: [], context: '*', now });
    const json = gateReportJson(report);

    expect(json).toMatchObject({
      decision: 'fail',
      total: 3,
      gated_tier: 2,
      in_footprint: 1,
      waivers: 0,
      waived: 0,
      remaining: 1,
      gate_tiers: [1],
      changed_files: 1
    });
    expect(json.remaining_findings.map((f) => f.tf_id)).toEqual(['X-001']);
  });
});
