import { describe, expect, it } from 'vitest';
import { join } from 'node:path';

import { applyPatches } from '../src/core/apply/engine.js';
import { LineIndex } from '../src/core/finding/position.js';
import { editsToHunks, type Edit, type Patch } from '../src/core/patch/types.js';
import { proposeAll } from '../src/core/propose/proposer.js';
import { scan } from '../src/core/scan/scanner.js';
import { runCheck, runSuite } from '../src/core/verify/suite.js';
import { verify } from '../src/core/verify/verifier.js';
import { WaiverLedger } from '../src/core/waiver/ledger.js';
import type { Waiver } from '../src/core/waiver/types.js';
import { sha256 } from '../src/utils/fs.js';
import { EMPTY_CATCH_TF, TRAILING_WS_TF, makeRegistry, tempDir, tempTree } from './fixtures.js';

const node = process.execPath;

function patchFor(file: string, text: string, tfId: string, tier: number, edits: Edit[]): Patch {
  return {
    id: `${tfId}@${file}`,
    tfId,
    tier,
    file,
    transform: 'test',
    anchor: new LineIndex(text).positionAt(edits[0]?.start ?? 0),
    baseSha256: sha256(text),
    hunks: editsToHunks(text, edits)
  };
}

describe('verification suite', () => {
  it('reports pass, fail with exit code, and timeout', async () => {
    const cwd = await tempDir('suite');
    const ok = await runCheck({ name: 'ok', command: node, args: ['-e', 'process.exit(0)'] }, { cwd, timeoutMs: 10_000 });
    const bad = await runCheck({ name: 'bad', command: node, args: ['-e', 'process.exit(3)'] }, { cwd, timeoutMs: 10_000 });
    const slow = await runCheck({ name: 'slow', command: node, args: ['-e', 'setTimeout(() => {}, 10000)'] }, { cwd, timeoutMs: 300 });

    expect([ok.status, ok.exitCode]).toEqual(['pass', 0]);
    expect([bad.status, bad.exitCode]).toEqual(['fail', 3]);
    expect(slow.status).toBe('timeout');
  });

  it('keeps the combined output of a check', async () => {
    const cwd = await tempDir('suite');
    const res = await runCheck(
      { name: 'out', command: node, args: ['-e', "console.log('to stdout'); console.error('to stderr'); process.exit(1)"] },
      { cwd, timeoutMs: 10_000 }
    );
    expect(res.output.split('\n').sort()).toEqual(['to stderr', 'to stdout']);
  });

  it('is skipped without checks and fails when any check fails', async () => {
    const cwd = await tempDir('suite');
    expect(await runSuite([], { cwd, timeoutMs: 1000 })).toEqual({ status: 'skipped', checks: [] });

    const res = await runSuite(
      [
        { name: 'ok', command: node, args: ['-e', 'process.exit(0)'] },
        { name: 'bad', command: node, args: ['-e', 'process.exit(1)'] }
      ],
      { cwd, timeoutMs: 10_000 }
    );
    expect(res.status).toBe('fail');
    expect(res.checks.map((c) => c.name)).toEqual(['ok', 'bad']);
  });
});

describe('verifier', () => {
  it('passes a patch that removes its finding and still parses', async () => {
    const { tree, ctx } = await tempTree({ 'src/util.ts': 'try {\n  work();\n} catch {}\n' });
    const registry = makeRegistry(EMPTY_CATCH_TF);
    const set = await proposeAll((await scan(tree, registry, ctx)).findings, ctx, registry);
    const applied = await applyPatches(set.patches, ctx);

    const report = await verify({ applied: applied.applied, registry, ctx });

    expect(report.suite.status).toBe('skipped');
    expect(report.tfs).toEqual([{ tfId: 'BEX-001', status: 'pass', files: ['src/util.ts'], failures: [] }]);
    expect(report.ok).toBe(true);
  });

  it('fails a TF whose finding survives its own patch', async () => {
    const text = 'one \ntwo\n';
    const { ctx } = await tempTree({ 'notes.md': text });
    const registry = makeRegistry(TRAILING_WS_TF);
    const applied = await applyPatches([patchFor('notes.md', text, 'WSP-005', 4, [{ start: 0, end: 4, after: 'ONE  ' }])], ctx);

    const report = await verify({ applied: applied.applied, registry, ctx });

    expect(report.ok).toBe(false);
    expect(report.tfs[0]?.status).toBe('fail');
    expect(report.errors.map((e) => e.toLine())).toEqual(['WSP-005 notes.md: finding still present after patch (line 1)']);
  });

  it('fails a patch that breaks parsing, unless a waiver covers it', async () => {
    const text = 'const x = 1;\n';
    const { ctx } = await tempTree({ 'a.ts': text });
    const registry = makeRegistry(EMPTY_CATCH_TF);
    const applied = await applyPatches([patchFor('a.ts', text, 'BEX-001', 1, [{ start: 10, end: 11, after: '' }])], ctx);

    const failing = await verify({ applied: applied.applied, registry, ctx });
    expect(failing.tfs[0]?.failures.map((f) => f.reason)).toEqual(['no longer parses: Expression expected.']);
    expect(failing.ok).toBe(false);

    const waiver: Waiver = {
      tf_id: 'BEX-001',
      scope: 'a.ts',
      change_context: 'PR-7',
      expires_at: null,
      rationale: 'generated file',
      source: 'ledger'
    };
    const waived = await verify({ applied: applied.applied, registry, ctx, waivers: [waiver], context: 'PR-7' });
    expect(waived.tfs[0]?.status).toBe('waived');
    expect(waived.ok).toBe(true);

    const otherContext = await verify({ applied: applied.applied, registry, ctx, waivers: [waiver], context: 'PR-8' });
    expect(otherContext.tfs[0]?.status).toBe('fail');
  });

  it('records waivers for failing TFs when asked to', async () => {
    const text = 'const x = 1;\n';
    const { ctx } = await tempTree({ 'a.ts': text });
    const registry = makeRegistry(EMPTY_CATCH_TF);
    const applied = await applyPatches([patchFor('a.ts', text, 'BEX-001', 1, [{ start: 10, end: 11, after: '' }])], ctx);
    const ledger = await WaiverLedger.open(join(await tempDir('ledger'), 'waivers.jsonl'));

    const report = await verify({
      applied: applied.applied,
      registry,
      ctx,
      context: 'PR-9',
      now: new Date('2026-01-01T00:00:00Z'),
      recordWaiversOnFailure: { ledger }
    });

    expect(report.tfs[0]?.status).toBe('waived');
    const { entries } = await ledger.readAll();
    expect(entries).toEqual([
      {
        seq: 1,
        recorded_at: '2026-01-01T00:00:00.000Z',
        tf_id: 'BEX-001',
        scope: 'a.ts',
        change_context: 'PR-9',
        expires_at: null,
        rationale: 'verification failed: no longer parses: Expression expected.',
        source: 'ledger'
      }
    ]);
  });

  it('records one waiver per file when a TF fails several predicates there', async () => {
    const text = 'const x = 1; \n';
    const { ctx } = await tempTree({ 'a.ts': text });
    const registry = makeRegistry({ ...TRAILING_WS_TF, verify: { predicates: ['finding-absent', 'parses'] } });
    const applied = await applyPatches([patchFor('a.ts', text, 'WSP-005', 4, [{ start: 10, end: 11, after: '' }])], ctx);
    const ledger = await WaiverLedger.open(join(await tempDir('ledger'), 'waivers.jsonl'));

    const report = await verify({ applied: applied.applied, registry, ctx, context: 'PR-9', recordWaiversOnFailure: { ledger } });

    expect(report.tfs[0]?.failures).toHaveLength(2);
    const { entries } = await ledger.readAll();
    expect(entries.map((e) => [e.tf_id, e.scope, e.rationale])).toEqual([
      ['WSP-005', 'a.ts', 'verification failed: no longer parses: Expression expected.; finding still present after patch (line 1)']
    ]);
  });

  it('reports a failing external check as a stage error', async () => {
    const { tree, ctx } = await tempTree({ 'src/util.ts': 'try {\n  work();\n} catch {}\n' });
    const registry = makeRegistry(EMPTY_CATCH_TF);
    const set = await proposeAll((await scan(tree, registry, ctx)).findings, ctx, registry);
    const applied = await applyPatches(set.patches, ctx);

    const report = await verify({
      applied: applied.applied,
      registry,
      ctx,
      checks: [{ name: 'typecheck', command: node, args: ['-e', 'process.exit(2)'] }]
    });

    expect(report.suite.status).toBe('fail');
    expect(report.tfs[0]?.status).toBe('pass');
    expect(report.errors.map((e) => e.toLine())).toEqual(['check "typecheck" failed (exit 2)']);
    expect(report.ok).toBe(false);
  });
});
