import { describe, expect, it } from 'vitest';
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

import { ingest, ingestDirectory } from '../src/core/bridge/agent-bridge.js';
import { fileDiffToPatch } from '../src/core/bridge/diff-patch.js';
import { emitTasks, TaskPacketSchema } from '../src/core/bridge/packets.js';
import { proposeAll } from '../src/core/propose/proposer.js';
import { scan } from '../src/core/scan/scanner.js';
import { WaiverLedger } from '../src/core/waiver/ledger.js';
import { parseUnifiedDiff } from '../src/git/diff-parser.js';
import { readJson } from '../src/utils/fs.js';
import { EMPTY_CATCH_TF, makeRegistry, tempDir, tempTree } from './fixtures.js';

const UTIL = ['export const run = () => {', '  try {', '    work();', '  } catch {}', '};', ''].join('\n');

const PARSE = [
  'export function parse(s: string) {',
  '  try {',
  '    return JSON.parse(s);',
  '  } catch {}',
  '  return null;',
  '}',
  ''
].join('\n');

const FIX_DIFF = [
  '--- a/src/util.ts',
  '+++ b/src/util.ts',
  '@@ -4,1 +4,3 @@',
  '-  } catch {}',
  '+  } catch (error) {',
  '+    throw error;',
  '+  }',
  ''
].join('\n');

async function setup(files: Record<string, string>) {
  const t = await tempTree(files);
  const ledger = await WaiverLedger.open(join(await tempDir('bridge-ledger'), 'waivers.jsonl'));
  return { ...t, ledger, registry: makeRegistry(EMPTY_CATCH_TF) };
}

describe('task packets', () => {
  it('emits one packet per ambiguous finding', async () => {
    const { root, tree, ctx, registry } = await setup({ 'src/parse.ts': PARSE });
    const set = await proposeAll((await scan(tree, registry, ctx)).findings, ctx, registry);
    const tasksDir = join(root, '.fixpoint', 'tasks');

    const written = await emitTasks(set.ambiguous, { tasksDir, registry });

    expect(written).toEqual([join(tasksDir, 'task-001-BEX-001.json')]);
    const packet = TaskPacketSchema.parse(await readJson(join(tasksDir, 'task-001-BEX-001.json')));
    expect(packet).toEqual({
      packet_id: 'task-001-BEX-001',
      tf_id: 'BEX-001',
      tier: 1,
      file: 'src/parse.ts',
      line: 4,
      column: 5,
      span: { start_line: 4, end_line: 4, start_offset: 73, end_offset: 81 },
      message: 'empty catch block swallows the error',
      frame: 'function parse()',
      code_frame: {
        start_line: 2,
        end_line: 6,
        text: '  try {\n    return JSON.parse(s);\n  } catch {}\n  return null;\n}'
      },
      hints: ['JSON.parse'],
      allowed_transforms: [{ kind: 'rethrow' }],
      decision_rule: { text: 'Rethrow the caught error.', reason: 'hint "JSON.parse" is in ask_if_hints' }
    });
  });

  it('replaces packets left by an earlier emit', async () => {
    const { root, tree, ctx, registry } = await setup({ 'src/parse.ts': PARSE });
    const tasksDir = join(root, 'tasks');
    await emitTasks([], { tasksDir, registry });
    await writeFile(join(tasksDir, 'task-007-BEX-001.json'), '{}', 'utf8');
    await writeFile(join(tasksDir, 'notes.txt'), 'keep', 'utf8');

    const set = await proposeAll((await scan(tree, registry, ctx)).findings, ctx, registry);
    await emitTasks(set.ambiguous, { tasksDir, registry });

    expect((await readdir(tasksDir)).sort()).toEqual(['notes.txt', 'task-001-BEX-001.json']);
  });
});

describe('diff conversion', () => {
  it('turns a unified diff into a whole-line patch against the file', () => {
    const diff = parseUnifiedDiff(FIX_DIFF).files[0];
    if (!diff) throw new Error('expected a file diff');
    const res = fileDiffToPatch(diff, UTIL, { id: 'd', tfId: 'BEX-001', tier: 1, file: 'src/util.ts' });

    expect(res.kind).toBe('patch');
    if (res.kind === 'patch') {
      expect(res.patch.transform).toBe('agent-diff');
      expect(res.patch.hunks).toEqual([
        { start: 47, end: 59, before: '  } catch {}', after: '  } catch (error) {\n    throw error;\n  }', startLine: 4, eof: false }
      ]);
    }
  });

  it('handles pure insertions and deletions', () => {
    const text = 'a\nb\nc\n';
    const insert = parseUnifiedDiff('--- a/f\n+++ b/f\n@@ -1,0 +2,1 @@\n+x\n').files[0];
    const remove = parseUnifiedDiff('--- a/f\n+++ b/f\n@@ -2,1 +1,0 @@\n-b\n').files[0];
    if (!insert || !remove) throw new Error('expected file diffs');

    const ins = fileDiffToPatch(insert, text, { id: 'i', tfId: 'BEX-001', tier: 1, file: 'f' });
    const del = fileDiffToPatch(remove, text, { id: 'r', tfId: 'BEX-001', tier: 1, file: 'f' });

    expect(ins.kind === 'patch' ? ins.patch.hunks.map((h) => [h.before, h.after]) : ins).toEqual([['a', 'a\nx']]);
    expect(del.kind === 'patch' ? del.patch.hunks.map((h) => [h.before, h.after]) : del).toEqual([['b\nc', 'c']]);
  });

  it('reports a hunk that does not match the file', () => {
    const diff = parseUnifiedDiff('--- a/f\n+++ b/f\n@@ -2,1 +2,1 @@\n-q\n+r\n').files[0];
    if (!diff) throw new Error('expected a file diff');
    expect(fileDiffToPatch(diff, 'a\nb\n', { id: 'x', tfId: 'BEX-001', tier: 1, file: 'f' })).toEqual({
      kind: 'mismatch',
      reason: '@@ -2,1 +2,1 @@ does not match f'
    });
  });
});

describe('ingest', () => {
  it('merges a diff that verifies, then recognises it as already applied', async () => {
    const { root, ctx, registry, ledger } = await setup({ 'src/util.ts': UTIL });
    const opts = { ctx, registry, ledger, context: 'PR-3' };

    const [merged] = await ingest([{ name: 'fix', tfId: 'BEX-001', text: FIX_DIFF }], opts);
    expect({ ...merged, applied: [] }).toEqual({
      name: 'fix',
      tfId: 'BEX-001',
      status: 'merged',
      files: ['src/util.ts'],
      reason: null,
      applied: [],
      waivers: []
    });
    expect(merged?.applied.map((a) => [a.patch.id, a.patch.file, a.landed])).toEqual([
      ['fix:src/util.ts', 'src/util.ts', [{ startLine: 4, endLine: 6 }]]
    ]);
    expect(await readFile(join(root, 'src/util.ts'), 'utf8')).toBe(
      ['export const run = () => {', '  try {', '    work();', '  } catch (error) {', '    throw error;', '  }', '};', ''].join('\n')
    );

    const [again] = await ingest([{ name: 'fix', tfId: 'BEX-001', text: FIX_DIFF }], opts);
    expect(again?.status).toBe('already-applied');
    expect(again?.applied).toEqual([]);
    expect((await ledger.readAll()).entries).toEqual([]);
  });

  it('rejects a diff that fails verification, leaves the tree alone and records a waiver', async () => {
    const { root, ctx, registry, ledger } = await setup({ 'src/util.ts': UTIL });
    const broken = FIX_DIFF.replace('+  }\n', '');
    const fixedHeader = broken.replace('@@ -4,1 +4,3 @@', '@@ -4,1 +4,2 @@');

    const [outcome] = await ingest([{ name: 'bad', tfId: 'BEX-001', text: fixedHeader }], {
      ctx,
      registry,
      ledger,
      context: 'PR-3',
      now: new Date('2026-02-01T00:00:00Z')
    });

    expect(outcome?.status).toBe('rejected');
    expect(outcome?.reason?.startsWith('verification failed: BEX-001 src/util.ts: no longer parses: ')).toBe(true);
    expect(await readFile(join(root, 'src/util.ts'), 'utf8')).toBe(UTIL);

    const { entries } = await ledger.readAll();
    expect(entries.map((e) => [e.tf_id, e.scope, e.change_context, e.source, e.recorded_at])).toEqual([
      ['BEX-001', 'src/util.ts', 'PR-3', 'agent-bridge', '2026-02-01T00:00:00.000Z']
    ]);
    expect(entries[0]?.rationale.startsWith('agent diff bad rejected: verification failed: ')).toBe(true);
  });

  it('rejects diffs that do not match, are malformed, or name an inactive TF', async () => {
    const { ctx, registry, ledger } = await setup({ 'src/util.ts': UTIL });
    const outcomes = await ingest(
      [
        { name: 'stale', tfId: 'BEX-001', text: FIX_DIFF.replace('-  } catch {}', '-  } catch { }') },
        { name: 'short', tfId: 'BEX-001', text: FIX_DIFF.replace('+  }\n', '') },
        { name: 'other', tfId: 'ZZZ-999', text: FIX_DIFF },
        { name: 'create', tfId: 'BEX-001', text: '--- /dev/null\n+++ b/src/new.ts\n@@ -0,0 +1,1 @@\n+x\n' }
      ],
      { ctx, registry, ledger, context: '*' }
    );

    expect(outcomes.map((o) => [o.name, o.status, o.reason])).toEqual([
      ['stale', 'rejected', '@@ -4,1 +4,3 @@ does not match src/util.ts'],
      ['short', 'rejected', 'malformed diff: line 3: hunk body does not match its header (-1/1 +2/3)'],
      ['other', 'rejected', 'ZZZ-999 is not an active TF'],
      ['create', 'rejected', 'diffs may only modify existing files']
    ]);
    expect(outcomes.map((o) => o.waivers.map((w) => w.scope))).toEqual([['src/util.ts'], ['*'], ['*'], ['src/new.ts']]);
  });

  it('rejects diffs that reach outside the tree, into protected paths or past the TF footprint', async () => {
    const { root, ctx, registry, ledger } = await setup({ 'src/util.ts': UTIL, '.fixpoint/hook.ts': UTIL, 'docs/notes.md': UTIL });
    const outside = join(dirname(root), `${basename(root)}-outside.ts`);
    await writeFile(outside, UTIL, 'utf8');
    const retarget = (path: string) => FIX_DIFF.replaceAll('src/util.ts', path);

    const outcomes = await ingest(
      [
        { name: 'escape', tfId: 'BEX-001', text: retarget(`../${basename(outside)}`) },
        { name: 'protected', tfId: 'BEX-001', text: retarget('.fixpoint/hook.ts') },
        { name: 'docs', tfId: 'BEX-001', text: retarget('docs/notes.md') }
      ],
      { ctx, registry, ledger, context: '*' }
    );

    expect(outcomes.map((o) => [o.name, o.status, o.reason])).toEqual([
      ['escape', 'rejected', `../${basename(outside)} is outside the tree`],
      ['protected', 'rejected', '.fixpoint/hook.ts is a protected path'],
      ['docs', 'rejected', 'docs/notes.md is outside the BEX-001 footprint']
    ]);
    expect(await readFile(outside, 'utf8')).toBe(UTIL);
    expect(await readFile(join(root, '.fixpoint/hook.ts'), 'utf8')).toBe(UTIL);
    expect(await readFile(join(root, 'docs/notes.md'), 'utf8')).toBe(UTIL);
  });

  it('runs checks in an isolated copy that still resolves the tree dependencies', async () => {
    const { root, ctx, registry, ledger } = await setup({ 'src/util.ts': UTIL });
    await mkdir(join(root, 'node_modules', 'dep'), { recursive: true });
    await writeFile(join(root, 'node_modules', 'dep', 'index.js'), 'module.exports = 1;\n', 'utf8');

    const [outcome] = await ingest([{ name: 'fix', tfId: 'BEX-001', text: FIX_DIFF }], {
      ctx,
      registry,
      ledger,
      context: '*',
      checks: [{ name: 'deps', command: process.execPath, args: ['-e', "require('fs').statSync('node_modules/dep/index.js')"] }]
    });

    expect([outcome?.status, outcome?.reason]).toEqual(['merged', null]);
    expect(await readFile(join(root, 'node_modules', 'dep', 'index.js'), 'utf8')).toBe('module.exports = 1;\n');
  });

  it('ingests a task directory, taking the TF from each packet', async () => {
    const { root, tree, ctx, registry, ledger } = await setup({ 'src/parse.ts': PARSE });
    const tasksDir = join(root, '.fixpoint', 'tasks');
    const set = await proposeAll((await scan(tree, registry, ctx)).findings, ctx, registry);
    await emitTasks(set.ambiguous, { tasksDir, registry });

    const answer = [
      '--- a/src/parse.ts',
      '+++ b/src/parse.ts',
      '@@ -4,1 +4,3 @@',
      '-  } catch {}',
      '+  } catch (error) {',
      '+    return null;',
      '+  }',
      ''
    ].join('\n');
    await writeFile(join(tasksDir, 'task-001-BEX-001.diff'), answer, 'utf8');

    const outcomes = await ingestDirectory(tasksDir, { ctx, registry, ledger, context: '*' });

    expect(outcomes.map((o) => [o.name, o.tfId, o.status])).toEqual([['task-001-BEX-001', 'BEX-001', 'merged']]);
    expect(await readFile(join(root, 'src/parse.ts'), 'utf8')).toContain('  } catch (error) {\n    return null;\n  }');
  });
});
