import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import { RunContext } from '../src/core/scan/context.js';
import { collectTree, type SourceTree } from '../src/core/scan/tree.js';
import { TfRegistry } from '../src/core/tf/registry.js';
import { TaskFunctionSchema, type TaskFunction } from '../src/core/tf/types.js';

export const EMPTY_CATCH_TF = {
  id: 'BEX-001',
  name: 'Silent catch block',
  status: 'active',
  tier: 1,
  detection: { strategy: { kind: 'catch-clause', condition: 'empty-body' }, confidence: 0.9 },
  ontology: {},
  logic: {},
  allowed_transforms: [{ kind: 'rethrow' }],
  decision_rule: {
    text: 'Rethrow the caught error.',
    transform: 'rethrow',
    ask_if_hints: ['JSON.parse', 'comment'],
    min_confidence: 0.8
  }
};

export const CONSOLE_TF = {
  id: 'LOG-003',
  name: 'Stray console output',
  status: 'active',
  tier: 3,
  detection: { strategy: { kind: 'call-expression', callees: ['console.log'] }, confidence: 0.7 },
  ontology: {},
  logic: {},
  allowed_transforms: [{ kind: 'replace-callee', replacement: 'console.error' }],
  decision_rule: { transform: 'replace-callee' }
};

export const TRAILING_WS_TF = {
  id: 'WSP-005',
  name: 'Trailing whitespace',
  status: 'active',
  tier: 4,
  detection: { strategy: { kind: 'text-pattern', pattern: '[ \\t]+$' }, confidence: 1 },
  ontology: {},
  logic: {},
  allowed_transforms: [{ kind: 'replace-match', replacement: '' }],
  decision_rule: { transform: 'replace-match' },
  footprint: { include: ['**/*'] },
  verify: { predicates: ['finding-absent'] }
};

export const ANY_CATCH_TF = {
  id: 'CAT-002',
  name: 'Catch typed any',
  status: 'active',
  tier: 2,
  detection: { strategy: { kind: 'catch-clause', condition: 'any-annotation' }, confidence: 0.95 },
  ontology: {},
  logic: {},
  allowed_transforms: [{ kind: 'annotate-unknown' }],
  decision_rule: { transform: 'annotate-unknown' }
};

export const EVAL_TF = {
  id: 'EVL-004',
  name: 'Dynamic evaluation',
  status: 'active',
  tier: 1,
  detection: { strategy: { kind: 'call-expression', callees: ['eval'] }, confidence: 0.9 },
  ontology: {},
  logic: {},
  allowed_transforms: [],
  decision_rule: { text: 'Replace eval with an explicit parser.', transform: null }
};

export const SHELL_TF = {
  id: 'SHL-008',
  name: 'Shell-enabled child process',
  status: 'active',
  tier: 1,
  detection: {
    strategy: { kind: 'call-expression', callees: ['spawn', 'child_process.execFile'], option: { property: 'shell', equals: true } },
    confidence: 0.9
  },
  ontology: {},
  logic: {},
  allowed_transforms: [],
  decision_rule: { text: 'Pass arguments directly.', transform: null }
};

export function makeTf(raw: object, overrides: Record<string, unknown> = {}): TaskFunction {
  return TaskFunctionSchema.parse({ ...raw, ...overrides });
}

export function makeRegistry(...raws: object[]): TfRegistry {
  return new TfRegistry(raws.map((r) => makeTf(r)));
}

export async function tempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `fixpoint-${prefix}-`));
}

/** Write `files` under a fresh temp directory and return its tree and a run context over it. */
export async function tempTree(files: Record<string, string>): Promise<{ root: string; tree: SourceTree; ctx: RunContext }> {
  const root = await tempDir('tree');
  for (const [rel, content] of Object.entries(files)) {
    await mkdir(dirname(join(root, rel)), { recursive: true });
    await writeFile(join(root, rel), content, 'utf8');
  }
  return { root, tree: await collectTree(root), ctx: new RunContext({ root }) };
}
