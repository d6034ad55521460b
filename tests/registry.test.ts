import { describe, expect, it } from 'vitest';
import { join } from 'node:path';
import YAML from 'yaml';

import { RegistryError } from '../src/core/errors.js';
import { bundledTfDir, loadRegistry, parseRegistry, readRegistry } from '../src/core/tf/registry.js';
import { TaskFunctionSchema } from '../src/core/tf/types.js';
import { CONSOLE_TF, EMPTY_CATCH_TF, EVAL_TF, tempDir } from './fixtures.js';

function source(file: string, doc: object) {
  return { file, text: YAML.stringify(doc) };
}

describe('TF registry', () => {
  it('loads valid TFs sorted by id and separates the active set', () => {
    const { registry, violations, fatal } = parseRegistry([
      source('LOG-003.yaml', CONSOLE_TF),
      source('BEX-001.yaml', EMPTY_CATCH_TF),
      source('EVL-004.yaml', { ...EVAL_TF, status: 'disabled' })
    ]);

    expect(fatal).toBeNull();
    expect(violations).toEqual([]);
    expect(registry.all().map((t) => t.id)).toEqual(['BEX-001', 'EVL-004', 'LOG-003']);
    expect(registry.active().map((t) => t.id)).toEqual(['BEX-001', 'LOG-003']);
    expect(registry.isActive('EVL-004')).toBe(false);
  });

  it('fills schema defaults', () => {
    const tf = parseRegistry([source('BEX-001.yaml', EMPTY_CATCH_TF)]).registry.get('BEX-001');
    expect(tf?.footprint.include).toEqual(['**/*.{ts,tsx,mts,cts,js,jsx,mjs,cjs}']);
    expect(tf?.footprint.exclude).toEqual([]);
    expect(tf?.verify.predicates).toEqual(['finding-absent', 'parses']);
    expect(tf?.decision_rule.reject_if_hints).toEqual([]);
  });

  it('keeps loading when an invalid TF is a stub', () => {
    const { registry, violations, fatal } = parseRegistry([
      source('BEX-001.yaml', EMPTY_CATCH_TF),
      source('CAT-007.yaml', { ...EMPTY_CATCH_TF, id: 'CAT-007', status: 'stub', tier: 9 })
    ]);

    expect(fatal).toBeNull();
    expect(registry.all().map((t) => t.id)).toEqual(['BEX-001']);
    expect(violations).toHaveLength(1);
    expect(violations[0]?.tfId).toBe('CAT-007');
    expect(violations[0]?.field).toBe('tier');
  });

  it('is fatal when an active TF is invalid', () => {
    const { fatal, violations } = parseRegistry([
      source('BEX-001.yaml', { ...EMPTY_CATCH_TF, decision_rule: { ...EMPTY_CATCH_TF.decision_rule, transform: 'bind-error' } })
    ]);

    expect(fatal).toBeInstanceOf(RegistryError);
    expect(fatal?.reason).toBe('BEX-001 is invalid and not marked stub or disabled; no valid TF documents');
    expect(violations.map((v) => v.toLine())).toEqual(['BEX-001 decision_rule.transform: "bind-error" is not one of allowed_transforms']);
  });

  it('is fatal on duplicate ids', () => {
    const { fatal, registry } = parseRegistry([source('a.yaml', EMPTY_CATCH_TF), source('b.yaml', EMPTY_CATCH_TF)]);
    expect(fatal?.reason).toBe('BEX-001 is defined more than once');
    expect(registry.all()).toHaveLength(1);
  });

  it('is fatal on a document that is not YAML', () => {
    const { fatal } = parseRegistry([source('BEX-001.yaml', EMPTY_CATCH_TF), { file: 'bad.yaml', text: 'id: [unclosed' }]);
    expect(fatal?.reason).toBe('bad.yaml could not be read as YAML');
  });

  it('reports a missing TF directory as fatal', async () => {
    const dir = join(await tempDir('registry'), 'missing');
    const load = await readRegistry(dir);
    expect(load.fatal?.reason).toBe(`TF directory not found: ${dir}`);
    await expect(loadRegistry(dir)).rejects.toBeInstanceOf(RegistryError);
  });

  it('loads the bundled TF set', async () => {
    const registry = await loadRegistry(bundledTfDir());
    expect(registry.active().map((t) => t.id)).toEqual(['BEX-001', 'CAT-002', 'EVL-004', 'LOG-003', 'SHL-008', 'SYN-006', 'WSP-005']);
    expect(registry.get('CAT-007')?.status).toBe('stub');
  });
});

describe('TF schema cross-field checks', () => {
  it('rejects a transform that cannot rewrite the detection', () => {
    const res = TaskFunctionSchema.safeParse({ ...CONSOLE_TF, allowed_transforms: [{ kind: 'rethrow' }], decision_rule: { transform: null } });
    expect(res.success).toBe(false);
    if (!res.success) {
      expect(res.error.issues[0]?.message).toBe('transform "rethrow" cannot rewrite a call-expression detection');
    }
  });

  it('rejects a replacement callee that is itself detected', () => {
    const res = TaskFunctionSchema.safeParse({
      ...CONSOLE_TF,
      allowed_transforms: [{ kind: 'replace-callee', replacement: 'console.log' }]
    });
    expect(res.success).toBe(false);
  });

  it('rejects a pattern that does not compile', () => {
    const res = TaskFunctionSchema.safeParse({
      ...CONSOLE_TF,
      detection: { strategy: { kind: 'text-pattern', pattern: '([a-z' }, confidence: 1 },
      allowed_transforms: [],
      decision_rule: { transform: null }
    });
    expect(res.success).toBe(false);
    if (!res.success) expect(res.error.issues[0]?.path).toEqual(['detection', 'strategy', 'pattern']);
  });

  it('rejects a TF related to itself', () => {
    const res = TaskFunctionSchema.safeParse({ ...EMPTY_CATCH_TF, links: { related: ['BEX-001'] } });
    expect(res.success).toBe(false);
  });
});
