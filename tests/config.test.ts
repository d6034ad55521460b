import { describe, expect, it } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { CONFIG_FILE, defaultConfig, loadConfig, resolveTfDir } from '../src/config/index.js';
import { ConfigError } from '../src/core/errors.js';
import { bundledTfDir } from '../src/core/tf/registry.js';
import { tempDir } from './fixtures.js';

async function withConfig(text: string): Promise<string> {
  const root = await tempDir('config');
  await mkdir(join(root, '.fixpoint'), { recursive: true });
  await writeFile(join(root, CONFIG_FILE), text, 'utf8');
  return root;
}

async function configError(p: Promise<unknown>): Promise<ConfigError> {
  try {
    await p;
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('config', () => {
  it('falls back to defaults when there is no config file', async () => {
    const root = await tempDir('config');
    const config = await loadConfig(root);

    expect(config).toEqual(defaultConfig());
    expect(config.gate).toEqual({ tiers: [1], findings_path: '.fixpoint/findings.jsonl', report_path: '.fixpoint/gate.json' });
    expect(config.waivers.document_pattern).toBe('docs/waivers/{context}.md');
    expect(config.agent.tasks_dir).toBe('.fixpoint/tasks');
    expect(resolveTfDir(config, root)).toBe(bundledTfDir());
  });

  it('reads overrides and fills in the rest', async () => {
    const root = await withConfig(
      [
        'tf_dir: policy/tf',
        'gate:',
        '  tiers: [1, 2]',
        'verify:',
        '  timeout_ms: 5000',
        '  checks:',
        '    - name: typecheck',
        '      command: tsc',
        '      args: [--noEmit]',
        ''
      ].join('\n')
    );
    const config = await loadConfig(root);

    expect(config.gate.tiers).toEqual([1, 2]);
    expect(config.gate.report_path).toBe('.fixpoint/gate.json');
    expect(config.verify).toEqual({ timeout_ms: 5000, checks: [{ name: 'typecheck', command: 'tsc', args: ['--noEmit'] }] });
    expect(resolveTfDir(config, root)).toBe(join(root, 'policy/tf'));
  });

  it('names the first invalid field', async () => {
    const root = await withConfig('waivers:\n  document_pattern: docs/waivers.md\n');
    const err = await configError(loadConfig(root));

    expect(err.reason).toBe('waivers.document_pattern: must contain {context}');
    expect(err.toLine()).toBe(`${join(root, CONFIG_FILE)}: waivers.document_pattern: must contain {context}`);
  });

  it('rejects unknown keys and gate tiers out of range', async () => {
    const unknown = await configError(loadConfig(await withConfig('gates:\n  tiers: [1]\n')));
    expect(unknown.reason.startsWith('<root>: ')).toBe(true);

    const tier = await configError(loadConfig(await withConfig('gate:\n  tiers: [5]\n')));
    expect(tier.reason.startsWith('gate.tiers.0: ')).toBe(true);
  });

  it('rejects unreadable YAML and a missing explicit path', async () => {
    const bad = await configError(loadConfig(await withConfig('gate: [\n')));
    expect(bad.reason.startsWith('invalid YAML: ')).toBe(true);

    const root = await tempDir('config');
    const missing = await configError(loadConfig(root, 'custom.yaml'));
    expect(missing.file).toBe(join(root, 'custom.yaml'));
    expect(missing.reason.startsWith('cannot read config: ')).toBe(true);
  });
});
