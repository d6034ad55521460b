import { isAbsolute, join, resolve } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';

import { ConfigError } from '../core/errors.js';
import { DEFAULT_GATE_TIERS } from '../core/gate/evaluator.js';
import { DEFAULT_TREE_FILTER } from '../core/scan/tree.js';
import { bundledTfDir } from '../core/tf/registry.js';
import { DEFAULT_VERIFY_TIMEOUT_MS } from '../core/verify/verifier.js';
import { isEnoent, readText } from '../utils/fs.js';

export const CONFIG_DIR = '.fixpoint';
export const CONFIG_FILE = join(CONFIG_DIR, 'config.yaml');

const CheckSchema = z.object({
  name: z.string().min(1),
  command: z.string().min(1),
  args: z.array(z.string()).default([])
});

export const ConfigSchema = z
  .object({
    /** TF directory; the bundled TF set when absent. */
    tf_dir: z.string().min(1).nullable().default(null),
    tree: z
      .object({
        include: z.array(z.string().min(1)).min(1).default(DEFAULT_TREE_FILTER.include),
        exclude: z.array(z.string().min(1)).default(DEFAULT_TREE_FILTER.exclude)
      })
      .strict()
      .default({}),
    gate: z
      .object({
        tiers: z.array(z.number().int().min(1).max(4)).min(1).default(DEFAULT_GATE_TIERS),
        findings_path: z.string().min(1).default(join(CONFIG_DIR, 'findings.jsonl')),
        report_path: z.string().min(1).default(join(CONFIG_DIR, 'gate.json'))
      })
      .strict()
      .default({}),
    waivers: z
      .object({
        ledger_path: z.string().min(1).default(join(CONFIG_DIR, 'waivers.jsonl')),
        document_pattern: z
          .string()
          .min(1)
          .refine((s) => s.includes('{context}'), { message: 'must contain {context}' })
          .default('docs/waivers/{context}.md')
      })
      .strict()
      .default({}),
    agent: z
      .object({
        tasks_dir: z.string().min(1).default(join(CONFIG_DIR, 'tasks'))
      })
      .strict()
      .default({}),
    verify: z
      .object({
        timeout_ms: z.number().int().positive().default(DEFAULT_VERIFY_TIMEOUT_MS),
        checks: z.array(CheckSchema).default([])
      })
      .strict()
      .default({})
  })
  .strict();

export type FixpointConfig = z.infer<typeof ConfigSchema>;

export function defaultConfig(): FixpointConfig {
  return ConfigSchema.parse({});
}

export function parseConfig(raw: unknown, file: string): FixpointConfig {
  const res = ConfigSchema.safeParse(raw ?? {});
  if (!res.success) {
    const issue = res.error.issues[0];
    const field = issue?.path.join('.') || '<root>';
    throw new ConfigError(`${field}: ${issue?.message ?? 'invalid configuration'}`, { file });
  }
  return res.data;
}

/**
 * Read `.fixpoint/config.yaml` under `root` (or `path`). A missing file means defaults; an invalid one
 * raises ConfigError naming the first bad field.
 */
export async function loadConfig(root: string, path?: string): Promise<FixpointConfig> {
  const file = path ? resolve(root, path) : join(root, CONFIG_FILE);

  let text: string;
  try {
    text = await readText(file);
  } catch (err) {
    if (isEnoent(err) && !path) return defaultConfig();
    throw new ConfigError(`cannot read config: ${err instanceof Error ? err.message : String(err)}`, { file, cause: err });
  }

  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (err) {
    throw new ConfigError(`invalid YAML: ${err instanceof Error ? err.message : String(err)}`, { file, cause: err });
  }
  return parseConfig(raw, file);
}

export function resolveTfDir(config: FixpointConfig, root: string): string {
  return config.tf_dir ? resolveIn(root, config.tf_dir) : bundledTfDir();
}

export function resolveIn(root: string, p: string): string {
  return isAbsolute(p) ? p : join(root, p);
}
