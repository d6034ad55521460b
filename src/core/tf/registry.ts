import { existsSync } from 'node:fs';
import { stat } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import type { ZodIssue } from 'zod';

import { RegistryError, SchemaViolation } from '../errors.js';
import { compareStrings, readText, safeReaddir } from '../../utils/fs.js';
import { TaskFunctionSchema, type TaskFunction } from './types.js';

const YAML_EXTS = new Set(['.yaml', '.yml']);

export interface TfSource {
  file: string;
  text: string;
}

export interface RegistryLoad {
  registry: TfRegistry;
  violations: SchemaViolation[];
  fatal: RegistryError | null;
}

/**
 * Validated, immutable set of Task Functions for one run.
 * `active()` is the execution set; `all()` also lists stub and disabled TFs for introspection.
 */
export class TfRegistry {
  private readonly byId: Map<string, TaskFunction>;

  constructor(tfs: TaskFunction[], readonly violations: readonly SchemaViolation[] = []) {
    const sorted = [...tfs].sort((a, b) => compareStrings(a.id, b.id));
    this.byId = new Map(sorted.map((tf) => [tf.id, tf]));
  }

  all(): TaskFunction[] {
    return [...this.byId.values()];
  }

  active(): TaskFunction[] {
    return this.all().filter((tf) => tf.status === 'active');
  }

  get(id: string): TaskFunction | undefined {
    return this.byId.get(id);
  }

  isActive(id: string): boolean {
    return this.byId.get(id)?.status === 'active';
  }
}

/**
 * Validate TF documents. Structural problems become SchemaViolations and loading goes on with the
 * rest; the load turns fatal when a TF that is (or may be) active is invalid, or nothing valid remains.
 */
export function parseRegistry(sources: TfSource[]): RegistryLoad {
  const violations: SchemaViolation[] = [];
  const fatalReasons: string[] = [];
  const accepted: TaskFunction[] = [];
  const origin = new Map<string, string>();

  for (const src of [...sources].sort((a, b) => compareStrings(a.file, b.file))) {
    const stem = stemOf(src.file);

    let raw: unknown;
    try {
      raw = YAML.parse(src.text);
    } catch (err) {
      violations.push(
        new SchemaViolation(`invalid YAML: ${err instanceof Error ? err.message : String(err)}`, {
          file: src.file,
          tfId: stem,
          field: ''
        })
      );
      fatalReasons.push(`${src.file} could not be read as YAML`);
      continue;
    }

    const rawId = readField(raw, 'id');
    const rawStatus = readField(raw, 'status');
    const tfId = typeof rawId === 'string' && rawId ? rawId : stem;

    const res = TaskFunctionSchema.safeParse(raw);
    if (!res.success) {
      violations.push(...res.error.issues.map((issue) => toViolation(issue, tfId, src.file)));
      if (rawStatus !== 'stub' && rawStatus !== 'disabled') {
        fatalReasons.push(`${tfId} is invalid and not marked stub or disabled`);
      }
      continue;
    }

    const tf = res.data;
    const prior = origin.get(tf.id);
    if (prior) {
      violations.push(new SchemaViolation(`duplicate id (already defined in ${prior})`, { tfId: tf.id, file: src.file, field: 'id' }));
      if (tf.status === 'active' || accepted.some((t) => t.id === tf.id && t.status === 'active')) {
        fatalReasons.push(`${tf.id} is defined more than once`);
      }
      continue;
    }

    origin.set(tf.id, src.file);
    accepted.push(tf);
  }

  if (sources.length === 0) fatalReasons.push('no TF documents found');
  else if (accepted.length === 0) fatalReasons.push('no valid TF documents');

  const registry = new TfRegistry(accepted, violations);
  const fatal = fatalReasons.length ? new RegistryError(fatalReasons.join('; '), violations) : null;
  return { registry, violations, fatal };
}

export async function readRegistry(tfDir: string): Promise<RegistryLoad> {
  const dirStat = await stat(tfDir).catch(() => null);
  if (!dirStat?.isDirectory()) {
    return {
      registry: new TfRegistry([]),
      violations: [],
      fatal: new RegistryError(`TF directory not found: ${tfDir}`)
    };
  }

  const entries = await safeReaddir(tfDir);
  const files = entries.filter((e) => YAML_EXTS.has(extname(e))).sort(compareStrings);
  const sources = await Promise.all(files.map(async (file) => ({ file, text: await readText(join(tfDir, file)) })));
  return parseRegistry(sources);
}

/** Load or throw RegistryError: no stage may run against a TF set that failed to load. */
export async function loadRegistry(tfDir: string): Promise<TfRegistry> {
  const { registry, fatal } = await readRegistry(tfDir);
  if (fatal) throw fatal;
  return registry;
}

/** The TF set shipped with the package (`tf/` beside package.json). */
export function bundledTfDir(): string {
  let current = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 8; i++) {
    if (existsSync(resolve(current, 'package.json')) && existsSync(resolve(current, 'tf'))) {
      return resolve(current, 'tf');
    }
    const parent = resolve(current, '..');
    if (parent === current) break;
    current = parent;
  }
  return resolve(dirname(fileURLToPath(import.meta.url)), '../../../tf');
}

function toViolation(issue: ZodIssue, tfId: string, file: string): SchemaViolation {
  return new SchemaViolation(issue.message, { tfId, file, field: issue.path.join('.') });
}

function readField(raw: unknown, key: string): unknown {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) return undefined;
  return Object.entries(raw).find(([k]) => k === key)?.[1];
}

function stemOf(file: string): string {
  const name = basename(file);
  const ext = extname(name);
  return ext ? name.slice(0, -ext.length) : name;
}

function extname(name: string): string {
  const i = name.lastIndexOf('.');
  return i === -1 ? '' : name.slice(i);
}
