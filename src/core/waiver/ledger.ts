import { mkdir, open, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import picomatch from 'picomatch';

import { compareStrings, isEnoent } from '../../utils/fs.js';
import { parseWaiverDocument } from './document.js';
import { LedgerWaiverSchema, WaiverSchema, type LedgerWaiver, type Waiver, type WaiverInput } from './types.js';

/**
 * Append-only JSONL record of waivers. Entries are never rewritten or removed; expiry is evaluated
 * by readers against the `now` they are given.
 */
export class WaiverLedger {
  private nextSeq: number;

  private constructor(
    readonly path: string,
    nextSeq: number
  ) {
    this.nextSeq = nextSeq;
  }

  static async open(path: string): Promise<WaiverLedger> {
    await mkdir(dirname(path), { recursive: true });
    return new WaiverLedger(path, await computeNextSeq(path));
  }

  async record(input: WaiverInput, now: Date = new Date()): Promise<LedgerWaiver> {
    const entry = LedgerWaiverSchema.parse({ ...WaiverSchema.parse(input), seq: this.nextSeq, recorded_at: now.toISOString() });

    const fh = await open(this.path, 'a');
    try {
      await fh.writeFile(`${JSON.stringify(entry)}\n`, { encoding: 'utf8' });
    } finally {
      await fh.close();
    }

    this.nextSeq += 1;
    return entry;
  }

  async readAll(): Promise<{ entries: LedgerWaiver[]; warnings: string[] }> {
    return readLedger(this.path);
  }
}

export async function readLedger(path: string): Promise<{ entries: LedgerWaiver[]; warnings: string[] }> {
  const entries: LedgerWaiver[] = [];
  const warnings: string[] = [];

  const lines = await readJsonlLines(path);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    try {
      const parsed = LedgerWaiverSchema.safeParse(JSON.parse(line));
      if (parsed.success) entries.push(parsed.data);
      else warnings.push(`waiver ledger line ${i + 1}: ${parsed.error.issues.map((x) => `${x.path.join('.')}: ${x.message}`).join('; ')}`);
    } catch (err) {
      // A torn last line means a crash mid-append; anything earlier is corruption worth flagging too.
      const isLast = i === lines.length - 1;
      warnings.push(`waiver ledger line ${i + 1}${isLast ? ' (last line)' : ''}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return { entries, warnings };
}

// ── Activity ────────────────────────────────────────────────────────────────

export interface WaiverQuery {
  context: string;
  now: Date;
}

/** Active iff unexpired at `now` and either global or recorded for this change context. */
export function isWaiverActive(w: Waiver, q: WaiverQuery): boolean {
  if (w.change_context !== '*' && w.change_context !== q.context) return false;
  if (w.expires_at === null) return true;
  return Date.parse(w.expires_at) > q.now.getTime();
}

const scopeMatchers = new Map<string, (file: string) => boolean>();

export function scopeMatches(scope: string, file: string): boolean {
  if (scope === '*') return true;
  let match = scopeMatchers.get(scope);
  if (!match) {
    match = picomatch(scope, { dot: true });
    scopeMatchers.set(scope, match);
  }
  return match(file);
}

/** Whether `w` waives findings of `tfId` in `file`. Activity is checked separately. */
export function waiverCovers(w: Waiver, tfId: string, file: string): boolean {
  return w.tf_id === tfId && scopeMatches(w.scope, file);
}

export function compareWaivers(a: Waiver, b: Waiver): number {
  return (
    compareStrings(a.tf_id, b.tf_id) ||
    compareStrings(a.scope, b.scope) ||
    compareStrings(a.change_context, b.change_context) ||
    compareStrings(a.expires_at ?? '', b.expires_at ?? '') ||
    compareStrings(a.source, b.source) ||
    compareStrings(a.rationale, b.rationale)
  );
}

/**
 * Active waivers for a change, sorted. With `footprint`, only waivers whose scope touches at least
 * one footprint path are kept.
 */
export function activeWaivers(waivers: Iterable<Waiver>, q: WaiverQuery & { footprint?: Iterable<string> }): Waiver[] {
  const footprint = q.footprint ? [...q.footprint] : null;
  return [...waivers]
    .filter((w) => isWaiverActive(w, q))
    .filter((w) => !footprint || footprint.some((f) => scopeMatches(w.scope, f)))
    .sort(compareWaivers);
}

// ── Loading ─────────────────────────────────────────────────────────────────

export interface WaiverSources {
  ledgerPath: string;
  /** The change context's waiver document, if it has one. */
  documentPath?: string | null;
  context: string;
}

/** Every waiver known for a change context: ledger entries plus the context's document. */
export async function loadWaivers(src: WaiverSources): Promise<{ waivers: Waiver[]; warnings: string[] }> {
  const { entries, warnings } = await readLedger(src.ledgerPath);
  const waivers: Waiver[] = entries.map(({ seq: _seq, recorded_at: _recordedAt, ...w }) => w);

  if (src.documentPath) {
    const text = await readOptional(src.documentPath);
    if (text !== null) {
      const doc = parseWaiverDocument(text, { context: src.context, file: src.documentPath });
      waivers.push(...doc.waivers);
      warnings.push(...doc.warnings);
    }
  }

  return { waivers: waivers.sort(compareWaivers), warnings };
}

export function documentPathFor(pattern: string, context: string): string {
  return pattern.replaceAll('{context}', context);
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8');
  } catch (err) {
    if (isEnoent(err)) return null;
    throw err;
  }
}

async function readJsonlLines(path: string): Promise<string[]> {
  const content = await readOptional(path);
  if (content === null) return [];
  return content
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean);
}

async function computeNextSeq(path: string): Promise<number> {
  const lines = await readJsonlLines(path);
  for (let i = lines.length - 1; i >= 0; i--) {
    try {
      const parsed: unknown = JSON.parse(lines[i] ?? '');
      if (parsed && typeof parsed === 'object' && 'seq' in parsed && typeof parsed.seq === 'number' && Number.isFinite(parsed.seq)) {
        return parsed.seq + 1;
      }
    } catch {
      continue;
    }
  }
  return 1;
}
