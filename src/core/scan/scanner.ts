import picomatch from 'picomatch';
import type { SourceFile } from 'typescript';

import { mapLimit } from '../../utils/async.js';
import { compareStrings } from '../../utils/fs.js';
import { DetectorFailure } from '../errors.js';
import { enclosingFrame, parses } from '../detect/syntax.js';
import { appliesTo, needsSyntax, runStrategy, type DetectFn, type RawMatch } from '../detect/strategies.js';
import { LineIndex } from '../finding/position.js';
import { dedupeFindings } from '../finding/stream.js';
import type { Finding } from '../finding/types.js';
import { decide } from '../propose/decision.js';
import type { TfRegistry } from '../tf/registry.js';
import type { TaskFunction } from '../tf/types.js';
import type { RunContext } from './context.js';
import type { SourceTree } from './tree.js';

export interface ScanOptions {
  /** Only these TFs (must still be active). */
  tfIds?: string[];
  /** Only these tree files. */
  files?: Iterable<string>;
  concurrency?: number;
  /** Detector override; defaults to the built-in strategy evaluators. */
  detect?: DetectFn;
}

export interface SkippedFile {
  file: string;
  reason: string;
}

export interface ScanResult {
  findings: Finding[];
  skipped: SkippedFile[];
  failures: DetectorFailure[];
  filesScanned: number;
}

export interface FileScan {
  findings: Finding[];
  skipped: SkippedFile | null;
  failures: DetectorFailure[];
}

const footprints = new WeakMap<TaskFunction, (file: string) => boolean>();

export function inFootprint(tf: TaskFunction, file: string): boolean {
  let match = footprints.get(tf);
  if (!match) {
    const include = picomatch(tf.footprint.include, { dot: true });
    const exclude = tf.footprint.exclude.length ? picomatch(tf.footprint.exclude, { dot: true }) : () => false;
    match = (f: string) => include(f) && !exclude(f);
    footprints.set(tf, match);
  }
  return match(file);
}

/**
 * Run every active TF over every file in its footprint. Output is sorted and deduplicated, so the
 * same tree and registry always give the same findings regardless of how files were scheduled.
 */
export async function scan(tree: SourceTree, registry: TfRegistry, ctx: RunContext, opts: ScanOptions = {}): Promise<ScanResult> {
  const wanted = opts.tfIds ? new Set(opts.tfIds) : null;
  const tfs = registry.active().filter((tf) => !wanted || wanted.has(tf.id));
  const only = opts.files ? new Set(opts.files) : null;
  const files = tree.files.filter((f) => !only || only.has(f));

  const perFile = await mapLimit(files, opts.concurrency ?? 8, (file) => scanFile(file, tfs, ctx, opts.detect));

  const skipped = perFile.flatMap((r) => (r.skipped ? [r.skipped] : []));
  const failures = perFile
    .flatMap((r) => r.failures)
    .sort((a, b) => compareStrings(a.file ?? '', b.file ?? '') || compareStrings(a.tfId ?? '', b.tfId ?? ''));
  const findings = dedupeFindings(perFile.flatMap((r) => r.findings));

  ctx.logger.debug('scan complete', { files: files.length, findings: findings.length, skipped: skipped.length, failures: failures.length });
  return { findings, skipped, failures, filesScanned: files.length };
}

export async function scanFile(file: string, tfs: TaskFunction[], ctx: RunContext, detect: DetectFn = runStrategy): Promise<FileScan> {
  const relevant = tfs.filter((tf) => inFootprint(tf, file));
  const result: FileScan = { findings: [], skipped: null, failures: [] };
  if (relevant.length === 0) return result;

  const text = await ctx.read(file);
  const parsed = await ctx.parse(file);
  const lines = new LineIndex(text);
  const input = { file, text, parsed };

  for (const tf of relevant) {
    const strategy = tf.detection.strategy;
    if (!appliesTo(strategy, input)) continue;
    if (needsSyntax(strategy) && !parses(parsed)) {
      result.skipped = { file, reason: 'does not parse' };
      continue;
    }

    let matches: RawMatch[];
    try {
      matches = detect(strategy, input);
    } catch (err) {
      const failure = new DetectorFailure(err instanceof Error ? err.message : String(err), { tfId: tf.id, file, cause: err });
      ctx.logger.warn(`detector failed: ${failure.toLine()}`);
      result.failures.push(failure);
      continue;
    }

    for (const m of matches) {
      result.findings.push(toFinding(tf, file, m, lines, parsed?.sourceFile ?? null));
    }
  }

  return result;
}

function toFinding(tf: TaskFunction, file: string, m: RawMatch, lines: LineIndex, sourceFile: SourceFile | null): Finding {
  const span = lines.span(m.start, m.end);
  const confidence = tf.detection.confidence;
  return {
    tfId: tf.id,
    file,
    span,
    tier: tf.tier,
    confidence,
    message: m.message,
    frame: sourceFile ? enclosingFrame(sourceFile, m.start) : '<module>',
    context: lines.linesBetween(span.start.line - 2, span.end.line + 2),
    hints: m.hints,
    resolved: decide(tf, { hints: m.hints, confidence }).kind === 'transform'
  };
}
