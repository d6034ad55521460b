import { z } from 'zod';

import type { Span } from './position.js';

/**
 * One violation of one TF at one span. Findings are never mutated; a re-scan produces a fresh set.
 */
export interface Finding {
  readonly tfId: string;
  readonly file: string;
  readonly span: Span;
  readonly tier: number;
  readonly confidence: number;
  readonly message: string;
  /** Enclosing symbol, e.g. `function load()`, `class Store` or `<module>`. */
  readonly frame: string;
  /** Source lines around the span. */
  readonly context: string;
  readonly hints: readonly string[];
  /** Whether the TF's decision rule picks a transform for this finding. */
  readonly resolved: boolean;
}

const PositionRecord = z.object({
  line: z.number().int().positive(),
  column: z.number().int().positive(),
  offset: z.number().int().nonnegative()
});

/** On-disk shape of a finding (one line of the findings stream). */
export const FindingRecordSchema = z.object({
  tf_id: z.string(),
  file: z.string(),
  start: PositionRecord,
  end: PositionRecord,
  tier: z.number().int().min(1).max(4),
  confidence: z.number().min(0).max(1),
  message: z.string(),
  frame: z.string(),
  context: z.string(),
  hints: z.array(z.string()),
  resolved: z.boolean()
});
export type FindingRecord = z.infer<typeof FindingRecordSchema>;

export function toRecord(f: Finding): FindingRecord {
  return {
    tf_id: f.tfId,
    file: f.file,
    start: { line: f.span.start.line, column: f.span.start.column, offset: f.span.start.offset },
    end: { line: f.span.end.line, column: f.span.end.column, offset: f.span.end.offset },
    tier: f.tier,
    confidence: f.confidence,
    message: f.message,
    frame: f.frame,
    context: f.context,
    hints: [...f.hints],
    resolved: f.resolved
  };
}

export function fromRecord(r: FindingRecord): Finding {
  return {
    tfId: r.tf_id,
    file: r.file,
    span: { start: r.start, end: r.end },
    tier: r.tier,
    confidence: r.confidence,
    message: r.message,
    frame: r.frame,
    context: r.context,
    hints: r.hints,
    resolved: r.resolved
  };
}
