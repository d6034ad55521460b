import { join } from 'node:path';
import { rm } from 'node:fs/promises';
import { z } from 'zod';

import { ensureDir, safeReaddir, writeJson } from '../../utils/fs.js';
import { compareFindings } from '../finding/stream.js';
import type { Ambiguous } from '../propose/proposer.js';
import type { TfRegistry } from '../tf/registry.js';
import { TfIdSchema, Transform } from '../tf/types.js';

export const TaskPacketSchema = z.object({
  packet_id: z.string(),
  tf_id: TfIdSchema,
  tier: z.number().int(),
  file: z.string(),
  line: z.number().int().positive(),
  column: z.number().int().positive(),
  span: z.object({
    start_line: z.number().int().positive(),
    end_line: z.number().int().positive(),
    start_offset: z.number().int().nonnegative(),
    end_offset: z.number().int().nonnegative()
  }),
  message: z.string(),
  frame: z.string(),
  code_frame: z.object({
    start_line: z.number().int().positive(),
    end_line: z.number().int().positive(),
    text: z.string()
  }),
  hints: z.array(z.string()),
  allowed_transforms: z.array(Transform),
  decision_rule: z.object({
    text: z.string(),
    reason: z.string()
  })
});
export type TaskPacket = z.infer<typeof TaskPacketSchema>;

const PACKET_FILE = /^task-\d{3,}-[A-Z]+-\d{3}\.json$/;

export function packetFileName(n: number, tfId: string): string {
  return `task-${String(n).padStart(3, '0')}-${tfId}.json`;
}

export function buildPacket(n: number, item: Ambiguous, registry: TfRegistry): TaskPacket {
  const f = item.finding;
  const tf = registry.get(f.tfId);
  const frameStart = Math.max(1, f.span.start.line - 2);
  return {
    packet_id: packetFileName(n, f.tfId).replace(/\.json$/, ''),
    tf_id: f.tfId,
    tier: f.tier,
    file: f.file,
    line: f.span.start.line,
    column: f.span.start.column,
    span: {
      start_line: f.span.start.line,
      end_line: f.span.end.line,
      start_offset: f.span.start.offset,
      end_offset: f.span.end.offset
    },
    message: f.message,
    frame: f.frame,
    code_frame: {
      start_line: frameStart,
      end_line: frameStart + f.context.split('\n').length - 1,
      text: f.context
    },
    hints: [...f.hints],
    allowed_transforms: tf?.allowed_transforms ?? [],
    decision_rule: { text: tf?.decision_rule.text ?? '', reason: item.reason }
  };
}

/**
 * Write one task packet per ambiguous finding, numbered in finding order. Packets left by an earlier
 * emit are removed first so the directory always mirrors the current run.
 */
export async function emitTasks(ambiguous: Ambiguous[], opts: { tasksDir: string; registry: TfRegistry }): Promise<string[]> {
  await ensureDir(opts.tasksDir);
  for (const entry of await safeReaddir(opts.tasksDir)) {
    if (PACKET_FILE.test(entry)) await rm(join(opts.tasksDir, entry), { force: true });
  }

  const ordered = [...ambiguous].sort((a, b) => compareFindings(a.finding, b.finding));
  const written: string[] = [];
  for (const [i, item] of ordered.entries()) {
    const path = join(opts.tasksDir, packetFileName(i + 1, item.finding.tfId));
    await writeJson(path, buildPacket(i + 1, item, opts.registry));
    written.push(path);
  }
  return written;
}
