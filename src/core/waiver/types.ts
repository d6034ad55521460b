import { z } from 'zod';

import { TfIdSchema } from '../tf/types.js';

export const TimestampIso = z
  .string()
  .refine((s) => !Number.isNaN(Date.parse(s)), { message: 'must be an ISO date or datetime' });

export const WaiverSource = z.enum(['ledger', 'document', 'agent-bridge']);

export const WaiverSchema = z.object({
  tf_id: TfIdSchema,
  /** `*` or a glob over tree-relative paths. */
  scope: z.string().min(1).default('*'),
  /** `*` or the change context (e.g. a pull request id) the waiver is limited to. */
  change_context: z.string().min(1).default('*'),
  /** Null means open-ended. */
  expires_at: TimestampIso.nullable().default(null),
  rationale: z.string().min(1),
  source: WaiverSource.default('ledger')
});
export type Waiver = z.infer<typeof WaiverSchema>;
export type WaiverInput = z.input<typeof WaiverSchema>;

export const LedgerWaiverSchema = WaiverSchema.extend({
  seq: z.number().int().positive(),
  recorded_at: TimestampIso
});
export type LedgerWaiver = z.infer<typeof LedgerWaiverSchema>;
