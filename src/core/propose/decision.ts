import type { Finding } from '../finding/types.js';
import type { TaskFunction, Transform } from '../tf/types.js';

export type Decision =
  | { kind: 'transform'; transform: Transform }
  | { kind: 'ask'; reason: string }
  | { kind: 'reject'; reason: string };

/**
 * Apply a TF's decision rule to a finding. Checked in order: TF status, reject hints, an explicit
 * "always ask" rule, ask hints, then the confidence floor.
 */
export function decide(tf: TaskFunction, finding: Pick<Finding, 'hints' | 'confidence'>): Decision {
  const rule = tf.decision_rule;

  if (tf.status !== 'active') return { kind: 'reject', reason: `${tf.id} is ${tf.status}` };

  const rejectHit = rule.reject_if_hints.find((h) => finding.hints.includes(h));
  if (rejectHit) return { kind: 'reject', reason: `hint "${rejectHit}" is in reject_if_hints` };

  if (rule.transform === null) {
    return { kind: 'ask', reason: rule.text ? `needs review: ${rule.text}` : 'decision rule always asks for review' };
  }

  const askHit = rule.ask_if_hints.find((h) => finding.hints.includes(h));
  if (askHit) return { kind: 'ask', reason: `hint "${askHit}" is in ask_if_hints` };

  if (finding.confidence < rule.min_confidence) {
    return { kind: 'ask', reason: `confidence ${finding.confidence} is below ${rule.min_confidence}` };
  }

  const transform = tf.allowed_transforms.find((t) => t.kind === rule.transform);
  if (!transform) return { kind: 'reject', reason: `transform "${rule.transform}" is not allowed` };
  return { kind: 'transform', transform };
}
