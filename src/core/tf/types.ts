import { z } from 'zod';

export const TfIdSchema = z.string().regex(/^[A-Z]+-\d{3}$/, 'must look like ABC-001');

export const TfStatus = z.enum(['active', 'stub', 'disabled']);
export type TfStatus = z.infer<typeof TfStatus>;

export const Tier = z.number().int().min(1).max(4);

// ── Detection strategies ────────────────────────────────────────────────────

export const CatchClauseStrategy = z.object({
  kind: z.literal('catch-clause'),
  condition: z.enum(['empty-body', 'unbound', 'any-annotation'])
});

/** Matches a call only when an object-literal argument sets `property` to the literal `equals`. */
export const CallOptionPredicate = z.object({
  property: z.string().min(1),
  equals: z.union([z.boolean(), z.string(), z.number()])
});
export type CallOptionPredicate = z.infer<typeof CallOptionPredicate>;

export const CallExpressionStrategy = z.object({
  kind: z.literal('call-expression'),
  callees: z.array(z.string().regex(/^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)*$/, 'must be a dotted identifier')).min(1),
  option: CallOptionPredicate.optional()
});

export const TextPatternStrategy = z.object({
  kind: z.literal('text-pattern'),
  pattern: z.string().min(1),
  flags: z.string().regex(/^[imsu]*$/, 'only i, m, s and u flags are allowed').default('')
});

export const ParseErrorStrategy = z.object({
  kind: z.literal('parse-error')
});

export const DetectionStrategy = z.discriminatedUnion('kind', [
  CatchClauseStrategy,
  CallExpressionStrategy,
  TextPatternStrategy,
  ParseErrorStrategy
]);
export type DetectionStrategy = z.infer<typeof DetectionStrategy>;
export type StrategyKind = DetectionStrategy['kind'];

// ── Transforms (closed set) ─────────────────────────────────────────────────

export const Transform = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('rethrow') }),
  z.object({
    kind: z.literal('bind-error'),
    name: z.string().regex(/^[A-Za-z_$][\w$]*$/, 'must be an identifier').default('error')
  }),
  z.object({ kind: z.literal('annotate-unknown') }),
  z.object({ kind: z.literal('replace-callee'), replacement: z.string().min(1) }),
  z.object({ kind: z.literal('replace-match'), replacement: z.string() })
]);
export type Transform = z.infer<typeof Transform>;
export type TransformKind = Transform['kind'];

/** Which detections each transform knows how to rewrite. */
const TRANSFORM_TARGETS: Record<TransformKind, (s: DetectionStrategy) => boolean> = {
  rethrow: (s) => s.kind === 'catch-clause' && (s.condition === 'empty-body' || s.condition === 'unbound'),
  'bind-error': (s) => s.kind === 'catch-clause' && s.condition === 'unbound',
  'annotate-unknown': (s) => s.kind === 'catch-clause' && s.condition === 'any-annotation',
  'replace-callee': (s) => s.kind === 'call-expression',
  'replace-match': (s) => s.kind === 'text-pattern'
};

export function transformTargets(transform: TransformKind, strategy: DetectionStrategy): boolean {
  return TRANSFORM_TARGETS[transform](strategy);
}

// ── Task Function ───────────────────────────────────────────────────────────

export const VerifyPredicate = z.enum(['finding-absent', 'parses']);
export type VerifyPredicate = z.infer<typeof VerifyPredicate>;

export const DEFAULT_FOOTPRINT = ['**/*.{ts,tsx,mts,cts,js,jsx,mjs,cjs}'];

const TaskFunctionBase = z.object({
  id: TfIdSchema,
  name: z.string().min(1),
  status: TfStatus,
  tier: Tier,
  detection: z.object({
    signals: z.array(z.string()).default([]),
    strategy: DetectionStrategy,
    confidence: z.number().min(0).max(1)
  }),
  ontology: z.object({
    entities: z.array(z.string()).default([]),
    relations: z.array(z.string()).default([]),
    scope: z.string().default('file')
  }),
  logic: z.object({
    constraints: z.array(z.string()).default([])
  }),
  allowed_transforms: z.array(Transform),
  decision_rule: z.object({
    text: z.string().default(''),
    // Kind of one of `allowed_transforms`; null means every finding goes to review.
    transform: z.string().nullable(),
    ask_if_hints: z.array(z.string()).default([]),
    reject_if_hints: z.array(z.string()).default([]),
    min_confidence: z.number().min(0).max(1).default(0)
  }),
  footprint: z
    .object({
      include: z.array(z.string().min(1)).min(1).default(DEFAULT_FOOTPRINT),
      exclude: z.array(z.string().min(1)).default([])
    })
    .default({}),
  verify: z
    .object({
      predicates: z.array(VerifyPredicate).default(['finding-absent', 'parses'])
    })
    .default({}),
  links: z
    .object({
      related: z.array(TfIdSchema).default([])
    })
    .default({})
});

export const TaskFunctionSchema = TaskFunctionBase.superRefine((tf, ctx) => {
  const strategy = tf.detection.strategy;

  const seen = new Set<string>();
  tf.allowed_transforms.forEach((t, i) => {
    if (seen.has(t.kind)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['allowed_transforms', i, 'kind'], message: `duplicate transform "${t.kind}"` });
    }
    seen.add(t.kind);

    if (!transformTargets(t.kind, strategy)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['allowed_transforms', i, 'kind'],
        message: `transform "${t.kind}" cannot rewrite a ${describeStrategy(strategy)} detection`
      });
    }

    if (t.kind === 'replace-callee' && strategy.kind === 'call-expression' && strategy.callees.includes(t.replacement)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['allowed_transforms', i, 'replacement'],
        message: `replacement "${t.replacement}" is itself a detected callee`
      });
    }
  });

  const chosen = tf.decision_rule.transform;
  if (chosen !== null && !seen.has(chosen)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['decision_rule', 'transform'],
      message: `"${chosen}" is not one of allowed_transforms`
    });
  }

  if (strategy.kind === 'text-pattern') {
    try {
      new RegExp(strategy.pattern, strategy.flags);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['detection', 'strategy', 'pattern'],
        message: `invalid regular expression: ${err instanceof Error ? err.message : String(err)}`
      });
    }
  }

  if (tf.links.related.includes(tf.id)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['links', 'related'], message: 'a TF cannot relate to itself' });
  }
});

export type TaskFunction = z.infer<typeof TaskFunctionSchema>;
export type DecisionRule = TaskFunction['decision_rule'];

export function describeStrategy(s: DetectionStrategy): string {
  return s.kind === 'catch-clause' ? `catch-clause/${s.condition}` : s.kind;
}
