import { sha256 } from '../../utils/fs.js';
import { compareFindings } from '../finding/stream.js';
import type { Finding } from '../finding/types.js';
import type { RunContext } from '../scan/context.js';
import type { TfRegistry } from '../tf/registry.js';
import { editsToHunks, patchSortKey, type Patch } from '../patch/types.js';
import { decide } from './decision.js';
import { synthesize } from './transforms.js';

export type Proposal =
  | { kind: 'resolved'; finding: Finding; patch: Patch }
  | { kind: 'ambiguous'; finding: Finding; reason: string }
  | { kind: 'rejected'; finding: Finding; reason: string };

export type Ambiguous = Extract<Proposal, { kind: 'ambiguous' }>;
export type Rejected = Extract<Proposal, { kind: 'rejected' }>;

export interface ProposalSet {
  patches: Patch[];
  ambiguous: Ambiguous[];
  rejected: Rejected[];
}

export function patchIdFor(finding: Finding): string {
  return `${finding.tfId}@${finding.file}:${finding.span.start.offset}-${finding.span.end.offset}`;
}

/**
 * Map one finding to a patch, a question for review, or a rejection. Reads the file through the
 * run context but never writes anything.
 */
export async function propose(finding: Finding, ctx: RunContext, registry: TfRegistry): Promise<Proposal> {
  const tf = registry.get(finding.tfId);
  if (!tf) return { kind: 'rejected', finding, reason: `unknown TF ${finding.tfId}` };

  const decision = decide(tf, finding);
  if (decision.kind === 'reject') return { kind: 'rejected', finding, reason: decision.reason };
  if (decision.kind === 'ask') return { kind: 'ambiguous', finding, reason: decision.reason };

  const text = await ctx.read(finding.file);
  const parsed = await ctx.parse(finding.file);
  const synthesis = synthesize(tf, decision.transform, finding, { text, parsed });
  if (!synthesis.ok) return { kind: 'rejected', finding, reason: synthesis.reason };

  const patch: Patch = {
    id: patchIdFor(finding),
    tfId: tf.id,
    tier: tf.tier,
    file: finding.file,
    transform: decision.transform.kind,
    anchor: finding.span.start,
    baseSha256: sha256(text),
    hunks: editsToHunks(text, synthesis.edits)
  };
  return { kind: 'resolved', finding, patch };
}

/** Propose for every finding. Output order follows finding order, independent of input order. */
export async function proposeAll(findings: Iterable<Finding>, ctx: RunContext, registry: TfRegistry): Promise<ProposalSet> {
  const out: ProposalSet = { patches: [], ambiguous: [], rejected: [] };

  for (const finding of [...findings].sort(compareFindings)) {
    const p = await propose(finding, ctx, registry);
    if (p.kind === 'resolved') out.patches.push(p.patch);
    else if (p.kind === 'ambiguous') out.ambiguous.push(p);
    else out.rejected.push(p);
  }

  out.patches.sort(patchSortKey);
  ctx.logger.debug('proposals', { patches: out.patches.length, ambiguous: out.ambiguous.length, rejected: out.rejected.length });
  return out;
}
