import { compareFindings } from '../finding/stream.js';
import { toRecord, type Finding, type FindingRecord } from '../finding/types.js';
import type { Waiver } from '../waiver/types.js';
import { activeWaivers, waiverCovers } from '../waiver/ledger.js';

export interface GateInput {
  findings: Finding[];
  /** The change footprint: tree-relative paths touched by the change. */
  changedFiles: Iterable<string>;
  waivers: Waiver[];
  /** Tiers that gate; by default only tier 1. */
  tiers?: number[];
  context: string;
  now: Date;
}

export type GateDecision = 'pass' | 'fail';

export interface GateReport {
  decision: GateDecision;
  total: number;
  gatedTier: number;
  inFootprint: number;
  /** Active waivers whose scope touches the footprint. */
  waivers: number;
  waived: number;
  remaining: number;
  tiers: number[];
  changedFiles: number;
  remainingFindings: Finding[];
}

export const DEFAULT_GATE_TIERS = [1];

/**
 * Decide whether a change may merge. Keep findings in the gating tiers, then those in changed files,
 * then drop the ones an active waiver covers (same TF, scope matching the file). Anything left fails
 * the gate. Pure: the same input always gives the same report.
 */
export function evaluateGate(input: GateInput): GateReport {
  const tiers = [...new Set(input.tiers ?? DEFAULT_GATE_TIERS)].sort((a, b) => a - b);
  const footprint = new Set(input.changedFiles);
  const waivers = activeWaivers(input.waivers, { context: input.context, now: input.now, footprint });

  const gated = input.findings.filter((f) => tiers.includes(f.tier));
  const inFootprint = gated.filter((f) => footprint.has(f.file));
  const remaining = inFootprint.filter((f) => !waivers.some((w) => waiverCovers(w, f.tfId, f.file))).sort(compareFindings);

  return {
    decision: remaining.length > 0 ? 'fail' : 'pass',
    total: input.findings.length,
    gatedTier: gated.length,
    inFootprint: inFootprint.length,
    waivers: waivers.length,
    waived: inFootprint.length - remaining.length,
    remaining: remaining.length,
    tiers,
    changedFiles: footprint.size,
    remainingFindings: remaining
  };
}

export interface GateReportJson {
  decision: GateDecision;
  total: number;
  gated_tier: number;
  in_footprint: number;
  waivers: number;
  waived: number;
  remaining: number;
  gate_tiers: number[];
  changed_files: number;
  remaining_findings: FindingRecord[];
}

export function gateReportJson(report: GateReport): GateReportJson {
  return {
    decision: report.decision,
    total: report.total,
    gated_tier: report.gatedTier,
    in_footprint: report.inFootprint,
    waivers: report.waivers,
    waived: report.waived,
    remaining: report.remaining,
    gate_tiers: report.tiers,
    changed_files: report.changedFiles,
    remaining_findings: report.remainingFindings.map(toRecord)
  };
}
