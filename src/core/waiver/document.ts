import type { Waiver } from './types.js';

// Keys are read in this order only; everything after `reason:` belongs to the reason.
const WAIVER_LINE = /^(?:[-*]\s+)?tf_id\s*:\s*([A-Z]+-\d{3})(?:\s+scope\s*:\s*(\S+))?(?:\s+expires\s*:\s*(\S+))?(?:\s+reason\s*:\s*(.+))?$/;

export interface WaiverDocument {
  waivers: Waiver[];
  warnings: string[];
}

/**
 * Parse a per-change waiver document. Each waiver is one line naming a TF, optionally followed by
 * `scope:`, `expires:` and `reason:`; other prose in the document serves as the default rationale.
 *
 *     tf_id: BEX-001 scope: src/legacy/** expires: 2026-12-31 reason: vendored code
 */
export function parseWaiverDocument(text: string, opts: { context: string; file: string }): WaiverDocument {
  const waivers: Waiver[] = [];
  const warnings: string[] = [];
  const prose: string[] = [];
  const pending: Array<{ line: number; tfId: string; scope: string; expires: string | null; reason: string | null }> = [];

  text.split('\n').forEach((raw, i) => {
    const line = raw.trim();
    if (!line) return;

    const tf = WAIVER_LINE.exec(line);
    if (!tf) {
      if (/\btf_id\b/i.test(line)) warnings.push(`${opts.file}:${i + 1}: cannot read waiver line "${line}"`);
      else prose.push(line.replace(/^[#>*\-\s]+/, ''));
      return;
    }

    const tfId = tf[1] ?? '';
    const expires = tf[3] ?? null;
    if (expires !== null && Number.isNaN(Date.parse(expires))) {
      warnings.push(`${opts.file}:${i + 1}: ${tfId} has an invalid expiry "${expires}"; waiver ignored`);
      return;
    }

    pending.push({
      line: i + 1,
      tfId,
      scope: tf[2] ?? '*',
      expires,
      reason: tf[4]?.trim() ?? null
    });
  });

  const fallback = prose.filter(Boolean).join(' ') || `declared in ${opts.file}`;
  for (const p of pending) {
    waivers.push({
      tf_id: p.tfId,
      scope: p.scope,
      change_context: opts.context,
      expires_at: p.expires === null ? null : new Date(p.expires).toISOString(),
      rationale: p.reason ?? fallback,
      source: 'document'
    });
  }

  if (waivers.length === 0 && warnings.length === 0) warnings.push(`${opts.file}: no tf_id lines found`);
  return { waivers, warnings };
}
