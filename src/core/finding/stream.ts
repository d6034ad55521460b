import { compareStrings, readText, writeText } from '../../utils/fs.js';
import { FindingRecordSchema, fromRecord, toRecord, type Finding } from './types.js';

/** Total order: file, start line, start column, TF id, then end offset. */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    compareStrings(a.file, b.file) ||
    a.span.start.line - b.span.start.line ||
    a.span.start.column - b.span.start.column ||
    compareStrings(a.tfId, b.tfId) ||
    a.span.end.offset - b.span.end.offset
  );
}

export function findingKey(f: Finding): string {
  return `${f.tfId}\u0000${f.file}\u0000${f.span.start.offset}\u0000${f.span.end.offset}`;
}

/** Sort and collapse findings that share (TF, file, span); the first in order wins. */
export function dedupeFindings(findings: Iterable<Finding>): Finding[] {
  const seen = new Set<string>();
  const out: Finding[] = [];
  for (const f of [...findings].sort(compareFindings)) {
    const key = findingKey(f);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(f);
  }
  return out;
}

/** Findings stream: one JSON object per line, in finding order. Byte-identical for identical input. */
export function formatFindingsStream(findings: Iterable<Finding>): string {
  return dedupeFindings(findings)
    .map((f) => `${JSON.stringify(toRecord(f))}\n`)
    .join('');
}

export function parseFindingsStream(text: string): { findings: Finding[]; warnings: string[] } {
  const findings: Finding[] = [];
  const warnings: string[] = [];

  const lines = text.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]?.trim();
    if (!line) continue;
    try {
      const parsed = FindingRecordSchema.safeParse(JSON.parse(line));
      if (parsed.success) findings.push(fromRecord(parsed.data));
      else warnings.push(`findings line ${i + 1}: ${parsed.error.issues.map((x) => `${x.path.join('.')}: ${x.message}`).join('; ')}`);
    } catch (err) {
      warnings.push(`findings line ${i + 1}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return { findings: dedupeFindings(findings), warnings };
}

export async function writeFindingsFile(path: string, findings: Iterable<Finding>): Promise<void> {
  await writeText(path, formatFindingsStream(findings));
}

export async function readFindingsFile(path: string): Promise<{ findings: Finding[]; warnings: string[] }> {
  return parseFindingsStream(await readText(path));
}
