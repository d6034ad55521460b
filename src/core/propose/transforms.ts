import * as ts from 'typescript';

import { catchClauseAt, type ParsedSource } from '../detect/syntax.js';
import { compilePattern } from '../detect/strategies.js';
import { LineIndex } from '../finding/position.js';
import type { Finding } from '../finding/types.js';
import type { Edit } from '../patch/types.js';
import type { TaskFunction, Transform } from '../tf/types.js';

export type Synthesis = { ok: true; edits: Edit[] } | { ok: false; reason: string };

export interface SynthesisSource {
  text: string;
  parsed: ParsedSource | null;
}

/**
 * Compute the edits for one finding. Only the closed set of transforms exists; each one first
 * re-checks that the finding still describes the current text and reports a stale finding otherwise.
 */
export function synthesize(tf: TaskFunction, transform: Transform, finding: Finding, src: SynthesisSource): Synthesis {
  const edits = synthesizeEdits(tf, transform, finding, src);
  if (!edits.ok) return edits;
  const changed = edits.edits.some((e) => src.text.slice(e.start, e.end) !== e.after);
  return changed ? edits : { ok: false, reason: 'transform produces no change' };
}

function synthesizeEdits(tf: TaskFunction, transform: Transform, finding: Finding, src: SynthesisSource): Synthesis {
  const { start, end } = finding.span;
  switch (transform.kind) {
    case 'rethrow':
      return rethrow(finding, src);
    case 'bind-error':
      return bindError(transform.name, finding, src);
    case 'annotate-unknown':
      if (src.text.slice(start.offset, end.offset) !== 'any') return stale('catch binding is no longer typed any');
      return { ok: true, edits: [{ start: start.offset, end: end.offset, after: 'unknown' }] };
    case 'replace-callee': {
      const strategy = tf.detection.strategy;
      const current = src.text.slice(start.offset, end.offset);
      if (strategy.kind !== 'call-expression' || !strategy.callees.includes(current)) return stale(`callee "${current}" is not detected by ${tf.id}`);
      return { ok: true, edits: [{ start: start.offset, end: end.offset, after: transform.replacement }] };
    }
    case 'replace-match':
      return replaceMatch(tf, transform.replacement, finding, src);
  }
}

function stale(reason: string): Synthesis {
  return { ok: false, reason: `stale finding: ${reason}` };
}

function catchAt(finding: Finding, src: SynthesisSource): ts.CatchClause | string {
  if (!src.parsed || src.parsed.diagnostics.length > 0) return 'file does not parse';
  return catchClauseAt(src.parsed.sourceFile, finding.span.start.offset) ?? 'no catch clause at the finding';
}

function rethrow(finding: Finding, src: SynthesisSource): Synthesis {
  const clause = catchAt(finding, src);
  if (typeof clause === 'string') return stale(clause);
  if (clause.block.statements.length > 0) return stale('catch block is not empty');

  const sf = clause.getSourceFile();
  const binding = clause.variableDeclaration;
  if (binding && !ts.isIdentifier(binding.name)) return { ok: false, reason: 'catch binding is a destructuring pattern' };

  const edits: Edit[] = [];
  let name = binding && ts.isIdentifier(binding.name) ? binding.name.text : null;
  if (name === null) {
    name = 'error';
    const keywordEnd = clause.getStart(sf) + 'catch'.length;
    edits.push({ start: keywordEnd, end: keywordEnd, after: ` (${name})` });
  }

  const eol = src.text.includes('\r\n') ? '\r\n' : '\n';
  const indent = leadingWhitespace(new LineIndex(src.text).lineText(finding.span.start.line));
  const blockStart = clause.block.getStart(sf);
  const comments = src.text
    .slice(blockStart + 1, clause.block.end - 1)
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean);

  const body = [...comments, `throw ${name};`].map((l) => `${indent}  ${l}${eol}`).join('');
  edits.push({ start: blockStart, end: clause.block.end, after: `{${eol}${body}${indent}}` });
  return { ok: true, edits };
}

function bindError(name: string, finding: Finding, src: SynthesisSource): Synthesis {
  const clause = catchAt(finding, src);
  if (typeof clause === 'string') return stale(clause);
  if (clause.variableDeclaration) return stale('catch clause already binds the error');

  const keywordEnd = clause.getStart(clause.getSourceFile()) + 'catch'.length;
  return { ok: true, edits: [{ start: keywordEnd, end: keywordEnd, after: ` (${name})` }] };
}

function replaceMatch(tf: TaskFunction, replacement: string, finding: Finding, src: SynthesisSource): Synthesis {
  const strategy = tf.detection.strategy;
  if (strategy.kind !== 'text-pattern') return { ok: false, reason: `${tf.id} does not detect a text pattern` };

  const lines = new LineIndex(src.text);
  const line = lines.lineText(finding.span.start.line);
  const column = finding.span.start.column - 1;
  const length = finding.span.end.offset - finding.span.start.offset;

  const re = compilePattern(strategy.pattern, strategy.flags);
  for (let m = re.exec(line); m !== null; m = re.exec(line)) {
    if (m[0].length === 0) {
      re.lastIndex += 1;
      continue;
    }
    if (m.index === column && m[0].length === length) {
      return { ok: true, edits: [{ start: finding.span.start.offset, end: finding.span.end.offset, after: expandReplacement(replacement, m) }] };
    }
  }
  return stale('pattern no longer matches at the finding');
}

/** `$&`, `$1`..`$99` and `$$` in a replacement, as String.prototype.replace reads them. */
export function expandReplacement(replacement: string, match: RegExpExecArray): string {
  return replacement.replace(/\$(\$|&|\d{1,2})/g, (token: string, ref: string) => {
    if (ref === '$') return '$';
    if (ref === '&') return match[0];
    const group = Number(ref);
    return group > 0 && group < match.length ? (match[group] ?? '') : token;
  });
}

function leadingWhitespace(line: string): string {
  return /^[ \t]*/.exec(line)?.[0] ?? '';
}
