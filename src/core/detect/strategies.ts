import * as ts from 'typescript';

import type { CallOptionPredicate, DetectionStrategy } from '../tf/types.js';
import { calleeName, visit, type ParsedSource } from './syntax.js';

/** A detector's raw output: a character range plus what it saw there. */
export interface RawMatch {
  start: number;
  end: number;
  message: string;
  hints: string[];
}

export interface DetectorInput {
  file: string;
  text: string;
  /** Null when the file is not a script file. */
  parsed: ParsedSource | null;
}

export type DetectFn = (strategy: DetectionStrategy, input: DetectorInput) => RawMatch[];

/** Strategies that walk the syntax tree and so cannot run on a file that does not parse. */
export function needsSyntax(strategy: DetectionStrategy): boolean {
  return strategy.kind === 'catch-clause' || strategy.kind === 'call-expression';
}

/** Whether the strategy applies to this kind of file at all. */
export function appliesTo(strategy: DetectionStrategy, input: DetectorInput): boolean {
  return strategy.kind === 'text-pattern' || input.parsed !== null;
}

export const runStrategy: DetectFn = (strategy, input) => {
  switch (strategy.kind) {
    case 'catch-clause':
      return input.parsed ? detectCatchClauses(strategy.condition, input.parsed) : [];
    case 'call-expression':
      return input.parsed ? detectCalls(strategy.callees, strategy.option ?? null, input.parsed) : [];
    case 'text-pattern':
      return detectPattern(strategy.pattern, strategy.flags, input.text);
    case 'parse-error':
      return input.parsed ? detectParseErrors(input.parsed) : [];
  }
};

// ── catch-clause ────────────────────────────────────────────────────────────

/** Calls inside a guarded block that commonly fail for expected reasons. */
const RISKY_CALLS = ['JSON.parse', 'fetch', 'readFile', 'readFileSync', 'parseInt', 'require', 'import'];

type CatchCondition = Extract<DetectionStrategy, { kind: 'catch-clause' }>['condition'];

function detectCatchClauses(condition: CatchCondition, parsed: ParsedSource): RawMatch[] {
  const sf = parsed.sourceFile;
  const out: RawMatch[] = [];

  visit(sf, (node) => {
    if (!ts.isCatchClause(node)) return;
    const binding = node.variableDeclaration;

    if (condition === 'any-annotation') {
      const type = binding?.type;
      if (type && type.kind === ts.SyntaxKind.AnyKeyword) {
        out.push({ start: type.getStart(sf), end: type.end, message: 'caught error is typed any', hints: [] });
      }
      return;
    }

    const matched = condition === 'unbound' ? binding === undefined : node.block.statements.length === 0;
    if (!matched) return;

    const hints = ts.isTryStatement(node.parent) ? riskyCallsIn(node.parent.tryBlock) : [];
    if (node.block.statements.length === 0 && blockHasComments(node.block, sf)) hints.push('comment');

    out.push({
      start: node.getStart(sf),
      end: node.end,
      message: condition === 'unbound' ? 'catch clause discards the error' : 'empty catch block swallows the error',
      hints: [...new Set(hints)].sort()
    });
  });

  return out;
}

function riskyCallsIn(block: ts.Block): string[] {
  const found = new Set<string>();
  visit(block, (node) => {
    if (ts.isCallExpression(node)) {
      if (node.expression.kind === ts.SyntaxKind.ImportKeyword) {
        found.add('import');
        return;
      }
      const name = calleeName(node.expression);
      if (name === null) return;
      const last = name.slice(name.lastIndexOf('.') + 1);
      const hit = RISKY_CALLS.find((c) => c === name || c === last);
      if (hit) found.add(hit);
    }
  });
  return [...found];
}

function blockHasComments(block: ts.Block, sf: ts.SourceFile): boolean {
  const inner = sf.text.slice(block.getStart(sf) + 1, block.end - 1);
  return inner.trim().length > 0;
}

// ── call-expression ─────────────────────────────────────────────────────────

function detectCalls(callees: string[], option: CallOptionPredicate | null, parsed: ParsedSource): RawMatch[] {
  const sf = parsed.sourceFile;
  const wanted = new Set(callees);
  const out: RawMatch[] = [];

  visit(sf, (node) => {
    if (!ts.isCallExpression(node)) return;
    const name = calleeName(node.expression);
    if (name === null || !wanted.has(name)) return;
    if (option && !node.arguments.some((arg) => setsOption(arg, option))) return;
    const message = option ? `call to ${name} with ${option.property}: ${JSON.stringify(option.equals)}` : `call to ${name}`;
    out.push({ start: node.expression.getStart(sf), end: node.expression.end, message, hints: [name] });
  });

  return out;
}

function setsOption(arg: ts.Expression, option: CallOptionPredicate): boolean {
  if (!ts.isObjectLiteralExpression(arg)) return false;
  return arg.properties.some(
    (prop) => ts.isPropertyAssignment(prop) && propertyName(prop.name) === option.property && literalEquals(prop.initializer, option.equals)
  );
}

function propertyName(name: ts.PropertyName): string | null {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) return name.text;
  return null;
}

function literalEquals(expr: ts.Expression, value: boolean | string | number): boolean {
  if (typeof value === 'boolean') return expr.kind === (value ? ts.SyntaxKind.TrueKeyword : ts.SyntaxKind.FalseKeyword);
  if (typeof value === 'string') return (ts.isStringLiteral(expr) || ts.isNoSubstitutionTemplateLiteral(expr)) && expr.text === value;
  return ts.isNumericLiteral(expr) && Number(expr.text) === value;
}

// ── text-pattern ────────────────────────────────────────────────────────────

export function compilePattern(pattern: string, flags: string): RegExp {
  return new RegExp(pattern, `${flags}g`);
}

function detectPattern(pattern: string, flags: string, text: string): RawMatch[] {
  const re = compilePattern(pattern, flags);
  const out: RawMatch[] = [];

  let lineStart = 0;
  for (const rawLine of text.split('\n')) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    re.lastIndex = 0;
    for (let m = re.exec(line); m !== null; m = re.exec(line)) {
      if (m[0].length === 0) {
        re.lastIndex += 1;
        continue;
      }
      out.push({
        start: lineStart + m.index,
        end: lineStart + m.index + m[0].length,
        message: `matches /${pattern}/`,
        hints: []
      });
    }
    lineStart += rawLine.length + 1;
  }

  return out;
}

// ── parse-error ─────────────────────────────────────────────────────────────

function detectParseErrors(parsed: ParsedSource): RawMatch[] {
  return parsed.diagnostics.map((d) => ({
    start: d.start,
    end: d.start + d.length,
    message: `syntax error: ${d.message}`,
    hints: []
  }));
}
