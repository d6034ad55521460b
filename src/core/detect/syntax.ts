import * as ts from 'typescript';

const SCRIPT_KINDS: Record<string, ts.ScriptKind> = {
  '.ts': ts.ScriptKind.TS,
  '.mts': ts.ScriptKind.TS,
  '.cts': ts.ScriptKind.TS,
  '.tsx': ts.ScriptKind.TSX,
  '.js': ts.ScriptKind.JS,
  '.mjs': ts.ScriptKind.JS,
  '.cjs': ts.ScriptKind.JS,
  '.jsx': ts.ScriptKind.JSX
};

export interface SyntaxDiagnostic {
  start: number;
  length: number;
  message: string;
}

export interface ParsedSource {
  file: string;
  sourceFile: ts.SourceFile;
  diagnostics: SyntaxDiagnostic[];
}

export function scriptKindFor(file: string): ts.ScriptKind | null {
  const dot = file.lastIndexOf('.');
  if (dot === -1 || file.endsWith('.d.ts')) return null;
  return SCRIPT_KINDS[file.slice(dot).toLowerCase()] ?? null;
}

export function isScriptFile(file: string): boolean {
  return scriptKindFor(file) !== null;
}

/** Parse a script file. Returns null for files that are not TypeScript or JavaScript sources. */
export function parseSource(file: string, text: string): ParsedSource | null {
  const kind = scriptKindFor(file);
  if (kind === null) return null;

  const sourceFile = ts.createSourceFile(file, text, ts.ScriptTarget.Latest, true, kind);
  return { file, sourceFile, diagnostics: syntaxDiagnostics(file, text) };
}

export function parses(parsed: ParsedSource | null): parsed is ParsedSource {
  return parsed !== null && parsed.diagnostics.length === 0;
}

function syntaxDiagnostics(file: string, text: string): SyntaxDiagnostic[] {
  const out = ts.transpileModule(text, {
    fileName: file,
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.Latest,
      module: ts.ModuleKind.ESNext,
      jsx: ts.JsxEmit.Preserve,
      allowJs: true,
      noResolve: true
    }
  });

  return (out.diagnostics ?? [])
    .filter((d) => d.category === ts.DiagnosticCategory.Error && d.start !== undefined)
    .map((d) => ({
      start: d.start ?? 0,
      length: d.length ?? 0,
      message: ts.flattenDiagnosticMessageText(d.messageText, ' ')
    }))
    .sort((a, b) => a.start - b.start || a.length - b.length);
}

// ── Tree helpers shared by detectors and transforms ─────────────────────────

/** Dotted name of a callee (`console.log`, `fetch`), or null for computed callees. */
export function calleeName(expr: ts.Expression): string | null {
  if (ts.isIdentifier(expr)) return expr.text;
  if (ts.isPropertyAccessExpression(expr)) {
    const left = calleeName(expr.expression);
    return left === null ? null : `${left}.${expr.name.text}`;
  }
  return null;
}

export function visit(node: ts.Node, fn: (node: ts.Node) => void): void {
  fn(node);
  ts.forEachChild(node, (child) => visit(child, fn));
}

/** Innermost named function, method or class enclosing `offset`. */
export function enclosingFrame(sourceFile: ts.SourceFile, offset: number): string {
  let frame = '<module>';

  const descend = (node: ts.Node): void => {
    const label = frameLabel(node);
    if (label) frame = label;
    ts.forEachChild(node, (child) => {
      if (child.getStart(sourceFile) <= offset && offset < child.end) descend(child);
    });
  };

  descend(sourceFile);
  return frame;
}

function frameLabel(node: ts.Node): string | null {
  if (ts.isFunctionDeclaration(node) && node.name) return `function ${node.name.text}()`;
  if (ts.isMethodDeclaration(node) && ts.isIdentifier(node.name)) return `method ${node.name.text}()`;
  if (ts.isConstructorDeclaration(node)) return 'method constructor()';
  if (ts.isClassDeclaration(node) && node.name) return `class ${node.name.text}`;
  if ((ts.isArrowFunction(node) || ts.isFunctionExpression(node)) && ts.isVariableDeclaration(node.parent) && ts.isIdentifier(node.parent.name)) {
    return `function ${node.parent.name.text}()`;
  }
  return null;
}

/** The catch clause whose `catch` keyword starts at `offset`. */
export function catchClauseAt(sourceFile: ts.SourceFile, offset: number): ts.CatchClause | null {
  let found: ts.CatchClause | null = null;
  visit(sourceFile, (node) => {
    if (!found && ts.isCatchClause(node) && node.getStart(sourceFile) === offset) found = node;
  });
  return found;
}
