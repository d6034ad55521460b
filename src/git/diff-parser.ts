export type ChangeType = 'added' | 'modified' | 'deleted' | 'renamed';

export interface ChangedFile {
  path: string;
  changeType: ChangeType;
  oldPath?: string;
}

/**
 * Parse `git diff --name-status` output.
 *
 * Examples:
 *   A\tpath
 *   M\tpath
 *   D\tpath
 *   R100\told\tnew
 */
export function parseNameStatus(nameStatus: string): ChangedFile[] {
  const out = new Map<string, ChangedFile>();
  for (const line of nameStatus.split('\n')) {
    if (!line.trim()) continue;
    const parts = line.split('\t').map((p) => p.trim());
    const status = parts[0] ?? '';

    if ((status.startsWith('R') || status.startsWith('C')) && parts.length >= 3) {
      const oldPath = parts[1] ?? '';
      const newPath = parts[2] ?? '';
      if (newPath) out.set(newPath, { path: newPath, changeType: status.startsWith('R') ? 'renamed' : 'added', oldPath });
      continue;
    }

    const path = parts[1];
    if (!path) continue;
    switch (status) {
      case 'A':
        out.set(path, { path, changeType: 'added' });
        break;
      case 'D':
        out.set(path, { path, changeType: 'deleted' });
        break;
      case 'M':
      default:
        out.set(path, { path, changeType: 'modified' });
        break;
    }
  }
  return [...out.values()].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

/** A plain newline-separated list of paths (as written by CI for a change). */
export function parsePathList(text: string): string[] {
  const paths = text
    .split('\n')
    .map((l) => l.trim().replace(/^\.\//, ''))
    .filter((l) => l && !l.startsWith('#'));
  return [...new Set(paths)].sort();
}

// ── Unified diffs ───────────────────────────────────────────────────────────

export interface DiffLine {
  op: ' ' | '-' | '+';
  text: string;
}

export interface DiffHunk {
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
  lines: DiffLine[];
}

export interface FileDiff {
  oldPath: string | null;
  newPath: string | null;
  hunks: DiffHunk[];
}

export interface ParsedDiff {
  files: FileDiff[];
  errors: string[];
}

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

/**
 * Parse a unified diff (git or plain). Header and comment lines are ignored; hunk bodies must agree
 * with their headers' line counts, otherwise the hunk is reported in `errors`.
 */
export function parseUnifiedDiff(text: string): ParsedDiff {
  const files: FileDiff[] = [];
  const errors: string[] = [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();

  let file: FileDiff | null = null;
  let hunk: (DiffHunk & { seenOld: number; seenNew: number; at: number }) | null = null;

  const closeHunk = () => {
    if (hunk && file) {
      if (hunk.seenOld !== hunk.oldCount || hunk.seenNew !== hunk.newCount) {
        errors.push(`line ${hunk.at}: hunk body does not match its header (-${hunk.seenOld}/${hunk.oldCount} +${hunk.seenNew}/${hunk.newCount})`);
      } else {
        file.hunks.push({ oldStart: hunk.oldStart, oldCount: hunk.oldCount, newStart: hunk.newStart, newCount: hunk.newCount, lines: hunk.lines });
      }
    }
    hunk = null;
  };

  for (let i = 0; i < lines.length; i++) {
    const line = (lines[i] ?? '').replace(/\r$/, '');

    if (hunk && (hunk.seenOld < hunk.oldCount || hunk.seenNew < hunk.newCount)) {
      const op = line[0];
      if (op === ' ' || op === '-' || op === '+' || line === '') {
        const entry: DiffLine = { op: op === '-' || op === '+' ? op : ' ', text: line.slice(1) };
        hunk.lines.push(entry);
        if (entry.op !== '+') hunk.seenOld += 1;
        if (entry.op !== '-') hunk.seenNew += 1;
        continue;
      }
      if (line.startsWith('\\')) continue;
    }
    if (line.startsWith('\\')) continue;

    if (line.startsWith('--- ')) {
      closeHunk();
      file = { oldPath: stripPrefix(line.slice(4)), newPath: null, hunks: [] };
      files.push(file);
      continue;
    }
    if (line.startsWith('+++ ') && file && file.newPath === null && file.hunks.length === 0 && !hunk) {
      file.newPath = stripPrefix(line.slice(4));
      continue;
    }

    const header = HUNK_HEADER.exec(line);
    if (header) {
      closeHunk();
      if (!file) {
        errors.push(`line ${i + 1}: hunk before any file header`);
        continue;
      }
      hunk = {
        oldStart: Number(header[1]),
        oldCount: header[2] === undefined ? 1 : Number(header[2]),
        newStart: Number(header[3]),
        newCount: header[4] === undefined ? 1 : Number(header[4]),
        lines: [],
        seenOld: 0,
        seenNew: 0,
        at: i + 1
      };
      continue;
    }

    // diff --git, index, mode lines and `#` comments carry nothing we need.
    closeHunk();
  }
  closeHunk();

  return { files: files.filter((f) => f.hunks.length > 0 || f.newPath !== null), errors };
}

/** Tree-relative path a file diff applies to. */
export function diffTarget(f: FileDiff): string | null {
  return f.newPath ?? f.oldPath;
}

function stripPrefix(raw: string): string | null {
  const path = raw.split('\t')[0]?.trim() ?? '';
  if (path === '/dev/null') return null;
  return path.replace(/^[ab]\//, '');
}
