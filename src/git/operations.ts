import { execa } from 'execa';

import { parseNameStatus, type ChangedFile } from './diff-parser.js';

export interface GitRepo {
  repoRoot: string;
}

export function git(repoRoot: string): GitRepo {
  return { repoRoot };
}

async function run(repo: GitRepo, args: string[]): Promise<string> {
  const res = await execa('git', args, {
    cwd: repo.repoRoot,
    stdout: 'pipe',
    stderr: 'pipe'
  });
  return res.stdout;
}

export async function isGitRepo(repo: GitRepo): Promise<boolean> {
  try {
    return (await run(repo, ['rev-parse', '--is-inside-work-tree'])).trim() === 'true';
  } catch {
    return false;
  }
}

export async function getCurrentCommit(repo: GitRepo): Promise<string> {
  return (await run(repo, ['rev-parse', 'HEAD'])).trim();
}

/**
 * Files changed between the merge base of `base` and HEAD: `git diff --name-status origin/<base>...HEAD`,
 * falling back to the local `<base>` when there is no such remote branch. Deleted files are left out,
 * since nothing can be scanned in them. Paths are relative to the repo's directory, and changes outside
 * it are not listed, so a package inside a larger repo sees only its own files.
 */
export async function changedFiles(repo: GitRepo, base: string): Promise<ChangedFile[]> {
  const candidates = base.startsWith('origin/') ? [base] : [`origin/${base}`, base];

  let lastError: unknown = null;
  for (const ref of candidates) {
    try {
      const out = await run(repo, ['diff', '--name-status', '-M', '--relative', `${ref}...HEAD`]);
      return parseNameStatus(out).filter((f) => f.changeType !== 'deleted');
    } catch (err) {
      lastError = err;
    }
  }
  throw lastError instanceof Error ? lastError : new Error(`git diff against ${base} failed`);
}
