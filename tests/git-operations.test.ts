import { describe, expect, it } from 'vitest';
import { rm } from 'node:fs/promises';
import { join } from 'node:path';

import { changedFiles, getCurrentCommit, git, isGitRepo } from '../src/git/operations.js';
import { tempDir } from './fixtures.js';
import { commitAll, createTempGitRepo, writeFileInRepo } from './git-fixture.js';

describe('git operations', () => {
  it('recognises a work tree', async () => {
    const { dir } = await createTempGitRepo();
    expect(await isGitRepo(git(dir))).toBe(true);
    expect(await getCurrentCommit(git(dir))).toMatch(/^[0-9a-f]{40}$/);
  });

  it('reports a plain directory as not a repo', async () => {
    expect(await isGitRepo(git(await tempDir('plain')))).toBe(false);
  });

  it('lists files changed since the base, leaving out deletions', async () => {
    const { dir } = await createTempGitRepo();
    const repo = git(dir);
    const base = await getCurrentCommit(repo);

    await writeFileInRepo(dir, 'src/a.ts', 'export const a = 1;\n');
    await writeFileInRepo(dir, 'src/b.ts', 'export const b = 2;\n');
    await rm(join(dir, 'README.md'));
    await commitAll(dir, 'change');

    expect(await changedFiles(repo, base)).toEqual([
      { path: 'src/a.ts', changeType: 'added' },
      { path: 'src/b.ts', changeType: 'added' }
    ]);
  });

  it('lists paths relative to a package directory inside the repo', async () => {
    const { dir } = await createTempGitRepo();
    const base = await getCurrentCommit(git(dir));

    await writeFileInRepo(dir, 'pkg/src/a.ts', 'export const a = 1;\n');
    await writeFileInRepo(dir, 'other.ts', 'export const other = 2;\n');
    await commitAll(dir, 'change');

    expect(await changedFiles(git(join(dir, 'pkg')), base)).toEqual([{ path: 'src/a.ts', changeType: 'added' }]);
  });

  it('fails for a base that does not exist', async () => {
    const { dir } = await createTempGitRepo();
    await expect(changedFiles(git(dir), 'no-such-branch')).rejects.toThrow();
  });
});
