import { execa } from 'execa';
import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

export async function createTempGitRepo(): Promise<{ dir: string }> {
  const dir = await mkdtemp(join(tmpdir(), 'fixpoint-git-'));
  await execa('git', ['init'], { cwd: dir });
  await execa('git', ['config', 'user.email', 'test@example.com'], { cwd: dir });
  await execa('git', ['config', 'user.name', 'Fixpoint Test'], { cwd: dir });

  // Initial commit to diff against.
  await writeFile(join(dir, 'README.md'), '# temp\n', 'utf8');
  await commitAll(dir, 'init');

  return { dir };
}

export async function writeFileInRepo(repoDir: string, relPath: string, content: string) {
  await mkdir(dirname(join(repoDir, relPath)), { recursive: true });
  await writeFile(join(repoDir, relPath), content, 'utf8');
}

export async function commitAll(repoDir: string, message: string) {
  await execa('git', ['add', '-A'], { cwd: repoDir });
  await execa('git', ['commit', '-m', message], { cwd: repoDir });
}
