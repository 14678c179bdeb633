import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { execSync } from 'node:child_process';
import { collectStagedChanges, validateGitRepository } from '../../src/git/staged.js';
import { GitError } from '../../src/git/type.js';

describe('collectStagedChanges', () => {
  let repoPath: string;

  const run = (command: string): string =>
    execSync(command, { cwd: repoPath, stdio: 'pipe', encoding: 'utf-8' });

  const write = (path: string, content: string | Buffer): void => {
    const fullPath = join(repoPath, path);
    mkdirSync(join(fullPath, '..'), { recursive: true });
    writeFileSync(fullPath, content);
  };

  beforeEach(() => {
    repoPath = mkdtempSync(join(tmpdir(), 'staged-test-'));

    run('git init');
    run('git config user.email "test@test.com"');
    run('git config user.name "Test"');
    run('git config commit.gpgsign false');

    write('README.md', '# demo\n');
    run('git add README.md');
    run('git commit -m "initial"');
    run('git checkout -b feature/PROJ-42-login');
  });

  afterEach(() => {
    try {
      rmSync(repoPath, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  it('should collect staged files with stats and branch info', () => {
    write('README.md', '# demo\nmore\n');
    write('src/app.ts', 'export const a = 1;\nexport const b = 2;\n');
    run('git add README.md src/app.ts');

    const changeSet = collectStagedChanges({ cwd: repoPath });

    expect(changeSet.branchName).toBe('feature/PROJ-42-login');
    expect(changeSet.ticketId).toBe('PROJ-42');
    expect(changeSet.lastCommitHash).toBe(run('git rev-parse HEAD').trim());
    expect(changeSet.files.map((f) => [f.path, f.status, f.additions, f.deletions])).toEqual([
      ['README.md', 'Modified', 1, 0],
      ['src/app.ts', 'Added', 2, 0],
    ]);
    expect(changeSet.files[1]?.language).toBe('TypeScript');
    expect(changeSet.files[1]?.diffText).toContain('+export const b = 2;');
    expect(changeSet.totals).toEqual({ additions: 3, deletions: 0 });
  });

  it('should skip ignored paths', () => {
    write('.env', 'TOKEN=placeholder\n');
    write('node_modules/pkg/index.js', 'module.exports = 1;\n');
    write('src/app.ts', 'export {};\n');
    run('git add -f .env node_modules src/app.ts');

    const changeSet = collectStagedChanges({
      cwd: repoPath,
      ignorePaths: ['.env', '*.lock', 'node_modules/'],
    });

    expect(changeSet.files.map((f) => f.path)).toEqual(['src/app.ts']);
  });

  it('should mark binary files', () => {
    write('logo.png', Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00, 0x00, 0x01, 0x02]));
    run('git add logo.png');

    const changeSet = collectStagedChanges({ cwd: repoPath });

    expect(changeSet.files).toHaveLength(1);
    expect(changeSet.files[0]?.isBinary).toBe(true);
    expect(changeSet.totals).toEqual({ additions: 0, deletions: 0 });
  });

  it('should report renames with the destination path', () => {
    run('git mv README.md GUIDE.md');

    const changeSet = collectStagedChanges({ cwd: repoPath });

    expect(changeSet.files.map((f) => [f.path, f.status])).toEqual([['GUIDE.md', 'Renamed']]);
  });

  it('should leave out the ticket when ticket integration is off', () => {
    write('a.py', 'print(1)\n');
    run('git add a.py');

    const changeSet = collectStagedChanges({ cwd: repoPath, ticketIntegration: false });

    expect(changeSet.ticketId).toBeUndefined();
  });

  it('should return an empty change set when nothing is staged', () => {
    const changeSet = collectStagedChanges({ cwd: repoPath });

    expect(changeSet.files).toEqual([]);
    expect(changeSet.totals).toEqual({ additions: 0, deletions: 0 });
  });
});

describe('validateGitRepository', () => {
  it('should reject a directory that is not a repository', () => {
    const dir = mkdtempSync(join(tmpdir(), 'not-a-repo-'));
    try {
      expect(() => validateGitRepository(dir)).toThrow(GitError);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should reject a missing path', () => {
    expect(() => validateGitRepository(join(tmpdir(), 'scribe-missing-dir-xyz'))).toThrow(
      'Repository path does not exist'
    );
  });
});
