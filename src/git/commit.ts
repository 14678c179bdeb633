/**
 * Commit execution and hook installation
 */

import { spawnSync } from 'node:child_process';
import { chmodSync, existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname, isAbsolute, join } from 'node:path';
import { GitError } from './type.js';
import { git } from './staged.js';

/**
 * Options for creating a commit
 */
export interface CommitOptions {
  cwd?: string;
  /** GPG-sign the commit (`-S`) */
  sign?: boolean;
}

/**
 * Name of the hook file written by installCommitHook
 */
export const HOOK_NAME = 'prepare-commit-msg';

/**
 * Hook script body
 */
export const HOOK_SCRIPT = `#!/bin/sh
# commit-scribe prepare-commit-msg hook
scribe --yes
`;

/**
 * Record the staged changes with the given message
 *
 * git's own output is passed straight through to the terminal.
 *
 * @returns Hash of the new HEAD commit
 * @throws {GitError} If git commit exits non-zero
 */
export function createCommit(message: string, options: CommitOptions = {}): string | undefined {
  const cwd = options.cwd ?? process.cwd();
  const args = ['commit', '-m', message];
  if (options.sign) {
    args.push('-S');
  }

  const result = spawnSync('git', args, { cwd, stdio: 'inherit' });
  if (result.error) {
    throw new GitError(`error executing git commit: ${result.error.message}`, 'COMMIT_FAILED');
  }
  if (result.status !== 0) {
    throw new GitError(
      `error executing git commit: exit status ${result.status ?? 'unknown'}`,
      'COMMIT_FAILED'
    );
  }

  return getHeadHash(cwd);
}

/**
 * Hash of HEAD, or undefined on an unborn branch
 */
export function getHeadHash(cwd: string = process.cwd()): string | undefined {
  try {
    return git(['rev-parse', 'HEAD'], cwd).trim() || undefined;
  } catch {
    return undefined;
  }
}

/**
 * Print the staged diff in color to the terminal
 */
export function showStagedDiff(cwd: string = process.cwd()): void {
  spawnSync('git', ['diff', '--cached', '--color'], { cwd, stdio: 'inherit' });
}

/**
 * Write the prepare-commit-msg hook
 *
 * @param hooksPath - Hooks directory, relative paths resolve against cwd
 * @returns Path of the written hook
 */
export function installCommitHook(hooksPath: string, cwd: string = process.cwd()): string {
  const dir = isAbsolute(hooksPath) ? hooksPath : join(cwd, hooksPath);
  const hookPath = join(dir, HOOK_NAME);

  if (!existsSync(dirname(hookPath))) {
    mkdirSync(dirname(hookPath), { recursive: true });
  }
  writeFileSync(hookPath, HOOK_SCRIPT, 'utf-8');
  chmodSync(hookPath, 0o755);

  return hookPath;
}
