/**
 * Staged change collection using native child_process
 */

import { execFileSync } from 'node:child_process';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { ChangeSet, CollectOptions, DiffAlgorithm, FileChange } from './type.js';
import { GitError } from './type.js';
import {
  buildChangeSet,
  detectLanguage,
  extractTicketId,
  parseGitStatus,
  parseNameStatus,
  parseNumstat,
} from './parser.js';
import { filterIgnored } from './filter.js';
import { errorMessage } from '../utils/index.js';

/**
 * Run a git command and return its trimmed stdout
 */
export function git(args: string[], cwd: string): string {
  return execFileSync('git', args, {
    cwd,
    encoding: 'utf-8',
    stdio: ['ignore', 'pipe', 'pipe'],
    maxBuffer: 64 * 1024 * 1024,
  });
}

/**
 * Run a git command, returning undefined instead of throwing
 */
function tryGit(args: string[], cwd: string): string | undefined {
  try {
    return git(args, cwd).trim();
  } catch {
    return undefined;
  }
}

/**
 * Validate that a path is a git working tree
 *
 * @returns Resolved absolute path
 * @throws {GitError} If path doesn't exist or isn't a git repository
 */
export function validateGitRepository(repoPath: string): string {
  const absolutePath = resolve(repoPath);

  if (!existsSync(absolutePath)) {
    throw new GitError(`Repository path does not exist: ${absolutePath}`, 'REPO_NOT_FOUND');
  }

  try {
    git(['rev-parse', '--git-dir'], absolutePath);
  } catch (error: unknown) {
    throw new GitError('not a git repository', 'NOT_GIT_REPO', gitStderr(error));
  }

  return absolutePath;
}

/**
 * `git diff` arguments for the configured diff algorithm
 */
function diffArgs(algorithm: DiffAlgorithm): string[] {
  switch (algorithm) {
    case 'minimal':
      return ['diff', '--cached', '--minimal'];
    case 'patience':
      return ['diff', '--cached', '--patience'];
    default:
      return ['diff', '--cached'];
  }
}

/**
 * Collect every staged file into a ChangeSet
 *
 * Files whose diff or stats git cannot produce are skipped and reported
 * through `onWarning`.
 *
 * @throws {GitError} If the path is not a repository or the staged list can't be read
 */
export function collectStagedChanges(options: CollectOptions = {}): ChangeSet {
  const {
    ignorePaths = [],
    diffAlgorithm = 'unified',
    ticketIntegration = true,
    onWarning = () => {},
  } = options;
  const cwd = validateGitRepository(options.cwd ?? process.cwd());

  const branchName = tryGit(['rev-parse', '--abbrev-ref', 'HEAD'], cwd) ?? '';
  const ticketId = ticketIntegration ? extractTicketId(branchName) : undefined;
  const lastCommitHash = tryGit(['rev-parse', '--verify', '--quiet', 'HEAD'], cwd) || undefined;

  let nameStatus: string;
  try {
    nameStatus = git(['diff', '--cached', '--name-status'], cwd);
  } catch (error: unknown) {
    throw new GitError('error getting staged files', 'STAGED_LIST_FAILED', gitStderr(error));
  }

  const entries = filterIgnored(parseNameStatus(nameStatus), ignorePaths);
  const files: FileChange[] = [];

  for (const entry of entries) {
    let diffText: string;
    try {
      diffText = git([...diffArgs(diffAlgorithm), '--', entry.path], cwd);
    } catch (error) {
      onWarning(`Could not get diff for ${entry.path}: ${errorMessage(error)}`);
      continue;
    }

    let stats: ReturnType<typeof parseNumstat>;
    try {
      stats = parseNumstat(git(['diff', '--cached', '--numstat', '--', entry.path], cwd));
    } catch (error) {
      onWarning(`Could not get stats for ${entry.path}: ${errorMessage(error)}`);
      continue;
    }

    files.push({
      path: entry.path,
      status: parseGitStatus(entry.status),
      additions: stats?.additions ?? 0,
      deletions: stats?.deletions ?? 0,
      isBinary: stats?.isBinary ?? false,
      diffText,
      language: detectLanguage(entry.path),
    });
  }

  return buildChangeSet({ files, branchName, ticketId, lastCommitHash });
}

/**
 * stderr captured on a failed execFileSync call, falling back to the message
 */
function gitStderr(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const stderr = String(error.stderr).trim();
    if (stderr) return stderr;
  }
  return errorMessage(error);
}
