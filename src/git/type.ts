/**
 * Type definitions for Git operations
 */

/**
 * Status of a staged file, derived from the first letter of
 * `git diff --name-status`
 */
export type FileStatus =
  | 'Added'
  | 'Modified'
  | 'Deleted'
  | 'Renamed'
  | 'Copied'
  | 'Unmerged'
  | 'Unknown';

/**
 * A single staged file
 */
export interface FileChange {
  /** Path relative to the repository root (destination path for renames) */
  readonly path: string;
  readonly status: FileStatus;
  /** Lines added (0 for binary files) */
  readonly additions: number;
  /** Lines deleted (0 for binary files) */
  readonly deletions: number;
  readonly isBinary: boolean;
  /** Unified diff text as printed by git */
  readonly diffText: string;
  /** Language detected from the file extension */
  readonly language: string;
}

/**
 * All staged changes for one commit
 */
export interface ChangeSet {
  readonly files: readonly FileChange[];
  readonly branchName: string;
  /** Ticket identifier found in the branch name (e.g. PROJ-123) */
  readonly ticketId?: string;
  /** HEAD commit hash (absent on an unborn branch) */
  readonly lastCommitHash?: string;
  /** Sum of additions/deletions over non-binary files */
  readonly totals: {
    readonly additions: number;
    readonly deletions: number;
  };
}

/**
 * Diff algorithm passed to `git diff`
 */
export type DiffAlgorithm = 'unified' | 'minimal' | 'patience';

/**
 * Options for collecting staged changes
 */
export interface CollectOptions {
  /** Repository path (defaults to process.cwd()) */
  cwd?: string;
  /** Glob patterns of paths to leave out */
  ignorePaths?: readonly string[];
  diffAlgorithm?: DiffAlgorithm;
  /** Extract a ticket id from the branch name */
  ticketIntegration?: boolean;
  /** Called when a file is skipped because git could not describe it */
  onWarning?: (message: string) => void;
}

/**
 * Error thrown during git operations
 */
export class GitError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly stderr?: string
  ) {
    super(message);
    this.name = 'GitError';
  }
}
