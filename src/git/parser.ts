/**
 * Parsers for the plain-text output of `git diff --cached`
 */

import type { ChangeSet, FileChange, FileStatus } from './type.js';

/**
 * One entry of `git diff --name-status`
 */
export interface NameStatusEntry {
  /** Raw status field (e.g. "M", "R100") */
  status: string;
  /** Destination path */
  path: string;
  /** Source path for renames and copies */
  oldPath?: string;
}

/**
 * Line counts from `git diff --numstat`
 */
export interface NumstatEntry {
  additions: number;
  deletions: number;
  isBinary: boolean;
}

/**
 * Extension to language table
 */
const LANGUAGES: Record<string, string> = {
  '.go': 'Go',
  '.js': 'JavaScript',
  '.jsx': 'JavaScript',
  '.mjs': 'JavaScript',
  '.cjs': 'JavaScript',
  '.ts': 'TypeScript',
  '.tsx': 'TypeScript',
  '.mts': 'TypeScript',
  '.cts': 'TypeScript',
  '.py': 'Python',
  '.rb': 'Ruby',
  '.java': 'Java',
  '.php': 'PHP',
  '.rs': 'Rust',
  '.c': 'C',
  '.cpp': 'C++',
  '.cs': 'C#',
  '.html': 'HTML',
  '.css': 'CSS',
  '.md': 'Markdown',
};

const TICKET_PATTERN = /[A-Z]+-\d+/;

/**
 * Parse `git diff --cached --name-status` output
 *
 * Fields are tab separated. Renames and copies carry a similarity score and
 * two paths; the destination path is the one that gets committed.
 */
export function parseNameStatus(raw: string): NameStatusEntry[] {
  const entries: NameStatusEntry[] = [];

  for (const line of raw.split('\n')) {
    if (!line.trim()) continue;

    const fields = line.includes('\t') ? line.split('\t') : line.trim().split(/\s+/);
    const status = fields[0];
    if (!status || fields.length < 2) continue;

    if ((status.startsWith('R') || status.startsWith('C')) && fields.length >= 3) {
      entries.push({ status, oldPath: fields[1], path: fields[2] ?? '' });
    } else {
      entries.push({ status, path: fields[1] ?? '' });
    }
  }

  return entries.filter((entry) => entry.path !== '');
}

/**
 * Parse `git diff --cached --numstat -- <path>` output for a single file
 *
 * Binary files are reported as `-\t-\t<path>`.
 */
export function parseNumstat(raw: string): NumstatEntry | null {
  const fields = raw.trim().split(/\s+/);
  if (fields.length < 2) {
    return null;
  }

  const [added, deleted] = fields;
  if (added === '-' && deleted === '-') {
    return { additions: 0, deletions: 0, isBinary: true };
  }

  const additions = Number.parseInt(added ?? '', 10);
  const deletions = Number.parseInt(deleted ?? '', 10);
  return {
    additions: Number.isNaN(additions) ? 0 : additions,
    deletions: Number.isNaN(deletions) ? 0 : deletions,
    isBinary: false,
  };
}

/**
 * Map a name-status code to a file status
 */
export function parseGitStatus(status: string): FileStatus {
  switch (status.charAt(0)) {
    case 'A':
      return 'Added';
    case 'M':
      return 'Modified';
    case 'D':
      return 'Deleted';
    case 'R':
      return 'Renamed';
    case 'C':
      return 'Copied';
    case 'U':
      return 'Unmerged';
    default:
      return 'Unknown';
  }
}

/**
 * Detect the language of a file from its extension
 */
export function detectLanguage(path: string): string {
  const fileName = path.split('/').pop() ?? '';
  const dot = fileName.lastIndexOf('.');
  if (dot <= 0) {
    return 'Unknown';
  }
  return LANGUAGES[fileName.slice(dot).toLowerCase()] ?? 'Unknown';
}

/**
 * Extract the first ticket identifier (e.g. PROJ-123) from a branch name
 */
export function extractTicketId(branchName: string): string | undefined {
  return branchName.match(TICKET_PATTERN)?.[0];
}

/**
 * Assemble an immutable ChangeSet and compute its totals
 */
export function buildChangeSet(input: {
  files: FileChange[];
  branchName: string;
  ticketId?: string;
  lastCommitHash?: string;
}): ChangeSet {
  let additions = 0;
  let deletions = 0;
  for (const file of input.files) {
    if (file.isBinary) continue;
    additions += file.additions;
    deletions += file.deletions;
  }

  const changeSet: ChangeSet = {
    files: Object.freeze(input.files.map((file) => Object.freeze({ ...file }))),
    branchName: input.branchName,
    ticketId: input.ticketId || undefined,
    lastCommitHash: input.lastCommitHash || undefined,
    totals: Object.freeze({ additions, deletions }),
  };

  return Object.freeze(changeSet);
}
