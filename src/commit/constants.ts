/**
 * Commit pipeline constants
 */

/**
 * Emoji prepended to a subject for each conventional commit type
 */
export const COMMIT_EMOJIS: Readonly<Record<string, string>> = {
  feat: '✨',
  fix: '🐛',
  docs: '📚',
  style: '💎',
  refactor: '♻️',
  test: '🧪',
  chore: '🔧',
};

/**
 * Default allowed commit types
 */
export const DEFAULT_COMMIT_TYPES = ['feat', 'fix', 'docs', 'style', 'refactor', 'test', 'chore'];

/**
 * Default subject length limit
 */
export const DEFAULT_MAX_SUBJECT_LENGTH = 72;

/**
 * Escape a string for literal use inside a RegExp
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
