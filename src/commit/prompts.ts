/**
 * Prompt builder
 *
 * Turns a ChangeSet into the text sent to the generation backend. Output is
 * a pure function of its inputs so the same staged changes always produce
 * the same prompt.
 */

import type { ChangeSet } from '../git/type.js';
import type { StylePolicy } from './types.js';

/**
 * Count files per language, in the order languages are first seen
 */
export function countLanguages(changeSet: ChangeSet): Map<string, number> {
  const counts = new Map<string, number>();
  for (const file of changeSet.files) {
    counts.set(file.language, (counts.get(file.language) ?? 0) + 1);
  }
  return counts;
}

/**
 * Numbered rules for the configured style
 */
export function buildStyleRules(policy: StylePolicy): string[] {
  switch (policy.style) {
    case 'conventional': {
      const format = policy.scopeRequired
        ? '<type>(<scope>): <description>'
        : '<type>(<optional scope>): <description>';
      const rules = [
        `Use conventional commit format: ${format}`,
        `Types should be one of: ${policy.allowedTypePrefixes.join(', ')}`,
        'Keep the description concise and clear',
        'Use imperative mood ("add" not "added")',
      ];
      if (policy.breakingChangeAllowed) {
        rules.push('If there are breaking changes, include a BREAKING CHANGE section');
      }
      rules.push('Reply with the commit message only, without quotes or commentary');
      return rules;
    }

    case 'detailed':
      return [
        'Start with a clear summary line',
        'Add a detailed body explaining the changes',
        'Include technical details where relevant',
        'Mention any potential side effects',
      ];

    case 'custom':
      return [];
  }
}

/**
 * Build the generation prompt
 *
 * The caller must not pass an empty change set.
 */
export function buildPrompt(changeSet: ChangeSet, policy: StylePolicy): string {
  const parts: string[] = [];

  parts.push('Generate a commit message for the following changes:\n\n');
  parts.push(
    `Total Changes: +${changeSet.totals.additions}/-${changeSet.totals.deletions} lines\n`
  );

  parts.push(`\nBranch: ${changeSet.branchName}\n`);
  if (changeSet.ticketId) {
    parts.push(`Ticket: ${changeSet.ticketId}\n`);
  }

  parts.push('\nLanguages affected:\n');
  for (const [language, count] of countLanguages(changeSet)) {
    parts.push(`- ${language} (${count} ${count === 1 ? 'file' : 'files'})\n`);
  }

  parts.push('\nChanged files:\n');
  for (const file of changeSet.files) {
    parts.push(`\n=== ${file.path} (${file.status}) ===\n`);
    if (file.isBinary) {
      parts.push('[Binary file]\n');
    } else {
      parts.push(`Changes: +${file.additions}/-${file.deletions} lines\n`);
      parts.push(file.diffText);
    }
  }

  const rules = buildStyleRules(policy);
  parts.push('\nPlease generate a commit message following these rules:\n');
  rules.forEach((rule, index) => {
    parts.push(`\n${index + 1}. ${rule}`);
  });

  return parts.join('');
}
