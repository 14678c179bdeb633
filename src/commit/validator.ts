/**
 * Conventional commit format validator
 */

import type { StylePolicy, ValidationResult } from './types.js';
import { FormatError } from './errors.js';
import { COMMIT_EMOJIS, escapeRegExp } from './constants.js';

/**
 * Build the subject grammar for a policy
 *
 * `^(type1|type2|…)`, then `(scope)` (mandatory when a scope is required,
 * optional otherwise), then `: ` and at least one character. Only the type
 * letters are affected by the case-insensitive flag.
 */
export function buildConventionalPattern(
  policy: Pick<StylePolicy, 'allowedTypePrefixes' | 'scopeRequired'>
): RegExp {
  const types = policy.allowedTypePrefixes.map(escapeRegExp).join('|');
  let source = `^(${types})`;
  source += policy.scopeRequired ? '(\\([^)]+\\))' : '(\\([^)]+\\))?';
  source += ': .+';
  return new RegExp(source, 'i');
}

/**
 * Remove a leading `<emoji> ` added by emoji decoration
 */
export function stripEmojiPrefix(
  message: string,
  emojis: Readonly<Record<string, string>> = COMMIT_EMOJIS
): string {
  for (const emoji of Object.values(emojis)) {
    if (message.startsWith(`${emoji} `)) {
      return message.slice(emoji.length + 1);
    }
  }
  return message;
}

/**
 * Check a final message against the conventional commit grammar
 *
 * A decoration emoji in front of the type is ignored.
 */
export function validateConventional(
  message: string,
  policy: Pick<StylePolicy, 'allowedTypePrefixes' | 'scopeRequired'>
): ValidationResult {
  if (policy.allowedTypePrefixes.length === 0) {
    return {
      ok: false,
      error: new FormatError('no commit types are configured', message),
    };
  }

  if (!buildConventionalPattern(policy).test(stripEmojiPrefix(message))) {
    return {
      ok: false,
      error: new FormatError('message does not match conventional commit format', message),
    };
  }
  return { ok: true };
}

/**
 * Whether the pipeline should validate the message for this policy
 */
export function shouldValidate(policy: StylePolicy): boolean {
  return policy.style === 'conventional' && policy.verifyFormat;
}
