/**
 * Message post-processor
 *
 * Applies the fixed stage order to raw backend text:
 * ticket tag → co-author trailers → emoji → subject length.
 */

import type { ChangeSet } from '../git/type.js';
import type { PostProcessOptions, StylePolicy } from './types.js';
import { COMMIT_EMOJIS, escapeRegExp } from './constants.js';

/**
 * Append ` [ticket]` to the end of the message unless the ticket already
 * appears anywhere in it
 */
export function tagTicket(message: string, ticketId: string | undefined): string {
  if (!ticketId || message.includes(ticketId)) {
    return message;
  }
  return `${message} [${ticketId}]`;
}

/**
 * Append a blank line and one `Co-authored-by:` line per author
 */
export function appendCoAuthors(message: string, coAuthors: readonly string[]): string {
  if (coAuthors.length === 0) {
    return message;
  }
  const trailers = coAuthors.map((author) => `Co-authored-by: ${author}\n`).join('');
  return `${message}\n\n${trailers}`;
}

/**
 * Prefix the subject with the emoji of its commit type
 *
 * Every table entry is tried against the start of the message. A subject
 * carries at most one leading type, so at most one entry rewrites it, and a
 * decorated subject no longer starts with a type.
 */
export function decorateWithEmoji(
  message: string,
  emojis: Readonly<Record<string, string>> = COMMIT_EMOJIS
): string {
  let result = message;
  for (const [type, emoji] of Object.entries(emojis)) {
    const pattern = new RegExp(`^${escapeRegExp(type)}(\\([^)]+\\))?:`);
    result = result.replace(pattern, (match) => `${emoji} ${match}`);
  }
  return result;
}

/**
 * Truncate the subject line when the message is too long
 *
 * The limit is compared with the length of the whole message but only the
 * first line is cut; body lines are kept verbatim. Lengths are in code points.
 */
export function enforceSubjectLength(message: string, maxLength: number): string {
  if (codePointLength(message) <= maxLength) {
    return message;
  }

  const lines = message.split('\n');
  const subject = lines[0] ?? '';
  lines[0] = Array.from(subject).slice(0, maxLength).join('');
  return lines.join('\n');
}

/**
 * Run every post-processing stage in order
 */
export function postProcess(
  rawText: string,
  changeSet: ChangeSet,
  policy: StylePolicy,
  options: PostProcessOptions
): string {
  let message = rawText;

  if (policy.ticketIntegration) {
    message = tagTicket(message, changeSet.ticketId);
  }
  message = appendCoAuthors(message, options.coAuthors);
  if (options.emojisEnabled) {
    message = decorateWithEmoji(message);
  }
  message = enforceSubjectLength(message, policy.maxSubjectLength);

  return message;
}

/**
 * Clean up raw model output before post-processing
 *
 * Strips surrounding whitespace and a wrapping markdown code fence.
 */
export function normalizeGeneratedText(raw: string): string {
  let text = raw.trim();

  const fenced = text.match(/^```[\w-]*\n([\s\S]*?)\n?```$/);
  if (fenced?.[1] !== undefined) {
    text = fenced[1].trim();
  }

  return text;
}

function codePointLength(text: string): number {
  let length = 0;
  for (const _ of text) {
    length++;
  }
  return length;
}
