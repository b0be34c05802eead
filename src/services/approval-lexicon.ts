/**
 * Approval lexicon
 *
 * Fixed word lists for answering a pending proposal or an open nudge from a
 * chat reply or a reaction. No model call is involved.
 */

import type { ApprovalVerdict } from '../schemas/models.js';

const AFFIRMATIVE_REPLIES = new Set(['y', 'yes', 'yeah', 'sure', '👍']);
const NEGATIVE_REPLIES = new Set(['n', 'no', 'nah']);

export const APPROVE_REACTIONS = new Set(['white_check_mark', '+1', 'thumbsup']);
export const REJECT_REACTIONS = new Set(['x', '-1', 'thumbsdown']);

/**
 * Trimmed, lower-cased, trailing `.` and `!` removed
 */
export function normalizeReply(text: string): string {
  return text.trim().toLowerCase().replace(/[.!]+$/, '').trim();
}

/**
 * Verdict for a free-form reply, or null when the reply is not an answer
 */
export function parseReply(text: string): ApprovalVerdict | null {
  const normalized = normalizeReply(text);
  if (AFFIRMATIVE_REPLIES.has(normalized)) return 'approve';
  if (NEGATIVE_REPLIES.has(normalized)) return 'reject';
  return null;
}

/**
 * Verdict for a reaction name (colons optional)
 */
export function parseReaction(reaction: string): ApprovalVerdict | null {
  const name = reaction.replace(/^:|:$/g, '').toLowerCase();
  if (APPROVE_REACTIONS.has(name)) return 'approve';
  if (REJECT_REACTIONS.has(name)) return 'reject';
  return null;
}
