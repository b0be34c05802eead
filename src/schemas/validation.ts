/**
 * Groundline Schema Validation
 *
 * Engine limits, and validators for everything that crosses the process
 * boundary: classifier replies, transport frames, dashboard queries.
 */

import {
  ActionType,
  AuditKind,
  type AlignmentAction,
  type ChannelMember,
  type ChatMessage,
  type ReactionEvent,
} from './models.js';
import type { ValidationFieldError } from './errors.js';

// ============================================================================
// ENGINE LIMITS
// ============================================================================

export const EngineLimits = {
  // Thread context
  MAX_THREAD_WINDOW: 20,
  TIME_WINDOW_MS: 10 * 60 * 1000, // 10 minutes
  BOUNDARY_MARGIN_MS: 30 * 1000,
  MAX_CONTINUATION_CHECKS: 3,
  MAX_THREADS: 500,

  // Ground truth
  MAX_GROUND_TRUTH_WORDS: 1000,

  // Inference
  CLASSIFIER_TIMEOUT_MS: 8000,
  CLASSIFIER_MAX_ATTEMPTS: 2,

  // Text
  MESSAGE_TEXT_MAX_LENGTH: 40000,
  SUMMARY_LINE_MAX_LENGTH: 280
} as const;

export const DEFAULT_CATEGORY = 'general';
export const DEFAULT_ROUTE_SUMMARY = 'could use your help here.';
export const DEFAULT_UPDATE_REASON = 'Decision made in channel discussion';

// ============================================================================
// VALIDATION RESULT
// ============================================================================

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: ValidationFieldError[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function requireString(
  source: Record<string, unknown>,
  field: string,
  errors: ValidationFieldError[],
  prefix: string
): string {
  const value = source[field];
  if (!nonEmptyString(value)) {
    errors.push({
      field: `${prefix}${field}`,
      message: `${field} is required`,
      code: 'MISSING_REQUIRED_FIELD',
      value,
    });
    return '';
  }
  return value;
}

export function isValidTimestamp(value: string): boolean {
  return !isNaN(Date.parse(value));
}

// ============================================================================
// CLASSIFIER REPLIES
// ============================================================================

const REPLY_PATTERN = /^([A-Za-z]+)(?:\|([\w-]+))?\s*:\s*([\s\S]*)$/;
const MENTION_PATTERN = /^<@([A-Za-z0-9._-]+)>$/;

/**
 * Parse the model's `ACTION|category: content` reply into an action.
 * Anything that cannot be parsed is a PASS.
 */
export function parseClassifierReply(raw: string): AlignmentAction {
  const text = raw.trim();
  if (/^PASS\b/i.test(text)) {
    return { type: ActionType.PASS };
  }

  const match = REPLY_PATTERN.exec(text);
  if (!match) {
    return { type: ActionType.PASS };
  }

  const action = match[1].toUpperCase();
  const category = match[2] ? match[2].toLowerCase() : DEFAULT_CATEGORY;
  const content = match[3].trim();
  if (!content) {
    return { type: ActionType.PASS };
  }

  const [head, ...rest] = content.split('|');
  const tail = rest.join('|').trim();

  switch (action) {
    case ActionType.ROUTE: {
      const target = head.trim();
      const mention = MENTION_PATTERN.exec(target);
      const targetPersonId = mention ? mention[1] : target.replace(/^@/, '');
      if (!targetPersonId || /\s/.test(targetPersonId)) {
        return { type: ActionType.PASS };
      }
      return {
        type: ActionType.ROUTE,
        targetPersonId,
        summary: tail || DEFAULT_ROUTE_SUMMARY,
        category,
      };
    }
    case ActionType.UPDATE:
      return {
        type: ActionType.UPDATE,
        proposedText: head.trim(),
        reason: tail || DEFAULT_UPDATE_REASON,
        category,
      };
    case ActionType.QUESTION:
      return { type: ActionType.QUESTION, clarificationText: content, category };
    case ActionType.MISALIGN:
      return { type: ActionType.MISALIGN, nudgeText: content, category };
    default:
      return { type: ActionType.PASS };
  }
}

/**
 * Schema check for a structured action handed back by an inference client.
 * Returns null when the value is not a well-formed action.
 */
export function validateAction(value: unknown): AlignmentAction | null {
  if (!isRecord(value)) return null;

  const category = nonEmptyString(value.category) ? value.category : DEFAULT_CATEGORY;

  switch (value.type) {
    case ActionType.PASS:
      return { type: ActionType.PASS };
    case ActionType.ROUTE:
      if (!nonEmptyString(value.targetPersonId) || !nonEmptyString(value.summary)) return null;
      return { type: ActionType.ROUTE, targetPersonId: value.targetPersonId, summary: value.summary, category };
    case ActionType.UPDATE:
      if (!nonEmptyString(value.proposedText) || !nonEmptyString(value.reason)) return null;
      return { type: ActionType.UPDATE, proposedText: value.proposedText, reason: value.reason, category };
    case ActionType.QUESTION:
      if (!nonEmptyString(value.clarificationText)) return null;
      return { type: ActionType.QUESTION, clarificationText: value.clarificationText, category };
    case ActionType.MISALIGN:
      if (!nonEmptyString(value.nudgeText)) return null;
      return { type: ActionType.MISALIGN, nudgeText: value.nudgeText, category };
    default:
      return null;
  }
}

// ============================================================================
// TRANSPORT FRAMES
// ============================================================================

export function validateChatMessage(value: unknown, prefix = 'data.'): ValidationResult<ChatMessage> {
  if (!isRecord(value)) {
    return { valid: false, errors: [{ field: prefix.replace(/\.$/, ''), message: 'Expected an object', code: 'INVALID_FORMAT' }] };
  }

  const errors: ValidationFieldError[] = [];
  const id = requireString(value, 'id', errors, prefix);
  const channelId = requireString(value, 'channelId', errors, prefix);
  const authorId = requireString(value, 'authorId', errors, prefix);
  const timestamp = requireString(value, 'timestamp', errors, prefix);

  if (typeof value.text !== 'string') {
    errors.push({ field: `${prefix}text`, message: 'text must be a string', code: 'INVALID_FORMAT', value: value.text });
  } else if (value.text.length > EngineLimits.MESSAGE_TEXT_MAX_LENGTH) {
    errors.push({ field: `${prefix}text`, message: 'text is too long', code: 'TEXT_TOO_LONG' });
  }
  if (timestamp && !isValidTimestamp(timestamp)) {
    errors.push({ field: `${prefix}timestamp`, message: 'Invalid timestamp format (expected ISO 8601)', code: 'INVALID_TIMESTAMP', value: timestamp });
  }
  if (value.threadId !== undefined && value.threadId !== null && !nonEmptyString(value.threadId)) {
    errors.push({ field: `${prefix}threadId`, message: 'threadId must be a non-empty string', code: 'INVALID_FORMAT', value: value.threadId });
  }
  if (value.isBot !== undefined && typeof value.isBot !== 'boolean') {
    errors.push({ field: `${prefix}isBot`, message: 'isBot must be a boolean', code: 'INVALID_FORMAT', value: value.isBot });
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  return {
    valid: true,
    value: {
      id,
      channelId,
      threadId: nonEmptyString(value.threadId) ? value.threadId : undefined,
      authorId,
      text: typeof value.text === 'string' ? value.text : '',
      timestamp: new Date(timestamp).toISOString(),
      isBot: value.isBot === true,
    },
  };
}

export function validateReactionEvent(value: unknown, prefix = 'data.'): ValidationResult<ReactionEvent> {
  if (!isRecord(value)) {
    return { valid: false, errors: [{ field: prefix.replace(/\.$/, ''), message: 'Expected an object', code: 'INVALID_FORMAT' }] };
  }

  const errors: ValidationFieldError[] = [];
  const channelId = requireString(value, 'channelId', errors, prefix);
  const messageId = requireString(value, 'messageId', errors, prefix);
  const userId = requireString(value, 'userId', errors, prefix);
  const reaction = requireString(value, 'reaction', errors, prefix);

  if (errors.length > 0) {
    return { valid: false, errors };
  }
  return { valid: true, value: { channelId, messageId, userId, reaction: reaction.replace(/^:|:$/g, '') } };
}

export function validateMembers(value: unknown, field = 'data.members'): ValidationResult<ChannelMember[]> {
  if (!Array.isArray(value)) {
    return { valid: false, errors: [{ field, message: 'members must be an array', code: 'INVALID_FORMAT' }] };
  }

  const errors: ValidationFieldError[] = [];
  const members: ChannelMember[] = [];
  value.forEach((entry: unknown, index) => {
    if (!isRecord(entry) || !nonEmptyString(entry.id)) {
      errors.push({ field: `${field}[${index}].id`, message: 'member id is required', code: 'MISSING_REQUIRED_FIELD' });
      return;
    }
    members.push({
      id: entry.id,
      name: nonEmptyString(entry.name) ? entry.name : undefined,
      title: nonEmptyString(entry.title) ? entry.title : undefined,
      isBot: entry.isBot === true,
    });
  });

  return errors.length > 0 ? { valid: false, errors } : { valid: true, value: members };
}

// ============================================================================
// DASHBOARD QUERIES
// ============================================================================

export interface AuditQuery {
  since?: string;
  kind?: AuditKind;
}

export function validateAuditQuery(query: Record<string, unknown>): ValidationResult<AuditQuery> {
  const errors: ValidationFieldError[] = [];
  const result: AuditQuery = {};

  const since = query.since;
  if (since !== undefined && since !== '') {
    if (typeof since !== 'string' || !isValidTimestamp(since)) {
      errors.push({ field: 'since', message: 'Invalid timestamp format (expected ISO 8601)', code: 'INVALID_TIMESTAMP', value: since });
    } else {
      result.since = new Date(since).toISOString();
    }
  }

  const kind = query.kind;
  if (kind !== undefined && kind !== '') {
    const known = Object.values(AuditKind).find(k => k === kind);
    if (!known) {
      const kinds = Object.values(AuditKind);
      errors.push({ field: 'kind', message: `kind must be one of ${kinds.join(', ')}`, code: 'INVALID_PARAMETER', value: kind });
    } else {
      result.kind = known;
    }
  }

  return errors.length > 0 ? { valid: false, errors } : { valid: true, value: result };
}
