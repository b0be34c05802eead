/**
 * Groundline Data Models
 *
 * Core data models for the conversation and alignment state engine.
 * Records crossing a service boundary are treated as immutable snapshots.
 */

// ============================================================================
// COMMON TYPES
// ============================================================================

/** ISO 8601 timestamp string */
export type Timestamp = string;

/** UUID v4 identifier (optionally prefixed, e.g. `prop-<uuid>`) */
export type UUID = string;

/** Chat platform user identifier */
export type PersonId = string;

/** Who proposed a change: the bot itself or a user */
export type Proposer = 'bot' | PersonId;

// ============================================================================
// MESSAGE MODEL
// ============================================================================

export interface ChatMessage {
  /** Platform message identifier */
  id: string;
  /** Channel the message was posted in */
  channelId: string;
  /** Explicit thread pointer: id of the root message this one replies to */
  threadId?: string;
  /** Author of the message */
  authorId: PersonId;
  /** Raw message text */
  text: string;
  /** When the platform recorded the message */
  timestamp: Timestamp;
  /** Whether a bot (including this one) authored the message */
  isBot: boolean;
}

export interface ReactionEvent {
  channelId: string;
  /** Message the reaction was added to */
  messageId: string;
  userId: PersonId;
  /** Reaction name without colons, e.g. `white_check_mark` */
  reaction: string;
}

// ============================================================================
// THREAD MODEL
// ============================================================================

export interface Thread {
  /** Id of the root message the thread was created from */
  threadId: string;
  channelId: string;
  participantIds: Set<PersonId>;
  /** Bounded window, newest last */
  messages: ChatMessage[];
  lastActivityAt: Timestamp;
}

/** Serializable view of a thread (dashboard, persistence) */
export interface ThreadSnapshot {
  threadId: string;
  channelId: string;
  participantIds: PersonId[];
  messages: ChatMessage[];
  lastActivityAt: Timestamp;
}

// ============================================================================
// GROUND TRUTH DOCUMENT MODEL
// ============================================================================

export interface ChangelogEntry {
  timestamp: Timestamp;
  description: string;
  reason: string;
  proposer: Proposer;
  /** User whose approval committed the entry */
  approvedBy?: PersonId;
}

export interface DocumentSections {
  coreObjective: string;
  /** person id -> ownership area, in insertion order */
  directory: Record<PersonId, string>;
  decisionLog: ChangelogEntry[];
}

export interface GroundTruthDocument {
  channelId: string;
  /** Strictly increasing on every committed mutation; 0 means never initialized */
  version: number;
  sections: DocumentSections;
  wordCount: number;
  updatedAt: Timestamp;
}

export interface ChannelMember {
  id: PersonId;
  name?: string;
  /** Profile title, used as the initial ownership area */
  title?: string;
  isBot?: boolean;
}

// ============================================================================
// PROPOSAL MODEL
// ============================================================================

export enum ProposalKind {
  UPDATE = 'update',
  COMPACTION = 'compaction'
}

export enum ProposalStatus {
  PENDING = 'pending',
  ACCEPTED = 'accepted',
  REJECTED = 'rejected'
}

export enum ResolutionReason {
  APPROVED = 'approved',
  DECLINED = 'declined',
  SUPERSEDED = 'superseded',
  STALE = 'stale',
  CHANNEL_CLOSED = 'channel_closed',
  INVARIANT_VIOLATION = 'invariant_violation'
}

/** Which document section an update proposal mutates */
export type ProposalTarget =
  | { section: 'decision_log' }
  | { section: 'directory'; personId: PersonId }
  | { section: 'core_objective' };

export interface Proposal {
  id: UUID;
  channelId: string;
  /** Thread the proposal was raised in; replies resolve it only there */
  threadId?: string;
  kind: ProposalKind;
  target: ProposalTarget;
  /** Decision text, directory area, objective, or compacted document text */
  proposedText: string;
  reason: string;
  proposer: Proposer;
  status: ProposalStatus;
  /** Document version the proposal was computed against */
  baseVersion: number;
  createdAt: Timestamp;
  resolvedAt?: Timestamp;
  resolvedBy?: PersonId;
  resolutionReason?: ResolutionReason;
  /** Document version produced by the commit, once persisted */
  committedVersion?: number;
  /** Id of the posted approval prompt, for reaction lookups */
  promptMessageId?: string;
}

export type ApprovalVerdict = 'approve' | 'reject';

// ============================================================================
// AUDIT MODEL
// ============================================================================

export enum AuditKind {
  MISALIGNMENT_FLAG = 'misalignment_flag',
  PROPOSAL_RESOLUTION = 'proposal_resolution',
  /** A user confirmed or dismissed a QUESTION or MISALIGN nudge */
  NUDGE_FEEDBACK = 'nudge_feedback'
}

export type NudgeVerdict = 'confirmed' | 'dismissed';

export interface AuditRecord<T = Record<string, unknown>> {
  id: UUID;
  timestamp: Timestamp;
  channelId: string;
  kind: AuditKind;
  payload: T;
}

// ============================================================================
// CLASSIFIER ACTIONS
// ============================================================================

export enum ActionType {
  PASS = 'PASS',
  ROUTE = 'ROUTE',
  UPDATE = 'UPDATE',
  QUESTION = 'QUESTION',
  MISALIGN = 'MISALIGN'
}

export type AlignmentAction =
  | { type: ActionType.PASS }
  | { type: ActionType.ROUTE; targetPersonId: PersonId; summary: string; category: string }
  | { type: ActionType.UPDATE; proposedText: string; reason: string; category: string }
  | { type: ActionType.QUESTION; clarificationText: string; category: string }
  | { type: ActionType.MISALIGN; nudgeText: string; category: string };
