/**
 * AlignmentEngine - Drives the per-message control flow
 *
 * An inbound message first gets a chance to answer the channel's pending
 * proposal, or to confirm or dismiss an open nudge. Otherwise it is grouped
 * into a thread, classified against the channel's ground truth, and the
 * resulting action is carried out.
 */

import {
  ActionType,
  AuditKind,
  ProposalKind,
  ProposalStatus,
  ResolutionReason,
  type AlignmentAction,
  type ApprovalVerdict,
  type ChannelMember,
  type ChatMessage,
  type GroundTruthDocument,
  type NudgeVerdict,
  type PersonId,
  type Proposal,
  type ReactionEvent,
} from '../schemas/models.js';
import { InvariantViolationError, StorageError } from '../schemas/errors.js';
import { mention, renderChangelogLine, renderDirectoryLine } from '../lib/document-text.js';
import { parseReaction, parseReply } from './approval-lexicon.js';
import type { AlignmentClassifier } from './classifier.js';
import type { AuditService } from './audit-service.js';
import type { DocumentService, ResolutionOutcome } from './document-service.js';
import type { ProposalWorkflow } from './proposal-service.js';
import type { ThreadService } from './thread-service.js';

/**
 * Outbound side of the chat platform. Returns the posted message id when
 * the platform reports one.
 */
export interface ChatTransport {
  post(channelId: string, threadId: string | undefined, text: string): Promise<string | undefined>;
}

export interface AlignmentEngineDeps {
  documents: DocumentService;
  proposals: ProposalWorkflow;
  threads: ThreadService;
  classifier: AlignmentClassifier;
  audit: AuditService;
  transport: ChatTransport;
}

export type MessageOutcome =
  | { type: 'ignored'; reason: 'bot_message' | 'uninitialized'; threadId?: string }
  | { type: 'resolution'; proposal: Proposal; changed: boolean; failed?: boolean }
  | { type: 'feedback'; threadId: string; flagId: string; verdict: NudgeVerdict }
  | { type: 'classified'; threadId: string; action: AlignmentAction; completed: boolean; proposal?: Proposal };

export const COULD_NOT_PROCESS = "Sorry, I couldn't process that update.";

const MAX_OPEN_NUDGES = 500;

/** A posted QUESTION or MISALIGN reply that members can still confirm or dismiss */
interface OpenNudge {
  flagId: string;
  channelId: string;
  threadId: string;
  promptMessageId: string;
  action: ActionType.QUESTION | ActionType.MISALIGN;
  messageId: string;
}

export class AlignmentEngine {
  private documents: DocumentService;
  private proposals: ProposalWorkflow;
  private threads: ThreadService;
  private classifier: AlignmentClassifier;
  private audit: AuditService;
  private transport: ChatTransport;
  private nudges: Map<string, OpenNudge> = new Map();
  private members: Map<string, Set<PersonId>> = new Map();

  constructor(deps: AlignmentEngineDeps) {
    this.documents = deps.documents;
    this.proposals = deps.proposals;
    this.threads = deps.threads;
    this.classifier = deps.classifier;
    this.audit = deps.audit;
    this.transport = deps.transport;
  }

  // ============================================================================
  // INBOUND EVENTS
  // ============================================================================

  async handleMessage(message: ChatMessage): Promise<MessageOutcome> {
    if (message.isBot) {
      return { type: 'ignored', reason: 'bot_message' };
    }

    const verdict = parseReply(message.text);
    if (verdict) {
      const pending = await this.proposals.pending(message.channelId);
      if (pending && pending.threadId === message.threadId) {
        return this.applyVerdict(pending, verdict, message.authorId);
      }
      const nudge = message.threadId ? this.openNudgeIn(message.channelId, message.threadId) : undefined;
      if (nudge) {
        return this.applyFeedback(nudge, verdict, message.authorId);
      }
    }

    const threadId = await this.threads.ingest(message);

    let document = await this.documents.current(message.channelId);
    if (document.version === 0) {
      return { type: 'ignored', reason: 'uninitialized', threadId };
    }

    const retried = await this.documents.retryUncommitted(message.channelId);
    if (retried) {
      await this.announce(retried);
      document = retried.document;
    }

    const window = this.threads.window(message.channelId, threadId);
    const { action, completed } = await this.classifier.classify(message, document, window);
    if (!completed || action.type === ActionType.PASS) {
      return { type: 'classified', threadId, action, completed };
    }

    const { type, ...details } = action;
    const flag = await this.audit.record(message.channelId, AuditKind.MISALIGNMENT_FLAG, {
      messageId: message.id,
      threadId,
      authorId: message.authorId,
      text: message.text,
      action: type,
      ...details,
    });

    const proposal = await this.act(message, threadId, action, document, flag.id);
    return { type: 'classified', threadId, action, completed, proposal };
  }

  async handleReaction(event: ReactionEvent): Promise<MessageOutcome | null> {
    const verdict = parseReaction(event.reaction);
    if (!verdict) return null;

    const proposal = await this.proposals.findByPrompt(event.channelId, event.messageId);
    if (proposal) {
      return this.applyVerdict(proposal, verdict, event.userId);
    }

    const nudge = this.nudges.get(nudgeKey(event.channelId, event.messageId));
    if (nudge) {
      return this.applyFeedback(nudge, verdict, event.userId);
    }
    return null;
  }

  // ============================================================================
  // CHANNEL LIFECYCLE
  // ============================================================================

  async initializeChannel(channelId: string, members: ChannelMember[], objective?: string): Promise<GroundTruthDocument> {
    const document = await this.documents.initialize(channelId, members, objective);
    this.setMembers(channelId, members.filter(m => !m.isBot).map(m => m.id));
    await this.threads.restore(channelId);
    await this.transport.post(
      channelId,
      undefined,
      `Ground truth initialized with ${Object.keys(document.sections.directory).length} members. ` +
        'Members can set their own role at any time.'
    );
    return document;
  }

  /**
   * Replace the known member list of a channel. Directory entries for
   * anyone outside it are called out after each accepted update.
   */
  setMembers(channelId: string, members: PersonId[]): void {
    this.members.set(channelId, new Set(members));
  }

  async setRole(channelId: string, userId: PersonId, area: string): Promise<ResolutionOutcome> {
    const outcome = await this.documents.setRole(channelId, userId, area);
    this.members.get(channelId)?.add(userId);
    if (outcome.proposal.status === ProposalStatus.ACCEPTED) {
      await this.transport.post(channelId, undefined, `Updated the directory: ${renderDirectoryLine(userId, area.trim())}`);
    } else {
      await this.transport.post(
        channelId,
        undefined,
        `${mention(userId)}, another update is waiting for approval. Try again once it is resolved.`
      );
    }
    return outcome;
  }

  async closeChannel(channelId: string): Promise<void> {
    await this.documents.closeChannel(channelId);
    await this.threads.dropChannel(channelId);
    this.members.delete(channelId);
    for (const [key, nudge] of this.nudges) {
      if (nudge.channelId === channelId) this.nudges.delete(key);
    }
  }

  // ============================================================================
  // ACTIONS
  // ============================================================================

  private async act(
    message: ChatMessage,
    threadId: string,
    action: AlignmentAction,
    document: GroundTruthDocument,
    flagId: string
  ): Promise<Proposal | undefined> {
    switch (action.type) {
      case ActionType.ROUTE:
        await this.transport.post(
          message.channelId,
          threadId,
          `Hey ${mention(action.targetPersonId)}, ${mention(message.authorId)} ${action.summary} Could you jump in here?`
        );
        return undefined;

      case ActionType.QUESTION:
      case ActionType.MISALIGN: {
        const text = action.type === ActionType.QUESTION ? action.clarificationText : action.nudgeText;
        const promptMessageId = await this.transport.post(message.channelId, threadId, text);
        if (promptMessageId) {
          this.trackNudge({
            flagId,
            channelId: message.channelId,
            threadId,
            promptMessageId,
            action: action.type,
            messageId: message.id,
          });
        }
        return undefined;
      }

      case ActionType.UPDATE: {
        const proposal = await this.documents.proposeUpdate(message.channelId, action.proposedText, action.reason, {
          proposer: 'bot',
          threadId,
        });
        if (proposal.status !== ProposalStatus.PENDING) {
          console.log(`[Engine] Update from ${message.id} not raised: ${proposal.resolutionReason}`);
          return proposal;
        }
        return this.publishPrompt(proposal, formatUpdatePrompt(proposal, document));
      }

      case ActionType.PASS:
        return undefined;
    }
  }

  private async applyVerdict(proposal: Proposal, verdict: ApprovalVerdict, userId: PersonId): Promise<MessageOutcome> {
    let outcome: ResolutionOutcome;
    try {
      outcome = await this.documents.resolve(proposal.id, verdict, userId);
    } catch (err) {
      if (err instanceof StorageError || err instanceof InvariantViolationError) {
        console.error(`[Engine] Resolution of ${proposal.id} failed:`, err.message);
        await this.transport.post(proposal.channelId, proposal.threadId, COULD_NOT_PROCESS);
        return { type: 'resolution', proposal, changed: false, failed: true };
      }
      throw err;
    }

    if (!outcome.changed) {
      return { type: 'resolution', proposal: outcome.proposal, changed: false };
    }

    await this.announce(outcome);
    return { type: 'resolution', proposal: outcome.proposal, changed: true };
  }

  private async announce(outcome: ResolutionOutcome): Promise<void> {
    const { proposal } = outcome;
    await this.transport.post(proposal.channelId, proposal.threadId, formatResolution(outcome));

    if (proposal.resolutionReason === ResolutionReason.APPROVED) {
      const strangers = this.unknownDirectoryEntries(outcome.document);
      if (strangers.length > 0) {
        await this.transport.post(
          proposal.channelId,
          proposal.threadId,
          `Heads up: the directory lists people who are not in this channel: ${strangers.map(mention).join(', ')}`
        );
      }
    }

    const compaction = outcome.compaction;
    if (compaction && compaction.status === ProposalStatus.PENDING) {
      await this.publishPrompt(compaction, formatCompactionPrompt(compaction, outcome.document));
    }
  }

  private unknownDirectoryEntries(document: GroundTruthDocument): PersonId[] {
    const members = this.members.get(document.channelId);
    if (!members) return [];
    return Object.keys(document.sections.directory).filter(id => !members.has(id));
  }

  // ============================================================================
  // NUDGE FEEDBACK
  // ============================================================================

  private trackNudge(nudge: OpenNudge): void {
    this.nudges.set(nudgeKey(nudge.channelId, nudge.promptMessageId), nudge);
    if (this.nudges.size > MAX_OPEN_NUDGES) {
      const oldest = this.nudges.keys().next();
      if (!oldest.done) this.nudges.delete(oldest.value);
    }
  }

  /** Most recent open nudge posted in the thread */
  private openNudgeIn(channelId: string, threadId: string): OpenNudge | undefined {
    let latest: OpenNudge | undefined;
    for (const nudge of this.nudges.values()) {
      if (nudge.channelId === channelId && nudge.threadId === threadId) latest = nudge;
    }
    return latest;
  }

  private async applyFeedback(nudge: OpenNudge, verdict: ApprovalVerdict, userId: PersonId): Promise<MessageOutcome> {
    const feedback: NudgeVerdict = verdict === 'approve' ? 'confirmed' : 'dismissed';
    this.nudges.delete(nudgeKey(nudge.channelId, nudge.promptMessageId));

    await this.audit.record(nudge.channelId, AuditKind.NUDGE_FEEDBACK, {
      flagId: nudge.flagId,
      messageId: nudge.messageId,
      promptMessageId: nudge.promptMessageId,
      threadId: nudge.threadId,
      action: nudge.action,
      verdict: feedback,
      userId,
    });
    console.log(`[Engine] Nudge ${nudge.promptMessageId} ${feedback} by ${userId}`);

    await this.transport.post(
      nudge.channelId,
      nudge.threadId,
      feedback === 'confirmed' ? 'Thanks for the feedback.' : 'Got it, sounds like things are on track.'
    );
    return { type: 'feedback', threadId: nudge.threadId, flagId: nudge.flagId, verdict: feedback };
  }

  private async publishPrompt(proposal: Proposal, text: string): Promise<Proposal> {
    const promptId = await this.transport.post(proposal.channelId, proposal.threadId, text);
    if (!promptId) return proposal;
    return this.proposals.attachPrompt(proposal.id, promptId);
  }
}

// ============================================================================
// MESSAGE TEXT
// ============================================================================

const REPLY_HINT = 'Reply *yes* to approve or *no* to decline (or react with :white_check_mark: / :x:).';

/**
 * Approval prompt with a short diff: the last two decision log lines as
 * context, then the line being added
 */
export function formatUpdatePrompt(proposal: Proposal, document: GroundTruthDocument): string {
  const context = document.sections.decisionLog.slice(-2).map(entry => `  ${renderChangelogLine(entry)}`);
  const target = proposal.target;

  let addition = proposal.proposedText;
  switch (target.section) {
    case 'directory':
      addition = renderDirectoryLine(target.personId, proposal.proposedText);
      break;
    case 'core_objective':
      break;
    case 'decision_log':
      addition = renderChangelogLine({
        timestamp: proposal.createdAt,
        description: proposal.proposedText,
        reason: proposal.reason,
        proposer: proposal.proposer,
      });
      break;
  }

  return [
    'Should I record this in the ground truth?',
    '```',
    ...context,
    `+ ${addition}`,
    '```',
    REPLY_HINT,
  ].join('\n');
}

export function formatCompactionPrompt(proposal: Proposal, document: GroundTruthDocument): string {
  return [
    `The ground truth is ${document.wordCount} words. I'd like to condense the decision log to:`,
    '```',
    proposal.proposedText,
    '```',
    'Objective and directory stay as they are.',
    REPLY_HINT,
  ].join('\n');
}

function nudgeKey(channelId: string, messageId: string): string {
  return `${channelId}:${messageId}`;
}

function formatResolution(outcome: ResolutionOutcome): string {
  const { proposal, document } = outcome;
  switch (proposal.resolutionReason) {
    case ResolutionReason.APPROVED:
      return proposal.kind === ProposalKind.COMPACTION
        ? `Decision log condensed. Ground truth is now v${document.version} (${document.wordCount} words).`
        : `Recorded. Ground truth is now v${document.version}.`;
    case ResolutionReason.STALE:
      return 'The ground truth changed since that was proposed, so I did not apply it.';
    default:
      return "Got it, I won't record that.";
  }
}

export default AlignmentEngine;
