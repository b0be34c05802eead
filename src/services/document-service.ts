/**
 * DocumentService - Versioned ground truth document per channel
 *
 * Every mutation goes through a proposal. Commits persist the whole document
 * first and only then replace the frozen cache entry, so readers see either
 * the old version or the new one. All transitions for a channel run inside
 * that channel's critical section; inference calls stay outside it.
 */

import {
  ProposalKind,
  ProposalStatus,
  ResolutionReason,
  type ApprovalVerdict,
  type ChangelogEntry,
  type ChannelMember,
  type DocumentSections,
  type GroundTruthDocument,
  type PersonId,
  type Proposal,
  type ProposalTarget,
  type Proposer,
} from '../schemas/models.js';
import {
  ConflictError,
  ErrorCode,
  GroundlineError,
  InvalidTransitionError,
  InvariantViolationError,
  NotFoundError,
  StorageError,
  TransientInferenceError,
} from '../schemas/errors.js';
import { EngineLimits } from '../schemas/validation.js';
import type { StorageInterface } from '../storage/storage-interface.js';
import { KeyedMutex } from '../lib/keyed-mutex.js';
import {
  countWords,
  extractDecisionLogLines,
  mention,
  parseDecisionLog,
  renderDirectoryLine,
  renderDocument,
  renderObjective,
  renderSections,
} from '../lib/document-text.js';
import type { ProposalWorkflow } from './proposal-service.js';

const DEFAULT_ROLE = 'Role not yet specified';

/** The one classifier capability compaction needs */
export interface CompactionSummarizer {
  summarizeForCompaction(document: GroundTruthDocument, renderedText: string): Promise<string>;
}

export interface DocumentServiceOptions {
  maxWords?: number;
  locks?: KeyedMutex;
}

export interface ProposeOptions {
  proposer?: Proposer;
  threadId?: string;
  target?: ProposalTarget;
}

export interface ResolutionOutcome {
  proposal: Proposal;
  /** False when the proposal had already been resolved */
  changed: boolean;
  document: GroundTruthDocument;
  /** Compaction raised by the commit, if any (may itself be rejected) */
  compaction: Proposal | null;
}

export interface CompactionCheck {
  violations: string[];
  /** Bullet lines under the decision log heading of the compacted text */
  decisionLog: string[];
}

interface DocumentSnapshot {
  version: number;
  wordCount: number;
  rendered: string;
}

export class DocumentService {
  private cache: Map<string, GroundTruthDocument> = new Map();
  private storage: StorageInterface;
  private workflow: ProposalWorkflow;
  private summarizer: CompactionSummarizer;
  private locks: KeyedMutex;
  private maxWords: number;

  constructor(
    storage: StorageInterface,
    workflow: ProposalWorkflow,
    summarizer: CompactionSummarizer,
    options: DocumentServiceOptions = {}
  ) {
    this.storage = storage;
    this.workflow = workflow;
    this.summarizer = summarizer;
    this.locks = options.locks ?? new KeyedMutex();
    this.maxWords = options.maxWords ?? EngineLimits.MAX_GROUND_TRUTH_WORDS;
  }

  // ============================================================================
  // READ PATH
  // ============================================================================

  /**
   * Current document; version 0 when the channel was never initialized
   */
  async current(channelId: string): Promise<GroundTruthDocument> {
    const cached = this.cache.get(channelId);
    if (cached) return cached;

    const stored = await this.storage.loadDocument(channelId);
    const document = freezeDocument(stored ?? emptyDocument(channelId));

    // A commit may have landed while we were loading
    const latest = this.cache.get(channelId);
    if (latest && latest.version >= document.version) {
      return latest;
    }
    this.cache.set(channelId, document);
    return document;
  }

  async changelog(channelId: string): Promise<ChangelogEntry[]> {
    const document = await this.current(channelId);
    return [...document.sections.decisionLog];
  }

  render(document: GroundTruthDocument): string {
    return renderDocument(document);
  }

  // ============================================================================
  // SETUP
  // ============================================================================

  /**
   * Create the genesis document (version 1) from the channel's members
   */
  async initialize(channelId: string, members: ChannelMember[], objective?: string): Promise<GroundTruthDocument> {
    return this.locks.run(channelId, async () => {
      const existing = await this.current(channelId);
      if (existing.version > 0) {
        throw new ConflictError(
          `Channel ${channelId} already has a ground truth document (v${existing.version})`,
          ErrorCode.ALREADY_INITIALIZED
        );
      }

      const directory: Record<PersonId, string> = {};
      for (const member of members) {
        if (member.isBot) continue;
        directory[member.id] = member.title?.trim() || DEFAULT_ROLE;
      }

      const now = new Date().toISOString();
      const genesis = buildDocument(channelId, 1, {
        coreObjective: objective?.trim() ?? '',
        directory,
        decisionLog: [{
          timestamp: now,
          description: 'Ground truth initialized',
          reason: `${Object.keys(directory).length} members`,
          proposer: 'bot',
        }],
      }, now);

      await this.storage.saveDocument(genesis);
      this.swap(genesis);
      console.log(`[DocumentService] Initialized ground truth for ${channelId}`);
      return genesis;
    });
  }

  /**
   * A member sets their own ownership area. The directory proposal is
   * accepted by the same member straight away.
   */
  async setRole(channelId: string, userId: PersonId, area: string): Promise<ResolutionOutcome> {
    const document = await this.current(channelId);
    if (document.version === 0) {
      throw new NotFoundError('document', channelId);
    }

    const proposal = await this.proposeUpdate(channelId, area, 'Set by the owner', {
      proposer: userId,
      target: { section: 'directory', personId: userId },
    });
    if (proposal.status !== ProposalStatus.PENDING) {
      return { proposal, changed: false, document, compaction: null };
    }
    return this.resolve(proposal.id, 'approve', userId);
  }

  // ============================================================================
  // WRITE PATH
  // ============================================================================

  async proposeUpdate(
    channelId: string,
    text: string,
    reason: string,
    options: ProposeOptions = {}
  ): Promise<Proposal> {
    const proposedText = text.trim();
    if (!proposedText) {
      throw new GroundlineError(ErrorCode.VALIDATION_ERROR, 'Proposal text is required');
    }

    return this.locks.run(channelId, async () => {
      const document = await this.current(channelId);
      return this.workflow.submit({
        channelId,
        threadId: options.threadId,
        target: options.target,
        proposedText,
        reason: reason.trim(),
        proposer: options.proposer ?? 'bot',
        baseVersion: document.version,
      });
    });
  }

  /**
   * Apply a user's verdict to a proposal. Resolving a proposal that is no
   * longer pending changes nothing.
   */
  async resolve(proposalId: string, verdict: ApprovalVerdict, userId: PersonId): Promise<ResolutionOutcome> {
    const { channelId } = await this.workflow.get(proposalId);

    const outcome = await this.locks.run(channelId, async () => {
      const proposal = await this.workflow.get(proposalId);
      const before = await this.current(channelId);

      if (proposal.status !== ProposalStatus.PENDING) {
        return { proposal, changed: false, document: before, committed: false };
      }

      if (verdict === 'reject') {
        const rejected = await this.workflow.transition(
          proposal, ProposalStatus.REJECTED, ResolutionReason.DECLINED, userId
        );
        await this.workflow.recordResolution(rejected, { before: snapshot(before) });
        return { proposal: rejected, changed: true, document: before, committed: false };
      }

      if (before.version !== proposal.baseVersion) {
        const stale = await this.workflow.transition(
          proposal, ProposalStatus.REJECTED, ResolutionReason.STALE, userId
        );
        await this.workflow.recordResolution(stale, { before: snapshot(before) });
        console.warn(`[DocumentService] Proposal ${proposalId} is stale (v${proposal.baseVersion}, now v${before.version})`);
        return { proposal: stale, changed: true, document: before, committed: false };
      }

      const accepted = await this.workflow.transition(
        proposal, ProposalStatus.ACCEPTED, ResolutionReason.APPROVED, userId
      );
      const result = await this.commitLocked(accepted, before);
      return { ...result, changed: true, committed: true };
    });

    const compaction = outcome.committed
      ? await this.maybeCompact(channelId, outcome.proposal.threadId)
      : null;

    return {
      proposal: outcome.proposal,
      changed: outcome.changed,
      document: outcome.document,
      compaction,
    };
  }

  /**
   * Commit an accepted proposal whose earlier commit did not persist
   */
  async commit(proposalId: string): Promise<ResolutionOutcome> {
    const { channelId } = await this.workflow.get(proposalId);

    const result = await this.locks.run(channelId, async () => {
      const proposal = await this.workflow.get(proposalId);
      if (proposal.status !== ProposalStatus.ACCEPTED || proposal.committedVersion !== undefined) {
        throw new InvalidTransitionError(`Proposal ${proposalId} is not an accepted, uncommitted proposal`);
      }

      const before = await this.current(channelId);
      if (before.version !== proposal.baseVersion) {
        await this.workflow.recordResolution(proposal, {
          before: snapshot(before),
          committed: false,
          error: 'stale',
        });
        throw new InvariantViolationError(
          `Proposal ${proposalId} was computed against v${proposal.baseVersion}, document is at v${before.version}`,
          ['stale']
        );
      }

      return this.commitLocked(proposal, before);
    });

    const compaction = await this.maybeCompact(channelId, result.proposal.threadId);
    return { proposal: result.proposal, changed: true, document: result.document, compaction };
  }

  /**
   * Retry the commit of an accepted proposal that did not persist. Only a
   * proposal computed against the current version qualifies, and only while
   * nothing is pending, so the retry never turns a waiting proposal stale.
   * Returns null when there is nothing to retry or the store still fails.
   */
  async retryUncommitted(channelId: string): Promise<ResolutionOutcome | null> {
    const current = await this.current(channelId);
    const accepted = await this.workflow.list(channelId, ProposalStatus.ACCEPTED);
    const candidate = accepted.find(p =>
      p.committedVersion === undefined && p.baseVersion === current.version
    );
    if (!candidate || await this.workflow.pending(channelId)) {
      return null;
    }

    console.log(`[DocumentService] Retrying commit of ${candidate.id} in ${channelId}`);
    try {
      return await this.commit(candidate.id);
    } catch (err) {
      if (err instanceof StorageError || err instanceof InvariantViolationError) {
        console.error(`[DocumentService] Retry of ${candidate.id} failed:`, err.message);
        return null;
      }
      throw err;
    }
  }

  /**
   * Reject a pending proposal. No-op for one already resolved.
   */
  async reject(
    proposalId: string,
    reason: ResolutionReason = ResolutionReason.DECLINED,
    resolvedBy?: PersonId
  ): Promise<Proposal> {
    const { channelId } = await this.workflow.get(proposalId);

    return this.locks.run(channelId, async () => {
      const proposal = await this.workflow.get(proposalId);
      if (proposal.status !== ProposalStatus.PENDING) {
        return proposal;
      }
      const before = await this.current(channelId);
      const rejected = await this.workflow.transition(proposal, ProposalStatus.REJECTED, reason, resolvedBy);
      await this.workflow.recordResolution(rejected, { before: snapshot(before) });
      return rejected;
    });
  }

  /**
   * Channel teardown: the pending proposal becomes rejected(channel_closed)
   */
  async closeChannel(channelId: string): Promise<Proposal | null> {
    return this.locks.run(channelId, async () => {
      const pending = await this.workflow.pending(channelId);
      let closed: Proposal | null = null;
      if (pending) {
        const before = await this.current(channelId);
        closed = await this.workflow.transition(pending, ProposalStatus.REJECTED, ResolutionReason.CHANNEL_CLOSED);
        await this.workflow.recordResolution(closed, { before: snapshot(before) });
      }
      this.cache.delete(channelId);
      console.log(`[DocumentService] Channel ${channelId} closed`);
      return closed;
    });
  }

  // ============================================================================
  // COMPACTION
  // ============================================================================

  /**
   * Raise a compaction proposal when the document is over the word limit.
   * A compaction that drops objective or directory data, or does not fit,
   * is stored already rejected and never shown to anyone.
   */
  async maybeCompact(channelId: string, threadId?: string): Promise<Proposal | null> {
    const document = await this.current(channelId);
    if (document.wordCount <= this.maxWords) {
      return null;
    }

    console.log(`[DocumentService] ${channelId} is at ${document.wordCount} words, requesting compaction`);

    let compacted: string;
    try {
      compacted = await this.summarizer.summarizeForCompaction(document, renderDocument(document));
    } catch (err) {
      if (err instanceof TransientInferenceError) {
        console.debug(`[DocumentService] Compaction skipped: ${err.message}`);
        return null;
      }
      throw err;
    }

    const check = this.checkCompaction(document, compacted);

    return this.locks.run(channelId, async () => {
      const latest = await this.current(channelId);
      if (latest.version !== document.version) {
        console.debug(`[DocumentService] ${channelId} moved to v${latest.version} during compaction, dropping result`);
        return null;
      }

      const draft = {
        channelId,
        threadId,
        kind: ProposalKind.COMPACTION,
        proposedText: check.decisionLog.join('\n'),
        reason: `Ground truth is ${document.wordCount} words, over the ${this.maxWords}-word limit`,
        proposer: 'bot' as const,
        baseVersion: document.version,
      };

      if (check.violations.length > 0) {
        console.warn(`[DocumentService] Compaction for ${channelId} rejected: ${check.violations.join('; ')}`);
        return this.workflow.submitRejected(
          { ...draft, proposedText: compacted },
          ResolutionReason.INVARIANT_VIOLATION,
          { violations: check.violations, before: snapshot(document) }
        );
      }

      return this.workflow.submit(draft);
    });
  }

  /**
   * Post-conditions a compacted text must meet before it becomes a proposal
   */
  checkCompaction(document: GroundTruthDocument, compacted: string): CompactionCheck {
    const violations: string[] = [];
    const { sections } = document;

    if (!compacted.includes(renderObjective(sections))) {
      violations.push('Core objective missing from compacted text');
    }
    for (const [personId, area] of Object.entries(sections.directory)) {
      const line = renderDirectoryLine(personId, area);
      if (!compacted.includes(line)) {
        violations.push(`Directory entry missing: ${line}`);
      }
    }

    const words = countWords(compacted);
    if (words > this.maxWords) {
      violations.push(`Compacted text has ${words} words (limit ${this.maxWords})`);
    }

    const decisionLog = extractDecisionLogLines(compacted);
    if (decisionLog === null) {
      violations.push('Decision log section missing from compacted text');
      return { violations, decisionLog: [] };
    }

    const candidate = renderSections({
      ...sections,
      decisionLog: parseDecisionLog(decisionLog.join('\n'), new Date().toISOString()),
    });
    const candidateWords = countWords(candidate);
    if (words <= this.maxWords && candidateWords > this.maxWords) {
      violations.push(`Compacted document would have ${candidateWords} words (limit ${this.maxWords})`);
    }

    return { violations, decisionLog };
  }

  // ============================================================================
  // COMMIT
  // ============================================================================

  private async commitLocked(
    proposal: Proposal,
    before: GroundTruthDocument
  ): Promise<{ proposal: Proposal; document: GroundTruthDocument }> {
    const next = applyProposal(before, proposal);

    try {
      await this.storage.saveDocument(next);
    } catch (err) {
      console.error(`[DocumentService] Commit of ${proposal.id} failed to persist:`, err);
      await this.workflow.recordResolution(proposal, {
        before: snapshot(before),
        committed: false,
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }

    this.swap(next);
    const committed = await this.workflow.markCommitted(proposal, next.version);
    await this.workflow.recordResolution(committed, {
      before: snapshot(before),
      after: snapshot(next),
      committed: true,
    });

    console.log(`[DocumentService] ${proposal.channelId} committed v${next.version} (${next.wordCount} words)`);
    return { proposal: committed, document: next };
  }

  private swap(document: GroundTruthDocument): void {
    this.cache.set(document.channelId, freezeDocument(document));
  }
}

// ============================================================================
// DOCUMENT CONSTRUCTION
// ============================================================================

function emptyDocument(channelId: string): GroundTruthDocument {
  return buildDocument(channelId, 0, { coreObjective: '', directory: {}, decisionLog: [] }, new Date(0).toISOString());
}

function buildDocument(
  channelId: string,
  version: number,
  sections: DocumentSections,
  updatedAt: string
): GroundTruthDocument {
  return {
    channelId,
    version,
    sections,
    wordCount: countWords(renderSections(sections)),
    updatedAt,
  };
}

/**
 * Next version of `document` with `proposal` applied
 */
function applyProposal(document: GroundTruthDocument, proposal: Proposal): GroundTruthDocument {
  const now = new Date().toISOString();
  const sections: DocumentSections = {
    coreObjective: document.sections.coreObjective,
    directory: { ...document.sections.directory },
    decisionLog: [...document.sections.decisionLog],
  };

  if (proposal.kind === ProposalKind.COMPACTION) {
    sections.decisionLog = parseDecisionLog(proposal.proposedText, proposal.createdAt);
    return buildDocument(document.channelId, document.version + 1, sections, now);
  }

  const entry: ChangelogEntry = {
    timestamp: now,
    description: proposal.proposedText,
    reason: proposal.reason,
    proposer: proposal.proposer,
  };
  if (proposal.resolvedBy) {
    entry.approvedBy = proposal.resolvedBy;
  }

  const target = proposal.target;
  switch (target.section) {
    case 'directory':
      sections.directory[target.personId] = proposal.proposedText;
      entry.description = `${mention(target.personId)} is responsible for ${proposal.proposedText}`;
      break;
    case 'core_objective':
      sections.coreObjective = proposal.proposedText;
      entry.description = `Core objective changed to: ${proposal.proposedText}`;
      break;
    case 'decision_log':
      break;
  }
  sections.decisionLog.push(entry);

  return buildDocument(document.channelId, document.version + 1, sections, now);
}

function freezeDocument(document: GroundTruthDocument): GroundTruthDocument {
  document.sections.decisionLog.forEach(entry => Object.freeze(entry));
  Object.freeze(document.sections.decisionLog);
  Object.freeze(document.sections.directory);
  Object.freeze(document.sections);
  return Object.freeze(document);
}

function snapshot(document: GroundTruthDocument): DocumentSnapshot {
  return {
    version: document.version,
    wordCount: document.wordCount,
    rendered: renderDocument(document),
  };
}

export default DocumentService;
