/**
 * ProposalWorkflow - pending -> accepted | rejected
 *
 * Owns proposal records and their transitions. At most one proposal per
 * channel is pending; a second one is stored as rejected(superseded).
 * Callers hold the channel lock around every method that writes.
 */

import { v4 as uuid } from 'uuid';
import {
  AuditKind,
  ProposalKind,
  ProposalStatus,
  ResolutionReason,
  type PersonId,
  type Proposal,
  type ProposalTarget,
  type Proposer,
} from '../schemas/models.js';
import { InvalidTransitionError, NotFoundError } from '../schemas/errors.js';
import type { StorageInterface } from '../storage/storage-interface.js';
import type { AuditService } from './audit-service.js';

export interface ProposalDraft {
  channelId: string;
  threadId?: string;
  kind?: ProposalKind;
  target?: ProposalTarget;
  proposedText: string;
  reason: string;
  proposer: Proposer;
  baseVersion: number;
}

export class ProposalWorkflow {
  private storage: StorageInterface;
  private audit: AuditService;

  constructor(storage: StorageInterface, audit: AuditService) {
    this.storage = storage;
    this.audit = audit;
  }

  /**
   * Store a new proposal. If the channel already has one pending, the new
   * one is rejected(superseded) on arrival and audited.
   */
  async submit(draft: ProposalDraft): Promise<Proposal> {
    const proposal = this.build(draft);
    const pending = await this.pending(draft.channelId);

    if (pending) {
      const superseded = this.resolved(proposal, ProposalStatus.REJECTED, ResolutionReason.SUPERSEDED);
      await this.storage.saveProposal(superseded);
      await this.recordResolution(superseded, { pendingProposalId: pending.id });
      console.log(`[ProposalWorkflow] Proposal ${superseded.id} superseded by pending ${pending.id}`);
      return superseded;
    }

    await this.storage.saveProposal(proposal);
    console.log(`[ProposalWorkflow] Proposal ${proposal.id} pending in ${proposal.channelId}`);
    return proposal;
  }

  /**
   * Store a proposal that failed its checks before reaching anyone
   */
  async submitRejected(
    draft: ProposalDraft,
    reason: ResolutionReason,
    details: Record<string, unknown> = {}
  ): Promise<Proposal> {
    const rejected = this.resolved(this.build(draft), ProposalStatus.REJECTED, reason);
    await this.storage.saveProposal(rejected);
    await this.recordResolution(rejected, details);
    return rejected;
  }

  async get(proposalId: string): Promise<Proposal> {
    const proposal = await this.storage.getProposal(proposalId);
    if (!proposal) {
      throw new NotFoundError('proposal', proposalId);
    }
    return proposal;
  }

  async pending(channelId: string): Promise<Proposal | null> {
    const pending = await this.storage.listProposals(channelId, ProposalStatus.PENDING);
    return pending[0] ?? null;
  }

  async list(channelId: string, status?: ProposalStatus): Promise<Proposal[]> {
    return this.storage.listProposals(channelId, status);
  }

  /**
   * The pending proposal whose approval prompt is `messageId`
   */
  async findByPrompt(channelId: string, messageId: string): Promise<Proposal | null> {
    const pending = await this.pending(channelId);
    return pending && pending.promptMessageId === messageId ? pending : null;
  }

  async attachPrompt(proposalId: string, promptMessageId: string): Promise<Proposal> {
    const proposal = await this.get(proposalId);
    const updated: Proposal = { ...proposal, promptMessageId };
    await this.storage.saveProposal(updated);
    return updated;
  }

  /**
   * Move a pending proposal to a terminal state
   */
  async transition(
    proposal: Proposal,
    status: ProposalStatus.ACCEPTED | ProposalStatus.REJECTED,
    reason: ResolutionReason,
    resolvedBy?: PersonId
  ): Promise<Proposal> {
    if (proposal.status !== ProposalStatus.PENDING) {
      throw new InvalidTransitionError(`Proposal ${proposal.id} is already ${proposal.status}`);
    }
    const resolved = this.resolved(proposal, status, reason, resolvedBy);
    await this.storage.saveProposal(resolved);
    return resolved;
  }

  /**
   * Record the document version an accepted proposal produced
   */
  async markCommitted(proposal: Proposal, version: number): Promise<Proposal> {
    if (proposal.status !== ProposalStatus.ACCEPTED || proposal.committedVersion !== undefined) {
      throw new InvalidTransitionError(`Proposal ${proposal.id} cannot be marked committed`);
    }
    const committed: Proposal = { ...proposal, committedVersion: version };
    await this.storage.saveProposal(committed);
    return committed;
  }

  async recordResolution(proposal: Proposal, details: Record<string, unknown> = {}): Promise<void> {
    await this.audit.record(proposal.channelId, AuditKind.PROPOSAL_RESOLUTION, {
      proposalId: proposal.id,
      proposalKind: proposal.kind,
      target: proposal.target,
      proposedText: proposal.proposedText,
      reason: proposal.reason,
      proposer: proposal.proposer,
      baseVersion: proposal.baseVersion,
      status: proposal.status,
      resolutionReason: proposal.resolutionReason,
      resolvedBy: proposal.resolvedBy,
      ...details,
    });
  }

  private build(draft: ProposalDraft): Proposal {
    return {
      id: `prop-${uuid()}`,
      channelId: draft.channelId,
      threadId: draft.threadId,
      kind: draft.kind ?? ProposalKind.UPDATE,
      target: draft.target ?? { section: 'decision_log' },
      proposedText: draft.proposedText,
      reason: draft.reason,
      proposer: draft.proposer,
      status: ProposalStatus.PENDING,
      baseVersion: draft.baseVersion,
      createdAt: new Date().toISOString(),
    };
  }

  private resolved(
    proposal: Proposal,
    status: ProposalStatus,
    reason: ResolutionReason,
    resolvedBy?: PersonId
  ): Proposal {
    return {
      ...proposal,
      status,
      resolutionReason: reason,
      resolvedAt: new Date().toISOString(),
      resolvedBy,
    };
  }
}

export default ProposalWorkflow;
