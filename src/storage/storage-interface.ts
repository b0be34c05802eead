/**
 * StorageInterface - contract shared by the SQLite and in-memory adapters
 */

import type {
  AuditKind,
  AuditRecord,
  GroundTruthDocument,
  Proposal,
  ProposalStatus,
  ThreadSnapshot,
} from '../schemas/models.js';

export interface AuditQueryOptions {
  /** Inclusive lower bound on the record timestamp */
  since?: string;
  kind?: AuditKind;
  limit?: number;
}

export interface StorageInterface {
  init(): Promise<void>;
  close(): Promise<void>;

  /**
   * Replace the channel's document as a whole. Rejects a version that does
   * not advance past the stored one.
   */
  saveDocument(document: GroundTruthDocument): Promise<void>;
  loadDocument(channelId: string): Promise<GroundTruthDocument | null>;

  saveProposal(proposal: Proposal): Promise<void>;
  getProposal(id: string): Promise<Proposal | null>;
  listProposals(channelId: string, status?: ProposalStatus): Promise<Proposal[]>;

  /** Append-only; records come back in append order */
  appendAudit(record: AuditRecord): Promise<void>;
  queryAudit(channelId: string, options?: AuditQueryOptions): Promise<AuditRecord[]>;

  saveThread(snapshot: ThreadSnapshot): Promise<void>;
  loadThreads(channelId: string): Promise<ThreadSnapshot[]>;
  deleteThreads(channelId: string): Promise<void>;
}
