/**
 * MemoryStorage - Map-backed storage for tests and ephemeral deployments
 *
 * Every read and write clones, so callers never share references with the store.
 */

import { StorageError } from '../schemas/errors.js';
import type {
  AuditRecord,
  GroundTruthDocument,
  Proposal,
  ProposalStatus,
  ThreadSnapshot,
} from '../schemas/models.js';
import type { AuditQueryOptions, StorageInterface } from './storage-interface.js';

export class MemoryStorage implements StorageInterface {
  private documents: Map<string, GroundTruthDocument> = new Map();
  private proposals: Map<string, Proposal> = new Map();
  private auditRecords: AuditRecord[] = [];
  private threads: Map<string, ThreadSnapshot> = new Map(); // channelId:threadId -> snapshot

  async init(): Promise<void> {
    console.log('[storage] Memory storage initialized');
  }

  async close(): Promise<void> {
    this.documents.clear();
    this.proposals.clear();
    this.auditRecords = [];
    this.threads.clear();
  }

  async saveDocument(document: GroundTruthDocument): Promise<void> {
    const stored = this.documents.get(document.channelId);
    if (stored && document.version <= stored.version) {
      throw new StorageError(
        `saveDocument(${document.channelId})`,
        `version ${document.version} does not advance the stored document`
      );
    }
    this.documents.set(document.channelId, structuredClone(document));
  }

  async loadDocument(channelId: string): Promise<GroundTruthDocument | null> {
    const stored = this.documents.get(channelId);
    return stored ? structuredClone(stored) : null;
  }

  async saveProposal(proposal: Proposal): Promise<void> {
    this.proposals.set(proposal.id, structuredClone(proposal));
  }

  async getProposal(id: string): Promise<Proposal | null> {
    const stored = this.proposals.get(id);
    return stored ? structuredClone(stored) : null;
  }

  async listProposals(channelId: string, status?: ProposalStatus): Promise<Proposal[]> {
    return Array.from(this.proposals.values())
      .filter(p => p.channelId === channelId && (!status || p.status === status))
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map(p => structuredClone(p));
  }

  async appendAudit(record: AuditRecord): Promise<void> {
    if (this.auditRecords.some(r => r.id === record.id)) {
      throw new StorageError(`appendAudit(${record.id})`, 'duplicate audit record id');
    }
    this.auditRecords.push(structuredClone(record));
  }

  async queryAudit(channelId: string, options: AuditQueryOptions = {}): Promise<AuditRecord[]> {
    const since = options.since;
    return this.auditRecords
      .filter(r => r.channelId === channelId)
      .filter(r => !since || r.timestamp >= since)
      .filter(r => !options.kind || r.kind === options.kind)
      .slice(0, options.limit)
      .map(r => structuredClone(r));
  }

  async saveThread(snapshot: ThreadSnapshot): Promise<void> {
    this.threads.set(`${snapshot.channelId}:${snapshot.threadId}`, structuredClone(snapshot));
  }

  async loadThreads(channelId: string): Promise<ThreadSnapshot[]> {
    return Array.from(this.threads.values())
      .filter(t => t.channelId === channelId)
      .sort((a, b) => a.lastActivityAt.localeCompare(b.lastActivityAt))
      .map(t => structuredClone(t));
  }

  async deleteThreads(channelId: string): Promise<void> {
    for (const [key, snapshot] of this.threads) {
      if (snapshot.channelId === channelId) {
        this.threads.delete(key);
      }
    }
  }
}

export default MemoryStorage;
