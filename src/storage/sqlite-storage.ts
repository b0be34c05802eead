/**
 * SQLite Storage Adapter for Groundline
 * Provides persistent storage for documents, proposals, the audit trail,
 * and thread window snapshots
 */

import path from 'node:path';
import fs from 'node:fs';
import Database from 'better-sqlite3';
import { StorageError } from '../schemas/errors.js';
import {
  AuditKind,
  ProposalKind,
  ProposalStatus,
  ResolutionReason,
  type AuditRecord,
  type ChatMessage,
  type DocumentSections,
  type GroundTruthDocument,
  type Proposal,
  type ProposalTarget,
  type ThreadSnapshot,
} from '../schemas/models.js';
import type { AuditQueryOptions, StorageInterface } from './storage-interface.js';

export interface SqliteStorageOptions {
  dbPath: string;
  /** Thread snapshot retention in milliseconds (default: 2 days, env: GROUNDLINE_THREAD_RETENTION_DAYS) */
  threadRetentionMs?: number;
  /** Snapshot cleanup interval in milliseconds (default: 1 hour, env: GROUNDLINE_THREAD_CLEANUP_INTERVAL_HOURS) */
  cleanupIntervalMs?: number;
}

/** Default retention: 2 days */
const DEFAULT_RETENTION_DAYS = 2;
const DEFAULT_RETENTION_MS = DEFAULT_RETENTION_DAYS * 24 * 60 * 60 * 1000;
/** Default cleanup interval: 1 hour */
const DEFAULT_CLEANUP_INTERVAL_HOURS = 1;
const DEFAULT_CLEANUP_INTERVAL_MS = DEFAULT_CLEANUP_INTERVAL_HOURS * 60 * 60 * 1000;

/** Parse retention from environment variables */
function getRetentionMs(): number {
  const days = process.env.GROUNDLINE_THREAD_RETENTION_DAYS;
  if (days) {
    const parsed = parseFloat(days);
    if (!isNaN(parsed) && parsed > 0) {
      return parsed * 24 * 60 * 60 * 1000;
    }
  }
  return DEFAULT_RETENTION_MS;
}

/** Parse cleanup interval from environment variables */
function getCleanupIntervalMs(): number {
  const hours = process.env.GROUNDLINE_THREAD_CLEANUP_INTERVAL_HOURS;
  if (hours) {
    const parsed = parseFloat(hours);
    if (!isNaN(parsed) && parsed >= 0) {
      return parsed * 60 * 60 * 1000;
    }
  }
  return DEFAULT_CLEANUP_INTERVAL_MS;
}

interface DocumentRow {
  channel_id: string;
  version: number;
  sections: string;
  word_count: number;
  updated_at: string;
}

interface ProposalRow {
  id: string;
  channel_id: string;
  thread_id: string | null;
  kind: string;
  target: string;
  proposed_text: string;
  reason: string;
  proposer: string;
  status: string;
  base_version: number;
  created_at: string;
  resolved_at: string | null;
  resolved_by: string | null;
  resolution_reason: string | null;
  committed_version: number | null;
  prompt_message_id: string | null;
}

interface AuditRow {
  id: string;
  channel_id: string;
  kind: string;
  timestamp: string;
  payload: string;
}

interface ThreadRow {
  thread_id: string;
  channel_id: string;
  participant_ids: string;
  messages: string;
  last_activity_at: string;
}

export class SqliteStorage implements StorageInterface {
  private dbPath: string;
  private db?: Database.Database;
  private retentionMs: number;
  private cleanupIntervalMs: number;
  private cleanupTimer?: ReturnType<typeof setInterval>;

  constructor(options: SqliteStorageOptions) {
    this.dbPath = options.dbPath;
    this.retentionMs = options.threadRetentionMs ?? getRetentionMs();
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? getCleanupIntervalMs();

    const retentionDays = this.retentionMs / (24 * 60 * 60 * 1000);
    const cleanupHours = this.cleanupIntervalMs / (60 * 60 * 1000);
    console.log(`[storage] Thread retention: ${retentionDays} days, cleanup interval: ${cleanupHours} hours`);
  }

  async init(): Promise<void> {
    if (this.dbPath !== ':memory:') {
      const dir = path.dirname(this.dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    try {
      this.db = new Database(this.dbPath);
      this.db.pragma('journal_mode = WAL');
    } catch (err) {
      throw new StorageError(`init at ${this.dbPath}`, err);
    }

    this.createTables(this.db);

    if (this.cleanupIntervalMs > 0) {
      this.startCleanupTimer();
    }

    console.log(`[storage] SQLite storage initialized at ${this.dbPath}`);
  }

  private createTables(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS documents (
        channel_id TEXT PRIMARY KEY,
        version INTEGER NOT NULL,
        sections TEXT NOT NULL,
        word_count INTEGER NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS proposals (
        id TEXT PRIMARY KEY,
        channel_id TEXT NOT NULL,
        thread_id TEXT,
        kind TEXT NOT NULL,
        target TEXT NOT NULL,
        proposed_text TEXT NOT NULL,
        reason TEXT NOT NULL,
        proposer TEXT NOT NULL,
        status TEXT NOT NULL,
        base_version INTEGER NOT NULL,
        created_at TEXT NOT NULL,
        resolved_at TEXT,
        resolved_by TEXT,
        resolution_reason TEXT,
        committed_version INTEGER,
        prompt_message_id TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_proposals_channel ON proposals (channel_id, status);
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS audit_records (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        channel_id TEXT NOT NULL,
        kind TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        payload TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_audit_channel ON audit_records (channel_id, timestamp);
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS threads (
        thread_id TEXT NOT NULL,
        channel_id TEXT NOT NULL,
        participant_ids TEXT NOT NULL,
        messages TEXT NOT NULL,
        last_activity_at TEXT NOT NULL,
        ts INTEGER NOT NULL,
        PRIMARY KEY (channel_id, thread_id)
      );
      CREATE INDEX IF NOT EXISTS idx_threads_ts ON threads (ts);
    `);
  }

  private requireDb(): Database.Database {
    if (!this.db) {
      throw new StorageError('access', 'SqliteStorage not initialized');
    }
    return this.db;
  }

  private startCleanupTimer(): void {
    this.runCleanup();
    this.cleanupTimer = setInterval(() => this.runCleanup(), this.cleanupIntervalMs);

    if (this.cleanupTimer.unref) {
      this.cleanupTimer.unref();
    }
  }

  private runCleanup(): void {
    this.cleanupExpiredThreads().catch((err) => {
      console.error('[storage] Thread cleanup failed:', err);
    });
  }

  async cleanupExpiredThreads(): Promise<number> {
    const db = this.requireDb();
    const cutoffTs = Date.now() - this.retentionMs;
    const result = db.prepare<[number]>('DELETE FROM threads WHERE ts < ?').run(cutoffTs);
    const deleted = result.changes;

    if (deleted > 0) {
      console.log(`[storage] Cleaned up ${deleted} expired thread snapshots`);
    }

    return deleted;
  }

  // ============ Document Operations ============

  async saveDocument(document: GroundTruthDocument): Promise<void> {
    const db = this.requireDb();

    const replace = db.transaction((doc: GroundTruthDocument) => {
      const result = db.prepare<[string, number, string, number, string]>(`
        INSERT INTO documents (channel_id, version, sections, word_count, updated_at)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(channel_id) DO UPDATE SET
          version = excluded.version,
          sections = excluded.sections,
          word_count = excluded.word_count,
          updated_at = excluded.updated_at
        WHERE excluded.version > documents.version
      `).run(doc.channelId, doc.version, JSON.stringify(doc.sections), doc.wordCount, doc.updatedAt);

      if (result.changes === 0) {
        throw new Error(`version ${doc.version} does not advance the stored document`);
      }
    });

    try {
      replace(document);
    } catch (err) {
      throw new StorageError(`saveDocument(${document.channelId})`, err);
    }
  }

  async loadDocument(channelId: string): Promise<GroundTruthDocument | null> {
    const db = this.requireDb();
    const row = db.prepare<[string], DocumentRow>('SELECT * FROM documents WHERE channel_id = ?').get(channelId);
    return row ? this.rowToDocument(row) : null;
  }

  private rowToDocument(row: DocumentRow): GroundTruthDocument {
    const sections: DocumentSections = JSON.parse(row.sections);
    return {
      channelId: row.channel_id,
      version: row.version,
      sections,
      wordCount: row.word_count,
      updatedAt: row.updated_at,
    };
  }

  // ============ Proposal Operations ============

  async saveProposal(proposal: Proposal): Promise<void> {
    const db = this.requireDb();

    try {
      db.prepare(`
        INSERT OR REPLACE INTO proposals
        (id, channel_id, thread_id, kind, target, proposed_text, reason, proposer, status, base_version,
         created_at, resolved_at, resolved_by, resolution_reason, committed_version, prompt_message_id)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        proposal.id,
        proposal.channelId,
        proposal.threadId ?? null,
        proposal.kind,
        JSON.stringify(proposal.target),
        proposal.proposedText,
        proposal.reason,
        proposal.proposer,
        proposal.status,
        proposal.baseVersion,
        proposal.createdAt,
        proposal.resolvedAt ?? null,
        proposal.resolvedBy ?? null,
        proposal.resolutionReason ?? null,
        proposal.committedVersion ?? null,
        proposal.promptMessageId ?? null
      );
    } catch (err) {
      throw new StorageError(`saveProposal(${proposal.id})`, err);
    }
  }

  async getProposal(id: string): Promise<Proposal | null> {
    const db = this.requireDb();
    const row = db.prepare<[string], ProposalRow>('SELECT * FROM proposals WHERE id = ?').get(id);
    return row ? this.rowToProposal(row) : null;
  }

  async listProposals(channelId: string, status?: ProposalStatus): Promise<Proposal[]> {
    const db = this.requireDb();
    const rows = status
      ? db.prepare<[string, string], ProposalRow>(
          'SELECT * FROM proposals WHERE channel_id = ? AND status = ? ORDER BY created_at ASC'
        ).all(channelId, status)
      : db.prepare<[string], ProposalRow>(
          'SELECT * FROM proposals WHERE channel_id = ? ORDER BY created_at ASC'
        ).all(channelId);
    return rows.map((row) => this.rowToProposal(row));
  }

  private rowToProposal(row: ProposalRow): Proposal {
    const target: ProposalTarget = JSON.parse(row.target);
    const kind = row.kind === ProposalKind.COMPACTION ? ProposalKind.COMPACTION : ProposalKind.UPDATE;
    return {
      id: row.id,
      channelId: row.channel_id,
      threadId: row.thread_id ?? undefined,
      kind,
      target,
      proposedText: row.proposed_text,
      reason: row.reason,
      proposer: row.proposer,
      status: parseStatus(row.status),
      baseVersion: row.base_version,
      createdAt: row.created_at,
      resolvedAt: row.resolved_at ?? undefined,
      resolvedBy: row.resolved_by ?? undefined,
      resolutionReason: parseResolutionReason(row.resolution_reason),
      committedVersion: row.committed_version ?? undefined,
      promptMessageId: row.prompt_message_id ?? undefined,
    };
  }

  // ============ Audit Operations ============

  async appendAudit(record: AuditRecord): Promise<void> {
    const db = this.requireDb();

    try {
      db.prepare(`
        INSERT INTO audit_records (id, channel_id, kind, timestamp, payload)
        VALUES (?, ?, ?, ?, ?)
      `).run(record.id, record.channelId, record.kind, record.timestamp, JSON.stringify(record.payload));
    } catch (err) {
      throw new StorageError(`appendAudit(${record.id})`, err);
    }
  }

  async queryAudit(channelId: string, options: AuditQueryOptions = {}): Promise<AuditRecord[]> {
    const db = this.requireDb();

    const clauses: string[] = ['channel_id = ?'];
    const params: (string | number)[] = [channelId];

    if (options.since) {
      clauses.push('timestamp >= ?');
      params.push(options.since);
    }
    if (options.kind) {
      clauses.push('kind = ?');
      params.push(options.kind);
    }

    let limitClause = '';
    if (options.limit !== undefined) {
      limitClause = 'LIMIT ?';
      params.push(options.limit);
    }

    const rows = db.prepare<(string | number)[], AuditRow>(`
      SELECT id, channel_id, kind, timestamp, payload FROM audit_records
      WHERE ${clauses.join(' AND ')}
      ORDER BY seq ASC
      ${limitClause}
    `).all(...params);

    return rows.map((row) => this.rowToAudit(row));
  }

  private rowToAudit(row: AuditRow): AuditRecord {
    const payload: Record<string, unknown> = JSON.parse(row.payload);
    return {
      id: row.id,
      channelId: row.channel_id,
      kind: parseAuditKind(row.kind),
      timestamp: row.timestamp,
      payload,
    };
  }

  // ============ Thread Snapshots ============

  async saveThread(snapshot: ThreadSnapshot): Promise<void> {
    const db = this.requireDb();

    try {
      db.prepare(`
        INSERT OR REPLACE INTO threads
        (thread_id, channel_id, participant_ids, messages, last_activity_at, ts)
        VALUES (?, ?, ?, ?, ?, ?)
      `).run(
        snapshot.threadId,
        snapshot.channelId,
        JSON.stringify(snapshot.participantIds),
        JSON.stringify(snapshot.messages),
        snapshot.lastActivityAt,
        new Date(snapshot.lastActivityAt).getTime()
      );
    } catch (err) {
      throw new StorageError(`saveThread(${snapshot.threadId})`, err);
    }
  }

  async loadThreads(channelId: string): Promise<ThreadSnapshot[]> {
    const db = this.requireDb();
    const rows = db.prepare<[string], ThreadRow>(
      'SELECT thread_id, channel_id, participant_ids, messages, last_activity_at FROM threads WHERE channel_id = ? ORDER BY ts ASC'
    ).all(channelId);
    return rows.map((row) => {
      const participantIds: string[] = JSON.parse(row.participant_ids);
      const messages: ChatMessage[] = JSON.parse(row.messages);
      return {
        threadId: row.thread_id,
        channelId: row.channel_id,
        participantIds,
        messages,
        lastActivityAt: row.last_activity_at,
      };
    });
  }

  async deleteThreads(channelId: string): Promise<void> {
    const db = this.requireDb();
    db.prepare<[string]>('DELETE FROM threads WHERE channel_id = ?').run(channelId);
  }

  async close(): Promise<void> {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }

    if (this.db) {
      this.db.close();
      this.db = undefined;
    }
  }
}

function parseStatus(value: string): ProposalStatus {
  return Object.values(ProposalStatus).find((status) => status === value) ?? ProposalStatus.PENDING;
}

function parseResolutionReason(value: string | null): ResolutionReason | undefined {
  return Object.values(ResolutionReason).find((reason) => reason === value);
}

function parseAuditKind(value: string): AuditKind {
  return Object.values(AuditKind).find((kind) => kind === value) ?? AuditKind.PROPOSAL_RESOLUTION;
}

export default SqliteStorage;
