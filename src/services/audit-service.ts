/**
 * AuditService - Append-only trail of automated judgments
 *
 * Records every completed non-PASS classification, every proposal
 * resolution or commit attempt, and user feedback on nudges. Write failures
 * surface as StorageError.
 */

import { v4 as uuid } from 'uuid';
import {
  AuditKind,
  ProposalStatus,
  type AuditRecord,
} from '../schemas/models.js';
import { StorageError } from '../schemas/errors.js';
import type { StorageInterface } from '../storage/storage-interface.js';

export interface AuditStats {
  channelId: string;
  total: number;
  /** Misalignment flags by action type (ROUTE, UPDATE, ...) */
  byAction: Record<string, number>;
  /** Misalignment flags by category */
  byCategory: Record<string, number>;
  /** All records by UTC day (YYYY-MM-DD) */
  byDay: Record<string, number>;
  resolutions: {
    accepted: number;
    rejected: number;
    byReason: Record<string, number>;
    /** Commit attempts of accepted proposals that did not persist */
    failedCommits: number;
  };
  /** accepted / (accepted + rejected); 0 when nothing was resolved */
  acceptanceRate: number;
  nudges: {
    confirmed: number;
    dismissed: number;
  };
  /** confirmed / (confirmed + dismissed); 0 without feedback */
  nudgeAcceptanceRate: number;
}

export class AuditService {
  private storage: StorageInterface;

  constructor(storage: StorageInterface) {
    this.storage = storage;
  }

  /**
   * Append a record. Never swallows a storage failure.
   */
  async record(channelId: string, kind: AuditKind, payload: Record<string, unknown>): Promise<AuditRecord> {
    const record: AuditRecord = Object.freeze({
      id: `aud-${uuid()}`,
      timestamp: new Date().toISOString(),
      channelId,
      kind,
      payload,
    });

    try {
      await this.storage.appendAudit(record);
    } catch (err) {
      console.error(`[AuditService] Failed to append ${kind} record for ${channelId}:`, err);
      throw err instanceof StorageError ? err : new StorageError(`appendAudit(${record.id})`, err);
    }

    return record;
  }

  /**
   * Records of a channel in append order
   */
  async query(channelId: string, since?: string, kind?: AuditKind): Promise<AuditRecord[]> {
    return this.storage.queryAudit(channelId, { since, kind });
  }

  async stats(channelId: string): Promise<AuditStats> {
    const records = await this.storage.queryAudit(channelId);

    const stats: AuditStats = {
      channelId,
      total: records.length,
      byAction: {},
      byCategory: {},
      byDay: {},
      resolutions: { accepted: 0, rejected: 0, byReason: {}, failedCommits: 0 },
      acceptanceRate: 0,
      nudges: { confirmed: 0, dismissed: 0 },
      nudgeAcceptanceRate: 0,
    };

    for (const record of records) {
      increment(stats.byDay, record.timestamp.slice(0, 10));

      if (record.kind === AuditKind.MISALIGNMENT_FLAG) {
        increment(stats.byAction, stringField(record.payload, 'action') ?? 'unknown');
        increment(stats.byCategory, stringField(record.payload, 'category') ?? 'general');
        continue;
      }

      if (record.kind === AuditKind.NUDGE_FEEDBACK) {
        const verdict = stringField(record.payload, 'verdict');
        if (verdict === 'confirmed') {
          stats.nudges.confirmed++;
        } else if (verdict === 'dismissed') {
          stats.nudges.dismissed++;
        }
        continue;
      }

      // A failed commit attempt is not a second resolution of its proposal
      if (record.payload.committed === false) {
        stats.resolutions.failedCommits++;
        continue;
      }

      const status = stringField(record.payload, 'status');
      if (status === ProposalStatus.ACCEPTED) {
        stats.resolutions.accepted++;
      } else if (status === ProposalStatus.REJECTED) {
        stats.resolutions.rejected++;
      }
      const reason = stringField(record.payload, 'resolutionReason');
      if (reason) {
        increment(stats.resolutions.byReason, reason);
      }
    }

    const resolved = stats.resolutions.accepted + stats.resolutions.rejected;
    stats.acceptanceRate = resolved > 0 ? stats.resolutions.accepted / resolved : 0;
    const answered = stats.nudges.confirmed + stats.nudges.dismissed;
    stats.nudgeAcceptanceRate = answered > 0 ? stats.nudges.confirmed / answered : 0;
    return stats;
  }
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

function stringField(payload: Record<string, unknown>, field: string): string | undefined {
  const value = payload[field];
  return typeof value === 'string' ? value : undefined;
}

export default AuditService;
