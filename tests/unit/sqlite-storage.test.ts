import { SqliteStorage } from '../../src/storage/sqlite-storage.js';
import { StorageError } from '../../src/schemas/errors.js';
import {
  AuditKind,
  ProposalKind,
  ProposalStatus,
  ResolutionReason,
  type GroundTruthDocument,
  type Proposal,
  type ThreadSnapshot,
} from '../../src/schemas/models.js';

function makeDocument(version: number): GroundTruthDocument {
  return {
    channelId: 'C1',
    version,
    sections: {
      coreObjective: 'Ship the beta',
      directory: { U1: 'Backend' },
      decisionLog: [{ timestamp: '2026-03-02T09:00:00.000Z', description: 'Ground truth initialized', reason: '1 members', proposer: 'bot' }],
    },
    wordCount: 25,
    updatedAt: '2026-03-02T09:00:00.000Z',
  };
}

function makeSnapshot(threadId: string, lastActivityAt: string): ThreadSnapshot {
  return {
    threadId,
    channelId: 'C1',
    participantIds: ['U1'],
    messages: [{ id: threadId, channelId: 'C1', authorId: 'U1', text: 'hello', timestamp: lastActivityAt, isBot: false }],
    lastActivityAt,
  };
}

describe('SqliteStorage', () => {
  let storage: SqliteStorage;

  beforeEach(async () => {
    storage = new SqliteStorage({ dbPath: ':memory:', cleanupIntervalMs: 0, threadRetentionMs: 60 * 60 * 1000 });
    await storage.init();
  });

  afterEach(async () => {
    await storage.close();
  });

  it('stores documents and only lets the version advance', async () => {
    await storage.saveDocument(makeDocument(1));
    expect(await storage.loadDocument('C1')).toEqual(makeDocument(1));

    await expect(storage.saveDocument(makeDocument(1))).rejects.toBeInstanceOf(StorageError);

    await storage.saveDocument(makeDocument(2));
    expect((await storage.loadDocument('C1'))?.version).toBe(2);
    expect(await storage.loadDocument('C2')).toBeNull();
  });

  it('round-trips proposals and lists them by status', async () => {
    const pending: Proposal = {
      id: 'prop-1',
      channelId: 'C1',
      threadId: 't1',
      kind: ProposalKind.UPDATE,
      target: { section: 'directory', personId: 'U2' },
      proposedText: 'Design',
      reason: 'Set by the owner',
      proposer: 'U2',
      status: ProposalStatus.PENDING,
      baseVersion: 1,
      createdAt: '2026-03-02T09:00:00.000Z',
    };
    const rejected: Proposal = {
      ...pending,
      id: 'prop-2',
      kind: ProposalKind.COMPACTION,
      target: { section: 'decision_log' },
      status: ProposalStatus.REJECTED,
      resolutionReason: ResolutionReason.SUPERSEDED,
      resolvedAt: '2026-03-02T09:01:00.000Z',
      createdAt: '2026-03-02T09:01:00.000Z',
    };

    await storage.saveProposal(pending);
    await storage.saveProposal(rejected);

    expect(await storage.getProposal('prop-1')).toEqual(pending);
    expect(await storage.getProposal('prop-2')).toEqual(rejected);
    expect((await storage.listProposals('C1', ProposalStatus.PENDING)).map(p => p.id)).toEqual(['prop-1']);
    expect((await storage.listProposals('C1')).map(p => p.id)).toEqual(['prop-1', 'prop-2']);

    await storage.saveProposal({ ...pending, status: ProposalStatus.ACCEPTED, committedVersion: 2 });
    expect((await storage.getProposal('prop-1'))?.committedVersion).toBe(2);
  });

  it('keeps audit records in append order and refuses duplicate ids', async () => {
    const base = { channelId: 'C1', timestamp: '2026-03-02T09:00:00.000Z', payload: { n: 1 } };
    await storage.appendAudit({ ...base, id: 'aud-b', kind: AuditKind.MISALIGNMENT_FLAG });
    await storage.appendAudit({ ...base, id: 'aud-a', kind: AuditKind.PROPOSAL_RESOLUTION, timestamp: '2026-03-03T09:00:00.000Z' });

    expect((await storage.queryAudit('C1')).map(r => r.id)).toEqual(['aud-b', 'aud-a']);
    expect((await storage.queryAudit('C1', { limit: 1 })).map(r => r.id)).toEqual(['aud-b']);
    expect((await storage.queryAudit('C1', { kind: AuditKind.PROPOSAL_RESOLUTION })).map(r => r.id)).toEqual(['aud-a']);
    expect((await storage.queryAudit('C1', { since: '2026-03-03T00:00:00.000Z' })).map(r => r.id)).toEqual(['aud-a']);
    expect((await storage.queryAudit('C1'))[0].payload).toEqual({ n: 1 });

    await expect(
      storage.appendAudit({ ...base, id: 'aud-a', kind: AuditKind.MISALIGNMENT_FLAG })
    ).rejects.toBeInstanceOf(StorageError);
  });

  it('stores thread snapshots per channel and expires old ones', async () => {
    const recent = new Date().toISOString();
    await storage.saveThread(makeSnapshot('t-old', '2020-01-01T00:00:00.000Z'));
    await storage.saveThread(makeSnapshot('t-new', recent));

    expect((await storage.loadThreads('C1')).map(t => t.threadId)).toEqual(['t-old', 't-new']);
    expect(await storage.cleanupExpiredThreads()).toBe(1);
    expect(await storage.loadThreads('C1')).toEqual([makeSnapshot('t-new', recent)]);

    await storage.deleteThreads('C1');
    expect(await storage.loadThreads('C1')).toEqual([]);
  });

  it('fails with StorageError before init', async () => {
    const idle = new SqliteStorage({ dbPath: ':memory:', cleanupIntervalMs: 0 });
    await expect(idle.loadDocument('C1')).rejects.toBeInstanceOf(StorageError);
  });
});
