import { DocumentService } from '../../src/services/document-service.js';
import { ProposalWorkflow } from '../../src/services/proposal-service.js';
import { AuditService } from '../../src/services/audit-service.js';
import { MemoryStorage } from '../../src/storage/memory-storage.js';
import { countWords, renderSections } from '../../src/lib/document-text.js';
import {
  ProposalKind,
  ProposalStatus,
  ResolutionReason,
  type ChangelogEntry,
  type DocumentSections,
  type GroundTruthDocument,
} from '../../src/schemas/models.js';
import {
  ConflictError,
  GroundlineError,
  NotFoundError,
  StorageError,
  TransientInferenceError,
} from '../../src/schemas/errors.js';

const COMPACTED_BULLET =
  '* **2026-01-01:** Forty early decisions about storage, review flow and release cadence were settled — proposed by bot';

function compactedText(directoryLines: string[]): string {
  return [
    '# Project Ground Truth',
    '',
    '## Core Objective',
    'Ship the beta',
    '',
    '## Directory & Responsibilities',
    ...directoryLines,
    '',
    '## AI Decision Log',
    COMPACTED_BULLET,
  ].join('\n');
}

function seededDocument(entries: number): GroundTruthDocument {
  const decisionLog: ChangelogEntry[] = Array.from({ length: entries }, (_, i) => ({
    timestamp: '2026-01-05T09:00:00.000Z',
    description: `Decision ${i} keeps the release train moving with small reviewed changes merged every single weekday`,
    reason: 'vote',
    proposer: 'bot',
  }));
  const sections: DocumentSections = {
    coreObjective: 'Ship the beta',
    directory: { U1: 'Backend', U2: 'Design' },
    decisionLog,
  };
  return {
    channelId: 'C1',
    version: 1,
    sections,
    wordCount: countWords(renderSections(sections)),
    updatedAt: '2026-01-05T09:00:00.000Z',
  };
}

describe('DocumentService', () => {
  let storage: MemoryStorage;
  let audit: AuditService;
  let workflow: ProposalWorkflow;
  let summarizer: { summarizeForCompaction: jest.Mock<Promise<string>, [GroundTruthDocument, string]> };
  let documents: DocumentService;

  beforeEach(() => {
    storage = new MemoryStorage();
    audit = new AuditService(storage);
    workflow = new ProposalWorkflow(storage, audit);
    summarizer = { summarizeForCompaction: jest.fn<Promise<string>, [GroundTruthDocument, string]>() };
    documents = new DocumentService(storage, workflow, summarizer);
  });

  describe('initialize', () => {
    it('creates version 1 from the human members', async () => {
      const document = await documents.initialize('C1', [
        { id: 'U1', title: 'Backend' },
        { id: 'U2' },
        { id: 'B1', isBot: true },
      ], 'Ship the beta');

      expect(document.version).toBe(1);
      expect(document.sections.coreObjective).toBe('Ship the beta');
      expect(document.sections.directory).toEqual({ U1: 'Backend', U2: 'Role not yet specified' });
      expect(document.sections.decisionLog).toHaveLength(1);
      expect(document.sections.decisionLog[0].description).toBe('Ground truth initialized');
      expect(document.sections.decisionLog[0].reason).toBe('2 members');
      expect(document.wordCount).toBe(countWords(documents.render(document)));
      expect((await storage.loadDocument('C1'))?.version).toBe(1);
    });

    it('refuses to initialize twice', async () => {
      await documents.initialize('C1', [{ id: 'U1' }]);
      await expect(documents.initialize('C1', [{ id: 'U1' }])).rejects.toBeInstanceOf(ConflictError);
    });

    it('reports version 0 for a channel that was never initialized', async () => {
      const document = await documents.current('C9');
      expect(document.version).toBe(0);
      expect(document.sections.decisionLog).toEqual([]);
    });
  });

  describe('resolve', () => {
    beforeEach(async () => {
      await documents.initialize('C1', [{ id: 'U1', title: 'Backend' }, { id: 'U2', title: 'Design' }], 'Ship the beta');
    });

    it('commits an approved update as the next version', async () => {
      const proposal = await documents.proposeUpdate('C1', 'Use Postgres for storage', 'team vote', {
        proposer: 'U1',
        threadId: 't1',
      });
      expect(proposal.baseVersion).toBe(1);

      const outcome = await documents.resolve(proposal.id, 'approve', 'U2');

      expect(outcome.changed).toBe(true);
      expect(outcome.compaction).toBeNull();
      expect(outcome.proposal.status).toBe(ProposalStatus.ACCEPTED);
      expect(outcome.proposal.committedVersion).toBe(2);
      expect(outcome.document.version).toBe(2);

      const entry = outcome.document.sections.decisionLog[1];
      expect(entry.description).toBe('Use Postgres for storage');
      expect(entry.reason).toBe('team vote');
      expect(entry.proposer).toBe('U1');
      expect(entry.approvedBy).toBe('U2');
      expect((await documents.current('C1')).version).toBe(2);
      expect(summarizer.summarizeForCompaction).not.toHaveBeenCalled();
    });

    it('changes nothing when a resolved proposal is resolved again', async () => {
      const proposal = await documents.proposeUpdate('C1', 'Use Postgres for storage', 'team vote');
      await documents.resolve(proposal.id, 'approve', 'U2');
      const recordsAfterFirst = (await audit.query('C1')).length;

      const again = await documents.resolve(proposal.id, 'reject', 'U1');

      expect(again.changed).toBe(false);
      expect(again.proposal.status).toBe(ProposalStatus.ACCEPTED);
      expect(again.document.version).toBe(2);
      expect(await audit.query('C1')).toHaveLength(recordsAfterFirst);
    });

    it('leaves the document alone when a proposal is declined', async () => {
      const proposal = await documents.proposeUpdate('C1', 'Use Postgres for storage', 'team vote');

      const outcome = await documents.resolve(proposal.id, 'reject', 'U2');

      expect(outcome.proposal.status).toBe(ProposalStatus.REJECTED);
      expect(outcome.proposal.resolutionReason).toBe(ResolutionReason.DECLINED);
      expect((await documents.current('C1')).version).toBe(1);
    });

    it('rejects a proposal computed against an older version as stale', async () => {
      const stale = await workflow.submit({
        channelId: 'C1',
        proposedText: 'Old idea',
        reason: 'from before initialization',
        proposer: 'bot',
        baseVersion: 0,
      });

      const outcome = await documents.resolve(stale.id, 'approve', 'U2');

      expect(outcome.changed).toBe(true);
      expect(outcome.proposal.status).toBe(ProposalStatus.REJECTED);
      expect(outcome.proposal.resolutionReason).toBe(ResolutionReason.STALE);
      expect(outcome.document.version).toBe(1);

      const records = await audit.query('C1');
      expect(records[records.length - 1].payload.resolutionReason).toBe('stale');
    });

    it('keeps the old version when the commit fails to persist, and commits on retry', async () => {
      const proposal = await documents.proposeUpdate('C1', 'Use Postgres for storage', 'team vote');
      jest.spyOn(storage, 'saveDocument').mockRejectedValueOnce(new StorageError('saveDocument(C1)', 'disk full'));

      await expect(documents.resolve(proposal.id, 'approve', 'U2')).rejects.toBeInstanceOf(StorageError);

      expect((await documents.current('C1')).version).toBe(1);
      const stored = await workflow.get(proposal.id);
      expect(stored.status).toBe(ProposalStatus.ACCEPTED);
      expect(stored.committedVersion).toBeUndefined();

      const records = await audit.query('C1');
      const failure = records[records.length - 1].payload;
      expect(failure.committed).toBe(false);
      expect(failure.error).toBe('Storage saveDocument(C1) failed: disk full');

      const retried = await documents.commit(proposal.id);
      expect(retried.document.version).toBe(2);
      expect(retried.compaction).toBeNull();
      expect((await workflow.get(proposal.id)).committedVersion).toBe(2);

      const stats = await audit.stats('C1');
      expect(stats.resolutions.accepted).toBe(1);
      expect(stats.resolutions.failedCommits).toBe(1);
    });

    it('retries an accepted proposal that never persisted', async () => {
      const proposal = await documents.proposeUpdate('C1', 'Use Postgres for storage', 'team vote', { threadId: 't1' });
      jest.spyOn(storage, 'saveDocument').mockRejectedValueOnce(new StorageError('saveDocument(C1)', 'disk full'));
      await expect(documents.resolve(proposal.id, 'approve', 'U2')).rejects.toBeInstanceOf(StorageError);

      const retried = await documents.retryUncommitted('C1');

      expect(retried?.proposal.id).toBe(proposal.id);
      expect(retried?.proposal.committedVersion).toBe(2);
      expect(retried?.document.version).toBe(2);
      expect(await documents.retryUncommitted('C1')).toBeNull();
    });

    it('returns null when the retry fails again', async () => {
      const proposal = await documents.proposeUpdate('C1', 'Use Postgres for storage', 'team vote');
      jest.spyOn(storage, 'saveDocument')
        .mockRejectedValueOnce(new StorageError('saveDocument(C1)', 'disk full'))
        .mockRejectedValueOnce(new StorageError('saveDocument(C1)', 'disk full'));
      await expect(documents.resolve(proposal.id, 'approve', 'U2')).rejects.toBeInstanceOf(StorageError);

      expect(await documents.retryUncommitted('C1')).toBeNull();
      expect((await documents.current('C1')).version).toBe(1);
      expect((await workflow.get(proposal.id)).committedVersion).toBeUndefined();
    });

    it('does not retry while another proposal is pending', async () => {
      const proposal = await documents.proposeUpdate('C1', 'Use Postgres for storage', 'team vote');
      jest.spyOn(storage, 'saveDocument').mockRejectedValueOnce(new StorageError('saveDocument(C1)', 'disk full'));
      await expect(documents.resolve(proposal.id, 'approve', 'U2')).rejects.toBeInstanceOf(StorageError);
      const waiting = await documents.proposeUpdate('C1', 'Weekly demos on Friday', 'team vote');
      expect(waiting.status).toBe(ProposalStatus.PENDING);

      expect(await documents.retryUncommitted('C1')).toBeNull();
      expect((await documents.current('C1')).version).toBe(1);
    });

    it('leaves one pending proposal when several arrive at once', async () => {
      const proposals = await Promise.all(
        ['Use Postgres', 'Use MySQL', 'Use SQLite', 'Use Redis'].map(text =>
          documents.proposeUpdate('C1', text, 'team vote')
        )
      );

      expect(proposals.map(p => p.status)).toEqual([
        ProposalStatus.PENDING,
        ProposalStatus.REJECTED,
        ProposalStatus.REJECTED,
        ProposalStatus.REJECTED,
      ]);
      expect(proposals.slice(1).map(p => p.resolutionReason)).toEqual([
        ResolutionReason.SUPERSEDED,
        ResolutionReason.SUPERSEDED,
        ResolutionReason.SUPERSEDED,
      ]);
      expect((await workflow.list('C1', ProposalStatus.PENDING)).map(p => p.id)).toEqual([proposals[0].id]);
    });

    it('refuses to commit a proposal that is not accepted', async () => {
      const proposal = await documents.proposeUpdate('C1', 'Use Postgres for storage', 'team vote');
      await expect(documents.commit(proposal.id)).rejects.toThrow('is not an accepted, uncommitted proposal');
    });

    it('rejects empty proposal text', async () => {
      await expect(documents.proposeUpdate('C1', '   ', 'no text')).rejects.toBeInstanceOf(GroundlineError);
    });
  });

  describe('setRole', () => {
    it('updates the directory and logs the change', async () => {
      await documents.initialize('C1', [{ id: 'U1', title: 'Backend' }, { id: 'U2' }]);

      const outcome = await documents.setRole('C1', 'U2', '  Design systems ');

      expect(outcome.document.version).toBe(2);
      expect(outcome.document.sections.directory.U2).toBe('Design systems');
      const entry = outcome.document.sections.decisionLog[1];
      expect(entry.description).toBe('<@U2> is responsible for Design systems');
      expect(entry.reason).toBe('Set by the owner');
      expect(entry.proposer).toBe('U2');
      expect(entry.approvedBy).toBe('U2');
    });

    it('requires an initialized channel', async () => {
      await expect(documents.setRole('C1', 'U2', 'Design')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('closeChannel', () => {
    it('rejects the pending proposal', async () => {
      await documents.initialize('C1', [{ id: 'U1' }]);
      const proposal = await documents.proposeUpdate('C1', 'Use Postgres for storage', 'team vote');

      const closed = await documents.closeChannel('C1');

      expect(closed?.id).toBe(proposal.id);
      expect(closed?.resolutionReason).toBe(ResolutionReason.CHANNEL_CLOSED);
      expect(await workflow.pending('C1')).toBeNull();
    });
  });

  describe('compaction', () => {
    const bigUpdate = Array.from({ length: 120 }, (_, i) => `word${i}`).join(' ');

    beforeEach(async () => {
      await storage.saveDocument(seededDocument(40));
    });

    it('proposes and commits a compaction once a commit crosses the word limit', async () => {
      const before = await documents.current('C1');
      expect(before.wordCount).toBeLessThanOrEqual(1000);

      summarizer.summarizeForCompaction.mockResolvedValue(
        compactedText(['* <@U1> — Backend', '* <@U2> — Design'])
      );

      const proposal = await documents.proposeUpdate('C1', bigUpdate, 'vote', { proposer: 'U1', threadId: 't1' });
      const outcome = await documents.resolve(proposal.id, 'approve', 'U2');

      expect(outcome.document.version).toBe(2);
      expect(outcome.document.wordCount).toBeGreaterThan(1000);
      expect(summarizer.summarizeForCompaction).toHaveBeenCalledTimes(1);

      const compaction = outcome.compaction;
      expect(compaction?.kind).toBe(ProposalKind.COMPACTION);
      expect(compaction?.status).toBe(ProposalStatus.PENDING);
      expect(compaction?.baseVersion).toBe(2);
      expect(compaction?.threadId).toBe('t1');
      expect(compaction?.proposedText).toBe(COMPACTED_BULLET);

      const compacted = await documents.resolve(compaction?.id ?? '', 'approve', 'U2');

      const document = compacted.document;
      expect(document.version).toBe(3);
      expect(document.wordCount).toBeLessThanOrEqual(1000);
      expect(document.sections.coreObjective).toBe('Ship the beta');
      expect(document.sections.directory).toEqual({ U1: 'Backend', U2: 'Design' });
      expect(document.sections.decisionLog).toEqual([{
        timestamp: '2026-01-01T00:00:00.000Z',
        description: 'Forty early decisions about storage, review flow and release cadence were settled',
        reason: '',
        proposer: 'bot',
      }]);
      expect(compacted.compaction).toBeNull();
    });

    it('stores a compaction that drops a directory entry as rejected', async () => {
      summarizer.summarizeForCompaction.mockResolvedValue(compactedText(['* <@U1> — Backend']));

      const proposal = await documents.proposeUpdate('C1', bigUpdate, 'vote');
      const outcome = await documents.resolve(proposal.id, 'approve', 'U2');

      expect(outcome.compaction?.status).toBe(ProposalStatus.REJECTED);
      expect(outcome.compaction?.resolutionReason).toBe(ResolutionReason.INVARIANT_VIOLATION);
      expect(await workflow.pending('C1')).toBeNull();
      expect((await documents.current('C1')).version).toBe(2);

      const records = await audit.query('C1');
      expect(records[records.length - 1].payload.violations).toEqual([
        'Directory entry missing: * <@U2> — Design',
      ]);
    });

    it('skips compaction when the summarizer is unavailable', async () => {
      summarizer.summarizeForCompaction.mockRejectedValue(
        new TransientInferenceError('summarizeForCompaction', 'timed out')
      );

      const proposal = await documents.proposeUpdate('C1', bigUpdate, 'vote');
      const outcome = await documents.resolve(proposal.id, 'approve', 'U2');

      expect(outcome.document.version).toBe(2);
      expect(outcome.compaction).toBeNull();
    });

    it('flags a compacted text without a decision log heading', () => {
      const check = documents.checkCompaction(seededDocument(1), 'Ship the beta\n* <@U1> — Backend\n* <@U2> — Design');

      expect(check.violations).toEqual(['Decision log section missing from compacted text']);
      expect(check.decisionLog).toEqual([]);
    });
  });
});
