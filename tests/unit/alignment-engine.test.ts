import { AlignmentEngine, COULD_NOT_PROCESS } from '../../src/services/alignment-engine.js';
import { AlignmentClassifier } from '../../src/services/classifier.js';
import { AuditService } from '../../src/services/audit-service.js';
import { DocumentService } from '../../src/services/document-service.js';
import { ProposalWorkflow } from '../../src/services/proposal-service.js';
import { ThreadService } from '../../src/services/thread-service.js';
import { MemoryStorage } from '../../src/storage/memory-storage.js';
import { ActionType, AuditKind, ProposalStatus } from '../../src/schemas/models.js';
import { StorageError } from '../../src/schemas/errors.js';
import { FakeInference, RecordingTransport, at, makeMessage } from '../helpers/fixtures.js';

const UPDATE_ACTION = {
  type: 'UPDATE',
  proposedText: 'Use Postgres for storage',
  reason: 'Agreed in thread',
  category: 'decision',
};

describe('AlignmentEngine', () => {
  let storage: MemoryStorage;
  let audit: AuditService;
  let workflow: ProposalWorkflow;
  let documents: DocumentService;
  let inference: FakeInference;
  let transport: RecordingTransport;
  let engine: AlignmentEngine;

  beforeEach(async () => {
    storage = new MemoryStorage();
    audit = new AuditService(storage);
    workflow = new ProposalWorkflow(storage, audit);
    inference = new FakeInference();
    inference.isContinuation.mockResolvedValue(false);
    const classifier = new AlignmentClassifier(inference, { timeoutMs: 20, maxAttempts: 1 });
    documents = new DocumentService(storage, workflow, classifier);
    const threads = new ThreadService(classifier, { storage });
    transport = new RecordingTransport();
    engine = new AlignmentEngine({ documents, proposals: workflow, threads, classifier, audit, transport });

    await engine.initializeChannel('C1', [{ id: 'U1', title: 'Backend' }, { id: 'U2', title: 'Design' }], 'Ship the beta');
  });

  it('announces channel initialization', () => {
    expect(transport.posts).toEqual([{
      channelId: 'C1',
      threadId: undefined,
      text: 'Ground truth initialized with 2 members. Members can set their own role at any time.',
    }]);
  });

  it('ignores bot messages', async () => {
    const outcome = await engine.handleMessage(makeMessage({ isBot: true }));

    expect(outcome).toEqual({ type: 'ignored', reason: 'bot_message' });
    expect(inference.classify).not.toHaveBeenCalled();
  });

  it('groups but does not classify messages in an uninitialized channel', async () => {
    const outcome = await engine.handleMessage(makeMessage({ id: 'm9', channelId: 'C2' }));

    expect(outcome).toEqual({ type: 'ignored', reason: 'uninitialized', threadId: 'm9' });
    expect(inference.classify).not.toHaveBeenCalled();
  });

  it('stays silent and records nothing when the classifier times out', async () => {
    inference.classify.mockImplementation(() => new Promise<unknown>(() => undefined));

    const outcome = await engine.handleMessage(makeMessage({ id: 'm1', text: 'what is the plan?' }));

    expect(outcome).toEqual({
      type: 'classified',
      threadId: 'm1',
      action: { type: ActionType.PASS },
      completed: false,
    });
    expect(transport.posts).toHaveLength(1);
    expect(await audit.query('C1', undefined, AuditKind.MISALIGNMENT_FLAG)).toEqual([]);
  });

  it('treats a malformed classification as PASS', async () => {
    inference.classify.mockResolvedValue({ type: 'ROUTE' });

    const outcome = await engine.handleMessage(makeMessage({ id: 'm1' }));

    expect(outcome).toEqual({
      type: 'classified',
      threadId: 'm1',
      action: { type: ActionType.PASS },
      completed: true,
    });
    expect(transport.posts).toHaveLength(1);
  });

  it('routes a message to the owner and records the flag', async () => {
    inference.classify.mockResolvedValue({
      type: 'ROUTE',
      targetPersonId: 'U2',
      summary: 'is asking about the schema migration.',
      category: 'routing',
    });

    await engine.handleMessage(makeMessage({ id: 'm1', text: 'who owns the migration?' }));

    expect(transport.posts[1]).toEqual({
      channelId: 'C1',
      threadId: 'm1',
      text: 'Hey <@U2>, <@U1> is asking about the schema migration. Could you jump in here?',
    });
    const flags = await audit.query('C1', undefined, AuditKind.MISALIGNMENT_FLAG);
    expect(flags).toHaveLength(1);
    expect(flags[0].payload).toEqual({
      messageId: 'm1',
      threadId: 'm1',
      authorId: 'U1',
      text: 'who owns the migration?',
      action: 'ROUTE',
      targetPersonId: 'U2',
      summary: 'is asking about the schema migration.',
      category: 'routing',
    });
  });

  it('posts clarifying questions in the thread', async () => {
    inference.classify.mockResolvedValue({ type: 'QUESTION', clarificationText: 'Which environment do you mean?' });

    await engine.handleMessage(makeMessage({ id: 'm1' }));

    expect(transport.posts[1]).toEqual({ channelId: 'C1', threadId: 'm1', text: 'Which environment do you mean?' });
  });

  describe('nudge feedback', () => {
    it('records a confirming reaction on a misalignment nudge', async () => {
      inference.classify.mockResolvedValue({
        type: 'MISALIGN',
        nudgeText: 'This drifts from the beta scope.',
        category: 'scope',
      });
      await engine.handleMessage(makeMessage({ id: 'm1', text: 'add a plugin store' }));
      const [flag] = await audit.query('C1', undefined, AuditKind.MISALIGNMENT_FLAG);
      expect(flag.payload.nudgeText).toBe('This drifts from the beta scope.');

      const outcome = await engine.handleReaction({
        channelId: 'C1', messageId: 'post-2', userId: 'U2', reaction: 'white_check_mark',
      });

      expect(outcome).toEqual({ type: 'feedback', threadId: 'm1', flagId: flag.id, verdict: 'confirmed' });
      expect(transport.posts[2]).toEqual({ channelId: 'C1', threadId: 'm1', text: 'Thanks for the feedback.' });
      const [feedback] = await audit.query('C1', undefined, AuditKind.NUDGE_FEEDBACK);
      expect(feedback.payload).toEqual({
        flagId: flag.id,
        messageId: 'm1',
        promptMessageId: 'post-2',
        threadId: 'm1',
        action: 'MISALIGN',
        verdict: 'confirmed',
        userId: 'U2',
      });
      expect((await audit.stats('C1')).nudges).toEqual({ confirmed: 1, dismissed: 0 });

      expect(await engine.handleReaction({ channelId: 'C1', messageId: 'post-2', userId: 'U1', reaction: 'x' })).toBeNull();
    });

    it('records a dismissing reply in the thread of a question', async () => {
      inference.classify.mockResolvedValue({ type: 'QUESTION', clarificationText: 'Which environment do you mean?' });
      await engine.handleMessage(makeMessage({ id: 'm1', text: 'deploy it' }));

      const outcome = await engine.handleMessage(
        makeMessage({ id: 'm2', threadId: 'm1', authorId: 'U2', text: 'No.', timestamp: at(3000) })
      );

      expect(outcome).toMatchObject({ type: 'feedback', threadId: 'm1', verdict: 'dismissed' });
      expect(transport.posts[2]).toEqual({
        channelId: 'C1',
        threadId: 'm1',
        text: 'Got it, sounds like things are on track.',
      });
      expect(inference.classify).toHaveBeenCalledTimes(1);
      expect((await audit.stats('C1')).nudges).toEqual({ confirmed: 0, dismissed: 1 });
    });

    it('does not open feedback for routed messages', async () => {
      inference.classify.mockResolvedValue({
        type: 'ROUTE',
        targetPersonId: 'U2',
        summary: 'is asking about the schema migration.',
        category: 'routing',
      });
      await engine.handleMessage(makeMessage({ id: 'm1' }));

      expect(await engine.handleReaction({ channelId: 'C1', messageId: 'post-2', userId: 'U2', reaction: 'x' })).toBeNull();
      expect(await audit.query('C1', undefined, AuditKind.NUDGE_FEEDBACK)).toEqual([]);
    });
  });

  describe('update proposals', () => {
    beforeEach(async () => {
      inference.classify.mockResolvedValueOnce(UPDATE_ACTION).mockResolvedValue({ type: 'PASS' });
      await engine.handleMessage(makeMessage({ id: 'm1', text: "Let's go with Postgres" }));
    });

    it('asks for approval in the thread', async () => {
      const prompt = transport.posts[1];
      expect(prompt.threadId).toBe('m1');
      expect(prompt.text.split('\n')[0]).toBe('Should I record this in the ground truth?');
      expect(prompt.text).toContain('Use Postgres for storage (Agreed in thread) — proposed by bot');

      const pending = await workflow.pending('C1');
      expect(pending?.promptMessageId).toBe('post-2');
      expect(pending?.threadId).toBe('m1');
    });

    it('commits the proposal on an affirmative reply in the same thread', async () => {
      const outcome = await engine.handleMessage(
        makeMessage({ id: 'm2', threadId: 'm1', authorId: 'U2', text: 'Yes!', timestamp: at(5000) })
      );

      expect(outcome.type).toBe('resolution');
      expect(transport.posts[2]).toEqual({ channelId: 'C1', threadId: 'm1', text: 'Recorded. Ground truth is now v2.' });
      const document = await documents.current('C1');
      expect(document.version).toBe(2);
      expect(document.sections.decisionLog[1].approvedBy).toBe('U2');
      expect(inference.classify).toHaveBeenCalledTimes(1);
    });

    it('does not treat a reply in another thread as an answer', async () => {
      const outcome = await engine.handleMessage(
        makeMessage({ id: 'm3', threadId: 'elsewhere', authorId: 'U2', text: 'yes', timestamp: at(1000) })
      );

      expect(outcome.type).toBe('classified');
      expect((await workflow.pending('C1'))?.status).toBe(ProposalStatus.PENDING);
    });

    it('declines the proposal on a rejecting reaction to the prompt', async () => {
      const outcome = await engine.handleReaction({ channelId: 'C1', messageId: 'post-2', userId: 'U2', reaction: 'x' });

      expect(outcome?.type).toBe('resolution');
      expect(transport.posts[2].text).toBe("Got it, I won't record that.");
      expect((await documents.current('C1')).version).toBe(1);
    });

    it('ignores reactions on other messages', async () => {
      const outcome = await engine.handleReaction({
        channelId: 'C1', messageId: 'post-1', userId: 'U2', reaction: 'white_check_mark',
      });

      expect(outcome).toBeNull();
      expect(await workflow.pending('C1')).not.toBeNull();
    });

    it('apologizes when the commit cannot be stored', async () => {
      jest.spyOn(storage, 'saveDocument').mockRejectedValueOnce(new StorageError('saveDocument(C1)', 'disk full'));

      const outcome = await engine.handleMessage(
        makeMessage({ id: 'm2', threadId: 'm1', authorId: 'U2', text: 'yes', timestamp: at(5000) })
      );

      expect(outcome).toMatchObject({ type: 'resolution', changed: false, failed: true });
      expect(transport.posts[2]).toEqual({ channelId: 'C1', threadId: 'm1', text: COULD_NOT_PROCESS });
      expect((await documents.current('C1')).version).toBe(1);
    });

    it('commits an approved update that failed to persist on the next message', async () => {
      jest.spyOn(storage, 'saveDocument').mockRejectedValueOnce(new StorageError('saveDocument(C1)', 'disk full'));
      await engine.handleMessage(
        makeMessage({ id: 'm2', threadId: 'm1', authorId: 'U2', text: 'yes', timestamp: at(5000) })
      );

      await engine.handleMessage(makeMessage({ id: 'm3', text: 'next topic', timestamp: at(6000) }));

      expect(transport.posts[3]).toEqual({ channelId: 'C1', threadId: 'm1', text: 'Recorded. Ground truth is now v2.' });
      expect((await documents.current('C1')).version).toBe(2);
      const document = inference.classify.mock.calls[1][1];
      expect(document.version).toBe(2);
    });

    it('warns when the directory lists people outside the channel', async () => {
      engine.setMembers('C1', ['U1']);

      await engine.handleMessage(
        makeMessage({ id: 'm2', threadId: 'm1', authorId: 'U1', text: 'yes', timestamp: at(5000) })
      );

      expect(transport.posts[2].text).toBe('Recorded. Ground truth is now v2.');
      expect(transport.posts[3]).toEqual({
        channelId: 'C1',
        threadId: 'm1',
        text: 'Heads up: the directory lists people who are not in this channel: <@U2>',
      });
    });

    it('stays quiet about the directory when everyone is a member', async () => {
      await engine.handleMessage(
        makeMessage({ id: 'm2', threadId: 'm1', authorId: 'U2', text: 'yes', timestamp: at(5000) })
      );

      expect(transport.posts).toHaveLength(3);
    });
  });

  it('lets a member set their own role', async () => {
    await engine.setRole('C1', 'U2', 'Design systems');

    expect(transport.posts[1].text).toBe('Updated the directory: * <@U2> — Design systems');
    expect((await documents.current('C1')).sections.directory.U2).toBe('Design systems');
  });
});
