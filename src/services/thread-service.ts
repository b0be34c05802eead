/**
 * ThreadService - Groups channel messages into conversation threads
 *
 * Each thread keeps a bounded FIFO window of its most recent messages.
 * Threads are soft state: an LRU on lastActivityAt caps how many stay in
 * memory, and snapshots are written to storage for crash recovery.
 * Intake is serialized per channel, continuation checks included, so every
 * window holds its messages in arrival order.
 */

import type { ChatMessage, Thread, ThreadSnapshot } from '../schemas/models.js';
import { EngineLimits } from '../schemas/validation.js';
import type { StorageInterface } from '../storage/storage-interface.js';
import { KeyedMutex } from '../lib/keyed-mutex.js';
import { mention } from '../lib/document-text.js';

/** The one classifier capability thread resolution needs */
export interface ContinuationChecker {
  isContinuation(messageText: string, threadSummary: string): Promise<boolean | null>;
}

export interface ThreadServiceOptions {
  maxWindow?: number;
  timeWindowMs?: number;
  boundaryMarginMs?: number;
  maxContinuationChecks?: number;
  maxThreads?: number;
  /** Snapshot persistence; omitted means memory only */
  storage?: StorageInterface;
}

export class ThreadService {
  private threads: Map<string, Thread> = new Map(); // channelId:threadId -> thread
  private channelThreads: Map<string, Set<string>> = new Map(); // channelId -> thread keys
  private locks = new KeyedMutex();
  private intake = new KeyedMutex();
  private checker: ContinuationChecker;
  private storage?: StorageInterface;
  private maxWindow: number;
  private timeWindowMs: number;
  private boundaryMarginMs: number;
  private maxContinuationChecks: number;
  private maxThreads: number;

  constructor(checker: ContinuationChecker, options: ThreadServiceOptions = {}) {
    this.checker = checker;
    this.storage = options.storage;
    this.maxWindow = options.maxWindow ?? EngineLimits.MAX_THREAD_WINDOW;
    this.timeWindowMs = options.timeWindowMs ?? EngineLimits.TIME_WINDOW_MS;
    this.boundaryMarginMs = options.boundaryMarginMs ?? EngineLimits.BOUNDARY_MARGIN_MS;
    this.maxContinuationChecks = options.maxContinuationChecks ?? EngineLimits.MAX_CONTINUATION_CHECKS;
    this.maxThreads = options.maxThreads ?? EngineLimits.MAX_THREADS;
  }

  /**
   * Resolve a message to a thread and append it. Returns the thread id.
   */
  async ingest(message: ChatMessage): Promise<string> {
    return this.intake.run(message.channelId, async () => {
      const threadId = await this.resolveThread(message);
      await this.append(threadId, message);
      return threadId;
    });
  }

  /**
   * Decide which thread a message belongs to. A message that joins no
   * candidate roots a new thread with its own id.
   */
  async resolveThread(message: ChatMessage): Promise<string> {
    const at = Date.parse(message.timestamp);
    const candidates = this.getChannelThreads(message.channelId)
      .filter(thread => Math.abs(at - Date.parse(thread.lastActivityAt)) <= this.timeWindowMs)
      .sort((a, b) => Date.parse(b.lastActivityAt) - Date.parse(a.lastActivityAt));

    if (candidates.length === 0) {
      return message.id;
    }

    // Fast path: explicit pointer, known participant, clear of the window edge
    const fastLimit = this.timeWindowMs - this.boundaryMarginMs;
    const fast = candidates.find(thread =>
      thread.threadId === message.threadId &&
      thread.participantIds.has(message.authorId) &&
      at - Date.parse(thread.lastActivityAt) <= fastLimit
    );
    if (fast) {
      return fast.threadId;
    }

    // Ambiguous path: pointed-to thread first, then most recent
    const ordered = [
      ...candidates.filter(thread => thread.threadId === message.threadId),
      ...candidates.filter(thread => thread.threadId !== message.threadId),
    ].slice(0, this.maxContinuationChecks);

    for (const thread of ordered) {
      const verdict = await this.checker.isContinuation(message.text, this.summarizeThread(thread));
      if (verdict === null) {
        console.debug(`[ThreadService] Continuation check unavailable, starting new thread at ${message.id}`);
        return message.id;
      }
      if (verdict) {
        return thread.threadId;
      }
    }

    return message.id;
  }

  /**
   * Append a message to a thread, creating it when needed. The oldest
   * message is evicted once the window is full.
   */
  async append(threadId: string, message: ChatMessage): Promise<Thread> {
    const key = this.key(message.channelId, threadId);

    return this.locks.run(key, async () => {
      let thread = this.threads.get(key);
      if (!thread) {
        thread = {
          threadId,
          channelId: message.channelId,
          participantIds: new Set(),
          messages: [],
          lastActivityAt: message.timestamp,
        };
        this.threads.set(key, thread);
        this.indexThread(message.channelId, key);
        this.evictLeastRecent(key);
      }

      thread.messages.push(message);
      if (thread.messages.length > this.maxWindow) {
        thread.messages.shift();
      }
      thread.participantIds.add(message.authorId);
      if (Date.parse(message.timestamp) > Date.parse(thread.lastActivityAt)) {
        thread.lastActivityAt = message.timestamp;
      }

      await this.persist(thread);
      return thread;
    });
  }

  /**
   * Messages of a thread, oldest first
   */
  window(channelId: string, threadId: string): ChatMessage[] {
    const thread = this.threads.get(this.key(channelId, threadId));
    return thread ? [...thread.messages] : [];
  }

  /**
   * Compact transcript of a thread, one `<@author>: text` line per message
   */
  summarize(channelId: string, threadId: string): string {
    const thread = this.threads.get(this.key(channelId, threadId));
    return thread ? this.summarizeThread(thread) : '';
  }

  private summarizeThread(thread: Thread): string {
    return thread.messages
      .map(m => {
        const text = m.text.replace(/\s+/g, ' ').trim();
        const clipped = text.length > EngineLimits.SUMMARY_LINE_MAX_LENGTH
          ? `${text.slice(0, EngineLimits.SUMMARY_LINE_MAX_LENGTH - 3)}...`
          : text;
        return `${mention(m.authorId)}: ${clipped}`;
      })
      .join('\n');
  }

  get(channelId: string, threadId: string): ThreadSnapshot | undefined {
    const thread = this.threads.get(this.key(channelId, threadId));
    return thread ? this.toSnapshot(thread) : undefined;
  }

  /**
   * Threads of a channel, most recently active first
   */
  list(channelId: string): ThreadSnapshot[] {
    return this.getChannelThreads(channelId)
      .sort((a, b) => Date.parse(b.lastActivityAt) - Date.parse(a.lastActivityAt))
      .map(thread => this.toSnapshot(thread));
  }

  /**
   * Reload persisted snapshots for a channel. Threads already in memory win.
   */
  async restore(channelId: string): Promise<number> {
    if (!this.storage) return 0;

    const snapshots = await this.storage.loadThreads(channelId);
    let restored = 0;
    for (const snapshot of snapshots) {
      const key = this.key(channelId, snapshot.threadId);
      if (this.threads.has(key)) continue;

      this.threads.set(key, {
        threadId: snapshot.threadId,
        channelId: snapshot.channelId,
        participantIds: new Set(snapshot.participantIds),
        messages: snapshot.messages.slice(-this.maxWindow),
        lastActivityAt: snapshot.lastActivityAt,
      });
      this.indexThread(channelId, key);
      restored++;
    }
    this.evictLeastRecent();

    if (restored > 0) {
      console.log(`[ThreadService] Restored ${restored} threads for channel ${channelId}`);
    }
    return restored;
  }

  /**
   * Forget every thread of a channel (channel teardown)
   */
  async dropChannel(channelId: string): Promise<void> {
    const keys = this.channelThreads.get(channelId);
    if (keys) {
      for (const key of keys) {
        this.threads.delete(key);
      }
      this.channelThreads.delete(channelId);
    }
    if (this.storage) {
      await this.storage.deleteThreads(channelId);
    }
  }

  get size(): number {
    return this.threads.size;
  }

  private key(channelId: string, threadId: string): string {
    return `${channelId}:${threadId}`;
  }

  private getChannelThreads(channelId: string): Thread[] {
    const keys = this.channelThreads.get(channelId) ?? new Set<string>();
    const threads: Thread[] = [];
    for (const key of keys) {
      const thread = this.threads.get(key);
      if (thread) threads.push(thread);
    }
    return threads;
  }

  private indexThread(channelId: string, key: string): void {
    let keys = this.channelThreads.get(channelId);
    if (!keys) {
      keys = new Set();
      this.channelThreads.set(channelId, keys);
    }
    keys.add(key);
  }

  private evictLeastRecent(keep?: string): void {
    while (this.threads.size > this.maxThreads) {
      let oldestKey: string | undefined;
      let oldestAt = Infinity;
      for (const [key, thread] of this.threads) {
        if (key === keep) continue;
        const at = Date.parse(thread.lastActivityAt);
        if (at < oldestAt) {
          oldestAt = at;
          oldestKey = key;
        }
      }
      if (oldestKey === undefined) return;

      const evicted = this.threads.get(oldestKey);
      this.threads.delete(oldestKey);
      if (evicted) {
        this.channelThreads.get(evicted.channelId)?.delete(oldestKey);
      }
    }
  }

  private async persist(thread: Thread): Promise<void> {
    if (!this.storage) return;
    try {
      await this.storage.saveThread(this.toSnapshot(thread));
    } catch (err) {
      console.error(`[ThreadService] Failed to snapshot thread ${thread.threadId}:`, err);
    }
  }

  private toSnapshot(thread: Thread): ThreadSnapshot {
    return {
      threadId: thread.threadId,
      channelId: thread.channelId,
      participantIds: Array.from(thread.participantIds),
      messages: [...thread.messages],
      lastActivityAt: thread.lastActivityAt,
    };
  }
}

export default ThreadService;
