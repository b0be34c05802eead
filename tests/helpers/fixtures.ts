/**
 * Shared fixtures for unit tests
 */

import type { ChatMessage, GroundTruthDocument } from '../../src/schemas/models.js';
import type { InferenceClient } from '../../src/services/classifier.js';
import type { ChatTransport } from '../../src/services/alignment-engine.js';

export const T0 = Date.parse('2026-03-02T09:00:00.000Z');

export function at(offsetMs: number): string {
  return new Date(T0 + offsetMs).toISOString();
}

export function makeMessage(overrides: Partial<ChatMessage> = {}): ChatMessage {
  return {
    id: 'm1',
    channelId: 'C1',
    authorId: 'U1',
    text: 'hello',
    timestamp: at(0),
    isBot: false,
    ...overrides,
  };
}

export class FakeInference implements InferenceClient {
  classify = jest.fn<Promise<unknown>, [ChatMessage, GroundTruthDocument, ChatMessage[]]>();
  isContinuation = jest.fn<Promise<boolean>, [string, string]>();
  summarizeForCompaction = jest.fn<Promise<string>, [GroundTruthDocument, string]>();
}

export interface PostedMessage {
  channelId: string;
  threadId: string | undefined;
  text: string;
}

export class RecordingTransport implements ChatTransport {
  posts: PostedMessage[] = [];
  private counter = 0;

  async post(channelId: string, threadId: string | undefined, text: string): Promise<string | undefined> {
    this.posts.push({ channelId, threadId, text });
    this.counter++;
    return `post-${this.counter}`;
  }
}
