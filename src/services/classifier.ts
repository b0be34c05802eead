/**
 * AlignmentClassifier - Guarded access to the inference collaborator
 *
 * The collaborator is slow, fails, and sometimes answers with garbage. Every
 * call here is time-bounded; thrown errors are retried within an attempt
 * budget, and a timeout spends the whole budget at once.
 */

import {
  ActionType,
  type AlignmentAction,
  type ChatMessage,
  type GroundTruthDocument,
} from '../schemas/models.js';
import { ErrorCode, TransientInferenceError } from '../schemas/errors.js';
import { EngineLimits, validateAction } from '../schemas/validation.js';

/**
 * What the engine consumes from a language model. Results are untrusted:
 * `classify` may return anything and is schema-checked before use.
 */
export interface InferenceClient {
  classify(message: ChatMessage, document: GroundTruthDocument, window: ChatMessage[]): Promise<unknown>;
  isContinuation(messageText: string, threadSummary: string): Promise<boolean>;
  summarizeForCompaction(document: GroundTruthDocument, renderedText: string): Promise<string>;
}

export interface ClassifierOptions {
  timeoutMs?: number;
  maxAttempts?: number;
}

export interface ClassificationOutcome {
  action: AlignmentAction;
  /** False when the call failed or timed out; the action is then PASS */
  completed: boolean;
}

class InferenceTimeout extends Error {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'InferenceTimeout';
  }
}

export class AlignmentClassifier {
  private client: InferenceClient;
  private timeoutMs: number;
  private maxAttempts: number;

  constructor(client: InferenceClient, options: ClassifierOptions = {}) {
    this.client = client;
    this.timeoutMs = options.timeoutMs ?? EngineLimits.CLASSIFIER_TIMEOUT_MS;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? EngineLimits.CLASSIFIER_MAX_ATTEMPTS);
  }

  /**
   * Classify a message. Never throws: failures and malformed results
   * degrade to PASS.
   */
  async classify(
    message: ChatMessage,
    document: GroundTruthDocument,
    window: ChatMessage[]
  ): Promise<ClassificationOutcome> {
    let raw: unknown;
    try {
      raw = await this.guarded('classify', () => this.client.classify(message, document, window));
    } catch (err) {
      console.debug(`[Classifier] ${describe(err)}; staying silent on ${message.id}`);
      return { action: { type: ActionType.PASS }, completed: false };
    }

    const action = validateAction(raw);
    if (!action) {
      console.debug(`[Classifier] Malformed classify result for ${message.id}, treating as PASS`);
      return { action: { type: ActionType.PASS }, completed: true };
    }
    return { action, completed: true };
  }

  /**
   * Continuation check. `null` means the answer is unknown.
   */
  async isContinuation(messageText: string, threadSummary: string): Promise<boolean | null> {
    try {
      const result = await this.guarded('isContinuation', () =>
        this.client.isContinuation(messageText, threadSummary)
      );
      return typeof result === 'boolean' ? result : null;
    } catch (err) {
      console.debug(`[Classifier] ${describe(err)}`);
      return null;
    }
  }

  /**
   * Compacted document text. Throws TransientInferenceError on failure.
   */
  async summarizeForCompaction(document: GroundTruthDocument, renderedText: string): Promise<string> {
    const text = await this.guarded('summarizeForCompaction', () =>
      this.client.summarizeForCompaction(document, renderedText)
    );
    if (typeof text !== 'string' || text.trim().length === 0) {
      throw new TransientInferenceError('summarizeForCompaction', 'empty summary');
    }
    return text;
  }

  private async guarded<T>(operation: string, call: () => Promise<T>): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await this.withTimeout(operation, call);
      } catch (err) {
        if (err instanceof InferenceTimeout) {
          throw new TransientInferenceError(operation, err, ErrorCode.TIMEOUT);
        }
        lastError = err;
        if (attempt < this.maxAttempts) {
          console.debug(`[Classifier] ${operation} attempt ${attempt} failed, retrying`);
        }
      }
    }

    throw new TransientInferenceError(operation, lastError);
  }

  private async withTimeout<T>(operation: string, call: () => Promise<T>): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new InferenceTimeout(operation, this.timeoutMs)), this.timeoutMs);
    });

    try {
      return await Promise.race([call(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export default AlignmentClassifier;
