/**
 * AnthropicInferenceClient - InferenceClient over the Anthropic Messages API
 *
 * Prompt text lives in `prompts/*.md` templates with `{placeholder}` slots.
 * This adapter only formats requests and decodes replies; timeouts, retries
 * and fallbacks belong to AlignmentClassifier.
 */

import fs from 'fs';
import path from 'path';
import Anthropic from '@anthropic-ai/sdk';
import type { ChatMessage, GroundTruthDocument } from '../schemas/models.js';
import { parseClassifierReply } from '../schemas/validation.js';
import { mention, renderDocument } from '../lib/document-text.js';
import type { InferenceClient } from '../services/classifier.js';

const SYSTEM_PROMPT = 'You are the alignment assistant of a team chat channel. Follow the output format exactly.';

export type PromptName = 'classify' | 'continuation' | 'compaction';

/** Text completion seam; the default talks to the Anthropic API */
export interface CompletionBackend {
  complete(system: string, prompt: string, maxTokens: number): Promise<string>;
}

export interface AnthropicInferenceOptions {
  apiKey?: string;
  model: string;
  promptsDir: string;
  maxWords: number;
  backend?: CompletionBackend;
}

class AnthropicBackend implements CompletionBackend {
  private client: Anthropic;
  private model: string;

  constructor(apiKey: string | undefined, model: string) {
    this.client = new Anthropic({ apiKey });
    this.model = model;
  }

  async complete(system: string, prompt: string, maxTokens: number): Promise<string> {
    const resp = await this.client.messages.create({
      model: this.model,
      max_tokens: maxTokens,
      system,
      messages: [{ role: 'user', content: prompt }],
    });
    return resp.content.map(block => (block.type === 'text' ? block.text : '')).join('');
  }
}

/**
 * Replace `{name}` slots; unknown slots are left as they are
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

export function formatWindow(window: ChatMessage[]): string {
  return window.map(m => `${mention(m.authorId)}: ${m.text}`).join('\n');
}

export class AnthropicInferenceClient implements InferenceClient {
  private backend: CompletionBackend;
  private promptsDir: string;
  private maxWords: number;
  private templates: Map<PromptName, string> = new Map();

  constructor(options: AnthropicInferenceOptions) {
    this.backend = options.backend ?? new AnthropicBackend(options.apiKey, options.model);
    this.promptsDir = path.resolve(options.promptsDir);
    this.maxWords = options.maxWords;

    if (!options.backend && !options.apiKey) {
      console.warn('[Inference] No ANTHROPIC_API_KEY set, inference calls will fail and the engine will stay silent');
    }
  }

  async classify(message: ChatMessage, document: GroundTruthDocument, window: ChatMessage[]): Promise<unknown> {
    const prompt = fillTemplate(this.template('classify'), {
      document: renderDocument(document),
      window: formatWindow(window),
      author: mention(message.authorId),
      message: message.text,
    });
    const reply = await this.backend.complete(SYSTEM_PROMPT, prompt, 300);
    return parseClassifierReply(reply);
  }

  async isContinuation(messageText: string, threadSummary: string): Promise<boolean> {
    const prompt = fillTemplate(this.template('continuation'), {
      summary: threadSummary,
      message: messageText,
    });
    const reply = (await this.backend.complete(SYSTEM_PROMPT, prompt, 5)).trim().toUpperCase();
    if (reply.startsWith('YES')) return true;
    if (reply.startsWith('NO')) return false;
    throw new Error(`Unexpected continuation reply: ${reply.slice(0, 40)}`);
  }

  async summarizeForCompaction(document: GroundTruthDocument, renderedText: string): Promise<string> {
    const prompt = fillTemplate(this.template('compaction'), {
      document: renderedText,
      max_words: String(this.maxWords),
      version: String(document.version),
    });
    return this.backend.complete(SYSTEM_PROMPT, prompt, 2048);
  }

  private template(name: PromptName): string {
    let template = this.templates.get(name);
    if (template === undefined) {
      template = fs.readFileSync(path.join(this.promptsDir, `${name}.md`), 'utf8');
      this.templates.set(name, template);
    }
    return template;
  }
}

export default AnthropicInferenceClient;
