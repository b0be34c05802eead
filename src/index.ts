/**
 * Groundline - Conversation and alignment state engine for shared chat channels
 *
 * @packageDocumentation
 */

// Server
export { GroundlineServer } from './server.js';
export { loadConfig, DEFAULT_MODEL, type GroundlineConfig, type StorageKind } from './config.js';

// Services
export { AlignmentEngine, type ChatTransport, type MessageOutcome } from './services/alignment-engine.js';
export { AlignmentClassifier, type InferenceClient, type ClassificationOutcome } from './services/classifier.js';
export { DocumentService, type ResolutionOutcome, type CompactionSummarizer } from './services/document-service.js';
export { ProposalWorkflow, type ProposalDraft } from './services/proposal-service.js';
export { ThreadService, type ContinuationChecker } from './services/thread-service.js';
export { AuditService, type AuditStats } from './services/audit-service.js';
export { AuthService, type Permission, type TokenPayload } from './services/auth-service.js';
export { parseReply, parseReaction } from './services/approval-lexicon.js';

// Inference
export { AnthropicInferenceClient, type CompletionBackend } from './inference/anthropic-client.js';

// Relay
export { RelayClient } from './relay/relay-client.js';

// Storage
export { SqliteStorage, MemoryStorage, type StorageInterface } from './storage/index.js';

// Document text
export { renderDocument, countWords } from './lib/document-text.js';

// Core schemas
export * from './schemas/models.js';
export * from './schemas/errors.js';
export {
  EngineLimits,
  parseClassifierReply,
  validateAction,
  validateChatMessage,
  validateReactionEvent,
} from './schemas/validation.js';
