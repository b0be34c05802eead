/**
 * Groundline Server
 * Main entry point for the dashboard API and the bridge relay
 *
 * Supports two relay layouts:
 * - single-port: the bridge WebSocket shares the HTTP port under /ws (default when WS_PORT is unset)
 * - standalone: the relay runs its own WebSocket server on WS_PORT
 */

import express from 'express';
import http from 'http';
import cors from 'cors';

import { loadConfig, type GroundlineConfig } from './config.js';
import {
  RelayClient,
  type ChannelInitializedEvent,
  type ChannelMembersEvent,
  type RoleSetEvent,
} from './relay/relay-client.js';
import { AuthService } from './services/auth-service.js';
import { AuditService } from './services/audit-service.js';
import { ProposalWorkflow } from './services/proposal-service.js';
import { AlignmentClassifier } from './services/classifier.js';
import { DocumentService } from './services/document-service.js';
import { ThreadService } from './services/thread-service.js';
import { AlignmentEngine } from './services/alignment-engine.js';
import { AnthropicInferenceClient } from './inference/anthropic-client.js';
import { createRoutes } from './api/routes.js';
import { SqliteStorage } from './storage/sqlite-storage.js';
import { MemoryStorage } from './storage/memory-storage.js';
import type { StorageInterface } from './storage/storage-interface.js';
import type { ChatMessage, ReactionEvent } from './schemas/models.js';
import { ErrorCode, toErrorResponse } from './schemas/errors.js';

export class GroundlineServer {
  private app: express.Application;
  private server: http.Server;
  private relayClient: RelayClient;
  private authService: AuthService;
  private auditService: AuditService;
  private proposalWorkflow: ProposalWorkflow;
  private classifier: AlignmentClassifier;
  private documentService: DocumentService;
  private threadService: ThreadService;
  private engine: AlignmentEngine;
  private storage: StorageInterface;
  private config: GroundlineConfig;

  constructor(config: Partial<GroundlineConfig> = {}) {
    this.config = { ...loadConfig(), ...config };

    if (this.config.storage === 'memory') {
      console.log('[Server] GROUNDLINE_STORAGE=memory - state will not survive a restart');
      this.storage = new MemoryStorage();
    } else {
      console.log(`[Server] Using SQLite storage at ${this.config.dbPath}`);
      this.storage = new SqliteStorage({ dbPath: this.config.dbPath });
    }

    if (!this.config.anthropicApiKey) {
      console.warn('[Server] No ANTHROPIC_API_KEY set - classification calls will fail and degrade to PASS');
    }

    // Initialize services
    this.authService = new AuthService(this.config.jwtSecret);
    this.auditService = new AuditService(this.storage);
    this.proposalWorkflow = new ProposalWorkflow(this.storage, this.auditService);
    this.classifier = new AlignmentClassifier(
      new AnthropicInferenceClient({
        apiKey: this.config.anthropicApiKey,
        model: this.config.model,
        promptsDir: this.config.promptsDir,
        maxWords: this.config.maxWords,
      }),
      { timeoutMs: this.config.classifierTimeoutMs, maxAttempts: this.config.classifierAttempts }
    );
    this.documentService = new DocumentService(this.storage, this.proposalWorkflow, this.classifier, {
      maxWords: this.config.maxWords,
    });
    this.threadService = new ThreadService(this.classifier, {
      maxWindow: this.config.maxThreadWindow,
      timeWindowMs: this.config.timeWindowMs,
      maxThreads: this.config.maxThreads,
      storage: this.storage,
    });

    // Initialize Express app
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.server = http.createServer(this.app);

    if (this.config.singlePort) {
      console.log('[Server] Using single-port mode - WebSocket on /ws path');
      this.relayClient = new RelayClient({ auth: this.authService, server: this.server });
    } else {
      console.log('[Server] Using standalone mode - running own WebSocket server');
      this.relayClient = new RelayClient({ auth: this.authService, port: this.config.wsPort });
    }

    this.engine = new AlignmentEngine({
      documents: this.documentService,
      proposals: this.proposalWorkflow,
      threads: this.threadService,
      classifier: this.classifier,
      audit: this.auditService,
      transport: this.relayClient,
    });

    this.setupRelayHandlers();
  }

  /**
   * Set up Relay event handlers
   */
  private setupRelayHandlers(): void {
    this.relayClient.on('bridge:connected', (data: { bridgeId: string }) => {
      console.log(`[Server] Bridge connected: ${data.bridgeId}`);
    });

    this.relayClient.on('bridge:disconnected', (data: { bridgeId: string }) => {
      console.log(`[Server] Bridge disconnected: ${data.bridgeId}`);
    });

    this.relayClient.on('message', (message: ChatMessage) => {
      this.engine.handleMessage(message).catch((err: unknown) => {
        console.error(`[Server] Failed to handle message ${message.id}:`, err);
      });
    });

    this.relayClient.on('reaction', (event: ReactionEvent) => {
      this.engine.handleReaction(event).catch((err: unknown) => {
        console.error(`[Server] Failed to handle reaction on ${event.messageId}:`, err);
      });
    });

    this.relayClient.on('channel:initialized', (event: ChannelInitializedEvent) => {
      this.engine.initializeChannel(event.channelId, event.members, event.objective).catch((err: unknown) => {
        console.error(`[Server] Failed to initialize channel ${event.channelId}:`, err);
      });
    });

    this.relayClient.on('channel:members', (event: ChannelMembersEvent) => {
      this.engine.setMembers(event.channelId, event.members.filter(m => !m.isBot).map(m => m.id));
    });

    this.relayClient.on('channel:closed', (data: { channelId: string }) => {
      this.engine.closeChannel(data.channelId).catch((err: unknown) => {
        console.error(`[Server] Failed to close channel ${data.channelId}:`, err);
      });
    });

    this.relayClient.on('role:set', (event: RoleSetEvent) => {
      this.engine.setRole(event.channelId, event.userId, event.area).catch((err: unknown) => {
        console.error(`[Server] Failed to set role for ${event.userId} in ${event.channelId}:`, err);
      });
    });
  }

  /**
   * Set up Express middleware
   */
  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());

    // Request logging
    this.app.use((req, res, next) => {
      const start = Date.now();
      res.on('finish', () => {
        const duration = Date.now() - start;
        console.log(`[HTTP] ${req.method} ${req.path} ${res.statusCode} ${duration}ms`);
      });
      next();
    });
  }

  /**
   * Set up API routes
   */
  private setupRoutes(): void {
    const routes = createRoutes({
      documents: this.documentService,
      proposals: this.proposalWorkflow,
      threads: this.threadService,
      audit: this.auditService,
      authService: this.authService,
    });

    this.app.use('/api/v1', routes);

    this.app.get('/', (req, res) => {
      res.json({
        name: 'Groundline',
        version: '0.1.0',
        description: 'Conversation and alignment state engine for shared chat channels',
        api: '/api/v1/health',
      });
    });

    // 404 handler
    this.app.use((req, res) => {
      res.status(404).json({
        success: false,
        error: { code: ErrorCode.NOT_FOUND, message: 'Endpoint not found', status: 404, retryable: false },
      });
    });

    // Error handler
    this.app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
      console.error('[Server] Error:', err);
      const body = toErrorResponse(err);
      res.status(body.error.status).json(body);
    });
  }

  /**
   * Start the server
   */
  async start(): Promise<void> {
    await this.storage.init();
    console.log(`[Server] ${this.config.storage === 'memory' ? 'Memory' : 'SQLite'} storage initialized`);

    await new Promise<void>((resolve) => {
      this.server.listen(this.config.port, () => {
        console.log(`[Server] HTTP server listening on port ${this.config.port}`);
        resolve();
      });
    });

    await this.relayClient.start();

    const wsUrl = this.config.singlePort
      ? `ws://localhost:${this.config.port}/ws`
      : `ws://localhost:${this.config.wsPort}`;
    console.log(`
╔═══════════════════════════════════════════════════════════╗
║                    GROUNDLINE SERVER                      ║
╠═══════════════════════════════════════════════════════════╣
║  HTTP API:    ${`http://localhost:${this.config.port}/api/v1`.padEnd(44)}║
║  Bridges:     ${wsUrl.padEnd(44)}║
║  Storage:     ${this.config.storage.padEnd(44)}║
║  Model:       ${this.config.model.substring(0, 44).padEnd(44)}║
╚═══════════════════════════════════════════════════════════╝
    `);
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    await this.relayClient.stop();

    await new Promise<void>((resolve) => {
      this.server.close(() => {
        console.log('[Server] Stopped');
        resolve();
      });
    });

    await this.storage.close();
    console.log('[Server] Storage closed');
  }

  /**
   * Get services (for testing)
   */
  getServices() {
    return {
      auth: this.authService,
      audit: this.auditService,
      proposals: this.proposalWorkflow,
      classifier: this.classifier,
      documents: this.documentService,
      threads: this.threadService,
      engine: this.engine,
      relay: this.relayClient,
    };
  }
}

// CLI entry point
if (require.main === module) {
  const server = new GroundlineServer();

  const shutdown = (): void => {
    console.log('\n[Server] Shutting down...');
    server.stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('[Server] Error during shutdown:', err);
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  server.start().catch((err) => {
    console.error('[Server] Failed to start:', err);
    process.exit(1);
  });
}

export default GroundlineServer;
