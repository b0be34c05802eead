/**
 * RelayClient - WebSocket endpoint for chat-platform bridges
 *
 * A bridge relays one chat platform to the engine: it authenticates with a
 * JWT, subscribes to the channels it serves, pushes message, reaction and
 * lifecycle frames, and receives `post` frames to publish. The relay is the
 * engine's ChatTransport.
 */

import { EventEmitter } from 'events';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { v4 as uuid } from 'uuid';
import type { Server } from 'http';
import type { ChannelMember, ChatMessage, ReactionEvent } from '../schemas/models.js';
import { ErrorCode, type ValidationFieldError } from '../schemas/errors.js';
import {
  validateChatMessage,
  validateMembers,
  validateReactionEvent,
  type ValidationResult,
} from '../schemas/validation.js';
import type { AuthService } from '../services/auth-service.js';
import type { ChatTransport } from '../services/alignment-engine.js';

export type FrameType = 'event' | 'message' | 'reaction' | 'post' | 'ack' | 'error';

export interface Frame {
  type: FrameType;
  event?: string;
  data?: unknown;
  correlationId?: string;
  timestamp: number;
}

export interface ChannelInitializedEvent {
  channelId: string;
  members: ChannelMember[];
  objective?: string;
}

export interface ChannelMembersEvent {
  channelId: string;
  members: ChannelMember[];
}

export interface RoleSetEvent {
  channelId: string;
  userId: string;
  area: string;
}

interface RelayClientOptions {
  auth: AuthService;
  /** WebSocket port for standalone mode (default: 3001) */
  port?: number;
  /** Host to bind to in standalone mode (default: 0.0.0.0) */
  host?: string;
  /** HTTP server to attach WebSocket to (for single-port deployment) */
  server?: Server;
  /** How long to wait for a bridge to confirm a post (default: 5000) */
  postTimeoutMs?: number;
}

interface PendingAck {
  resolve: (messageId: string | undefined) => void;
  timeout: NodeJS.Timeout;
}

export class RelayClient extends EventEmitter implements ChatTransport {
  private wss: WebSocketServer | null = null;
  private connections: Map<string, WebSocket> = new Map(); // bridgeId -> WebSocket
  private connectionBridges: Map<string, string> = new Map(); // connectionId -> bridgeId
  private subscriptions: Map<string, Set<string>> = new Map(); // channelId -> Set<bridgeId>
  private pendingAcks: Map<string, PendingAck> = new Map();
  private auth: AuthService;
  private port: number;
  private host: string;
  private httpServer?: Server;
  private postTimeoutMs: number;

  constructor(options: RelayClientOptions) {
    super();
    this.auth = options.auth;
    this.port = options.port || 3001;
    this.host = options.host || '0.0.0.0';
    this.httpServer = options.server;
    this.postTimeoutMs = options.postTimeoutMs ?? 5000;
  }

  /**
   * Start the WebSocket server
   */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      // If an HTTP server is provided, attach WebSocket to it (single-port mode)
      if (this.httpServer) {
        this.wss = new WebSocketServer({ server: this.httpServer, path: '/ws' });
        console.log('[Relay] WebSocket attached to HTTP server on /ws');
      } else {
        this.wss = new WebSocketServer({ port: this.port, host: this.host });
      }

      this.wss.on('listening', () => {
        if (!this.httpServer) {
          console.log(`[Relay] WebSocket server listening on ${this.host}:${this.port}`);
        }
        resolve();
      });

      this.wss.on('error', (error) => {
        console.error('[Relay] WebSocket server error:', error);
        reject(error);
      });

      this.wss.on('connection', (ws) => {
        this.handleConnection(ws);
      });

      // If using HTTP server, resolve immediately since it's already listening
      if (this.httpServer) {
        resolve();
      }
    });
  }

  /**
   * Stop the WebSocket server
   */
  async stop(): Promise<void> {
    for (const [correlationId, pending] of this.pendingAcks) {
      clearTimeout(pending.timeout);
      pending.resolve(undefined);
      this.pendingAcks.delete(correlationId);
    }

    return new Promise((resolve) => {
      if (this.wss) {
        for (const [bridgeId, ws] of this.connections) {
          ws.close(1000, 'Server shutting down');
          this.connections.delete(bridgeId);
        }
        this.wss.close(() => {
          console.log('[Relay] WebSocket server stopped');
          resolve();
        });
      } else {
        resolve();
      }
    });
  }

  // ============================================================================
  // INBOUND
  // ============================================================================

  private handleConnection(ws: WebSocket): void {
    const connectionId = uuid();
    console.log(`[Relay] New connection: ${connectionId}`);

    ws.on('message', (data) => {
      const frame = parseFrame(data);
      if (!frame) {
        this.sendError(ws, ErrorCode.INVALID_FORMAT, 'Invalid frame format');
        return;
      }
      this.handleFrame(ws, connectionId, frame);
    });

    ws.on('close', () => {
      this.handleDisconnect(connectionId);
    });

    ws.on('error', (error) => {
      console.error(`[Relay] Connection error ${connectionId}:`, error);
    });
  }

  /**
   * Route one frame. Only `bridge.connected` is accepted before the bridge
   * has authenticated.
   */
  handleFrame(ws: WebSocket, connectionId: string, frame: Frame): void {
    if (frame.type === 'event' && frame.event === 'bridge.connected') {
      this.authenticate(ws, connectionId, frame);
      return;
    }

    const bridgeId = this.connectionBridges.get(connectionId);
    if (!bridgeId) {
      this.sendError(ws, ErrorCode.UNAUTHORIZED, 'Send bridge.connected with a token first');
      return;
    }

    switch (frame.type) {
      case 'message':
        this.accept(ws, frame, validateChatMessage(frame.data), (message: ChatMessage) => {
          this.emit('message', message);
        });
        break;
      case 'reaction':
        this.accept(ws, frame, validateReactionEvent(frame.data), (reaction: ReactionEvent) => {
          this.emit('reaction', reaction);
        });
        break;
      case 'event':
        this.handleEvent(ws, bridgeId, frame);
        break;
      case 'ack':
        this.handleAck(frame);
        break;
      default:
        this.sendError(ws, ErrorCode.INVALID_FORMAT, `Unknown frame type: ${frame.type}`);
    }
  }

  private authenticate(ws: WebSocket, connectionId: string, frame: Frame): void {
    const token = isRecord(frame.data) && typeof frame.data.token === 'string' ? frame.data.token : '';
    const payload = token ? this.auth.verifyToken(token) : null;

    if (!payload) {
      this.sendError(ws, ErrorCode.INVALID_TOKEN, 'Invalid or expired token');
      return;
    }
    if (!this.auth.hasPermission(payload, 'bridge')) {
      this.sendError(ws, ErrorCode.FORBIDDEN, 'Permission denied: bridge required');
      return;
    }

    this.registerConnection(payload.subject, connectionId, ws);
    this.emit('bridge:connected', { bridgeId: payload.subject });
    this.sendAck(ws, frame.correlationId);
  }

  private handleEvent(ws: WebSocket, bridgeId: string, frame: Frame): void {
    const data: Record<string, unknown> = isRecord(frame.data) ? frame.data : {};
    const channelId = typeof data.channelId === 'string' && data.channelId ? data.channelId : null;
    if (!channelId) {
      this.sendValidationError(ws, [{ field: 'data.channelId', message: 'channelId is required', code: 'MISSING_REQUIRED_FIELD' }]);
      return;
    }

    switch (frame.event) {
      case 'channel.subscribe':
        this.subscribeToChannel(bridgeId, channelId);
        this.sendAck(ws, frame.correlationId);
        break;

      case 'channel.initialized': {
        const members = validateMembers(data.members);
        if (!members.valid) {
          this.sendValidationError(ws, members.errors);
          return;
        }
        this.subscribeToChannel(bridgeId, channelId);
        const event: ChannelInitializedEvent = {
          channelId,
          members: members.value,
          objective: typeof data.objective === 'string' ? data.objective : undefined,
        };
        this.emit('channel:initialized', event);
        this.sendAck(ws, frame.correlationId);
        break;
      }

      case 'channel.members': {
        const members = validateMembers(data.members);
        if (!members.valid) {
          this.sendValidationError(ws, members.errors);
          return;
        }
        const event: ChannelMembersEvent = { channelId, members: members.value };
        this.emit('channel:members', event);
        this.sendAck(ws, frame.correlationId);
        break;
      }

      case 'channel.closed':
        this.emit('channel:closed', { channelId });
        this.unsubscribeFromChannel(bridgeId, channelId);
        this.sendAck(ws, frame.correlationId);
        break;

      case 'role.set': {
        if (typeof data.userId !== 'string' || !data.userId || typeof data.area !== 'string' || !data.area.trim()) {
          this.sendValidationError(ws, [{ field: 'data', message: 'userId and area are required', code: 'MISSING_REQUIRED_FIELD' }]);
          return;
        }
        const event: RoleSetEvent = { channelId, userId: data.userId, area: data.area };
        this.emit('role:set', event);
        this.sendAck(ws, frame.correlationId);
        break;
      }

      default:
        this.sendError(ws, ErrorCode.INVALID_FORMAT, `Unknown event: ${frame.event}`);
    }
  }

  private accept<T>(ws: WebSocket, frame: Frame, result: ValidationResult<T>, deliver: (value: T) => void): void {
    if (!result.valid) {
      this.sendValidationError(ws, result.errors);
      return;
    }
    deliver(result.value);
    this.sendAck(ws, frame.correlationId);
  }

  /**
   * A bridge confirms a post with the platform's message id
   */
  private handleAck(frame: Frame): void {
    if (!frame.correlationId) return;
    const pending = this.pendingAcks.get(frame.correlationId);
    if (pending) {
      clearTimeout(pending.timeout);
      this.pendingAcks.delete(frame.correlationId);
      const messageId = isRecord(frame.data) && typeof frame.data.messageId === 'string'
        ? frame.data.messageId
        : undefined;
      pending.resolve(messageId);
    }
  }

  private handleDisconnect(connectionId: string): void {
    const bridgeId = this.connectionBridges.get(connectionId);
    this.connectionBridges.delete(connectionId);
    if (!bridgeId) return;

    const ws = this.connections.get(bridgeId);
    if (ws && ws.readyState !== WebSocket.OPEN) {
      this.connections.delete(bridgeId);
      for (const subscribers of this.subscriptions.values()) {
        subscribers.delete(bridgeId);
      }
      this.emit('bridge:disconnected', { bridgeId });
      console.log(`[Relay] Bridge disconnected: ${bridgeId}`);
    }
  }

  // ============================================================================
  // CONNECTIONS & SUBSCRIPTIONS
  // ============================================================================

  registerConnection(bridgeId: string, connectionId: string, ws: WebSocket): void {
    this.connections.set(bridgeId, ws);
    this.connectionBridges.set(connectionId, bridgeId);
    console.log(`[Relay] Bridge registered: ${bridgeId}`);
  }

  subscribeToChannel(bridgeId: string, channelId: string): void {
    let subscribers = this.subscriptions.get(channelId);
    if (!subscribers) {
      subscribers = new Set();
      this.subscriptions.set(channelId, subscribers);
    }
    subscribers.add(bridgeId);
    console.log(`[Relay] Bridge ${bridgeId} subscribed to channel ${channelId}`);
  }

  unsubscribeFromChannel(bridgeId: string, channelId: string): void {
    const subscribers = this.subscriptions.get(channelId);
    if (subscribers) {
      subscribers.delete(bridgeId);
      console.log(`[Relay] Bridge ${bridgeId} unsubscribed from channel ${channelId}`);
    }
  }

  // ============================================================================
  // OUTBOUND (ChatTransport)
  // ============================================================================

  /**
   * Ask the channel's bridge to publish `text`. Resolves with the platform
   * message id once the bridge acknowledges, or undefined when nobody
   * confirms in time. Posts are not retried.
   */
  async post(channelId: string, threadId: string | undefined, text: string): Promise<string | undefined> {
    const bridgeId = this.getChannelSubscribers(channelId)
      .find(id => this.connections.get(id)?.readyState === WebSocket.OPEN);
    if (!bridgeId) {
      console.warn(`[Relay] No bridge connected for channel ${channelId}, dropping post`);
      return undefined;
    }

    const correlationId = uuid();
    return new Promise((resolve) => {
      const timeout = setTimeout(() => {
        this.pendingAcks.delete(correlationId);
        console.warn(`[Relay] Bridge ${bridgeId} did not confirm post ${correlationId}`);
        resolve(undefined);
      }, this.postTimeoutMs);

      this.pendingAcks.set(correlationId, { resolve, timeout });
      this.sendToBridge(bridgeId, {
        type: 'post',
        data: { channelId, threadId, text },
        correlationId,
        timestamp: Date.now(),
      });
    });
  }

  sendToBridge(bridgeId: string, frame: Frame): void {
    const ws = this.connections.get(bridgeId);
    if (ws && ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(frame));
    }
  }

  private sendAck(ws: WebSocket, correlationId?: string): void {
    if (correlationId && ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify({
        type: 'ack',
        correlationId,
        data: { success: true },
        timestamp: Date.now(),
      }));
    }
  }

  private sendError(ws: WebSocket, code: ErrorCode, message: string, details?: unknown): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify({
        type: 'error',
        data: { code, message, details },
        timestamp: Date.now(),
      }));
    }
  }

  private sendValidationError(ws: WebSocket, errors: ValidationFieldError[]): void {
    this.sendError(ws, ErrorCode.VALIDATION_ERROR, `Validation failed: ${errors.length} error(s)`, { errors });
  }

  getConnectionCount(): number {
    return this.connections.size;
  }

  getChannelSubscribers(channelId: string): string[] {
    return Array.from(this.subscriptions.get(channelId) || []);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const FRAME_TYPES: readonly string[] = ['event', 'message', 'reaction', 'post', 'ack', 'error'];

function isFrameType(value: unknown): value is FrameType {
  return typeof value === 'string' && FRAME_TYPES.includes(value);
}

/**
 * Decode a raw WebSocket payload into a frame, or null when it is not one
 */
export function parseFrame(data: RawData | string): Frame | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data.toString());
  } catch (error) {
    console.error('[Relay] Invalid frame format:', error);
    return null;
  }

  if (!isRecord(parsed) || !isFrameType(parsed.type)) {
    return null;
  }

  return {
    type: parsed.type,
    event: typeof parsed.event === 'string' ? parsed.event : undefined,
    data: parsed.data,
    correlationId: typeof parsed.correlationId === 'string' ? parsed.correlationId : undefined,
    timestamp: typeof parsed.timestamp === 'number' ? parsed.timestamp : Date.now(),
  };
}

export default RelayClient;
