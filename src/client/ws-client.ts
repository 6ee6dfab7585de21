/**
 * WebSocket Hub Client
 *
 * HubApi over a single WebSocket. The socket is opened lazily by the first
 * call that needs it and reopened the same way after it closes or is reset.
 * Requests are matched to responses by id; push frames are queued until the
 * listener asks for them.
 */

import { Mutex } from 'async-mutex';
import type pino from 'pino';
import { WebSocket } from 'ws';
import type { ChannelCommand, CommandResponse, HubApi } from '../core/sync/types.js';
import type { PushUpdateEvent } from '../core/snapshot/types.js';
import { TimeoutError, errorMessage } from '../core/sync/errors.js';
import { clientLogger } from '../observability/logger.js';
import type {
  PushFrame,
  RequestFrame,
  ResponseFrame,
  WsHubClientConfig,
  WsHubClientStats,
} from './types.js';
import {
  DEFAULT_CLIENT_CONFIG,
  HubCommand,
  HubConnectionError,
  HubFrameSchema,
  HubRequestError,
} from './types.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

interface PendingRequest {
  socket: WebSocket;
  cmd: HubCommand;
  timer: ReturnType<typeof setTimeout>;
  resolve: (frame: ResponseFrame) => void;
  reject: (error: Error) => void;
}

interface UpdateWaiter {
  resolve: (update: PushUpdateEvent) => void;
  reject: (error: Error) => void;
}

// -----------------------------------------------------------------------------
// WebSocket Hub Client
// -----------------------------------------------------------------------------

export class WsHubClient implements HubApi {
  private readonly config: WsHubClientConfig;
  private readonly logger: pino.Logger;
  private readonly connectionLock = new Mutex();

  private ws: WebSocket | null = null;
  private closed = false;
  private nextId = 0;
  private connections = 0;
  private lastError: string | null = null;

  private pending: Map<number, PendingRequest> = new Map();
  /** Detached sockets waiting for their requests to settle before closing */
  private draining: Set<WebSocket> = new Set();

  private updates: PushUpdateEvent[] = [];
  private waiters: UpdateWaiter[] = [];
  /** Set when the socket closed while nobody was waiting for an update */
  private streamError: HubConnectionError | null = null;

  constructor(config: Partial<WsHubClientConfig> = {}, logger?: pino.Logger) {
    this.config = { ...DEFAULT_CLIENT_CONFIG, ...config };
    this.logger = logger ?? clientLogger();
  }

  get url(): string {
    return `ws://${this.config.host}:${this.config.port}${this.config.path}`;
  }

  // ---------------------------------------------------------------------------
  // HubApi
  // ---------------------------------------------------------------------------

  async discoverDevices(): Promise<unknown> {
    const response = await this.request(HubCommand.DISCOVER, undefined, this.config.requestTimeout);
    return this.expectSuccess(HubCommand.DISCOVER, response);
  }

  async discoverDevicesById(deviceId: string, timeoutMs: number): Promise<unknown> {
    const response = await this.request(HubCommand.DISCOVER_BY_ID, { me: deviceId }, timeoutMs);
    return this.expectSuccess(HubCommand.DISCOVER_BY_ID, response);
  }

  async setDeviceState(deviceId: string, state: ChannelCommand, timeoutMs: number): Promise<CommandResponse> {
    const response = await this.request(HubCommand.SET_STATE, { ...state, me: deviceId }, timeoutMs);
    return { code: response.code, msg: response.msg };
  }

  /**
   * Wait for the next push event. Rejects with HubConnectionError when the
   * socket closes, including a close that happened between two calls.
   */
  async getStateUpdates(): Promise<PushUpdateEvent> {
    const queued = this.updates.shift();
    if (queued) {
      return queued;
    }

    if (this.streamError) {
      const error = this.streamError;
      this.streamError = null;
      throw error;
    }

    await this.ensureConnected();

    return new Promise<PushUpdateEvent>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Detach the current socket so the next call opens a fresh one. The old
   * socket is closed once the requests in flight on it have settled.
   */
  async resetConnection(): Promise<void> {
    await this.connectionLock.runExclusive(() => {
      const socket = this.ws;
      this.ws = null;
      this.updates = [];
      this.streamError = null;
      this.rejectWaiters(new HubConnectionError('Connection reset'));

      if (socket) {
        this.logger.debug({ url: this.url }, 'Resetting hub connection');
        this.retire(socket);
      }
    });
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Close every socket and fail everything outstanding. The client cannot be
   * reused afterwards.
   */
  async close(): Promise<void> {
    await this.connectionLock.runExclusive(() => {
      this.closed = true;

      const error = new HubConnectionError('Client closed');
      for (const id of [...this.pending.keys()]) {
        this.settle(id)?.reject(error);
      }
      this.rejectWaiters(error);
      this.updates = [];

      const sockets = [...this.draining];
      if (this.ws) {
        sockets.push(this.ws);
      }
      this.ws = null;
      this.draining.clear();

      for (const socket of sockets) {
        socket.close(1000, 'Client shutdown');
      }
    });
  }

  isConnected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }

  getStats(): WsHubClientStats {
    return {
      connected: this.isConnected(),
      connections: this.connections,
      pendingRequests: this.pending.size,
      queuedUpdates: this.updates.length,
      lastError: this.lastError,
    };
  }

  getConfig(): Readonly<WsHubClientConfig> {
    return { ...this.config };
  }

  // ---------------------------------------------------------------------------
  // Connection
  // ---------------------------------------------------------------------------

  private ensureConnected(): Promise<WebSocket> {
    return this.connectionLock.runExclusive(async () => {
      if (this.closed) {
        throw new HubConnectionError('Client closed');
      }

      if (this.ws && this.ws.readyState === WebSocket.OPEN) {
        return this.ws;
      }

      try {
        const socket = await this.open();
        this.ws = socket;
        this.connections++;
        this.lastError = null;
        this.logger.info({ url: this.url, connection: this.connections }, 'Connected to hub');
        return socket;
      } catch (error) {
        this.lastError = errorMessage(error);
        throw error;
      }
    });
  }

  private open(): Promise<WebSocket> {
    const url = this.url;

    return new Promise<WebSocket>((resolve, reject) => {
      const socket = new WebSocket(url);

      const timer = setTimeout(() => {
        reject(new HubConnectionError(`Connection to ${url} timed out after ${this.config.connectTimeout}ms`));
        socket.terminate();
      }, this.config.connectTimeout);

      const onError = (error: Error) => {
        clearTimeout(timer);
        reject(new HubConnectionError(`Failed to connect to ${url}: ${error.message}`, { cause: error }));
      };

      socket.once('error', onError);

      socket.once('open', () => {
        clearTimeout(timer);
        socket.off('error', onError);

        socket.on('message', (data) => this.handleMessage(socket, data));
        socket.on('close', (code, reason) => this.handleClose(socket, code, reason.toString()));
        socket.on('error', (error) => this.handleSocketError(error));

        resolve(socket);
      });
    });
  }

  /**
   * Close a detached socket now, or once its last request settles.
   */
  private retire(socket: WebSocket): void {
    if (this.hasPendingOn(socket)) {
      this.draining.add(socket);
      return;
    }
    socket.close(1000, 'Connection reset');
  }

  private hasPendingOn(socket: WebSocket): boolean {
    for (const request of this.pending.values()) {
      if (request.socket === socket) {
        return true;
      }
    }
    return false;
  }

  // ---------------------------------------------------------------------------
  // Requests
  // ---------------------------------------------------------------------------

  private async request(
    cmd: HubCommand,
    args: Record<string, unknown> | undefined,
    timeoutMs: number
  ): Promise<ResponseFrame> {
    const socket = await this.ensureConnected();
    const id = ++this.nextId;
    const frame: RequestFrame = args === undefined ? { id, cmd } : { id, cmd, args };

    return new Promise<ResponseFrame>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.settle(id);
        reject(new TimeoutError(cmd, timeoutMs));
      }, timeoutMs);

      this.pending.set(id, { socket, cmd, timer, resolve, reject });

      socket.send(JSON.stringify(frame), (error) => {
        if (error) {
          this.settle(id)?.reject(new HubConnectionError(`Failed to send ${cmd}: ${error.message}`, { cause: error }));
        }
      });
    });
  }

  /**
   * Remove a pending request and close its socket if that was the last thing
   * keeping a retired socket open.
   */
  private settle(id: number): PendingRequest | undefined {
    const request = this.pending.get(id);
    if (!request) {
      return undefined;
    }

    clearTimeout(request.timer);
    this.pending.delete(id);

    if (this.draining.has(request.socket) && !this.hasPendingOn(request.socket)) {
      this.draining.delete(request.socket);
      request.socket.close(1000, 'Connection reset');
    }

    return request;
  }

  private expectSuccess(cmd: HubCommand, response: ResponseFrame): ResponseFrame {
    if (response.code !== 0) {
      throw new HubRequestError(cmd, response.code, response.msg);
    }
    return response;
  }

  // ---------------------------------------------------------------------------
  // Inbound Frames
  // ---------------------------------------------------------------------------

  private handleMessage(socket: WebSocket, data: WebSocket.RawData): void {
    let decoded: unknown;
    try {
      decoded = JSON.parse(data.toString());
    } catch (error) {
      this.logger.debug({ err: errorMessage(error) }, 'Dropping undecodable frame');
      return;
    }

    const result = HubFrameSchema.safeParse(decoded);
    if (!result.success) {
      this.logger.debug({ errors: result.error.errors }, 'Dropping invalid frame');
      return;
    }

    const frame = result.data;
    if ('type' in frame) {
      this.handlePush(socket, frame);
    } else {
      this.handleResponse(frame);
    }
  }

  private handleResponse(frame: ResponseFrame): void {
    const request = this.settle(frame.id);
    if (!request) {
      this.logger.debug({ id: frame.id }, 'Dropping response with no pending request');
      return;
    }
    request.resolve(frame);
  }

  private handlePush(socket: WebSocket, frame: PushFrame): void {
    if (socket !== this.ws) {
      return;
    }

    const update: PushUpdateEvent = { me: frame.me, idx: frame.idx, val: frame.val };

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(update);
      return;
    }

    this.updates.push(update);
    if (this.updates.length > this.config.maxQueuedUpdates) {
      this.updates.shift();
      this.logger.warn({ max: this.config.maxQueuedUpdates }, 'Push queue full; dropped oldest update');
    }
  }

  private handleClose(socket: WebSocket, code: number, reason: string): void {
    this.draining.delete(socket);

    const error = new HubConnectionError(`Connection closed (${code}${reason ? `: ${reason}` : ''})`);

    for (const [id, request] of [...this.pending]) {
      if (request.socket === socket) {
        this.settle(id);
        request.reject(error);
      }
    }

    if (socket !== this.ws) {
      return;
    }

    this.ws = null;
    this.lastError = error.message;
    this.logger.warn({ code, reason }, 'Hub connection closed');

    if (this.waiters.length > 0) {
      this.rejectWaiters(error);
    } else {
      this.streamError = error;
    }
  }

  private handleSocketError(error: Error): void {
    this.lastError = error.message;
    this.logger.warn({ err: error.message }, 'Hub socket error');
  }

  private rejectWaiters(error: Error): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(error);
    }
  }
}
