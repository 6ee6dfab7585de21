/**
 * Hub Simulator
 *
 * In-process stand-in for a hub, speaking the client wire format over a
 * WebSocket server. Holds a device list, answers discovery and state writes,
 * and broadcasts a push frame for every applied write. Test hooks inject
 * pushes, swap the device list, add latency and drop connections.
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { DeviceSnapshot, PushUpdateEvent } from '../core/snapshot/types.js';
import { errorMessage } from '../core/sync/errors.js';
import { simulatorLogger } from '../observability/logger.js';
import type { PushFrame, RequestFrame, ResponseFrame } from './types.js';
import { HubCommand, RequestFrameSchema } from './types.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface HubSimulatorConfig {
  /** Port to listen on; 0 picks a free one */
  port: number;
  host: string;
  path: string;
  /** Initial device list */
  devices: DeviceSnapshot[];
  /** Response delay (ms) for simulating latency */
  responseDelay: number;
}

export const DEFAULT_HUB_SIMULATOR_CONFIG: HubSimulatorConfig = {
  port: 0,
  host: '127.0.0.1',
  path: '/',
  devices: [],
  responseDelay: 0,
};

export interface SimulatorEvent {
  type: 'client_connected' | 'client_disconnected' | 'request' | 'state_set';
  clientId: string;
  data?: unknown;
  timestamp: number;
}

export type SimulatorEventHandler = (event: SimulatorEvent) => void;

interface SimulatorClient {
  id: string;
  ws: WebSocket;
}

// -----------------------------------------------------------------------------
// Hub Simulator
// -----------------------------------------------------------------------------

export class HubSimulator {
  private readonly config: HubSimulatorConfig;
  private readonly logger = simulatorLogger();

  private server: WebSocketServer | null = null;
  private clients: Map<string, SimulatorClient> = new Map();
  private eventHandlers: Set<SimulatorEventHandler> = new Set();

  private devices: DeviceSnapshot[];
  private responseDelay: number;
  /** Commands that receive no response, for timeout tests */
  private silenced: Set<HubCommand> = new Set();
  /** Request log for verification */
  private requests: RequestFrame[] = [];

  private clientIdCounter = 0;

  constructor(config: Partial<HubSimulatorConfig> = {}) {
    this.config = { ...DEFAULT_HUB_SIMULATOR_CONFIG, ...config };
    this.devices = structuredClone(this.config.devices);
    this.responseDelay = this.config.responseDelay;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = new WebSocketServer({
        host: this.config.host,
        port: this.config.port,
        path: this.config.path,
      });

      server.on('connection', (ws) => this.handleConnection(ws));

      server.once('listening', () => {
        this.server = server;
        this.logger.info({ port: this.getPort() }, 'Hub simulator listening');
        resolve();
      });

      server.once('error', (error) => {
        reject(error);
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      for (const client of this.clients.values()) {
        client.ws.terminate();
      }
      this.clients.clear();

      const server = this.server;
      if (!server) {
        resolve();
        return;
      }

      server.close((error) => {
        this.server = null;
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * The bound port; differs from the configured one when that was 0.
   */
  getPort(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }

  // ---------------------------------------------------------------------------
  // Connection Handling
  // ---------------------------------------------------------------------------

  private handleConnection(ws: WebSocket): void {
    const client: SimulatorClient = { id: `client-${++this.clientIdCounter}`, ws };
    this.clients.set(client.id, client);

    ws.on('message', (data) => this.handleMessage(client, data.toString()));
    ws.on('close', () => this.handleDisconnect(client));
    ws.on('error', (error) => this.logger.warn({ clientId: client.id, err: error.message }, 'Client error'));

    this.emitEvent({ type: 'client_connected', clientId: client.id, timestamp: Date.now() });
  }

  private handleDisconnect(client: SimulatorClient): void {
    this.clients.delete(client.id);
    this.emitEvent({ type: 'client_disconnected', clientId: client.id, timestamp: Date.now() });
  }

  private handleMessage(client: SimulatorClient, message: string): void {
    let decoded: unknown;
    try {
      decoded = JSON.parse(message);
    } catch (error) {
      this.logger.debug({ clientId: client.id, err: errorMessage(error) }, 'Ignoring undecodable frame');
      return;
    }

    const result = RequestFrameSchema.safeParse(decoded);
    if (!result.success) {
      this.logger.debug({ clientId: client.id, errors: result.error.errors }, 'Ignoring invalid request');
      return;
    }

    const request = result.data;
    this.requests.push(request);
    this.emitEvent({ type: 'request', clientId: client.id, data: request, timestamp: Date.now() });

    if (this.silenced.has(request.cmd)) {
      return;
    }

    const respond = () => this.processRequest(client, request);

    if (this.responseDelay > 0) {
      setTimeout(respond, this.responseDelay);
    } else {
      respond();
    }
  }

  private processRequest(client: SimulatorClient, request: RequestFrame): void {
    switch (request.cmd) {
      case HubCommand.DISCOVER:
        this.send(client, { id: request.id, code: 0, msg: structuredClone(this.devices) });
        break;

      case HubCommand.DISCOVER_BY_ID:
        this.handleDiscoverById(client, request);
        break;

      case HubCommand.SET_STATE:
        this.handleSetState(client, request);
        break;
    }
  }

  private handleDiscoverById(client: SimulatorClient, request: RequestFrame): void {
    const deviceId = request.args?.['me'];
    const device = this.devices.find((d) => d.me === deviceId);

    this.send(client, {
      id: request.id,
      code: 0,
      msg: device ? [structuredClone(device)] : [],
    });
  }

  private handleSetState(client: SimulatorClient, request: RequestFrame): void {
    const args = request.args ?? {};
    const deviceId = args['me'];
    const idx = args['idx'];

    if (typeof deviceId !== 'string' || typeof idx !== 'string' || !('val' in args)) {
      this.send(client, { id: request.id, code: -1, msg: 'me, idx and val are required' });
      return;
    }

    const position = this.devices.findIndex((d) => d.me === deviceId);
    const device = this.devices[position];
    if (!device) {
      this.send(client, { id: request.id, code: 404, msg: `Unknown device ${deviceId}` });
      return;
    }

    const val = args['val'];
    const type = args['type'];
    const data = { ...device.data };
    data[idx] = { ...data[idx], v: val, ...(typeof type === 'string' ? { type } : {}) };
    this.devices[position] = { ...device, data };

    this.send(client, { id: request.id, code: 0 });
    this.emitEvent({ type: 'state_set', clientId: client.id, data: { me: deviceId, idx, val }, timestamp: Date.now() });

    this.pushUpdate({ me: deviceId, idx, val });
  }

  private send(client: SimulatorClient, frame: ResponseFrame | PushFrame): void {
    if (client.ws.readyState !== WebSocket.OPEN) {
      return;
    }
    client.ws.send(JSON.stringify(frame));
  }

  // ---------------------------------------------------------------------------
  // Test Hooks
  // ---------------------------------------------------------------------------

  /**
   * Broadcast a push frame to every connected client.
   */
  pushUpdate(update: PushUpdateEvent): void {
    const frame: PushFrame = { type: 'push', me: update.me, idx: update.idx, val: update.val };
    for (const client of this.clients.values()) {
      this.send(client, frame);
    }
  }

  /**
   * Send an arbitrary text frame to every client.
   */
  broadcastRaw(message: string): void {
    for (const client of this.clients.values()) {
      if (client.ws.readyState === WebSocket.OPEN) {
        client.ws.send(message);
      }
    }
  }

  setDevices(devices: DeviceSnapshot[]): void {
    this.devices = structuredClone(devices);
  }

  getDevices(): DeviceSnapshot[] {
    return structuredClone(this.devices);
  }

  /**
   * Terminate every client connection; the server keeps listening.
   */
  dropClients(): void {
    for (const client of this.clients.values()) {
      client.ws.terminate();
    }
  }

  setResponseDelay(ms: number): void {
    this.responseDelay = ms;
  }

  /**
   * Stop answering (or resume answering) one command.
   */
  setSilent(cmd: HubCommand, silent = true): void {
    if (silent) {
      this.silenced.add(cmd);
    } else {
      this.silenced.delete(cmd);
    }
  }

  getRequests(): RequestFrame[] {
    return [...this.requests];
  }

  clearRequests(): void {
    this.requests = [];
  }

  getClientCount(): number {
    return this.clients.size;
  }

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  onEvent(handler: SimulatorEventHandler): void {
    this.eventHandlers.add(handler);
  }

  offEvent(handler: SimulatorEventHandler): void {
    this.eventHandlers.delete(handler);
  }

  private emitEvent(event: SimulatorEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.error({ err: error }, 'Simulator event handler error');
      }
    }
  }
}
