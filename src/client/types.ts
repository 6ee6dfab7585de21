/**
 * Hub Client Types
 *
 * Wire format spoken between the coordinator's hub client and the hub: JSON
 * text frames over a single WebSocket.
 *
 *   request   { id, cmd, args? }
 *   response  { id, code, msg? }
 *   push      { type: "push", me, idx, val }
 */

import { z } from 'zod';

// -----------------------------------------------------------------------------
// Wire Format
// -----------------------------------------------------------------------------

export const HubCommand = {
  DISCOVER: 'discover',
  DISCOVER_BY_ID: 'discover_by_id',
  SET_STATE: 'set_state',
} as const;

export type HubCommand = (typeof HubCommand)[keyof typeof HubCommand];

export const RequestFrameSchema = z.object({
  id: z.number().int().nonnegative(),
  cmd: z.enum([HubCommand.DISCOVER, HubCommand.DISCOVER_BY_ID, HubCommand.SET_STATE]),
  args: z.record(z.unknown()).optional(),
});

export const ResponseFrameSchema = z.object({
  id: z.number().int().nonnegative(),
  code: z.number().int(),
  msg: z.unknown().optional(),
});

export const PushFrameSchema = z.object({
  type: z.literal('push'),
  me: z.string().min(1),
  idx: z.string().min(1),
  val: z.unknown(),
});

/**
 * Anything the hub may send to a client.
 */
export const HubFrameSchema = z.union([PushFrameSchema, ResponseFrameSchema]);

export type RequestFrame = z.infer<typeof RequestFrameSchema>;
export type ResponseFrame = z.infer<typeof ResponseFrameSchema>;
export type PushFrame = z.infer<typeof PushFrameSchema>;
export type HubFrame = z.infer<typeof HubFrameSchema>;

// -----------------------------------------------------------------------------
// Client Configuration
// -----------------------------------------------------------------------------

export interface WsHubClientConfig {
  /** Hub host address */
  host: string;
  /** Hub WebSocket port */
  port: number;
  /** WebSocket path */
  path: string;
  /** Connection timeout (ms) */
  connectTimeout: number;
  /** Default per-request deadline (ms) */
  requestTimeout: number;
  /** Push events buffered while nobody is waiting; oldest are dropped first */
  maxQueuedUpdates: number;
}

export const DEFAULT_CLIENT_CONFIG: WsHubClientConfig = {
  host: 'localhost',
  port: 8888,
  path: '/',
  connectTimeout: 5000,
  requestTimeout: 5000,
  maxQueuedUpdates: 1000,
};

export interface WsHubClientStats {
  connected: boolean;
  /** Sockets opened so far */
  connections: number;
  pendingRequests: number;
  queuedUpdates: number;
  lastError: string | null;
}

// -----------------------------------------------------------------------------
// Errors
// -----------------------------------------------------------------------------

/**
 * The socket could not be opened, or closed under an outstanding request or
 * push wait.
 */
export class HubConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HubConnectionError';
  }
}

/**
 * The hub answered a read with a non-zero code.
 */
export class HubRequestError extends Error {
  constructor(
    public readonly cmd: HubCommand,
    public readonly code: number,
    public readonly hubMessage: unknown
  ) {
    super(`Hub returned code ${code} for ${cmd}`);
    this.name = 'HubRequestError';
  }
}
