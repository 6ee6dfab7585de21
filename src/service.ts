/**
 * Hub Sync Service
 *
 * Main orchestration class: loads configuration, builds the hub client and
 * the sync coordinator, and serves metrics and health over HTTP.
 */

import { createServer, type Server } from 'http';
import type { HubSyncConfig, SyncConfig } from './config/schema.js';
import type { ConfigOverrides } from './config/loader.js';
import { loadConfig } from './config/loader.js';
import { WsHubClient } from './client/ws-client.js';
import { SyncCoordinator, type SyncCoordinatorOptions } from './core/sync/coordinator.js';
import { initLogger, createLogger } from './observability/logger.js';
import {
  HealthManager,
  createCoordinatorChecker,
  createHubClientChecker,
  createListenerChecker,
} from './observability/health.js';
import { getMetrics, getContentType } from './observability/metrics.js';
import type pino from 'pino';

export const VERSION = '0.1.0';

/**
 * Map the `sync` config section onto coordinator options.
 */
export function toCoordinatorOptions(sync: SyncConfig): SyncCoordinatorOptions {
  return {
    scanIntervalMs: sync.scanInterval,
    poll: {
      attempts: sync.poll.attempts,
      timeoutMs: sync.poll.timeout,
      retryDelayMs: sync.poll.retryDelay,
    },
    query: {
      attempts: sync.query.attempts,
      timeoutMs: sync.query.timeout,
      retryDelayMs: sync.query.retryDelay,
    },
    commandTimeoutMs: sync.commandTimeout,
    push: {
      enabled: sync.push.enabled,
      mode: sync.push.mode,
      maxRetries: sync.push.maxRetries,
      baseDelayMs: sync.push.baseDelay,
      resetTimeoutMs: sync.push.resetTimeout,
    },
  };
}

// -----------------------------------------------------------------------------
// Service Class
// -----------------------------------------------------------------------------

export class HubSyncService {
  private config: HubSyncConfig;
  private logger: pino.Logger;

  private client: WsHubClient | null = null;
  private coordinator: SyncCoordinator | null = null;

  // Observability
  private healthManager: HealthManager;
  private metricsServer: Server | null = null;
  private healthServer: Server | null = null;

  // State
  private running = false;

  constructor(overrides?: ConfigOverrides, configPath?: string) {
    this.config = loadConfig({ overrides, configPath });

    initLogger({
      level: this.config.logging.level,
      pretty: this.config.logging.pretty || this.config.environment === 'development',
    });

    this.logger = createLogger({ component: 'service' });
    this.healthManager = new HealthManager(VERSION);
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Start the service. A hub that is unreachable at start is not fatal: the
   * coordinator keeps polling and becomes available once the hub answers.
   */
  async start(): Promise<void> {
    if (this.running) {
      throw new Error('Service is already running');
    }

    this.logger.info({ name: this.config.name }, 'Starting hub sync service...');

    try {
      await this.initCoordinator();
      await this.initObservability();

      this.running = true;
      this.logger.info('Hub sync service started successfully');
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to start hub sync service');
      await this.stop();
      throw error;
    }
  }

  async stop(): Promise<void> {
    this.logger.info('Stopping hub sync service...');

    this.healthManager.stopBackgroundChecks();
    await this.stopObservabilityServers();

    if (this.coordinator) {
      await this.coordinator.stop();
      this.coordinator = null;
    }

    if (this.client) {
      await this.client.close();
      this.client = null;
    }

    this.running = false;
    this.logger.info('Hub sync service stopped');
  }

  // ---------------------------------------------------------------------------
  // Initialisation
  // ---------------------------------------------------------------------------

  private async initCoordinator(): Promise<void> {
    const client = new WsHubClient({
      host: this.config.hub.host,
      port: this.config.hub.port,
      path: this.config.hub.path,
      connectTimeout: this.config.hub.connectTimeout,
      requestTimeout: this.config.hub.requestTimeout,
      maxQueuedUpdates: this.config.hub.maxQueuedUpdates,
    });
    this.client = client;

    const coordinator = new SyncCoordinator(client, toCoordinatorOptions(this.config.sync));
    this.coordinator = coordinator;

    coordinator.onEvent((event) => {
      if (event.type === 'listener_given_up') {
        this.logger.warn({ retryCount: event.retryCount }, 'Push listener gave up; waiting for next poll');
      }
    });

    this.healthManager.registerChecker('coordinator', createCoordinatorChecker(() => this.coordinator));
    this.healthManager.registerChecker('push_listener', createListenerChecker(() => this.coordinator));
    this.healthManager.registerChecker('hub_client', createHubClientChecker(() => this.client));

    const firstRefresh = await coordinator.start();

    this.logger.info(
      { hub: client.url, devices: coordinator.deviceCount, firstRefresh },
      'Sync coordinator initialised'
    );
  }

  private async initObservability(): Promise<void> {
    if (this.config.metrics.enabled) {
      const server = createServer((req, res) => {
        if (req.url !== this.config.metrics.path) {
          res.statusCode = 404;
          res.end('Not found');
          return;
        }

        getMetrics()
          .then((metrics) => {
            res.setHeader('Content-Type', getContentType());
            res.end(metrics);
          })
          .catch((error: unknown) => {
            this.logger.error({ err: error }, 'Failed to collect metrics');
            res.statusCode = 500;
            res.end('Internal error');
          });
      });

      await listen(server, this.config.metrics.port);
      this.metricsServer = server;
      this.logger.info(
        { port: this.config.metrics.port, path: this.config.metrics.path },
        'Metrics endpoint started'
      );
    }

    if (this.config.health.enabled) {
      const server = createServer((req, res) => {
        res.setHeader('Content-Type', 'application/json');

        this.handleHealthRequest(req.url)
          .then(({ statusCode, body }) => {
            res.statusCode = statusCode;
            res.end(JSON.stringify(body));
          })
          .catch((error: unknown) => {
            this.logger.error({ err: error }, 'Health request failed');
            res.statusCode = 500;
            res.end(JSON.stringify({ error: 'Internal error' }));
          });
      });

      await listen(server, this.config.health.port);
      this.healthServer = server;
      this.logger.info({ port: this.config.health.port }, 'Health endpoint started');

      this.healthManager.startBackgroundChecks(this.config.health.checkInterval);
    }
  }

  private async handleHealthRequest(url: string | undefined): Promise<{ statusCode: number; body: unknown }> {
    if (url === '/health' || url === '/health/') {
      const health = await this.healthManager.health({
        devices: this.coordinator?.deviceCount ?? 0,
        available: this.coordinator?.available() ?? false,
      });
      return { statusCode: health.status === 'unhealthy' ? 503 : 200, body: health };
    }

    if (url === '/health/live' || url === '/live') {
      const liveness = this.healthManager.liveness();
      return { statusCode: liveness.alive ? 200 : 503, body: liveness };
    }

    if (url === '/health/ready' || url === '/ready') {
      const readiness = await this.healthManager.readiness();
      return { statusCode: readiness.ready ? 200 : 503, body: readiness };
    }

    return { statusCode: 404, body: { error: 'Not found' } };
  }

  private async stopObservabilityServers(): Promise<void> {
    for (const server of [this.metricsServer, this.healthServer]) {
      if (server) {
        await new Promise<void>((resolve) => {
          server.close(() => resolve());
        });
      }
    }
    this.metricsServer = null;
    this.healthServer = null;
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  isRunning(): boolean {
    return this.running;
  }

  getConfig(): Readonly<HubSyncConfig> {
    return this.config;
  }

  /**
   * The coordinator, once started.
   */
  getCoordinator(): SyncCoordinator | null {
    return this.coordinator;
  }

  getHealthManager(): HealthManager {
    return this.healthManager;
  }
}

function listen(server: Server, port: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      resolve();
    });
  });
}
