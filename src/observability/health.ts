/**
 * Health Checks
 *
 * Liveness, readiness, and dependency health endpoints.
 */

import type { SyncCoordinator } from '../core/sync/coordinator.js';
import { ListenerState } from '../core/sync/types.js';
import { createLogger } from './logger.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export const HealthStatus = {
  HEALTHY: 'healthy',
  DEGRADED: 'degraded',
  UNHEALTHY: 'unhealthy',
} as const;

export type HealthStatus = (typeof HealthStatus)[keyof typeof HealthStatus];

export interface DependencyHealth {
  name: string;
  status: HealthStatus;
  latencyMs?: number;
  lastCheck: number;
  error?: string;
  metadata?: Record<string, unknown>;
}

export interface HealthReport {
  status: HealthStatus;
  timestamp: number;
  uptime: number;
  version: string;
  dependencies: DependencyHealth[];
  metrics?: HealthMetrics;
}

export interface HealthMetrics {
  devices: number;
  available: boolean;
}

export interface LivenessReport {
  alive: boolean;
  timestamp: number;
}

export interface ReadinessReport {
  ready: boolean;
  timestamp: number;
  reason?: string;
}

export type HealthChecker = () => Promise<DependencyHealth>;

// -----------------------------------------------------------------------------
// Health Manager
// -----------------------------------------------------------------------------

export class HealthManager {
  private readonly logger = createLogger({ component: 'health' });
  private readonly startTime: number;
  private readonly version: string;
  private checkers: Map<string, HealthChecker> = new Map();
  private checkInterval: ReturnType<typeof setInterval> | null = null;

  constructor(version = '0.1.0') {
    this.startTime = Date.now();
    this.version = version;
  }

  // ---------------------------------------------------------------------------
  // Checker Registration
  // ---------------------------------------------------------------------------

  /**
   * Register a health checker for a dependency.
   */
  registerChecker(name: string, checker: HealthChecker): void {
    this.checkers.set(name, checker);
  }

  // ---------------------------------------------------------------------------
  // Health Checks
  // ---------------------------------------------------------------------------

  /**
   * Check liveness (is the process alive and responsive).
   */
  liveness(): LivenessReport {
    return {
      alive: true,
      timestamp: Date.now(),
    };
  }

  /**
   * Check readiness (is the service ready to handle requests).
   */
  async readiness(): Promise<ReadinessReport> {
    // Run all health checks
    const results = await this.runAllChecks();

    // Service is ready if all critical dependencies are healthy
    const unhealthyDeps = results.filter((r) => r.status === HealthStatus.UNHEALTHY);

    if (unhealthyDeps.length > 0) {
      return {
        ready: false,
        timestamp: Date.now(),
        reason: `Unhealthy dependencies: ${unhealthyDeps.map((d) => d.name).join(', ')}`,
      };
    }

    return {
      ready: true,
      timestamp: Date.now(),
    };
  }

  /**
   * Get full health report.
   */
  async health(metrics?: HealthMetrics): Promise<HealthReport> {
    const dependencies = await this.runAllChecks();

    // Determine overall status
    let status: HealthStatus = HealthStatus.HEALTHY;

    const hasUnhealthy = dependencies.some((d) => d.status === HealthStatus.UNHEALTHY);
    const hasDegraded = dependencies.some((d) => d.status === HealthStatus.DEGRADED);

    if (hasUnhealthy) {
      status = HealthStatus.UNHEALTHY;
    } else if (hasDegraded) {
      status = HealthStatus.DEGRADED;
    }

    return {
      status,
      timestamp: Date.now(),
      uptime: Date.now() - this.startTime,
      version: this.version,
      dependencies,
      metrics,
    };
  }

  /**
   * Run all registered health checks.
   */
  private async runAllChecks(): Promise<DependencyHealth[]> {
    const results: DependencyHealth[] = [];

    for (const [name, checker] of this.checkers) {
      const startTime = Date.now();
      const deadline = this.timeout(5000, name);

      try {
        const result = await Promise.race([checker(), deadline.promise]);
        result.latencyMs = Date.now() - startTime;
        results.push(result);
      } catch (error) {
        const errorResult: DependencyHealth = {
          name,
          status: HealthStatus.UNHEALTHY,
          lastCheck: Date.now(),
          error: error instanceof Error ? error.message : 'Check failed',
        };
        results.push(errorResult);
      } finally {
        deadline.cancel();
      }
    }

    return results;
  }

  /**
   * Create a timeout promise for health checks.
   */
  private timeout(ms: number, name: string): { promise: Promise<DependencyHealth>; cancel: () => void } {
    let timer: ReturnType<typeof setTimeout> | undefined;

    const promise = new Promise<DependencyHealth>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`Health check timeout for ${name}`));
      }, ms);
    });

    return { promise, cancel: () => clearTimeout(timer) };
  }

  // ---------------------------------------------------------------------------
  // Background Checks
  // ---------------------------------------------------------------------------

  /**
   * Start periodic background health checks.
   */
  startBackgroundChecks(intervalMs = 30000): void {
    if (this.checkInterval) {
      return;
    }

    this.checkInterval = setInterval(() => this.runBackgroundCheck(), intervalMs);

    // Run initial check
    this.runBackgroundCheck();
  }

  private runBackgroundCheck(): void {
    this.runAllChecks()
      .then((results) => {
        for (const result of results) {
          if (result.status !== HealthStatus.HEALTHY) {
            this.logger.warn(
              { dependency: result.name, status: result.status, error: result.error },
              'Dependency not healthy'
            );
          }
        }
      })
      .catch((error: unknown) => {
        this.logger.error({ err: error }, 'Background health check failed');
      });
  }

  /**
   * Stop background health checks.
   */
  stopBackgroundChecks(): void {
    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
    }
  }
}

// -----------------------------------------------------------------------------
// Built-in Health Checkers
// -----------------------------------------------------------------------------

/**
 * Create a health checker for the sync coordinator: degraded while the last
 * full refresh failed.
 */
export function createCoordinatorChecker(getCoordinator: () => SyncCoordinator | null): HealthChecker {
  return async () => {
    const coordinator = getCoordinator();

    if (!coordinator) {
      return {
        name: 'coordinator',
        status: HealthStatus.UNHEALTHY,
        lastCheck: Date.now(),
        error: 'Coordinator not initialised',
      };
    }

    const metadata = {
      devices: coordinator.deviceCount,
      available: coordinator.available(),
      lastUpdateSuccess: coordinator.lastUpdateSuccess,
    };

    if (!coordinator.lastUpdateSuccess) {
      return {
        name: 'coordinator',
        status: HealthStatus.DEGRADED,
        lastCheck: Date.now(),
        error: coordinator.getLastError()?.message ?? 'No successful refresh yet',
        metadata,
      };
    }

    return {
      name: 'coordinator',
      status: HealthStatus.HEALTHY,
      lastCheck: Date.now(),
      metadata,
    };
  };
}

/**
 * Create a health checker for the push listener. A listener that gave up is
 * degraded until the next poll restarts it.
 */
export function createListenerChecker(getCoordinator: () => SyncCoordinator | null): HealthChecker {
  return async () => {
    const coordinator = getCoordinator();

    if (!coordinator) {
      return {
        name: 'push_listener',
        status: HealthStatus.UNHEALTHY,
        lastCheck: Date.now(),
        error: 'Coordinator not initialised',
      };
    }

    if (!coordinator.getConfig().push.enabled) {
      return {
        name: 'push_listener',
        status: HealthStatus.HEALTHY,
        lastCheck: Date.now(),
        metadata: { enabled: false },
      };
    }

    const state = coordinator.getListenerState();
    const running = coordinator.isListenerRunning();

    if (!running || state === ListenerState.BACKOFF) {
      return {
        name: 'push_listener',
        status: HealthStatus.DEGRADED,
        lastCheck: Date.now(),
        error: running ? 'Reconnecting' : 'Listener not running',
        metadata: { state, running },
      };
    }

    return {
      name: 'push_listener',
      status: HealthStatus.HEALTHY,
      lastCheck: Date.now(),
      metadata: { state, running },
    };
  };
}

/**
 * Create a health checker for a hub client.
 */
export function createHubClientChecker(
  getClient: () => { isConnected: () => boolean; getStats?: () => { lastError: string | null } } | null
): HealthChecker {
  return async () => {
    const client = getClient();

    if (!client) {
      return {
        name: 'hub_client',
        status: HealthStatus.UNHEALTHY,
        lastCheck: Date.now(),
        error: 'Client not initialised',
      };
    }

    const connected = client.isConnected();
    const stats = client.getStats?.();

    if (!connected) {
      return {
        name: 'hub_client',
        status: HealthStatus.DEGRADED,
        lastCheck: Date.now(),
        error: stats?.lastError ?? 'Not connected',
        metadata: { connected: false },
      };
    }

    return {
      name: 'hub_client',
      status: HealthStatus.HEALTHY,
      lastCheck: Date.now(),
      metadata: { connected: true },
    };
  };
}
