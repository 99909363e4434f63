import { logger } from './index.js';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthCheckResult {
  status: HealthStatus;
  message?: string;
  responseTime?: number;
  details?: Record<string, unknown>;
}

export type HealthCheck = () => Promise<HealthCheckResult> | HealthCheckResult;

export interface ServiceHealth {
  service: string;
  status: HealthStatus;
  uptime: number;
  timestamp: string;
  version: string;
  checks: Record<string, HealthCheckResult>;
}

const CHECK_TIMEOUT_MS = 5000;

/**
 * Aggregates named health checks into one service status.
 * A check that throws or exceeds the timeout counts as unhealthy.
 */
export class HealthChecker {
  private readonly checks = new Map<string, HealthCheck>();
  private readonly startedAt = Date.now();

  constructor(
    private readonly serviceName: string,
    private readonly version: string = '0.1.0',
    private readonly timeoutMs: number = CHECK_TIMEOUT_MS,
  ) {}

  register(name: string, check: HealthCheck): void {
    this.checks.set(name, check);
  }

  async check(): Promise<ServiceHealth> {
    const entries = await Promise.all(
      Array.from(this.checks.entries(), async ([name, check]) => [name, await this.run(check)] as const),
    );
    const checks = Object.fromEntries(entries);
    const status = worstStatus(Object.values(checks).map((r) => r.status));

    if (status !== 'healthy') {
      logger.warn({ service: this.serviceName, checks }, `health: ${status}`);
    }

    return {
      service: this.serviceName,
      status,
      uptime: Date.now() - this.startedAt,
      timestamp: new Date().toISOString(),
      version: this.version,
      checks,
    };
  }

  private async run(check: HealthCheck): Promise<HealthCheckResult> {
    const start = Date.now();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<HealthCheckResult>((resolve) => {
      timer = setTimeout(
        () => resolve({ status: 'unhealthy', message: 'Health check timeout' }),
        this.timeoutMs,
      );
    });

    try {
      const result = await Promise.race([Promise.resolve().then(check), timeout]);
      return { ...result, responseTime: result.responseTime ?? Date.now() - start };
    } catch (error) {
      return {
        status: 'unhealthy',
        message: error instanceof Error ? error.message : String(error),
        responseTime: Date.now() - start,
      };
    } finally {
      clearTimeout(timer);
    }
  }
}

export function worstStatus(statuses: HealthStatus[]): HealthStatus {
  if (statuses.includes('unhealthy')) return 'unhealthy';
  if (statuses.includes('degraded')) return 'degraded';
  return 'healthy';
}

interface RedisPing {
  ping(): Promise<string>;
}

interface NodeLike {
  id: string;
  connected: boolean;
}

export const CommonHealthChecks = {
  async redis(client: RedisPing): Promise<HealthCheckResult> {
    const reply = await client.ping();
    return reply === 'PONG'
      ? { status: 'healthy', message: 'Redis connection healthy' }
      : { status: 'unhealthy', message: `Unexpected Redis ping reply: ${reply}` };
  },

  lavalink(nodes: Iterable<NodeLike>): HealthCheckResult {
    const all = Array.from(nodes, (node) => ({ id: node.id, connected: node.connected }));
    const connected = all.filter((node) => node.connected).length;

    if (connected === 0) {
      return { status: 'unhealthy', message: 'No Lavalink nodes connected', details: { nodes: all } };
    }
    if (connected < all.length) {
      return {
        status: 'degraded',
        message: `${connected}/${all.length} Lavalink nodes connected`,
        details: { nodes: all },
      };
    }
    return { status: 'healthy', message: 'Lavalink nodes healthy', details: { nodes: all } };
  },
};
