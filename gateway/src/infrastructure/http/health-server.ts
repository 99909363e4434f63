import express, { type Express, type Request, type Response } from 'express';
import type { Server } from 'node:http';
import type { SessionMetrics } from '@dialtone/audio';
import { moduleLogger, type HealthChecker, type HealthStatus } from '@dialtone/logger';

const log = moduleLogger('health-server');

function httpStatusOf(status: HealthStatus): number {
  // degraded is still operational
  return status === 'unhealthy' ? 503 : 200;
}

export function createHealthApp(healthChecker: HealthChecker, metrics: SessionMetrics): Express {
  const app = express();

  app.get('/health', async (_req: Request, res: Response) => {
    try {
      const health = await healthChecker.check();
      res.status(httpStatusOf(health.status)).json(health);
    } catch (error) {
      log.error({ err: error instanceof Error ? error.message : String(error) }, 'Health check failed');
      res.status(500).json({ status: 'unhealthy', error: 'Health check failed' });
    }
  });

  app.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'alive', timestamp: new Date().toISOString() });
  });

  app.get('/metrics', async (_req: Request, res: Response) => {
    try {
      res.set('Content-Type', metrics.contentType);
      res.status(200).send(await metrics.render());
    } catch (error) {
      log.error({ err: error instanceof Error ? error.message : String(error) }, 'Metrics export failed');
      res.status(500).send('# Metrics export failed\n');
    }
  });

  return app;
}

export class HealthServer {
  private server: Server | null = null;

  constructor(
    private readonly app: Express,
    private readonly port: number,
  ) {}

  start(): void {
    const server = this.app.listen(this.port, () => log.info({ port: this.port }, 'Health server started'));
    server.on('error', (error: Error) => log.error({ err: error.message }, 'Health server error'));
    this.server = server;
  }

  shutdown(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
