import { LavalinkManager, type GuildShardPayload, type LavalinkNode } from 'lavalink-client';
import { setTimeout as delay } from 'node:timers/promises';
import { moduleLogger } from '@dialtone/logger';

const log = moduleLogger('lavalink');

export type SendToShardFn = (guildId: string, payload: GuildShardPayload) => void;

export interface LavalinkConnection {
  host: string;
  port: number;
  password: string;
  secure: boolean;
  clientId: string;
  username: string;
}

export function createLavalinkManager(connection: LavalinkConnection, sendToShard: SendToShardFn): LavalinkManager {
  const manager = new LavalinkManager({
    nodes: [
      {
        id: 'main',
        host: connection.host,
        port: connection.port,
        authorization: connection.password,
        secure: connection.secure,
      },
    ],
    sendToShard,
    client: {
      id: connection.clientId,
      username: connection.username,
    },
  });

  manager.nodeManager.on('connect', (node: LavalinkNode) => log.info(`Node ${node.id} connected`));
  manager.nodeManager.on('error', (node: LavalinkNode, error: Error) =>
    log.error({ err: error.message }, `Node ${node.id} error`),
  );

  return manager;
}

export async function waitForLavalinkRestReady(connection: LavalinkConnection, maxWaitMs = 60000): Promise<boolean> {
  const deadline = Date.now() + maxWaitMs;
  const url = `${connection.secure ? 'https' : 'http'}://${connection.host}:${connection.port}/v4/info`;

  while (Date.now() < deadline) {
    try {
      const res = await fetch(url, { headers: { Authorization: connection.password } });
      if (res.ok) {
        log.info('Lavalink REST API ready');
        return true;
      }
    } catch (error) {
      log.debug(
        { err: error instanceof Error ? error.message : String(error), timeRemaining: deadline - Date.now() },
        'Waiting for Lavalink to become ready',
      );
    }
    await delay(1000);
  }

  log.error({ maxWaitMs }, 'Lavalink REST API failed to become ready within timeout');
  return false;
}
