import { Client, Events, GatewayIntentBits, type Message } from 'discord.js';
import { Redis } from 'ioredis';
import type { LavalinkManager, Track as LavalinkTrack } from 'lavalink-client';
import {
  FilePresetRepository,
  LavalinkCatalogClient,
  LavalinkPlaybackDriver,
  LavalinkTrackCache,
  PresetStore,
  RedisPresetRepository,
  SessionManager,
  SessionMetrics,
  createLavalinkManager,
  waitForLavalinkRestReady,
  type LavalinkConnection,
  type PresetRepository,
  type SessionNotice,
} from '@dialtone/audio';
import { env } from '@dialtone/config';
import { CommonHealthChecks, HealthChecker, logger } from '@dialtone/logger';
import { CommandExecutor } from './commands/executor.js';
import { parseCommand } from './commands/parser.js';
import { describeError } from './errors.js';
import { HealthServer, createHealthApp } from './infrastructure/http/health-server.js';
import { LavalinkVoiceGateway } from './services/voice.js';
import { formatNotice } from './ui.js';

type RawPacket = Parameters<LavalinkManager['sendRawData']>[0];

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export class DialtoneApplication {
  private client: Client | null = null;
  private lavalink: LavalinkManager | null = null;
  private redis: Redis | null = null;
  private healthServer: HealthServer | null = null;
  private manager: SessionManager | null = null;

  async initialize(): Promise<void> {
    logger.info('Initializing dialtone');

    const client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildVoiceStates,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
      ],
    });
    this.client = client;

    const presets = new PresetStore(this.createPresetRepository());
    const count = await presets.init();
    logger.info({ store: env.PRESET_STORE, count }, 'Station presets loaded');

    const connection: LavalinkConnection = {
      host: env.LAVALINK_HOST,
      port: env.LAVALINK_PORT,
      password: env.LAVALINK_PASSWORD,
      secure: env.LAVALINK_SECURE,
      clientId: env.DISCORD_APPLICATION_ID,
      username: 'dialtone',
    };
    await waitForLavalinkRestReady(connection);

    const lavalink = createLavalinkManager(connection, (guildId, payload) => {
      client.guilds.cache.get(guildId)?.shard?.send(payload);
    });
    this.lavalink = lavalink;

    const cache = new LavalinkTrackCache<LavalinkTrack>();
    const catalog = new LavalinkCatalogClient<LavalinkTrack>(
      () => Array.from(lavalink.nodeManager.nodes.values()).find((node) => node.connected),
      cache,
    );
    const driver = new LavalinkPlaybackDriver<LavalinkTrack>((guildId) => lavalink.getPlayer(guildId), cache);
    lavalink.on('trackEnd', (player, track, payload) => driver.handleTrackEnd(player.guildId, track, payload));
    lavalink.on('trackError', (player, track, payload) => driver.handleTrackError(player.guildId, track, payload));
    lavalink.on('trackStuck', (player, track) => driver.handleTrackStuck(player.guildId, track));

    const metrics = new SessionMetrics();
    const manager = new SessionManager({
      catalog,
      driver,
      presets,
      metrics,
      autoplayDurationMs: env.AUTOPLAY_DURATION_MINUTES * 60_000,
      radioDurationMs: env.RADIO_DURATION_MINUTES * 60_000,
      maxEnergy: env.RADIO_MAX_ENERGY,
      retryCap: env.PLAYBACK_RETRY_CAP,
    });
    manager.onNotice((notice) => this.postNotice(notice));
    this.manager = manager;

    const executor = new CommandExecutor(manager, new LavalinkVoiceGateway(lavalink), env.COMMAND_PREFIX);

    client.on('raw', (packet: RawPacket) => {
      lavalink.sendRawData(packet).catch((error: unknown) => {
        logger.warn({ err: errorMessage(error) }, 'Failed to forward voice packet to Lavalink');
      });
    });
    client.once(Events.ClientReady, (readyClient) => {
      logger.info(`Ready! Logged in as ${readyClient.user.tag}`);
      lavalink.init({ id: readyClient.user.id, username: readyClient.user.username }).catch((error: unknown) => {
        logger.error({ err: errorMessage(error) }, 'Lavalink manager failed to start');
      });
    });
    client.on(Events.MessageCreate, (message) => {
      void this.onMessage(message, executor);
    });

    const health = new HealthChecker('dialtone');
    health.register('discord', () =>
      client.isReady()
        ? { status: 'healthy', message: 'Discord client ready' }
        : { status: 'unhealthy', message: 'Discord client not ready' },
    );
    health.register('lavalink', () => CommonHealthChecks.lavalink(lavalink.nodeManager.nodes.values()));
    const redis = this.redis;
    if (redis) health.register('redis', () => CommonHealthChecks.redis(redis));

    this.healthServer = new HealthServer(createHealthApp(health, metrics), env.HEALTH_HTTP_PORT);
    this.healthServer.start();

    await client.login(env.DISCORD_TOKEN);
    logger.info('Discord client logged in');
  }

  async shutdown(): Promise<void> {
    logger.info('Shutting down dialtone...');
    try {
      const lavalink = this.lavalink;
      if (lavalink && this.manager) {
        for (const guildId of lavalink.players.keys()) {
          await this.manager.destroy(guildId);
        }
      }
      if (this.client) await this.client.destroy();
      if (this.redis) await this.redis.quit();
      if (this.healthServer) await this.healthServer.shutdown();
      logger.info('Shut down cleanly');
    } catch (error) {
      logger.error({ err: errorMessage(error) }, 'Error during shutdown');
    }
  }

  private createPresetRepository(): PresetRepository {
    if (env.PRESET_STORE === 'redis') {
      const redis = new Redis(env.REDIS_URL, { maxRetriesPerRequest: 3 });
      redis.on('error', (error: Error) => logger.error({ err: error.message }, 'Redis error'));
      this.redis = redis;
      return new RedisPresetRepository(redis);
    }
    return new FilePresetRepository(env.PRESETS_FILE);
  }

  private async onMessage(message: Message, executor: CommandExecutor): Promise<void> {
    if (message.author.bot || !message.inGuild()) return;
    try {
      const command = parseCommand(message.content, env.COMMAND_PREFIX);
      if (!command) return;
      const reply = await executor.handle(command, {
        guildId: message.guildId,
        voiceChannelId: message.member?.voice.channelId ?? null,
        textChannelId: message.channelId,
      });
      await message.reply(reply);
    } catch (error) {
      const reply = describeError(error, { guildId: message.guildId });
      await message.reply(reply).catch((replyError: unknown) => {
        logger.warn({ guildId: message.guildId, err: errorMessage(replyError) }, 'Failed to send reply');
      });
    }
  }

  private postNotice(notice: SessionNotice): void {
    const text = formatNotice(notice);
    const channelId = this.lavalink?.getPlayer(notice.guildId)?.textChannelId;
    if (!text || !channelId) return;
    const channel = this.client?.channels.cache.get(channelId);
    if (!channel?.isSendable()) return;
    channel.send(text).catch((error: unknown) => {
      logger.warn({ guildId: notice.guildId, err: errorMessage(error) }, 'Failed to post notice');
    });
  }
}
