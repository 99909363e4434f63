import type { LavalinkManager } from 'lavalink-client';
import { moduleLogger } from '@dialtone/logger';
import type { VoiceGateway } from '../commands/executor.js';

const log = moduleLogger('voice');

/** Voice connections through lavalink-client players, one per guild. */
export class LavalinkVoiceGateway implements VoiceGateway {
  constructor(private readonly lavalink: LavalinkManager) {}

  async join(guildId: string, voiceChannelId: string, textChannelId: string): Promise<void> {
    const existing = this.lavalink.getPlayer(guildId);
    const player =
      existing ??
      this.lavalink.createPlayer({ guildId, voiceChannelId, textChannelId, selfDeaf: true, volume: 100 });
    if (!player.connected) {
      await player.connect();
      log.info({ guildId, voiceChannelId }, 'Joined voice channel');
    }
  }

  async leave(guildId: string): Promise<void> {
    const player = this.lavalink.getPlayer(guildId);
    if (!player) return;
    await player.destroy();
    log.info({ guildId }, 'Left voice channel');
  }

  isConnected(guildId: string): boolean {
    return this.lavalink.getPlayer(guildId)?.connected ?? false;
  }
}
