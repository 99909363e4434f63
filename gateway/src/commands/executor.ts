import type { SessionManager } from '@dialtone/audio';
import { moduleLogger } from '@dialtone/logger';
import { describeError } from '../errors.js';
import {
  formatAutoplayStatus,
  formatNowPlaying,
  formatPlayResult,
  formatQueue,
  formatSignal,
  formatStations,
  formatTrack,
  help,
} from '../ui.js';
import type { Command } from './parser.js';

const log = moduleLogger('commands');

/** Voice connection management, kept apart from playback so commands can be tested without Discord. */
export interface VoiceGateway {
  join(guildId: string, voiceChannelId: string, textChannelId: string): Promise<void>;
  leave(guildId: string): Promise<void>;
  isConnected(guildId: string): boolean;
}

export interface CommandContext {
  guildId: string;
  /** Voice channel of the member who sent the command, if any. */
  voiceChannelId: string | null;
  textChannelId: string;
}

export const NOT_IN_VOICE = 'Join a voice channel first.';

const NEEDS_VOICE = new Set<Command['name']>(['play', 'autoplay', 'radio', 'station-load']);

export class CommandExecutor {
  constructor(
    private readonly manager: SessionManager,
    private readonly voice: VoiceGateway,
    private readonly prefix: string,
  ) {}

  /** Runs a command and returns the reply text, turning failures into user-facing messages. */
  async handle(command: Command, ctx: CommandContext): Promise<string> {
    try {
      return await this.execute(command, ctx);
    } catch (error) {
      return describeError(error, { guildId: ctx.guildId, command: command.name });
    }
  }

  async execute(command: Command, ctx: CommandContext): Promise<string> {
    const { guildId } = ctx;
    if (NEEDS_VOICE.has(command.name)) {
      const joined = await this.ensureVoice(ctx);
      if (!joined) return NOT_IN_VOICE;
    }
    log.debug({ guildId, command: command.name }, 'Executing command');

    switch (command.name) {
      case 'play':
        return formatPlayResult(await this.manager.play(guildId, command.query));
      case 'skip': {
        const result = await this.manager.skip(guildId);
        const skipped = result.skipped ? `Skipped ${result.skipped.title}. ` : '';
        return `${skipped}Now playing ${formatTrack(result.track)}`;
      }
      case 'stop':
        await this.manager.stop(guildId);
        return 'Stopped playback.';
      case 'clear':
        await this.manager.clear(guildId);
        return 'Cleared the queue and stopped playback.';
      case 'pause':
        return `Paused ${formatTrack(await this.manager.pause(guildId))}`;
      case 'resume':
        return `Resumed ${formatTrack(await this.manager.resume(guildId))}`;
      case 'queue':
        return formatQueue(await this.manager.queue(guildId));
      case 'nowplaying':
        return formatNowPlaying(await this.manager.nowPlaying(guildId));
      case 'autoplay': {
        const { track } = await this.manager.autoplay(guildId, command.artist);
        return `Autoplay started for ${command.artist}. Now playing ${formatTrack(track)}`;
      }
      case 'stopautoplay':
        await this.manager.stopAutoplay(guildId);
        return 'Autoplay stopped.';
      case 'autoplaystatus':
        return formatAutoplayStatus(await this.manager.autoplayStatus(guildId));
      case 'radio': {
        const { track } = await this.manager.radio(guildId, command.description);
        return `Tuned in to ${command.description}. Now playing ${formatTrack(track)}`;
      }
      case 'tune':
        return `Tuning towards ${command.direction}.\n${formatSignal(await this.manager.tune(guildId, command.direction))}`;
      case 'dial': {
        const report = await this.manager.dial(guildId, command.direction);
        const headline = report.changed
          ? `Energy ${command.direction}.`
          : `Energy is already at its ${command.direction === 'up' ? 'highest' : 'lowest'}.`;
        return `${headline}\n${formatSignal(report)}`;
      }
      case 'static': {
        const result = await this.manager.static(guildId);
        return `Dropped ${result.avoided.title}. Now playing ${formatTrack(result.track)}`;
      }
      case 'signal':
        return formatSignal(await this.manager.signal(guildId));
      case 'stopradio':
        await this.manager.stopRadio(guildId);
        return 'Radio off.';
      case 'station-save': {
        const preset = await this.manager.saveStation(guildId, command.station);
        return `Saved station ${preset.name}.`;
      }
      case 'station-delete':
        await this.manager.deleteStation(guildId, command.station);
        return `Deleted station ${command.station}.`;
      case 'station-load': {
        const { preset, track } = await this.manager.loadStation(guildId, command.station);
        return `Tuned in to station ${preset.name}. Now playing ${formatTrack(track)}`;
      }
      case 'stations':
        return formatStations(this.manager.stations(guildId));
      case 'join':
        return (await this.ensureVoice(ctx)) ? 'Joined your voice channel.' : NOT_IN_VOICE;
      case 'leave':
        await this.manager.destroy(guildId);
        await this.voice.leave(guildId);
        return 'Left the voice channel.';
      case 'help':
        return help(this.prefix);
    }
  }

  private async ensureVoice(ctx: CommandContext): Promise<boolean> {
    if (this.voice.isConnected(ctx.guildId)) return true;
    if (!ctx.voiceChannelId) return false;
    await this.voice.join(ctx.guildId, ctx.voiceChannelId, ctx.textChannelId);
    return true;
  }
}
