import type { Redis } from 'ioredis';
import { z } from 'zod';
import { moduleLogger, type Logger } from '@dialtone/logger';
import { tuningSnapshotSchema, type Preset } from './preset.js';
import type { PresetRepository } from './repository.js';

const storedSchema = tuningSnapshotSchema.extend({ position: z.number().int().nonnegative() });

/**
 * One hash per guild: field = preset name, value = JSON tuning snapshot plus
 * its position, since hash field order is not guaranteed.
 */
export class RedisPresetRepository implements PresetRepository {
  private readonly log: Logger;

  constructor(
    private readonly redis: Redis,
    private readonly keyPrefix = 'dialtone:presets:',
    logger?: Logger,
  ) {
    this.log = logger ?? moduleLogger('presets:redis');
  }

  async loadAll(): Promise<Preset[]> {
    const keys = await this.redis.keys(`${this.keyPrefix}*`);
    const presets: Preset[] = [];

    for (const key of keys) {
      const guildId = key.slice(this.keyPrefix.length);
      const fields = await this.redis.hgetall(key);
      const stored: Array<Preset & { position: number }> = [];

      for (const [name, value] of Object.entries(fields)) {
        let json: unknown;
        try {
          json = JSON.parse(value);
        } catch (error) {
          this.log.warn({ guildId, name, err: error instanceof Error ? error.message : String(error) }, 'Skipping unreadable preset record');
          continue;
        }
        const parsed = storedSchema.safeParse(json);
        if (!parsed.success) {
          this.log.warn({ guildId, name }, 'Skipping invalid preset record');
          continue;
        }
        const { position, ...tuning } = parsed.data;
        stored.push({ guildId, name, tuning, position });
      }

      stored.sort((a, b) => a.position - b.position);
      presets.push(...stored.map(({ guildId: g, name, tuning }) => ({ guildId: g, name, tuning })));
    }
    return presets;
  }

  async saveGuild(guildId: string, presets: readonly Preset[]): Promise<void> {
    const key = `${this.keyPrefix}${guildId}`;
    const transaction = this.redis.multi().del(key);
    if (presets.length > 0) {
      const fields: Record<string, string> = {};
      presets.forEach((preset, position) => {
        fields[preset.name] = JSON.stringify({ ...preset.tuning, position });
      });
      transaction.hset(key, fields);
    }

    const results = await transaction.exec();
    const failed = results?.find(([error]) => error !== null);
    if (failed?.[0]) {
      throw new Error(`Failed to save presets for guild ${guildId}: ${failed[0].message}`);
    }
  }
}
