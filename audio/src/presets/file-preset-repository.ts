import { promises as fs } from 'node:fs';
import path from 'node:path';
import { moduleLogger, type Logger } from '@dialtone/logger';
import { z } from 'zod';
import { tuningSnapshotSchema, type Preset } from './preset.js';
import type { PresetRepository } from './repository.js';

const fileSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

type StationsFile = z.infer<typeof fileSchema>;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Presets in one JSON file keyed by guild id, then preset name. Writes go to
 * a temp file that is renamed over the target.
 */
export class FilePresetRepository implements PresetRepository {
  private writes: Promise<void> = Promise.resolve();
  private readonly log: Logger;

  constructor(
    private readonly filePath: string,
    logger?: Logger,
  ) {
    this.log = logger ?? moduleLogger('presets:file');
  }

  async loadAll(): Promise<Preset[]> {
    const data = await this.read();
    const presets: Preset[] = [];
    for (const [guildId, stations] of Object.entries(data)) {
      for (const [name, value] of Object.entries(stations)) {
        const parsed = tuningSnapshotSchema.safeParse(value);
        if (!parsed.success) {
          this.log.warn({ guildId, name, issues: parsed.error.issues.length }, 'Skipping invalid preset record');
          continue;
        }
        presets.push({ guildId, name, tuning: parsed.data });
      }
    }
    return presets;
  }

  saveGuild(guildId: string, presets: readonly Preset[]): Promise<void> {
    // read-modify-write of a shared file: one write at a time
    const next = this.writes.then(() => this.writeGuild(guildId, presets));
    this.writes = next.catch(() => undefined);
    return next;
  }

  private async writeGuild(guildId: string, presets: readonly Preset[]): Promise<void> {
    const data = await this.read();
    if (presets.length === 0) {
      delete data[guildId];
    } else {
      const stations: Record<string, unknown> = {};
      for (const preset of presets) stations[preset.name] = preset.tuning;
      data[guildId] = stations;
    }

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmp, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
    await fs.rename(tmp, this.filePath);
    this.log.debug({ guildId, count: presets.length }, 'Presets written');
  }

  private async read(): Promise<StationsFile> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return {};
      throw error;
    }
    const parsed = fileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Preset file ${this.filePath} does not map guild ids to stations`);
    }
    return parsed.data;
  }
}
