import { moduleLogger } from '@dialtone/logger';
import { PresetNotFoundError } from '../errors.js';
import type { TuningSnapshot } from '../radio/tuning.js';
import { copySnapshot, normalizePresetName, type Preset } from './preset.js';
import type { PresetRepository } from './repository.js';

const log = moduleLogger('presets');

/**
 * Named radio tunings per guild. Names are case-insensitive and keep the
 * position of their first save. Every write goes through to the repository
 * before the in-memory view changes.
 */
export class PresetStore {
  private readonly guilds = new Map<string, Map<string, TuningSnapshot>>();

  constructor(private readonly repository: PresetRepository) {}

  async init(): Promise<number> {
    const presets = await this.repository.loadAll();
    this.guilds.clear();
    for (const preset of presets) {
      this.stationsOf(preset.guildId).set(normalizePresetName(preset.name), copySnapshot(preset.tuning));
    }
    log.info({ presets: presets.length, guilds: this.guilds.size }, 'Presets loaded');
    return presets.length;
  }

  async save(guildId: string, name: string, tuning: TuningSnapshot): Promise<Preset> {
    const key = normalizePresetName(name);
    const next = new Map(this.guilds.get(guildId));
    next.set(key, copySnapshot(tuning));
    await this.persist(guildId, next);
    return { guildId, name: key, tuning: copySnapshot(tuning) };
  }

  load(guildId: string, name: string): Preset {
    const key = normalizePresetName(name);
    const tuning = this.guilds.get(guildId)?.get(key);
    if (!tuning) throw new PresetNotFoundError(key, guildId);
    return { guildId, name: key, tuning: copySnapshot(tuning) };
  }

  list(guildId: string): string[] {
    return Array.from(this.guilds.get(guildId)?.keys() ?? []);
  }

  entries(guildId: string): Preset[] {
    return Array.from(this.guilds.get(guildId)?.entries() ?? [], ([name, tuning]) => ({
      guildId,
      name,
      tuning: copySnapshot(tuning),
    }));
  }

  async delete(guildId: string, name: string): Promise<void> {
    const key = normalizePresetName(name);
    const current = this.guilds.get(guildId);
    if (!current?.has(key)) throw new PresetNotFoundError(key, guildId);
    const next = new Map(current);
    next.delete(key);
    await this.persist(guildId, next);
  }

  private async persist(guildId: string, stations: Map<string, TuningSnapshot>): Promise<void> {
    const presets = Array.from(stations, ([name, tuning]) => ({ guildId, name, tuning }));
    await this.repository.saveGuild(guildId, presets);
    if (stations.size === 0) this.guilds.delete(guildId);
    else this.guilds.set(guildId, stations);
    log.debug({ guildId, count: stations.size }, 'Presets saved');
  }

  private stationsOf(guildId: string): Map<string, TuningSnapshot> {
    let stations = this.guilds.get(guildId);
    if (!stations) {
      stations = new Map();
      this.guilds.set(guildId, stations);
    }
    return stations;
  }
}
