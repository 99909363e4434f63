import type { Preset } from './preset.js';

/** Durable storage for station presets. */
export interface PresetRepository {
  /** Every stored preset, in each guild's insertion order. */
  loadAll(): Promise<Preset[]>;
  /** Replaces everything stored for the guild. */
  saveGuild(guildId: string, presets: readonly Preset[]): Promise<void>;
}
