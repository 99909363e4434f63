import { z } from 'zod';
import type { TuningSnapshot } from '../radio/tuning.js';

export interface Preset {
  guildId: string;
  /** Lower-cased and trimmed. */
  name: string;
  tuning: TuningSnapshot;
}

export const tuningSnapshotSchema = z.object({
  description: z.string().min(1),
  energy: z.number().int(),
  directions: z.array(z.string()),
});

export function normalizePresetName(name: string): string {
  return name.trim().toLowerCase();
}

export function copySnapshot(snapshot: TuningSnapshot): TuningSnapshot {
  return { description: snapshot.description, energy: snapshot.energy, directions: [...snapshot.directions] };
}
