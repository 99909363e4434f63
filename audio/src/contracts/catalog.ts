import type { Track } from './track.js';

export type SteeringIntent = 'radio' | 'artist';

/**
 * Recommendation request. `energy` is an opaque numeric hint: the core only
 * clamps and forwards it.
 */
export interface Steering {
  intent: SteeringIntent;
  description: string;
  energy: number;
  avoid: ReadonlySet<string>;
  /** Radio only: a track to find similar tracks to, ahead of the description. */
  seed?: Track;
}

export interface CatalogClient {
  /** Resolves free text or a URL. An empty array means nothing was found. */
  search(text: string): Promise<Track[]>;
  /** Ordered candidates, best first. May be empty. */
  recommend(steering: Steering): Promise<Track[]>;
}
