import type { Track } from '../contracts/track.js';

/** The subset of a lavalink-client track the adapters read. */
export interface LavalinkTrackLike {
  encoded?: string;
  info: {
    identifier: string;
    title: string;
    author: string;
    duration: number;
    uri?: string;
    isStream?: boolean;
  };
}

export function toTrack(track: LavalinkTrackLike): Track {
  const { info } = track;
  return {
    id: info.identifier,
    title: info.title,
    artist: info.author,
    durationMs: info.isStream ? 0 : Math.max(0, info.duration),
    uri: info.uri ?? '',
  };
}

/**
 * Lavalink tracks by id, shared by the catalog (writer) and the driver
 * (reader). Oldest entries go first once the cap is hit.
 */
export class LavalinkTrackCache<T extends LavalinkTrackLike> {
  private readonly entries = new Map<string, T>();

  constructor(private readonly maxEntries = 2000) {}

  remember(track: T): Track {
    const converted = toTrack(track);
    this.entries.delete(converted.id);
    this.entries.set(converted.id, track);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    return converted;
  }

  get(id: string): T | undefined {
    return this.entries.get(id);
  }

  get size(): number {
    return this.entries.size;
  }
}
