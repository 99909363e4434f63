import type { Track } from '../contracts/track.js';
import { normalizeTitle } from '../radio/normalize.js';

/**
 * Tracks played in the current continuous mode-session. Ids are the identity;
 * normalized titles add exclusions for re-uploads of the same song.
 */
export class PlayHistory {
  private readonly ids = new Set<string>();
  private readonly titles = new Set<string>();

  add(track: Track): void {
    this.ids.add(track.id);
    const title = normalizeTitle(track.title);
    if (title) this.titles.add(title);
  }

  has(track: Track): boolean {
    if (this.ids.has(track.id)) return true;
    const title = normalizeTitle(track.title);
    return title.length > 0 && this.titles.has(title);
  }

  hasId(id: string): boolean {
    return this.ids.has(id);
  }

  clear(): void {
    this.ids.clear();
    this.titles.clear();
  }

  get size(): number {
    return this.ids.size;
  }
}
