import { moduleLogger } from '@dialtone/logger';
import type { CatalogClient, Steering } from '../contracts/catalog.js';
import type { Track } from '../contracts/track.js';
import { steeringQuery } from '../radio/steering.js';
import type { LavalinkTrackCache, LavalinkTrackLike } from './track-cache.js';

const log = moduleLogger('lavalink:catalog');

export interface LavalinkSearchNode<T extends LavalinkTrackLike> {
  search(query: { query: string }, requester: unknown): Promise<{ tracks: readonly T[] }>;
}

export interface LavalinkCatalogOptions {
  /** Prefix for free-text searches, e.g. `ytsearch:` or `ytmsearch:`. */
  searchPrefix?: string;
  recommendLimit?: number;
}

function isUrl(text: string): boolean {
  return /^https?:\/\//i.test(text.trim());
}

/** YouTube's auto-generated mix for a video, or null for tracks from other sources. */
export function relatedMixUrl(seed: Track): string | null {
  if (!/^https?:\/\/(?:www\.|music\.|m\.)?(?:youtube\.com|youtu\.be)\//i.test(seed.uri)) return null;
  const id = encodeURIComponent(seed.id);
  return `https://www.youtube.com/watch?v=${id}&list=RD${id}`;
}

/**
 * Catalog backed by Lavalink search. Seeded radio requests resolve the seed's
 * related mix; everything else is a keyword search built from the steering.
 */
export class LavalinkCatalogClient<T extends LavalinkTrackLike> implements CatalogClient {
  private readonly searchPrefix: string;
  private readonly recommendLimit: number;

  constructor(
    private readonly resolveNode: () => LavalinkSearchNode<T> | undefined,
    private readonly cache: LavalinkTrackCache<T>,
    options: LavalinkCatalogOptions = {},
  ) {
    this.searchPrefix = options.searchPrefix ?? 'ytsearch:';
    this.recommendLimit = options.recommendLimit ?? 25;
  }

  /** URLs resolve to every track they name; free text to its best match. */
  async search(text: string): Promise<Track[]> {
    const trimmed = text.trim();
    if (isUrl(trimmed)) return this.lookup(trimmed);
    const tracks = await this.lookup(`${this.searchPrefix}${trimmed}`);
    return tracks.slice(0, 1);
  }

  async recommend(steering: Steering): Promise<Track[]> {
    if (steering.intent === 'radio' && steering.seed) return this.related(steering.seed, steering.avoid);
    const query = steeringQuery(steering);
    const tracks = await this.lookup(`${this.searchPrefix}${query}`);
    const picked = this.withoutAvoided(tracks, steering.avoid);
    log.debug({ query, results: tracks.length, kept: picked.length }, 'Recommendations resolved');
    return picked;
  }

  /** Empty when the seed has no related mix or the lookup fails; callers widen to the description. */
  private async related(seed: Track, avoid: ReadonlySet<string>): Promise<Track[]> {
    const url = relatedMixUrl(seed);
    if (!url) return [];
    let tracks: Track[];
    try {
      tracks = await this.lookup(url);
    } catch (error) {
      log.warn({ seed: seed.id, err: error instanceof Error ? error.message : String(error) }, 'Related mix lookup failed');
      return [];
    }
    const picked = this.withoutAvoided(
      tracks.filter((track) => track.id !== seed.id),
      avoid,
    );
    log.debug({ seed: seed.id, results: tracks.length, kept: picked.length }, 'Related tracks resolved');
    return picked;
  }

  private withoutAvoided(tracks: readonly Track[], avoid: ReadonlySet<string>): Track[] {
    const avoidedArtists = this.avoidedArtists(avoid);
    return tracks
      .filter((track) => !avoid.has(track.id) && !avoidedArtists.has(track.artist.toLowerCase()))
      .slice(0, this.recommendLimit);
  }

  private avoidedArtists(avoid: ReadonlySet<string>): Set<string> {
    const artists = new Set<string>();
    for (const id of avoid) {
      const track = this.cache.get(id);
      if (track) artists.add(track.info.author.toLowerCase());
    }
    return artists;
  }

  private async lookup(query: string): Promise<Track[]> {
    const node = this.resolveNode();
    if (!node) throw new Error('No connected Lavalink node');
    const result = await node.search({ query }, null);
    return result.tracks.map((track) => this.cache.remember(track));
  }
}
