import type { CatalogClient, Steering } from '../contracts/catalog.js';
import type { Track } from '../contracts/track.js';
import { CatalogUnavailableError, NoNewCandidatesError } from '../errors.js';
import { isLikelySong } from './song-filter.js';

const NO_AVOID: ReadonlySet<string> = new Set();

export interface SelectionOptions {
  /** True for tracks already played in this mode-session. */
  isPlayed: (track: Track) => boolean;
  /** Radio only: skip candidates that do not look like songs. */
  songsOnly: boolean;
  /** Throws StaleSelectionError once the issuing session generation is gone. */
  checkpoint: () => void;
  guildId?: string;
}

/**
 * Radio widening: full request, then without the seed track, then without
 * avoid, then also at neutral energy.
 */
export function radioLadder(steering: Steering): Steering[] {
  const { seed, ...unseeded } = steering;
  const ladder: Steering[] = [steering];
  if (seed) ladder.push(unseeded);
  if (steering.avoid.size > 0) ladder.push({ ...unseeded, avoid: NO_AVOID });
  if (steering.energy !== 0) ladder.push({ ...unseeded, avoid: NO_AVOID, energy: 0 });
  return ladder;
}

export function autoplayLadder(artist: string): Steering[] {
  return [
    { intent: 'artist', description: artist, energy: 0, avoid: NO_AVOID },
    { intent: 'artist', description: `${artist} songs`, energy: 0, avoid: NO_AVOID },
  ];
}

export function pickCandidate(candidates: readonly Track[], steering: Steering, options: SelectionOptions): Track | undefined {
  return candidates.find((track) => {
    if (options.isPlayed(track)) return false;
    if (steering.avoid.has(track.id)) return false;
    if (options.songsOnly && !isLikelySong(track.title, track.durationMs)) return false;
    return true;
  });
}

/**
 * Walks the ladder until a step yields an unplayed candidate.
 * Catalog failures abort the walk; an exhausted ladder is NoNewCandidates.
 */
export async function selectCandidate(
  catalog: CatalogClient,
  ladder: readonly Steering[],
  options: SelectionOptions,
): Promise<Track> {
  for (const steering of ladder) {
    let candidates: Track[];
    try {
      candidates = await catalog.recommend(steering);
    } catch (error) {
      options.checkpoint();
      throw new CatalogUnavailableError(error, options.guildId);
    }
    options.checkpoint();
    const pick = pickCandidate(candidates, steering, options);
    if (pick) return pick;
  }
  throw new NoNewCandidatesError(options.guildId);
}
