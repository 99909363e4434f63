// Radio candidates that are clearly not songs: talk, reactions, long-form mixes.
const NON_SONG_PATTERNS: RegExp[] = [
  /\binterview\b/i,
  /\bpodcast\b/i,
  /\breaction\b/i,
  /\breview\b/i,
  /\bfull album\b/i,
  /\bcomplete album\b/i,
  /\blive stream\b/i,
  /\blivestream\b/i,
  /\bmaking of\b/i,
  /\bbehind the scenes\b/i,
  /\bdocumentary\b/i,
  /\btutorial\b/i,
  /\blesson\b/i,
  /\bhow to\b/i,
  /\bcompilation\b/i,
  /\bmix 20\d\d\b/i,
  /\b\d+ hours?\b/i,
  /\bplaylist\b/i,
  /\bnonstop\b/i,
  /\bmegamix\b/i,
];

export const MIN_SONG_DURATION_MS = 90_000;
export const MAX_SONG_DURATION_MS = 480_000;

/** `durationMs` of 0 means unknown and is not held against the track. */
export function isLikelySong(title: string, durationMs: number): boolean {
  if (NON_SONG_PATTERNS.some((pattern) => pattern.test(title))) return false;
  if (durationMs > 0 && (durationMs < MIN_SONG_DURATION_MS || durationMs > MAX_SONG_DURATION_MS)) return false;
  return true;
}
