// Upload noise around a song title. Song words themselves (mix, edit, remix) are kept:
// "Song - Radio Edit" and "Other Song - Radio Edit" must stay distinct.
const UPLOAD_TAG =
  /[([]\s*(?:official\s+)?(?:music\s+|lyric\s+)?(?:video|audio|lyrics?|visualizer|hd|hq|4k|remaster(?:ed)?|live|acoustic)\s*[)\]]/g;
const BARE_OFFICIAL_VIDEO = /\bofficial\s+(?:music\s+)?video\b/g;
const CHANNEL_SUFFIX = /\|.*$/;
const TOPIC_SUFFIX = /-\s*topic$/;

/** Lower-cased title with upload tags removed, for spotting re-uploads of a played song. */
export function normalizeTitle(raw: string): string {
  return (raw || '')
    .toLowerCase()
    .trim()
    .replace(UPLOAD_TAG, ' ')
    .replace(BARE_OFFICIAL_VIDEO, ' ')
    .replace(CHANNEL_SUFFIX, ' ')
    .trim()
    .replace(TOPIC_SUFFIX, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}
