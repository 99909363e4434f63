/** A playable item as resolved by the catalog. Identity is `id`. */
export interface Track {
  readonly id: string;
  readonly title: string;
  readonly artist: string;
  /** 0 when unknown (streams, unresolved metadata). */
  readonly durationMs: number;
  readonly uri: string;
}
