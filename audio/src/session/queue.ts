import type { Track } from '../contracts/track.js';
import { EmptyQueueError } from '../errors.js';

/** FIFO of pending tracks for manual mode. */
export class TrackQueue {
  private items: Track[] = [];

  enqueue(track: Track): number {
    this.items.push(track);
    return this.items.length;
  }

  dequeue(): Track {
    const next = this.items.shift();
    if (!next) throw new EmptyQueueError();
    return next;
  }

  /** First `n` entries without removing them. Omit `n` for the whole queue. */
  peek(n?: number): Track[] {
    return n === undefined ? [...this.items] : this.items.slice(0, Math.max(0, n));
  }

  clear(): void {
    this.items = [];
  }

  get size(): number {
    return this.items.length;
  }
}
