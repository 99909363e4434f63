// Per-guild FIFO lock. Each guild owns a promise chain; run() appends to the
// tail and waits for the previous link, so tasks for one guild never overlap
// while different guilds proceed in parallel.

export type GuildMutexTask<T> = () => Promise<T> | T;

export class GuildMutex {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly depth = new Map<string, number>();

  async run<T>(guildId: string, task: GuildMutexTask<T>): Promise<T> {
    const previous = this.tails.get(guildId) ?? Promise.resolve();

    let release = (): void => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => done);
    this.tails.set(guildId, tail);
    this.depth.set(guildId, (this.depth.get(guildId) ?? 0) + 1);

    try {
      await previous;
      return await task();
    } finally {
      release();
      const remaining = (this.depth.get(guildId) ?? 1) - 1;
      if (remaining === 0) this.depth.delete(guildId);
      else this.depth.set(guildId, remaining);
      if (this.tails.get(guildId) === tail) this.tails.delete(guildId);
    }
  }

  /** Tasks queued or running for the guild. */
  pending(guildId: string): number {
    return this.depth.get(guildId) ?? 0;
  }

  isLocked(guildId: string): boolean {
    return this.pending(guildId) > 0;
  }
}

export const guildMutex = new GuildMutex();
