import { describe, it, expect } from 'vitest';
import { GuildMutex } from '../src/guildMutex.js';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('GuildMutex', () => {
  it('runs tasks for the same guild in submission order', async () => {
    const mutex = new GuildMutex();
    const results: number[] = [];

    const promises = [
      mutex.run('guild1', async () => {
        await delay(30);
        results.push(1);
        return 'a';
      }),
      mutex.run('guild1', async () => {
        await delay(5);
        results.push(2);
        return 'b';
      }),
      mutex.run('guild1', () => {
        results.push(3);
        return 'c';
      }),
    ];

    expect(await Promise.all(promises)).toEqual(['a', 'b', 'c']);
    expect(results).toEqual([1, 2, 3]);
  });

  it('lets different guilds proceed in parallel', async () => {
    const mutex = new GuildMutex();
    const results: string[] = [];

    await Promise.all([
      mutex.run('guild1', async () => {
        await delay(30);
        results.push('guild1');
      }),
      mutex.run('guild2', async () => {
        await delay(5);
        results.push('guild2');
      }),
    ]);

    expect(results).toEqual(['guild2', 'guild1']);
  });

  it('keeps the chain alive after a task throws', async () => {
    const mutex = new GuildMutex();

    const failing = mutex.run('guild1', async () => {
      throw new Error('boom');
    });
    const next = mutex.run('guild1', async () => 'after');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('after');
  });

  it('reports pending work per guild', async () => {
    const mutex = new GuildMutex();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = mutex.run('guild1', () => gate);
    const second = mutex.run('guild1', async () => undefined);

    expect(mutex.pending('guild1')).toBe(2);
    expect(mutex.isLocked('guild1')).toBe(true);
    expect(mutex.isLocked('guild2')).toBe(false);

    release();
    await Promise.all([first, second]);

    expect(mutex.pending('guild1')).toBe(0);
    expect(mutex.isLocked('guild1')).toBe(false);
  });
});
