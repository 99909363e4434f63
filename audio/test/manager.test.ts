import { describe, it, expect, vi } from 'vitest';
import { NotInRadioError, PresetNotFoundError, StaleSelectionError } from '../src/errors.js';
import { GuildMutex } from '../src/guildMutex.js';
import { PresetStore } from '../src/presets/preset-store.js';
import { SessionMetrics } from '../src/services/session-metrics.js';
import { SessionManager, type SessionNotice } from '../src/session/manager.js';
import { FakeCatalog, FakeClock, FakeDriver, MemoryPresetRepository, track } from './support/fakes.js';

function setup() {
  const catalog = new FakeCatalog();
  const driver = new FakeDriver();
  const clock = new FakeClock();
  const repository = new MemoryPresetRepository();
  const presets = new PresetStore(repository);
  const metrics = new SessionMetrics();
  const manager = new SessionManager({
    catalog,
    driver,
    presets,
    metrics,
    now: clock.now,
    mutex: new GuildMutex(),
  });
  const notices: SessionNotice[] = [];
  manager.onNotice((notice) => notices.push(notice));
  return { catalog, driver, clock, repository, presets, metrics, manager, notices };
}

const pool = (...ids: string[]) => ids.map((id) => track(id));

describe('SessionManager', () => {
  it('runs the late-night radio scenario end to end', async () => {
    const { catalog, driver, repository, manager } = setup();
    catalog.recommender = (s) => (s.description === 'jazz piano' ? pool('j1', 'j2', 'j3') : pool('a', 'l2', 'l3'));

    const started = await manager.radio('guild1', 'chill lo-fi');
    expect(started.track.id).toBe('a');

    expect((await manager.dial('guild1', 'up')).energy).toBe(1);
    expect(driver.started).toEqual(['a']);

    const tuned = await manager.tune('guild1', 'jazz piano');
    expect(tuned.directions).toEqual(['chill lo-fi', 'jazz piano']);

    const skipped = await manager.static('guild1');
    expect(skipped.avoided.id).toBe('a');
    expect(skipped.track.id).toBe('j1');
    expect(catalog.recommendCalls[1]).toEqual({
      intent: 'radio',
      description: 'jazz piano',
      energy: 1,
      avoid: new Set(['a']),
    });

    const saved = await manager.saveStation('guild1', 'LateNight');
    expect(saved).toEqual({
      guildId: 'guild1',
      name: 'latenight',
      tuning: { description: 'jazz piano', energy: 1, directions: ['chill lo-fi', 'jazz piano'] },
    });
    expect(repository.saved.get('guild1')).toEqual([saved]);

    await manager.stopRadio('guild1');
    expect(manager.modeOf('guild1')).toBe('idle');
    expect(driver.calls.at(-1)).toBe('halt');

    const loaded = await manager.loadStation('guild1', 'latenight');
    expect(loaded.track.id).toBe('j1');
    expect(loaded.signal).toMatchObject({ description: 'jazz piano', energy: 1, elapsed: 1, directionCount: 2 });
  });

  it('queues commands behind an outstanding catalog request', async () => {
    const { catalog, manager } = setup();
    catalog.recommender = () => pool('a', 'b');
    const release = catalog.hold();

    const radio = manager.radio('guild1', 'x');
    let signalled = false;
    const signal = manager.signal('guild1').then((report) => {
      signalled = true;
      return report;
    });

    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(signalled).toBe(false);

    release();
    await radio;
    expect((await signal).description).toBe('x');
  });

  it('discards an in-flight selection when stop arrives', async () => {
    const { catalog, driver, manager } = setup();
    catalog.recommender = () => pool('a');
    const release = catalog.hold();

    const radio = manager.radio('guild1', 'x');
    await vi.waitFor(() => expect(catalog.recommendCalls).toHaveLength(1));
    const stop = manager.stop('guild1');
    release();

    await expect(radio).rejects.toBeInstanceOf(StaleSelectionError);
    await stop;
    expect(driver.started).toEqual([]);
    expect(manager.modeOf('guild1')).toBe('idle');
  });

  it('routes driver events and reports what happened', async () => {
    const { catalog, driver, manager, notices } = setup();
    catalog.searchResults.set('list', pool('a', 'b'));
    await manager.play('guild1', 'list');

    driver.finish('guild1', 'a');
    await vi.waitFor(() =>
      expect(notices).toEqual([{ type: 'trackStarted', guildId: 'guild1', mode: 'manual', track: track('b') }]),
    );

    driver.finish('guild1', 'b');
    await vi.waitFor(() => expect(notices[1]).toEqual({ type: 'idle', guildId: 'guild1', reason: 'queue-finished' }));
  });

  it('notifies when radio runs out of new tracks after a finish', async () => {
    const { catalog, driver, manager, notices } = setup();
    catalog.recommender = () => pool('a');
    await manager.radio('guild1', 'x');

    driver.finish('guild1', 'a');
    await vi.waitFor(() => expect(notices).toHaveLength(1));

    const [notice] = notices;
    expect(notice?.type).toBe('failed');
    if (notice?.type === 'failed') expect(notice.error.code).toBe('NO_NEW_CANDIDATES');
    expect(manager.modeOf('guild1')).toBe('radio');
  });

  it('ignores events for guilds without a session', async () => {
    const { driver, manager, notices } = setup();
    driver.finish('guild9', 'a');
    await manager.nowPlaying('guild1');
    expect(notices).toEqual([]);
  });

  it('manages stations', async () => {
    const { catalog, manager } = setup();
    catalog.recommender = () => pool('a', 'b');

    await expect(manager.saveStation('guild1', 'x')).rejects.toBeInstanceOf(NotInRadioError);
    await expect(manager.loadStation('guild1', 'missing')).rejects.toBeInstanceOf(PresetNotFoundError);

    await manager.radio('guild1', 'dub');
    await manager.saveStation('guild1', 'first');
    await manager.saveStation('guild1', 'second');
    expect(manager.stations('guild1').map((p) => p.name)).toEqual(['first', 'second']);

    await manager.deleteStation('guild1', 'first');
    await expect(manager.deleteStation('guild1', 'first')).rejects.toBeInstanceOf(PresetNotFoundError);
    expect(manager.stations('guild1').map((p) => p.name)).toEqual(['second']);
  });

  it('exports session metrics', async () => {
    const { catalog, manager, metrics } = setup();
    catalog.recommender = () => pool('a');
    await manager.radio('guild1', 'x');

    const text = await metrics.render();
    expect(text).toContain('dialtone_tracks_started_total{mode="radio"} 1');
    expect(text).toContain('dialtone_active_sessions{mode="radio"} 1');

    await manager.destroy('guild1');
    expect(await metrics.render()).toContain('dialtone_active_sessions{mode="radio"} 0');
  });
});
