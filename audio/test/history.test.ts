import { describe, it, expect } from 'vitest';
import { PlayHistory } from '../src/session/history.js';
import { normalizeTitle } from '../src/radio/normalize.js';
import { track } from './support/fakes.js';

describe('normalizeTitle', () => {
  it('drops upload tags', () => {
    expect(normalizeTitle('Night Drive (Official Video)')).toBe('night drive');
    expect(normalizeTitle('Night Drive (Official Music Video)')).toBe('night drive');
    expect(normalizeTitle('Night Drive [Lyrics]')).toBe('night drive');
    expect(normalizeTitle('Night Drive (HD)')).toBe('night drive');
    expect(normalizeTitle('Night Drive (Remastered)')).toBe('night drive');
    expect(normalizeTitle('Night Drive official video')).toBe('night drive');
  });

  it('drops channel and topic suffixes', () => {
    expect(normalizeTitle('Night Drive | Coastline Records')).toBe('night drive');
    expect(normalizeTitle('Night Drive - Topic')).toBe('night drive');
  });

  it('keeps mix, edit and remix words that name the song', () => {
    expect(normalizeTitle('Lo-fi Beats - Study Mix')).toBe('lo-fi beats - study mix');
    expect(normalizeTitle('Lo-fi Jazz Mix')).toBe('lo-fi jazz mix');
    expect(normalizeTitle('Night Drive (Club Remix)')).toBe('night drive (club remix)');
  });
});

describe('PlayHistory', () => {
  it('tracks membership by id', () => {
    const history = new PlayHistory();
    history.add(track('a'));

    expect(history.hasId('a')).toBe(true);
    expect(history.has(track('a', { title: 'Completely different' }))).toBe(true);
    expect(history.has(track('b'))).toBe(false);
    expect(history.size).toBe(1);
  });

  it('treats re-uploads with the same normalized title as played', () => {
    const history = new PlayHistory();
    history.add(track('a', { title: 'Night Drive (Official Video)' }));

    expect(history.has(track('b', { title: 'Night Drive [Lyrics]' }))).toBe(true);
    expect(history.has(track('c', { title: 'Morning Walk' }))).toBe(false);
  });

  it('keeps distinct songs that share mix or edit words apart', () => {
    const history = new PlayHistory();
    history.add(track('a', { title: 'Lo-fi Beats - Study Mix' }));
    history.add(track('b', { title: 'Solar Drift - Digital Love - Radio Edit' }));

    expect(history.has(track('c', { title: 'Lo-fi Jazz Mix' }))).toBe(false);
    expect(history.has(track('d', { title: 'Solar Drift - Around the Bend - Radio Edit' }))).toBe(false);
    expect(history.has(track('e', { title: 'Lo-fi Beats - Study Mix (Official Audio)' }))).toBe(true);
  });

  it('clear forgets ids and titles', () => {
    const history = new PlayHistory();
    history.add(track('a'));
    history.clear();

    expect(history.has(track('a'))).toBe(false);
    expect(history.size).toBe(0);
  });
});
