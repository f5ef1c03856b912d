import { describe, expect, it } from 'vitest';
import { SongMatcher, buildCacheKey, cleanTitle, normalizeKey, similarity } from './matching.js';
import { track } from '../testing/fakes.js';

describe('normalizeKey', () => {
  it('folds case, diacritics and punctuation', () => {
    expect(normalizeKey('Sigur Rós')).toBe('sigur ros');
    expect(normalizeKey("Don't Stop")).toBe('dont stop');
    expect(normalizeKey('  Up  in the   Air! ')).toBe('up in the air');
  });

  it('builds the cache key from artist and title only', () => {
    expect(buildCacheKey('Loscil', 'Bell Flame')).toBe('loscil - bell flame');
  });
});

describe('cleanTitle', () => {
  it('strips version decorations', () => {
    expect(cleanTitle('Bell Flame - 2016 Remaster')).toBe('Bell Flame');
    expect(cleanTitle('Bell Flame (Live)')).toBe('Bell Flame');
    expect(cleanTitle('Bell Flame')).toBe('Bell Flame');
  });
});

describe('SongMatcher', () => {
  const song = { artist: 'Loscil', title: 'Bell Flame' };

  it('queries with the album first when there is one', () => {
    expect(SongMatcher.buildQueries({ ...song, album: 'Sea Island' })).toEqual([
      'track:Bell Flame artist:Loscil album:Sea Island',
      'track:Bell Flame artist:Loscil',
    ]);
    expect(SongMatcher.buildQueries(song)).toEqual(['track:Bell Flame artist:Loscil']);
  });

  it('scores an exact artist and title as 1', () => {
    const m = SongMatcher.score(song, track('a', 'Bell Flame', 'Loscil'));
    expect(m.exact).toBe(true);
    expect(m.confidence).toBe(1);
  });

  it('weights artist and title similarity', () => {
    expect(similarity('abcd', 'abce')).toBe(0.75);
    const m = SongMatcher.score({ artist: 'Loscil', title: 'abcd' }, track('a', 'abce', 'Loscil'));
    expect(m.exact).toBe(false);
    expect(m.confidence).toBe(0.875);
  });

  it('drops candidates below the minimum similarity', () => {
    const candidates = [track('a', 'abce', 'Loscil')];
    const q = { artist: 'Loscil', title: 'abcd' };
    expect(SongMatcher.rank(q, candidates, { minSimilarity: 0.875, artistWeight: 0.5 })).toHaveLength(1);
    expect(SongMatcher.rank(q, candidates, { minSimilarity: 0.876, artistWeight: 0.5 })).toHaveLength(0);
    expect(SongMatcher.pickBest(q, [], { minSimilarity: 0.5, artistWeight: 0.5 })).toBeNull();
  });

  it('prefers an exact match over a more popular live version', () => {
    const best = SongMatcher.pickBest(song, [
      track('live', 'Bell Flame (Live)', 'Loscil', undefined, 90),
      track('studio', 'Bell Flame', 'Loscil', undefined, 10),
    ]);
    expect(best?.candidate.id).toBe('studio');
  });

  it('breaks ties by album, then popularity, then catalog order', () => {
    const withAlbum = { ...song, album: 'Sea Island' };
    expect(
      SongMatcher.pickBest(withAlbum, [
        track('other', 'Bell Flame', 'Loscil', 'Endless Falls', 80),
        track('same', 'Bell Flame', 'Loscil', 'Sea Island', 5),
      ])?.candidate.id
    ).toBe('same');

    expect(
      SongMatcher.pickBest(song, [track('less', 'Bell Flame', 'Loscil', undefined, 20), track('more', 'Bell Flame', 'Loscil', undefined, 60)])
        ?.candidate.id
    ).toBe('more');

    expect(SongMatcher.pickBest(song, [track('first', 'Bell Flame', 'Loscil'), track('second', 'Bell Flame', 'Loscil')])?.candidate.id).toBe(
      'first'
    );
  });

  it('ranks candidates without popularity below those that report it', () => {
    const ranked = SongMatcher.rank(song, [
      track('ten', 'Bell Flame', 'Loscil', undefined, 10),
      track('unknown', 'Bell Flame', 'Loscil'),
      track('twenty', 'Bell Flame', 'Loscil', undefined, 20),
    ]);
    expect(ranked.map((m) => m.candidate.id)).toEqual(['twenty', 'ten', 'unknown']);
  });

  it('matches one artist of a collaboration', () => {
    const m = SongMatcher.score({ artist: 'Emeralds', title: 'Up in the Air' }, {
      id: 'c',
      uri: 'spotify:track:c',
      name: 'Up in the Air',
      artists: ['Emeralds', 'Mark McGuire'],
    });
    expect(m.exact).toBe(true);
  });
});
