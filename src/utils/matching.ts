import { distance } from 'fastest-levenshtein';
import type { CatalogCandidate, TrackMatch } from '../types/index.js';

export interface MatchPolicy {
  minSimilarity: number; // candidates scoring below are never picked
  artistWeight: number; // share of the score given to artist similarity
}

export interface SongQuery {
  artist: string;
  title: string;
  album?: string;
}

export const DEFAULT_MATCH_POLICY: MatchPolicy = { minSimilarity: 0.8, artistWeight: 0.5 };

// Case-fold and drop diacritics: "Sigur Rós" -> "sigur ros"
function fold(s: string): string {
  return s.normalize('NFKD').replace(/[\u0300-\u036f]/g, '').toLowerCase();
}

// Lowercase, no diacritics, no punctuation, single spaces
export function normalizeKey(s: string): string {
  return fold(s)
    .replace(/[\u2018\u2019'`]/g, '') // don't -> dont
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

// Track Cache key. Album is left out: re-releases share an entry.
export function buildCacheKey(artist: string, title: string): string {
  return `${normalizeKey(artist)} - ${normalizeKey(title)}`;
}

// Strip version decorations that catalogs append to titles
export function cleanTitle(name: string): string {
  const versions = 'remaster(?:ed)?|remix|live|acoustic|radio edit|single version|album version|mono|stereo|explicit|clean';
  return name
    .replace(new RegExp(`\\s*[-–—]\\s*(?:\\d{4}\\s+)?(?:${versions}).*$`, 'i'), '')
    .replace(new RegExp(`\\s*[([](?:\\d{4}\\s+)?(?:${versions}|feat\\.?[^)\\]]*)[^)\\]]*[)\\]]`, 'gi'), '')
    .trim();
}

// Normalized Levenshtein similarity in 0..1
export function similarity(a: string, b: string): number {
  if (a === b) return 1;
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - distance(a, b) / longest;
}

function escapeQuery(s: string): string {
  return s.replace(/[":()[\]{}!^~*?\\]/g, ' ').replace(/\s+/g, ' ').trim();
}

export class SongMatcher {
  // Most specific first; the resolver stops at the first query with candidates
  static buildQueries(song: SongQuery): string[] {
    const base = `track:${escapeQuery(song.title)} artist:${escapeQuery(song.artist)}`;
    const album = song.album ? escapeQuery(song.album) : '';
    return album ? [`${base} album:${album}`, base] : [base];
  }

  static score(song: SongQuery, candidate: CatalogCandidate, policy: MatchPolicy = DEFAULT_MATCH_POLICY): TrackMatch {
    const artist = normalizeKey(song.artist);
    const title = normalizeKey(song.title);
    const candidateArtists = candidate.artists.map(normalizeKey);
    const candidateTitle = normalizeKey(candidate.name);

    const exact = title === candidateTitle && candidateArtists.includes(artist);

    // Spins often credit "A & B" where the catalog lists A and B separately
    const artistForms = [...candidateArtists, normalizeKey(candidate.artists.join(' '))];
    const artistSim = artistForms.reduce((best, form) => Math.max(best, similarity(artist, form)), 0);
    const titleSim = similarity(normalizeKey(cleanTitle(song.title)), normalizeKey(cleanTitle(candidate.name)));

    const weight = Math.min(1, Math.max(0, policy.artistWeight));
    const confidence = exact ? 1 : weight * artistSim + (1 - weight) * titleSim;

    const albumMatch = !!song.album && !!candidate.album && normalizeKey(song.album) === normalizeKey(candidate.album);

    return { candidate, confidence, exact, albumMatch };
  }

  // Rank: exact artist+title, then album match, then score, then popularity, then catalog order.
  static rank(song: SongQuery, candidates: CatalogCandidate[], policy: MatchPolicy = DEFAULT_MATCH_POLICY): TrackMatch[] {
    const scored = candidates
      .map((c, index) => ({ match: SongMatcher.score(song, c, policy), index }))
      .filter(({ match }) => match.confidence >= policy.minSimilarity);

    scored.sort((a, b) => {
      if (a.match.exact !== b.match.exact) return a.match.exact ? -1 : 1;
      if (a.match.albumMatch !== b.match.albumMatch) return a.match.albumMatch ? -1 : 1;
      if (a.match.confidence !== b.match.confidence) return b.match.confidence - a.match.confidence;
      // Unknown popularity ranks below any reported value
      const pa = a.match.candidate.popularity ?? -1;
      const pb = b.match.candidate.popularity ?? -1;
      if (pa !== pb) return pb - pa;
      return a.index - b.index;
    });

    return scored.map(({ match }) => match);
  }

  static pickBest(song: SongQuery, candidates: CatalogCandidate[], policy: MatchPolicy = DEFAULT_MATCH_POLICY): TrackMatch | null {
    return SongMatcher.rank(song, candidates, policy)[0] ?? null;
  }
}
