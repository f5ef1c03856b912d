import { fileURLToPath } from 'url';
import { describe, expect, it } from 'vitest';
import { PlaylistIndex } from './PlaylistIndex.js';

const TEMPLATE = fileURLToPath(new URL('../../templates/playlists.md.ejs', import.meta.url));
const GENERATED = new Date('2026-10-19T06:00:00Z');

describe('PlaylistIndex', () => {
  it('renders local state grouped by station', async () => {
    const entries = PlaylistIndex.fromState([
      {
        station: 'KPOO',
        showId: 'jazz-hour',
        record: { playlistId: 'pl-3', name: 'KPOO - Jazz Hour', watermark: 55, trackCount: 9, updatedAt: '2026-10-17T12:00:00.000Z' },
      },
      {
        station: 'KALX',
        showId: 'round-midnight',
        record: {
          playlistId: 'pl-1',
          name: 'KALX - Round Midnight',
          watermark: 102,
          trackCount: 2,
          url: 'https://open.spotify.com/playlist/pl-1',
          updatedAt: '2026-10-18T12:00:00.000Z',
        },
      },
    ]);

    const text = await new PlaylistIndex(TEMPLATE).render(entries, GENERATED);

    expect(text).toBe(
      [
        '# Radio Playlists',
        '',
        'Generated 2026-10-19 06:00 UTC. 2 playlists.',
        '',
        '## KALX',
        '',
        '- [KALX - Round Midnight](https://open.spotify.com/playlist/pl-1): 2 tracks, latest ID 102, updated 2026-10-18',
        '',
        '## KPOO',
        '',
        '- KPOO - Jazz Hour: 9 tracks, latest ID 55, updated 2026-10-17',
        '',
      ].join('\n')
    );
  });

  it('lists only generated playlists of configured stations from the remote listing', () => {
    const entries = PlaylistIndex.fromRemote(
      [
        {
          id: 'pl-1',
          name: 'KALX - Round Midnight',
          description: 'Generated from Spinitron playlists. Station: KALX Show ID: round-midnight Latest ID: 102',
          trackCount: 2,
          url: 'https://open.spotify.com/playlist/pl-1',
        },
        { id: 'pl-9', name: 'Road Trip', description: 'songs for the car', trackCount: 40 },
        {
          id: 'pl-7',
          name: 'WXYZ - Late Set',
          description: 'Generated from Spinitron playlists. Station: WXYZ Latest ID: 4',
          trackCount: 1,
        },
      ],
      ['KALX']
    );

    expect(entries).toEqual([
      {
        station: 'KALX',
        name: 'KALX - Round Midnight',
        url: 'https://open.spotify.com/playlist/pl-1',
        trackCount: 2,
        watermark: 102,
        updatedAt: null,
      },
    ]);
  });

  it('says when there is nothing to list', async () => {
    const text = await new PlaylistIndex(TEMPLATE).render([], GENERATED);
    expect(text).toBe('# Radio Playlists\n\nGenerated 2026-10-19 06:00 UTC. 0 playlists.\n');
  });
});
