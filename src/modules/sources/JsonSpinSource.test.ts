import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { JsonSpinSource } from './JsonSpinSource.js';

describe('JsonSpinSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'spins-'));
    await fs.promises.mkdir(path.join(dir, 'KALX'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  async function writeDay(day: string, content: string): Promise<void> {
    await fs.promises.writeFile(path.join(dir, 'KALX', `${day}.json`), content, 'utf8');
  }

  it('reads every day of the window in both file layouts', async () => {
    await writeDay(
      '2026-10-17',
      JSON.stringify([{ id: 101, show: 'Round Midnight', artist: 'Loscil', song: 'Bell Flame', release: 'Sea Island' }])
    );
    await writeDay(
      '2026-10-18',
      JSON.stringify({ spins: [{ station: 'KALX', showName: 'Round Midnight', artist: 'Emeralds', title: 'Up in the Air', sourceId: '102' }] })
    );

    const spins = await new JsonSpinSource(dir).fetchSpins('KALX', { start: '2026-10-16', end: '2026-10-18' });

    expect(spins).toEqual([
      {
        station: 'KALX',
        showId: null,
        showName: 'Round Midnight',
        artist: 'Loscil',
        title: 'Bell Flame',
        album: 'Sea Island',
        label: null,
        sourceId: 101,
        playedAt: null,
      },
      {
        station: 'KALX',
        showId: null,
        showName: 'Round Midnight',
        artist: 'Emeralds',
        title: 'Up in the Air',
        album: null,
        label: null,
        sourceId: '102',
        playedAt: null,
      },
    ]);
  });

  it('skips files that do not parse', async () => {
    await writeDay('2026-10-17', '[{"artist": ');
    await writeDay('2026-10-18', JSON.stringify({ rows: [] }));

    const spins = await new JsonSpinSource(dir).fetchSpins('KALX', { start: '2026-10-17', end: '2026-10-18' });

    expect(spins).toEqual([]);
  });

  it('drops records that name another station', async () => {
    await writeDay(
      '2026-10-18',
      JSON.stringify([
        { station: 'KPOO', id: 7, show: 'Jazz Hour', artist: 'Loscil', song: 'Bell Flame' },
        { station: 'KALX', id: 8, show: 'Round Midnight', artist: 'Emeralds', song: 'Up in the Air' },
      ])
    );

    const spins = await new JsonSpinSource(dir).fetchSpins('KALX', { start: '2026-10-18', end: '2026-10-18' });

    expect(spins.map((s) => [s.station, s.sourceId])).toEqual([['KALX', 8]]);
  });

  it('returns nothing for a station without a directory', async () => {
    const spins = await new JsonSpinSource(dir).fetchSpins('KPOO', { start: '2026-10-17', end: '2026-10-18' });
    expect(spins).toEqual([]);
  });
});
