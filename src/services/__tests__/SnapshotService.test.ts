import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, readdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { SnapshotService, toStoredAlbum } from '../SnapshotService.js';
import { SnapshotError } from '../../types/errors.js';
import { album, makeTempDir, removeDir } from './helpers.js';

describe('SnapshotService', () => {
  const snapshots = new SnapshotService();
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('snapshots');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe('deduplicate', () => {
    it('merges records differing only in case and whitespace', () => {
      const result = snapshots.deduplicate([
        album('Artist A', 'Title X'),
        album('  artist a ', 'TITLE   x'),
        album('Artist B', 'Title Y'),
      ]);

      expect(result.removed).toBe(1);
      expect(result.records).toEqual([album('Artist A', 'Title X'), album('Artist B', 'Title Y')]);
    });

    it('prefers the chart record over a list-only one', () => {
      const listOnly = album('Artist A', 'Title X', { releaseDate: '2024', sourceFile: 'list.html' });
      const chart = album('artist a', 'title x', {
        sourceType: 'chart',
        rating: 3.75,
        genres: ['Ambient'],
        sourceFile: 'chart.html',
      });

      const { records } = snapshots.deduplicate([listOnly, chart]);

      expect(records).toEqual([
        {
          artist: 'artist a',
          title: 'title x',
          sourceType: 'chart',
          rating: 3.75,
          genres: ['Ambient'],
          sourceFile: 'chart.html',
          releaseDate: '2024',
        },
      ]);
    });

    it('keeps an earlier chart record when a list row follows it', () => {
      const chart = album('Artist A', 'Title X', { sourceType: 'chart', rating: 3.1, genres: [] });

      const { records } = snapshots.deduplicate([chart, album('Artist A', 'Title X')]);

      expect(records).toEqual([chart]);
    });
  });

  describe('merge', () => {
    it('reports only identities missing from the prior snapshot', () => {
      const a = album('Artist A', 'Title X');
      const b = album('Artist B', 'Title Y');

      const result = snapshots.merge([{ ...a, firstSeen: '2026-10-01' }], [a, b], '2026-10-19');

      expect(result.newReleases).toEqual([b]);
      expect(result.merged).toEqual([
        { ...a, firstSeen: '2026-10-01' },
        { ...b, firstSeen: '2026-10-19' },
      ]);
      expect(result.duplicatesRemoved).toBe(0);
    });

    it('keeps prior albums that were not extracted again', () => {
      const prior = [album('Old Artist', 'Old Title', { firstSeen: '2026-01-02' })];

      const result = snapshots.merge(prior, [album('New Artist', 'New Title')], '2026-10-19');

      expect(result.merged.map((record) => record.artist)).toEqual(['Old Artist', 'New Artist']);
    });

    it('does not let a list row erase chart data already stored', () => {
      const stored = album('Artist A', 'Title X', {
        sourceType: 'chart',
        rating: 3.9,
        genres: ['Jazz'],
        firstSeen: '2026-09-01',
      });

      const result = snapshots.merge([stored], [album('Artist A', 'Title X', { releaseDate: '2025' })], '2026-10-19');

      expect(result.newReleases).toEqual([]);
      expect(result.merged).toEqual([{ ...stored, releaseDate: '2025' }]);
    });
  });

  describe('findPriorSnapshot', () => {
    it('picks the newest file by the date in its name', async () => {
      await writeFile(join(dir, 'albums-2026-10-10.json'), '[]');
      await writeFile(join(dir, 'albums-2026-09-30.json'), '[]');
      await writeFile(join(dir, 'albums-2026-10-25.json'), '[]');
      await writeFile(join(dir, 'albums-2026-13-01.json'), '[]');
      await writeFile(join(dir, 'new_releases-2026-10-18.html'), '');

      expect(await snapshots.findPriorSnapshot(dir, '2026-10-19')).toBe(join(dir, 'albums-2026-10-10.json'));
    });

    it('counts a snapshot written earlier on the same date', async () => {
      await writeFile(join(dir, 'albums-2026-10-10.json'), '[]');
      await writeFile(join(dir, 'albums-2026-10-19.json'), '[]');

      expect(await snapshots.findPriorSnapshot(dir, '2026-10-19')).toBe(join(dir, 'albums-2026-10-19.json'));
    });

    it('returns null when there is no history', async () => {
      expect(await snapshots.findPriorSnapshot(dir, '2026-10-19')).toBeNull();
      expect(await snapshots.findPriorSnapshot(join(dir, 'not-created'), '2026-10-19')).toBeNull();
    });
  });

  describe('readSnapshot', () => {
    it('rejects a snapshot that is not JSON', async () => {
      const path = join(dir, 'albums-2026-10-01.json');
      await writeFile(path, '[{"artist": "A",');

      await expect(snapshots.readSnapshot(path)).rejects.toBeInstanceOf(SnapshotError);
      await expect(snapshots.readSnapshot(path)).rejects.toThrow('is not valid JSON');
    });

    it('rejects a snapshot with the wrong shape', async () => {
      const path = join(dir, 'albums-2026-10-01.json');
      await writeFile(path, JSON.stringify([{ artist: 'A', title: 'B', source_type: 'radio' }]));

      await expect(snapshots.readSnapshot(path)).rejects.toThrow('does not match the album schema');
    });

    it('reads snapshots written by older versions', async () => {
      const path = join(dir, 'albums-2026-10-01.json');
      await writeFile(
        path,
        JSON.stringify([
          {
            artist: 'Artist A',
            album: 'Title X',
            link: '',
            new: true,
            scraped_on: '2025-03-01',
            source_file: 'saved_pages/list.html',
            source_type: 'releases',
          },
          { artist: 'Artist B', album: 'Title Y', rating: 'N/A', genres: [], source_type: 'chart' },
          { artist: 'Artist C', album: 'Title Z', rating: '3.71', genres: ['Folk'], source_type: 'chart' },
        ])
      );

      const records = await snapshots.readSnapshot(path);

      expect(records).toEqual([
        {
          artist: 'Artist A',
          title: 'Title X',
          sourceType: 'list',
          sourceFile: 'saved_pages/list.html',
          firstSeen: '2025-03-01',
        },
        { artist: 'Artist B', title: 'Title Y', genres: [], sourceType: 'chart' },
        { artist: 'Artist C', title: 'Title Z', rating: 3.71, genres: ['Folk'], sourceType: 'chart' },
      ]);
    });
  });

  describe('writeSnapshot', () => {
    it('writes the dated file with snake_case keys and leaves older files alone', async () => {
      await writeFile(join(dir, 'albums-2026-10-01.json'), '[]');
      const records = [album('Artist A', 'Title X', { sourceType: 'chart', rating: 3.6, genres: ['Rock'] })];

      const path = await snapshots.writeSnapshot(dir, '2026-10-19', records);

      expect(path).toBe(join(dir, 'albums-2026-10-19.json'));
      expect(JSON.parse(await readFile(path, 'utf8'))).toEqual([
        { artist: 'Artist A', title: 'Title X', source_type: 'chart', rating: 3.6, genres: ['Rock'] },
      ]);
      expect(await readFile(join(dir, 'albums-2026-10-01.json'), 'utf8')).toBe('[]');
      expect((await readdir(dir)).sort()).toEqual(['albums-2026-10-01.json', 'albums-2026-10-19.json']);
    });

    it('cleans up the temporary file when the final rename fails', async () => {
      await mkdir(join(dir, 'albums-2026-10-19.json'));

      await expect(snapshots.writeSnapshot(dir, '2026-10-19', [album('A', 'B')])).rejects.toBeInstanceOf(
        SnapshotError
      );
      expect(await readdir(dir)).toEqual(['albums-2026-10-19.json']);
    });

    it('round-trips through readSnapshot', async () => {
      const records = [
        album('Artist A', 'Title X', { releaseDate: '2024', link: 'https://example.com/x', firstSeen: '2026-10-19' }),
      ];

      const path = await snapshots.writeSnapshot(dir, '2026-10-19', records);

      expect(await snapshots.readSnapshot(path)).toEqual(records);
    });
  });

  it('maps records to the stored key names', () => {
    expect(toStoredAlbum(album('A', 'B', { releaseDate: '2020', sourceFile: 'x.html' }))).toEqual({
      artist: 'A',
      title: 'B',
      source_type: 'list',
      release_date: '2020',
      source_file: 'x.html',
    });
  });
});
