import { mkdir, readFile, readdir, rename, rm, writeFile } from 'fs/promises';
import { basename, join } from 'path';
import dayjs from 'dayjs';
import { z } from 'zod';
import { SnapshotError } from '../types/errors.js';
import { Logger } from '../utils/logger.js';
import { identityKey, parseRating } from '../utils/text.js';
import type {
  AlbumRecord,
  DedupeResult,
  MergeResult,
  PriorSnapshot,
  SourceType,
} from '../types/index.js';

const SNAPSHOT_FILE_PATTERN = /^albums-(\d{4}-\d{2}-\d{2})\.json$/;

const optionalText = z
  .string()
  .nullish()
  .transform((value) => (value ? value : undefined));

// Older snapshots stored "album" instead of "title", "releases" as the list
// source type and ratings as strings such as "3.71" or "N/A".
const StoredAlbumSchema = z
  .object({
    artist: z.string(),
    title: z.string().optional(),
    album: z.string().optional(),
    source_type: z.enum(['list', 'chart', 'releases']),
    rating: z.union([z.number(), z.string()]).nullish(),
    genres: z.array(z.string()).nullish(),
    release_date: optionalText,
    link: optionalText,
    source_file: optionalText,
    first_seen: optionalText,
    scraped_on: optionalText,
  })
  .refine((stored) => Boolean(stored.title ?? stored.album), {
    message: 'Each album needs a title',
    path: ['title'],
  })
  .transform((stored): AlbumRecord => {
    const sourceType: SourceType = stored.source_type === 'chart' ? 'chart' : 'list';
    const rating = typeof stored.rating === 'number' ? stored.rating : parseRating(stored.rating ?? undefined);
    const firstSeen = stored.first_seen ?? stored.scraped_on;

    return {
      artist: stored.artist,
      title: stored.title ?? stored.album ?? '',
      ...(stored.release_date ? { releaseDate: stored.release_date } : {}),
      ...(rating !== undefined ? { rating } : {}),
      ...(stored.genres ? { genres: stored.genres } : {}),
      sourceType,
      ...(stored.link ? { link: stored.link } : {}),
      ...(stored.source_file ? { sourceFile: stored.source_file } : {}),
      ...(firstSeen ? { firstSeen } : {}),
    };
  });

export const SnapshotFileSchema = z.array(StoredAlbumSchema);

export interface StoredAlbum {
  artist: string;
  title: string;
  source_type: SourceType;
  rating?: number;
  genres?: string[];
  release_date?: string;
  link?: string;
  source_file?: string;
  first_seen?: string;
}

export function toStoredAlbum(record: AlbumRecord): StoredAlbum {
  return {
    artist: record.artist,
    title: record.title,
    source_type: record.sourceType,
    ...(record.rating !== undefined ? { rating: record.rating } : {}),
    ...(record.genres ? { genres: record.genres } : {}),
    ...(record.releaseDate ? { release_date: record.releaseDate } : {}),
    ...(record.link ? { link: record.link } : {}),
    ...(record.sourceFile ? { source_file: record.sourceFile } : {}),
    ...(record.firstSeen ? { first_seen: record.firstSeen } : {}),
  };
}

function carriesChartData(record: AlbumRecord): boolean {
  return record.sourceType === 'chart' || record.rating !== undefined || (record.genres?.length ?? 0) > 0;
}

/** Copies optional fields the preferred record lacks from the other one. */
function fillMissing(preferred: AlbumRecord, other: AlbumRecord): AlbumRecord {
  return {
    ...preferred,
    ...(preferred.releaseDate === undefined && other.releaseDate !== undefined
      ? { releaseDate: other.releaseDate }
      : {}),
    ...(preferred.rating === undefined && other.rating !== undefined ? { rating: other.rating } : {}),
    ...(preferred.genres === undefined && other.genres !== undefined ? { genres: other.genres } : {}),
    ...(preferred.link === undefined && other.link !== undefined ? { link: other.link } : {}),
    ...(preferred.sourceFile === undefined && other.sourceFile !== undefined
      ? { sourceFile: other.sourceFile }
      : {}),
    ...earliestFirstSeen(preferred, other),
  };
}

function earliestFirstSeen(a: AlbumRecord, b: AlbumRecord): Pick<AlbumRecord, 'firstSeen'> {
  const dates = [a.firstSeen, b.firstSeen].filter((date): date is string => date !== undefined);
  if (dates.length === 0) return {};
  return { firstSeen: dates.sort()[0] };
}

function preferRecord(incoming: AlbumRecord, existing: AlbumRecord): AlbumRecord {
  return carriesChartData(existing) && !carriesChartData(incoming)
    ? fillMissing(existing, incoming)
    : fillMissing(incoming, existing);
}

export class SnapshotService {
  static snapshotFileName(runDate: string): string {
    return `albums-${runDate}.json`;
  }

  /**
   * Newest dated snapshot on or before the run date, judged by the date in
   * the file name. Today's own file counts so that re-runs see their output.
   */
  async findPriorSnapshot(outputDir: string, runDate: string): Promise<string | null> {
    let names: string[];
    try {
      names = await readdir(outputDir);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        Logger.info('No previous snapshot directory found', { outputDir });
        return null;
      }
      throw new SnapshotError(`Cannot read output directory "${outputDir}"`, {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }

    const candidates = names
      .map((name) => ({ name, date: SNAPSHOT_FILE_PATTERN.exec(name)?.[1] }))
      .filter(
        (entry): entry is { name: string; date: string } =>
          entry.date !== undefined && dayjs(entry.date).format('YYYY-MM-DD') === entry.date
      )
      .filter((entry) => entry.date <= runDate)
      .sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));

    if (candidates.length === 0) {
      Logger.info('No previous snapshot found; every release counts as new');
      return null;
    }

    return join(outputDir, candidates[0].name);
  }

  async loadPriorSnapshot(outputDir: string, runDate: string): Promise<PriorSnapshot> {
    const path = await this.findPriorSnapshot(outputDir, runDate);
    if (!path) {
      return { path: null, date: null, records: [] };
    }

    const records = await this.readSnapshot(path);
    const date = SNAPSHOT_FILE_PATTERN.exec(basename(path))?.[1] ?? null;
    Logger.info(`Loaded ${records.length} albums from previous snapshot`, { path });
    return { path, date, records };
  }

  async readSnapshot(path: string): Promise<AlbumRecord[]> {
    let content: string;
    try {
      content = await readFile(path, 'utf8');
    } catch (error) {
      throw new SnapshotError(`Cannot read snapshot ${path}`, {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new SnapshotError(`Snapshot ${path} is not valid JSON`, {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }

    const result = SnapshotFileSchema.safeParse(data);
    if (!result.success) {
      const issues = result.error.issues
        .slice(0, 5)
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new SnapshotError(`Snapshot ${path} does not match the album schema`, { issues });
    }

    return result.data;
  }

  /**
   * Collapses records sharing an identity. A record carrying chart data
   * replaces a list-only one; otherwise the first occurrence is kept.
   */
  deduplicate(records: AlbumRecord[]): DedupeResult {
    const unique = new Map<string, AlbumRecord>();

    for (const record of records) {
      const key = identityKey(record);
      const existing = unique.get(key);

      if (!existing) {
        unique.set(key, record);
        continue;
      }

      unique.set(
        key,
        carriesChartData(record) && !carriesChartData(existing)
          ? fillMissing(record, existing)
          : fillMissing(existing, record)
      );
    }

    return { records: Array.from(unique.values()), removed: records.length - unique.size };
  }

  findNewReleases(current: AlbumRecord[], prior: AlbumRecord[]): AlbumRecord[] {
    const known = new Set(prior.map((record) => identityKey(record)));
    return current.filter((record) => !known.has(identityKey(record)));
  }

  /**
   * Union by identity. Current records win over prior ones unless that would
   * swap chart data for a list-only entry; either way the earliest first-seen
   * date and any optional field the winner lacks are kept.
   */
  mergeSnapshots(prior: AlbumRecord[], current: AlbumRecord[], runDate: string): AlbumRecord[] {
    const merged = new Map<string, AlbumRecord>();

    for (const record of this.deduplicate(prior).records) {
      merged.set(identityKey(record), record);
    }

    for (const record of current) {
      const key = identityKey(record);
      const previous = merged.get(key);
      if (previous) {
        merged.set(key, preferRecord(record, previous));
      } else {
        merged.set(key, { ...record, firstSeen: record.firstSeen ?? runDate });
      }
    }

    return Array.from(merged.values());
  }

  merge(prior: AlbumRecord[], extracted: AlbumRecord[], runDate: string): MergeResult {
    const { records, removed } = this.deduplicate(extracted);
    const newReleases = this.findNewReleases(records, prior);
    const merged = this.mergeSnapshots(prior, records, runDate);

    Logger.info(`Found ${newReleases.length} new releases out of ${records.length} extracted albums`, {
      duplicatesRemoved: removed,
      totalAlbums: merged.length,
    });

    return { merged, newReleases, duplicatesRemoved: removed };
  }

  /** Writes albums-<runDate>.json, replacing a file from an earlier run on the same date. */
  async writeSnapshot(outputDir: string, runDate: string, records: AlbumRecord[]): Promise<string> {
    const path = join(outputDir, SnapshotService.snapshotFileName(runDate));
    const tempPath = `${path}.tmp`;

    try {
      await mkdir(outputDir, { recursive: true });
      await writeFile(tempPath, `${JSON.stringify(records.map(toStoredAlbum), null, 2)}\n`, 'utf8');
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw new SnapshotError(`Cannot write snapshot ${path}`, {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }

    Logger.info(`Snapshot saved to ${path}`, { albums: records.length });
    return path;
  }

  static todayStamp(now: Date = new Date()): string {
    return dayjs(now).format('YYYY-MM-DD');
  }
}
