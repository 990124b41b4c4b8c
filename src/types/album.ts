export type SourceType = 'list' | 'chart';

export type PageKind = SourceType | 'unknown';

export interface AlbumRecord {
  artist: string;
  title: string;
  releaseDate?: string;
  rating?: number;
  genres?: string[];
  sourceType: SourceType;
  link?: string;
  sourceFile?: string;
  firstSeen?: string;
}

export interface LoadedPage {
  filePath: string;
  fileName: string;
  format: 'html' | 'mhtml';
  kind: PageKind;
  title?: string;
}

export interface ExtractionResult {
  records: AlbumRecord[];
  skippedEntries: number;
}

export interface SkippedFile {
  file: string;
  reason: string;
}

export interface DedupeResult {
  records: AlbumRecord[];
  removed: number;
}

export interface PriorSnapshot {
  path: string | null;
  date: string | null;
  records: AlbumRecord[];
}

export interface MergeResult {
  merged: AlbumRecord[];
  newReleases: AlbumRecord[];
  duplicatesRemoved: number;
}

export interface RunSummary {
  runDate: string;
  filesFound: number;
  filesProcessed: number;
  filesSkipped: SkippedFile[];
  recordsExtracted: number;
  entriesSkipped: number;
  duplicatesRemoved: number;
  totalAlbums: number;
  newReleases: number;
  priorSnapshotPath: string | null;
  snapshotPath: string | null;
  reportPath: string | null;
}
