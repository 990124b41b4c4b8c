import { basename } from 'path';
import { PageLoaderService } from './PageLoaderService.js';
import { ExtractionService } from './ExtractionService.js';
import { SnapshotService } from './SnapshotService.js';
import { ReportService, type Opener } from './ReportService.js';
import { Logger } from '../utils/logger.js';
import { config as defaultConfig } from '../config/index.js';
import { AppError, InputError } from '../types/errors.js';
import type { AlbumRecord, AppConfig, CLIOptions, RunSummary, SkippedFile } from '../types/index.js';

/** Everything one pipeline run reads and accumulates. */
export interface RunContext {
  startedAt: Date;
  runDate: string;
  inputDir: string;
  outputDir: string;
  dryRun: boolean;
  openReport: boolean;
  files: string[];
  records: AlbumRecord[];
  filesProcessed: number;
  filesSkipped: SkippedFile[];
  entriesSkipped: number;
}

export interface WorkflowDependencies {
  loader?: PageLoaderService;
  extractor?: ExtractionService;
  snapshots?: SnapshotService;
  reports?: ReportService;
  opener?: Opener;
  now?: () => Date;
}

export class WorkflowService {
  private readonly loader: PageLoaderService;
  private readonly extractor: ExtractionService;
  private readonly snapshots: SnapshotService;
  private readonly reports: ReportService;
  private readonly now: () => Date;

  constructor(
    private readonly appConfig: AppConfig = defaultConfig,
    dependencies: WorkflowDependencies = {}
  ) {
    this.loader = dependencies.loader ?? new PageLoaderService(appConfig);
    this.extractor = dependencies.extractor ?? new ExtractionService(appConfig);
    this.snapshots = dependencies.snapshots ?? new SnapshotService();
    this.reports = dependencies.reports ?? new ReportService(appConfig, dependencies.opener);
    this.now = dependencies.now ?? (() => new Date());
  }

  createContext(options: CLIOptions = {}): RunContext {
    const startedAt = this.now();
    return {
      startedAt,
      runDate: SnapshotService.todayStamp(startedAt),
      inputDir: options.input ?? this.appConfig.paths.inputDir,
      outputDir: options.output ?? this.appConfig.paths.outputDir,
      dryRun: options.dryRun ?? this.appConfig.dryRun,
      openReport: options.open !== false && this.appConfig.report.openReport,
      files: [],
      records: [],
      filesProcessed: 0,
      filesSkipped: [],
      entriesSkipped: 0,
    };
  }

  async run(options: CLIOptions = {}): Promise<RunSummary> {
    const context = this.createContext(options);
    Logger.info('🎵 Starting saved page processing', {
      inputDir: context.inputDir,
      outputDir: context.outputDir,
      runDate: context.runDate,
      dryRun: context.dryRun,
    });

    await this.extractAll(context);
    // Read the prior snapshot before writing anything so a corrupt one aborts cleanly
    const prior = await this.snapshots.loadPriorSnapshot(context.outputDir, context.runDate);
    const { merged, newReleases, duplicatesRemoved } = this.snapshots.merge(
      prior.records,
      context.records,
      context.runDate
    );

    let snapshotPath: string | null = null;
    let reportPath: string | null = null;

    if (context.dryRun) {
      Logger.info(`[DRY RUN] Would save ${merged.length} albums and report ${newReleases.length} new releases`);
    } else {
      // The snapshot goes last: once it exists, a re-run on the same date sees nothing new
      reportPath = await this.reports.writeReport(context.outputDir, context.runDate, newReleases, context.startedAt);
      snapshotPath = await this.snapshots.writeSnapshot(context.outputDir, context.runDate, merged);

      if (context.openReport) {
        await this.reports.openReport(reportPath);
      }
    }

    const summary: RunSummary = {
      runDate: context.runDate,
      filesFound: context.files.length,
      filesProcessed: context.filesProcessed,
      filesSkipped: context.filesSkipped,
      recordsExtracted: context.records.length,
      entriesSkipped: context.entriesSkipped,
      duplicatesRemoved,
      totalAlbums: merged.length,
      newReleases: newReleases.length,
      priorSnapshotPath: prior.path,
      snapshotPath,
      reportPath,
    };

    this.logSummary(summary);
    return summary;
  }

  async extractAll(context: RunContext): Promise<void> {
    context.files = await this.loader.listSnapshotFiles(context.inputDir);
    if (context.files.length === 0) {
      throw new InputError(`No saved pages (.html, .mhtml) found in "${context.inputDir}"`);
    }

    for (const file of context.files) {
      try {
        const page = await this.loader.loadPage(file);
        if (page.kind === 'unknown') {
          this.skipFile(context, page.fileName, 'no recognizable album layout');
          continue;
        }

        const { records, skippedEntries } = this.extractor.extract(page.$, page.kind, page.fileName);
        if (records.length === 0) {
          Logger.warn(`No releases found in ${page.fileName}`, { kind: page.kind });
        }

        context.records.push(...records);
        context.entriesSkipped += skippedEntries;
        context.filesProcessed++;
      } catch (error) {
        if (error instanceof AppError && error.fatal) {
          throw error;
        }
        this.skipFile(context, basename(file), error instanceof Error ? error.message : String(error));
      }
    }

    if (context.filesProcessed === 0) {
      throw new InputError(`None of the ${context.files.length} saved pages could be processed`, {
        skipped: context.filesSkipped,
      });
    }
  }

  private skipFile(context: RunContext, file: string, reason: string): void {
    Logger.warn(`Skipping ${file}: ${reason}`);
    context.filesSkipped.push({ file, reason });
  }

  private logSummary(summary: RunSummary): void {
    Logger.info('📊 Processing completed', {
      filesFound: summary.filesFound,
      filesProcessed: summary.filesProcessed,
      filesSkipped: summary.filesSkipped.length,
      recordsExtracted: summary.recordsExtracted,
      entriesSkipped: summary.entriesSkipped,
      duplicatesRemoved: summary.duplicatesRemoved,
      totalAlbums: summary.totalAlbums,
      newReleases: summary.newReleases,
    });

    if (summary.filesSkipped.length > 0) {
      Logger.warn(`${summary.filesSkipped.length} saved pages were skipped`, {
        skipped: summary.filesSkipped,
      });
    }

    if (summary.snapshotPath) {
      Logger.info(`Snapshot: ${summary.snapshotPath}`);
    }
    if (summary.reportPath) {
      Logger.info(`View new releases at ${summary.reportPath}`);
    }
  }
}
