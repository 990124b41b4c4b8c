import { readFile, readdir } from 'fs/promises';
import { basename, extname, join } from 'path';
import * as cheerio from 'cheerio';
import { config as defaultConfig } from '../config/index.js';
import { InputError, PageLoadError } from '../types/errors.js';
import { Logger } from '../utils/logger.js';
import { extractHtmlFromArchive, isMultipartArchive } from '../utils/mhtml.js';
import type { AppConfig, ClassifierConfig, LoadedPage, PageKind } from '../types/index.js';

export const SNAPSHOT_EXTENSIONS = ['.html', '.htm', '.mhtml', '.mht'];

export interface ParsedPage extends LoadedPage {
  $: cheerio.CheerioAPI;
}

export class PageLoaderService {
  private readonly classifier: ClassifierConfig;

  constructor(appConfig: AppConfig = defaultConfig) {
    this.classifier = appConfig.classifier;
  }

  /** Saved pages in the directory, by file name. Asset sub-folders are ignored. */
  async listSnapshotFiles(inputDir: string): Promise<string[]> {
    const entries = await readdir(inputDir, { withFileTypes: true }).catch((error: unknown) => {
      throw new InputError(`Cannot read saved pages directory "${inputDir}"`, {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    });

    const files = entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .filter((name) => SNAPSHOT_EXTENSIONS.includes(extname(name).toLowerCase()))
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

    Logger.info(`Found ${files.length} saved pages in ${inputDir}`);
    return files.map((name) => join(inputDir, name));
  }

  async loadPage(filePath: string): Promise<ParsedPage> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (error) {
      throw new PageLoadError(`Cannot read ${filePath}`, {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }

    const fileName = basename(filePath);
    const binary = buffer.toString('latin1');
    const format = isMultipartArchive(binary) ? 'mhtml' : 'html';

    let markup: string;
    try {
      markup = format === 'mhtml' ? extractHtmlFromArchive(binary) : buffer.toString('utf8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'could not decode archive';
      throw new PageLoadError(`${fileName}: ${reason}`, { format });
    }

    if (!markup.trim()) {
      throw new PageLoadError(`${fileName}: file is empty`);
    }

    const $ = cheerio.load(markup);
    const title = $('title').first().text().trim() || undefined;
    const kind = this.classifyPage($);

    Logger.debug(`Loaded ${fileName}`, { format, kind, title: title ?? 'No title found' });

    return { filePath, fileName, format, kind, title, $ };
  }

  classifyPage($: cheerio.CheerioAPI): PageKind {
    if (this.matchesAny($, this.classifier.chartMarkers)) return 'chart';
    if (this.matchesAny($, this.classifier.listMarkers)) return 'list';
    return 'unknown';
  }

  private matchesAny($: cheerio.CheerioAPI, selectors: string[]): boolean {
    return selectors.some((selector) => {
      try {
        return $(selector).length > 0;
      } catch (error) {
        Logger.warn(`Ignoring invalid page marker selector "${selector}"`, {
          error: error instanceof Error ? error.message : 'Unknown error',
        });
        return false;
      }
    });
  }
}
