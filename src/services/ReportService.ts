import { mkdir, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import dayjs from 'dayjs';
import he from 'he';
import open from 'open';
import { config as defaultConfig } from '../config/index.js';
import { ReportError } from '../types/errors.js';
import { Logger } from '../utils/logger.js';
import type { AlbumRecord, AppConfig, ReportConfig } from '../types/index.js';

export type Opener = (target: string) => Promise<unknown>;

/**
 * Launches the default browser. `open` resolves as soon as the launcher is
 * spawned, so a missing launcher only shows up as an `error` event on the
 * child; it is listened for here instead of surfacing as an uncaught exception.
 */
export async function openInBrowser(target: string): Promise<void> {
  const child = await open(target);
  child.once('error', (error) => {
    Logger.debug('Browser launcher exited with an error', { target, error: error.message });
  });

  if (child.pid === undefined) {
    throw new Error(`No browser launcher could be started for ${target}`);
  }
}

export interface ReportGroup {
  heading: string;
  entries: AlbumRecord[];
}

const compareText = (a: string, b: string): number => a.localeCompare(b, undefined, { sensitivity: 'base' });

export function sortForReport(records: AlbumRecord[]): AlbumRecord[] {
  return [...records].sort(
    (a, b) => compareText(a.artist, b.artist) || compareText(a.title, b.title)
  );
}

export function headingFor(artist: string): string {
  const first = artist.trim().charAt(0).toUpperCase();
  return /\p{L}/u.test(first) ? first : '#';
}

export function groupByInitial(records: AlbumRecord[]): ReportGroup[] {
  const groups: ReportGroup[] = [];

  for (const record of sortForReport(records)) {
    const heading = headingFor(record.artist);
    const current = groups[groups.length - 1];
    if (current && current.heading === heading) {
      current.entries.push(record);
    } else {
      groups.push({ heading, entries: [record] });
    }
  }

  return groups;
}

export function isHighlighted(rating: number | undefined, threshold: number): boolean {
  return rating !== undefined && rating >= threshold;
}

const STYLES = `
      body {
        font-family: Arial, sans-serif;
        max-width: 800px;
        margin: 0 auto;
        padding: 20px;
        line-height: 1.6;
      }
      h1 {
        color: #333;
        border-bottom: 1px solid #ddd;
        padding-bottom: 10px;
      }
      ul {
        list-style-type: none;
        padding: 0;
      }
      li {
        margin-bottom: 10px;
        padding: 10px;
        background-color: #f9f9f9;
        border-radius: 5px;
      }
      a {
        color: #0066cc;
        text-decoration: none;
      }
      a:hover {
        text-decoration: underline;
      }
      .letter-heading {
        background-color: #333;
        color: white;
        padding: 5px 10px;
        margin-top: 20px;
        border-radius: 3px;
      }
      .release-date {
        color: #666;
        font-size: 0.8em;
        margin-left: 5px;
      }
      .rating {
        display: inline-block;
        margin-left: 10px;
        background-color: #e9e9e9;
        padding: 2px 6px;
        border-radius: 3px;
        font-size: 0.9em;
      }
      .rating-high {
        background-color: #c8e6c9;
        color: #2e7d32;
        font-weight: bold;
      }
      .genres {
        font-size: 0.8em;
        color: #555;
        margin-top: 3px;
      }
      .source-type {
        display: inline-block;
        font-size: 0.8em;
        background-color: #eee;
        border-radius: 3px;
        padding: 1px 5px;
        margin-left: 5px;
      }`;

export class ReportService {
  private readonly settings: ReportConfig;

  constructor(
    appConfig: AppConfig = defaultConfig,
    private readonly opener: Opener = openInBrowser
  ) {
    this.settings = appConfig.report;
  }

  static reportFileName(runDate: string): string {
    return `new_releases-${runDate}.html`;
  }

  renderEntry(record: AlbumRecord): string {
    const title = he.escape(record.title);
    const titleHtml = record.link
      ? `<a href="${he.escape(record.link)}" target="_blank" rel="noopener">${title}</a>`
      : title;
    const releaseDate = record.releaseDate
      ? ` <span class="release-date">${he.escape(record.releaseDate)}</span>`
      : '';
    const rating =
      record.rating !== undefined
        ? ` <span class="${isHighlighted(record.rating, this.settings.highlightThreshold) ? 'rating rating-high' : 'rating'}">${record.rating.toFixed(2)}</span>`
        : '';
    const badge = `<span class="source-type">${record.sourceType === 'chart' ? 'Chart' : 'List'}</span>`;
    const genres =
      record.genres && record.genres.length > 0
        ? `\n          <div class="genres">Genres: ${record.genres.map((genre) => he.escape(genre)).join(', ')}</div>`
        : '';

    return `        <li>
          <div>${he.escape(record.artist)} - ${titleHtml}${releaseDate}${rating} ${badge}</div>${genres}
        </li>`;
  }

  render(newReleases: AlbumRecord[], runDate: string, generatedAt: Date = new Date()): string {
    const groups = groupByInitial(newReleases);
    const heading = `New Music Releases - ${runDate}`;
    const countLine = `Found ${newReleases.length} new ${newReleases.length === 1 ? 'release' : 'releases'}`;

    const body =
      groups.length === 0
        ? '    <p>No new releases found in this run.</p>'
        : [
            '    <ul>',
            ...groups.flatMap((group) => [
              `        <li class="letter-heading">${he.escape(group.heading)}</li>`,
              ...group.entries.map((record) => this.renderEntry(record)),
            ]),
            '    </ul>',
          ].join('\n');

    return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="UTF-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1.0" />
    <title>${heading}</title>
    <style>${STYLES}
    </style>
  </head>
  <body>
    <h1>${heading}</h1>
    <p>${countLine}</p>
${body}
    <footer class="release-date">Generated ${dayjs(generatedAt).format('YYYY-MM-DD HH:mm')}</footer>
  </body>
</html>
`;
  }

  async writeReport(
    outputDir: string,
    runDate: string,
    newReleases: AlbumRecord[],
    generatedAt: Date = new Date()
  ): Promise<string> {
    const path = join(outputDir, ReportService.reportFileName(runDate));

    try {
      await mkdir(outputDir, { recursive: true });
      await writeFile(path, this.render(newReleases, runDate, generatedAt), 'utf8');
    } catch (error) {
      throw new ReportError(`Cannot write report ${path}`, {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }

    Logger.info(`HTML report generated at ${path}`, { newReleases: newReleases.length });
    return path;
  }

  /** Best effort: a missing browser or display only produces a warning. */
  async openReport(path: string): Promise<boolean> {
    try {
      await this.opener(resolve(path));
      Logger.debug('Opened report in the default browser', { path });
      return true;
    } catch (error) {
      Logger.warn('Could not open the report automatically', {
        path,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
