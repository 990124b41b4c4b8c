import type { CheerioAPI, Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { config as defaultConfig } from '../config/index.js';
import { ExtractionError } from '../types/errors.js';
import { Logger } from '../utils/logger.js';
import { TextNormalizer, parseRating, resolveLink } from '../utils/text.js';
import type {
  AlbumRecord,
  AppConfig,
  ExtractionConfig,
  ExtractionResult,
  PageKind,
} from '../types/index.js';

type Selection = Cheerio<Element>;

const LIST_SELECTORS = {
  rows: 'table#user_list tr',
  mainEntry: 'td.main_entry',
  artistHeading: 'h2',
  artistLink: 'a.list_artist',
  albumHeading: 'h3',
  albumLink: 'a.list_album',
  releaseDate: 'span.rel_date',
} as const;

const CHART_SELECTORS = {
  items: 'div.page_charts_section_charts_item',
  titleBlock: '.page_charts_section_charts_item_title',
  localeName: 'span.ui_name_locale_original',
  credited: 'div.page_charts_section_charts_item_credited_text',
  link: 'a.page_charts_section_charts_item_link',
  rating: 'span.page_charts_section_charts_item_details_average_num',
  genres: 'div.page_charts_section_charts_item_genres_primary a.genre',
  releaseDate: 'div.page_charts_section_charts_item_date',
} as const;

export class ExtractionService {
  private readonly settings: ExtractionConfig;

  constructor(appConfig: AppConfig = defaultConfig) {
    this.settings = appConfig.extraction;
  }

  extract($: CheerioAPI, kind: PageKind, sourceFile?: string): ExtractionResult {
    switch (kind) {
      case 'list':
        return this.extractListPage($, sourceFile);
      case 'chart':
        return this.extractChartPage($, sourceFile);
      default:
        throw new ExtractionError('Page layout is neither a list nor a chart', { sourceFile });
    }
  }

  extractListPage($: CheerioAPI, sourceFile?: string): ExtractionResult {
    const records: AlbumRecord[] = [];
    let skippedEntries = 0;

    $(LIST_SELECTORS.rows).each((_, row) => {
      const mainEntry = $(row).find(LIST_SELECTORS.mainEntry).first();
      // Header and spacer rows carry no main entry
      if (mainEntry.length === 0) return;

      const artistHeading = mainEntry.find(LIST_SELECTORS.artistHeading).first();
      const albumHeading = mainEntry.find(LIST_SELECTORS.albumHeading).first();

      const artist = this.listArtist($, artistHeading);
      const albumLink = albumHeading.find(LIST_SELECTORS.albumLink).first();
      const dateSpan = albumHeading.find(LIST_SELECTORS.releaseDate).first();
      const title = albumLink.length
        ? TextNormalizer.clean(albumLink.text())
        : TextNormalizer.clean(albumHeading.clone().find(LIST_SELECTORS.releaseDate).remove().end().text());

      if (!artist || !title) {
        skippedEntries++;
        Logger.debug('Skipping list row without artist or title', { sourceFile, artist, title });
        return;
      }

      const releaseDate = TextNormalizer.stripParentheses(TextNormalizer.clean(dateSpan.text()));

      records.push({
        artist,
        title,
        ...(releaseDate ? { releaseDate } : {}),
        sourceType: 'list',
        ...this.optionalLink(albumLink.attr('href')),
        ...(sourceFile ? { sourceFile } : {}),
      });
    });

    Logger.info(`Extracted ${records.length} list releases`, { sourceFile, skippedEntries });
    return { records, skippedEntries };
  }

  extractChartPage($: CheerioAPI, sourceFile?: string): ExtractionResult {
    const records: AlbumRecord[] = [];
    let skippedEntries = 0;

    $(CHART_SELECTORS.items).each((_, element) => {
      const item = $(element);

      const titleBlock = item.find(CHART_SELECTORS.titleBlock).first();
      const titleElement = titleBlock.length
        ? titleBlock.find(CHART_SELECTORS.localeName).first()
        : item.find(CHART_SELECTORS.localeName).first();
      const title = TextNormalizer.clean(titleElement.text());
      const artist = this.chartArtist($, item.find(CHART_SELECTORS.credited).first());

      if (!artist || !title) {
        skippedEntries++;
        Logger.debug('Skipping chart item without artist or title', { sourceFile, artist, title });
        return;
      }

      const rating = parseRating(item.find(CHART_SELECTORS.rating).first().text());
      const genres = item
        .find(CHART_SELECTORS.genres)
        .map((_, genre) => TextNormalizer.clean($(genre).text()))
        .get()
        .filter((genre) => genre.length > 0);
      const releaseDate = TextNormalizer.clean(item.find(CHART_SELECTORS.releaseDate).first().text());

      records.push({
        artist,
        title,
        ...(releaseDate ? { releaseDate } : {}),
        ...(rating !== undefined ? { rating } : {}),
        genres,
        sourceType: 'chart',
        ...this.optionalLink(item.find(CHART_SELECTORS.link).first().attr('href')),
        ...(sourceFile ? { sourceFile } : {}),
      });
    });

    Logger.info(`Extracted ${records.length} chart releases`, { sourceFile, skippedEntries });
    return { records, skippedEntries };
  }

  private listArtist($: CheerioAPI, heading: Selection): string {
    if (heading.length === 0) return '';

    const names = heading
      .find(LIST_SELECTORS.artistLink)
      .map((_, link) => $(link).text())
      .get();

    if (names.length > 0) {
      return TextNormalizer.joinArtists(names, this.settings.artistSeparator);
    }

    return TextNormalizer.clean(heading.text());
  }

  private chartArtist($: CheerioAPI, credited: Selection): string {
    if (credited.length === 0) return '';

    const localeNames = credited
      .find(CHART_SELECTORS.localeName)
      .map((_, span) => $(span).text())
      .get();
    if (localeNames.length > 0) {
      return TextNormalizer.joinArtists(localeNames, this.settings.artistSeparator);
    }

    const linkNames = credited
      .find('a')
      .map((_, link) => $(link).text())
      .get();
    if (linkNames.length > 0) {
      return TextNormalizer.joinArtists(linkNames, this.settings.artistSeparator);
    }

    return TextNormalizer.clean(credited.text());
  }

  private optionalLink(href: string | undefined): Pick<AlbumRecord, 'link'> {
    const link = resolveLink(href, this.settings.siteBaseUrl);
    return link ? { link } : {};
  }
}
