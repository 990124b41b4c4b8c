import dotenv from 'dotenv';
import { AppConfigSchema, type ValidatedAppConfig } from './schema.js';
import { ConfigurationError } from '../types/errors.js';

dotenv.config();

const DEFAULT_CHART_MARKERS =
  'section#page_charts_section_charts,div.page_charts_section_charts_item';
const DEFAULT_LIST_MARKERS = 'table#user_list';

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function createConfig(env: NodeJS.ProcessEnv = process.env): ValidatedAppConfig {
  const rawConfig = {
    paths: {
      inputDir: env.SAVED_PAGES_DIR || 'saved_pages',
      outputDir: env.OUTPUT_DIR || 'files',
    },
    extraction: {
      siteBaseUrl: env.SITE_BASE_URL || 'https://rateyourmusic.com',
      artistSeparator: env.ARTIST_SEPARATOR || ' & ',
    },
    classifier: {
      chartMarkers: splitList(env.CHART_PAGE_MARKERS || DEFAULT_CHART_MARKERS),
      listMarkers: splitList(env.LIST_PAGE_MARKERS || DEFAULT_LIST_MARKERS),
    },
    report: {
      highlightThreshold: parseFloat(env.HIGHLIGHT_RATING_THRESHOLD || '3.6'),
      openReport: env.OPEN_REPORT !== 'false',
    },
    logging: {
      level: env.LOG_LEVEL || 'info',
    },
    dryRun: env.DRY_RUN === 'true',
  };

  const result = AppConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  return result.data;
}

export const config = createConfig();

export function printConfigSummary(appConfig: ValidatedAppConfig = config): void {
  console.log('Configuration Summary:');
  console.log(`- Saved Pages: ${appConfig.paths.inputDir}`);
  console.log(`- Output: ${appConfig.paths.outputDir}`);
  console.log(`- Dry Run: ${appConfig.dryRun ? 'YES' : 'NO'}`);
  console.log(`- Open Report: ${appConfig.report.openReport ? 'YES' : 'NO'}`);
  console.log(`- Highlight Threshold: ${appConfig.report.highlightThreshold.toFixed(2)}`);
  console.log(`- Chart Markers: ${appConfig.classifier.chartMarkers.join(', ')}`);
  console.log(`- List Markers: ${appConfig.classifier.listMarkers.join(', ')}`);
  console.log(`- Log Level: ${appConfig.logging.level}`);
}
