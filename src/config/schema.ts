import { z } from 'zod';
import type { AppConfig } from '../types/config.js';

export const PathsConfigSchema = z.object({
  inputDir: z.string().min(1, 'Saved pages directory is required'),
  outputDir: z.string().min(1, 'Output directory is required'),
});

export const ExtractionConfigSchema = z.object({
  siteBaseUrl: z.string().url('Site base URL must be a valid URL'),
  artistSeparator: z.string().min(1, 'Artist separator must not be empty'),
});

export const ClassifierConfigSchema = z.object({
  chartMarkers: z.array(z.string().min(1)).min(1, 'At least one chart page marker is required'),
  listMarkers: z.array(z.string().min(1)).min(1, 'At least one list page marker is required'),
});

export const ReportConfigSchema = z.object({
  highlightThreshold: z
    .number()
    .min(0, 'Highlight threshold must be between 0 and 5')
    .max(5, 'Highlight threshold must be between 0 and 5'),
  openReport: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']),
});

export const AppConfigSchema = z.object({
  paths: PathsConfigSchema,
  extraction: ExtractionConfigSchema,
  classifier: ClassifierConfigSchema,
  report: ReportConfigSchema,
  logging: LoggingConfigSchema,
  dryRun: z.boolean(),
}) satisfies z.ZodType<AppConfig>;

export type ValidatedAppConfig = z.infer<typeof AppConfigSchema>;
