export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface PathsConfig {
  inputDir: string;
  outputDir: string;
}

export interface ExtractionConfig {
  siteBaseUrl: string;
  artistSeparator: string;
}

export interface ClassifierConfig {
  chartMarkers: string[];
  listMarkers: string[];
}

export interface ReportConfig {
  highlightThreshold: number;
  openReport: boolean;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface AppConfig {
  paths: PathsConfig;
  extraction: ExtractionConfig;
  classifier: ClassifierConfig;
  report: ReportConfig;
  logging: LoggingConfig;
  dryRun: boolean;
}

export interface CLIOptions {
  input?: string;
  output?: string;
  open?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
}
