export interface WatchlistConfig {
  path: string;
  column: string;
}

export interface ReportConfig {
  /** Empty means `sec_report_<date>.html` in the working directory. */
  path: string;
  assetsDir: string;
  title: string;
}

export interface AppConfig {
  archiveBaseUrl: string;
  tickersUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  enrichConcurrency: number;
  continueOnFilingError: boolean;
  forms: string[];
  reportDate?: string;
  lookbackDays: number;
  includeWeekends: boolean;
  watchlist: WatchlistConfig;
  report: ReportConfig;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "watchlist" | "report">> & {
  watchlist?: Partial<WatchlistConfig>;
  report?: Partial<ReportConfig>;
};
