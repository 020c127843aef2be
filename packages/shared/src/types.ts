/**
 * Library-wide aggregate counts as reported by one successful scrape.
 */
export interface LibraryStats {
  scenesTotal: number;
  imagesTotal: number;
  performersTotal: number;
  studiosTotal: number;
  filesTotal: number;
  filesSizeBytes: number;
}

/**
 * The complete set of values served on /metrics. `up` tells whether the
 * most recent scrape succeeded; the counts are the last known good ones.
 */
export interface StatsSnapshot extends LibraryStats {
  up: boolean;
}

export type ScrapeFailureKind =
  | "network"
  | "timeout"
  | "http_status"
  | "graphql"
  | "malformed"
  | "unexpected";

export interface ScrapeFailure {
  kind: ScrapeFailureKind;
  message: string;
  /** HTTP status, set for http_status failures */
  status?: number;
}

export type ScrapeResult =
  | { ok: true; stats: LibraryStats }
  | { ok: false; error: ScrapeFailure };

export type SchedulerState = "idle" | "scraping";

export interface SchedulerStatus {
  state: SchedulerState;
  running: boolean;
  intervalMs: number;
  lastAttemptAt: string | null;
  lastSuccessAt: string | null;
  consecutiveFailures: number;
  lastFailure: ScrapeFailure | null;
}
