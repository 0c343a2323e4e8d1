export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  cert?: string;
  url?: string;
  pageUrl?: string;
  operation?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "certs_read"
  | "lookups_ok"
  | "lookups_failed"
  | "refs_found"
  | "downloads_ok"
  | "downloads_failed"
  | "records_emitted";

export type MetricTimerName = "lookup_ms" | "download_ms";
