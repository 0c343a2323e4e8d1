export interface OutputDirs {
  media: string;
  results: string;
}

export interface SiteSelectors {
  lookupInput: string;
  submitButtonName: string;
  imageContainer: string;
}

export type SinkType = "csv" | "jsonl";

export type ConfigLogLevel = "debug" | "info" | "warn" | "error";

export interface AppConfig {
  baseUrl: string;
  inputPath: string;
  inputColumn: string;
  proxyUrl?: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  concurrency: number;
  requestTimeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  selectors: SiteSelectors;
  defaultExtension: string;
  outputDirs: OutputDirs;
  sinkType: SinkType;
  logLevel: ConfigLogLevel;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs" | "selectors">> & {
  outputDirs?: Partial<OutputDirs>;
  selectors?: Partial<SiteSelectors>;
};
