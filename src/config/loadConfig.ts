import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../core/errors";
import { AppConfig, ConfigLogLevel, ConfigOverrides, SinkType } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "https://www.cgccards.com/",
  inputPath: "CGC.csv",
  inputColumn: "Cert",
  proxyUrl: undefined,
  userAgent: "Mozilla/5.0 (compatible; cert-media-scraper/1.0)",
  ignoreHttpsErrors: false,
  concurrency: 2,
  requestTimeoutMs: 30_000,
  maxRetries: 2,
  retryDelayMs: 1_000,
  selectors: {
    lookupInput: 'input[type="tel"]',
    submitButtonName: "lookup",
    imageContainer: "div.certlookup-images-item",
  },
  defaultExtension: "jpg",
  outputDirs: {
    media: "images",
    results: ".",
  },
  sinkType: "csv",
  logLevel: "info",
};

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`, { cause: error });
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file must contain a JSON object: ${absolutePath}`);
  }
  // Field types are checked by validateConfig once all layers are merged.
  return parsed as ConfigOverrides;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toSinkType(value: string | undefined, fallback: SinkType): SinkType {
  if (value === "csv" || value === "jsonl") {
    return value;
  }
  return fallback;
}

function toLogLevel(value: string | undefined, fallback: ConfigLogLevel): ConfigLogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return fallback;
}

export function validateConfig(config: AppConfig): AppConfig {
  // Values read from a JSON file are not checked against AppConfig at parse time.
  const strings: Array<[string, unknown]> = [
    ["baseUrl", config.baseUrl],
    ["inputPath", config.inputPath],
    ["inputColumn", config.inputColumn],
    ["userAgent", config.userAgent],
    ["defaultExtension", config.defaultExtension],
    ["selectors.lookupInput", config.selectors.lookupInput],
    ["selectors.submitButtonName", config.selectors.submitButtonName],
    ["selectors.imageContainer", config.selectors.imageContainer],
    ["outputDirs.media", config.outputDirs.media],
    ["outputDirs.results", config.outputDirs.results],
  ];
  if (config.proxyUrl !== undefined) {
    strings.push(["proxyUrl", config.proxyUrl]);
  }
  for (const [key, value] of strings) {
    if (typeof value !== "string") {
      throw new ConfigError(`${key} must be a string, got ${typeof value}`);
    }
  }
  const ignoreHttpsErrors: unknown = config.ignoreHttpsErrors;
  if (typeof ignoreHttpsErrors !== "boolean") {
    throw new ConfigError(`ignoreHttpsErrors must be a boolean, got ${typeof ignoreHttpsErrors}`);
  }

  const positiveInts: Array<[string, number]> = [
    ["concurrency", config.concurrency],
    ["requestTimeoutMs", config.requestTimeoutMs],
  ];
  for (const [key, value] of positiveInts) {
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigError(`${key} must be a positive integer, got ${String(value)}`);
    }
  }

  if (!Number.isInteger(config.maxRetries) || config.maxRetries < 0) {
    throw new ConfigError(`maxRetries must be zero or a positive integer, got ${String(config.maxRetries)}`);
  }
  if (!Number.isFinite(config.retryDelayMs) || config.retryDelayMs < 0) {
    throw new ConfigError(`retryDelayMs must not be negative, got ${String(config.retryDelayMs)}`);
  }
  if (config.sinkType !== "csv" && config.sinkType !== "jsonl") {
    throw new ConfigError(`Unsupported sink type: ${String(config.sinkType)}`);
  }
  if (!config.inputColumn.trim()) {
    throw new ConfigError("inputColumn must not be empty");
  }
  if (!/^[a-z0-9]{1,8}$/i.test(config.defaultExtension)) {
    throw new ConfigError(`defaultExtension must be a short alphanumeric extension, got ${config.defaultExtension}`);
  }

  for (const [key, value] of [
    ["baseUrl", config.baseUrl],
    ["proxyUrl", config.proxyUrl],
  ] as const) {
    if (value === undefined) {
      continue;
    }
    try {
      new URL(value);
    } catch (error) {
      throw new ConfigError(`${key} is not a valid URL`, { cause: error });
    }
  }

  return config;
}

export function loadConfig(configPath?: string, env: Env = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    selectors: {
      ...DEFAULT_CONFIG.selectors,
      ...(fileConfig.selectors ?? {}),
    },
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
  };

  return validateConfig({
    ...merged,
    baseUrl: env.BASE_URL ?? merged.baseUrl,
    inputPath: env.INPUT_PATH ?? merged.inputPath,
    inputColumn: env.INPUT_COLUMN ?? merged.inputColumn,
    proxyUrl: env.PROXY_URL || merged.proxyUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    concurrency: toInt(env.CONCURRENCY, merged.concurrency),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    maxRetries: toInt(env.MAX_RETRIES, merged.maxRetries),
    retryDelayMs: toInt(env.RETRY_DELAY_MS, merged.retryDelayMs),
    selectors: {
      lookupInput: env.LOOKUP_INPUT_SELECTOR ?? merged.selectors.lookupInput,
      submitButtonName: env.SUBMIT_BUTTON_NAME ?? merged.selectors.submitButtonName,
      imageContainer: env.IMAGE_CONTAINER_SELECTOR ?? merged.selectors.imageContainer,
    },
    defaultExtension: env.DEFAULT_EXTENSION ?? merged.defaultExtension,
    outputDirs: {
      media: env.OUTPUT_MEDIA_DIR ?? merged.outputDirs.media,
      results: env.OUTPUT_RESULTS_DIR ?? merged.outputDirs.results,
    },
    sinkType: toSinkType(env.SINK_TYPE, merged.sinkType),
    logLevel: toLogLevel(env.LOG_LEVEL, merged.logLevel),
  });
}

export { DEFAULT_CONFIG };
