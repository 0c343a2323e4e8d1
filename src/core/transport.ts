import { setTimeout as delay } from "node:timers/promises";
import { Dispatcher, fetch as undiciFetch } from "undici";
import { AppConfig } from "../config";
import { Logger } from "../observability";
import { errorMessage, TransportError } from "./errors";
import { getFetchDispatcher } from "./fetch";

export type HttpMethod = "GET" | "POST";

export interface TransportRequest {
  url: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: string;
}

export interface TransportResponse {
  /** Final address after redirects. */
  url: string;
  status: number;
  contentType?: string;
  body: Buffer;
}

/**
 * Everything the pipeline needs from the network. Implementations throw
 * {@link TransportError} for network failures and non-success statuses.
 */
export interface Transport {
  fetch(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse>;
}

interface FetchResponseLike {
  ok: boolean;
  status: number;
  url: string;
  headers: { get(name: string): string | null };
  arrayBuffer(): Promise<ArrayBuffer>;
}

interface FetchInit {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
  redirect: "follow";
  dispatcher?: Dispatcher;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>;

export interface HttpTransportOptions {
  userAgent: string;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  proxyUrl?: string;
  ignoreHttpsErrors?: boolean;
  fetchFn?: FetchLike;
  logger?: Logger;
}


export function isRetriableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export class HttpTransport implements Transport {
  private readonly options: HttpTransportOptions;
  private readonly fetchFn: FetchLike;
  private readonly dispatcher?: Dispatcher;

  constructor(options: HttpTransportOptions) {
    this.options = options;
    this.fetchFn = options.fetchFn ?? ((url, init) => undiciFetch(url, init));
    this.dispatcher = getFetchDispatcher({
      proxyUrl: options.proxyUrl,
      ignoreHttpsErrors: options.ignoreHttpsErrors ?? false,
    });
  }

  static fromConfig(config: AppConfig, logger?: Logger, fetchFn?: FetchLike): HttpTransport {
    return new HttpTransport({
      userAgent: config.userAgent,
      timeoutMs: config.requestTimeoutMs,
      maxRetries: config.maxRetries,
      retryDelayMs: config.retryDelayMs,
      proxyUrl: config.proxyUrl,
      ignoreHttpsErrors: config.ignoreHttpsErrors,
      fetchFn,
      logger,
    });
  }

  async fetch(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse> {
    const maxAttempts = this.options.maxRetries + 1;
    let lastError: TransportError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (signal?.aborted) {
        throw new TransportError(request.url, "Request cancelled", undefined, attempt - 1);
      }

      let response: FetchResponseLike;
      let body: Buffer;
      try {
        ({ response, body } = await this.attempt(request, signal));
      } catch (error) {
        lastError = new TransportError(request.url, errorMessage(error), undefined, attempt, { cause: error });
        if (signal?.aborted) {
          throw lastError;
        }
        if (attempt < maxAttempts) {
          this.options.logger?.warn("transport_retry_error", { url: request.url, attempt, error: lastError.message });
          await this.backoff(request.url, attempt, signal);
        }
        continue;
      }

      if (response.ok) {
        return {
          url: response.url || request.url,
          status: response.status,
          contentType: response.headers.get("content-type") ?? undefined,
          body,
        };
      }

      lastError = new TransportError(request.url, `HTTP ${response.status}`, response.status, attempt);
      if (!isRetriableStatus(response.status) || attempt >= maxAttempts) {
        throw lastError;
      }
      this.options.logger?.warn("transport_retry_http", { url: request.url, attempt, statusCode: response.status });
      await this.backoff(request.url, attempt, signal);
    }

    throw lastError ?? new TransportError(request.url, "Request failed", undefined, maxAttempts);
  }

  private backoffMs(attempt: number): number {
    return Math.min(this.options.retryDelayMs * 2 ** (attempt - 1), 10_000);
  }

  /** Waits before the next attempt; cancellation ends the wait with a {@link TransportError}. */
  private async backoff(url: string, attempt: number, signal?: AbortSignal): Promise<void> {
    try {
      await delay(this.backoffMs(attempt), undefined, { signal });
    } catch (error) {
      throw new TransportError(url, "Request cancelled", undefined, attempt, { cause: error });
    }
  }

  private async attempt(
    request: TransportRequest,
    signal?: AbortSignal,
  ): Promise<{ response: FetchResponseLike; body: Buffer }> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);

    try {
      const response = await this.fetchFn(request.url, {
        method: request.method ?? "GET",
        headers: {
          "user-agent": this.options.userAgent,
          ...(request.headers ?? {}),
        },
        body: request.body,
        signal: controller.signal,
        redirect: "follow",
        dispatcher: this.dispatcher,
      });
      const body = Buffer.from(await response.arrayBuffer());
      return { response, body };
    } catch (error) {
      if (timedOut) {
        throw new Error(`Request timed out after ${this.options.timeoutMs}ms`, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}

export function responseText(response: TransportResponse): string {
  return response.body.toString("utf-8");
}
