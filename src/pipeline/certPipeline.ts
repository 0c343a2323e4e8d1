import { AppConfig } from "../config";
import { processWithConcurrency } from "../core/concurrency";
import { errorMessage } from "../core/errors";
import { responseText, Transport } from "../core/transport";
import { extractMediaReferences } from "../crawl/detailParser";
import { MediaStore } from "../download/mediaStore";
import { buildLookupRequest, locateLookupForm, LookupForm } from "../lookup/lookupForm";
import { Logger, MetricsRegistry } from "../observability";
import { ResultSink } from "../sink";
import { CertificateIdentifier, CertOutcome, MediaDownloadResult } from "../types";
import { CertStateMachine } from "./certState";
import { ResultAggregator } from "./resultAggregator";

export interface CertPipelineDeps {
  config: AppConfig;
  transport: Transport;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: ResultSink;
}

export interface CertPipelineOptions {
  /** Look up and parse only; nothing is downloaded. */
  dryRun?: boolean;
  signal?: AbortSignal;
  /** Lookup form read earlier; the landing page is fetched when absent. */
  form?: LookupForm;
}

export interface CertPipelineSummary {
  certs: number;
  emitted: number;
  abandoned: number;
  lookupsFailed: number;
  refsFound: number;
  downloadsFailed: number;
  cancelled: boolean;
}

export interface CertContext {
  form: LookupForm;
  mediaStore: MediaStore;
  deps: Omit<CertPipelineDeps, "sink">;
  options: CertPipelineOptions;
}

/** Fetches the landing page once and reads the lookup form from it. */
export async function fetchLookupForm(
  deps: Pick<CertPipelineDeps, "config" | "transport" | "logger">,
  signal?: AbortSignal,
): Promise<LookupForm> {
  const { config, transport, logger } = deps;
  logger.info("landing_page_fetch", { pageUrl: config.baseUrl, operation: "landing_page" });
  const response = await transport.fetch(
    { url: config.baseUrl, method: "GET", headers: { accept: "text/html,application/xhtml+xml" } },
    signal,
  );
  const form = locateLookupForm(responseText(response), response.url, config.selectors);
  logger.info("lookup_form_found", {
    pageUrl: response.url,
    action: form.action,
    method: form.method,
    fieldName: form.fieldName,
    submitter: form.submitter?.[0],
  });
  return form;
}

/**
 * Runs one certificate from lookup to resolution. Returns `undefined` when the run
 * was cancelled before the certificate resolved; such a certificate is abandoned and
 * its already stored files are left in place.
 */
export async function processCert(
  cert: CertificateIdentifier,
  position: number,
  machine: CertStateMachine,
  ctx: CertContext,
): Promise<CertOutcome | undefined> {
  const { form, mediaStore, options } = ctx;
  const { config, transport, logger, metrics } = ctx.deps;
  const signal = options.signal;

  machine.transition("requested");
  const request = buildLookupRequest(form, cert);
  const stopTimer = metrics.startTimer("lookup_ms");
  let detailUrl: string;
  let html: string;
  try {
    const response = await transport.fetch(request, signal);
    detailUrl = response.url;
    html = responseText(response);
  } catch (error) {
    stopTimer();
    if (signal?.aborted) {
      return undefined;
    }
    const message = errorMessage(error);
    metrics.incrementCounter("lookups_failed", 1);
    logger.error("lookup_failed", { cert, url: request.url, operation: "lookup", error: message });
    return {
      position,
      record: Object.freeze({ cert, refs: Object.freeze([]) }),
      finalState: "requested",
      downloads: [],
      lookupError: message,
    };
  }
  const durationMs = stopTimer();
  metrics.incrementCounter("lookups_ok", 1);
  logger.info("lookup_ok", { cert, url: detailUrl, durationMs });

  const refs = extractMediaReferences(html, detailUrl, config.selectors.imageContainer);
  machine.transition("parsed");
  metrics.incrementCounter("refs_found", refs.length);
  if (refs.length === 0) {
    logger.warn("no_media_found", { cert, url: detailUrl, operation: "parse" });
  } else {
    logger.info("media_found", { cert, url: detailUrl, count: refs.length });
  }

  let downloads: MediaDownloadResult[];
  if (options.dryRun) {
    downloads = refs.map((ref): MediaDownloadResult => ({ cert, index: ref.position, url: ref.url, status: "skipped" }));
  } else {
    downloads = await mediaStore.storeAll(cert, refs, { referer: detailUrl, signal });
    if (signal?.aborted) {
      return undefined;
    }
  }

  machine.transition("resolved");
  return {
    position,
    record: Object.freeze({ cert, refs: Object.freeze(refs.map((ref) => ref.url)) }),
    finalState: "resolved",
    detailPageUrl: detailUrl,
    downloads,
  };
}

/**
 * Processes `certs` with `config.concurrency` certificates in flight. Every
 * certificate that resolves is emitted exactly once, in input order; a failed lookup
 * still yields an empty record. Only a missing lookup form (or a failed landing page
 * fetch) aborts the run.
 */
export async function runCertPipeline(
  certs: readonly CertificateIdentifier[],
  deps: CertPipelineDeps,
  options: CertPipelineOptions = {},
): Promise<CertPipelineSummary> {
  const { config, logger, metrics, sink } = deps;
  const summary: CertPipelineSummary = {
    certs: certs.length,
    emitted: 0,
    abandoned: 0,
    lookupsFailed: 0,
    refsFound: 0,
    downloadsFailed: 0,
    cancelled: false,
  };

  const form = options.form ?? (await fetchLookupForm(deps, options.signal));
  const mediaStore = new MediaStore({
    transport: deps.transport,
    rootDir: config.outputDirs.media,
    defaultExtension: config.defaultExtension,
    logger: logger.child("media"),
    metrics,
  });
  const ctx: CertContext = { form, mediaStore, deps, options };
  const machines = certs.map((cert) => new CertStateMachine(cert, logger));

  const aggregator = new ResultAggregator(certs.length, async (outcome) => {
    machines[outcome.position].transition("emitted");
    await sink.publish(outcome);
    metrics.incrementCounter("records_emitted", 1);
    summary.emitted += 1;
    summary.refsFound += outcome.record.refs.length;
    summary.downloadsFailed += outcome.downloads.filter((download) => download.status === "failed").length;
    if (outcome.lookupError !== undefined) {
      summary.lookupsFailed += 1;
    }
  });

  await processWithConcurrency(
    certs,
    config.concurrency,
    async (cert, position) => {
      const outcome = await processCert(cert, position, machines[position], ctx);
      if (!outcome) {
        summary.abandoned += 1;
        logger.warn("cert_abandoned", { cert, state: machines[position].state });
        return;
      }
      await aggregator.complete(position, outcome);
    },
    options.signal,
  );

  if (options.signal?.aborted) {
    summary.cancelled = true;
    await aggregator.flush();
    summary.abandoned = certs.length - summary.emitted;
  }

  logger.info("pipeline_summary", { ...summary });
  return summary;
}
