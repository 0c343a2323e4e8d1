import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { extractMediaReferences } from "../crawl/detailParser";
import { readCertIdentifiers } from "../input/certSource";
import { LookupForm } from "../lookup/lookupForm";
import { Logger, MetricsRegistry } from "../observability";
import { CertPipelineSummary, fetchLookupForm, runCertPipeline } from "../pipeline";
import { createSink, ResultSink } from "../sink";
import { MediaReference } from "../types";
import { FetchLike, HttpTransport, Transport } from "./transport";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  signal?: AbortSignal;
  /** Overrides for tests; production builds both from `config`. */
  transport?: Transport;
  sink?: ResultSink;
  fetchFn?: FetchLike;
}

export interface ScrapeOptions {
  dryRun: boolean;
  maxCerts?: number;
}

function getTransport(ctx: CommandContext): Transport {
  return ctx.transport ?? HttpTransport.fromConfig(ctx.config, ctx.logger.child("transport"), ctx.fetchFn);
}

export async function runScrape(ctx: CommandContext, options: ScrapeOptions): Promise<CertPipelineSummary> {
  const { config, logger, metrics } = ctx;
  const allCerts = readCertIdentifiers(config.inputPath, { column: config.inputColumn, logger: logger.child("input") });
  const certs = options.maxCerts !== undefined ? allCerts.slice(0, Math.max(options.maxCerts, 0)) : allCerts;
  metrics.incrementCounter("certs_read", certs.length);
  logger.info("scrape_start", {
    certs: certs.length,
    dryRun: options.dryRun,
    concurrency: config.concurrency,
    proxy: config.proxyUrl ? new URL(config.proxyUrl).host : undefined,
  });

  // Nothing is written until the lookup form is known.
  const transport = getTransport(ctx);
  const pipelineLogger = logger.child("pipeline");
  const form = await fetchLookupForm({ config, transport, logger: pipelineLogger }, ctx.signal);

  const sink = ctx.sink ?? createSink(config, ctx.runId);
  try {
    const summary = await runCertPipeline(
      certs,
      { config, transport, logger: pipelineLogger, metrics, sink },
      { dryRun: options.dryRun, signal: ctx.signal, form },
    );
    logger.info("scrape_complete", { ...summary });
    return summary;
  } finally {
    await sink.close();
  }
}

export async function runInspectForm(ctx: CommandContext): Promise<LookupForm> {
  const form = await fetchLookupForm(
    { config: ctx.config, transport: getTransport(ctx), logger: ctx.logger },
    ctx.signal,
  );
  console.log(JSON.stringify(form, null, 2));
  return form;
}

export async function runParseFile(ctx: CommandContext, filePath: string, pageUrl: string): Promise<MediaReference[]> {
  const html = await fs.promises.readFile(path.resolve(filePath), "utf-8");
  const refs = extractMediaReferences(html, pageUrl, ctx.config.selectors.imageContainer);
  if (refs.length === 0) {
    ctx.logger.warn("no_media_found", { url: pageUrl, file: filePath, operation: "parse" });
  }
  for (const ref of refs) {
    console.log(`${ref.position}\t${ref.url}`);
  }
  return refs;
}
