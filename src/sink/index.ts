import path from "node:path";
import { AppConfig } from "../config";
import { CsvResultSink } from "./csvSink";
import { LocalJsonlSink } from "./localJsonlSink";
import { ResultSink } from "./types";

export const RESULTS_BASENAME = "cert_images";

export function createSink(config: AppConfig, runId: string): ResultSink {
  switch (config.sinkType) {
    case "csv":
      return new CsvResultSink(path.resolve(config.outputDirs.results, `${RESULTS_BASENAME}.csv`));
    case "jsonl":
      return new LocalJsonlSink(path.resolve(config.outputDirs.results, `${RESULTS_BASENAME}.jsonl`), runId);
    default:
      throw new Error(`Unsupported sink type: ${String(config.sinkType)}`);
  }
}

export * from "./baseSink";
export * from "./csvSink";
export * from "./localJsonlSink";
export * from "./types";
