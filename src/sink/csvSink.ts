import fs from "node:fs";
import path from "node:path";
import { toCsvLine } from "../input/csv";
import { CertOutcome, ResultRecord } from "../types";
import { BaseSink } from "./baseSink";

export function renderResultsCsv(records: readonly ResultRecord[]): string {
  const width = records.reduce((max, record) => Math.max(max, record.refs.length), 0);
  const header = ["cert", ...Array.from({ length: width }, (_, i) => `image_${i + 1}`)];
  const lines = [toCsvLine(header)];
  for (const record of records) {
    const cells = Array.from({ length: width }, (_, i) => record.refs[i] ?? "");
    lines.push(toCsvLine([record.cert, ...cells]));
  }
  return lines.join("\n") + "\n";
}

/**
 * Writes one row per certificate. The column count depends on the widest record, so
 * rows are held until {@link close}.
 */
export class CsvResultSink extends BaseSink {
  private readonly records: ResultRecord[] = [];

  constructor(private readonly filePath: string) {
    super();
  }

  async publish(outcome: CertOutcome): Promise<void> {
    this.ensureOpen("CSV");
    this.records.push(outcome.record);
  }

  protected async finish(): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.promises.writeFile(this.filePath, renderResultsCsv(this.records), "utf-8");
  }
}
