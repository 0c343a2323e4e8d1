import fs from "node:fs";
import path from "node:path";
import { CertOutcome } from "../types";
import { BaseSink } from "./baseSink";

/** Appends one JSON line per certificate outcome as soon as it is emitted. */
export class LocalJsonlSink extends BaseSink {
  private readonly filePath: string;
  private readonly runId: string;

  constructor(filePath: string, runId: string) {
    super();
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.filePath = filePath;
    this.runId = runId;
  }

  async publish(outcome: CertOutcome): Promise<void> {
    this.ensureOpen("JSONL");
    const line = JSON.stringify({ runId: this.runId, emittedAt: new Date().toISOString(), ...outcome });
    await fs.promises.appendFile(this.filePath, `${line}\n`, "utf-8");
  }
}
