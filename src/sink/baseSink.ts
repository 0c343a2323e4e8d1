import { CertOutcome } from "../types";
import { ResultSink } from "./types";

export abstract class BaseSink implements ResultSink {
  private closed = false;

  abstract publish(outcome: CertOutcome): Promise<void>;

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.finish();
  }

  protected async finish(): Promise<void> {
    return;
  }

  protected ensureOpen(name: string): void {
    if (this.closed) {
      throw new Error(`${name} sink is already closed`);
    }
  }
}
