import { CertOutcome } from "../types";

export interface ResultSink {
  publish(outcome: CertOutcome): Promise<void>;
  close(): Promise<void>;
}
