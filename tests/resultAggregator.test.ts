import { describe, expect, it } from "vitest";
import { ResultAggregator } from "../src/pipeline/resultAggregator";
import { CertOutcome } from "../src/types";

function outcome(position: number, cert: string, refs: string[] = []): CertOutcome {
  return { position, record: { cert, refs }, finalState: "resolved", downloads: [] };
}

describe("result aggregator", () => {
  it("emits in input order regardless of completion order", async () => {
    const emitted: string[] = [];
    const aggregator = new ResultAggregator(3, async (item) => {
      emitted.push(item.record.cert);
    });

    await aggregator.complete(2, outcome(2, "C"));
    expect(emitted).toEqual([]);
    await aggregator.complete(0, outcome(0, "A"));
    expect(emitted).toEqual(["A"]);
    await aggregator.complete(1, outcome(1, "B"));

    expect(emitted).toEqual(["A", "B", "C"]);
    expect(aggregator.emittedCount).toBe(3);
  });

  it("flushes completed outcomes past a gap, in order", async () => {
    const emitted: string[] = [];
    const aggregator = new ResultAggregator(4, async (item) => {
      emitted.push(item.record.cert);
    });

    await aggregator.complete(3, outcome(3, "D"));
    await aggregator.complete(1, outcome(1, "B"));
    await aggregator.flush();

    expect(emitted).toEqual(["B", "D"]);
    expect(aggregator.emittedCount).toBe(2);
  });

  it("rejects a second outcome for the same position", async () => {
    const aggregator = new ResultAggregator(2, async () => undefined);
    await aggregator.complete(0, outcome(0, "A"));

    expect(() => aggregator.complete(0, outcome(0, "A"))).toThrow("already completed");
    expect(() => aggregator.complete(5, outcome(5, "Z"))).toThrow(RangeError);
  });
});
