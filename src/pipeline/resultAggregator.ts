import { CertOutcome } from "../types";

export type OutcomeListener = (outcome: CertOutcome) => Promise<void>;

/**
 * Emits outcomes in input order no matter which certificate finishes first. An
 * outcome completed out of order waits until every earlier position has either
 * been emitted or abandoned by {@link flush}.
 */
export class ResultAggregator {
  private readonly pending = new Map<number, CertOutcome>();
  private readonly emittedPositions = new Set<number>();
  private nextPosition = 0;
  private chain: Promise<void> = Promise.resolve();

  constructor(
    private readonly total: number,
    private readonly listener: OutcomeListener,
  ) {}

  get emittedCount(): number {
    return this.emittedPositions.size;
  }

  /** Records the outcome for `position` and emits every outcome now in order. */
  complete(position: number, outcome: CertOutcome): Promise<void> {
    if (position < 0 || position >= this.total) {
      throw new RangeError(`Position ${position} is outside 0..${this.total - 1}`);
    }
    if (this.pending.has(position) || this.emittedPositions.has(position)) {
      throw new Error(`Outcome for position ${position} (cert ${outcome.record.cert}) was already completed`);
    }
    this.pending.set(position, outcome);
    return this.enqueue(() => this.drainInOrder());
  }

  /**
   * Emits every outcome still buffered, in input order, skipping positions that never
   * completed. Used when the run is cancelled.
   */
  flush(): Promise<void> {
    return this.enqueue(async () => {
      const positions = [...this.pending.keys()].sort((a, b) => a - b);
      for (const position of positions) {
        await this.emit(position);
      }
      this.nextPosition = this.total;
    });
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const next = this.chain.then(task);
    // Keep the chain usable for later callers; the returned promise still rejects.
    this.chain = next.catch(() => undefined);
    return next;
  }

  private async drainInOrder(): Promise<void> {
    while (this.pending.has(this.nextPosition)) {
      await this.emit(this.nextPosition);
      this.nextPosition += 1;
    }
  }

  private async emit(position: number): Promise<void> {
    const outcome = this.pending.get(position);
    if (!outcome) {
      return;
    }
    this.pending.delete(position);
    this.emittedPositions.add(position);
    await this.listener(outcome);
  }
}
