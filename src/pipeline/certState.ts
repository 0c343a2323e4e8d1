import { InvalidStateTransition } from "../core/errors";
import { Logger } from "../observability";
import { CertificateIdentifier, CertState } from "../types";

export const VALID_CERT_TRANSITIONS: Record<CertState, readonly CertState[]> = {
  pending: ["requested"],
  // A failed lookup goes straight to emission with an empty record.
  requested: ["parsed", "emitted"],
  parsed: ["resolved"],
  resolved: ["emitted"],
  emitted: [],
};

export function isTerminalCertState(state: CertState): boolean {
  return state === "emitted";
}

/** Tracks one certificate through lookup, parse, download and emission. */
export class CertStateMachine {
  private current: CertState = "pending";

  constructor(
    readonly cert: CertificateIdentifier,
    private readonly logger?: Logger,
  ) {}

  get state(): CertState {
    return this.current;
  }

  canTransition(target: CertState): boolean {
    return VALID_CERT_TRANSITIONS[this.current].includes(target);
  }

  transition(target: CertState): void {
    if (!this.canTransition(target)) {
      throw new InvalidStateTransition(this.cert, this.current, target);
    }
    this.logger?.debug("cert_state", { cert: this.cert, from: this.current, to: target });
    this.current = target;
  }
}
