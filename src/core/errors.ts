export type ScraperErrorCode =
  | "FORM_NOT_FOUND"
  | "INPUT_NOT_FOUND"
  | "MISSING_COLUMN"
  | "TRANSPORT_ERROR"
  | "INVALID_STATE_TRANSITION"
  | "CONFIG_ERROR";

export abstract class ScraperError extends Error {
  abstract readonly code: ScraperErrorCode;
  /** Fatal errors abort the whole run; everything else is recovered per certificate or per reference. */
  abstract readonly fatal: boolean;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FormNotFound extends ScraperError {
  readonly code = "FORM_NOT_FOUND";
  readonly fatal = true;

  constructor(
    readonly pageUrl: string,
    detail: string,
  ) {
    super(`Lookup form not found on ${pageUrl}: ${detail}`);
  }
}

export class InputNotFound extends ScraperError {
  readonly code = "INPUT_NOT_FOUND";
  readonly fatal = true;

  constructor(readonly inputPath: string) {
    super(`Input file not found: ${inputPath}`);
  }
}

export class MissingColumn extends ScraperError {
  readonly code = "MISSING_COLUMN";
  readonly fatal = true;

  constructor(
    readonly inputPath: string,
    readonly column: string,
    readonly header: string[],
  ) {
    super(`Input file ${inputPath} has no "${column}" column (header: ${header.join(", ") || "<empty>"})`);
  }
}

export class TransportError extends ScraperError {
  readonly code = "TRANSPORT_ERROR";
  readonly fatal = false;

  constructor(
    readonly url: string,
    message: string,
    readonly statusCode?: number,
    readonly attempts = 1,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class InvalidStateTransition extends ScraperError {
  readonly code = "INVALID_STATE_TRANSITION";
  readonly fatal = true;

  constructor(
    readonly cert: string,
    readonly from: string,
    readonly to: string,
  ) {
    super(`Invalid state transition for cert ${cert}: ${from} -> ${to}`);
  }
}

export class ConfigError extends ScraperError {
  readonly code = "CONFIG_ERROR";
  readonly fatal = true;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isFatalError(error: unknown): boolean {
  return error instanceof ScraperError ? error.fatal : true;
}
