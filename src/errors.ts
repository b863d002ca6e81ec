// src/errors.ts

export class WasteAlertError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type ParseFailureReason =
  | "MissingDate"
  | "InvalidDate"
  | "MissingSummary"
  | "Unparsable";

/**
 * The calendar document could not be turned into pickup events.
 * `value` carries the offending DTSTART for InvalidDate.
 */
export class ParseFailure extends WasteAlertError {
  constructor(
    readonly reason: ParseFailureReason,
    readonly value?: string,
    options?: { cause?: unknown }
  ) {
    super(
      value === undefined
        ? `Feed parse failed: ${reason}`
        : `Feed parse failed: ${reason} (${value})`,
      options
    );
  }
}

export class StoreFailure extends WasteAlertError {
  constructor(operation: string, cause: unknown) {
    super(`Store operation failed: ${operation}`, { cause });
  }
}

export class FetchFailure extends WasteAlertError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ValidationFailure extends WasteAlertError {}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : "";
    return `${err.message}${cause}`;
  }
  return String(err);
}
