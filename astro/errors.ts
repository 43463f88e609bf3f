/**
 * Error model for calendar computations.
 * Every failure carries a kind so callers can report the originating cause.
 */

export type ComputationErrorKind =
  | "EphemerisUnavailable"
  | "InvalidDate"
  | "CorpusEmpty";

export class ComputationError extends Error {
  constructor(
    public kind: ComputationErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ComputationError";
  }
}

export class EphemerisUnavailableError extends ComputationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EphemerisUnavailable", message, options);
    this.name = "EphemerisUnavailableError";
  }
}

export class InvalidDateError extends ComputationError {
  constructor(public date: string, message: string) {
    super("InvalidDate", message);
    this.name = "InvalidDateError";
  }
}

export class CorpusEmptyError extends ComputationError {
  constructor(public source: string) {
    super("CorpusEmpty", `No verse records available in ${source}`);
    this.name = "CorpusEmptyError";
  }
}
