// ── Engine Failures ─────────────────────────────────────────────────
// Compose functions return an Outcome instead of throwing, so callers can
// tell "no data" and bad parameters apart from a bug.

export type FailureKind = "no_data" | "invalid_parameter";

export interface EngineFailure {
  kind: FailureKind;
  detail: string;
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; failure: EngineFailure };

/** Thrown by engine helpers when a caller-supplied value is out of range. */
export class InvalidParameterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidParameterError";
  }
}

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T>(kind: FailureKind, detail: string): Outcome<T> {
  return { ok: false, failure: { kind, detail } };
}

export const NO_DATA_DETAIL = "No sales data available";
