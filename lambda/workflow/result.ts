/**
 * Explicit outcome types threaded through the pipeline in place of
 * exception-driven control flow.
 */

export type StepOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export type AttemptOutcome<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'retryable'; reason: string }
  | { kind: 'fatal'; reason: string };

export function succeeded<T>(value: T): StepOutcome<T> {
  return { ok: true, value };
}

export function failed<T = never>(error: string): StepOutcome<T> {
  return { ok: false, error };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
