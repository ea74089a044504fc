/**
 * Error taxonomy for the generation pipeline.
 *
 * Call-level errors (transient, terminal, malformed output) are produced by the
 * resilient client. Data-integrity errors come from validation of the document
 * state. The controller only ever records StageError, which wraps the others
 * with the condition and stage that failed.
 */

export type ErrorKind =
  | "transient"
  | "terminal"
  | "malformed_output"
  | "data_integrity"
  | "stage";

export abstract class PipelineError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class RetryableError extends PipelineError {
  readonly kind = "transient" as const;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class TerminalError extends PipelineError {
  readonly kind = "terminal" as const;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class MalformedOutputError extends PipelineError {
  readonly kind = "malformed_output" as const;

  constructor(
    message: string,
    readonly issues: string[],
    readonly rawOutput: string,
  ) {
    super(message);
  }
}

export class DataIntegrityError extends PipelineError {
  readonly kind = "data_integrity" as const;

  constructor(
    message: string,
    readonly details: string[] = [],
  ) {
    super(message);
  }
}

export class StageError extends PipelineError {
  readonly kind = "stage" as const;

  constructor(
    readonly conditionId: string,
    readonly stage: string,
    readonly causeKind: ErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

// HTTP statuses worth another attempt
export const RETRYABLE_STATUS_CODES = new Set([408, 425, 429, 500, 502, 503, 504]);

const TRANSIENT_MESSAGE =
  /rate limit|overloaded|timeout|timed out|econnre|enotfound|etimedout|socket hang up|network|fetch failed|server error|internal error|unavailable/i;

const TERMINAL_MESSAGE =
  /invalid api key|unauthorized|forbidden|permission denied|authentication|invalid request|bad request/i;

export function statusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("status" in error)) {
    return undefined;
  }
  const { status } = error;
  return typeof status === "number" ? status : undefined;
}

/**
 * Decide whether a failed outbound call may be reissued.
 * Explicit error classes win, then HTTP status, then message heuristics.
 */
export function classifyError(error: unknown): "transient" | "terminal" {
  if (error instanceof RetryableError) return "transient";
  if (error instanceof TerminalError) return "terminal";

  const status = statusOf(error);
  if (status !== undefined) {
    if (RETRYABLE_STATUS_CODES.has(status) || status >= 500) return "transient";
    if (status >= 400) return "terminal";
  }

  if (error instanceof Error) {
    if (error.name === "AbortError" || error.name === "TimeoutError") {
      return "transient";
    }
    const text = `${error.name} ${error.message}`;
    if (TERMINAL_MESSAGE.test(text)) return "terminal";
    if (TRANSIENT_MESSAGE.test(text)) return "transient";
  }

  return "transient";
}

export function errorKindOf(error: unknown): ErrorKind {
  if (error instanceof PipelineError) return error.kind;
  return classifyError(error);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
