import logger from "../utils/logger";
import {
  RetryableError,
  TerminalError,
  classifyError,
  errorMessage,
  statusOf,
} from "../utils/errors";
import { createRandomSource, type RandomSource } from "../utils/random";
import type { ServiceName, ServicePools } from "../utils/servicePools";
import type { CallStats } from "../types/article";

export interface RetryPolicy {
  /** Total attempts for one call, the first one included. */
  maxAttempts: number;
  /** Re-prompts allowed for malformed structured output, counted separately. */
  repairAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
}

export const RETRY_CONFIG: RetryPolicy = {
  maxAttempts: 5,
  repairAttempts: 2,
  baseDelayMs: 1000,
  maxDelayMs: 16000,
  timeoutMs: 120000,
};

/**
 * delay = base * 2^attempt * uniform(0.5, 1.5), capped at maxDelayMs
 */
export function calculateBackoffDelay(
  attempt: number,
  policy: Pick<RetryPolicy, "baseDelayMs" | "maxDelayMs"> = RETRY_CONFIG,
  random: RandomSource = Math.random,
): number {
  const jitter = 0.5 + random();
  const delay = policy.baseDelayMs * Math.pow(2, attempt) * jitter;
  return Math.floor(Math.min(delay, policy.maxDelayMs));
}

export function isRetryableError(error: unknown): boolean {
  return classifyError(error) === "transient";
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function emptyStats(): CallStats {
  return { calls: 0, networkRetries: 0, repairs: 0 };
}

export interface ResilientClientOptions {
  policy?: Partial<RetryPolicy>;
  /** Per-service timeout overrides. */
  timeouts?: Partial<Record<ServiceName, number>>;
  pools?: ServicePools;
  random?: RandomSource;
  seed?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface CallOptions {
  label?: string;
  stats?: CallStats;
}

/**
 * Runs one outbound call under the shared resilience policy: per-attempt
 * timeout, service pool slot, exponential backoff with jitter on transient
 * failures, immediate abort on terminal ones.
 */
export class ResilientClient {
  readonly policy: RetryPolicy;
  private readonly timeouts: Partial<Record<ServiceName, number>>;
  private readonly pools?: ServicePools;
  private readonly random: RandomSource;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(options: ResilientClientOptions = {}) {
    this.policy = { ...RETRY_CONFIG, ...options.policy };
    this.timeouts = options.timeouts ?? {};
    this.pools = options.pools;
    this.random = options.random ?? createRandomSource(options.seed);
    this.wait = options.sleep ?? sleep;
  }

  async call<T>(
    service: ServiceName,
    fn: (signal: AbortSignal) => Promise<T>,
    options: CallOptions = {},
  ): Promise<T> {
    const label = options.label ?? service;
    const timeoutMs = this.timeouts[service] ?? this.policy.timeoutMs;
    const { maxAttempts } = this.policy;

    let lastError: unknown;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        const run = () => runWithTimeout(fn, timeoutMs, label);
        const result = await (this.pools ? this.pools.run(service, run) : run());
        if (options.stats) options.stats.calls++;
        return result;
      } catch (error) {
        lastError = error;

        if (classifyError(error) === "terminal") {
          logger.error(
            { service, label, attempt: attempt + 1, error: errorMessage(error) },
            "llm_non_retryable_error",
          );
          throw error instanceof TerminalError
            ? error
            : new TerminalError(errorMessage(error), statusOf(error), { cause: error });
        }

        if (attempt + 1 >= maxAttempts) break;

        const delayMs = calculateBackoffDelay(attempt, this.policy, this.random);
        if (options.stats) options.stats.networkRetries++;
        logger.warn(
          {
            service,
            label,
            attempt: attempt + 1,
            maxAttempts,
            delayMs,
            error: errorMessage(error),
          },
          "llm_retry_attempt",
        );
        await this.wait(delayMs);
      }
    }

    logger.error(
      { service, label, maxAttempts, error: errorMessage(lastError) },
      "llm_all_retries_exhausted",
    );
    throw new RetryableError(
      `${label} failed after ${maxAttempts} attempts: ${errorMessage(lastError)}`,
      statusOf(lastError),
      { cause: lastError },
    );
  }
}

async function runWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new RetryableError(`${label} timed out after ${timeoutMs}ms`, 408);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
