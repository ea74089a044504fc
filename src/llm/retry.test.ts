import { describe, test, expect, vi } from "vitest";
import {
  ResilientClient,
  calculateBackoffDelay,
  emptyStats,
  isRetryableError,
} from "./retry";
import { RetryableError, TerminalError } from "../utils/errors";
import { ServicePools } from "../utils/servicePools";
import { seededRandom } from "../utils/random";

/**
 * Unit tests for the resilient client: backoff formula, attempt budget,
 * retryable vs terminal classification, per-attempt timeouts and pools.
 * Sleeps are captured instead of awaited.
 */

function recordingSleep() {
  const delays: number[] = [];
  const sleep = async (ms: number) => {
    delays.push(ms);
  };
  return { delays, sleep };
}

function failTimes<T>(failures: unknown[], value: T) {
  let call = 0;
  return vi.fn(async () => {
    const failure = failures[call++];
    if (failure !== undefined) throw failure;
    return value;
  });
}

describe("calculateBackoffDelay", () => {
  const policy = { baseDelayMs: 1000, maxDelayMs: 16000 };

  test("doubles per attempt at neutral jitter", () => {
    const neutral = () => 0.5;
    expect(calculateBackoffDelay(0, policy, neutral)).toBe(1000);
    expect(calculateBackoffDelay(1, policy, neutral)).toBe(2000);
    expect(calculateBackoffDelay(3, policy, neutral)).toBe(8000);
  });

  test("jitter spans half to one and a half times the base delay", () => {
    expect(calculateBackoffDelay(1, policy, () => 0)).toBe(1000);
    expect(calculateBackoffDelay(1, policy, () => 0.75)).toBe(2500);
  });

  test("caps at maxDelayMs", () => {
    expect(calculateBackoffDelay(5, policy, () => 0.5)).toBe(16000);
  });
});

describe("isRetryableError", () => {
  test("rate limits and server errors are retryable", () => {
    expect(isRetryableError(Object.assign(new Error("slow down"), { status: 429 }))).toBe(true);
    expect(isRetryableError(Object.assign(new Error("boom"), { status: 503 }))).toBe(true);
    expect(isRetryableError(new Error("socket hang up"))).toBe(true);
  });

  test("auth and malformed requests are terminal", () => {
    expect(isRetryableError(Object.assign(new Error("nope"), { status: 401 }))).toBe(false);
    expect(isRetryableError(Object.assign(new Error("bad"), { status: 400 }))).toBe(false);
    expect(isRetryableError(new TerminalError("Invalid API key"))).toBe(false);
  });
});

describe("ResilientClient", () => {
  const policy = { maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 1000, timeoutMs: 1000 };

  test("returns the first successful result and counts retries", async () => {
    const { delays, sleep } = recordingSleep();
    const client = new ResilientClient({ policy, sleep, random: () => 0.5 });
    const fn = failTimes([new RetryableError("503", 503), new RetryableError("429", 429)], "ok");
    const stats = emptyStats();

    await expect(client.call("pubmed", fn, { stats })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([100, 200]);
    expect(stats).toEqual({ calls: 1, networkRetries: 2, repairs: 0 });
  });

  test("never exceeds the attempt budget", async () => {
    const { delays, sleep } = recordingSleep();
    const client = new ResilientClient({ policy, sleep, random: () => 0.5 });
    const fn = vi.fn(async () => {
      throw new RetryableError("HTTP 503", 503);
    });

    await expect(client.call("semantic_scholar", fn)).rejects.toThrow(
      "semantic_scholar failed after 5 attempts: HTTP 503",
    );
    expect(fn).toHaveBeenCalledTimes(5);
    expect(delays).toHaveLength(4);
  });

  test("aborts immediately on a terminal failure", async () => {
    const { delays, sleep } = recordingSleep();
    const client = new ResilientClient({ policy, sleep });
    const fn = vi.fn(async () => {
      throw Object.assign(new Error("invalid x-api-key"), { status: 401 });
    });

    await expect(client.call("model", fn)).rejects.toBeInstanceOf(TerminalError);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  test("the same seed replays the same retry schedule", async () => {
    const run = async () => {
      const { delays, sleep } = recordingSleep();
      const client = new ResilientClient({ policy, sleep, seed: 1234 });
      const failures = [new RetryableError("a", 500), new RetryableError("b", 502), new RetryableError("c", 504)];
      await client.call("model", failTimes(failures, 1));
      return delays;
    };

    const first = await run();
    const second = await run();
    expect(first).toHaveLength(3);
    expect(second).toEqual(first);
  });

  test("seeded jitter matches the seeded source directly", async () => {
    const { delays, sleep } = recordingSleep();
    const client = new ResilientClient({ policy, sleep, random: seededRandom(99) });
    await client.call("model", failTimes([new RetryableError("x", 500)], true));

    const expected = calculateBackoffDelay(0, policy, seededRandom(99));
    expect(delays).toEqual([expected]);
  });

  test("times out a hung attempt and retries it", async () => {
    const { sleep } = recordingSleep();
    const client = new ResilientClient({
      policy: { ...policy, maxAttempts: 2 },
      timeouts: { pubmed: 10 },
      sleep,
    });
    const signals: AbortSignal[] = [];
    const fn = vi.fn((signal: AbortSignal) => {
      signals.push(signal);
      return new Promise<string>(() => {});
    });

    await expect(client.call("pubmed", fn)).rejects.toThrow(
      "pubmed failed after 2 attempts: pubmed timed out after 10ms",
    );
    expect(fn).toHaveBeenCalledTimes(2);
    expect(signals.every((signal) => signal.aborted)).toBe(true);
  });

  test("holds a pool slot only while an attempt runs", async () => {
    const pools = new ServicePools({ model: 1, pubmed: 1, semantic_scholar: 1 });
    const client = new ResilientClient({ policy, pools });
    let active = 0;
    let peak = 0;
    const task = async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
      return active;
    };

    await Promise.all([
      client.call("model", task),
      client.call("model", task),
      client.call("model", task),
    ]);
    expect(peak).toBe(1);
    expect(pools.activeCount("model")).toBe(0);
  });

  test("a saturated search pool does not hold back model calls", async () => {
    const pools = new ServicePools({ model: 1, pubmed: 1, semantic_scholar: 1 });
    const client = new ResilientClient({ policy, pools });
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const searches = Promise.all([
      client.call("pubmed", async () => {
        await gate;
        return "first";
      }),
      client.call("pubmed", async () => "second"),
    ]);
    await vi.waitFor(() => {
      expect(pools.activeCount("pubmed")).toBe(1);
      expect(pools.pendingCount("pubmed")).toBe(1);
    });

    await expect(client.call("model", async () => "outline")).resolves.toBe("outline");
    expect(pools.activeCount("pubmed")).toBe(1);
    expect(pools.pendingCount("pubmed")).toBe(1);

    release();
    await expect(searches).resolves.toEqual(["first", "second"]);
  });
});
