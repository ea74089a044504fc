import { sleep } from "../llm/retry";

/**
 * Spaces request starts at least intervalMs apart. Reservations are taken
 * synchronously, so concurrent callers queue in arrival order.
 */
export class Throttle {
  private nextSlot = 0;

  constructor(
    private readonly intervalMs: number,
    private readonly wait: (ms: number) => Promise<void> = sleep,
  ) {}

  async acquire(): Promise<void> {
    if (this.intervalMs <= 0) return;
    const now = Date.now();
    const start = Math.max(now, this.nextSlot);
    this.nextSlot = start + this.intervalMs;
    if (start > now) await this.wait(start - now);
  }
}
