import pLimit, { type LimitFunction } from "p-limit";
import type { SearchService } from "../types/article";

export type ServiceName = "model" | SearchService;

export type ServiceLimits = Record<ServiceName, number>;

/**
 * One concurrency gate per external service. A slot is held for the duration
 * of a single attempt and released on success or failure, never across a
 * backoff sleep.
 */
export class ServicePools {
  private readonly limits: Record<ServiceName, LimitFunction>;

  constructor(limits: ServiceLimits) {
    this.limits = {
      model: pLimit(limits.model),
      pubmed: pLimit(limits.pubmed),
      semantic_scholar: pLimit(limits.semantic_scholar),
    };
  }

  run<T>(service: ServiceName, fn: () => Promise<T>): Promise<T> {
    return this.limits[service](fn);
  }

  activeCount(service: ServiceName): number {
    return this.limits[service].activeCount;
  }

  pendingCount(service: ServiceName): number {
    return this.limits[service].pendingCount;
  }
}
