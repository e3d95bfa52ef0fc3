import { DomainBudget } from "../types/research";
import { Clock, systemClock } from "../utils/time";
import { normalizeDomain } from "../utils/url";

export interface RateClass {
  capacity: number;
  refillIntervalMs: number;
}

export interface RateLimiterOptions {
  /** Must contain a `default` class used for unknown domains. */
  classes: Record<string, RateClass>;
  domainClasses: Record<string, string>;
}

export class RateLimitGrant {
  private used = false;

  constructor(
    readonly domain: string,
    readonly issuedAt: number,
  ) {}

  consume(): boolean {
    if (this.used) {
      return false;
    }
    this.used = true;
    return true;
  }

  get consumed() {
    return this.used;
  }
}

export type RateLimitDecision =
  | { granted: true; grant: RateLimitGrant }
  | { granted: false; waitUntil: number };

interface Bucket {
  domain: string;
  className: string;
  capacity: number;
  refillIntervalMs: number;
  spentAt: number[];
  lastRefillAt: number;
}

/**
 * Per-domain token buckets. A spent token returns to its bucket exactly
 * `refillIntervalMs` after it was spent, so a domain never sees more than
 * `capacity` grants inside one refill interval.
 *
 * `acquire` is synchronous: each bucket is read and updated within a single
 * turn of the event loop, which serialises concurrent workers hitting the
 * same domain.
 */
export class DomainRateLimiter {
  private readonly buckets = new Map<string, Bucket>();
  private readonly domainClasses: Map<string, string>;

  constructor(
    private readonly options: RateLimiterOptions,
    private readonly now: Clock = systemClock,
  ) {
    if (!options.classes.default) {
      throw new Error("Rate limiter requires a `default` class");
    }
    this.domainClasses = new Map(
      Object.entries(options.domainClasses).map(([domain, className]) => [normalizeDomain(domain), className]),
    );
  }

  acquire(domain: string): RateLimitDecision {
    const bucket = this.bucketFor(normalizeDomain(domain));
    const now = this.now();
    this.refill(bucket, now);
    if (bucket.spentAt.length < bucket.capacity) {
      bucket.spentAt.push(now);
      return { granted: true, grant: new RateLimitGrant(bucket.domain, now) };
    }
    return { granted: false, waitUntil: bucket.spentAt[0] + bucket.refillIntervalMs };
  }

  snapshot(domain: string): DomainBudget | null {
    const bucket = this.buckets.get(normalizeDomain(domain));
    if (!bucket) {
      return null;
    }
    this.refill(bucket, this.now());
    return {
      domain: bucket.domain,
      capacity: bucket.capacity,
      refill_interval_ms: bucket.refillIntervalMs,
      tokens: bucket.capacity - bucket.spentAt.length,
      last_refill_at: bucket.lastRefillAt,
    };
  }

  classFor(domain: string): string {
    const labels = normalizeDomain(domain).split(".");
    for (let i = 0; i < labels.length; i += 1) {
      const candidate = labels.slice(i).join(".");
      const className = this.domainClasses.get(candidate);
      if (className && this.options.classes[className]) {
        return className;
      }
    }
    return "default";
  }

  private bucketFor(domain: string): Bucket {
    const existing = this.buckets.get(domain);
    if (existing) {
      return existing;
    }
    const className = this.classFor(domain);
    const rate = this.options.classes[className];
    const bucket: Bucket = {
      domain,
      className,
      capacity: rate.capacity,
      refillIntervalMs: rate.refillIntervalMs,
      spentAt: [],
      lastRefillAt: this.now(),
    };
    this.buckets.set(domain, bucket);
    return bucket;
  }

  private refill(bucket: Bucket, now: number) {
    let returned = 0;
    while (bucket.spentAt.length && bucket.spentAt[0] + bucket.refillIntervalMs <= now) {
      bucket.spentAt.shift();
      returned += 1;
    }
    if (returned) {
      bucket.lastRefillAt = now;
    }
  }
}
