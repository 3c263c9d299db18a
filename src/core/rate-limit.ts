import type { RateLimitStore } from '../types/relay.js';

interface Entry {
  value: string;
  expiresAt: number;
}

// How often `put` clears out expired keys
const SWEEP_INTERVAL_MS = 60_000;

/**
 * Process-local key/value store with per-key expiry, shaped like a KV namespace.
 */
export class MemoryRateLimitStore implements RateLimitStore {
  private readonly entries = new Map<string, Entry>();
  private nextSweepAt = 0;

  constructor(private readonly now: () => number = Date.now) {}

  /** Number of keys held, expired or not. */
  get size(): number {
    return this.entries.size;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async put(key: string, value: string, options: { expirationTtl: number }): Promise<void> {
    const now = this.now();
    if (now >= this.nextSweepAt) {
      this.sweep(now);
      this.nextSweepAt = now + SWEEP_INTERVAL_MS;
    }
    this.entries.set(key, {
      value,
      expiresAt: now + options.expirationTtl * 1000,
    });
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }
}
