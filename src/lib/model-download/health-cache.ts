/**
 * Short-lived cache for the serialized health payload.
 * Only the final payload is cached; reconciliation always runs fresh.
 */

import type { Clock } from "./types"

interface CachedEntry<T> {
  key: string
  payload: T
  storedAt: number
}

export class HealthCache<T> {
  private entry: CachedEntry<T> | null = null

  constructor(
    readonly ttlMs: number = 3000,
    private readonly now: Clock = Date.now
  ) {}

  get(key: string): T | null {
    const entry = this.entry
    if (!entry || entry.key !== key) {
      return null
    }
    if (this.now() - entry.storedAt >= this.ttlMs) {
      this.entry = null
      return null
    }
    return entry.payload
  }

  set(key: string, payload: T): void {
    this.entry = { key, payload, storedAt: this.now() }
  }

  invalidate(): void {
    this.entry = null
  }

  ageMs(): number | null {
    return this.entry ? this.now() - this.entry.storedAt : null
  }
}
