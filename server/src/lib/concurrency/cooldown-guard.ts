/**
 * Cooldown Guard
 * Rejects overlapping or too-frequent runs of an expensive operation per key.
 *
 * States per key: absent → active → cooling down → active ...
 * tryAcquire() checks and marks in one synchronous step; there must be no
 * await between the check and the mark, or two callers could both pass.
 */

import { logger } from '../logger/structured-logger.js';

export interface CooldownEntry {
  active: boolean;
  /** Last start or completion time (ms) */
  timestamp: number;
}

export type GuardDecision =
  | { status: 'accepted'; release: () => void }
  | { status: 'in_progress' }
  | { status: 'cooling_down'; remainingSeconds: number };

export type GuardRejection = Exclude<GuardDecision, { status: 'accepted' }>;

export type GuardRunResult<T> =
  | { status: 'completed'; value: T }
  | GuardRejection;

export interface CooldownGuardOptions {
  cooldownMs: number;
  now?: () => number;
}

export class CooldownGuard {
  private entries = new Map<string, CooldownEntry>();
  private readonly cooldownMs: number;
  private readonly now: () => number;

  constructor(options: CooldownGuardOptions) {
    this.cooldownMs = options.cooldownMs;
    this.now = options.now ?? Date.now;
  }

  tryAcquire(key: string): GuardDecision {
    const entry = this.entries.get(key);
    const now = this.now();

    if (entry) {
      if (entry.active) {
        return { status: 'in_progress' };
      }

      const elapsed = now - entry.timestamp;
      if (elapsed < this.cooldownMs) {
        return {
          status: 'cooling_down',
          remainingSeconds: Math.ceil((this.cooldownMs - elapsed) / 1000),
        };
      }
    }

    this.entries.set(key, { active: true, timestamp: now });

    let released = false;
    return {
      status: 'accepted',
      release: () => {
        if (released) return;
        released = true;
        this.entries.set(key, { active: false, timestamp: this.now() });
      },
    };
  }

  /**
   * Acquire, run fn, and always release, even when fn throws.
   */
  async run<T>(key: string, fn: () => Promise<T>): Promise<GuardRunResult<T>> {
    const decision = this.tryAcquire(key);
    if (decision.status !== 'accepted') {
      logger.debug({ event: 'cooldown_guard_rejected', key, decision: decision.status }, '[CooldownGuard] Request rejected');
      return decision;
    }

    try {
      const value = await fn();
      return { status: 'completed', value };
    } finally {
      decision.release();
    }
  }

  getEntry(key: string): CooldownEntry | undefined {
    const entry = this.entries.get(key);
    return entry ? { ...entry } : undefined;
  }

  /** Seed an entry directly (restoring state, tests) */
  setEntry(key: string, entry: CooldownEntry): void {
    this.entries.set(key, { ...entry });
  }
}
