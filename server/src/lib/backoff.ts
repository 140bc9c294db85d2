export interface BackoffOptions {
  baseMs?: number;
  maxMs?: number;
  factor?: number;
}

/**
 * Capped exponential backoff: `min(baseMs * factor^attempt, maxMs)`.
 *
 * `attempt` is the number of consecutive failures so far, so the first
 * retry after a clean disconnect waits `baseMs`.
 */
export class BackoffPolicy {
  readonly baseMs: number;
  readonly maxMs: number;
  readonly factor: number;

  constructor(options: BackoffOptions = {}) {
    this.baseMs = options.baseMs ?? 1_000;
    this.maxMs = options.maxMs ?? 16_000;
    this.factor = options.factor ?? 2;
  }

  delayFor(attempt: number): number {
    const exponent = Math.max(0, attempt);
    return Math.min(this.baseMs * Math.pow(this.factor, exponent), this.maxMs);
  }
}
