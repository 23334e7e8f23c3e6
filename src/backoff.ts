export interface ExponentialBackoffOptions {
  /**
   * Delay applied before the first retry attempt in milliseconds.
   */
  initialDelayMs: number;
  /**
   * Growth factor applied on every subsequent retry. Defaults to 2 (doubling).
   */
  factor?: number;
  /**
   * Optional cap for the computed delay in milliseconds.
   */
  maxDelayMs?: number;
  /**
   * Symmetric jitter ratio applied to each delay, in [0, 1). Defaults to 0.1 (±10%).
   */
  jitterRatio?: number;
  /**
   * Custom random generator used to compute jitter. Defaults to Math.random.
   */
  random?: () => number;
}

function validatePositiveFinite(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new TypeError(`${name} must be a finite number greater than 0`);
  }
}

export class ExponentialBackoff {
  private readonly initialDelayMs: number;
  private readonly factor: number;
  private readonly maxDelayMs?: number;
  private readonly jitterRatio: number;
  private readonly random: () => number;

  private attempt = 0;

  constructor(options: ExponentialBackoffOptions) {
    validatePositiveFinite("initialDelayMs", options.initialDelayMs);

    const factor = options.factor ?? 2;
    if (!Number.isFinite(factor) || factor < 1) {
      throw new TypeError("factor must be a finite number greater than or equal to 1");
    }

    if (options.maxDelayMs !== undefined) {
      validatePositiveFinite("maxDelayMs", options.maxDelayMs);
      if (options.maxDelayMs < options.initialDelayMs) {
        throw new TypeError("maxDelayMs must be greater than or equal to initialDelayMs");
      }
    }

    const jitterRatio = options.jitterRatio ?? 0.1;
    if (!Number.isFinite(jitterRatio) || jitterRatio < 0 || jitterRatio >= 1) {
      throw new TypeError("jitterRatio must be within [0, 1)");
    }

    this.initialDelayMs = options.initialDelayMs;
    this.factor = factor;
    this.maxDelayMs = options.maxDelayMs;
    this.jitterRatio = jitterRatio;
    this.random = options.random ?? Math.random;
  }

  /** Number of delays handed out since construction or the last reset(). */
  get attempts(): number {
    return this.attempt;
  }

  /**
   * Returns the next delay in the backoff sequence, applying jitter and the cap.
   */
  nextDelay(): number {
    this.attempt += 1;
    return this.delayFor(this.attempt);
  }

  reset(): void {
    this.attempt = 0;
  }

  /**
   * Delay for the n-th retry (1-based). Jitter is drawn from the configured random source.
   */
  delayFor(retry: number): number {
    const exponential = this.initialDelayMs * Math.pow(this.factor, Math.max(0, retry - 1));
    const offset = this.jitterRatio === 0 ? 0 : (this.random() * 2 - 1) * this.jitterRatio;
    const jittered = Math.max(1, exponential * (1 + offset));
    const capped = this.maxDelayMs === undefined ? jittered : Math.min(jittered, this.maxDelayMs);

    return Math.round(capped);
  }
}
