import {
  CancelledError,
  RetryExhaustedError,
  toPatchPilotError,
  type ErrorKind
} from "../errors.js";
import type { Logger } from "../utils/log.js";

export type Classification = "retryable" | "fatal";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Upper bound of the random extra delay, as a fraction of the computed delay. */
  jitterRatio: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  jitterRatio: 0.2
};

const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set(["TransientIO", "AuthExpired"]);

export interface RetryDeps {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  logger?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class RetryCoordinator {
  readonly policy: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly logger?: Logger;

  constructor(policy: Partial<RetryPolicy> = {}, deps: RetryDeps = {}) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...policy };
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.logger = deps.logger;
  }

  classify(err: unknown): Classification {
    return RETRYABLE_KINDS.has(toPatchPilotError(err).kind) ? "retryable" : "fatal";
  }

  /** Delay before attempt `attempt + 1`, where `attempt` counts from 1. */
  nextDelay(attempt: number): number {
    const exponent = Math.max(0, attempt - 1);
    const capped = Math.min(this.policy.baseDelayMs * 2 ** exponent, this.policy.maxDelayMs);
    const jitter = capped * this.policy.jitterRatio * this.random();
    return Math.round(capped + jitter);
  }

  /**
   * Run `op` until it succeeds, a fatal error is raised, or attempts run out.
   * AuthExpired gets exactly one more attempt; the client re-authenticates
   * on it.
   */
  async run<T>(label: string, op: (attempt: number) => Promise<T>, options: RunOptions = {}): Promise<T> {
    let authRetried = false;
    for (let attempt = 1; ; attempt += 1) {
      if (options.signal?.aborted) {
        throw new CancelledError();
      }
      try {
        return await op(attempt);
      } catch (err) {
        if (options.signal?.aborted) {
          throw new CancelledError();
        }
        const error = toPatchPilotError(err);
        if (this.classify(error) === "fatal") {
          throw error;
        }
        if (error.kind === "AuthExpired") {
          if (authRetried) {
            throw new RetryExhaustedError(error, attempt);
          }
          authRetried = true;
        }
        if (attempt >= this.policy.maxAttempts) {
          throw new RetryExhaustedError(error, attempt);
        }
        const delay = error.kind === "AuthExpired" ? 0 : this.nextDelay(attempt);
        this.logger?.warn(`${label}: ${error.message}; retrying in ${delay}ms (attempt ${attempt + 1}/${this.policy.maxAttempts})`);
        if (delay > 0) {
          await this.sleep(delay);
        }
      }
    }
  }
}
