// Bounded retry for transient failures of external commands (git, pip).
// GitHub API calls are retried by Octokit's own retry plugin instead.

import { errorMessage, logger } from "./logger.js";

const TRANSIENT_PATTERNS: readonly RegExp[] = [
  /ETIMEDOUT|ECONNRESET|ECONNREFUSED|EAI_AGAIN|ENOTFOUND/,
  /timed? ?out/i,
  /could not resolve host/i,
  /temporary failure in name resolution/i,
  /connection (?:reset|refused|aborted)/i,
  /early EOF|the remote end hung up unexpectedly/i,
  /(?:returned error|HTTP error|status(?: code)?):? 5\d\d/i,
];

export function isTransientFailure(error: unknown): boolean {
  const message = errorMessage(error);
  return TRANSIENT_PATTERNS.some((pattern) => pattern.test(message));
}

export interface RetryOptions {
  attempts?: number;
  baseDelayMs?: number;
  isTransient?: (error: unknown) => boolean;
}

export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = options.attempts ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 1000;
  const isTransient = options.isTransient ?? isTransientFailure;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= attempts || !isTransient(error)) {
        throw error;
      }
      const delay = baseDelayMs * 2 ** (attempt - 1);
      logger.warn(`${operation} failed with a transient error; retrying.`, {
        attempt,
        attempts,
        delayMs: delay,
        error: errorMessage(error),
      });
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
