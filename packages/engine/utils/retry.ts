// Exponential backoff for collaborator calls (embedding, vector index, language model)
// Delay grows as baseDelayMs * factor^attempt: 1s -> 3s -> 9s with the defaults

import { CollaboratorUnavailableError, type Collaborator, errorMessage } from '../types/errors.js';
import { createLogger } from './logger.js';

const log = createLogger('Retry');

export interface BackoffPolicy {
  /** Retries after the first attempt */
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly factor: number;
  readonly maxDelayMs: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  maxRetries: 2,
  baseDelayMs: 1000,
  factor: 3,
  maxDelayMs: 30_000,
};

export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(policy.factor, attempt));
}

export class AbortedError extends Error {
  constructor() {
    super('Operation aborted');
    this.name = 'AbortedError';
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new AbortedError());
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `fn` with retries. Every failure is retried until the budget is spent,
 * then surfaced as CollaboratorUnavailableError naming the collaborator.
 * An aborted signal stops immediately with AbortedError.
 */
export async function withRetry<T>(
  collaborator: Collaborator,
  fn: () => Promise<T>,
  policy: BackoffPolicy = DEFAULT_BACKOFF,
  signal?: AbortSignal,
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
    if (signal?.aborted) throw new AbortedError();
    try {
      return await fn();
    } catch (err) {
      if (err instanceof AbortedError) throw err;
      lastError = err;
      if (attempt < policy.maxRetries) {
        const delay = backoffDelay(policy, attempt);
        log.warn(`${collaborator} call failed, retrying`, {
          attempt: attempt + 1,
          maxRetries: policy.maxRetries,
          delayMs: delay,
          error: errorMessage(err),
        });
        await sleep(delay, signal);
      }
    }
  }
  throw new CollaboratorUnavailableError(collaborator, policy.maxRetries + 1, lastError);
}

/** Settle with `promise`, or reject with AbortedError as soon as `signal` aborts */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    promise.catch(err => log.debug('Result discarded after abort', { error: errorMessage(err) }));
    return Promise.reject(new AbortedError());
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new AbortedError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      err => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}
