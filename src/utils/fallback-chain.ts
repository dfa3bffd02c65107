import { ProviderFailure, TimeoutError } from "./errors";

export type FallbackOutcome<P, T> =
  | { ok: true; provider: P; value: T; failures: ProviderFailure[] }
  | { ok: false; failures: ProviderFailure[] };

/**
 * Try each provider in priority order and stop at the first success.
 * Failures are collected, reported through `onFailure` and never retried.
 *
 * @param providers Providers, most preferred first
 * @param attempt Runs one provider; a rejection moves on to the next one
 * @param nameOf Label used in the failure list
 * @param onFailure Called once per failed provider, before the next attempt
 */
export async function firstSuccessful<P, T>(
  providers: readonly P[],
  attempt: (provider: P) => Promise<T>,
  nameOf: (provider: P) => string,
  onFailure?: (provider: P, error: unknown) => void
): Promise<FallbackOutcome<P, T>> {
  const failures: ProviderFailure[] = [];

  for (const provider of providers) {
    try {
      const value = await attempt(provider);
      return { ok: true, provider, value, failures };
    } catch (error) {
      failures.push({ provider: nameOf(provider), error });
      onFailure?.(provider, error);
    }
  }

  return { ok: false, failures };
}

/**
 * Reject with a TimeoutError if `promise` has not settled after `timeoutMs`.
 * The timer is cleared either way so nothing keeps the process alive.
 *
 * @param onTimeout Runs when the timer fires, e.g. to abort the underlying request
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout?: () => void
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      onTimeout?.();
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
