import type { Log } from '../settings';
import { errorMessage } from '../settings';
import { BleBusError, BleTransportError, DeviceNotFoundError } from './errors';

export const DEFAULT_ATTEMPTS = 3;
export const BLE_BACKOFF_TIME = 250;

export interface RetryPolicy {
  attempts: number;
  backoffMs: number;
  /** Errors that must surface on the first failure. */
  isPermanent(err: unknown): boolean;
  isRetryable(err: unknown): boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: DEFAULT_ATTEMPTS,
  backoffMs: BLE_BACKOFF_TIME,
  isPermanent: (err) => err instanceof DeviceNotFoundError,
  isRetryable: (err) => err instanceof BleTransportError,
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryContext {
  /** Display name of the device, used as log prefix. */
  name: string;
  /** Operation label for log lines. */
  operation: string;
  log: Log;
  policy?: RetryPolicy;
  sleep?: Sleep;
}

/**
 * Run `operation` until it succeeds or the policy gives up.
 * Backoff is constant; the whole operation (reconnect included) is repeated.
 */
export async function withRetry<T>(operation: () => Promise<T>, context: RetryContext): Promise<T> {
  const policy = context.policy ?? DEFAULT_RETRY_POLICY;
  const wait = context.sleep ?? sleep;
  const { name, log } = context;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (policy.isPermanent(err) || !policy.isRetryable(err)) {
        throw err;
      }
      if (attempt >= policy.attempts) {
        log.error('%s: Max retries reached on %s: %s', name, context.operation, errorMessage(err));
        throw err;
      }
      if (err instanceof BleBusError) {
        log.warn('%s: Retry %d/%d on %s due to %s',
          name, attempt, policy.attempts, context.operation, errorMessage(err));
      } else {
        log.warn('%s: BLE error retry %d/%d on %s: %s',
          name, attempt, policy.attempts, context.operation, errorMessage(err));
      }
      await wait(policy.backoffMs);
    }
  }
}
