import { ThrottlingError } from '../core/errors.js';

export type DeliveryState =
  | { kind: 'attempting'; attempt: number }
  | { kind: 'backoff'; attempt: number; deadline: number; delayMs: number }
  | { kind: 'succeeded'; attempts: number }
  | { kind: 'failed'; attempts: number; error: unknown };

export type DeliveryEvent = { type: 'acknowledged' } | { type: 'rejected'; error: unknown } | { type: 'wake' };

export interface RetryPolicy {
  /** Total attempts, the first one included. */
  maxAttempts: number;
  backoffUnitMs: number;
}

export const INITIAL_STATE: DeliveryState = { kind: 'attempting', attempt: 1 };

/** Wait after the k-th throttled attempt: 2^k units. */
export function backoffDelay(attempt: number, unitMs: number): number {
  return 2 ** attempt * unitMs;
}

export function isTerminal(state: DeliveryState): state is Extract<DeliveryState, { kind: 'succeeded' | 'failed' }> {
  return state.kind === 'succeeded' || state.kind === 'failed';
}

export function transition(state: DeliveryState, event: DeliveryEvent, policy: RetryPolicy, now: number): DeliveryState {
  switch (state.kind) {
    case 'attempting':
      if (event.type === 'acknowledged') return { kind: 'succeeded', attempts: state.attempt };
      if (event.type === 'rejected') {
        if (!(event.error instanceof ThrottlingError) || state.attempt >= policy.maxAttempts) {
          return { kind: 'failed', attempts: state.attempt, error: event.error };
        }
        const delayMs = backoffDelay(state.attempt, policy.backoffUnitMs);
        return { kind: 'backoff', attempt: state.attempt, deadline: now + delayMs, delayMs };
      }
      break;
    case 'backoff':
      if (event.type === 'wake') return { kind: 'attempting', attempt: state.attempt + 1 };
      break;
    case 'succeeded':
    case 'failed':
      break;
  }
  throw new Error(`Invalid delivery transition: ${state.kind} on ${event.type}`);
}
