import { errorMessage } from './errors.js';

export type SideEffect = 'changeQueue' | 'goals' | 'streak' | 'personalBest';

export interface SideEffectFailure {
  effect: SideEffect;
  error: string;
}

/**
 * Result of a primary write whose secondary effects are best-effort.
 * `value` is always present once the primary write committed; `failures`
 * lists the derived updates that did not happen.
 */
export interface Outcome<T> {
  value: T;
  failures: SideEffectFailure[];
}

export function failure(effect: SideEffect, error: unknown): SideEffectFailure {
  return { effect, error: errorMessage(error) };
}
