/**
 * Circuit Breaker
 *
 * Tracks consecutive failures per endpoint template. After `failureThreshold`
 * failures the circuit opens and calls fail fast until `resetTimeoutMs` has
 * passed; then one trial call is let through (half-open) while every other
 * call keeps failing fast until the trial settles.
 */

import { CircuitOpenError } from '../errors.js';
import { systemClock, type Clock } from './clock.js';

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerOptions {
  failureThreshold: number;
  resetTimeoutMs: number;
}

interface Circuit {
  state: CircuitState;
  failures: number;
  openedAt: number;
  /** A half-open trial call has not settled yet */
  trialInFlight: boolean;
}

export class CircuitBreaker {
  private readonly circuits = new Map<string, Circuit>();

  constructor(
    private readonly options: CircuitBreakerOptions,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Throw CircuitOpenError if calls to `endpoint` must not be attempted.
   */
  check(endpoint: string): void {
    const circuit = this.circuits.get(endpoint);
    if (!circuit || circuit.state === 'closed') return;

    if (circuit.state === 'open' && this.clock.now() - circuit.openedAt >= this.options.resetTimeoutMs) {
      circuit.state = 'half-open';
    }
    if (circuit.state === 'half-open' && !circuit.trialInFlight) {
      circuit.trialInFlight = true;
      return;
    }
    throw new CircuitOpenError(endpoint);
  }

  /** The endpoint answered; close its circuit. */
  recordSuccess(endpoint: string): void {
    this.circuits.delete(endpoint);
  }

  recordFailure(endpoint: string): void {
    const circuit = this.circuits.get(endpoint) ?? { state: 'closed', failures: 0, openedAt: 0, trialInFlight: false };
    circuit.failures++;
    circuit.trialInFlight = false;

    if (circuit.state === 'half-open' || circuit.failures >= this.options.failureThreshold) {
      circuit.state = 'open';
      circuit.openedAt = this.clock.now();
    }

    this.circuits.set(endpoint, circuit);
  }

  /**
   * Settle a call that says nothing about the endpoint's health. A pending
   * trial is given up and the next caller may try.
   */
  release(endpoint: string): void {
    const circuit = this.circuits.get(endpoint);
    if (circuit) circuit.trialInFlight = false;
  }

  state(endpoint: string): CircuitState {
    return this.circuits.get(endpoint)?.state ?? 'closed';
  }

  reset(): void {
    this.circuits.clear();
  }
}
