/**
 * Circuit breaker shared by the generation client and the file search service.
 *
 * CLOSED counts consecutive failures; at `failureThreshold` the circuit opens
 * and every call is refused with CircuitBreakerOpenError. Once `recoveryTimeMs`
 * has passed since the last failure, calls are let through as probes
 * (HALF_OPEN): `halfOpenSuccessThreshold` successes close the circuit, one
 * failure opens it again.
 *
 * @module services/gemini/circuit-breaker
 */

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export interface CircuitBreakerConfig {
  /** Log prefix, and the service named in the open-circuit error */
  name: string;
  failureThreshold: number;
  recoveryTimeMs: number;
  halfOpenSuccessThreshold: number;
}

export interface CircuitBreakerStatus {
  name: string;
  state: CircuitState;
  failureCount: number;
  lastFailureTime: number | null;
  timeToRecovery: number | null;
}

type Phase =
  | { state: CircuitState.CLOSED; failures: number }
  | { state: CircuitState.OPEN; failures: number; openedAt: number }
  | { state: CircuitState.HALF_OPEN; failures: number; openedAt: number; probesPassed: number };

export class CircuitBreakerOpenError extends Error {
  constructor(
    message: string,
    readonly timeToRecovery: number
  ) {
    super(message);
    this.name = 'CircuitBreakerOpenError';
  }
}

export class CircuitBreaker {
  private readonly config: CircuitBreakerConfig;
  private phase: Phase = { state: CircuitState.CLOSED, failures: 0 };
  private lastFailureAt: number | null = null;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = {
      name: config.name ?? 'CircuitBreaker',
      failureThreshold: config.failureThreshold ?? 5,
      recoveryTimeMs: config.recoveryTimeMs ?? 60000,
      halfOpenSuccessThreshold: config.halfOpenSuccessThreshold ?? 3,
    };
  }

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    const phase = this.currentPhase();
    if (phase.state === CircuitState.OPEN) {
      const waitMs = this.remainingWait(phase.openedAt);
      throw new CircuitBreakerOpenError(
        `${this.config.name} is unavailable after repeated failures; retry in ${Math.ceil(waitMs / 1000)}s`,
        waitMs
      );
    }

    let result: T;
    try {
      result = await operation();
    } catch (error) {
      this.onFailure();
      throw error;
    }
    this.onSuccess();
    return result;
  }

  getState(): CircuitState {
    return this.currentPhase().state;
  }

  getStatus(): CircuitBreakerStatus {
    const phase = this.currentPhase();
    const lastFailureTime = phase.state === CircuitState.CLOSED ? this.lastFailureAt : phase.openedAt;
    return {
      name: this.config.name,
      state: phase.state,
      failureCount: phase.failures,
      lastFailureTime,
      timeToRecovery: phase.state === CircuitState.OPEN ? this.remainingWait(phase.openedAt) : null,
    };
  }

  reset(): void {
    this.lastFailureAt = null;
    this.phase = { state: CircuitState.CLOSED, failures: 0 };
  }

  /** Refuse calls for the next recovery window */
  forceOpen(): void {
    this.open(this.phase.failures, 'forced open');
  }

  /** OPEN turns into HALF_OPEN lazily, when the recovery window has elapsed */
  private currentPhase(): Phase {
    const phase = this.phase;
    if (phase.state === CircuitState.OPEN && this.remainingWait(phase.openedAt) === 0) {
      this.phase = { ...phase, state: CircuitState.HALF_OPEN, probesPassed: 0 };
      console.error(`[${this.config.name}] Recovery window elapsed, probing`);
    }
    return this.phase;
  }

  private onSuccess(): void {
    const phase = this.phase;
    if (phase.state === CircuitState.HALF_OPEN) {
      const probesPassed = phase.probesPassed + 1;
      if (probesPassed < this.config.halfOpenSuccessThreshold) {
        this.phase = { ...phase, probesPassed };
        return;
      }
      console.error(`[${this.config.name}] ${probesPassed} probes passed, circuit closed`);
      this.lastFailureAt = null;
    }
    this.phase = { state: CircuitState.CLOSED, failures: 0 };
  }

  private onFailure(): void {
    const failures = this.phase.failures + 1;
    if (this.phase.state === CircuitState.HALF_OPEN) {
      this.open(failures, 'probe failed');
    } else if (failures >= this.config.failureThreshold) {
      this.open(failures, `${failures} consecutive failures`);
    } else {
      this.lastFailureAt = Date.now();
      this.phase = { state: CircuitState.CLOSED, failures };
    }
  }

  private open(failures: number, reason: string): void {
    const openedAt = Date.now();
    this.lastFailureAt = openedAt;
    this.phase = { state: CircuitState.OPEN, failures, openedAt };
    console.error(`[${this.config.name}] Circuit open: ${reason}`);
  }

  private remainingWait(openedAt: number): number {
    return Math.max(0, this.config.recoveryTimeMs - (Date.now() - openedAt));
  }
}
