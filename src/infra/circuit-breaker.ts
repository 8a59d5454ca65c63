export type CircuitState = "closed" | "open" | "half-open";

export type CircuitBreakerOptions = {
	/** Consecutive failures that open the circuit. 0 disables the breaker. */
	failureThreshold: number;
	/** How long the circuit stays open before one trial call is allowed. */
	resetMs: number;
	now?: () => number;
};

/**
 * Consecutive-failure breaker. While open, callers skip the guarded work
 * entirely; after `resetMs` a single trial is let through (half-open) and
 * its outcome closes or re-opens the circuit.
 */
export class CircuitBreaker {
	private failures = 0;
	private current: CircuitState = "closed";
	private openedAt = 0;
	private readonly now: () => number;

	constructor(private readonly options: CircuitBreakerOptions) {
		this.now = options.now ?? Date.now;
	}

	get state(): CircuitState {
		if (this.current === "open" && this.now() - this.openedAt >= this.options.resetMs) {
			this.current = "half-open";
		}
		return this.current;
	}

	get consecutiveFailures(): number {
		return this.failures;
	}

	canAttempt(): boolean {
		return this.state !== "open";
	}

	/** Milliseconds until an open circuit lets a trial through; 0 otherwise. */
	remainingMs(): number {
		if (this.state !== "open") return 0;
		return Math.max(0, this.openedAt + this.options.resetMs - this.now());
	}

	recordSuccess(): void {
		this.failures = 0;
		this.current = "closed";
	}

	/** Returns true when this failure opened the circuit. */
	recordFailure(): boolean {
		this.failures += 1;
		if (this.options.failureThreshold <= 0) return false;
		const trialFailed = this.state === "half-open";
		if (trialFailed || (this.current === "closed" && this.failures >= this.options.failureThreshold)) {
			this.current = "open";
			this.openedAt = this.now();
			return true;
		}
		return false;
	}
}
