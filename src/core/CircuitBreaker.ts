import { NutConnectError } from './NutError';
import { NutLogger, scopedLogger } from './Logger';

/**
 * CircuitBreakerState Enum
 * Defines the possible states of the protection mechanism.
 */
export enum CircuitBreakerState {
    /** Normal operation. Connection attempts pass through. */
    CLOSED,
    /** Failure threshold reached. Attempts fail immediately. */
    OPEN,
    /** Cool-down period over. One attempt is allowed to check health. */
    HALF_OPEN
}

export interface CircuitBreakerOptions {
    /** Number of failures allowed before opening the circuit (Default: 5) */
    failureThreshold?: number;
    /** Time in ms to wait before allowing another attempt (Default: 10000ms) */
    resetTimeout?: number;
}

/**
 * CircuitBreaker
 * Guards connection attempts to an upsd host. After repeated failures it trips and
 * fails new attempts immediately until `resetTimeout` has passed. It never retries
 * by itself: every attempt is still started by the caller.
 */
export class CircuitBreaker {
    private state: CircuitBreakerState = CircuitBreakerState.CLOSED;
    private failureCount: number = 0;
    private lastFailureTime: number = 0;

    private readonly failureThreshold: number;
    private readonly resetTimeout: number;
    private readonly logger: NutLogger;

    constructor(options: CircuitBreakerOptions = {}, logger?: NutLogger) {
        this.failureThreshold = options.failureThreshold || 5;
        this.resetTimeout = options.resetTimeout || 10000;
        this.logger = scopedLogger('CircuitBreaker', logger);
    }

    /**
     * Runs `action` (usually a connect) through the breaker.
     * @param isFailure Decides which errors count against the host (default: all).
     */
    public async execute<T>(
        action: () => Promise<T>,
        isFailure: (error: unknown) => boolean = () => true
    ): Promise<T> {
        if (this.state === CircuitBreakerState.OPEN) {
            if (this.isResetTimeoutExpired()) {
                this.transitionTo(CircuitBreakerState.HALF_OPEN);
            } else {
                const timeLeft = this.resetTimeout - (Date.now() - this.lastFailureTime);
                throw new NutConnectError(`CircuitBreaker is OPEN. Fast-failing. Retry in ${timeLeft}ms.`);
            }
        }

        try {
            const result = await action();
            this.onSuccess();
            return result;
        } catch (error) {
            if (isFailure(error)) this.onFailure();
            throw error;
        }
    }

    public getState(): CircuitBreakerState {
        return this.state;
    }

    private onSuccess(): void {
        if (this.state === CircuitBreakerState.HALF_OPEN) {
            this.transitionTo(CircuitBreakerState.CLOSED);
        }
        this.failureCount = 0;
    }

    private onFailure(): void {
        this.failureCount++;
        this.lastFailureTime = Date.now();

        if (this.state === CircuitBreakerState.HALF_OPEN || this.failureCount >= this.failureThreshold) {
            this.transitionTo(CircuitBreakerState.OPEN);
        }
    }

    private transitionTo(newState: CircuitBreakerState): void {
        this.state = newState;
        this.logger.warn(`State changed to: ${CircuitBreakerState[newState]}`);
    }

    private isResetTimeoutExpired(): boolean {
        return (Date.now() - this.lastFailureTime) > this.resetTimeout;
    }
}
