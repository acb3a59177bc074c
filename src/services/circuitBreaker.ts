/**
 * Circuit breaker guarding calls to the stream extractor.
 *
 * Transitions are evaluated lazily when `isOpen()` is queried; there is no
 * background timer. All methods are synchronous, so each transition runs to
 * completion before any other request handler can observe the state.
 */

import { logger, type Logger } from "../utils/logger";
import { config } from "../config";

export enum CircuitState {
    CLOSED = "CLOSED",
    OPEN = "OPEN",
    HALF_OPEN = "HALF_OPEN",
}

export interface CircuitBreakerOptions {
    /** Ordinary failures needed to open the circuit. */
    failureThreshold: number;
    /** Seconds the circuit stays open before a trial is allowed. */
    timeoutSeconds: number;
    /** Seconds of trial without failure after which the circuit closes. */
    halfOpenTimeoutSeconds: number;
    /** Milliseconds since epoch. */
    now?: () => number;
}

export interface CircuitBreakerStatus {
    state: CircuitState;
    failureCount: number;
    remainingTimeSeconds: number;
    isBlocked: boolean;
}

const RATE_LIMIT_SIGNATURES = [
    "rate-limit",
    "rate limit",
    "rate-limited",
    "too many requests",
    "429",
    "resource_exhausted",
];

export function isRateLimitMessage(message: string): boolean {
    const normalized = message.toLowerCase();
    return RATE_LIMIT_SIGNATURES.some((signature) => normalized.includes(signature));
}

export class CircuitBreaker {
    private state = CircuitState.CLOSED;
    private failureCount = 0;
    private openedAt: number | null = null;
    private halfOpenAt: number | null = null;
    private readonly now: () => number;
    private readonly log: Logger;

    constructor(
        readonly name: string,
        private readonly options: CircuitBreakerOptions
    ) {
        this.now = options.now ?? Date.now;
        this.log = logger.child(`CircuitBreaker:${name}`);
    }

    /** Stored state, read without applying any pending transition. */
    get currentState(): CircuitState {
        return this.state;
    }

    /**
     * Reports whether calls are currently blocked. The call that moves the
     * circuit from OPEN to HALF_OPEN is itself let through as the trial.
     */
    isOpen(): boolean {
        const now = this.now();

        if (this.state === CircuitState.OPEN) {
            if (this.elapsedSeconds(this.openedAt, now) >= this.options.timeoutSeconds) {
                this.state = CircuitState.HALF_OPEN;
                this.halfOpenAt = now;
                this.log.info("Cooldown elapsed, allowing a trial request");
                return false;
            }
            return true;
        }

        if (this.state === CircuitState.HALF_OPEN) {
            if (
                this.elapsedSeconds(this.halfOpenAt, now) >=
                this.options.halfOpenTimeoutSeconds
            ) {
                this.close("trial period passed without failure");
            }
        }

        return false;
    }

    recordSuccess(): void {
        if (this.state === CircuitState.HALF_OPEN) {
            this.close("trial request succeeded");
            return;
        }
        this.failureCount = 0;
    }

    /**
     * A rate-limit flavoured failure opens the circuit immediately,
     * regardless of the failure counter.
     */
    recordFailure(message = ""): void {
        if (this.state === CircuitState.HALF_OPEN) {
            this.open(`trial request failed: ${message}`);
            return;
        }

        if (isRateLimitMessage(message)) {
            this.open(`rate limit detected: ${message}`);
            return;
        }

        this.failureCount += 1;
        if (this.failureCount >= this.options.failureThreshold) {
            this.open(`${this.failureCount} consecutive failures`);
        }
    }

    getStatus(): CircuitBreakerStatus {
        const isBlocked = this.isOpen();
        return {
            state: this.state,
            failureCount: this.failureCount,
            remainingTimeSeconds: this.remainingSeconds(),
            isBlocked,
        };
    }

    reset(): void {
        this.close("manual reset");
    }

    private remainingSeconds(): number {
        const now = this.now();
        if (this.state === CircuitState.OPEN) {
            return Math.max(
                0,
                Math.ceil(this.options.timeoutSeconds - this.elapsedSeconds(this.openedAt, now))
            );
        }
        if (this.state === CircuitState.HALF_OPEN) {
            return Math.max(
                0,
                Math.ceil(
                    this.options.halfOpenTimeoutSeconds -
                        this.elapsedSeconds(this.halfOpenAt, now)
                )
            );
        }
        return 0;
    }

    private open(reason: string): void {
        this.state = CircuitState.OPEN;
        this.openedAt = this.now();
        this.halfOpenAt = null;
        this.failureCount = 0;
        this.log.warn(
            `Circuit opened (${reason}); blocking for ${this.options.timeoutSeconds}s`
        );
    }

    private close(reason: string): void {
        const wasClosed = this.state === CircuitState.CLOSED;
        this.state = CircuitState.CLOSED;
        this.failureCount = 0;
        this.openedAt = null;
        this.halfOpenAt = null;
        if (!wasClosed) {
            this.log.info(`Circuit closed (${reason})`);
        }
    }

    private elapsedSeconds(since: number | null, now: number): number {
        return since === null ? Number.POSITIVE_INFINITY : (now - since) / 1000;
    }
}

export const youtubeStreamBreaker = new CircuitBreaker("youtube-stream", {
    failureThreshold: config.circuitBreaker.failureThreshold,
    timeoutSeconds: config.circuitBreaker.timeoutSeconds,
    halfOpenTimeoutSeconds: config.circuitBreaker.halfOpenTimeoutSeconds,
});
