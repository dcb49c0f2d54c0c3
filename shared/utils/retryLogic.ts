import { GeminiError, ImageGenError, type GeminiErrorCode } from '../errors';
import { getErrorMessage, getErrorStatus } from './errorMessage';

const MAX_RETRIES = 3;
const INITIAL_DELAY_MS = 1000;
const MAX_DELAY_MS = 10000;
const TIMEOUT_MS = 120000; // 2 minutes total timeout
const FAILURE_THRESHOLD = 5;
const CHECK_WINDOW_MS = 60000;
const RESET_TIMEOUT_MS = 30000;

const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

/**
 * Opens after FAILURE_THRESHOLD retryable failures inside CHECK_WINDOW_MS and
 * rejects calls until RESET_TIMEOUT_MS has passed since the last failure.
 */
export class CircuitBreaker {
    private failureCount = 0;
    private lastFailureTime = 0;
    private circuitOpen = false;

    constructor(private readonly now: () => number = Date.now) { }

    get isOpen(): boolean {
        return this.circuitOpen;
    }

    acquire(): void {
        if (!this.circuitOpen) return;
        if (this.now() - this.lastFailureTime > RESET_TIMEOUT_MS) {
            this.circuitOpen = false;
            this.failureCount = 0; // Half-open/reset
            return;
        }
        throw new GeminiError("Service temporarily unavailable (Circuit Breaker Open)", 'CIRCUIT_OPEN', false);
    }

    recordFailure(isRetryable: boolean): void {
        if (!isRetryable) return; // Only load/5xx style failures count
        const now = this.now();
        // Reset failure count if outside the check window (sliding window effect)
        if (now - this.lastFailureTime > CHECK_WINDOW_MS) {
            this.failureCount = 0;
        }

        this.failureCount++;
        this.lastFailureTime = now;

        if (this.failureCount >= FAILURE_THRESHOLD && !this.circuitOpen) {
            this.circuitOpen = true;
            console.warn("[RETRY] Circuit Breaker OPENED due to high failure rate.");
        }
    }

    recordSuccess(): void {
        this.failureCount = 0;
        this.circuitOpen = false;
    }
}

export interface RetryOptions {
    retries?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    /** Overall deadline across all attempts. */
    timeoutMs?: number;
    breaker?: CircuitBreaker;
    sleep?: (ms: number) => Promise<void>;
    label?: string;
}

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export function isRetryableError(error: unknown): boolean {
    if ((error instanceof GeminiError || error instanceof ImageGenError) && error.isRetryable) {
        return true;
    }
    const status = getErrorStatus(error);
    if (status !== undefined && RETRYABLE_STATUSES.has(status)) return true;

    const message = getErrorMessage(error).toLowerCase();
    return message.includes('429') ||
        message.includes('503') ||
        message.includes('network') ||
        message.includes('timeout') ||
        message.includes('econnreset');
}

function isPayloadError(error: unknown): boolean {
    const message = getErrorMessage(error).toLowerCase();
    return message.includes('context length') ||
        message.includes('token limit') ||
        message.includes('payload too large') ||
        getErrorStatus(error) === 400;
}

function toTerminalError(error: unknown, code: 'INVALID_REQUEST' | 'API_ERROR'): Error {
    if (error instanceof GeminiError || error instanceof ImageGenError) return error;
    const status = getErrorStatus(error);
    const terminalCode: GeminiErrorCode = status === 429 ? 'RATE_LIMIT' : status === 503 ? 'BUSY' : code;
    return new GeminiError(getErrorMessage(error), terminalCode, false, error);
}

export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
    const retries = options.retries ?? MAX_RETRIES;
    const maxDelay = options.maxDelayMs ?? MAX_DELAY_MS;
    const timeoutMs = options.timeoutMs ?? TIMEOUT_MS;
    const wait = options.sleep ?? sleep;
    const label = options.label ?? 'Gemini request';
    const deadline = Date.now() + timeoutMs;
    let delay = options.initialDelayMs ?? INITIAL_DELAY_MS;

    for (let attempt = 0; ; attempt++) {
        options.breaker?.acquire();

        const timeRemaining = deadline - Date.now();
        if (timeRemaining <= 0) {
            throw new GeminiError(`Request timed out after ${timeoutMs}ms`, 'TIMEOUT', false);
        }

        let timeoutId: NodeJS.Timeout | undefined;
        try {
            const timeoutPromise = new Promise<never>((_, reject) => {
                timeoutId = setTimeout(() => reject(new GeminiError('Request timed out', 'TIMEOUT', true)), timeRemaining);
            });

            const result = await Promise.race([fn(), timeoutPromise]);
            options.breaker?.recordSuccess();
            return result;
        } catch (error: unknown) {
            // Payload/context errors - DO NOT RETRY
            if (isPayloadError(error)) {
                options.breaker?.recordFailure(false);
                throw toTerminalError(error, 'INVALID_REQUEST');
            }

            const retryable = isRetryableError(error);
            options.breaker?.recordFailure(retryable);

            if (!retryable || attempt >= retries) {
                throw toTerminalError(error, 'API_ERROR');
            }

            // Exponential backoff with jitter, capped to the remaining deadline
            delay = Math.min(delay * 2, maxDelay);
            const timeLeft = deadline - Date.now();
            const nextDelay = Math.max(0, Math.min(delay + Math.random() * 200, timeLeft - 1));
            if (timeLeft <= 1) {
                throw new GeminiError("Deadline exceeded/insufficient time for retry", 'TIMEOUT', false);
            }

            console.warn(`[RETRY] Retrying ${label}... Attempts left: ${retries - attempt}. Delay: ${Math.round(nextDelay)}ms.`);
            await wait(nextDelay);
        } finally {
            if (timeoutId) clearTimeout(timeoutId);
        }
    }
}
