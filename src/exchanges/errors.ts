export type MonitorErrorKind = 'auth' | 'rate-limit' | 'transient' | 'protocol';

export interface ExchangeErrorDetails {
    endpoint?: string;
    status?: number;
    code?: number;
    cause?: unknown;
}

export abstract class MonitorError extends Error {
    abstract readonly kind: MonitorErrorKind;
    readonly endpoint?: string;
    readonly status?: number;
    readonly code?: number;

    constructor(message: string, details: ExchangeErrorDetails = {}) {
        super(message, details.cause === undefined ? undefined : { cause: details.cause });
        this.name = new.target.name;
        this.endpoint = details.endpoint;
        this.status = details.status;
        this.code = details.code;
    }
}

export type AuthFailureReason = 'invalid-credentials' | 'permission-denied' | 'clock-skew';

/**
 * Credentials rejected, or the request timestamp fell outside the exchange's
 * recvWindow. Never retried.
 */
export class AuthError extends MonitorError {
    readonly kind = 'auth';
    readonly reason: AuthFailureReason;

    constructor(message: string, reason: AuthFailureReason, details: ExchangeErrorDetails = {}) {
        super(message, details);
        this.reason = reason;
    }
}

export class RateLimitError extends MonitorError {
    readonly kind = 'rate-limit';
    readonly retryAfterMs: number;

    constructor(message: string, retryAfterMs: number, details: ExchangeErrorDetails = {}) {
        super(message, details);
        this.retryAfterMs = retryAfterMs;
    }
}

// Network failure, timeout or 5xx.
export class TransientError extends MonitorError {
    readonly kind = 'transient';
}

// A refresh whose key was invalidated while it ran; its result was discarded.
export class SupersededRefreshError extends TransientError {}

// The response did not match the expected contract. Never retried.
export class ProtocolError extends MonitorError {
    readonly kind = 'protocol';
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export function isMonitorError(error: unknown): error is MonitorError {
    return error instanceof MonitorError;
}

/**
 * Wraps anything that is not already a MonitorError. Unknown failures are
 * treated as transient.
 */
export function toMonitorError(error: unknown, endpoint?: string): MonitorError {
    if (isMonitorError(error)) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new TransientError(message, { endpoint, cause: error });
}

export function describeError(error: MonitorError): string {
    switch (error.kind) {
        case 'auth':
            return error instanceof AuthError && error.reason === 'clock-skew'
                ? 'Local clock is out of sync with the exchange'
                : 'Reconfigure credentials: the exchange rejected the API key';
        case 'rate-limit':
            return error instanceof RateLimitError
                ? `Rate limited, retry in ${Math.ceil(error.retryAfterMs / 1000)}s`
                : 'Rate limited';
        case 'transient':
            return `Exchange temporarily unreachable: ${error.message}`;
        case 'protocol':
            return `Unexpected response from exchange: ${error.message}`;
    }
}
