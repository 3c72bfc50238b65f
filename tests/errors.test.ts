import { describe, expect, it } from 'vitest';
import {
    AuthError,
    ProtocolError,
    RateLimitError,
    TransientError,
    describeError,
    isMonitorError,
    toMonitorError
} from '../src/exchanges/errors';

describe('errors', () => {
    it('names errors after their class and keeps request details', () => {
        const error = new AuthError('Binance API error: Invalid API-key', 'invalid-credentials', {
            endpoint: '/fapi/v2/account',
            status: 401,
            code: -2014
        });

        expect(error.name).toBe('AuthError');
        expect(error.kind).toBe('auth');
        expect(error.endpoint).toBe('/fapi/v2/account');
        expect(error.status).toBe(401);
        expect(error.code).toBe(-2014);
        expect(error).toBeInstanceOf(Error);
    });

    it('wraps unknown failures as transient and leaves typed ones alone', () => {
        const typed = new ProtocolError('bad payload');
        const wrapped = toMonitorError(new Error('socket hang up'), '/fapi/v1/income');

        expect(toMonitorError(typed)).toBe(typed);
        expect(wrapped).toBeInstanceOf(TransientError);
        expect(wrapped.message).toBe('socket hang up');
        expect(wrapped.endpoint).toBe('/fapi/v1/income');
        expect(toMonitorError('boom').message).toBe('boom');
        expect(isMonitorError(new Error('plain'))).toBe(false);
    });

    it('describes each failure for the user', () => {
        expect(describeError(new AuthError('x', 'invalid-credentials'))).toBe('Reconfigure credentials: the exchange rejected the API key');
        expect(describeError(new AuthError('x', 'clock-skew'))).toBe('Local clock is out of sync with the exchange');
        expect(describeError(new RateLimitError('x', 4500))).toBe('Rate limited, retry in 5s');
        expect(describeError(new TransientError('HTTP 502'))).toBe('Exchange temporarily unreachable: HTTP 502');
        expect(describeError(new ProtocolError('missing field'))).toBe('Unexpected response from exchange: missing field');
    });
});
