/**
 * Shared HTTP plumbing for the remote recognition providers.
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { ProviderError } from './errors.js';

/** The slice of an axios instance the providers use */
export type ProviderHttpClient = Pick<AxiosInstance, 'post'>;

const TRANSIENT_NETWORK_CODES = new Set([
    'ECONNABORTED',
    'ECONNREFUSED',
    'ECONNRESET',
    'ETIMEDOUT',
    'EAI_AGAIN',
    'ENOTFOUND',
    'ERR_NETWORK',
]);

/**
 * Translate an axios failure into a ProviderError.
 * Anything that is not an axios error is rethrown untouched.
 */
export function toProviderError(error: unknown, provider: string, action: string): ProviderError {
    if (!axios.isAxiosError(error)) {
        throw error;
    }

    const status = error.response?.status;

    if (status === undefined) {
        const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
        return new ProviderError(`${provider} ${action} failed: ${timedOut ? 'timeout' : 'network error'}`, {
            provider,
            code: timedOut ? 'TIMEOUT' : 'UNAVAILABLE',
            transient: error.code === undefined || TRANSIENT_NETWORK_CODES.has(error.code),
            cause: error,
        });
    }

    if (status === 429) {
        return new ProviderError(`${provider} ${action} rate limited`, {
            provider, code: 'RATE_LIMITED', transient: true, status, cause: error,
        });
    }
    if (status >= 500) {
        return new ProviderError(`${provider} ${action} failed with status ${status}`, {
            provider, code: 'UNAVAILABLE', transient: true, status, cause: error,
        });
    }
    if (status === 401 || status === 403) {
        return new ProviderError(`${provider} rejected the credentials`, {
            provider, code: 'AUTH_FAILED', transient: false, status, cause: error,
        });
    }
    if (status === 408) {
        return new ProviderError(`${provider} ${action} timed out`, {
            provider, code: 'TIMEOUT', transient: true, status, cause: error,
        });
    }

    return new ProviderError(`${provider} ${action} rejected the image (status ${status})`, {
        provider, code: status === 400 || status === 415 ? 'INVALID_IMAGE' : 'REQUEST_FAILED', transient: false, status, cause: error,
    });
}

export function badResponse(provider: string, action: string, cause: unknown): ProviderError {
    return new ProviderError(`${provider} ${action} returned an unexpected response`, {
        provider, code: 'BAD_RESPONSE', transient: false, cause,
    });
}
