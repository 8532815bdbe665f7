/**
 * Domain Errors
 *
 * Every failure the pipeline raises on purpose is one of these.
 * The error middleware maps them to HTTP responses.
 */

export class ValidationError extends Error {
    readonly code = 'VALIDATION_ERROR';

    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

/** Zero faces on the reference image. Fatal for the whole comparison. */
export class NoFaceDetectedError extends Error {
    readonly code = 'NO_FACE_DETECTED';

    constructor(message = 'No face detected in reference image') {
        super(message);
        this.name = 'NoFaceDetectedError';
    }
}

export type ProviderErrorCode =
    | 'NO_FACE_DETECTED'
    | 'RATE_LIMITED'
    | 'UNAVAILABLE'
    | 'TIMEOUT'
    | 'AUTH_FAILED'
    | 'INVALID_IMAGE'
    | 'BAD_RESPONSE'
    | 'REQUEST_FAILED';

export interface ProviderErrorOptions {
    provider: string;
    code: ProviderErrorCode;
    transient: boolean;
    status?: number;
    cause?: unknown;
}

/**
 * Recognition provider failure.
 * `transient` marks rate limits, 5xx and transport failures as retryable.
 */
export class ProviderError extends Error {
    readonly provider: string;
    readonly code: ProviderErrorCode;
    readonly transient: boolean;
    readonly status?: number;

    constructor(message: string, options: ProviderErrorOptions) {
        super(message, { cause: options.cause });
        this.name = 'ProviderError';
        this.provider = options.provider;
        this.code = options.code;
        this.transient = options.transient;
        this.status = options.status;
    }
}

export class ProviderNotConfiguredError extends Error {
    readonly code = 'PROVIDER_NOT_CONFIGURED';

    constructor(provider: string) {
        super(`${provider} verification is not configured`);
        this.name = 'ProviderNotConfiguredError';
    }
}
