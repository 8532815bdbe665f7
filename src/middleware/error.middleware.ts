import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import {
    NoFaceDetectedError,
    ProviderError,
    ProviderNotConfiguredError,
    ValidationError,
} from '../services/errors.js';

export interface ApiError extends Error {
    statusCode?: number;
    code?: string;
}

export interface ErrorBody {
    error: string;
    message: string;
}

/**
 * Map any thrown value to a status code and a stable error body.
 * Stack traces and provider payloads never leave the process.
 */
export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
    if (err instanceof ValidationError) {
        return { status: 400, body: { error: err.code, message: err.message } };
    }
    if (err instanceof multer.MulterError) {
        return { status: 400, body: { error: 'VALIDATION_ERROR', message: describeUploadError(err) } };
    }
    if (err instanceof NoFaceDetectedError) {
        return { status: 422, body: { error: err.code, message: err.message } };
    }
    if (err instanceof ProviderError) {
        return err.transient
            ? { status: 503, body: { error: 'PROVIDER_UNAVAILABLE', message: 'Face recognition provider is temporarily unavailable' } }
            : { status: 502, body: { error: 'PROVIDER_ERROR', message: 'Face recognition provider rejected the request' } };
    }
    if (err instanceof ProviderNotConfiguredError) {
        return { status: 503, body: { error: err.code, message: err.message } };
    }
    if (isApiError(err)) {
        return {
            status: err.statusCode,
            body: { error: err.code || 'ERROR', message: err.message },
        };
    }
    return { status: 500, body: { error: 'INTERNAL_ERROR', message: 'Internal server error' } };
}

function describeUploadError(err: multer.MulterError): string {
    switch (err.code) {
        case 'LIMIT_FILE_SIZE':
            return 'Uploaded file is too large';
        case 'LIMIT_FIELD_VALUE':
            return err.field ? `Form field ${err.field} is too large` : 'A form field is too large';
        case 'LIMIT_FILE_COUNT':
            return 'Too many files uploaded';
        case 'LIMIT_UNEXPECTED_FILE':
            return `Unexpected upload field: ${err.field ?? 'unknown'}`;
        default:
            return err.message;
    }
}

function isApiError(err: unknown): err is ApiError & { statusCode: number } {
    return err instanceof Error && 'statusCode' in err && typeof err.statusCode === 'number';
}

export function errorHandler(
    err: unknown,
    req: Request,
    res: Response,
    // Express recognizes error handlers by arity
    _next: NextFunction
) {
    const { status, body } = toErrorResponse(err);

    if (status >= 500) {
        console.error(`[ERROR] ${req.method} ${req.path} -> ${status} ${body.error}:`, err);
    } else {
        console.warn(`[ERROR] ${req.method} ${req.path} -> ${status} ${body.error}: ${body.message}`);
    }

    res.status(status).json(body);
}

export function createError(message: string, statusCode: number, code?: string): ApiError {
    const error: ApiError = new Error(message);
    error.statusCode = statusCode;
    error.code = code;
    return error;
}

export function unauthorized(message = 'Unauthorized'): ApiError {
    return createError(message, 401, 'UNAUTHORIZED');
}
