import crypto from 'crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { unauthorized } from './error.middleware.js';

// ============================================================================
// FUNCTION KEY AUTH
// ============================================================================

/**
 * Requires the shared access key in the `x-functions-key` header or the
 * `code` query parameter. Passes everything through when no key is configured.
 */
export function requireFunctionKey(functionKey: string | undefined): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        if (!functionKey) {
            return next();
        }

        const header = req.headers['x-functions-key'];
        const query = req.query.code;
        const supplied = typeof header === 'string'
            ? header
            : typeof query === 'string' ? query : undefined;

        if (!supplied || !keysMatch(supplied, functionKey)) {
            return next(unauthorized('Missing or invalid function key'));
        }

        next();
    };
}

function keysMatch(supplied: string, expected: string): boolean {
    const a = crypto.createHash('sha256').update(supplied).digest();
    const b = crypto.createHash('sha256').update(expected).digest();
    return crypto.timingSafeEqual(a, b);
}
