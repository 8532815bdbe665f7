/**
 * Encoding Normalizer
 *
 * Resolves every candidate form (stored crop path, base64 string, upload)
 * to the bytes handed to the recognition provider. Only validation happens
 * here; the bytes themselves are never re-encoded.
 */

import type { ComparisonCandidate, ImageFormat } from '../types/face.js';
import { ValidationError } from './errors.js';

/** Reads a stored crop; rejects paths outside the storage root */
export type CropReader = (facePath: string) => Promise<Buffer>;

const DATA_URL_PREFIX = /^data:image\/[a-z0-9.+-]+;base64,/i;
const BASE64_BODY = /^[A-Za-z0-9+/_-]*={0,2}$/;

/**
 * Identify a supported image format from its magic bytes.
 */
export function sniffImageFormat(bytes: Buffer): ImageFormat | null {
    if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
        return 'jpeg';
    }
    if (
        bytes.length >= 8 &&
        bytes.subarray(0, 8).equals(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))
    ) {
        return 'png';
    }
    if (bytes.length >= 6) {
        const header = bytes.subarray(0, 6).toString('latin1');
        if (header === 'GIF87a' || header === 'GIF89a') {
            return 'gif';
        }
    }
    // "BM" plus room for the 14-byte file header
    if (bytes.length >= 14 && bytes[0] === 0x42 && bytes[1] === 0x4d) {
        return 'bmp';
    }
    return null;
}

/**
 * Ensure bytes are a supported image, returning the detected format.
 */
export function assertSupportedImage(bytes: Buffer, label: string): ImageFormat {
    if (bytes.length === 0) {
        throw new ValidationError(`${label} is empty`);
    }
    const format = sniffImageFormat(bytes);
    if (!format) {
        throw new ValidationError(`${label} is not a supported image (jpeg, png, bmp, gif)`);
    }
    return format;
}

/**
 * Decode a base64 image, optionally wrapped in a data URL.
 * Whitespace is ignored; both the standard and URL-safe alphabets are accepted.
 */
export function decodeBase64Image(value: string, label = 'Base64 face'): Buffer {
    const body = value.trim().replace(DATA_URL_PREFIX, '').replace(/\s+/g, '');

    if (body.length === 0) {
        throw new ValidationError(`${label} is empty`);
    }
    if (!BASE64_BODY.test(body) || body.length % 4 === 1) {
        throw new ValidationError(`${label} is not valid base64`);
    }

    // Node's base64 decoder accepts the URL-safe alphabet as well
    const bytes = Buffer.from(body, 'base64');
    assertSupportedImage(bytes, label);
    return bytes;
}

export async function normalizeCandidate(
    candidate: ComparisonCandidate,
    readCrop: CropReader
): Promise<Buffer> {
    switch (candidate.kind) {
        case 'path': {
            const bytes = await readCrop(candidate.facePath);
            assertSupportedImage(bytes, `Face path ${candidate.facePath}`);
            return bytes;
        }
        case 'base64':
            return decodeBase64Image(candidate.base64);
        case 'upload':
            assertSupportedImage(candidate.bytes, `Uploaded face ${candidate.filename ?? ''}`.trim());
            return candidate.bytes;
    }
}
