import { describe, it, expect, vi } from 'vitest';
import {
    assertSupportedImage,
    decodeBase64Image,
    normalizeCandidate,
    sniffImageFormat,
} from '../encoding.service.js';
import { ValidationError } from '../errors.js';

const JPEG = Buffer.from([0xff, 0xd8, 0xff, 0xdb, 0x00, 0x43]);
const PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00]);
const GIF = Buffer.from('GIF89a\x01\x00\x01\x00', 'latin1');
const BMP = Buffer.concat([Buffer.from('BM', 'latin1'), Buffer.alloc(14)]);

describe('sniffImageFormat', () => {
    it('recognizes each supported format by its magic bytes', () => {
        expect(sniffImageFormat(JPEG)).toBe('jpeg');
        expect(sniffImageFormat(PNG)).toBe('png');
        expect(sniffImageFormat(GIF)).toBe('gif');
        expect(sniffImageFormat(Buffer.from('GIF87a', 'latin1'))).toBe('gif');
        expect(sniffImageFormat(BMP)).toBe('bmp');
    });

    it('returns null for anything else', () => {
        expect(sniffImageFormat(Buffer.from('%PDF-1.7'))).toBeNull();
        expect(sniffImageFormat(Buffer.from('BM'))).toBeNull();
        expect(sniffImageFormat(Buffer.alloc(0))).toBeNull();
    });
});

describe('assertSupportedImage', () => {
    it('names the input in the error', () => {
        expect(() => assertSupportedImage(Buffer.from('hello'), 'Reference image'))
            .toThrow('Reference image is not a supported image (jpeg, png, bmp, gif)');
        expect(() => assertSupportedImage(Buffer.alloc(0), 'Reference image'))
            .toThrow('Reference image is empty');
    });
});

describe('decodeBase64Image', () => {
    it('decodes plain base64', () => {
        expect(decodeBase64Image(PNG.toString('base64')).equals(PNG)).toBe(true);
    });

    it('strips a data URL prefix and whitespace', () => {
        const encoded = JPEG.toString('base64');
        const wrapped = `data:image/jpeg;base64,${encoded.slice(0, 4)}\n${encoded.slice(4)}`;

        expect(decodeBase64Image(wrapped).equals(JPEG)).toBe(true);
    });

    it('accepts the URL-safe alphabet', () => {
        expect(decodeBase64Image(JPEG.toString('base64url')).equals(JPEG)).toBe(true);
    });

    it('rejects malformed base64', () => {
        expect(() => decodeBase64Image('abc$def')).toThrow(ValidationError);
        expect(() => decodeBase64Image('a')).toThrow('Base64 face is not valid base64');
        expect(() => decodeBase64Image('   ')).toThrow('Base64 face is empty');
    });

    it('rejects base64 that does not hold an image', () => {
        expect(() => decodeBase64Image(Buffer.from('plain text').toString('base64')))
            .toThrow('Base64 face is not a supported image (jpeg, png, bmp, gif)');
    });
});

describe('normalizeCandidate', () => {
    const readCrop = vi.fn(async () => GIF);

    it('passes uploaded bytes through unchanged', async () => {
        const bytes = await normalizeCandidate({ kind: 'upload', bytes: PNG, filename: 'face.png' }, readCrop);
        expect(bytes).toBe(PNG);
    });

    it('rejects uploads that are not images', async () => {
        await expect(normalizeCandidate({ kind: 'upload', bytes: Buffer.from('nope'), filename: 'face.txt' }, readCrop))
            .rejects.toThrow('Uploaded face face.txt is not a supported image (jpeg, png, bmp, gif)');
    });

    it('reads path candidates through the reader', async () => {
        const bytes = await normalizeCandidate({ kind: 'path', facePath: 'abc/doc_face_1.jpg' }, readCrop);

        expect(readCrop).toHaveBeenCalledWith('abc/doc_face_1.jpg');
        expect(bytes).toBe(GIF);
    });

    it('rejects a stored file that is not an image', async () => {
        const reader = vi.fn(async () => Buffer.from('not an image'));

        await expect(normalizeCandidate({ kind: 'path', facePath: 'x.jpg' }, reader))
            .rejects.toThrow('Face path x.jpg is not a supported image (jpeg, png, bmp, gif)');
    });

    it('yields the same bytes for base64 and upload forms', async () => {
        const fromBase64 = await normalizeCandidate({ kind: 'base64', base64: JPEG.toString('base64') }, readCrop);
        const fromUpload = await normalizeCandidate({ kind: 'upload', bytes: JPEG }, readCrop);

        expect(fromBase64.equals(fromUpload)).toBe(true);
    });
});
