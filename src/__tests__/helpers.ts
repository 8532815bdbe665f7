import { AxiosError, AxiosHeaders } from 'axios';
import { loadConfig } from '../config/env.js';
import type { AppConfig } from '../config/env.js';
import { ProviderError } from '../services/errors.js';
import type { IFaceRecognitionProvider } from '../services/interfaces/face-recognition.interface.js';
import type { FaceBox, FaceComparison } from '../types/face.js';

/** Bytes that pass the JPEG magic-byte sniff, tagged so tests can tell them apart */
export function fakeJpeg(tag: string): Buffer {
    return Buffer.concat([Buffer.from([0xff, 0xd8, 0xff, 0xe0]), Buffer.from(tag, 'utf8')]);
}

/** Uncompressed 24-bit bottom-up BMP filled with one colour */
export function solidBmp(width: number, height: number, bgr: [number, number, number] = [160, 180, 200]): Buffer {
    const rowSize = Math.ceil((width * 3) / 4) * 4;
    const pixelBytes = rowSize * height;
    const bmp = Buffer.alloc(54 + pixelBytes);

    bmp.write('BM', 0, 'latin1');
    bmp.writeUInt32LE(bmp.length, 2);
    bmp.writeUInt32LE(54, 10);
    bmp.writeUInt32LE(40, 14);
    bmp.writeInt32LE(width, 18);
    bmp.writeInt32LE(height, 22);
    bmp.writeUInt16LE(1, 26);
    bmp.writeUInt16LE(24, 28);
    bmp.writeUInt32LE(0, 30);
    bmp.writeUInt32LE(pixelBytes, 34);
    bmp.writeInt32LE(2835, 38);
    bmp.writeInt32LE(2835, 42);

    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            const offset = 54 + y * rowSize + x * 3;
            bmp[offset] = bgr[0];
            bmp[offset + 1] = bgr[1];
            bmp[offset + 2] = bgr[2];
        }
    }
    return bmp;
}

/** Reads the tag back out of a fakeJpeg buffer */
export function tagOf(bytes: Buffer): string {
    return bytes.subarray(4).toString('utf8');
}

export function transientError(): ProviderError {
    return new ProviderError('rate limited', { provider: 'scripted', code: 'RATE_LIMITED', transient: true, status: 429 });
}

export function permanentError(): ProviderError {
    return new ProviderError('bad image', { provider: 'scripted', code: 'INVALID_IMAGE', transient: false, status: 400 });
}

type CompareScript = Array<FaceComparison | ProviderError>;

/**
 * In-memory provider driven by per-image scripts keyed by fakeJpeg tag.
 * Each call consumes the next scripted outcome; the last one repeats.
 */
export class ScriptedProvider implements IFaceRecognitionProvider {
    readonly detectCalls: string[] = [];
    readonly compareCalls: Array<{ a: Buffer; b: Buffer }> = [];
    inFlight = 0;
    maxInFlight = 0;

    private detections = new Map<string, Array<FaceBox[] | ProviderError>>();
    private comparisons = new Map<string, CompareScript>();

    constructor(private readonly compareDelayMs: (tag: string) => number = () => 0) {}

    getProviderName(): string {
        return 'scripted';
    }

    onDetect(tag: string, ...outcomes: Array<FaceBox[] | ProviderError>): this {
        this.detections.set(tag, outcomes);
        return this;
    }

    onCompare(tag: string, ...outcomes: CompareScript): this {
        this.comparisons.set(tag, outcomes);
        return this;
    }

    async detectFaces(image: Buffer): Promise<FaceBox[]> {
        const tag = tagOf(image);
        this.detectCalls.push(tag);
        const outcome = next(this.detections.get(tag)) ?? [];
        if (outcome instanceof ProviderError) {
            throw outcome;
        }
        return outcome;
    }

    async compareFaces(imageA: Buffer, imageB: Buffer): Promise<FaceComparison> {
        this.compareCalls.push({ a: imageA, b: imageB });
        const tag = tagOf(imageB);
        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        try {
            const delay = this.compareDelayMs(tag);
            if (delay > 0) {
                await new Promise((resolve) => setTimeout(resolve, delay));
            }
            const outcome = next(this.comparisons.get(tag));
            if (!outcome) {
                throw new Error(`No comparison scripted for ${tag}`);
            }
            if (outcome instanceof ProviderError) {
                throw outcome;
            }
            return outcome;
        } finally {
            this.inFlight--;
        }
    }

    comparesFor(tag: string): number {
        return this.compareCalls.filter((c) => tagOf(c.b) === tag).length;
    }
}

function next<T>(script: T[] | undefined): T | undefined {
    if (!script || script.length === 0) {
        return undefined;
    }
    return script.length > 1 ? script.shift() : script[0];
}

export const ONE_FACE: FaceBox[] = [{ left: 0, top: 0, width: 10, height: 10 }];

export function similarity(value: number): FaceComparison {
    return { similarity: value, distance: 1 - value };
}

export function testConfig(env: Record<string, string> = {}): AppConfig {
    return loadConfig({
        FACE_PROVIDER: 'mock',
        PROVIDER_RETRY_BASE_MS: '0',
        ...env,
    });
}

/** An axios failure carrying an HTTP response */
export function httpError(status: number, data: unknown = {}): AxiosError {
    const config = { headers: new AxiosHeaders() };
    return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, undefined, {
        data,
        status,
        statusText: '',
        headers: {},
        config,
    });
}

/** An axios failure that never got a response */
export function networkError(code: string): AxiosError {
    return new AxiosError(`socket failure ${code}`, code);
}
