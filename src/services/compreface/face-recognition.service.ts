/**
 * CompreFace Recognition Provider
 *
 * Talks to a self-hosted CompreFace server through two services created
 * in its UI: a Face Detection service and a Face Verification service.
 * Each has its own API key. Images travel as base64 JSON bodies.
 */

import axios from 'axios';
import { z } from 'zod';
import type { CompreFaceConfig } from '../../config/env.js';
import type { FaceBox, FaceComparison } from '../../types/face.js';
import { ProviderError } from '../errors.js';
import type { IFaceRecognitionProvider } from '../interfaces/face-recognition.interface.js';
import { badResponse, toProviderError } from '../provider-http.js';
import type { ProviderHttpClient } from '../provider-http.js';

const PROVIDER = 'CompreFace';

/** CompreFace error code for "No face is found in the given image" */
const NO_FACE_FOUND_CODE = 28;

const boxSchema = z.object({
    probability: z.number().optional(),
    x_min: z.number(),
    y_min: z.number(),
    x_max: z.number(),
    y_max: z.number(),
});

const detectResponseSchema = z.object({
    result: z.array(z.object({ box: boxSchema })),
});

const verifyResponseSchema = z.object({
    result: z.array(
        z.object({
            face_matches: z.array(
                z.object({
                    box: boxSchema.optional(),
                    similarity: z.number().min(0).max(1),
                })
            ),
        })
    ),
});

const errorBodySchema = z.object({ code: z.number() });

export class CompreFaceProvider implements IFaceRecognitionProvider {
    private http: ProviderHttpClient;

    constructor(private readonly config: CompreFaceConfig, timeoutMs: number, http?: ProviderHttpClient) {
        this.http = http ?? axios.create({
            baseURL: `${config.baseUrl}/api/v1`,
            timeout: timeoutMs,
            headers: { 'Content-Type': 'application/json' },
        });
    }

    getProviderName(): string {
        return 'compreface';
    }

    async detectFaces(image: Buffer): Promise<FaceBox[]> {
        let data: unknown;
        try {
            ({ data } = await this.http.post('/detection/detect', { file: image.toString('base64') }, {
                headers: { 'x-api-key': this.config.detectionApiKey },
            }));
        } catch (error) {
            if (isNoFaceResponse(error)) {
                console.log('[COMPREFACE] No face found in image');
                return [];
            }
            throw toProviderError(error, PROVIDER, 'detect');
        }

        const parsed = detectResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw badResponse(PROVIDER, 'detect', parsed.error);
        }

        return parsed.data.result.map(({ box }) => ({
            left: box.x_min,
            top: box.y_min,
            width: box.x_max - box.x_min,
            height: box.y_max - box.y_min,
        }));
    }

    async compareFaces(imageA: Buffer, imageB: Buffer): Promise<FaceComparison> {
        let data: unknown;
        try {
            ({ data } = await this.http.post('/verification/verify', {
                source_image: imageA.toString('base64'),
                target_image: imageB.toString('base64'),
            }, {
                headers: { 'x-api-key': this.config.verificationApiKey },
            }));
        } catch (error) {
            if (isNoFaceResponse(error)) {
                throw new ProviderError('No face detected in image', {
                    provider: PROVIDER,
                    code: 'NO_FACE_DETECTED',
                    transient: false,
                    status: 400,
                    cause: error,
                });
            }
            throw toProviderError(error, PROVIDER, 'verify');
        }

        const parsed = verifyResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw badResponse(PROVIDER, 'verify', parsed.error);
        }

        // Best match among all faces CompreFace paired up
        const similarities = parsed.data.result.flatMap((r) => r.face_matches.map((m) => m.similarity));
        if (similarities.length === 0) {
            throw new ProviderError('No face detected in image', {
                provider: PROVIDER,
                code: 'NO_FACE_DETECTED',
                transient: false,
            });
        }

        const similarity = Math.max(...similarities);
        console.log(`[COMPREFACE] Face matches: ${similarities.length}, best similarity: ${similarity}`);
        return { similarity, distance: 1 - similarity };
    }
}

function isNoFaceResponse(error: unknown): boolean {
    if (!axios.isAxiosError(error) || error.response?.status !== 400) {
        return false;
    }
    const body = errorBodySchema.safeParse(error.response.data);
    return body.success && body.data.code === NO_FACE_FOUND_CODE;
}
