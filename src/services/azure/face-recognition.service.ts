/**
 * Azure Face API Recognition Provider
 */

import axios from 'axios';
import { z } from 'zod';
import type { AzureFaceConfig } from '../../config/env.js';
import type { FaceBox, FaceComparison } from '../../types/face.js';
import { ProviderError } from '../errors.js';
import type { IFaceRecognitionProvider } from '../interfaces/face-recognition.interface.js';
import { badResponse, toProviderError } from '../provider-http.js';
import type { ProviderHttpClient } from '../provider-http.js';

const PROVIDER = 'Azure Face';

const DETECT_PARAMS = {
    returnFaceId: true,
    detectionModel: 'detection_03',
    recognitionModel: 'recognition_04',
    returnRecognitionModel: false,
};

const detectResponseSchema = z.array(
    z.object({
        faceId: z.string().optional(),
        faceRectangle: z.object({
            top: z.number(),
            left: z.number(),
            width: z.number(),
            height: z.number(),
        }),
    })
);

const verifyResponseSchema = z.object({
    isIdentical: z.boolean(),
    confidence: z.number().min(0).max(1),
});

type DetectedFace = z.infer<typeof detectResponseSchema>[number];

export class AzureFaceProvider implements IFaceRecognitionProvider {
    private http: ProviderHttpClient;
    /** Face ids of images already detected, keyed by buffer identity */
    private readonly faceIds = new WeakMap<Buffer, Promise<string>>();

    constructor(config: AzureFaceConfig, timeoutMs: number, http?: ProviderHttpClient) {
        this.http = http ?? axios.create({
            baseURL: `${config.endpoint}/face/v1.0`,
            timeout: timeoutMs,
            headers: { 'Ocp-Apim-Subscription-Key': config.key },
        });
    }

    getProviderName(): string {
        return 'azure';
    }

    async detectFaces(image: Buffer): Promise<FaceBox[]> {
        const faces = await this.detect(image);
        const faceId = faces[0]?.faceId;
        if (faceId) {
            this.faceIds.set(image, Promise.resolve(faceId));
        }
        return faces.map(({ faceRectangle: r }) => ({
            left: r.left,
            top: r.top,
            width: r.width,
            height: r.height,
        }));
    }

    async compareFaces(imageA: Buffer, imageB: Buffer): Promise<FaceComparison> {
        // One call in flight per comparison: the reference id is reused
        const faceIdA = await this.cachedFaceId(imageA);
        const faceIdB = await this.detectFirstFaceId(imageB);

        let data: unknown;
        try {
            ({ data } = await this.http.post('/verify', { faceId1: faceIdA, faceId2: faceIdB }, {
                headers: { 'Content-Type': 'application/json' },
            }));
        } catch (error) {
            throw toProviderError(error, PROVIDER, 'verify');
        }

        const parsed = verifyResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw badResponse(PROVIDER, 'verify', parsed.error);
        }
        console.log(`[AZURE] Verify confidence: ${parsed.data.confidence} (isIdentical=${parsed.data.isIdentical})`);

        // Azure reports same-identity confidence; it has no native distance
        return {
            similarity: parsed.data.confidence,
            distance: 1 - parsed.data.confidence,
        };
    }

    private async detect(image: Buffer): Promise<DetectedFace[]> {
        let data: unknown;
        try {
            ({ data } = await this.http.post('/detect', image, {
                params: DETECT_PARAMS,
                headers: { 'Content-Type': 'application/octet-stream' },
            }));
        } catch (error) {
            throw toProviderError(error, PROVIDER, 'detect');
        }

        const parsed = detectResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw badResponse(PROVIDER, 'detect', parsed.error);
        }
        console.log(`[AZURE] Raw detected faces count: ${parsed.data.length}`);
        return parsed.data;
    }

    private cachedFaceId(image: Buffer): Promise<string> {
        const cached = this.faceIds.get(image);
        if (cached) {
            return cached;
        }
        const pending = this.detectFirstFaceId(image).catch((error: unknown) => {
            this.faceIds.delete(image);
            throw error;
        });
        this.faceIds.set(image, pending);
        return pending;
    }

    private async detectFirstFaceId(image: Buffer): Promise<string> {
        const faces = await this.detect(image);
        const faceId = faces[0]?.faceId;
        if (!faceId) {
            throw new ProviderError('No face detected in image', {
                provider: PROVIDER,
                code: 'NO_FACE_DETECTED',
                transient: false,
            });
        }
        return faceId;
    }
}
