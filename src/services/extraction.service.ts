/**
 * Face Extraction Service
 *
 * Enhances an identity document, detects faces on the enhanced image and
 * returns one crop per detection. Indices follow provider order.
 *
 * Zero detections is a successful, empty extraction. Only a failing
 * detection call is an error.
 */

import path from 'path';
import { v4 as uuid } from 'uuid';
import { withRetry } from '../lib/retry.js';
import type { DocumentImage, ExtractionResult, FaceRegion } from '../types/face.js';
import { ProviderError } from './errors.js';
import type { ImageService } from './image.service.js';
import type { IFaceRecognitionProvider } from './interfaces/face-recognition.interface.js';
import type { ICropStorage } from './interfaces/storage.interface.js';

export interface ExtractionOptions {
    /** Persist the enhanced image and crops; when false no paths are returned */
    persist: boolean;
    retry: { maxRetries: number; baseDelayMs: number };
}

export class FaceExtractionService {
    constructor(
        private readonly provider: IFaceRecognitionProvider,
        private readonly images: ImageService,
        private readonly storage: ICropStorage,
        private readonly options: ExtractionOptions
    ) {}

    async extract(image: DocumentImage): Promise<ExtractionResult> {
        const requestId = uuid();
        const baseName = path.parse(path.basename(image.filename)).name || 'image';

        const enhanced = await this.images.enhance(image.bytes);

        const boxes = await withRetry(() => this.provider.detectFaces(enhanced.buffer), {
            retries: this.options.retry.maxRetries,
            baseDelayMs: this.options.retry.baseDelayMs,
            shouldRetry: (error) => error instanceof ProviderError && error.transient,
            onRetry: (error, attempt, delayMs) => {
                console.warn(`[EXTRACT] Detection retry ${attempt} in ${delayMs}ms: ${describe(error)}`);
            },
        });

        console.log(`[EXTRACT] ${this.provider.getProviderName()} detected ${boxes.length} face(s) in ${image.filename}`);

        let enhancedImageRef: string | null = null;
        if (this.options.persist) {
            const stored = await this.storage.save(requestId, `${baseName}_enhanced.jpg`, enhanced.buffer);
            enhancedImageRef = stored.path;
        }

        const faces: FaceRegion[] = [];
        for (const [i, box] of boxes.entries()) {
            const index = i + 1;
            const filename = `${baseName}_face_${index}.jpg`;
            const cropBytes = await this.images.crop(enhanced, box);

            const savedPath = this.options.persist
                ? (await this.storage.save(requestId, filename, cropBytes)).path
                : null;

            faces.push(Object.freeze({
                index,
                boundingBox: Object.freeze({ ...box }),
                cropBytes,
                base64: cropBytes.toString('base64'),
                filename,
                savedPath,
            }));
        }

        return {
            originalFile: image.filename,
            enhancedImageRef,
            faces,
        };
    }
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
