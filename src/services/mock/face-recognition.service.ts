/**
 * Mock Recognition Provider
 *
 * Deterministic detection and scoring for running the service without
 * cloud credentials (FACE_PROVIDER=mock).
 *
 * DETERMINISTIC RULES:
 * - Every decodable image contains one face covering its central 50%
 * - Byte-identical images compare with similarity 1.0
 * - Other pairs score between 0.40 and 0.99 from a hash of both images
 */

import type { FaceBox, FaceComparison } from '../../types/face.js';
import { ProviderError } from '../errors.js';
import { imageService } from '../image.service.js';
import type { ImageService } from '../image.service.js';
import type { IFaceRecognitionProvider } from '../interfaces/face-recognition.interface.js';

// Deterministic seed for consistent mock results
function hashBytes(bytes: Buffer): number {
    let hash = 0;
    for (let i = 0; i < bytes.length; i++) {
        hash = ((hash << 5) - hash) + bytes[i];
        hash = hash & hash; // Convert to 32bit integer
    }
    return Math.abs(hash);
}

export class MockFaceProvider implements IFaceRecognitionProvider {
    constructor(private readonly images: ImageService = imageService) {}

    getProviderName(): string {
        return 'mock';
    }

    async detectFaces(image: Buffer): Promise<FaceBox[]> {
        let width: number;
        let height: number;
        try {
            ({ width, height } = await this.images.getMetadata(image));
        } catch (error) {
            throw new ProviderError('Mock provider could not decode image', {
                provider: 'mock',
                code: 'INVALID_IMAGE',
                transient: false,
                cause: error,
            });
        }

        if (width === 0 || height === 0) {
            return [];
        }

        return [{
            left: Math.floor(width / 4),
            top: Math.floor(height / 4),
            width: Math.max(1, Math.floor(width / 2)),
            height: Math.max(1, Math.floor(height / 2)),
        }];
    }

    async compareFaces(imageA: Buffer, imageB: Buffer): Promise<FaceComparison> {
        if (imageA.equals(imageB)) {
            return { similarity: 1, distance: 0 };
        }

        const seed = (hashBytes(imageA) + hashBytes(imageB)) % 60;
        const similarity = (40 + seed) / 100;
        return { similarity, distance: 1 - similarity };
    }
}
