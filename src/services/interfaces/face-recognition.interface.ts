/**
 * Recognition Provider Interface
 *
 * Abstracts face detection and one-to-one verification. Implementations:
 * - AzureFaceProvider: Azure Face API (detect + verify)
 * - CompreFaceProvider: on-premise CompreFace detection/verification services
 * - MockFaceProvider: deterministic scores for local development
 *
 * Callers only ever see the normalized shapes below. Failures are raised
 * as ProviderError with `transient` set for retryable conditions.
 */

import type { FaceBox, FaceComparison } from '../../types/face.js';

export interface IFaceRecognitionProvider {
    /**
     * Detect faces in an image.
     *
     * @returns Boxes in provider order, empty when the image has no face
     */
    detectFaces(image: Buffer): Promise<FaceBox[]>;

    /**
     * Compare the most prominent face of each image.
     * Fails with a non-transient NO_FACE_DETECTED error when either side has none.
     */
    compareFaces(imageA: Buffer, imageB: Buffer): Promise<FaceComparison>;

    /**
     * Get the provider name for this service
     */
    getProviderName(): string;
}
