/**
 * Service Factory
 *
 * Builds the provider and pipeline services from an AppConfig.
 * FACE_PROVIDER picks the provider behind /compare_faces and /extract_kyc;
 * CompreFace is also built whenever its credentials are present so the
 * /compare_faces_compreface route can use it.
 */

import type { AppConfig } from '../config/env.js';
import { AzureFaceProvider } from './azure/face-recognition.service.js';
import { ComparisonService } from './comparison.service.js';
import { CompreFaceProvider } from './compreface/face-recognition.service.js';
import { FaceExtractionService } from './extraction.service.js';
import { imageService } from './image.service.js';
import type { ImageService } from './image.service.js';
import type { IFaceRecognitionProvider } from './interfaces/face-recognition.interface.js';
import type { ICropStorage } from './interfaces/storage.interface.js';
import { LocalCropStorage } from './local/storage.service.js';
import { MockFaceProvider } from './mock/face-recognition.service.js';

export interface FaceServices {
    extraction: FaceExtractionService;
    comparison: ComparisonService;
    /** Null when CompreFace credentials are not configured */
    compreFaceComparison: ComparisonService | null;
    providerName: string;
}

export interface ServiceOverrides {
    provider?: IFaceRecognitionProvider;
    compreFaceProvider?: IFaceRecognitionProvider | null;
    storage?: ICropStorage;
    images?: ImageService;
}

export function createFaceProvider(config: AppConfig): IFaceRecognitionProvider {
    switch (config.provider) {
        case 'azure':
            if (!config.azure) {
                throw new Error('Azure Face credentials are not configured');
            }
            return new AzureFaceProvider(config.azure, config.providerTimeoutMs);
        case 'compreface':
            if (!config.compreFace) {
                throw new Error('CompreFace credentials are not configured');
            }
            return new CompreFaceProvider(config.compreFace, config.providerTimeoutMs);
        case 'mock':
            return new MockFaceProvider();
    }
}

export function createFaceServices(config: AppConfig, overrides: ServiceOverrides = {}): FaceServices {
    const provider = overrides.provider ?? createFaceProvider(config);
    const storage = overrides.storage ?? new LocalCropStorage(config.outputDir);
    const images = overrides.images ?? imageService;
    const readCrop = (facePath: string) => storage.read(facePath);

    const comparisonOptions = {
        concurrency: config.maxConcurrentComparisons,
        retry: config.retry,
    };

    let compreFaceProvider: IFaceRecognitionProvider | null;
    if (overrides.compreFaceProvider !== undefined) {
        compreFaceProvider = overrides.compreFaceProvider;
    } else if (provider instanceof CompreFaceProvider) {
        compreFaceProvider = provider;
    } else {
        compreFaceProvider = config.compreFace
            ? new CompreFaceProvider(config.compreFace, config.providerTimeoutMs)
            : null;
    }

    return {
        extraction: new FaceExtractionService(provider, images, storage, {
            persist: config.persistCrops,
            retry: config.retry,
        }),
        comparison: new ComparisonService(provider, readCrop, comparisonOptions),
        compreFaceComparison: compreFaceProvider
            ? new ComparisonService(compreFaceProvider, readCrop, comparisonOptions)
            : null,
        providerName: provider.getProviderName(),
    };
}
