/**
 * Comparison Service
 *
 * Matches a reference selfie against document face candidates.
 *
 * Flow:
 * 1. Reject an empty candidate list before touching the provider
 * 2. Detect the reference face; none found is fatal for the request
 * 3. Normalize every candidate to bytes
 * 4. Compare each candidate in a bounded pool, retrying transient failures
 * 5. Aggregate: any match verifies the document
 *
 * A provider failure on one candidate only marks that candidate as not found.
 */

import { promisePool } from '../lib/promise-pool.js';
import { withRetry } from '../lib/retry.js';
import type {
    AggregateResult,
    ComparisonCandidate,
    ComparisonPolicy,
    PerFaceResult,
} from '../types/face.js';
import { normalizeCandidate } from './encoding.service.js';
import type { CropReader } from './encoding.service.js';
import { NoFaceDetectedError, ProviderError, ValidationError } from './errors.js';
import type { IFaceRecognitionProvider } from './interfaces/face-recognition.interface.js';

export interface ComparisonOptions {
    concurrency: number;
    retry: { maxRetries: number; baseDelayMs: number };
}

export class ComparisonService {
    constructor(
        private readonly provider: IFaceRecognitionProvider,
        private readonly readCrop: CropReader,
        private readonly options: ComparisonOptions
    ) {}

    async compare(
        reference: Buffer,
        candidates: readonly ComparisonCandidate[],
        policy: ComparisonPolicy
    ): Promise<AggregateResult> {
        if (candidates.length === 0) {
            throw new ValidationError('Missing cropped faces');
        }

        const referenceFaces = await this.withProviderRetry('reference detection', () =>
            this.provider.detectFaces(reference)
        );
        if (referenceFaces.length === 0) {
            throw new NoFaceDetectedError();
        }

        const candidateBytes: Buffer[] = [];
        for (const candidate of candidates) {
            candidateBytes.push(await normalizeCandidate(candidate, this.readCrop));
        }

        const comparisons = await promisePool(candidateBytes, this.options.concurrency, (bytes, i) =>
            this.compareOne(reference, bytes, i + 1, policy)
        );

        const result = aggregate(comparisons);
        console.log(
            `[COMPARE] ${this.provider.getProviderName()}: ${result.summary.matches}/${result.summary.facesFound} ` +
            `match(es) across ${result.summary.totalFaces} candidate(s), overall=${result.overallMatch}`
        );
        return result;
    }

    private async compareOne(
        reference: Buffer,
        candidate: Buffer,
        faceIndex: number,
        policy: ComparisonPolicy
    ): Promise<PerFaceResult> {
        try {
            const { similarity, distance } = await this.withProviderRetry(`face ${faceIndex}`, () =>
                this.provider.compareFaces(reference, candidate)
            );
            const meetsThreshold = similarity >= policy.threshold;
            return {
                faceIndex,
                faceFound: true,
                confidence: similarity,
                distance,
                meetsThreshold,
                match: meetsThreshold,
            };
        } catch (error) {
            if (!(error instanceof ProviderError)) {
                throw error;
            }
            console.warn(`[COMPARE] Face ${faceIndex} failed (${error.code}): ${error.message}`);
            return {
                faceIndex,
                faceFound: false,
                confidence: null,
                distance: null,
                meetsThreshold: false,
                match: false,
                error: error.code,
            };
        }
    }

    private withProviderRetry<T>(label: string, fn: () => Promise<T>): Promise<T> {
        return withRetry(fn, {
            retries: this.options.retry.maxRetries,
            baseDelayMs: this.options.retry.baseDelayMs,
            shouldRetry: (error) => error instanceof ProviderError && error.transient,
            onRetry: (error, attempt, delayMs) => {
                const reason = error instanceof Error ? error.message : String(error);
                console.warn(`[COMPARE] Retrying ${label} (attempt ${attempt}) in ${delayMs}ms: ${reason}`);
            },
        });
    }
}

/**
 * Summarize per-face results. Faces that were not found carry no
 * confidence and are left out of the average.
 */
export function aggregate(comparisons: PerFaceResult[]): AggregateResult {
    const found = comparisons.filter((c) => c.faceFound);
    const matches = comparisons.filter((c) => c.match).length;

    let averageConfidence = 0;
    if (found.length > 0) {
        let sum = 0;
        for (const c of found) {
            sum += c.confidence ?? 0;
        }
        averageConfidence = sum / found.length;
    }

    return {
        overallMatch: matches > 0,
        averageConfidence,
        comparisons,
        summary: {
            totalFaces: comparisons.length,
            facesFound: found.length,
            matches,
        },
    };
}
