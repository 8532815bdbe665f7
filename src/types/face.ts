/**
 * Face Match Domain Types
 *
 * Shared shapes for the extraction and comparison pipelines.
 * Provider-specific payloads never appear here.
 */

export type ImageFormat = 'jpeg' | 'png' | 'bmp' | 'gif';

/** Face bounding box in pixels of the analysed image */
export interface FaceBox {
    left: number;
    top: number;
    width: number;
    height: number;
}

export interface DocumentImage {
    readonly bytes: Buffer;
    readonly format: ImageFormat;
    /** Client-supplied filename, used to name persisted crops */
    readonly filename: string;
}

export interface FaceRegion {
    /** 1-based, in provider detection order */
    readonly index: number;
    readonly boundingBox: FaceBox;
    readonly cropBytes: Buffer;
    readonly base64: string;
    readonly filename: string;
    readonly savedPath: string | null;
}

export interface ExtractionResult {
    originalFile: string;
    enhancedImageRef: string | null;
    faces: FaceRegion[];
}

/**
 * A face to match against the reference, in exactly one source form.
 * Resolved once at the HTTP boundary.
 */
export type ComparisonCandidate =
    | { kind: 'path'; facePath: string }
    | { kind: 'base64'; base64: string }
    | { kind: 'upload'; bytes: Buffer; filename?: string };

export interface ComparisonPolicy {
    /** Echoed to callers; the match decision is threshold-driven */
    readonly tolerance: number;
    readonly threshold: number;
}

export const DEFAULT_POLICY: ComparisonPolicy = Object.freeze({
    tolerance: 0.5,
    threshold: 0.8,
});

export interface FaceComparison {
    /** Same-identity score in [0, 1] */
    similarity: number;
    /** Lower is more similar */
    distance: number;
}

export type PerFaceResult =
    | {
        faceIndex: number;
        faceFound: true;
        confidence: number;
        distance: number;
        meetsThreshold: boolean;
        match: boolean;
    }
    | {
        faceIndex: number;
        faceFound: false;
        confidence: null;
        distance: null;
        meetsThreshold: false;
        match: false;
        /** Stable failure code, never provider text */
        error: string;
    };

export interface AggregateResult {
    overallMatch: boolean;
    averageConfidence: number;
    comparisons: PerFaceResult[];
    summary: {
        totalFaces: number;
        facesFound: number;
        matches: number;
    };
}
