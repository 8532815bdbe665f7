/**
 * Response Formatter
 *
 * Maps internal results to the snake_case wire contract. No decisions
 * are made here.
 */

import type { AggregateResult, ComparisonPolicy, ExtractionResult, PerFaceResult } from '../types/face.js';

export interface ExtractResponse {
    original_file: string;
    enhanced_image: string | null;
    faces: Array<{
        filename: string;
        saved_path: string | null;
        image_base64: string;
    }>;
}

export interface ComparisonEntry {
    face_index: number;
    face_found: boolean;
    match: boolean;
    confidence: number | null;
    face_distance: number | null;
    meets_threshold: boolean;
    error?: string;
}

export interface CompareResponse {
    reference_image_processed: true;
    tolerance: number;
    threshold: number;
    overall_match: boolean;
    average_confidence: number;
    comparisons: ComparisonEntry[];
    summary: {
        total_faces: number;
        faces_found: number;
        matches: number;
    };
}

export function toExtractResponse(result: ExtractionResult): ExtractResponse {
    return {
        original_file: result.originalFile,
        enhanced_image: result.enhancedImageRef,
        faces: result.faces.map((face) => ({
            filename: face.filename,
            saved_path: face.savedPath,
            image_base64: face.base64,
        })),
    };
}

function toComparisonEntry(result: PerFaceResult): ComparisonEntry {
    const entry: ComparisonEntry = {
        face_index: result.faceIndex,
        face_found: result.faceFound,
        match: result.match,
        confidence: result.confidence,
        face_distance: result.distance,
        meets_threshold: result.meetsThreshold,
    };
    if (!result.faceFound) {
        entry.error = result.error;
    }
    return entry;
}

export function toCompareResponse(result: AggregateResult, policy: ComparisonPolicy): CompareResponse {
    return {
        reference_image_processed: true,
        tolerance: policy.tolerance,
        threshold: policy.threshold,
        overall_match: result.overallMatch,
        average_confidence: result.averageConfidence,
        comparisons: result.comparisons.map(toComparisonEntry),
        summary: {
            total_faces: result.summary.totalFaces,
            faces_found: result.summary.facesFound,
            matches: result.summary.matches,
        },
    };
}
