/**
 * Face Routes
 *
 * KYC document face extraction and selfie comparison.
 */

import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { toCompareResponse, toExtractResponse } from '../formatters/face-response.formatter.js';
import { requireFunctionKey } from '../middleware/auth.middleware.js';
import type { ComparisonService } from '../services/comparison.service.js';
import { assertSupportedImage } from '../services/encoding.service.js';
import { ProviderNotConfiguredError, ValidationError } from '../services/errors.js';
import type { FaceServices } from '../services/index.js';
import { DEFAULT_POLICY } from '../types/face.js';
import type { ComparisonCandidate, ComparisonPolicy } from '../types/face.js';

export const MAX_CANDIDATES = 32;

export interface FaceRouterOptions {
    functionKey?: string;
    maxUploadBytes: number;
}

type UploadedFiles = Record<string, Express.Multer.File[] | undefined>;

const emptyToUndefined = (v: unknown) => (v === '' ? undefined : v);

const unitInterval = (name: string, fallback: number) =>
    z.preprocess(
        emptyToUndefined,
        z.coerce
            .number({ invalid_type_error: `${name} must be a number` })
            .min(0, `${name} must be between 0 and 1`)
            .max(1, `${name} must be between 0 and 1`)
            .default(fallback)
    );

const compareFormSchema = z.object({
    tolerance: unitInterval('tolerance', DEFAULT_POLICY.tolerance),
    threshold: unitInterval('threshold', DEFAULT_POLICY.threshold),
    face_paths: z.preprocess(emptyToUndefined, z.string().optional()),
    cropped_faces: z
        .union([z.string(), z.array(z.string())])
        .optional()
        .transform((v) => (v === undefined ? [] : Array.isArray(v) ? v : [v]))
        .transform((v) => v.filter((s) => s.trim().length > 0)),
});

const facePathsSchema = z.array(z.string().min(1)).max(MAX_CANDIDATES);

type CompareForm = z.infer<typeof compareFormSchema>;

function parseFacePaths(raw: string): string[] {
    let decoded: unknown;
    try {
        decoded = JSON.parse(raw);
    } catch {
        throw new ValidationError('face_paths must be a JSON array of strings');
    }
    const parsed = facePathsSchema.safeParse(decoded);
    if (!parsed.success) {
        throw new ValidationError('face_paths must be a JSON array of strings');
    }
    return parsed.data;
}

/**
 * Resolve which candidate encoding the client sent.
 * Exactly one form may be used per request.
 */
export function resolveCandidates(form: CompareForm, uploads: Express.Multer.File[]): ComparisonCandidate[] {
    const facePaths = form.face_paths !== undefined ? parseFacePaths(form.face_paths) : [];

    const candidateSets: ComparisonCandidate[][] = [
        facePaths.map((facePath) => ({ kind: 'path' as const, facePath })),
        form.cropped_faces.map((base64) => ({ kind: 'base64' as const, base64 })),
        uploads.map((file) => ({ kind: 'upload' as const, bytes: file.buffer, filename: file.originalname })),
    ];

    const supplied = candidateSets.filter((set) => set.length > 0);
    if (supplied.length > 1) {
        throw new ValidationError('Provide exactly one of face_paths, cropped_faces or cropped_face_files');
    }

    const candidates = supplied[0] ?? [];
    if (candidates.length > MAX_CANDIDATES) {
        throw new ValidationError(`At most ${MAX_CANDIDATES} cropped faces can be compared per request`);
    }
    return candidates;
}

function parseCompareForm(body: unknown): CompareForm {
    const parsed = compareFormSchema.safeParse(body ?? {});
    if (!parsed.success) {
        throw new ValidationError(parsed.error.errors[0].message);
    }
    return parsed.data;
}

export function createFaceRouter(services: FaceServices, options: FaceRouterOptions): Router {
    const router = Router();

    // Configure multer for memory storage; content is checked by magic bytes
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: {
            fileSize: options.maxUploadBytes,
            // base64 candidates arrive as text fields: 4/3 of the bytes plus a data URL prefix
            fieldSize: Math.ceil((options.maxUploadBytes * 4) / 3) + 64,
            files: MAX_CANDIDATES + 1,
        },
    });

    router.use(requireFunctionKey(options.functionKey));

    /**
     * POST /extract_kyc
     * Upload an identity document (form field `file`); returns every detected face
     */
    router.post(
        '/extract_kyc',
        upload.single('file'),
        async (req: Request, res: Response, next: NextFunction) => {
            try {
                if (!req.file) {
                    throw new ValidationError("Upload image via form-data key 'file'");
                }

                const format = assertSupportedImage(req.file.buffer, 'Uploaded file');
                const result = await services.extraction.extract({
                    bytes: req.file.buffer,
                    format,
                    filename: req.file.originalname || 'image',
                });

                res.json(toExtractResponse(result));
            } catch (error) {
                next(error);
            }
        }
    );

    const compareFields = upload.fields([
        { name: 'reference_image', maxCount: 1 },
        { name: 'cropped_face_files', maxCount: MAX_CANDIDATES },
    ]);

    const compareHandler = (getService: () => ComparisonService) =>
        async (req: Request, res: Response, next: NextFunction) => {
            try {
                const service = getService();
                const files: UploadedFiles = req.files && !Array.isArray(req.files) ? req.files : {};

                const reference = files['reference_image']?.[0];
                if (!reference) {
                    throw new ValidationError("Missing 'reference_image' in form-data");
                }
                assertSupportedImage(reference.buffer, 'Reference image');

                const form = parseCompareForm(req.body);
                const policy: ComparisonPolicy = Object.freeze({
                    tolerance: form.tolerance,
                    threshold: form.threshold,
                });
                const candidates = resolveCandidates(form, files['cropped_face_files'] ?? []);

                const result = await service.compare(reference.buffer, candidates, policy);
                res.json(toCompareResponse(result, policy));
            } catch (error) {
                next(error);
            }
        };

    /**
     * POST /compare_faces
     * Compare a reference selfie with cropped document faces using the configured provider
     */
    router.post('/compare_faces', compareFields, compareHandler(() => services.comparison));

    /**
     * POST /compare_faces_compreface
     * Same contract, always backed by CompreFace
     */
    router.post('/compare_faces_compreface', compareFields, compareHandler(() => {
        if (!services.compreFaceComparison) {
            throw new ProviderNotConfiguredError('CompreFace');
        }
        return services.compreFaceComparison;
    }));

    return router;
}
