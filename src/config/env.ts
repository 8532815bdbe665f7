/**
 * Environment Configuration
 *
 * Parsed once at startup into an immutable AppConfig that is passed
 * explicitly to the service factory. Credentials of the active provider
 * are required; the other provider's are optional.
 */

import { z } from 'zod';

export type FaceProviderName = 'azure' | 'compreface' | 'mock';

const booleanString = (fallback: 'true' | 'false') =>
    z.enum(['true', 'false']).default(fallback).transform((v) => v === 'true');

const optionalString = z
    .string()
    .trim()
    .optional()
    .transform((v) => (v ? v : undefined));

const envSchema = z
    .object({
        NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
        PORT: z.coerce.number().int().positive().default(7071),

        FACE_PROVIDER: z.enum(['azure', 'compreface', 'mock']).default('azure'),

        AZURE_FACE_ENDPOINT: optionalString.pipe(z.string().url().optional()),
        AZURE_FACE_KEY: optionalString,

        COMPRE_FACE_DOMAIN: z.string().url().default('http://localhost'),
        COMPRE_FACE_PORT: z.coerce.number().int().positive().default(8000),
        COMPRE_FACE_API_KEY: optionalString,
        COMPRE_FACE_DETECTION_API_KEY: optionalString,

        PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
        PROVIDER_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
        PROVIDER_RETRY_BASE_MS: z.coerce.number().int().min(0).default(250),
        MAX_CONCURRENT_COMPARISONS: z.coerce.number().int().min(1).max(8).default(4),

        OUTPUT_DIR: z.string().default('./output_faces'),
        PERSIST_CROPS: booleanString('true'),
        MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),

        FUNCTION_KEY: optionalString,
        CORS_ORIGINS: optionalString,
    })
    .superRefine((env, ctx) => {
        if (env.FACE_PROVIDER === 'azure') {
            if (!env.AZURE_FACE_ENDPOINT) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['AZURE_FACE_ENDPOINT'], message: 'Required when FACE_PROVIDER=azure' });
            }
            if (!env.AZURE_FACE_KEY) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['AZURE_FACE_KEY'], message: 'Required when FACE_PROVIDER=azure' });
            }
        }
        if (env.FACE_PROVIDER === 'compreface') {
            if (!env.COMPRE_FACE_API_KEY) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['COMPRE_FACE_API_KEY'], message: 'Required when FACE_PROVIDER=compreface' });
            }
            if (!env.COMPRE_FACE_DETECTION_API_KEY) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['COMPRE_FACE_DETECTION_API_KEY'], message: 'Required when FACE_PROVIDER=compreface' });
            }
        }
    });

export interface AzureFaceConfig {
    readonly endpoint: string;
    readonly key: string;
}

export interface CompreFaceConfig {
    readonly baseUrl: string;
    readonly verificationApiKey: string;
    readonly detectionApiKey: string;
}

export interface AppConfig {
    readonly nodeEnv: 'development' | 'test' | 'production';
    readonly port: number;
    readonly provider: FaceProviderName;
    /** Present only when both values are configured */
    readonly azure?: AzureFaceConfig;
    readonly compreFace?: CompreFaceConfig;
    readonly providerTimeoutMs: number;
    readonly retry: { readonly maxRetries: number; readonly baseDelayMs: number };
    readonly maxConcurrentComparisons: number;
    readonly outputDir: string;
    readonly persistCrops: boolean;
    readonly maxUploadBytes: number;
    readonly functionKey?: string;
    readonly corsOrigins: readonly string[];
}

export class ConfigError extends Error {
    constructor(readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigError';
    }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
    }
    const e = parsed.data;

    const azure = e.AZURE_FACE_ENDPOINT && e.AZURE_FACE_KEY
        ? Object.freeze({ endpoint: e.AZURE_FACE_ENDPOINT.replace(/\/+$/, ''), key: e.AZURE_FACE_KEY })
        : undefined;

    const compreFace = e.COMPRE_FACE_API_KEY && e.COMPRE_FACE_DETECTION_API_KEY
        ? Object.freeze({
            baseUrl: `${e.COMPRE_FACE_DOMAIN.replace(/\/+$/, '')}:${e.COMPRE_FACE_PORT}`,
            verificationApiKey: e.COMPRE_FACE_API_KEY,
            detectionApiKey: e.COMPRE_FACE_DETECTION_API_KEY,
        })
        : undefined;

    return Object.freeze({
        nodeEnv: e.NODE_ENV,
        port: e.PORT,
        provider: e.FACE_PROVIDER,
        azure,
        compreFace,
        providerTimeoutMs: e.PROVIDER_TIMEOUT_MS,
        retry: Object.freeze({ maxRetries: e.PROVIDER_MAX_RETRIES, baseDelayMs: e.PROVIDER_RETRY_BASE_MS }),
        maxConcurrentComparisons: e.MAX_CONCURRENT_COMPARISONS,
        outputDir: e.OUTPUT_DIR,
        persistCrops: e.PERSIST_CROPS,
        maxUploadBytes: e.MAX_UPLOAD_BYTES,
        functionKey: e.FUNCTION_KEY,
        corsOrigins: Object.freeze(
            (e.CORS_ORIGINS ?? '').split(',').map((o) => o.trim()).filter((o) => o.length > 0)
        ),
    });
}
