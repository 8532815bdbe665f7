/**
 * Image Processing Service
 *
 * Enhancement and face cropping for identity documents.
 * Uses Sharp; GIF input is read from its first frame. Sharp has no BMP
 * loader, so BMP is decoded with Jimp and handed over as raw RGBA.
 */

import { Jimp } from 'jimp';
import sharp from 'sharp';
import type { FaceBox } from '../types/face.js';
import { sniffImageFormat } from './encoding.service.js';
import { ValidationError } from './errors.js';

export interface EnhancedImage {
    buffer: Buffer;
    width: number;
    height: number;
}

export class ImageService {
    private readonly CONTRAST = 1.15;
    private readonly JPEG_QUALITY = 95;

    /**
     * Prepare a document photo for detection:
     * - Apply EXIF orientation
     * - Flatten transparency onto white
     * - Slight contrast boost and mild sharpening
     */
    async enhance(buffer: Buffer): Promise<EnhancedImage> {
        try {
            const pipeline = await this.open(buffer);
            const { data, info } = await pipeline
                .rotate()
                .flatten({ background: '#ffffff' })
                .linear(this.CONTRAST, -(128 * this.CONTRAST) + 128)
                .sharpen({ sigma: 1.5, m1: 1.2, m2: 1.2 })
                .jpeg({ quality: this.JPEG_QUALITY })
                .toBuffer({ resolveWithObject: true });

            return { buffer: data, width: info.width, height: info.height };
        } catch (error) {
            console.error('[IMAGE] Failed to decode image:', error instanceof Error ? error.message : error);
            throw new ValidationError('Uploaded file is not a decodable image');
        }
    }

    /**
     * Crop a face region, clamped to the image bounds.
     */
    async crop(image: EnhancedImage, box: FaceBox): Promise<Buffer> {
        const left = clamp(Math.round(box.left), 0, image.width - 1);
        const top = clamp(Math.round(box.top), 0, image.height - 1);
        const width = clamp(Math.round(box.width), 1, image.width - left);
        const height = clamp(Math.round(box.height), 1, image.height - top);

        return sharp(image.buffer)
            .extract({ left, top, width, height })
            .jpeg({ quality: this.JPEG_QUALITY })
            .toBuffer();
    }

    /**
     * Get image dimensions without processing
     */
    async getMetadata(buffer: Buffer): Promise<{ width: number; height: number; format: string }> {
        const metadata = await (await this.open(buffer)).metadata();
        return {
            width: metadata.width || 0,
            height: metadata.height || 0,
            format: metadata.format || 'unknown',
        };
    }

    private async open(buffer: Buffer): Promise<sharp.Sharp> {
        if (sniffImageFormat(buffer) !== 'bmp') {
            return sharp(buffer, { pages: 1 });
        }
        const { bitmap } = await Jimp.fromBuffer(buffer);
        return sharp(bitmap.data, {
            raw: { width: bitmap.width, height: bitmap.height, channels: 4 },
        });
    }
}

function clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), max);
}

// Singleton instance
export const imageService = new ImageService();
