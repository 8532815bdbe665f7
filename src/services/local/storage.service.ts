/**
 * Local Crop Storage
 *
 * Writes to <root>/<requestId>/<filename> so concurrent extractions never
 * collide. Reads are confined to the root directory.
 */

import fs from 'fs/promises';
import path from 'path';
import { ValidationError } from '../errors.js';
import type { ICropStorage, StoredFile } from '../interfaces/storage.interface.js';

export class LocalCropStorage implements ICropStorage {
    private readonly root: string;

    constructor(root: string) {
        this.root = path.resolve(root);
    }

    async save(requestId: string, filename: string, buffer: Buffer): Promise<StoredFile> {
        const safeName = path.basename(filename);
        const dir = path.join(this.root, path.basename(requestId));
        await fs.mkdir(dir, { recursive: true });

        const filePath = path.join(dir, safeName);
        await fs.writeFile(filePath, buffer);

        return { filename: safeName, path: filePath };
    }

    async read(facePath: string): Promise<Buffer> {
        const resolved = path.resolve(this.root, facePath);
        const relative = path.relative(this.root, resolved);

        const escapesRoot = relative === '..' || relative.startsWith(`..${path.sep}`);
        if (relative === '' || escapesRoot || path.isAbsolute(relative)) {
            throw new ValidationError(`Face path ${facePath} is outside the face storage directory`);
        }

        try {
            return await fs.readFile(resolved);
        } catch {
            throw new ValidationError(`Face path ${facePath} is not readable`);
        }
    }
}
