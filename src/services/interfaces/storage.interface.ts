/**
 * Crop Storage Interface
 *
 * Persists enhanced documents and face crops so a later comparison can
 * reference them by path. Implementations:
 * - LocalCropStorage: filesystem directory per extraction request
 */

export interface StoredFile {
    filename: string;
    /** Caller-visible path, accepted back as a `face_paths` entry */
    path: string;
}

export interface ICropStorage {
    /**
     * Save a file under a request-scoped namespace.
     * @param requestId - Unique per extraction request
     */
    save(requestId: string, filename: string, buffer: Buffer): Promise<StoredFile>;

    /**
     * Read a previously saved file.
     * Fails with ValidationError for paths outside the storage root or unreadable files.
     */
    read(path: string): Promise<Buffer>;
}
