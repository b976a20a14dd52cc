/**
 * Blob Storage
 *
 * The converter reads source documents from, and writes its outputs to, an object
 * store addressed by bucket and key. Only two operations are needed: a full or
 * ranged read, and a write with a content type.
 *
 * Two implementations ship with the library:
 * - `MemoryBlobStore` keeps objects in process (tests, embedding)
 * - `FileSystemBlobStore` maps buckets to directories below a root directory
 *
 * @module BlobStore
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConverterConfig } from '../types';
import { ConverterErrorType, getConverterError } from '../utils/errorUtils';

/**
 * Inclusive byte range of a ranged read.
 */
export interface ByteRange {
    start: number;
    end: number;
}

/**
 * Minimal object store contract used by the converter.
 */
export interface BlobStore {
    /**
     * Reads an object, or only the bytes of `byteRange` when given.
     * @throws {Error} If the object does not exist
     */
    get(bucket: string, key: string, byteRange?: ByteRange): Promise<Buffer>;
    put(bucket: string, key: string, bytes: Buffer, contentType: string): Promise<void>;
}

/**
 * An object stored in a `MemoryBlobStore`.
 */
export interface StoredObject {
    bytes: Buffer;
    contentType: string;
}

const sliceRange = (bytes: Buffer, byteRange?: ByteRange): Buffer =>
    byteRange ? bytes.subarray(byteRange.start, byteRange.end + 1) : bytes;

/**
 * In-process blob store.
 */
export class MemoryBlobStore implements BlobStore {
    private readonly objects = new Map<string, StoredObject>();

    constructor(private readonly config: ConverterConfig = {}) { }

    private static objectPath(bucket: string, key: string): string {
        return `${bucket}/${key}`;
    }

    public async get(bucket: string, key: string, byteRange?: ByteRange): Promise<Buffer> {
        const stored = this.objects.get(MemoryBlobStore.objectPath(bucket, key));
        if (!stored) {
            throw getConverterError(ConverterErrorType.OBJECT_NOT_FOUND, this.config, MemoryBlobStore.objectPath(bucket, key));
        }
        return Buffer.from(sliceRange(stored.bytes, byteRange));
    }

    public async put(bucket: string, key: string, bytes: Buffer, contentType: string): Promise<void> {
        this.objects.set(MemoryBlobStore.objectPath(bucket, key), { bytes: Buffer.from(bytes), contentType });
    }

    /**
     * Returns a stored object with its content type, or undefined.
     */
    public inspect(bucket: string, key: string): StoredObject | undefined {
        return this.objects.get(MemoryBlobStore.objectPath(bucket, key));
    }

    /**
     * Lists the `bucket/key` paths of all stored objects.
     */
    public list(): string[] {
        return Array.from(this.objects.keys()).sort();
    }
}

/**
 * Blob store backed by the local file system: `<rootDir>/<bucket>/<key>`.
 * Content types are not persisted.
 */
export class FileSystemBlobStore implements BlobStore {
    constructor(private readonly rootDir: string, private readonly config: ConverterConfig = {}) { }

    private resolvePath(bucket: string, key: string): string {
        return path.join(this.rootDir, bucket, key);
    }

    public async get(bucket: string, key: string, byteRange?: ByteRange): Promise<Buffer> {
        const filePath = this.resolvePath(bucket, key);
        if (!fs.existsSync(filePath)) {
            throw getConverterError(ConverterErrorType.OBJECT_NOT_FOUND, this.config, `${bucket}/${key}`);
        }
        if (!byteRange) {
            return fs.promises.readFile(filePath);
        }

        const handle = await fs.promises.open(filePath, 'r');
        try {
            const length = byteRange.end - byteRange.start + 1;
            const buffer = Buffer.alloc(length);
            const { bytesRead } = await handle.read(buffer, 0, length, byteRange.start);
            return buffer.subarray(0, bytesRead);
        } finally {
            await handle.close();
        }
    }

    public async put(bucket: string, key: string, bytes: Buffer, _contentType: string): Promise<void> {
        const filePath = this.resolvePath(bucket, key);
        await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
        await fs.promises.writeFile(filePath, bytes);
    }
}
