/**
 * File Type Sniffing Utilities
 *
 * Classifies a document from the magic bytes at the start of the file.
 * Only the first 8 bytes are needed, so stored files can be classified
 * with a ranged read instead of a full download.
 *
 * - PDF: `%PDF`
 * - DOCX: `PK\x03\x04` (local file header of a ZIP archive)
 *
 * @module fileTypeUtils
 */

import { BlobStore } from '../storage/BlobStore';
import { ConverterConfig, SniffedFileType } from '../types';
import { logWarning } from './errorUtils';

/** Number of bytes read from a stored file for sniffing */
export const SNIFF_LENGTH = 8;

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46];
const ZIP_MAGIC = [0x50, 0x4b, 0x03, 0x04];

const startsWith = (prefix: Uint8Array, magic: number[]): boolean =>
    prefix.length >= magic.length && magic.every((byte, i) => prefix[i] === byte);

/**
 * Classifies a document from its first bytes.
 *
 * @param prefix - The first bytes of the document (longer buffers are fine)
 * @returns `pdf`, `docx`, or `unknown` when neither signature matches
 */
export const sniffFileType = (prefix: Uint8Array | undefined): SniffedFileType => {
    if (!prefix) return 'unknown';
    if (startsWith(prefix, PDF_MAGIC)) return 'pdf';
    if (startsWith(prefix, ZIP_MAGIC)) return 'docx';
    return 'unknown';
};

/**
 * Reads the first bytes of a stored document and classifies them.
 * Read failures are logged and reported as `unknown`.
 */
export const sniffStoredFile = async (store: BlobStore, bucket: string, key: string, config: ConverterConfig): Promise<SniffedFileType> => {
    try {
        const prefix = await store.get(bucket, key, { start: 0, end: SNIFF_LENGTH - 1 });
        return sniffFileType(prefix);
    } catch (e) {
        logWarning(`Could not read the header of ${bucket}/${key}:`, config, e);
        return 'unknown';
    }
};
