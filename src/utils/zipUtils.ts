/**
 * ZIP Archive Extraction Utilities
 *
 * DOCX files are ZIP archives of XML parts. The converter only needs a couple of them:
 * - `word/document.xml` - body content
 * - `word/styles.xml` - style definitions (to resolve style names)
 *
 * @module zipUtils
 */

import yauzl from 'yauzl';
import concat from 'concat-stream';

/**
 * Reads the named entries of a ZIP archive.
 *
 * Entries are read lazily, one at a time, and reading stops as soon as every
 * wanted entry has been collected. Names that do not occur in the archive are
 * simply absent from the result.
 *
 * @param zipInput - The ZIP file as a Node.js Buffer
 * @param wantedPaths - Entry paths to extract, e.g. `word/document.xml`
 * @returns A promise resolving to a map from entry path to content
 * @throws {Error} If the buffer is not a ZIP archive or an entry cannot be read
 *
 * @example
 * ```typescript
 * const parts = await readZipEntries(docxBuffer, ['word/document.xml', 'word/styles.xml']);
 * const documentXml = parts.get('word/document.xml')?.toString('utf8');
 * ```
 */
export const readZipEntries = (zipInput: Buffer, wantedPaths: string[]): Promise<Map<string, Buffer>> => {
    const wanted = new Set(wantedPaths);

    return new Promise((resolve, reject) => {
        yauzl.fromBuffer(zipInput, { lazyEntries: true }, (err, zipfile) => {
            if (err) return reject(err);
            if (!zipfile) return reject(new Error("Failed to open zip file"));

            const entries = new Map<string, Buffer>();

            const fail = (error: Error) => {
                zipfile.close();
                reject(error);
            };

            zipfile.on('entry', (entry: yauzl.Entry) => {
                if (!wanted.has(entry.fileName)) {
                    zipfile.readEntry();
                    return;
                }

                zipfile.openReadStream(entry, (streamErr, readStream) => {
                    if (streamErr) return fail(streamErr);
                    if (!readStream) return fail(new Error("Failed to open read stream"));

                    readStream.on('error', fail);
                    readStream.pipe(concat((data: Buffer) => {
                        entries.set(entry.fileName, data);
                        if (entries.size === wanted.size) {
                            zipfile.close();
                            resolve(entries);
                        } else {
                            zipfile.readEntry();
                        }
                    }));
                });
            });

            zipfile.on('end', () => resolve(entries));
            zipfile.on('error', reject);

            zipfile.readEntry();
        });
    });
};
