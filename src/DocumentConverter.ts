/**
 * Document Converter - Main Entry Point
 *
 * This module provides the `DocumentConverter` class that turns PDF and DOCX documents
 * into the canonical spec tree and renders that tree to HTML and TipTap JSON.
 *
 * **Pipeline:**
 * 1. Sniff the file type from the first 8 bytes
 * 2. Route to the matching extractor (unknown files: PDF first, then DOCX)
 * 3. Build the spec tree from the extracted blocks
 * 4. Render the tree to the requested formats
 *
 * **Usage:**
 * ```typescript
 * import { DocumentConverter, MemoryBlobStore } from 'docspec-converter';
 *
 * // Convert a buffer in memory
 * const { spec } = await DocumentConverter.convertBuffer(fs.readFileSync('report.docx'));
 * const html = DocumentConverter.renderSpec(spec, 'html');
 *
 * // Run a conversion job against a blob store
 * const store = new MemoryBlobStore();
 * await store.put('uploads', 'report.pdf', pdfBytes, 'application/pdf');
 * const result = await DocumentConverter.convertJob(
 *   { bucketName: 'uploads', filename: 'report.pdf', targetFileType: 'text/html', pageCountHint: 3 },
 *   store
 * );
 * ```
 *
 * @module DocumentConverter
 */

import { ResolvedConfig, resolveConfig } from './config';
import { extractDocx } from './extractors/DocxExtractor';
import { extractPdf } from './extractors/PdfExtractor';
import { renderHtml } from './renderers/HtmlRenderer';
import { renderTipTap } from './renderers/TipTapRenderer';
import { buildSpec } from './spec/SpecBuilder';
import { BlobStore } from './storage/BlobStore';
import {
    ConversionJob,
    ConversionOutput,
    ConversionResult,
    ConverterConfig,
    ExtractedPage,
    RenderFormat,
    SniffedFileType,
    SpecNode
} from './types';
import { ConverterErrorType, getConverterError, getWrappedError } from './utils/errorUtils';
import { SNIFF_LENGTH, sniffFileType, sniffStoredFile } from './utils/fileTypeUtils';

/** Target content type that requests a TipTap document next to the HTML */
export const TIPTAP_CONTENT_TYPE = 'application/vnd.nldoc.tiptap+json';

/** Content types of the stored outputs */
export const OUTPUT_CONTENT_TYPES = {
    spec: 'application/json',
    html: 'text/html; charset=utf-8',
    tiptap: `${TIPTAP_CONTENT_TYPE}; charset=utf-8`
} as const;

const RENDER_FORMATS: readonly RenderFormat[] = ['html', 'tiptap'];

/**
 * Checks a user-supplied format name.
 */
export const isRenderFormat = (format: string): format is RenderFormat =>
    RENDER_FORMATS.some(known => known === format);

const hasBlocks = (pages: ExtractedPage[] | undefined): pages is ExtractedPage[] =>
    pages !== undefined && pages.some(page => page.blocks.length > 0);

/**
 * Main converter class providing the conversion pipeline.
 *
 * All methods are static; a conversion holds no state beyond its own call chain.
 */
export class DocumentConverter {
    /**
     * Runs the extractor matching a sniffed type.
     * Extractors never throw: a failed extraction yields no pages.
     */
    private static async extract(buffer: Buffer, fileType: SniffedFileType, config: ResolvedConfig): Promise<ExtractedPage[]> {
        switch (fileType) {
            case 'pdf':
                return (await extractPdf(buffer, config)) ?? [];
            case 'docx':
                return (await extractDocx(buffer, config)) ?? [];
            case 'unknown': {
                const pdfPages = await extractPdf(buffer, config);
                if (hasBlocks(pdfPages)) return pdfPages;
                const docxPages = await extractDocx(buffer, config);
                if (hasBlocks(docxPages)) return docxPages;
                return pdfPages ?? docxPages ?? [];
            }
        }
    }

    private static async convertSniffed(
        buffer: Buffer,
        fileType: SniffedFileType,
        config: ResolvedConfig,
        pageCountHint: number | undefined
    ): Promise<ConversionOutput> {
        const pages = await DocumentConverter.extract(buffer, fileType, config);
        const spec = buildSpec(pages, { pageCount: pageCountHint ?? pages.length, config });
        return { fileType, pages, spec };
    }

    /**
     * Converts an in-memory document to a spec tree.
     *
     * Malformed input never throws: when nothing can be extracted the tree holds
     * a single placeholder paragraph naming the page count.
     *
     * @param buffer - The document bytes
     * @param config - Optional configuration (defaults applied for all omitted options)
     * @param pageCountHint - Page count named by the placeholder; defaults to the number of extracted pages
     * @returns The detected type, the extracted pages and the spec tree
     * @throws {Error} IMPROPER_ARGUMENTS when `buffer` is not a Buffer
     */
    public static async convertBuffer(buffer: Buffer, config: ConverterConfig = {}, pageCountHint?: number): Promise<ConversionOutput> {
        const resolved = resolveConfig(config);
        if (!Buffer.isBuffer(buffer)) {
            throw getConverterError(ConverterErrorType.IMPROPER_ARGUMENTS, resolved);
        }
        const fileType = sniffFileType(buffer.subarray(0, SNIFF_LENGTH));
        return DocumentConverter.convertSniffed(buffer, fileType, resolved, pageCountHint);
    }

    /**
     * Renders a spec tree.
     *
     * @param spec - The tree (as built, or as read back from storage)
     * @param format - `html` for a complete HTML page, `tiptap` for TipTap JSON text
     * @param config - Optional configuration (language and title of the HTML page)
     * @throws {Error} FORMAT_UNSUPPORTED for any other format
     */
    public static renderSpec(spec: SpecNode, format: RenderFormat, config: ConverterConfig = {}): string {
        switch (format) {
            case 'html':
                return renderHtml(spec, resolveConfig(config));
            case 'tiptap':
                return JSON.stringify(renderTipTap(spec));
            default:
                throw getConverterError(ConverterErrorType.FORMAT_UNSUPPORTED, config, String(format));
        }
    }

    /**
     * Runs one conversion job against a blob store.
     *
     * The spec tree is stored in the spec bucket as `<documentId>.spec.json`, the HTML page in
     * the output bucket as `<documentId>.html`, and, when the job targets TipTap, the TipTap
     * document as `<documentId>.json`.
     *
     * @param job - The job description
     * @param store - Blob store holding the source and receiving the outputs
     * @param config - Optional configuration
     * @returns The result record describing the stored outputs
     * @throws {Error} When the source cannot be read or an output cannot be stored
     */
    public static async convertJob(job: ConversionJob, store: BlobStore, config: ConverterConfig = {}): Promise<ConversionResult> {
        const resolved = resolveConfig(config);
        const documentId = job.documentId ?? job.filename;
        const sourcePath = `${job.bucketName}/${job.filename}`;

        try {
            const fileType = await sniffStoredFile(store, job.bucketName, job.filename, resolved);
            const buffer = await store.get(job.bucketName, job.filename);
            const { spec } = await DocumentConverter.convertSniffed(buffer, fileType, resolved, job.pageCountHint);

            const specKey = `${documentId}.spec.json`;
            await store.put(resolved.specBucket, specKey, Buffer.from(JSON.stringify(spec), 'utf8'), OUTPUT_CONTENT_TYPES.spec);

            const htmlKey = `${documentId}.html`;
            await store.put(resolved.outputBucket, htmlKey, Buffer.from(renderHtml(spec, resolved), 'utf8'), OUTPUT_CONTENT_TYPES.html);

            let location = htmlKey;
            if (job.targetFileType === TIPTAP_CONTENT_TYPE) {
                location = `${documentId}.json`;
                const tiptap = JSON.stringify(renderTipTap(spec));
                await store.put(resolved.outputBucket, location, Buffer.from(tiptap, 'utf8'), OUTPUT_CONTENT_TYPES.tiptap);
            }

            return {
                resultType: 'fileWorkerResult',
                success: true,
                documentId,
                bucketName: resolved.specBucket,
                filename: specKey,
                timestamp: new Date().toISOString(),
                detectedFileType: fileType,
                done: { contentType: job.targetFileType, location }
            };
        } catch (error) {
            throw getWrappedError(error, resolved, sourcePath);
        }
    }
}
