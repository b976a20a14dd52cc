/**
 * PDF Extractor
 *
 * Extracts headings and paragraphs from PDF files using PDF.js (pdfjs-dist).
 *
 * PDF has no semantic structure: no styles, no lists, no tables. What it does have is
 * text drawn with a font at a size. Every text line is therefore classified by the
 * largest font size on it and by whether any of its spans uses a bold font:
 *
 * | max font size           | bold span | block             |
 * |-------------------------|-----------|-------------------|
 * | >= pdfHeading1MinSize   | any       | heading, level 1  |
 * | >= pdfHeading2MinSize   | any       | heading, level 2  |
 * | smaller                 | yes       | heading, level 2  |
 * | smaller                 | no        | paragraph         |
 *
 * **Extraction Approach:**
 * 1. Load the document with pdfjs-dist (legacy build, imported on first use).
 * 2. For every page, read the text items in content order.
 * 3. Group items into lines (an item ending a line, or a baseline change, starts a new one).
 * 4. Repair the text encoding of each line and classify it.
 *
 * @module PdfExtractor
 * @see https://mozilla.github.io/pdf.js/ PDF.js documentation
 */

import { ResolvedConfig } from '../config';
import { Block, ExtractedPage } from '../types';
import { fixEncoding } from '../utils/encodingUtils';
import { logWarning } from '../utils/errorUtils';

type PdfJsModule = typeof import('pdfjs-dist/legacy/build/pdf.mjs');
type PdfPage = Awaited<ReturnType<Awaited<ReturnType<PdfJsModule['getDocument']>['promise']>['getPage']>>;

/** Default size when PDF.js reports neither a height nor a scale for an item */
const DEFAULT_FONT_SIZE = 12;

/**
 * A text item of a page, reduced to what line grouping needs.
 */
export interface PdfTextSpan {
    text: string;
    /** Baseline position (PDF units, origin at the bottom). */
    y: number;
    fontSize: number;
    bold: boolean;
    /** PDF.js saw a line break after this item. */
    endsLine: boolean;
}

/**
 * A line of text assembled from its spans.
 */
export interface PdfLine {
    text: string;
    maxFontSize: number;
    bold: boolean;
}

/**
 * Groups the spans of a page into lines, in content order.
 *
 * Span texts are concatenated without separators: PDF.js already emits the
 * spaces it finds between words. Spans without text only end lines.
 */
export const groupSpansIntoLines = (spans: PdfTextSpan[], config: ResolvedConfig): PdfLine[] => {
    const lines: PdfLine[] = [];
    let current: (PdfLine & { baseline: number }) | undefined;

    const flush = () => {
        if (current) {
            lines.push({ text: current.text, maxFontSize: current.maxFontSize, bold: current.bold });
            current = undefined;
        }
    };

    for (const span of spans) {
        if (span.text) {
            if (current && Math.abs(span.y - current.baseline) > config.pdfLineTolerance) {
                flush();
            }
            if (!current) {
                current = { text: '', maxFontSize: 0, bold: false, baseline: span.y };
            }
            current.text += span.text;
            current.maxFontSize = Math.max(current.maxFontSize, span.fontSize);
            current.bold = current.bold || span.bold;
        }
        if (span.endsLine) {
            flush();
        }
    }
    flush();

    return lines;
};

/**
 * Classifies one line as a heading or a paragraph.
 *
 * @returns The block, or undefined for lines holding only whitespace
 */
export const classifyPdfLine = (line: PdfLine, config: ResolvedConfig): Block | undefined => {
    const text = fixEncoding(line.text.trim());
    if (!text) return undefined;

    if (line.maxFontSize >= config.pdfHeading1MinSize) {
        return { kind: 'heading', level: 1, text };
    }
    if (line.maxFontSize >= config.pdfHeading2MinSize || line.bold) {
        return { kind: 'heading', level: 2, text };
    }
    return { kind: 'paragraph', text };
};

/**
 * Turns the spans of one page into blocks.
 */
export const spansToBlocks = (spans: PdfTextSpan[], config: ResolvedConfig): Block[] => {
    const blocks: Block[] = [];
    for (const line of groupSpansIntoLines(spans, config)) {
        const block = classifyPdfLine(line, config);
        if (block) blocks.push(block);
    }
    return blocks;
};

/**
 * Shares one pending load between callers. A rejected load is forgotten,
 * so the next call starts a new one.
 */
export const cacheUntilRejected = <T>(load: () => Promise<T>): (() => Promise<T>) => {
    let pending: Promise<T> | undefined;
    return () => {
        pending ??= load().catch((e: unknown) => {
            pending = undefined;
            throw e;
        });
        return pending;
    };
};

// The legacy build is the one that runs on Node.js.
const importPdfJs = cacheUntilRejected((): Promise<PdfJsModule> => import('pdfjs-dist/legacy/build/pdf.mjs'));

/**
 * Imports PDF.js and applies the worker configuration.
 */
const loadPdfJs = async (config: ResolvedConfig): Promise<PdfJsModule> => {
    const pdfjs = await importPdfJs();
    if (config.pdfWorkerSrc) {
        pdfjs.GlobalWorkerOptions.workerSrc = config.pdfWorkerSrc;
    }
    return pdfjs;
};

/**
 * The part of PDF.js' object store used to look up loaded fonts.
 */
interface FontObjectStore {
    has(id: string): boolean;
    get(id: string): unknown;
}

const isFontObjectStore = (value: unknown): value is FontObjectStore =>
    typeof value === 'object' && value !== null &&
    typeof Reflect.get(value, 'has') === 'function' &&
    typeof Reflect.get(value, 'get') === 'function';

/**
 * Detects bold fonts from the font objects PDF.js loaded for a page.
 * The subset prefix of embedded font names (`ABCDEF+`) does not matter here.
 */
const createBoldFontResolver = (page: PdfPage, styles: Record<string, { fontFamily: string }>) => {
    const cache = new Map<string, boolean>();
    const store: unknown = Reflect.get(page, 'commonObjs');

    const lookup = (fontName: string): boolean => {
        if (styles[fontName]?.fontFamily.toLowerCase().includes('bold')) return true;
        if (!isFontObjectStore(store) || !store.has(fontName)) return false;

        const font = store.get(fontName);
        if (typeof font !== 'object' || font === null) return false;
        const name = Reflect.get(font, 'name');
        return Reflect.get(font, 'bold') === true || (typeof name === 'string' && name.toLowerCase().includes('bold'));
    };

    return (fontName: string): boolean => {
        let bold = cache.get(fontName);
        if (bold === undefined) {
            try {
                bold = lookup(fontName);
            } catch {
                // Font not resolved (yet); treat as regular weight.
                bold = false;
            }
            cache.set(fontName, bold);
        }
        return bold;
    };
};

/**
 * Reads the text spans of one page.
 */
const readPageSpans = async (page: PdfPage, config: ResolvedConfig, pageNumber: number): Promise<PdfTextSpan[]> => {
    const textContent = await page.getTextContent();

    // Fonts reach the main thread while the operator list is built.
    try {
        await page.getOperatorList();
    } catch (e) {
        logWarning(`Fonts of page ${pageNumber} could not be loaded, bold detection is off:`, config, e);
    }
    const isBoldFont = createBoldFontResolver(page, textContent.styles);

    const spans: PdfTextSpan[] = [];
    for (const item of textContent.items) {
        if (!('str' in item)) continue;

        const transform: number[] = item.transform;
        const fontSize = item.height || Math.hypot(transform[2], transform[3]) || DEFAULT_FONT_SIZE;
        spans.push({
            text: item.str,
            y: transform[5],
            fontSize,
            bold: item.str.length > 0 && isBoldFont(item.fontName),
            endsLine: item.hasEOL
        });
    }
    return spans;
};

/**
 * Extracts the pages of a PDF file.
 *
 * @param buffer - The PDF file as a Buffer
 * @param config - Converter configuration
 * @returns One entry per page, or undefined if the document could not be loaded
 */
export const extractPdf = async (buffer: Buffer, config: ResolvedConfig): Promise<ExtractedPage[] | undefined> => {
    let pdfjs: PdfJsModule;
    try {
        pdfjs = await loadPdfJs(config);
    } catch (e) {
        logWarning('PDF.js could not be loaded:', config, e);
        return undefined;
    }

    const loadingTask = pdfjs.getDocument({
        data: new Uint8Array(buffer),
        verbosity: 0, // ERRORS only, suppresses warnings
        isEvalSupported: false
    });

    try {
        const pdfDocument = await loadingTask.promise;
        const pages: ExtractedPage[] = [];

        for (let pageNumber = 1; pageNumber <= pdfDocument.numPages; pageNumber++) {
            let blocks: Block[] = [];
            try {
                const page = await pdfDocument.getPage(pageNumber);
                blocks = spansToBlocks(await readPageSpans(page, config, pageNumber), config);
                page.cleanup();
            } catch (e) {
                logWarning(`Error reading page ${pageNumber}:`, config, e);
            }
            pages.push({ pageNumber, blocks });
        }

        return pages;
    } catch (e) {
        logWarning('Could not extract PDF content:', config, e);
        return undefined;
    } finally {
        await loadingTask.destroy();
    }
};
