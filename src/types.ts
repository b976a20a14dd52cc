/**
 * Configuration options for the DocumentConverter.
 *
 * Every threshold used by the extraction heuristics is exposed here so it can be
 * tuned (and tested) independently of the extraction logic.
 */
export interface ConverterConfig {
    /**
     * Flag to show all the logs to console in case of an error irrespective of your own handling.
     * Default is false.
     */
    outputErrorToConsole?: boolean;
    /**
     * The delimiter used to join the paragraphs of a DOCX table cell.
     * Default is \n.
     */
    newlineDelimiter?: string;
    /**
     * The URL/path to the PDF.js worker script.
     * When empty, PDF.js resolves the worker that ships next to its own build.
     * PDF.js keeps this setting for the whole process: the last conversion that sets it
     * wins, so concurrent conversions should all pass the same value.
     */
    pdfWorkerSrc?: string;
    /**
     * Maximum baseline difference (in PDF units) between two text items of the same line.
     * Default is 2.
     */
    pdfLineTolerance?: number;
    /**
     * Minimum font size for a PDF line to become a level 1 heading.
     * Default is 18.
     */
    pdfHeading1MinSize?: number;
    /**
     * Minimum font size for a PDF line to become a level 2 heading.
     * Bold lines below this size are level 2 headings as well.
     * Default is 16.
     */
    pdfHeading2MinSize?: number;
    /**
     * DOCX numbering ids at or above this value are treated as ordered lists.
     * Default is 10.
     */
    orderedNumIdThreshold?: number;
    /**
     * Minimum size (in points) of the first bold run for a paragraph to be promoted to a heading.
     * Default is 14.
     */
    boldHeadingMinSize?: number;
    /**
     * Bold paragraphs with this many words or more are never promoted to a heading.
     * Default is 15.
     */
    boldHeadingMaxWords?: number;
    /**
     * Bold paragraphs with fewer words than this are promoted regardless of their size.
     * Default is 8.
     */
    boldHeadingShortWords?: number;
    /**
     * Builds the text of the placeholder paragraph emitted when nothing could be extracted.
     */
    fallbackMessage?: (pageCount: number) => string;
    /**
     * Value of the `lang` attribute of the rendered HTML page.
     * Default is 'en'.
     */
    htmlLanguage?: string;
    /**
     * Title of the rendered HTML page.
     * Default is 'Converted Document'.
     */
    htmlTitle?: string;
    /**
     * Bucket receiving the persisted spec tree.
     * Default is 'files'.
     */
    specBucket?: string;
    /**
     * Bucket receiving the rendered HTML and TipTap documents.
     * Default is 'output'.
     */
    outputBucket?: string;
    /**
     * Generates the id of every spec node.
     * Default is a random UUID (v4).
     */
    generateId?: () => string;
}

/**
 * Input formats recognised by the sniffer.
 */
export type SniffedFileType = 'pdf' | 'docx' | 'unknown';

/**
 * Inline formatting attributes carried by runs and text nodes.
 */
export type InlineMark = 'bold' | 'italic' | 'underline';

/**
 * A span of text within a block carrying independent formatting marks.
 */
export interface Run {
    text: string;
    /** Unordered: each mark applies independently. */
    marks: ReadonlySet<InlineMark>;
}

/**
 * One entry of a bulleted or ordered list block.
 */
export interface ListItem {
    text: string;
    runs?: Run[];
}

export interface HeadingBlock {
    kind: 'heading';
    text: string;
    /** Heading level as detected by the extractor (1 is the top level). */
    level: number;
    runs?: Run[];
}

export interface ParagraphBlock {
    kind: 'paragraph';
    text: string;
    runs?: Run[];
}

export interface TableBlock {
    kind: 'table';
    /** Plain cell texts, row by row. */
    rows: string[][];
}

export type ListKind = 'bulletList' | 'orderedList';

export interface ListBlock {
    kind: ListKind;
    items: ListItem[];
}

/**
 * Transient unit of document content produced by an extractor.
 * Blocks are discarded once the spec builder has consumed them.
 */
export type Block = HeadingBlock | ParagraphBlock | TableBlock | ListBlock;

/**
 * Ordered blocks of one page. DOCX documents always produce a single page.
 */
export interface ExtractedPage {
    pageNumber: number;
    blocks: Block[];
}

/**
 * Type names of the closed spec node vocabulary.
 */
export type SpecNodeKind =
    | 'Document'
    | 'Heading'
    | 'Paragraph'
    | 'Text'
    | 'Table'
    | 'TableHeaderRow'
    | 'TableRow'
    | 'TableCell'
    | 'BulletList'
    | 'OrderedList'
    | 'ListItem';

/**
 * A mark as stored on a Text node.
 * Trees read back from storage may carry tags this library does not know; renderers ignore them.
 */
export interface SpecMark {
    type: string;
}

/**
 * A node of the canonical spec tree, in its JSON wire shape.
 *
 * `type` is a fully-qualified tag (namespace + type name, e.g.
 * `https://spec.nldoc.nl/Resource/Heading`). Consumers dispatch on the type name
 * after the last `/`, see `classifySpecNode`.
 */
export interface SpecNode {
    id: string;
    type: string;
    /** Absent on Text nodes only. */
    children?: SpecNode[];
    /** Heading only: 10, 20, ... 60. */
    level?: number;
    /** ListItem of an OrderedList only, 1-based. */
    order?: number;
    /** Text only. */
    text?: string;
    /** Text only. */
    marks?: SpecMark[];
}

/**
 * TipTap mark names produced by the TipTap renderer.
 */
export type TipTapMarkType = 'bold' | 'italic' | 'underline';

/**
 * TipTap node types produced by the TipTap renderer.
 */
export type TipTapNodeType =
    | 'doc'
    | 'heading'
    | 'paragraph'
    | 'text'
    | 'bulletList'
    | 'orderedList'
    | 'listItem'
    | 'table'
    | 'tableRow'
    | 'tableHeader'
    | 'tableCell';

/**
 * A node of a TipTap (ProseMirror) JSON document.
 */
export interface TipTapNode {
    type: TipTapNodeType;
    attrs?: { level: number };
    content?: TipTapNode[];
    text?: string;
    marks?: { type: TipTapMarkType }[];
}

/**
 * Root of a TipTap JSON document.
 */
export interface TipTapDocument {
    type: 'doc';
    content: TipTapNode[];
}

/**
 * Output formats a spec tree can be rendered to.
 */
export type RenderFormat = 'html' | 'tiptap';

/**
 * Result of converting an in-memory document.
 */
export interface ConversionOutput {
    /** Format reported by the sniffer. */
    fileType: SniffedFileType;
    /** Pages produced by the extractor that succeeded (empty when none did). */
    pages: ExtractedPage[];
    /** The canonical spec tree. Always a valid tree, possibly the fallback placeholder. */
    spec: SpecNode;
}

/**
 * A conversion request as handed over by the job dispatcher.
 */
export interface ConversionJob {
    /** Bucket holding the source document. */
    bucketName: string;
    /** Key of the source document. */
    filename: string;
    /** Content type the caller wants, e.g. `text/html` or `application/vnd.nldoc.tiptap+json`. */
    targetFileType: string;
    /** Expected page count, only used by the fallback placeholder. */
    pageCountHint: number;
    /** Name under which the outputs are stored. Default is `filename`. */
    documentId?: string;
}

/**
 * Record returned (and published by the dispatcher) once a job completed.
 */
export interface ConversionResult {
    resultType: 'fileWorkerResult';
    success: true;
    documentId: string;
    /** Bucket holding the persisted spec tree. */
    bucketName: string;
    /** Key of the persisted spec tree. */
    filename: string;
    /** ISO 8601 completion time. */
    timestamp: string;
    detectedFileType: SniffedFileType;
    done: {
        /** The requested target content type. */
        contentType: string;
        /** Key (in the output bucket) of the document matching `contentType`. */
        location: string;
    };
}
