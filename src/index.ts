/**
 * docspec-converter - Document to Spec Tree Converter
 *
 * Converts PDF and DOCX documents into a canonical, accessible document tree (the spec tree)
 * and renders that tree to HTML and to TipTap editor JSON.
 *
 * **Quick Start:**
 * ```typescript
 * import { DocumentConverter } from 'docspec-converter';
 *
 * const { spec } = await DocumentConverter.convertBuffer(fs.readFileSync('report.pdf'));
 * const html = DocumentConverter.renderSpec(spec, 'html');
 * const tiptap = DocumentConverter.renderSpec(spec, 'tiptap');
 * ```
 *
 * **Main Exports:**
 * - `DocumentConverter` - Conversion pipeline and job runner
 * - `MemoryBlobStore`, `FileSystemBlobStore` - Blob stores for `convertJob`
 * - `renderHtml`, `renderHtmlBody`, `renderTipTap` - Renderers
 * - `parseSpecDocument` - Validation of persisted spec trees
 *
 * @packageDocumentation
 * @module docspec-converter
 */
import { DocumentConverter } from './DocumentConverter';

export { DocumentConverter, isRenderFormat, OUTPUT_CONTENT_TYPES, TIPTAP_CONTENT_TYPE } from './DocumentConverter';
export { resolveConfig } from './config';
export type { ResolvedConfig } from './config';
export { FileSystemBlobStore, MemoryBlobStore } from './storage/BlobStore';
export type { BlobStore, ByteRange, StoredObject } from './storage/BlobStore';
export { buildSpec } from './spec/SpecBuilder';
export { parseSpecDocument } from './spec/specSchema';
export { classifySpecNode, SPEC_NAMESPACE, specNodeKindOf, specType } from './spec/specNodeView';
export type { SpecNodeView } from './spec/specNodeView';
export { renderHtml, renderHtmlBody } from './renderers/HtmlRenderer';
export { renderTipTap } from './renderers/TipTapRenderer';
export { fixEncoding } from './utils/encodingUtils';
export { sniffFileType } from './utils/fileTypeUtils';
export { ConverterErrorType } from './utils/errorUtils';
export type {
    Block,
    ConversionJob,
    ConversionOutput,
    ConversionResult,
    ConverterConfig,
    ExtractedPage,
    RenderFormat,
    SniffedFileType,
    SpecMark,
    SpecNode,
    SpecNodeKind,
    TipTapDocument,
    TipTapNode
} from './types';

export default DocumentConverter;
