import { v4 as uuidv4 } from 'uuid';
import { ConverterConfig } from './types';

/**
 * Configuration with every default applied.
 * Extractors, the builder and the renderers only ever see this shape.
 */
export type ResolvedConfig = Required<ConverterConfig>;

const defaultFallbackMessage = (pageCount: number): string =>
    `This document has ${pageCount} page(s), but no text could be extracted from it.`;

/**
 * Applies the defaults for all omitted options.
 *
 * @param config - Partial user configuration
 * @returns The complete configuration
 */
export const resolveConfig = (config: ConverterConfig = {}): ResolvedConfig => ({
    outputErrorToConsole: false,
    newlineDelimiter: '\n',
    pdfWorkerSrc: '',
    pdfLineTolerance: 2,
    pdfHeading1MinSize: 18,
    pdfHeading2MinSize: 16,
    orderedNumIdThreshold: 10,
    boldHeadingMinSize: 14,
    boldHeadingMaxWords: 15,
    boldHeadingShortWords: 8,
    fallbackMessage: defaultFallbackMessage,
    htmlLanguage: 'en',
    htmlTitle: 'Converted Document',
    specBucket: 'files',
    outputBucket: 'output',
    generateId: uuidv4,
    ...config
});
