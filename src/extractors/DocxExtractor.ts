/**
 * Word Document (DOCX) Extractor
 *
 * **File Structure:**
 * DOCX files are ZIP archives. Two parts are read:
 * - `word/document.xml` - Main document content
 * - `word/styles.xml` - Style definitions (style ids to display names)
 *
 * **XML Structure (word/document.xml):**
 * ```xml
 * <w:document>
 *   <w:body>
 *     <w:p>                    <!-- Paragraph -->
 *       <w:pPr>
 *         <w:pStyle w:val="Heading1"/>
 *         <w:numPr><w:ilvl w:val="0"/><w:numId w:val="12"/></w:numPr>
 *       </w:pPr>
 *       <w:r>                  <!-- Run -->
 *         <w:rPr><w:b/><w:sz w:val="28"/></w:rPr>
 *         <w:t>Hello</w:t>
 *       </w:r>
 *     </w:p>
 *     <w:tbl>                  <!-- Table -->
 *       <w:tr><w:tc><w:p>...</w:p></w:tc></w:tr>
 *     </w:tbl>
 *   </w:body>
 * </w:document>
 * ```
 *
 * **Extraction Approach:**
 * 1. Unzip the package and resolve style ids to style names
 * 2. Walk the direct `w:p` / `w:tbl` children of `w:body` in document order
 * 3. Classify every paragraph (heading, list item, promoted bold label, paragraph)
 * 4. Group consecutive list items into list blocks (see ListAccumulator)
 *
 * The whole document is returned as a single page.
 *
 * @module DocxExtractor
 */

import { ResolvedConfig } from '../config';
import { Block, ExtractedPage, InlineMark, ListKind, Run } from '../types';
import { logWarning } from '../utils/errorUtils';
import { getDirectChild, getDirectChildren, getElementsByTagName, getValAttribute, parseXmlString } from '../utils/xmlUtils';
import { readZipEntries } from '../utils/zipUtils';
import { accumulateBlocks, BodyEvent } from './ListAccumulator';

const DOCUMENT_PART = 'word/document.xml';
const STYLES_PART = 'word/styles.xml';

/** Text prefixes marking an unordered list item. */
export const BULLET_GLYPHS = ['•', '●', '○', '▪', '-', '*'];

/** A number followed by `.`, `)` or `:` and at least one more character marks an ordered list item. */
const ORDERED_PREFIX = /^\d+[.):]./s;

/**
 * Style names of a styles part.
 */
export interface DocxStyles {
    /** styleId -> style name */
    names: Map<string, string>;
    /** Name of the default paragraph style (`w:default="1"`), applied to unstyled paragraphs. */
    defaultParagraphStyleName?: string;
}

/**
 * Formatting of a run that matters for classification.
 */
interface RunFormatting {
    bold: boolean;
    italic: boolean;
    underline: boolean;
    /** Font size in points, when set directly on the run. */
    size?: number;
}

/**
 * Everything the classifier needs to know about one `w:p`.
 */
export interface DocxParagraph {
    /** Concatenated run text, not trimmed. */
    text: string;
    /** Runs with text, in order. */
    runs: Run[];
    /** Lower-cased style name ('' when unknown). */
    styleName: string;
    /** Numbering id when the paragraph has numbering properties. */
    numId?: number;
    /** Formatting of the first run, including runs without text. */
    firstRun?: RunFormatting;
}

/**
 * Reads a boolean toggle property such as `<w:b/>` or `<w:i w:val="0"/>`.
 */
const readToggle = (rPr: Element | undefined, tagName: string): boolean => {
    const element = getDirectChild(rPr, tagName);
    if (!element) return false;
    const val = getValAttribute(element);
    return val === undefined || !['0', 'false', 'off'].includes(val);
};

const readRunFormatting = (runNode: Element): RunFormatting => {
    const rPr = getDirectChild(runNode, 'w:rPr');
    const underline = getDirectChild(rPr, 'w:u');
    const sizeVal = getValAttribute(getDirectChild(rPr, 'w:sz'));
    const halfPoints = sizeVal !== undefined ? parseInt(sizeVal, 10) : NaN;

    return {
        bold: readToggle(rPr, 'w:b'),
        italic: readToggle(rPr, 'w:i'),
        underline: !!underline && getValAttribute(underline) !== 'none',
        size: Number.isNaN(halfPoints) ? undefined : halfPoints / 2
    };
};

const readRunText = (runNode: Element): string => {
    let text = '';
    for (const child of getDirectChildren(runNode)) {
        switch (child.tagName) {
            case 'w:t':
                text += child.textContent ?? '';
                break;
            case 'w:tab':
                text += '\t';
                break;
            case 'w:br':
            case 'w:cr':
                text += '\n';
                break;
        }
    }
    return text;
};

const toMarks = (formatting: RunFormatting): ReadonlySet<InlineMark> => {
    const marks = new Set<InlineMark>();
    if (formatting.bold) marks.add('bold');
    if (formatting.italic) marks.add('italic');
    if (formatting.underline) marks.add('underline');
    return marks;
};

/**
 * Resolves style ids to display names from `word/styles.xml`.
 */
export const readStyles = (stylesXml: string | undefined): DocxStyles => {
    const styles: DocxStyles = { names: new Map() };
    if (!stylesXml) return styles;

    const doc = parseXmlString(stylesXml);
    for (const style of getElementsByTagName(doc, 'w:style')) {
        const styleId = style.getAttribute('w:styleId');
        if (!styleId) continue;

        const name = getValAttribute(getDirectChild(style, 'w:name')) ?? styleId;
        styles.names.set(styleId, name);

        if (style.getAttribute('w:type') === 'paragraph' && style.getAttribute('w:default') === '1') {
            styles.defaultParagraphStyleName = name;
        }
    }
    return styles;
};

/**
 * Reads the text, runs, style and numbering of a paragraph.
 * Runs nested in hyperlinks are part of the paragraph text.
 */
export const readParagraph = (pNode: Element, styles: DocxStyles): DocxParagraph => {
    const pPr = getDirectChild(pNode, 'w:pPr');
    const styleId = getValAttribute(getDirectChild(pPr, 'w:pStyle'));
    const styleName = styleId !== undefined
        ? styles.names.get(styleId) ?? styleId
        : styles.defaultParagraphStyleName ?? '';

    const numPr = getDirectChild(pPr, 'w:numPr');
    let numId: number | undefined;
    if (numPr) {
        const parsed = parseInt(getValAttribute(getDirectChild(numPr, 'w:numId')) ?? '0', 10);
        numId = Number.isNaN(parsed) ? 0 : parsed;
    }

    const runNodes: Element[] = [];
    for (const child of getDirectChildren(pNode)) {
        if (child.tagName === 'w:r') {
            runNodes.push(child);
        } else if (child.tagName === 'w:hyperlink') {
            runNodes.push(...getDirectChildren(child, 'w:r'));
        }
    }

    let text = '';
    const runs: Run[] = [];
    let firstRun: RunFormatting | undefined;
    for (const runNode of runNodes) {
        const formatting = readRunFormatting(runNode);
        firstRun ??= formatting;

        const runText = readRunText(runNode);
        text += runText;
        if (runText) {
            runs.push({ text: runText, marks: toMarks(formatting) });
        }
    }

    return { text, runs, styleName: styleName.toLowerCase(), numId, firstRun };
};

/**
 * Returns the heading level encoded in a style name (`Heading 2`, `Title`, `Kop 3`),
 * or undefined when the style is not a heading style.
 *
 * @param styleName - Lower-cased style name
 * @returns The first digit of the name, 1 when there is none
 */
export const detectHeadingLevel = (styleName: string): number | undefined => {
    if (!['heading', 'title', 'kop'].some(keyword => styleName.includes(keyword))) {
        return undefined;
    }
    const digit = styleName.match(/\d/);
    return digit ? parseInt(digit[0], 10) : 1;
};

/**
 * Detects whether a paragraph is a list item and of which kind.
 *
 * Precedence: numbering properties, then a list style name, then the text prefix.
 *
 * @param paragraph - The paragraph as read from the document
 * @param text - The trimmed paragraph text
 */
export const detectListKind = (paragraph: DocxParagraph, text: string, config: ResolvedConfig): ListKind | undefined => {
    const { styleName } = paragraph;

    if (paragraph.numId !== undefined) {
        const ordered = paragraph.numId >= config.orderedNumIdThreshold || styleName.includes('number');
        return ordered ? 'orderedList' : 'bulletList';
    }

    if (styleName.includes('list')) {
        const ordered = styleName.includes('number') || styleName.includes('ordered');
        return ordered ? 'orderedList' : 'bulletList';
    }

    if (BULLET_GLYPHS.some(glyph => text.startsWith(glyph))) return 'bulletList';
    if (ORDERED_PREFIX.test(text)) return 'orderedList';

    return undefined;
};

const countWords = (text: string): number => text.split(/\s+/).filter(word => word.length > 0).length;

/**
 * Decides whether an unstyled paragraph is a short bold label that reads as a heading.
 */
export const isBoldHeading = (paragraph: DocxParagraph, text: string, config: ResolvedConfig): boolean => {
    const firstRun = paragraph.firstRun;
    if (!firstRun?.bold) return false;

    const words = countWords(text);
    if (words >= config.boldHeadingMaxWords) return false;

    const largeEnough = firstRun.size !== undefined && firstRun.size >= config.boldHeadingMinSize;
    return largeEnough || words < config.boldHeadingShortWords;
};

/**
 * Turns one paragraph into a body event for the list state machine.
 */
export const classifyParagraph = (paragraph: DocxParagraph, config: ResolvedConfig): BodyEvent => {
    const text = paragraph.text.trim();
    if (!text) return { kind: 'emptyParagraph' };

    const headingLevel = detectHeadingLevel(paragraph.styleName);
    if (headingLevel !== undefined) {
        return { kind: 'block', block: { kind: 'heading', level: headingLevel, text, runs: paragraph.runs } };
    }

    const listKind = detectListKind(paragraph, text, config);
    if (listKind) {
        return { kind: 'listItem', listKind, item: { text, runs: paragraph.runs } };
    }

    if (isBoldHeading(paragraph, text, config)) {
        return { kind: 'block', block: { kind: 'heading', level: 3, text, runs: paragraph.runs } };
    }

    return { kind: 'block', block: { kind: 'paragraph', text, runs: paragraph.runs } };
};

/**
 * Reads the plain cell texts of a table, row by row.
 *
 * A cell spanning several grid columns is repeated for each of them, and a
 * vertically merged continuation cell repeats the text of the cell above it,
 * so every row holds one entry per grid column.
 */
export const readTableRows = (tblNode: Element, styles: DocxStyles, config: ResolvedConfig): string[][] => {
    const rows: string[][] = [];

    for (const trNode of getDirectChildren(tblNode, 'w:tr')) {
        const row: string[] = [];
        const previousRow = rows[rows.length - 1];

        for (const tcNode of getDirectChildren(trNode, 'w:tc')) {
            const tcPr = getDirectChild(tcNode, 'w:tcPr');
            const span = parseInt(getValAttribute(getDirectChild(tcPr, 'w:gridSpan')) ?? '1', 10);
            const vMerge = getDirectChild(tcPr, 'w:vMerge');
            const continuesAbove = !!vMerge && getValAttribute(vMerge) !== 'restart';

            let cellText = getDirectChildren(tcNode, 'w:p')
                .map(pNode => readParagraph(pNode, styles).text)
                .join(config.newlineDelimiter);
            if (continuesAbove && previousRow && previousRow[row.length] !== undefined) {
                cellText = previousRow[row.length];
            }

            const columns = Number.isNaN(span) || span < 1 ? 1 : span;
            for (let i = 0; i < columns; i++) {
                row.push(cellText);
            }
        }

        rows.push(row);
    }

    return rows;
};

/**
 * Extracts the blocks of a document body.
 *
 * @param documentXml - Content of `word/document.xml`
 * @param stylesXml - Content of `word/styles.xml`, if the package has one
 * @returns Blocks in document order
 * @throws {Error} If the XML is malformed or has no body
 */
export const extractDocxBlocks = (documentXml: string, stylesXml: string | undefined, config: ResolvedConfig): Block[] => {
    const styles = readStyles(stylesXml);
    const doc = parseXmlString(documentXml);
    const body = getElementsByTagName(doc, 'w:body')[0];
    if (!body) throw new Error('word/document.xml has no w:body');

    const events: BodyEvent[] = [];
    for (const child of getDirectChildren(body)) {
        if (child.tagName === 'w:p') {
            events.push(classifyParagraph(readParagraph(child, styles), config));
        } else if (child.tagName === 'w:tbl') {
            events.push({ kind: 'table', block: { kind: 'table', rows: readTableRows(child, styles, config) } });
        }
    }

    return accumulateBlocks(events);
};

/**
 * Extracts the content blocks of a DOCX file.
 *
 * @param buffer - The DOCX file as a Buffer
 * @param config - Converter configuration
 * @returns A single page holding all blocks, or undefined if the file could not be read
 */
export const extractDocx = async (buffer: Buffer, config: ResolvedConfig): Promise<ExtractedPage[] | undefined> => {
    try {
        const parts = await readZipEntries(buffer, [DOCUMENT_PART, STYLES_PART]);
        const documentPart = parts.get(DOCUMENT_PART);
        if (!documentPart) throw new Error(`${DOCUMENT_PART} is missing`);

        const blocks = extractDocxBlocks(documentPart.toString('utf8'), parts.get(STYLES_PART)?.toString('utf8'), config);
        return [{ pageNumber: 1, blocks }];
    } catch (e) {
        logWarning('Could not extract DOCX content:', config, e);
        return undefined;
    }
};
