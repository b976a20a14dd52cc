import JSZip from 'jszip';

const W_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';

export interface RunOptions {
    bold?: boolean;
    italic?: boolean;
    underline?: boolean;
    /** Points; written as half-points. */
    size?: number;
}

export interface ParagraphOptions {
    style?: string;
    numId?: number;
}

export const run = (text: string, options: RunOptions = {}): string => {
    const props = [
        options.bold ? '<w:b/>' : '',
        options.italic ? '<w:i/>' : '',
        options.underline ? '<w:u w:val="single"/>' : '',
        options.size !== undefined ? `<w:sz w:val="${options.size * 2}"/>` : ''
    ].join('');
    const rPr = props ? `<w:rPr>${props}</w:rPr>` : '';
    return `<w:r>${rPr}<w:t xml:space="preserve">${text}</w:t></w:r>`;
};

export const paragraph = (runs: string | string[], options: ParagraphOptions = {}): string => {
    const props = [
        options.style ? `<w:pStyle w:val="${options.style}"/>` : '',
        options.numId !== undefined ? `<w:numPr><w:ilvl w:val="0"/><w:numId w:val="${options.numId}"/></w:numPr>` : ''
    ].join('');
    const pPr = props ? `<w:pPr>${props}</w:pPr>` : '';
    const content = Array.isArray(runs) ? runs.join('') : run(runs);
    return `<w:p>${pPr}${content}</w:p>`;
};

export interface CellOptions {
    gridSpan?: number;
    vMerge?: 'restart' | 'continue';
}

export const cell = (texts: string | string[], options: CellOptions = {}): string => {
    const props = [
        options.gridSpan !== undefined ? `<w:gridSpan w:val="${options.gridSpan}"/>` : '',
        options.vMerge === 'restart' ? '<w:vMerge w:val="restart"/>' : '',
        options.vMerge === 'continue' ? '<w:vMerge/>' : ''
    ].join('');
    const tcPr = props ? `<w:tcPr>${props}</w:tcPr>` : '';
    const paragraphs = (Array.isArray(texts) ? texts : [texts]).map(text => paragraph(text)).join('');
    return `<w:tc>${tcPr}${paragraphs}</w:tc>`;
};

export const table = (rows: string[][]): string =>
    `<w:tbl>${rows.map(cells => `<w:tr>${cells.join('')}</w:tr>`).join('')}</w:tbl>`;

export const documentXml = (body: string[]): string =>
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?><w:document xmlns:w="${W_NS}"><w:body>${body.join('')}</w:body></w:document>`;

export const stylesXml = (styles: { id: string; name: string; isDefault?: boolean }[]): string =>
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?><w:styles xmlns:w="${W_NS}">${styles
        .map(style => `<w:style w:type="paragraph"${style.isDefault ? ' w:default="1"' : ''} w:styleId="${style.id}"><w:name w:val="${style.name}"/></w:style>`)
        .join('')}</w:styles>`;

/**
 * Zips the given parts into a package.
 */
export const buildZip = (parts: Record<string, string>): Promise<Buffer> => {
    const zip = new JSZip();
    for (const [name, content] of Object.entries(parts)) {
        zip.file(name, content);
    }
    return zip.generateAsync({ type: 'nodebuffer' });
};

/**
 * Builds a DOCX package from body elements and optional styles.
 */
export const buildDocx = (body: string[], styles?: string): Promise<Buffer> => {
    const parts: Record<string, string> = {
        '[Content_Types].xml': '<?xml version="1.0" encoding="UTF-8"?><Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types"/>',
        'word/document.xml': documentXml(body)
    };
    if (styles) parts['word/styles.xml'] = styles;
    return buildZip(parts);
};
