export interface PdfTextLine {
    text: string;
    size: number;
    y: number;
    /** Draw with Helvetica-Bold instead of Helvetica. */
    bold?: boolean;
}

const FONTS = '/Font << /F1 3 0 R /F2 4 0 R >>';

/**
 * Writes a PDF with one page per entry, drawing each line at its own size and baseline.
 * Line texts must not contain parentheses or backslashes.
 */
export const buildPdfPages = (pages: PdfTextLine[][]): Buffer => {
    // 1 catalog, 2 page tree, 3-4 fonts, then a page and its content stream per page
    const pageRef = (index: number) => `${5 + index * 2} 0 R`;

    const objects = [
        '<< /Type /Catalog /Pages 2 0 R >>',
        `<< /Type /Pages /Kids [${pages.map((_, index) => pageRef(index)).join(' ')}] /Count ${pages.length} >>`,
        '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>',
        '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica-Bold /Encoding /WinAnsiEncoding >>'
    ];
    pages.forEach((lines, index) => {
        const stream = lines
            .map(line => `BT /${line.bold ? 'F2' : 'F1'} ${line.size} Tf 72 ${line.y} Td (${line.text}) Tj ET`)
            .join('\n');
        objects.push(
            `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << ${FONTS} >> /Contents ${6 + index * 2} 0 R >>`,
            `<< /Length ${Buffer.byteLength(stream, 'latin1')} >>\nstream\n${stream}\nendstream`
        );
    });

    let pdf = '%PDF-1.4\n';
    const offsets: number[] = [];
    objects.forEach((body, index) => {
        offsets.push(Buffer.byteLength(pdf, 'latin1'));
        pdf += `${index + 1} 0 obj\n${body}\nendobj\n`;
    });

    const xrefOffset = Buffer.byteLength(pdf, 'latin1');
    pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
    for (const offset of offsets) {
        pdf += `${String(offset).padStart(10, '0')} 00000 n \n`;
    }
    pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

    return Buffer.from(pdf, 'latin1');
};

/**
 * Writes a one-page PDF.
 */
export const buildPdf = (lines: PdfTextLine[]): Buffer => buildPdfPages([lines]);
