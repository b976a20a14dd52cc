import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../config';
import { Block } from '../types';
import { buildDocx, buildZip, cell, documentXml, paragraph, run, stylesXml, table } from '../test-utils/docxFixture';
import { detectHeadingLevel, extractDocx, extractDocxBlocks } from './DocxExtractor';

const config = resolveConfig();

const blocksOf = (body: string[], styles?: string): Block[] => extractDocxBlocks(documentXml(body), styles, config);

const listTexts = (block: Block | undefined): string[] =>
    block && (block.kind === 'bulletList' || block.kind === 'orderedList') ? block.items.map(item => item.text) : [];

describe('detectHeadingLevel', () => {
    it('reads the level from heading style names', () => {
        expect(detectHeadingLevel('heading 2')).toBe(2);
        expect(detectHeadingLevel('heading1')).toBe(1);
        expect(detectHeadingLevel('kop 3')).toBe(3);
        expect(detectHeadingLevel('title')).toBe(1);
    });

    it('ignores other styles', () => {
        expect(detectHeadingLevel('normal')).toBeUndefined();
        expect(detectHeadingLevel('')).toBeUndefined();
    });
});

describe('extractDocx', () => {
    it('extracts a heading and a paragraph as a single page', async () => {
        const docx = await buildDocx([paragraph('Title', { style: 'Heading1' }), paragraph('Hello world.')]);

        const pages = await extractDocx(docx, config);

        expect(pages).toHaveLength(1);
        expect(pages?.[0].pageNumber).toBe(1);
        expect(pages?.[0].blocks).toMatchObject([
            { kind: 'heading', level: 1, text: 'Title' },
            { kind: 'paragraph', text: 'Hello world.' }
        ]);
    });

    it('resolves style ids through the styles part', async () => {
        const styles = stylesXml([
            { id: 'Normal', name: 'Normal', isDefault: true },
            { id: 'Kop2', name: 'heading 2' }
        ]);
        const docx = await buildDocx([paragraph('Section', { style: 'Kop2' }), paragraph('Text')], styles);

        const pages = await extractDocx(docx, config);

        expect(pages?.[0].blocks).toMatchObject([
            { kind: 'heading', level: 2, text: 'Section' },
            { kind: 'paragraph', text: 'Text' }
        ]);
    });

    it('returns undefined for data that is not a ZIP archive', async () => {
        expect(await extractDocx(Buffer.from('not a zip archive'), config)).toBeUndefined();
    });

    it('returns undefined when the document part is missing', async () => {
        const zip = await buildZip({ 'word/other.xml': '<x/>' });

        expect(await extractDocx(zip, config)).toBeUndefined();
    });

    it('returns undefined when the document has no body', async () => {
        const zip = await buildZip({
            'word/document.xml': '<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"/>'
        });

        expect(await extractDocx(zip, config)).toBeUndefined();
    });
});

describe('extractDocxBlocks', () => {
    describe('paragraphs and runs', () => {
        it('keeps the formatting of each run', () => {
            const [block] = blocksOf([
                paragraph([run('Plain '), run('bold', { bold: true }), run(' end', { italic: true, underline: true })])
            ]);

            expect(block.kind).toBe('paragraph');
            if (block.kind !== 'paragraph') return;
            expect(block.text).toBe('Plain bold end');
            expect(block.runs?.map(r => [r.text, [...r.marks]])).toEqual([
                ['Plain ', []],
                ['bold', ['bold']],
                [' end', ['italic', 'underline']]
            ]);
        });

        it('reads tabs, breaks and hyperlink runs', () => {
            const blocks = blocksOf([
                '<w:p><w:r><w:t>a</w:t><w:tab/><w:t>b</w:t><w:br/><w:t>c</w:t></w:r></w:p>',
                '<w:p><w:r><w:t xml:space="preserve">See </w:t></w:r><w:hyperlink><w:r><w:t>the site</w:t></w:r></w:hyperlink></w:p>'
            ]);

            expect(blocks).toMatchObject([
                { kind: 'paragraph', text: 'a\tb\nc' },
                { kind: 'paragraph', text: 'See the site' }
            ]);
        });

        it('drops empty paragraphs', () => {
            expect(blocksOf([paragraph(''), paragraph('x'), paragraph('   ')])).toMatchObject([{ kind: 'paragraph', text: 'x' }]);
        });
    });

    describe('lists', () => {
        it('groups numbered paragraphs by list kind', () => {
            const blocks = blocksOf([
                paragraph('One', { numId: 1 }),
                paragraph('Two', { numId: 1 }),
                paragraph('Three', { numId: 12 }),
                paragraph('After')
            ]);

            expect(blocks.map(b => b.kind)).toEqual(['bulletList', 'orderedList', 'paragraph']);
            expect(listTexts(blocks[0])).toEqual(['One', 'Two']);
            expect(listTexts(blocks[1])).toEqual(['Three']);
        });

        it('treats list styles as lists', () => {
            const blocks = blocksOf([
                paragraph('a', { style: 'ListBullet' }),
                paragraph('b', { style: 'ListNumber' })
            ]);

            expect(blocks.map(b => b.kind)).toEqual(['bulletList', 'orderedList']);
        });

        it('detects bullet glyphs', () => {
            const blocks = blocksOf(['•', '●', '○', '▪', '-', '*'].map(glyph => paragraph(`${glyph} item`)));

            expect(blocks).toHaveLength(1);
            expect(blocks[0].kind).toBe('bulletList');
            expect(listTexts(blocks[0])).toEqual(['• item', '● item', '○ item', '▪ item', '- item', '* item']);
        });

        it('detects number prefixes', () => {
            const blocks = blocksOf([paragraph('1. First'), paragraph('2) Second'), paragraph('10: Tenth')]);

            expect(blocks).toHaveLength(1);
            expect(blocks[0].kind).toBe('orderedList');
            expect(listTexts(blocks[0])).toEqual(['1. First', '2) Second', '10: Tenth']);
        });

        it('does not treat a bare year as a list item', () => {
            expect(blocksOf([paragraph('2024 was a good year')])).toMatchObject([{ kind: 'paragraph' }]);
        });

        it('splits lists at empty paragraphs and tables', () => {
            const blocks = blocksOf([
                paragraph('A', { numId: 1 }),
                paragraph(''),
                paragraph('B', { numId: 1 }),
                table([[cell('x')]]),
                paragraph('C', { numId: 1 })
            ]);

            expect(blocks.map(b => b.kind)).toEqual(['bulletList', 'bulletList', 'table', 'bulletList']);
        });
    });

    describe('bold paragraphs', () => {
        it('promotes a short bold label to a level 3 heading', () => {
            expect(blocksOf([paragraph([run('Summary', { bold: true })])])).toMatchObject([
                { kind: 'heading', level: 3, text: 'Summary' }
            ]);
        });

        it('promotes a longer bold line only when its font is large', () => {
            const text = 'A bold sentence that goes on for more than eight words here';

            expect(blocksOf([paragraph([run(text, { bold: true })])])).toMatchObject([{ kind: 'paragraph', text }]);
            expect(blocksOf([paragraph([run(text, { bold: true, size: 16 })])])).toMatchObject([{ kind: 'heading', level: 3, text }]);
        });

        it('never promotes long bold paragraphs', () => {
            const text = 'one two three four five six seven eight nine ten eleven twelve thirteen fourteen fifteen';

            expect(blocksOf([paragraph([run(text, { bold: true, size: 20 })])])).toMatchObject([{ kind: 'paragraph' }]);
        });

        it('honours explicitly disabled bold', () => {
            const blocks = blocksOf(['<w:p><w:r><w:rPr><w:b w:val="0"/></w:rPr><w:t>Label</w:t></w:r></w:p>']);

            expect(blocks).toMatchObject([{ kind: 'paragraph', text: 'Label' }]);
        });
    });

    describe('tables', () => {
        it('reads cell texts row by row', () => {
            const blocks = blocksOf([table([[cell('Name'), cell('Age')], [cell('Ann'), cell('31')]])]);

            expect(blocks).toEqual([{ kind: 'table', rows: [['Name', 'Age'], ['Ann', '31']] }]);
        });

        it('joins the paragraphs of a cell with the newline delimiter', () => {
            expect(blocksOf([table([[cell(['line 1', 'line 2'])]])])).toEqual([{ kind: 'table', rows: [['line 1\nline 2']] }]);

            const custom = extractDocxBlocks(documentXml([table([[cell(['a', 'b'])]])]), undefined, resolveConfig({ newlineDelimiter: ' / ' }));
            expect(custom).toEqual([{ kind: 'table', rows: [['a / b']] }]);
        });

        it('repeats cells spanning several columns', () => {
            const blocks = blocksOf([table([[cell('Wide', { gridSpan: 2 })], [cell('a'), cell('b')]])]);

            expect(blocks).toEqual([{ kind: 'table', rows: [['Wide', 'Wide'], ['a', 'b']] }]);
        });

        it('repeats vertically merged cells', () => {
            const blocks = blocksOf([
                table([
                    [cell('Top', { vMerge: 'restart' }), cell('x')],
                    [cell('', { vMerge: 'continue' }), cell('y')]
                ])
            ]);

            expect(blocks).toEqual([{ kind: 'table', rows: [['Top', 'x'], ['Top', 'y']] }]);
        });
    });
});
