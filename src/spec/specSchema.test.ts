import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../config';
import { doc, heading, node, para, tableOf, text } from '../test-utils/specTree';
import { buildSpec } from './SpecBuilder';
import { findSpecViolations, parseSpecDocument } from './specSchema';

describe('parseSpecDocument', () => {
    it('accepts a built tree read back from JSON', () => {
        const spec = buildSpec(
            [{ pageNumber: 1, blocks: [{ kind: 'heading', level: 2, text: 'T' }, { kind: 'table', rows: [['a'], ['b']] }] }],
            { pageCount: 1, config: resolveConfig() }
        );
        const json: unknown = JSON.parse(JSON.stringify(spec));

        expect(parseSpecDocument(json)).toEqual(spec);
    });

    it('accepts node types outside the vocabulary', () => {
        const tree = doc({ id: 'aside', type: 'https://example.org/vocab/Aside', children: [para(text('x'))] });

        expect(parseSpecDocument(tree)).toEqual(tree);
    });

    it('rejects values that are not nodes', () => {
        expect(() => parseSpecDocument('hello')).toThrow('[DocSpec]: The spec document is not valid: (root):');
        expect(() => parseSpecDocument({ type: 'https://spec.nldoc.nl/Resource/Document' })).toThrow('id: Required');
    });

    it('rejects malformed children', () => {
        const tree = { id: 'd', type: 'https://spec.nldoc.nl/Resource/Document', children: [{ id: 'p', type: 'x', order: 0 }] };

        expect(() => parseSpecDocument(tree)).toThrow('children.0.order');
    });

    it('rejects structural violations', () => {
        expect(() => parseSpecDocument(para(text('x')))).toThrow('is not a Document');
    });
});

describe('findSpecViolations', () => {
    it('reports nothing for a valid tree', () => {
        expect(findSpecViolations(doc(heading(30, 'h'), tableOf([['a'], ['b']])))).toEqual([]);
    });

    it('reports duplicate ids', () => {
        const tree = doc({ id: 'same', type: 'https://spec.nldoc.nl/Resource/Paragraph', children: [{ id: 'same', type: 'https://spec.nldoc.nl/Resource/Text', text: 'x' }] });

        expect(findSpecViolations(tree)).toEqual(['id same is used more than once']);
    });

    it('reports heading levels that are not multiples of ten', () => {
        const bad = node('Heading', [text('h')], { level: 15 });

        expect(findSpecViolations(doc(bad))).toEqual([`Heading ${bad.id} has level 15, expected 10, 20, ... 60`]);
    });

    it('reports header rows after the first row', () => {
        const tableNode = node('Table', [node('TableRow'), node('TableHeaderRow')]);

        expect(findSpecViolations(doc(tableNode))).toEqual([`Table ${tableNode.id} has a header row at position 2`]);
    });

    it('reports Text nodes with children and nested documents', () => {
        const parent = { id: 'txt', type: 'https://spec.nldoc.nl/Resource/Text', text: 'x', children: [text('y')] };
        const inner = doc();

        expect(findSpecViolations(doc(parent, inner))).toEqual(['Text node txt has children', `Document ${inner.id} is nested`]);
    });
});
