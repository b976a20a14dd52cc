import { describe, it, expect } from 'vitest';
import { doc, heading, node, para, tableOf, text } from '../test-utils/specTree';
import { renderTipTap } from './TipTapRenderer';

describe('renderTipTap', () => {
    it('renders marked text', () => {
        expect(renderTipTap(doc(para(text('Hi', ['bold']))))).toEqual({
            type: 'doc',
            content: [{ type: 'paragraph', content: [{ type: 'text', text: 'Hi', marks: [{ type: 'bold' }] }] }]
        });
    });

    it('maps mark aliases and drops unknown marks', () => {
        const result = renderTipTap(doc(para(text('a', ['strong', 'em', 'underline']), text('b', ['highlight']))));

        expect(result.content[0].content).toEqual([
            { type: 'text', text: 'a', marks: [{ type: 'bold' }, { type: 'italic' }, { type: 'underline' }] },
            { type: 'text', text: 'b' }
        ]);
    });

    it('renders heading levels', () => {
        const result = renderTipTap(doc(heading(10, 'one'), heading(40, 'four'), heading(undefined, 'none')));

        expect(result.content.map(block => block.attrs)).toEqual([{ level: 1 }, { level: 4 }, { level: 2 }]);
        expect(result.content[0]).toEqual({ type: 'heading', attrs: { level: 1 }, content: [{ type: 'text', text: 'one' }] });
    });

    it('gives empty headings and paragraphs an empty text node', () => {
        expect(renderTipTap(doc(para(), node('Heading', [], { level: 30 })))).toEqual({
            type: 'doc',
            content: [
                { type: 'paragraph', content: [{ type: 'text', text: '' }] },
                { type: 'heading', attrs: { level: 3 }, content: [{ type: 'text', text: '' }] }
            ]
        });
    });

    it('renders lists', () => {
        const tree = doc(
            node('BulletList', [node('ListItem', [para(text('A'))])]),
            node('OrderedList', [node('ListItem', [para(text('1'))], { order: 1 })])
        );

        expect(renderTipTap(tree).content).toEqual([
            {
                type: 'bulletList',
                content: [{ type: 'listItem', content: [{ type: 'paragraph', content: [{ type: 'text', text: 'A' }] }] }]
            },
            {
                type: 'orderedList',
                content: [{ type: 'listItem', content: [{ type: 'paragraph', content: [{ type: 'text', text: '1' }] }] }]
            }
        ]);
    });

    it('renders tables with header cells in the first row', () => {
        const result = renderTipTap(doc(tableOf([['H'], ['v']])));

        expect(result.content).toEqual([
            {
                type: 'table',
                content: [
                    { type: 'tableRow', content: [{ type: 'tableHeader', content: [{ type: 'paragraph', content: [{ type: 'text', text: 'H' }] }] }] },
                    { type: 'tableRow', content: [{ type: 'tableCell', content: [{ type: 'paragraph', content: [{ type: 'text', text: 'v' }] }] }] }
                ]
            }
        ]);
    });

    it('fills empty cells and skips rows of other types', () => {
        const tree = doc(node('Table', [
            node('TableRow', [node('TableCell')]),
            node('Paragraph', [text('stray')])
        ]));

        expect(renderTipTap(tree).content).toEqual([
            {
                type: 'table',
                content: [
                    { type: 'tableRow', content: [{ type: 'tableCell', content: [{ type: 'paragraph', content: [{ type: 'text', text: '' }] }] }] }
                ]
            }
        ]);
    });

    it('skips blocks it cannot render', () => {
        const tree = doc({ id: 'x', type: 'https://example.org/vocab/Aside', children: [para(text('hidden'))] }, text('loose'), para(text('kept')));

        expect(renderTipTap(tree).content).toEqual([{ type: 'paragraph', content: [{ type: 'text', text: 'kept' }] }]);
    });

    it('returns an empty document for roots other than a Document', () => {
        expect(renderTipTap(para(text('x')))).toEqual({ type: 'doc', content: [] });
    });

    it('does not modify the tree', () => {
        const tree = doc(heading(20, 'T'), para(text('p', ['bold'])), tableOf([['a']]));
        const copy = structuredClone(tree);

        renderTipTap(tree);

        expect(tree).toEqual(copy);
    });
});
