/**
 * TipTap Renderer
 *
 * Renders a spec tree to the JSON document model of the TipTap (ProseMirror) editor.
 * Only block types the editor schema knows are rendered; anything else is dropped.
 *
 * @module TipTapRenderer
 */

import { SpecMark, SpecNode, TipTapDocument, TipTapMarkType, TipTapNode } from '../types';
import { classifySpecNode, headingLevelOf, specNodeKindOf } from '../spec/specNodeView';

const MARK_ALIASES: Record<string, TipTapMarkType> = {
    bold: 'bold',
    strong: 'bold',
    italic: 'italic',
    em: 'italic',
    underline: 'underline'
};

const emptyText = (): TipTapNode => ({ type: 'text', text: '' });

const emptyParagraph = (): TipTapNode => ({ type: 'paragraph', content: [emptyText()] });

const toTipTapMarks = (marks: SpecMark[]): { type: TipTapMarkType }[] => {
    const out: { type: TipTapMarkType }[] = [];
    for (const mark of marks) {
        const type = Object.hasOwn(MARK_ALIASES, mark.type) ? MARK_ALIASES[mark.type] : undefined;
        if (type) out.push({ type });
    }
    return out;
};

/**
 * Text children of a heading or paragraph; other children are not inline content.
 */
const renderInline = (children: SpecNode[]): TipTapNode[] => {
    const out: TipTapNode[] = [];
    for (const child of children) {
        const view = classifySpecNode(child);
        if (view.kind !== 'Text') continue;

        const node: TipTapNode = { type: 'text', text: view.text };
        const marks = toTipTapMarks(view.marks);
        if (marks.length > 0) node.marks = marks;
        out.push(node);
    }
    return out.length > 0 ? out : [emptyText()];
};

const renderBlocks = (children: SpecNode[]): TipTapNode[] => {
    const out: TipTapNode[] = [];
    for (const child of children) {
        const block = renderBlock(child);
        if (block) out.push(block);
    }
    return out;
};

const renderTable = (rows: SpecNode[]): TipTapNode => {
    const content: TipTapNode[] = [];
    for (const row of rows) {
        const kind = specNodeKindOf(row.type);
        if (kind !== 'TableHeaderRow' && kind !== 'TableRow') continue;

        const cellType = kind === 'TableHeaderRow' ? 'tableHeader' : 'tableCell';
        content.push({
            type: 'tableRow',
            content: (row.children ?? []).map(cell => {
                const blocks = renderBlocks(cell.children ?? []);
                return { type: cellType, content: blocks.length > 0 ? blocks : [emptyParagraph()] };
            })
        });
    }
    return { type: 'table', content };
};

const renderBlock = (node: SpecNode): TipTapNode | undefined => {
    const view = classifySpecNode(node);

    switch (view.kind) {
        case 'Heading':
            return { type: 'heading', attrs: { level: headingLevelOf(view.level) }, content: renderInline(view.children) };
        case 'Paragraph':
            return { type: 'paragraph', content: renderInline(view.children) };
        case 'BulletList':
            return { type: 'bulletList', content: renderBlocks(view.children) };
        case 'OrderedList':
            return { type: 'orderedList', content: renderBlocks(view.children) };
        case 'ListItem':
            return { type: 'listItem', content: renderBlocks(view.children) };
        case 'Table':
            return renderTable(view.children);
        default:
            return undefined;
    }
};

/**
 * Renders a tree to a TipTap document.
 *
 * @param tree - Root of the tree; anything but a Document gives an empty document
 */
export const renderTipTap = (tree: SpecNode): TipTapDocument => {
    const view = classifySpecNode(tree);
    if (view.kind !== 'Document') return { type: 'doc', content: [] };
    return { type: 'doc', content: renderBlocks(view.children) };
};
