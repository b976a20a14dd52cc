/**
 * HTML Renderer
 *
 * Renders a spec tree to accessible HTML. Nodes are matched by the type name at the end
 * of their tag; nodes of unknown types render their children, so content is never lost.
 *
 * @module HtmlRenderer
 */

import { ResolvedConfig } from '../config';
import { SpecMark, SpecNode } from '../types';
import { assertNever, classifySpecNode, headingLevelOf } from '../spec/specNodeView';

const STYLESHEET = `
        body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Oxygen, Ubuntu, sans-serif; line-height: 1.6; max-width: 800px; margin: 0 auto; padding: 2rem; color: #333; }
        h1, h2, h3, h4, h5, h6 { margin-top: 1.5em; margin-bottom: 0.5em; color: #1a1a1a; }
        h1 { font-size: 2rem; border-bottom: 2px solid #eee; padding-bottom: 0.3em; }
        h2 { font-size: 1.5rem; border-bottom: 1px solid #eee; padding-bottom: 0.2em; }
        h3 { font-size: 1.25rem; }
        p { margin: 1em 0; }
        ul, ol { margin: 1em 0; padding-left: 2em; }
        li { margin: 0.3em 0; }
        table { border-collapse: collapse; width: 100%; margin: 1em 0; }
        th, td { border: 1px solid #ddd; padding: 0.75em; text-align: left; }
        th { background-color: #f5f5f5; font-weight: bold; }
        tr:nth-child(even) { background-color: #fafafa; }
        strong { font-weight: bold; }
        em { font-style: italic; }
        u { text-decoration: underline; }
    `;

/**
 * Escapes the characters that are significant in HTML text and attribute values.
 */
export const escapeHtml = (text: string): string =>
    text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#x27;');

/**
 * Wraps escaped text in the tags of its marks. Bold is always innermost,
 * underline outermost, whatever order the marks were recorded in.
 */
const renderText = (text: string, marks: SpecMark[]): string => {
    const types = new Set(marks.map(mark => mark.type));
    let html = escapeHtml(text);
    if (types.has('bold') || types.has('strong')) html = `<strong>${html}</strong>`;
    if (types.has('italic') || types.has('em')) html = `<em>${html}</em>`;
    if (types.has('underline')) html = `<u>${html}</u>`;
    return html;
};

const renderChildren = (children: SpecNode[]): string => children.map(renderNode).join('');

const renderRow = (cells: SpecNode[], tag: 'th' | 'td'): string =>
    `<tr>${cells.map(cell => `<${tag}>${renderChildren(cell.children ?? [])}</${tag}>`).join('')}</tr>\n`;

const renderNode = (node: SpecNode): string => {
    const view = classifySpecNode(node);

    switch (view.kind) {
        case 'Text':
            return renderText(view.text, view.marks);
        case 'Heading': {
            const level = headingLevelOf(view.level);
            return `<h${level}>${renderChildren(view.children)}</h${level}>\n`;
        }
        case 'Paragraph':
            return `<p>${renderChildren(view.children)}</p>\n`;
        case 'BulletList':
            return `<ul>\n${renderChildren(view.children)}</ul>\n`;
        case 'OrderedList':
            return `<ol>\n${renderChildren(view.children)}</ol>\n`;
        case 'ListItem':
            return `<li>${renderChildren(view.children)}</li>\n`;
        case 'Table':
            return `<table>\n${renderChildren(view.children)}</table>\n`;
        case 'TableHeaderRow':
            return renderRow(view.children, 'th');
        case 'TableRow':
            return renderRow(view.children, 'td');
        case 'TableCell':
        case 'Document':
        case 'Unknown':
            return renderChildren(view.children);
        default:
            return assertNever(view);
    }
};

/**
 * Renders a tree to an HTML fragment (the content of `<body>`).
 *
 * @example
 * ```typescript
 * renderHtmlBody(spec); // '<h1>Title</h1>\n<p>Hello world.</p>\n'
 * ```
 */
export const renderHtmlBody = (tree: SpecNode): string => renderNode(tree);

/**
 * Renders a tree to a complete HTML5 document with an inline stylesheet.
 */
export const renderHtml = (tree: SpecNode, config: ResolvedConfig): string => `<!DOCTYPE html>
<html lang="${escapeHtml(config.htmlLanguage)}">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${escapeHtml(config.htmlTitle)}</title>
    <style>${STYLESHEET}</style>
</head>
<body>
${renderHtmlBody(tree)}
</body>
</html>`;
