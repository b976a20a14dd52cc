import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../config';
import { doc, heading, node, para, tableOf, text } from '../test-utils/specTree';
import { escapeHtml, renderHtml, renderHtmlBody } from './HtmlRenderer';

describe('escapeHtml', () => {
    it('escapes markup characters', () => {
        expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#x27;s&lt;/a&gt;');
    });
});

describe('renderHtmlBody', () => {
    it('renders headings and paragraphs', () => {
        const tree = doc(heading(10, 'Title'), para(text('Hello world.')));

        expect(renderHtmlBody(tree)).toBe('<h1>Title</h1>\n<p>Hello world.</p>\n');
    });

    it('maps heading levels back to h1 to h6', () => {
        expect(renderHtmlBody(heading(30, 'x'))).toBe('<h3>x</h3>\n');
        expect(renderHtmlBody(heading(60, 'x'))).toBe('<h6>x</h6>\n');
        expect(renderHtmlBody(heading(90, 'x'))).toBe('<h6>x</h6>\n');
        expect(renderHtmlBody(heading(undefined, 'x'))).toBe('<h2>x</h2>\n');
    });

    it('renders marks with bold innermost', () => {
        expect(renderHtmlBody(para(text('Hi', ['bold'])))).toBe('<p><strong>Hi</strong></p>\n');
        expect(renderHtmlBody(text('x', ['underline', 'em', 'strong']))).toBe('<u><em><strong>x</strong></em></u>');
        expect(renderHtmlBody(text('x', ['italic', 'highlight']))).toBe('<em>x</em>');
    });

    it('escapes text', () => {
        expect(renderHtmlBody(para(text('1 < 2 & "3"')))).toBe('<p>1 &lt; 2 &amp; &quot;3&quot;</p>\n');
    });

    it('renders lists', () => {
        const tree = doc(
            node('BulletList', [node('ListItem', [para(text('A'))]), node('ListItem', [para(text('B'))])]),
            node('OrderedList', [node('ListItem', [para(text('one'))], { order: 1 })])
        );

        expect(renderHtmlBody(tree)).toBe(
            '<ul>\n<li><p>A</p>\n</li>\n<li><p>B</p>\n</li>\n</ul>\n' +
            '<ol>\n<li><p>one</p>\n</li>\n</ol>\n'
        );
    });

    it('renders tables with a header row', () => {
        const tree = tableOf([['H1', 'H2'], ['a', 'b']]);

        expect(renderHtmlBody(tree)).toBe(
            '<table>\n' +
            '<tr><th><p>H1</p>\n</th><th><p>H2</p>\n</th></tr>\n' +
            '<tr><td><p>a</p>\n</td><td><p>b</p>\n</td></tr>\n' +
            '</table>\n'
        );
    });

    it('renders the children of unknown nodes', () => {
        const aside = { id: 'aside', type: 'https://example.org/vocab/Aside', children: [para(text('inside'))] };
        const empty = { id: 'empty', type: 'https://example.org/vocab/Figure' };

        expect(renderHtmlBody(doc(aside, empty))).toBe('<p>inside</p>\n');
    });

    it('matches node types whatever their namespace', () => {
        const foreign = { id: 'h', type: 'urn:other:ns/Heading', level: 20, children: [text('x')] };

        expect(renderHtmlBody(foreign)).toBe('<h2>x</h2>\n');
    });

    it('does not modify the tree', () => {
        const tree = doc(heading(20, 'T'), para(text('p', ['bold'])), tableOf([['a']]));
        const copy = structuredClone(tree);

        renderHtmlBody(tree);

        expect(tree).toEqual(copy);
    });
});

describe('renderHtml', () => {
    it('wraps the body in an HTML page', () => {
        const html = renderHtml(doc(para(text('Hi'))), resolveConfig());

        expect(html.startsWith('<!DOCTYPE html>\n<html lang="en">\n<head>\n')).toBe(true);
        expect(html).toContain('    <meta charset="UTF-8">\n');
        expect(html).toContain('    <title>Converted Document</title>\n');
        expect(html).toContain('<style>');
        expect(html.endsWith('<body>\n<p>Hi</p>\n\n</body>\n</html>')).toBe(true);
    });

    it('uses the configured language and escaped title', () => {
        const html = renderHtml(doc(), resolveConfig({ htmlLanguage: 'nl', htmlTitle: 'Q&A <draft>' }));

        expect(html).toContain('<html lang="nl">');
        expect(html).toContain('<title>Q&amp;A &lt;draft&gt;</title>');
    });
});
