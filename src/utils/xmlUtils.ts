/**
 * XML Parsing Utilities
 *
 * Provides helper functions for parsing and navigating the WordprocessingML parts of a DOCX file.
 *
 * @module xmlUtils
 */

import { DOMParser } from '@xmldom/xmldom';

/** DOM node type of elements */
const ELEMENT_NODE = 1;

/**
 * Parses an XML string into a DOM Document object.
 *
 * Unlike the parser defaults, errors are thrown instead of being logged,
 * so a malformed part fails the extraction that asked for it.
 *
 * @param xml - The XML content as a string
 * @returns A Document object that can be queried using standard DOM methods
 * @throws {Error} If the XML is not well-formed
 */
export const parseXmlString = (xml: string): Document => {
    const parser = new DOMParser({
        errorHandler: {
            warning: () => undefined,
            error: (msg: string) => { throw new Error(`invalid XML: ${msg}`); },
            fatalError: (msg: string) => { throw new Error(`invalid XML: ${msg}`); }
        }
    });
    return parser.parseFromString(xml, "text/xml");
};

/**
 * Gets all elements with a specific tag name (recursively) as an array.
 *
 * @param element - The element or document to search within
 * @param tagName - The qualified tag name, e.g. 'w:t'
 */
export const getElementsByTagName = (element: Element | Document, tagName: string): Element[] => {
    return Array.from(element.getElementsByTagName(tagName));
};

const isElement = (node: Node): node is Element => node.nodeType === ELEMENT_NODE;

/**
 * Gets the direct child elements of a parent, optionally only those with a given tag name.
 * Unlike getElementsByTagName, this does not search recursively, so nested tables
 * and the runs of nested paragraphs stay out of the result.
 *
 * @param parent - The parent element
 * @param tagName - The tag name to keep; all child elements when omitted
 */
export const getDirectChildren = (parent: Element, tagName?: string): Element[] => {
    const result: Element[] = [];
    if (!parent.childNodes) return result;

    for (let i = 0; i < parent.childNodes.length; i++) {
        const child = parent.childNodes[i];
        if (isElement(child) && (tagName === undefined || child.tagName === tagName)) {
            result.push(child);
        }
    }
    return result;
};

/**
 * Gets the first direct child with a given tag name.
 */
export const getDirectChild = (parent: Element | undefined, tagName: string): Element | undefined => {
    return parent ? getDirectChildren(parent, tagName)[0] : undefined;
};

/**
 * Reads the `w:val` attribute, the value carrier of most WordprocessingML properties.
 *
 * @returns The attribute value, or undefined if the element or attribute is missing
 */
export const getValAttribute = (element: Element | undefined): string | undefined => {
    if (!element || !element.hasAttribute('w:val')) return undefined;
    return element.getAttribute('w:val') ?? undefined;
};
