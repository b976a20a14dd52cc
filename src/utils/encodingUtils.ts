/**
 * Text Encoding Repair Utilities
 *
 * PDF text layers regularly contain UTF-8 bytes that were decoded as Windows-1252
 * (`â€™` instead of `'`) or as code page 437 (`ΓÇô` instead of `–`).
 * This module maps the common sequences back to the intended characters and strips
 * zero-width spaces and byte order marks.
 *
 * @module encodingUtils
 */

import replacementTable from './encodingReplacements.json';

/**
 * Ordered `[broken, fixed]` pairs. Longer sequences sharing a prefix come first.
 */
const REPLACEMENTS: ReadonlyArray<readonly [string, string]> = replacementTable.map(
    ([broken, fixed]) => [broken, fixed] as const
);

const applyReplacements = (text: string): string => {
    let result = text;
    for (const [broken, fixed] of REPLACEMENTS) {
        result = result.split(broken).join(fixed);
    }
    return result;
};

/**
 * Repairs mis-decoded byte sequences in extracted text.
 *
 * Replacements are applied until the text stops changing: removing a zero-width space
 * can join the two halves of another broken sequence. Every replacement shortens the text,
 * so the loop always ends, and the result is a fixed point:
 * `fixEncoding(fixEncoding(x)) === fixEncoding(x)`.
 *
 * @param text - Text as extracted
 * @returns The repaired text
 * @example
 * ```typescript
 * fixEncoding('Itâ€™s done â€” finally'); // "It's done — finally"
 * ```
 */
export const fixEncoding = (text: string): string => {
    let current = text;
    let next = applyReplacements(current);
    while (next !== current) {
        current = next;
        next = applyReplacements(current);
    }
    return current;
};
