import { SpecMark, SpecNode, SpecNodeKind } from '../types';
import { specType } from '../spec/specNodeView';

let next = 0;

/**
 * Builds a spec node by hand, for renderer and schema tests.
 */
export const node = (kind: SpecNodeKind, children: SpecNode[] = [], extra: Partial<SpecNode> = {}): SpecNode => ({
    id: `t${++next}`,
    type: specType(kind),
    ...extra,
    children
});

export const text = (value: string, marks: string[] = []): SpecNode => {
    const result: SpecNode = { id: `t${++next}`, type: specType('Text'), text: value };
    if (marks.length > 0) result.marks = marks.map((type): SpecMark => ({ type }));
    return result;
};

export const doc = (...children: SpecNode[]): SpecNode => node('Document', children);

export const para = (...children: SpecNode[]): SpecNode => node('Paragraph', children);

export const heading = (level: number | undefined, value: string): SpecNode =>
    node('Heading', [text(value)], level === undefined ? {} : { level });

export const tableOf = (rows: string[][]): SpecNode =>
    node('Table', rows.map((cells, index) =>
        node(index === 0 ? 'TableHeaderRow' : 'TableRow', cells.map(cell => node('TableCell', [para(text(cell))])))
    ));
