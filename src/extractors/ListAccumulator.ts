/**
 * List Accumulation
 *
 * WordprocessingML has no list container: a list is a run of consecutive paragraphs
 * that carry numbering properties (or look like list items). While walking the body,
 * the extractor groups those paragraphs into list blocks with a two-state machine:
 *
 * ```
 *   noList ──listItem(k)──▶ building(k)
 *   building(k) ──listItem(k)──▶ building(k)              (append)
 *   building(k) ──listItem(j≠k)──▶ building(j)            (emit list k)
 *   building(k) ──table | empty | block──▶ noList          (emit list k, then the table/block)
 * ```
 *
 * Transitions are pure: they return the next state and the blocks it completes.
 * Open items are kept as a chain linked back to the previous item, so appending shares
 * the earlier items instead of copying them; the list is laid out once when emitted.
 *
 * @module ListAccumulator
 */

import { Block, HeadingBlock, ListBlock, ListItem, ListKind, ParagraphBlock, TableBlock } from '../types';

/**
 * One classified element of the document body.
 */
export type BodyEvent =
    | { kind: 'table'; block: TableBlock }
    | { kind: 'emptyParagraph' }
    | { kind: 'listItem'; listKind: ListKind; item: ListItem }
    | { kind: 'block'; block: HeadingBlock | ParagraphBlock };

/**
 * The items of an open list, newest first.
 */
export interface ListItemChain {
    item: ListItem;
    previous: ListItemChain | undefined;
}

export type ListState =
    | { kind: 'noList' }
    | { kind: 'building'; listKind: ListKind; last: ListItemChain };

export interface ListTransition {
    state: ListState;
    /** Completed blocks, in document order. */
    emitted: Block[];
}

export const initialListState: ListState = { kind: 'noList' };

/**
 * Emits the open list, if any.
 */
export const finishListState = (state: ListState): Block[] => {
    if (state.kind === 'noList') return [];
    const items: ListItem[] = [];
    for (let link: ListItemChain | undefined = state.last; link; link = link.previous) {
        items.push(link.item);
    }
    const list: ListBlock = { kind: state.listKind, items: items.reverse() };
    return [list];
};

/**
 * Applies one body event to the list state.
 */
export const advanceListState = (state: ListState, event: BodyEvent): ListTransition => {
    switch (event.kind) {
        case 'listItem':
            if (state.kind === 'building' && state.listKind === event.listKind) {
                return {
                    state: { kind: 'building', listKind: state.listKind, last: { item: event.item, previous: state.last } },
                    emitted: []
                };
            }
            return {
                state: { kind: 'building', listKind: event.listKind, last: { item: event.item, previous: undefined } },
                emitted: finishListState(state)
            };
        case 'emptyParagraph':
            return { state: initialListState, emitted: finishListState(state) };
        case 'table':
        case 'block':
            return { state: initialListState, emitted: [...finishListState(state), event.block] };
    }
};

/**
 * Runs a whole sequence of body events through the state machine.
 *
 * @returns All blocks, with any list still open at the end flushed last
 */
export const accumulateBlocks = (events: Iterable<BodyEvent>): Block[] => {
    const blocks: Block[] = [];
    let state: ListState = initialListState;
    for (const event of events) {
        const transition = advanceListState(state, event);
        blocks.push(...transition.emitted);
        state = transition.state;
    }
    blocks.push(...finishListState(state));
    return blocks;
};
