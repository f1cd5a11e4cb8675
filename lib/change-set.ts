import type { CardChangeSet } from './card-api';
import {
    DISPLAY_COLUMNS,
    csvToList,
    isListColumn,
    toText,
    type CardDisplayRow,
    type DisplayColumn,
} from './card-schema';

/**
 * Compares an edited grid row with the row it was seeded from.
 *
 * Values are compared as text after mapping null, undefined and NaN to '',
 * so a cell that only changed type (5 vs "5") is not reported. Changed list
 * columns are returned as string arrays, every other column as the edited
 * text.
 */
export function computeChangeSet(
    original: CardDisplayRow,
    edited: Partial<Record<DisplayColumn, unknown>>,
): CardChangeSet {
    const changes: CardChangeSet = {};

    for (const column of DISPLAY_COLUMNS) {
        const before = toText(original[column]);
        const after = toText(edited[column]);
        if (before === after) continue;

        if (isListColumn(column)) {
            changes[column] = csvToList(after);
        } else {
            changes[column] = after;
        }
    }

    return changes;
}

export function isEmptyChangeSet(changes: CardChangeSet): boolean {
    return Object.keys(changes).length === 0;
}
