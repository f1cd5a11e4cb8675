import type { CardChangeSet } from './card-api';
import { computeChangeSet, isEmptyChangeSet } from './change-set';
import { toDisplayRow, type CardDisplayRow, type CardRecord, type DisplayColumn } from './card-schema';

export type CardGridPhase = 'idle' | 'fetched' | 'editing' | 'saving' | 'reloaded';

export type CardGridEvent =
    | { type: 'fetch' }
    | { type: 'edit' }
    | { type: 'discard' }
    | { type: 'save' }
    | { type: 'saved'; succeeded: number };

/**
 * idle → fetched → editing → saving → reloaded | idle. Events that do not
 * apply to the current phase leave it unchanged.
 */
export function nextGridPhase(phase: CardGridPhase, event: CardGridEvent): CardGridPhase {
    switch (event.type) {
        case 'fetch':
            return phase === 'saving' ? phase : 'fetched';
        case 'edit':
            return phase === 'saving' || phase === 'reloaded' ? phase : 'editing';
        case 'discard':
            return phase === 'editing' ? 'fetched' : phase;
        case 'save':
            return phase === 'saving' || phase === 'reloaded' ? phase : 'saving';
        case 'saved':
            if (phase !== 'saving') return phase;
            return event.succeeded > 0 ? 'reloaded' : 'idle';
    }
}

export interface CardGridRow {
    id: string;
    original: CardDisplayRow;
    edited: CardDisplayRow;
}

export interface PendingCardUpdate {
    id: string;
    changes: CardChangeSet;
}

/**
 * Backing store of the editable grid for one fetch. Identifiers are kept
 * beside the rows and never enter the editable cells. Edits return a new
 * model; the originals are shared and never change.
 */
export class CardGridModel {
    readonly records: readonly CardRecord[];
    private readonly rows: readonly CardGridRow[];

    private constructor(records: readonly CardRecord[], rows: readonly CardGridRow[]) {
        this.records = records;
        this.rows = rows;
    }

    static fromRecords(records: readonly CardRecord[]): CardGridModel {
        const rows = records.map((record) => {
            const display = toDisplayRow(record);
            return { id: record._id, original: display, edited: display };
        });
        return new CardGridModel(records, rows);
    }

    get size(): number {
        return this.rows.length;
    }

    get isEmpty(): boolean {
        return this.rows.length === 0;
    }

    getRows(): readonly CardGridRow[] {
        return this.rows;
    }

    getEditedRows(): CardDisplayRow[] {
        return this.rows.map((row) => row.edited);
    }

    withCell(rowIndex: number, column: DisplayColumn, value: string): CardGridModel {
        const target = this.rows[rowIndex];
        if (!target || target.edited[column] === value) return this;

        const rows = this.rows.map((row, index) =>
            index === rowIndex ? { ...row, edited: { ...row.edited, [column]: value } } : row,
        );
        return new CardGridModel(this.records, rows);
    }

    reset(): CardGridModel {
        return new CardGridModel(
            this.records,
            this.rows.map((row) => ({ ...row, edited: row.original })),
        );
    }

    isRowDirty(rowIndex: number): boolean {
        const row = this.rows[rowIndex];
        return row !== undefined && !isEmptyChangeSet(computeChangeSet(row.original, row.edited));
    }

    /**
     * One entry per row whose change set is not empty, in grid order.
     */
    pendingUpdates(): PendingCardUpdate[] {
        const updates: PendingCardUpdate[] = [];
        for (const row of this.rows) {
            const changes = computeChangeSet(row.original, row.edited);
            if (!isEmptyChangeSet(changes)) {
                updates.push({ id: row.id, changes });
            }
        }
        return updates;
    }
}
