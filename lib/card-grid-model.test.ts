import { describe, expect, it } from 'vitest';

import { CardGridModel, nextGridPhase } from './card-grid-model';
import { coerceCardRecord } from './card-schema';

const records = [
    coerceCardRecord({ _id: 'card-a', name: 'Alice', phone_numbers: ['555-0001'] }),
    coerceCardRecord({ _id: 'card-b', name: 'Bob', phone_numbers: ['555-0002'] }),
];

describe('CardGridModel', () => {
    it('seeds edited rows from the display rows', () => {
        const model = CardGridModel.fromRecords(records);

        expect(model.size).toBe(2);
        expect(model.getEditedRows()[1]?.phone_numbers).toBe('555-0002');
        expect(model.pendingUpdates()).toEqual([]);
    });

    it('only reports rows whose values changed', () => {
        const model = CardGridModel.fromRecords(records).withCell(1, 'phone_numbers', '555-1234, 555-0002');

        expect(model.pendingUpdates()).toEqual([
            { id: 'card-b', changes: { phone_numbers: ['555-1234', '555-0002'] } },
        ]);
        expect(model.isRowDirty(0)).toBe(false);
        expect(model.isRowDirty(1)).toBe(true);
    });

    it('leaves the previous model untouched when a cell is edited', () => {
        const before = CardGridModel.fromRecords(records);
        const after = before.withCell(0, 'name', 'Alicia');

        expect(before.getEditedRows()[0]?.name).toBe('Alice');
        expect(after.getEditedRows()[0]?.name).toBe('Alicia');
    });

    it('ignores edits outside the grid', () => {
        const model = CardGridModel.fromRecords(records);
        expect(model.withCell(5, 'name', 'Nobody')).toBe(model);
    });

    it('drops every edit on reset', () => {
        const model = CardGridModel.fromRecords(records).withCell(0, 'company', 'Example Ltd').reset();
        expect(model.pendingUpdates()).toEqual([]);
    });

    it('is empty when no records were fetched', () => {
        expect(CardGridModel.fromRecords([]).isEmpty).toBe(true);
    });
});

describe('nextGridPhase', () => {
    it('walks the happy path to a reload', () => {
        let phase = nextGridPhase('idle', { type: 'fetch' });
        expect(phase).toBe('fetched');
        phase = nextGridPhase(phase, { type: 'edit' });
        expect(phase).toBe('editing');
        phase = nextGridPhase(phase, { type: 'save' });
        expect(phase).toBe('saving');
        phase = nextGridPhase(phase, { type: 'saved', succeeded: 2 });
        expect(phase).toBe('reloaded');
        expect(nextGridPhase(phase, { type: 'fetch' })).toBe('fetched');
    });

    it('returns to idle when nothing was saved', () => {
        expect(nextGridPhase('saving', { type: 'saved', succeeded: 0 })).toBe('idle');
    });

    it('ignores edits and fetches while saving', () => {
        expect(nextGridPhase('saving', { type: 'edit' })).toBe('saving');
        expect(nextGridPhase('saving', { type: 'fetch' })).toBe('saving');
    });

    it('goes back to fetched when edits are discarded', () => {
        expect(nextGridPhase('editing', { type: 'discard' })).toBe('fetched');
    });
});
