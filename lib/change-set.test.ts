import { describe, expect, it } from 'vitest';

import { computeChangeSet, isEmptyChangeSet } from './change-set';
import type { CardDisplayRow } from './card-schema';

const original: CardDisplayRow = {
    name: 'Jane Doe',
    designation: 'Engineer',
    company: 'Example Ltd',
    phone_numbers: '555-0100',
    email: 'jane@example.com',
    website: '',
    address: '1 Example Street',
    social_links: 'https://social.example/jane',
    additional_notes: '',
    created_at: '2024-03-01T10:00:00',
    edited_at: '',
};

describe('computeChangeSet', () => {
    it('returns an empty change set for an untouched row', () => {
        const changes = computeChangeSet(original, { ...original });
        expect(changes).toEqual({});
        expect(isEmptyChangeSet(changes)).toBe(true);
    });

    it('treats null, undefined and NaN as an empty cell', () => {
        const changes = computeChangeSet(original, {
            ...original,
            website: null,
            additional_notes: Number.NaN,
            edited_at: undefined,
        });
        expect(changes).toEqual({});
    });

    it('compares values as text', () => {
        const row: CardDisplayRow = { ...original, company: '42' };
        expect(computeChangeSet(row, { ...row, company: 42 })).toEqual({});
    });

    it('reports a single changed text column as a string', () => {
        const changes = computeChangeSet(original, { ...original, designation: 'Lead Engineer' });
        expect(changes).toEqual({ designation: 'Lead Engineer' });
    });

    it('reports a changed list column as a trimmed sequence', () => {
        const changes = computeChangeSet(original, { ...original, phone_numbers: '555-1234, 555-0100 ,' });
        expect(changes).toEqual({ phone_numbers: ['555-1234', '555-0100'] });
    });

    it('sends an emptied list column as an empty sequence', () => {
        const changes = computeChangeSet(original, { ...original, social_links: '' });
        expect(changes).toEqual({ social_links: [] });
    });
});
