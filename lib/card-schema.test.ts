import { describe, expect, it } from 'vitest';

import {
    CARD_COLUMNS,
    DISPLAY_COLUMNS,
    coerceCardRecord,
    csvToList,
    listToCsv,
    toDisplayRow,
    toText,
} from './card-schema';

describe('csvToList', () => {
    it('trims entries and drops empty ones', () => {
        expect(csvToList(' 555-0100 , ,555-0101,  ')).toEqual(['555-0100', '555-0101']);
    });

    it('returns an empty list for missing values', () => {
        expect(csvToList(null)).toEqual([]);
        expect(csvToList(undefined)).toEqual([]);
        expect(csvToList('')).toEqual([]);
    });

    it('is stable across a join and split cycle', () => {
        const first = csvToList(listToCsv(['  a ', '', 'b', ' ']));
        expect(first).toEqual(['a', 'b']);
        expect(csvToList(listToCsv(first))).toEqual(first);
    });
});

describe('listToCsv', () => {
    it('joins sequences with a comma and a space', () => {
        expect(listToCsv(['555-0100', '555-0101'])).toBe('555-0100, 555-0101');
    });

    it('passes strings through and maps null to an empty string', () => {
        expect(listToCsv('already, joined')).toBe('already, joined');
        expect(listToCsv(null)).toBe('');
    });
});

describe('toText', () => {
    it('maps NaN, null and undefined to an empty string', () => {
        expect(toText(Number.NaN)).toBe('');
        expect(toText(null)).toBe('');
        expect(toText(undefined)).toBe('');
    });

    it('stringifies scalars', () => {
        expect(toText(42)).toBe('42');
        expect(toText(false)).toBe('false');
    });
});

describe('coerceCardRecord', () => {
    it('fills every absent column with a typed default', () => {
        const record = coerceCardRecord({ _id: 'abc123', name: 'Jane Doe' });

        expect(record).toEqual({
            _id: 'abc123',
            name: 'Jane Doe',
            designation: '',
            company: '',
            phone_numbers: [],
            email: '',
            website: '',
            address: '',
            social_links: [],
            additional_notes: '',
            created_at: '',
            edited_at: '',
        });
    });

    it('drops unknown keys and normalises nulls', () => {
        const record = coerceCardRecord({
            _id: { $oid: '65f0c0ffee' },
            name: null,
            phone_numbers: null,
            social_links: 'https://a.example, https://b.example',
            extra_field: 'ignored',
        });

        expect(record._id).toBe('65f0c0ffee');
        expect(record.name).toBe('');
        expect(record.phone_numbers).toEqual([]);
        expect(record.social_links).toEqual(['https://a.example', 'https://b.example']);
        expect(Object.keys(record)).toEqual([...CARD_COLUMNS]);
    });

    it('accepts numeric identifiers as strings', () => {
        expect(coerceCardRecord({ _id: 7 })._id).toBe('7');
    });

    it('rejects records without an identifier', () => {
        expect(() => coerceCardRecord({ name: 'No id' })).toThrow();
    });
});

describe('toDisplayRow', () => {
    it('leaves out the identifier and joins list columns', () => {
        const row = toDisplayRow(
            coerceCardRecord({
                _id: 'abc123',
                name: 'Jane Doe',
                phone_numbers: ['555-0100', '555-0101'],
                social_links: ['https://social.example/jane'],
            }),
        );

        expect(Object.keys(row)).toEqual([...DISPLAY_COLUMNS]);
        expect(row).not.toHaveProperty('_id');
        expect(row.phone_numbers).toBe('555-0100, 555-0101');
        expect(row.social_links).toBe('https://social.example/jane');
        expect(row.company).toBe('');
    });
});
