import { z } from 'zod';

/**
 * Every column a Card Record can carry, in the order tables and exports use.
 */
export const CARD_COLUMNS = [
    '_id',
    'name',
    'designation',
    'company',
    'phone_numbers',
    'email',
    'website',
    'address',
    'social_links',
    'additional_notes',
    'created_at',
    'edited_at',
] as const;

export type CardColumn = (typeof CARD_COLUMNS)[number];
export type DisplayColumn = Exclude<CardColumn, '_id'>;

export const LIST_COLUMNS = ['phone_numbers', 'social_links'] as const;

export type ListColumn = (typeof LIST_COLUMNS)[number];
export type TextColumn = Exclude<DisplayColumn, ListColumn>;

export const DISPLAY_COLUMNS: readonly DisplayColumn[] = CARD_COLUMNS.filter(
    (column): column is DisplayColumn => column !== '_id',
);

export const COLUMN_LABELS: Record<DisplayColumn, string> = {
    name: 'Name',
    designation: 'Designation',
    company: 'Company',
    phone_numbers: 'Phone Numbers',
    email: 'Email',
    website: 'Website',
    address: 'Address',
    social_links: 'Social Links',
    additional_notes: 'Notes',
    created_at: 'Created',
    edited_at: 'Edited',
};

export function isListColumn(column: string): column is ListColumn {
    return (LIST_COLUMNS as readonly string[]).includes(column);
}

/**
 * Renders any cell value as display text. Missing and NaN values become ''.
 */
export function toText(value: unknown): string {
    if (value === null || value === undefined) return '';
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return Number.isNaN(value) ? '' : String(value);
    if (typeof value === 'boolean' || typeof value === 'bigint') return String(value);
    if (Array.isArray(value)) return listToCsv(value);
    return JSON.stringify(value);
}

export function listToCsv(value: unknown): string {
    if (Array.isArray(value)) {
        return value.map((item) => toText(item)).join(', ');
    }
    return toText(value);
}

/**
 * Splits comma separated text into trimmed, non-empty entries.
 */
export function csvToList(value: unknown): string[] {
    return toText(value)
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
}

const textField = z.preprocess((value) => toText(value), z.string());

const listField = z.preprocess((value) => {
    if (value === null || value === undefined) return [];
    if (Array.isArray(value)) return value.map((item) => toText(item));
    return csvToList(value);
}, z.array(z.string()));

const identifierField = z.union([
    z.string().min(1),
    z.number().transform((id) => String(id)),
    z.object({ $oid: z.string().min(1) }).transform((id) => id.$oid),
]);

export const CardRecordSchema = z.object({
    _id: identifierField,
    name: textField,
    designation: textField,
    company: textField,
    phone_numbers: listField,
    email: textField,
    website: textField,
    address: textField,
    social_links: listField,
    additional_notes: textField,
    created_at: textField,
    edited_at: textField,
});

export type CardRecord = z.infer<typeof CardRecordSchema>;
export type CardDisplayRow = Record<DisplayColumn, string>;

/**
 * Brings a backend record to the fixed column set: absent text fields become
 * '', absent lists become [], unknown keys are dropped.
 */
export function coerceCardRecord(raw: unknown): CardRecord {
    return CardRecordSchema.parse(raw);
}

export function toDisplayRow(record: CardRecord): CardDisplayRow {
    return {
        name: record.name,
        designation: record.designation,
        company: record.company,
        phone_numbers: listToCsv(record.phone_numbers),
        email: record.email,
        website: record.website,
        address: record.address,
        social_links: listToCsv(record.social_links),
        additional_notes: record.additional_notes,
        created_at: record.created_at,
        edited_at: record.edited_at,
    };
}
