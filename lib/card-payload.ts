import type { CardPayload } from './card-api';
import { csvToList, isListColumn, type DisplayColumn } from './card-schema';

export type ManualCardValues = Partial<Record<Exclude<DisplayColumn, 'created_at' | 'edited_at'>, string>>;

/**
 * Builds the create body from form text. Empty fields are left out entirely
 * and comma separated list fields are split into trimmed entries.
 */
export function buildCardPayload(values: ManualCardValues): CardPayload {
    const payload: CardPayload = {};

    for (const [key, value] of Object.entries(values)) {
        if (!value) continue;

        if (isListColumn(key)) {
            const entries = csvToList(value);
            if (entries.length > 0) payload[key] = entries;
        } else if (isManualTextColumn(key)) {
            payload[key] = value;
        }
    }

    return payload;
}

const MANUAL_TEXT_COLUMNS = [
    'name',
    'designation',
    'company',
    'email',
    'website',
    'address',
    'additional_notes',
] as const;

function isManualTextColumn(key: string): key is (typeof MANUAL_TEXT_COLUMNS)[number] {
    return (MANUAL_TEXT_COLUMNS as readonly string[]).includes(key);
}
