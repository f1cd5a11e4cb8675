import * as XLSX from 'xlsx';

import { DISPLAY_COLUMNS, toDisplayRow, type CardDisplayRow, type CardRecord } from './card-schema';

export const SPREADSHEET_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export const EXPORT_FILENAMES = {
    upload: 'business_card.xlsx',
    manual: 'business_card_manual.xlsx',
    all: 'all_business_cards.xlsx',
} as const;

export type ExportFilename = (typeof EXPORT_FILENAMES)[keyof typeof EXPORT_FILENAMES];

const SHEET_NAME = 'Cards';

/**
 * Export rows never carry the identifier; list columns are comma joined.
 */
export function buildExportRows(records: readonly CardRecord[]): CardDisplayRow[] {
    return records.map((record) => toDisplayRow(record));
}

/**
 * Writes a single-sheet workbook: a header row of column names followed by
 * one row per record. Workbook properties are fixed so identical rows give
 * an identical workbook.
 */
export function toSpreadsheetBytes(rows: readonly CardDisplayRow[]): ArrayBuffer {
    const header = [...DISPLAY_COLUMNS];
    const body = rows.map((row) => header.map((column) => row[column]));

    const sheet = XLSX.utils.aoa_to_sheet([header, ...body]);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, SHEET_NAME);
    workbook.Props = { Title: 'Business cards' };

    const output: ArrayBuffer = XLSX.write(workbook, {
        bookType: 'xlsx',
        type: 'array',
        compression: true,
    });
    return output;
}
