'use client';

import { useMemo } from 'react';
import { CheckCircle } from 'lucide-react';

import { CardRecordsTable } from '~/components/cards/card-records-table';
import { SpreadsheetDownloadButton } from '~/components/cards/spreadsheet-download-button';
import { Alert, AlertDescription, AlertTitle } from '~/components/ui/alert';
import type { CardRecord } from '~/lib/card-schema';
import { buildExportRows, type ExportFilename } from '~/lib/spreadsheet';

export function CreatedCardResult({ card, filename }: { card: CardRecord; filename: ExportFilename }) {
    const rows = useMemo(() => buildExportRows([card]), [card]);

    return (
        <div className="space-y-4">
            <Alert variant="success">
                <CheckCircle className="h-4 w-4" />
                <AlertTitle>Inserted Successfully!</AlertTitle>
                <AlertDescription>The card was stored by the backend.</AlertDescription>
            </Alert>

            <CardRecordsTable rows={rows} />

            <SpreadsheetDownloadButton rows={rows} filename={filename} />
        </div>
    );
}
