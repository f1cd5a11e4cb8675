'use client';

import { FileSpreadsheet } from 'lucide-react';
import { toast } from 'sonner';

import { Button } from '~/components/ui/button';
import type { CardDisplayRow } from '~/lib/card-schema';
import { downloadBytes } from '~/lib/download';
import { SPREADSHEET_MIME_TYPE, toSpreadsheetBytes, type ExportFilename } from '~/lib/spreadsheet';

interface SpreadsheetDownloadButtonProps {
    /** Rows to export, already in display form */
    rows: CardDisplayRow[];
    filename: ExportFilename;
    label?: string;
    variant?: 'default' | 'outline' | 'secondary' | 'ghost';
    size?: 'default' | 'sm' | 'lg';
    className?: string;
}

/**
 * Builds the workbook in the browser and starts the download. Nothing is
 * requested from the backend.
 */
export function SpreadsheetDownloadButton({
    rows,
    filename,
    label = 'Download as Excel',
    variant = 'outline',
    size = 'default',
    className = '',
}: SpreadsheetDownloadButtonProps) {
    const handleDownload = () => {
        try {
            downloadBytes(toSpreadsheetBytes(rows), filename, SPREADSHEET_MIME_TYPE);
            toast.success(`${filename} downloaded`);
        } catch (error) {
            console.error('Spreadsheet export failed:', error);
            toast.error('Failed to generate spreadsheet', {
                description: error instanceof Error ? error.message : 'Please try again',
            });
        }
    };

    return (
        <Button
            variant={variant}
            size={size}
            className={`gap-2 ${className}`}
            disabled={rows.length === 0}
            onClick={handleDownload}
        >
            <FileSpreadsheet className="h-4 w-4 text-green-600" />
            {label}
        </Button>
    );
}
