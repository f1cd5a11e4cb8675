'use client';

import { useMemo } from 'react';
import {
    flexRender,
    getCoreRowModel,
    useReactTable,
    type ColumnDef,
} from '@tanstack/react-table';

import { Input } from '~/components/ui/input';
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from '~/components/ui/table';
import type { CardGridModel, CardGridRow } from '~/lib/card-grid-model';
import { COLUMN_LABELS, DISPLAY_COLUMNS, type DisplayColumn } from '~/lib/card-schema';
import { cn } from '~/lib/utils';

interface EditableCardGridProps {
    model: CardGridModel;
    disabled?: boolean;
    onCellChange: (rowIndex: number, column: DisplayColumn, value: string) => void;
}

export function EditableCardGrid({ model, disabled = false, onCellChange }: EditableCardGridProps) {
    const columns = useMemo<ColumnDef<CardGridRow>[]>(
        () =>
            DISPLAY_COLUMNS.map((column) => ({
                id: column,
                header: COLUMN_LABELS[column],
                cell: ({ row }) => {
                    const changed = row.original.edited[column] !== row.original.original[column];
                    return (
                        <Input
                            aria-label={`${COLUMN_LABELS[column]} for row ${row.index + 1}`}
                            value={row.original.edited[column]}
                            disabled={disabled}
                            onChange={(e) => onCellChange(row.index, column, e.target.value)}
                            className={cn('min-w-[160px]', changed && 'border-orange-400 bg-orange-50/50')}
                        />
                    );
                },
            })),
        [disabled, onCellChange],
    );

    // A fresh array each render makes the table reset its state in a loop
    const data = useMemo(() => [...model.getRows()], [model]);

    const table = useReactTable({
        data,
        columns,
        getCoreRowModel: getCoreRowModel(),
    });

    return (
        <div className="rounded-xl border bg-card shadow-sm overflow-hidden">
            <Table>
                <TableHeader>
                    {table.getHeaderGroups().map((headerGroup) => (
                        <TableRow key={headerGroup.id}>
                            {headerGroup.headers.map((header) => (
                                <TableHead key={header.id}>
                                    {flexRender(header.column.columnDef.header, header.getContext())}
                                </TableHead>
                            ))}
                        </TableRow>
                    ))}
                </TableHeader>
                <TableBody>
                    {table.getRowModel().rows.map((row) => (
                        <TableRow key={row.id} data-state={model.isRowDirty(row.index) ? 'selected' : undefined}>
                            {row.getVisibleCells().map((cell) => (
                                <TableCell key={cell.id}>
                                    {flexRender(cell.column.columnDef.cell, cell.getContext())}
                                </TableCell>
                            ))}
                        </TableRow>
                    ))}
                </TableBody>
            </Table>
        </div>
    );
}
