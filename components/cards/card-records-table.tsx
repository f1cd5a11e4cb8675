'use client';

import { useMemo } from 'react';
import {
    flexRender,
    getCoreRowModel,
    useReactTable,
    type ColumnDef,
} from '@tanstack/react-table';

import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from '~/components/ui/table';
import { COLUMN_LABELS, DISPLAY_COLUMNS, type CardDisplayRow } from '~/lib/card-schema';

interface CardRecordsTableProps {
    rows: CardDisplayRow[];
}

/**
 * Read-only rendering of display rows. The identifier is not part of a
 * display row, so it can never show up here.
 */
export function CardRecordsTable({ rows }: CardRecordsTableProps) {
    const columns = useMemo<ColumnDef<CardDisplayRow>[]>(
        () =>
            DISPLAY_COLUMNS.map((column) => ({
                accessorKey: column,
                header: COLUMN_LABELS[column],
                cell: ({ row }) => (
                    <span className="whitespace-pre-wrap break-words">{row.original[column]}</span>
                ),
            })),
        [],
    );

    const table = useReactTable({
        data: rows,
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
                                <TableHead key={header.id} className="min-w-[140px]">
                                    {flexRender(header.column.columnDef.header, header.getContext())}
                                </TableHead>
                            ))}
                        </TableRow>
                    ))}
                </TableHeader>
                <TableBody>
                    {table.getRowModel().rows.map((row) => (
                        <TableRow key={row.id}>
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
