'use client';

import { useCallback, useEffect, useReducer, useState } from 'react';
import { useMutation, useQuery, useQueryClient } from '@tanstack/react-query';
import { AlertCircle, AlertTriangle, CheckCircle, Info, Loader2, RotateCcw, Save } from 'lucide-react';
import { toast } from 'sonner';

import appConfig from '~/config/app.config';
import { SpreadsheetDownloadButton } from '~/components/cards/spreadsheet-download-button';
import { Alert, AlertDescription, AlertTitle } from '~/components/ui/alert';
import { Badge } from '~/components/ui/badge';
import { Button } from '~/components/ui/button';
import { describeApiError } from '~/lib/card-api';
import { CardGridModel, nextGridPhase, type PendingCardUpdate } from '~/lib/card-grid-model';
import type { DisplayColumn } from '~/lib/card-schema';
import { useCardApi } from '~/lib/hooks/use-card-api';
import {
    saveCardChanges,
    summarizeSave,
    type CardUpdateFailure,
    type SaveNotice,
} from '~/lib/save-card-changes';
import { EXPORT_FILENAMES, buildExportRows } from '~/lib/spreadsheet';

import { EditableCardGrid } from './editable-card-grid';

export const CARDS_QUERY_KEY = ['cards'] as const;

const NOTICE_VARIANTS = {
    success: 'success',
    info: 'default',
    warning: 'warning',
} as const;

const NOTICE_ICONS = {
    success: CheckCircle,
    info: Info,
    warning: AlertTriangle,
} as const;

export function CardsEditor() {
    const api = useCardApi();
    const queryClient = useQueryClient();

    const [phase, dispatch] = useReducer(nextGridPhase, 'idle');
    const [model, setModel] = useState<CardGridModel | null>(null);
    const [notice, setNotice] = useState<SaveNotice | null>(null);
    const [failures, setFailures] = useState<CardUpdateFailure[]>([]);

    const { data, error, isError, isLoading, dataUpdatedAt } = useQuery({
        queryKey: CARDS_QUERY_KEY,
        queryFn: () => api.listCards(),
    });

    // Every completed fetch replaces the grid, edits included
    useEffect(() => {
        if (!data) return;
        setModel(CardGridModel.fromRecords(data));
        dispatch({ type: 'fetch' });
    }, [data, dataUpdatedAt]);

    useEffect(() => {
        if (error) console.error('Failed to fetch cards:', error);
    }, [error]);

    const saveMutation = useMutation({
        mutationFn: (updates: PendingCardUpdate[]) =>
            saveCardChanges(updates, (id, changes) => api.updateCard(id, changes), {
                concurrency: appConfig.saveConcurrency,
                describeError: describeApiError,
            }),
        onMutate: () => {
            setNotice(null);
            setFailures([]);
            dispatch({ type: 'save' });
        },
        onSuccess: (result) => {
            for (const failure of result.failures) {
                console.error(`Failed to update ${failure.id}:`, failure.message);
            }
            console.info(
                `Card save finished: ${result.succeeded} updated, ${result.failures.length} failed, ${result.attempted} attempted`,
            );

            const summary = summarizeSave(result);
            setNotice(summary);
            setFailures(result.failures);
            dispatch({ type: 'saved', succeeded: result.succeeded });

            if (summary.tone === 'success') toast.success(summary.message);
            else if (summary.tone === 'warning') toast.warning(summary.message);
            else toast.info(summary.message);

            if (summary.reload) {
                return queryClient.invalidateQueries({ queryKey: CARDS_QUERY_KEY });
            }
        },
        onError: (saveError) => {
            console.error('Saving card changes failed:', saveError);
            toast.error(`Save failed: ${describeApiError(saveError)}`);
            dispatch({ type: 'saved', succeeded: 0 });
        },
    });

    const handleCellChange = useCallback((rowIndex: number, column: DisplayColumn, value: string) => {
        setModel((current) => current?.withCell(rowIndex, column, value) ?? current);
        dispatch({ type: 'edit' });
    }, []);

    const handleDiscard = () => {
        setModel((current) => current?.reset() ?? current);
        dispatch({ type: 'discard' });
    };

    const handleSave = () => {
        if (!model) return;
        saveMutation.mutate(model.pendingUpdates());
    };

    // A failed fetch counts as an empty result
    const grid = isError ? null : model;
    const pendingCount = grid?.pendingUpdates().length ?? 0;
    const isSaving = phase === 'saving' || saveMutation.isPending;

    if (isLoading || (data && !model && !isError)) {
        return (
            <div className="flex items-center gap-2 text-muted-foreground py-12 justify-center">
                <Loader2 className="h-5 w-5 animate-spin" />
                Fetching all business cards...
            </div>
        );
    }

    const NoticeIcon = notice ? NOTICE_ICONS[notice.tone] : null;

    return (
        <div className="space-y-4">
            {isError && (
                <Alert variant="destructive">
                    <AlertCircle className="h-4 w-4" />
                    <AlertTitle>Failed to fetch cards</AlertTitle>
                    <AlertDescription>{describeApiError(error)}</AlertDescription>
                </Alert>
            )}

            {notice && NoticeIcon && (
                <Alert variant={NOTICE_VARIANTS[notice.tone]}>
                    <NoticeIcon className="h-4 w-4" />
                    <AlertDescription>{notice.message}</AlertDescription>
                </Alert>
            )}

            {failures.map((failure, index) => (
                <Alert key={`${failure.id}-${index}`} variant="destructive">
                    <AlertCircle className="h-4 w-4" />
                    <AlertDescription>
                        Failed to update {failure.id}: {failure.message}
                    </AlertDescription>
                </Alert>
            ))}

            {!grid || grid.isEmpty ? (
                <Alert variant="warning">
                    <AlertTriangle className="h-4 w-4" />
                    <AlertDescription>No cards found.</AlertDescription>
                </Alert>
            ) : (
                <>
                    <div className="flex flex-col sm:flex-row sm:items-center justify-between gap-4">
                        <p className="text-sm text-muted-foreground">
                            Edit any field below, then click <span className="font-semibold">Save Changes</span> to
                            update the backend.
                        </p>
                        <SpreadsheetDownloadButton
                            rows={buildExportRows(grid.records)}
                            filename={EXPORT_FILENAMES.all}
                            label="Download All as Excel"
                        />
                    </div>

                    <div className="flex items-center gap-2">
                        <Button onClick={handleSave} disabled={isSaving}>
                            {isSaving ? (
                                <Loader2 className="mr-2 h-4 w-4 animate-spin" />
                            ) : (
                                <Save className="mr-2 h-4 w-4" />
                            )}
                            Save Changes
                        </Button>
                        <Button variant="ghost" onClick={handleDiscard} disabled={isSaving || pendingCount === 0}>
                            <RotateCcw className="mr-2 h-4 w-4" />
                            Discard edits
                        </Button>
                        {pendingCount > 0 && <Badge variant="secondary">{pendingCount} row(s) edited</Badge>}
                    </div>

                    <EditableCardGrid model={grid} disabled={isSaving} onCellChange={handleCellChange} />
                </>
            )}
        </div>
    );
}
