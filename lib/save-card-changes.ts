import type { CardChangeSet } from './card-api';
import type { PendingCardUpdate } from './card-grid-model';

export interface CardUpdateFailure {
    id: string;
    message: string;
}

export interface SaveCardChangesResult {
    attempted: number;
    succeeded: number;
    failures: CardUpdateFailure[];
}

export type UpdateCardFn = (id: string, changes: CardChangeSet) => Promise<void>;

/**
 * Sends every pending update and reports how each one went. A failed row
 * never stops the others. At most `concurrency` requests are in flight;
 * the default of 1 sends them one after another in grid order.
 */
export async function saveCardChanges(
    updates: readonly PendingCardUpdate[],
    updateCard: UpdateCardFn,
    options: { concurrency?: number; describeError?: (error: unknown) => string } = {},
): Promise<SaveCardChangesResult> {
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    const describeError =
        options.describeError ?? ((error: unknown) => (error instanceof Error ? error.message : String(error)));

    const outcomes: Array<CardUpdateFailure | null> = new Array(updates.length).fill(null);
    let next = 0;

    const worker = async () => {
        while (next < updates.length) {
            const index = next++;
            const update = updates[index];
            if (!update) continue;

            try {
                await updateCard(update.id, update.changes);
            } catch (error) {
                outcomes[index] = { id: update.id, message: describeError(error) };
            }
        }
    };

    const workers = Array.from({ length: Math.min(concurrency, updates.length) }, () => worker());
    await Promise.all(workers);

    const failures = outcomes.filter((outcome): outcome is CardUpdateFailure => outcome !== null);

    return {
        attempted: updates.length,
        succeeded: updates.length - failures.length,
        failures,
    };
}

export type SaveNoticeTone = 'success' | 'info' | 'warning';

export interface SaveNotice {
    tone: SaveNoticeTone;
    message: string;
    reload: boolean;
}

export function summarizeSave(result: SaveCardChangesResult): SaveNotice {
    const failed = result.failures.length;

    if (result.succeeded > 0) {
        const failedNote = failed > 0 ? ` ${failed} update(s) failed.` : '';
        return {
            tone: 'success',
            message: `Updated ${result.succeeded} card(s).${failedNote} Refreshing...`,
            reload: true,
        };
    }

    if (failed === 0) {
        return { tone: 'info', message: 'No changes detected.', reload: false };
    }

    return { tone: 'warning', message: `Save completed with ${failed} failures.`, reload: false };
}
