import { describe, expect, it, vi } from 'vitest';

import type { PendingCardUpdate } from './card-grid-model';
import { saveCardChanges, summarizeSave } from './save-card-changes';

const updates: PendingCardUpdate[] = [
    { id: 'card-1', changes: { name: 'One' } },
    { id: 'card-2', changes: { name: 'Two' } },
    { id: 'card-3', changes: { phone_numbers: ['555-0003'] } },
];

describe('saveCardChanges', () => {
    it('keeps going after a failed row and counts both outcomes', async () => {
        const updateCard = vi.fn(async (id: string) => {
            if (id === 'card-2') throw new Error('Internal Server Error');
        });

        const result = await saveCardChanges(updates, updateCard);

        expect(updateCard).toHaveBeenCalledTimes(3);
        expect(result).toEqual({
            attempted: 3,
            succeeded: 2,
            failures: [{ id: 'card-2', message: 'Internal Server Error' }],
        });
    });

    it('sends requests one at a time by default, in grid order', async () => {
        const order: string[] = [];
        let inFlight = 0;
        let maxInFlight = 0;

        await saveCardChanges(updates, async (id) => {
            inFlight += 1;
            maxInFlight = Math.max(maxInFlight, inFlight);
            order.push(id);
            await new Promise((resolve) => setTimeout(resolve, 1));
            inFlight -= 1;
        });

        expect(maxInFlight).toBe(1);
        expect(order).toEqual(['card-1', 'card-2', 'card-3']);
    });

    it('never exceeds the configured concurrency', async () => {
        let inFlight = 0;
        let maxInFlight = 0;
        const many = Array.from({ length: 6 }, (_, index) => ({ id: `card-${index}`, changes: { name: `N${index}` } }));

        const result = await saveCardChanges(
            many,
            async () => {
                inFlight += 1;
                maxInFlight = Math.max(maxInFlight, inFlight);
                await new Promise((resolve) => setTimeout(resolve, 1));
                inFlight -= 1;
            },
            { concurrency: 2 },
        );

        expect(maxInFlight).toBe(2);
        expect(result.succeeded).toBe(6);
    });

    it('uses the supplied error formatter', async () => {
        const result = await saveCardChanges(
            [{ id: 'card-9', changes: { email: 'x@example.com' } }],
            async () => {
                throw new Error('boom');
            },
            { describeError: () => 'backend unreachable' },
        );

        expect(result.failures).toEqual([{ id: 'card-9', message: 'backend unreachable' }]);
    });

    it('issues no request when nothing changed', async () => {
        const updateCard = vi.fn(async () => undefined);
        const result = await saveCardChanges([], updateCard);

        expect(updateCard).not.toHaveBeenCalled();
        expect(result).toEqual({ attempted: 0, succeeded: 0, failures: [] });
    });
});

describe('summarizeSave', () => {
    it('asks for a reload when at least one update succeeded', () => {
        expect(
            summarizeSave({ attempted: 3, succeeded: 2, failures: [{ id: 'card-2', message: 'HTTP 500' }] }),
        ).toEqual({
            tone: 'success',
            message: 'Updated 2 card(s). 1 update(s) failed. Refreshing...',
            reload: true,
        });
    });

    it('reports that nothing changed', () => {
        expect(summarizeSave({ attempted: 0, succeeded: 0, failures: [] })).toEqual({
            tone: 'info',
            message: 'No changes detected.',
            reload: false,
        });
    });

    it('warns when every update failed', () => {
        expect(
            summarizeSave({
                attempted: 2,
                succeeded: 0,
                failures: [
                    { id: 'card-1', message: 'HTTP 500' },
                    { id: 'card-2', message: 'HTTP 500' },
                ],
            }),
        ).toEqual({ tone: 'warning', message: 'Save completed with 2 failures.', reload: false });
    });
});
