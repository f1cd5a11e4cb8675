import { fireEvent, render, screen } from '@testing-library/react';
import { describe, expect, it, vi } from 'vitest';

import { CardGridModel } from '~/lib/card-grid-model';
import { coerceCardRecord } from '~/lib/card-schema';

import { EditableCardGrid } from './editable-card-grid';

const model = CardGridModel.fromRecords([
    coerceCardRecord({ _id: 'card-1', name: 'Alice', phone_numbers: ['555-0001', '555-0002'] }),
]);

describe('EditableCardGrid', () => {
    it('settles when re-rendered with the same model while saving', () => {
        const onCellChange = vi.fn();
        const { rerender } = render(<EditableCardGrid model={model} onCellChange={onCellChange} />);

        rerender(<EditableCardGrid model={model} disabled onCellChange={onCellChange} />);
        rerender(<EditableCardGrid model={model} onCellChange={onCellChange} />);

        const phones = screen.getByLabelText('Phone Numbers for row 1');
        expect(phones).toBe(screen.getByDisplayValue('555-0001, 555-0002'));
        expect(phones).toHaveProperty('disabled', false);
    });

    it('reports cell edits by row index and column', () => {
        const onCellChange = vi.fn();
        render(<EditableCardGrid model={model} onCellChange={onCellChange} />);

        fireEvent.change(screen.getByLabelText('Name for row 1'), { target: { value: 'Alicia' } });

        expect(onCellChange).toHaveBeenCalledWith(0, 'name', 'Alicia');
    });
});
