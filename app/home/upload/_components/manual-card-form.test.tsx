import { fireEvent, screen, waitFor } from '@testing-library/react';
import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';

import { jsonResponse, renderWithClient, textResponse } from '~/lib/testing/render-with-client';

import { ManualCardForm } from './manual-card-form';

type FetchFn = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

describe('ManualCardForm', () => {
    let fetchMock: Mock<FetchFn>;

    beforeEach(() => {
        fetchMock = vi.fn<FetchFn>();
        vi.stubGlobal('fetch', fetchMock);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    it('sends only filled fields with list fields split', async () => {
        fetchMock.mockResolvedValue(
            jsonResponse({ data: { _id: 'card-7', name: 'Jane Doe', phone_numbers: ['555-0100', '555-0101'] } }, 201),
        );

        renderWithClient(<ManualCardForm />);
        fireEvent.change(screen.getByLabelText('Full name'), { target: { value: 'Jane Doe' } });
        fireEvent.change(screen.getByLabelText('Phone numbers (comma separated)'), {
            target: { value: '555-0100 , 555-0101,' },
        });
        fireEvent.click(screen.getByRole('button', { name: /create card/i }));

        expect(await screen.findByText('Inserted Successfully!')).toBeTruthy();

        const [url, init] = fetchMock.mock.calls[0] ?? [];
        expect(String(url)).toMatch(/\/create_card$/);
        expect(JSON.parse(String(init?.body))).toEqual({
            name: 'Jane Doe',
            phone_numbers: ['555-0100', '555-0101'],
        });
        await waitFor(() => expect(screen.queryByDisplayValue('Jane Doe')).toBeNull());
        expect(screen.getByText('555-0100, 555-0101')).toBeTruthy();
    });

    it('shows the backend message when the card is rejected', async () => {
        fetchMock.mockResolvedValue(textResponse('email is malformed', 422));

        renderWithClient(<ManualCardForm />);
        fireEvent.change(screen.getByLabelText('Email'), { target: { value: 'not-an-email' } });
        fireEvent.click(screen.getByRole('button', { name: /create card/i }));

        expect(await screen.findByText('email is malformed')).toBeTruthy();
        expect(screen.queryByText('Inserted Successfully!')).toBeNull();
    });
});
