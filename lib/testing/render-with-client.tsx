import type { ReactElement } from 'react';
import { QueryClientProvider } from '@tanstack/react-query';
import { render } from '@testing-library/react';

import { createQueryClient } from '~/providers';

export function renderWithClient(ui: ReactElement) {
    const queryClient = createQueryClient();
    return {
        queryClient,
        ...render(<QueryClientProvider client={queryClient}>{ui}</QueryClientProvider>),
    };
}

/**
 * Minimal Response stand-in for stubbed fetch calls.
 */
export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

export function textResponse(body: string, status: number): Response {
    return new Response(body, { status });
}
