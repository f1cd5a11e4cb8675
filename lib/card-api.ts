import { z } from 'zod';

import type { AppConfig } from '~/config/app.config';

import {
    coerceCardRecord,
    type CardRecord,
    type ListColumn,
    type TextColumn,
} from './card-schema';

/**
 * Body accepted by the create and update endpoints. List fields travel as
 * string arrays; the identifier is never part of it.
 */
export type CardPayload = Partial<Record<TextColumn, string> & Record<ListColumn, string[]>>;

export type CardChangeSet = CardPayload;

export type CardApiErrorKind = 'network' | 'timeout' | 'http' | 'payload';

export const NO_DATA_MESSAGE = 'Backend returned success but no data payload.';

export class CardApiError extends Error {
    readonly kind: CardApiErrorKind;
    readonly status?: number;
    readonly body?: string;

    constructor(
        kind: CardApiErrorKind,
        message: string,
        options: { status?: number; body?: string; cause?: unknown } = {},
    ) {
        super(message, { cause: options.cause });
        this.name = 'CardApiError';
        this.kind = kind;
        this.status = options.status;
        this.body = options.body;
    }
}

/**
 * User-facing text for anything thrown by the client.
 */
export function describeApiError(error: unknown): string {
    if (error instanceof CardApiError) {
        switch (error.kind) {
            case 'network':
            case 'timeout':
                return `Failed to reach backend: ${error.message}`;
            case 'http':
            case 'payload':
                return error.message;
        }
    }
    return error instanceof Error ? error.message : String(error);
}

type TimeoutKey = keyof AppConfig['timeouts'];

const SingleEnvelopeSchema = z.object({ data: z.record(z.unknown()) });
const ListEnvelopeSchema = z.object({ data: z.array(z.unknown()) });

function isTimeoutError(error: unknown): boolean {
    return (
        typeof error === 'object' &&
        error !== null &&
        'name' in error &&
        (error.name === 'TimeoutError' || error.name === 'AbortError')
    );
}

function isSuccess(response: Response) {
    return response.status === 200 || response.status === 201;
}

export class CardApiClient {
    private config: Pick<AppConfig, 'backendUrl' | 'timeouts'>;

    constructor(config: Pick<AppConfig, 'backendUrl' | 'timeouts'>) {
        this.config = config;
    }

    private async request(endpoint: string, init: RequestInit, timeout: TimeoutKey): Promise<Response> {
        const url = `${this.config.backendUrl}${endpoint}`;
        const timeoutMs = this.config.timeouts[timeout];

        let response: Response;
        try {
            response = await fetch(url, {
                ...init,
                signal: AbortSignal.timeout(timeoutMs),
            });
        } catch (error) {
            if (isTimeoutError(error)) {
                throw new CardApiError('timeout', `request to ${endpoint} timed out after ${timeoutMs / 1000}s`, {
                    cause: error,
                });
            }
            const reason = error instanceof Error ? error.message : String(error);
            throw new CardApiError('network', `${url}: ${reason}`, { cause: error });
        }

        if (!isSuccess(response)) {
            // An unreadable error body still leaves the status to report
            const body = await response.text().catch(() => '');
            const statusLine = `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`;
            throw new CardApiError('http', body || statusLine, { status: response.status, body });
        }

        return response;
    }

    private async readJson<T>(response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
        let json: unknown;
        try {
            json = await response.json();
        } catch (error) {
            throw new CardApiError('payload', 'Backend returned a response that is not JSON.', { cause: error });
        }

        const parsed = schema.safeParse(json);
        if (!parsed.success) {
            throw new CardApiError('payload', NO_DATA_MESSAGE, { cause: parsed.error });
        }
        return parsed.data;
    }

    private toRecord(raw: unknown): CardRecord {
        try {
            return coerceCardRecord(raw);
        } catch (error) {
            throw new CardApiError('payload', 'Backend returned a card without a usable identifier.', {
                cause: error,
            });
        }
    }

    // ==================== Cards ====================
    async uploadCard(file: File): Promise<CardRecord> {
        const formData = new FormData();
        formData.append('file', file, file.name);

        // No Content-Type header: the multipart boundary is set by fetch
        const response = await this.request('/upload_card', { method: 'POST', body: formData }, 'upload');
        const { data } = await this.readJson(response, SingleEnvelopeSchema);
        return this.toRecord(data);
    }

    async createCard(payload: CardPayload): Promise<CardRecord> {
        const response = await this.request(
            '/create_card',
            {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(payload),
            },
            'create',
        );
        const { data } = await this.readJson(response, SingleEnvelopeSchema);
        return this.toRecord(data);
    }

    async listCards(): Promise<CardRecord[]> {
        const response = await this.request('/all_cards', { method: 'GET' }, 'list');
        const { data } = await this.readJson(response, ListEnvelopeSchema);
        return data.map((raw) => this.toRecord(raw));
    }

    async updateCard(id: string, changes: CardChangeSet): Promise<void> {
        await this.request(
            `/update_card/${encodeURIComponent(id)}`,
            {
                method: 'PATCH',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(changes),
            },
            'update',
        );
    }
}
