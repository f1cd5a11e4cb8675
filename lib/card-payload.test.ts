import { describe, expect, it } from 'vitest';

import { buildCardPayload } from './card-payload';

describe('buildCardPayload', () => {
    it('drops empty fields and splits list fields', () => {
        expect(
            buildCardPayload({
                name: 'Jane Doe',
                designation: '',
                company: 'Example Ltd',
                phone_numbers: ' 555-0100 ,555-0101, ',
                email: '',
                website: '',
                address: '',
                social_links: '',
                additional_notes: 'Met at the trade fair',
            }),
        ).toEqual({
            name: 'Jane Doe',
            company: 'Example Ltd',
            phone_numbers: ['555-0100', '555-0101'],
            additional_notes: 'Met at the trade fair',
        });
    });

    it('leaves out a list that only holds separators', () => {
        expect(buildCardPayload({ social_links: ' , ,' })).toEqual({});
    });

    it('returns an empty payload for an empty form', () => {
        expect(buildCardPayload({})).toEqual({});
    });
});
