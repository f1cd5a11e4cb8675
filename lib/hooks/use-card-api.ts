import { useMemo } from 'react';

import appConfig from '~/config/app.config';

import { CardApiClient } from '../card-api';

export function useCardApi() {
    const api = useMemo(() => {
        return new CardApiClient(appConfig);
    }, []);

    return api;
}
