import { vi } from 'vitest';
import { AppConfig, loadConfig } from '../../src/config';
import { createProspect } from '../../src/core/prospect/factory';
import { Prospect, ProspectInit } from '../../src/types';
import { Logger } from '../../src/utils/logger';

export const PLACES_URL = 'https://places.test/api';
export const ARES_URL = 'https://ares.test/rest';
export const JUSTICE_URL = 'https://justice.test/ui';

export const TEXT_SEARCH_URL = `${PLACES_URL}/textsearch/json`;
export const DETAILS_URL = `${PLACES_URL}/details/json`;
export const ARES_SEARCH_URL = `${ARES_URL}/ekonomicke-subjekty/vyhledat`;
export const OWNERS_URL = `${JUSTICE_URL}/rejstrik-$firma`;

export const silentLogger = new Logger({ level: 'silent', pretty: false });

export function testConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
    return loadConfig({
        GOOGLE_MAPS_API_KEY: 'test-secret',
        PLACES_API_URL: PLACES_URL,
        ARES_API_URL: ARES_URL,
        JUSTICE_URL,
        LOG_LEVEL: 'silent',
        NODE_ENV: 'test',
        ...env,
    });
}

export function noSleep() {
    return vi.fn(async (_ms: number) => { });
}

export function prospect(init: Partial<ProspectInit> & { name: string }): Prospect {
    return createProspect({ source: 'search-engine', ...init });
}

export function placeRecord(name: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
    return { place_id: `pid-${name}`, name, formatted_address: `${name} street 1, Praha`, ...extra };
}

export function textSearchPage(names: string[], nextPageToken?: string) {
    return {
        data: {
            status: 'OK',
            results: names.map((name) => placeRecord(name)),
            ...(nextPageToken ? { next_page_token: nextPageToken } : {}),
        },
    };
}
