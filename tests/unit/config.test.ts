import { describe, expect, it } from 'vitest';
import { loadConfig } from '../../src/config';
import { ConfigurationError } from '../../src/utils/errors';

describe('loadConfig', () => {
    it('applies defaults to an empty environment', () => {
        const config = loadConfig({});

        expect(config.places).toEqual({
            timeoutMs: 30000,
            userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
            apiKey: undefined,
            baseUrl: 'https://maps.googleapis.com/maps/api/place',
            location: '50.0755,14.4378',
            radiusM: 20000,
            pageTokenDelayMs: 2000,
        });
        expect(config.registry.aresUrl).toBe('https://ares.gov.cz/ekonomicke-subjekty-v-be/rest');
        expect(config.registry.justiceUrl).toBe('https://or.justice.cz/ias/ui');
        expect(config.finder.enrichCooldownMs).toBe(1000);
        expect(config.output.directory).toBe('./output');
        expect(config.logging).toEqual({ service: 'prospect-finder', level: 'info', pretty: true });
    });

    it('coerces numbers and strips trailing slashes from URLs', () => {
        const config = loadConfig({
            GOOGLE_MAPS_API_KEY: ' test-secret ',
            ARES_API_URL: 'https://ares.test/rest/',
            SEARCH_RADIUS_M: '5000',
            NODE_ENV: 'production',
        });

        expect(config.places.apiKey).toBe('test-secret');
        expect(config.places.radiusM).toBe(5000);
        expect(config.registry.aresUrl).toBe('https://ares.test/rest');
        expect(config.logging.pretty).toBe(false);
    });

    it('returns a frozen value', () => {
        const config = loadConfig({});

        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.places)).toBe(true);
        expect(Object.isFrozen(config.registry)).toBe(true);
        expect(Object.isFrozen(config.finder)).toBe(true);
        expect(Object.isFrozen(config.output)).toBe(true);
        expect(Object.isFrozen(config.logging)).toBe(true);
    });

    it('lists every invalid variable', () => {
        let caught: unknown;
        try {
            loadConfig({ SEARCH_LOCATION: 'Praha', SEARCH_RADIUS_M: '-1', LOG_LEVEL: 'loud' });
        } catch (e) {
            caught = e;
        }

        expect(caught).toBeInstanceOf(ConfigurationError);
        if (caught instanceof ConfigurationError) {
            expect(caught.issues).toHaveLength(3);
            expect(caught.issues[0]).toBe('SEARCH_LOCATION: Expected "lat,lng"');
        }
    });
});
