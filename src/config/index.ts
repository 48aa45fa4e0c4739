/**
 * 🔒 ENVIRONMENT CONFIGURATION
 * Centralized env parsing with Zod validation.
 *
 * Nothing here is global: loadConfig() returns a value and each client
 * gets its own slice through its constructor.
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors';
import type { LogThreshold } from '../utils/logger';

const LOCATION_PATTERN = /^-?\d{1,2}(\.\d+)?,-?\d{1,3}(\.\d+)?$/;

/**
 * 📋 CONFIG SCHEMA - All Magic Numbers Live Here
 */
const ConfigSchema = z.object({
    // 🔑 API Keys
    GOOGLE_MAPS_API_KEY: z.string().trim().optional(),

    // 🗺️ Places search
    PLACES_API_URL: z.string().url().default('https://maps.googleapis.com/maps/api/place'),
    SEARCH_LOCATION: z.string().regex(LOCATION_PATTERN, 'Expected "lat,lng"').default('50.0755,14.4378'),
    SEARCH_RADIUS_M: z.coerce.number().int().min(1).max(50000).default(20000),
    PAGE_TOKEN_DELAY_MS: z.coerce.number().int().min(0).max(10000).default(2000),

    // 🏛️ Registries
    ARES_API_URL: z.string().url().default('https://ares.gov.cz/ekonomicke-subjekty-v-be/rest'),
    JUSTICE_URL: z.string().url().default('https://or.justice.cz/ias/ui'),

    // ⚙️ Transport & politeness
    HTTP_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120000).default(30000),
    USER_AGENT: z.string().default('Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36'),
    ENRICH_COOLDOWN_MS: z.coerce.number().int().min(0).max(60000).default(1000),

    // 📤 Output
    OUTPUT_DIR: z.string().default('./output'),

    // 🏷️ Service Identity
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    SERVICE_NAME: z.string().default('prospect-finder'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type EnvConfig = z.infer<typeof ConfigSchema>;

export interface HttpConfig {
    timeoutMs: number;
    userAgent: string;
}

export interface PlacesConfig extends HttpConfig {
    apiKey?: string;
    baseUrl: string;
    location: string;   // "lat,lng"
    radiusM: number;
    pageTokenDelayMs: number;
}

export interface RegistryConfig extends HttpConfig {
    aresUrl: string;
    justiceUrl: string;
}

export interface FinderConfig {
    enrichCooldownMs: number;
}

export interface LoggingConfig {
    service: string;
    level: LogThreshold;
    pretty: boolean;
}

export interface AppConfig {
    readonly places: Readonly<PlacesConfig>;
    readonly registry: Readonly<RegistryConfig>;
    readonly finder: Readonly<FinderConfig>;
    readonly output: Readonly<{ directory: string }>;
    readonly logging: Readonly<LoggingConfig>;
}

/**
 * Loads `.env` into process.env. Called once by entry points, never on import.
 */
export function loadDotenv(path?: string): void {
    dotenv.config(path ? { path } : undefined);
}

/**
 * 🚀 Parse and Validate Environment
 * Returns a frozen value (each slice frozen too).
 * Throws ConfigurationError listing every bad variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const result = ConfigSchema.safeParse(env);

    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError('Invalid environment configuration', issues);
    }

    const e = result.data;
    const http: HttpConfig = {
        timeoutMs: e.HTTP_TIMEOUT_MS,
        userAgent: e.USER_AGENT,
    };

    return Object.freeze({
        places: Object.freeze({
            ...http,
            apiKey: e.GOOGLE_MAPS_API_KEY || undefined,
            baseUrl: e.PLACES_API_URL.replace(/\/+$/, ''),
            location: e.SEARCH_LOCATION,
            radiusM: e.SEARCH_RADIUS_M,
            pageTokenDelayMs: e.PAGE_TOKEN_DELAY_MS,
        }),
        registry: Object.freeze({
            ...http,
            aresUrl: e.ARES_API_URL.replace(/\/+$/, ''),
            justiceUrl: e.JUSTICE_URL.replace(/\/+$/, ''),
        }),
        finder: Object.freeze({
            enrichCooldownMs: e.ENRICH_COOLDOWN_MS,
        }),
        output: Object.freeze({
            directory: e.OUTPUT_DIR,
        }),
        logging: Object.freeze({
            service: e.SERVICE_NAME,
            level: e.LOG_LEVEL,
            pretty: e.NODE_ENV !== 'production',
        }),
    });
}
