/**
 * 🎯 PROSPECT FINDER
 * Category/query -> places search -> cap -> (optional) sequential registry
 * enrichment with a cooldown between prospects.
 *
 * Strictly one request at a time. Registry requests are spaced by at least
 * enrichCooldownMs.
 */

import type { AppConfig } from '../config';
import { PlaceSearchClient, SearchPlacesOptions } from '../core/places/places_client';
import { RegistryClient } from '../core/registry/registry_client';
import { Closeable, HttpClientOptions, withClient } from '../core/http/http_client';
import { Prospect } from '../types';
import { ProspectDeduplicator } from '../utils/deduplicator';
import { toError } from '../utils/errors';
import { Logger, defaultLogger } from '../utils/logger';
import { Sleep, sleep as defaultSleep } from '../utils/sleep';
import { perQueryCap, resolveCategoryQueries } from './categories';

export interface PlaceSearcher extends Closeable {
    searchPlaces(query: string, options?: SearchPlacesOptions): Promise<Prospect[]>;
}

export interface ProspectEnricher extends Closeable {
    enrich(prospect: Prospect): Promise<Prospect>;
}

export interface FindOptions {
    maxResults?: number;
    enrich?: boolean;
    /**
     * Drop repeats (normalized name + address) before the cap is applied.
     * Off by default: plain concatenation is the established behaviour.
     */
    dedupe?: boolean;
}

export interface ProspectFinderDeps {
    logger?: Logger;
    sleep?: Sleep;
    createPlaceSearcher?: () => PlaceSearcher;
    createEnricher?: () => ProspectEnricher;
    /** Forwarded to the default clients (e.g. a test adapter). */
    http?: Pick<HttpClientOptions, 'adapter'>;
}

const DEFAULT_MAX_RESULTS = 20;

export class ProspectFinder {
    private readonly logger: Logger;
    private readonly sleep: Sleep;
    private readonly createPlaceSearcher: () => PlaceSearcher;
    private readonly createEnricher: () => ProspectEnricher;

    constructor(private readonly config: AppConfig, deps: ProspectFinderDeps = {}) {
        this.logger = deps.logger ?? defaultLogger;
        this.sleep = deps.sleep ?? defaultSleep;

        const clientOptions = { ...deps.http, logger: this.logger, sleep: this.sleep };
        this.createPlaceSearcher = deps.createPlaceSearcher
            ?? (() => new PlaceSearchClient(config.places, clientOptions));
        this.createEnricher = deps.createEnricher
            ?? (() => new RegistryClient(config.registry, clientOptions));
    }

    /**
     * Fans a category out into its search phrases (or uses it verbatim),
     * caps each phrase at floor(max / n) + 1 and stops as soon as maxResults
     * prospects have accumulated.
     */
    async findByCategory(category: string, options: FindOptions = {}): Promise<Prospect[]> {
        const maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
        if (maxResults <= 0) return [];

        const queries = resolveCategoryQueries(category);
        const cap = perQueryCap(maxResults, queries.length);
        const deduper = options.dedupe ? new ProspectDeduplicator() : undefined;

        this.logger.info(`[Finder] Category "${category}" -> ${queries.length} query(ies), cap ${cap} each`);

        const prospects = await withClient(this.createPlaceSearcher(), async (places) => {
            let collected: Prospect[] = [];

            for (const query of queries) {
                this.logger.info(`[Finder] Searching places for: ${query}`, { query });
                const found = await places.searchPlaces(query, { maxResults: cap });
                collected.push(...(deduper ? deduper.filter(found) : found));

                if (collected.length >= maxResults) {
                    collected = collected.slice(0, maxResults);
                    break;
                }
            }

            return collected;
        });

        return options.enrich === false ? prospects : this.enrichAll(prospects);
    }

    async findByQuery(query: string, options: FindOptions = {}): Promise<Prospect[]> {
        const maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
        if (maxResults <= 0) return [];

        this.logger.info(`[Finder] Searching places for: ${query}`, { query });
        const found = await withClient(this.createPlaceSearcher(), (places) => places.searchPlaces(query, { maxResults }));
        const prospects = options.dedupe ? new ProspectDeduplicator().filter(found) : found;

        return options.enrich === false ? prospects : this.enrichAll(prospects);
    }

    /**
     * One prospect at a time, cooldown after each. A failed enrichment keeps
     * the prospect as it was.
     */
    async enrichAll(prospects: Prospect[]): Promise<Prospect[]> {
        if (prospects.length === 0) return prospects;

        this.logger.info(`[Finder] Enriching ${prospects.length} prospect(s) with registry data...`);

        return withClient(this.createEnricher(), async (registry) => {
            const enriched: Prospect[] = [];

            for (const prospect of prospects) {
                try {
                    enriched.push(await registry.enrich(prospect));
                } catch (e) {
                    this.logger.logError(`[Finder] Enrichment failed for "${prospect.name}"`, toError(e), {
                        prospect_name: prospect.name,
                    });
                    enriched.push(prospect);
                }
                await this.sleep(this.config.finder.enrichCooldownMs);
            }

            return enriched;
        });
    }
}
