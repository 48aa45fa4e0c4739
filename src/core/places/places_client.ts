/**
 * 🗺️ PLACE SEARCH CLIENT
 * Text search against the places API, anchored to a fixed centre + radius.
 *
 * Pagination: a next_page_token only becomes valid a couple of seconds after
 * it is issued, so every continuation request waits pageTokenDelayMs first.
 */

import type { PlacesConfig } from '../../config';
import { PlaceCategory, Prospect } from '../../types';
import { ConfigurationError, ParseError, toError } from '../../utils/errors';
import { Sleep, sleep as defaultSleep } from '../../utils/sleep';
import { HttpClient, HttpClientOptions } from '../http/http_client';
import {
    DetailsResponseSchema,
    PlaceRecordSchema,
    TextSearchResponseSchema,
    placeToProspect,
} from './place_mapper';

const DETAIL_FIELDS = 'name,formatted_address,formatted_phone_number,website,url,rating,user_ratings_total,types,place_id';

export interface SearchPlacesOptions {
    location?: string;       // "lat,lng"
    radius?: number;         // metres
    categoryFilter?: string; // places `type` filter
    maxResults?: number;
}

export interface PlaceSearchClientOptions extends HttpClientOptions {
    sleep?: Sleep;
}

export class PlaceSearchClient extends HttpClient {
    private readonly config: PlacesConfig;
    private readonly apiKey: string;
    private readonly sleep: Sleep;

    constructor(config: PlacesConfig, options: PlaceSearchClientOptions = {}) {
        super(config, options);
        if (!config.apiKey) {
            throw new ConfigurationError('GOOGLE_MAPS_API_KEY is required for place search');
        }
        this.config = config;
        this.apiKey = config.apiKey;
        this.sleep = options.sleep ?? defaultSleep;
    }

    /**
     * Runs a text search and follows continuation tokens until maxResults
     * prospects are collected, the token runs out, or the API stops saying OK.
     * Never throws: failures are logged and whatever was collected is returned.
     */
    async searchPlaces(query: string, options: SearchPlacesOptions = {}): Promise<Prospect[]> {
        const maxResults = options.maxResults ?? 20;
        const prospects: Prospect[] = [];

        if (!query.trim()) {
            this.logger.warn('[Places] Empty query, skipping search');
            return prospects;
        }
        if (maxResults <= 0) return prospects;

        const url = `${this.config.baseUrl}/textsearch/json`;
        let pageToken: string | undefined;
        let page = 0;

        try {
            while (prospects.length < maxResults) {
                if (pageToken) {
                    await this.sleep(this.config.pageTokenDelayMs);
                }

                const raw = await this.get(url, {
                    query,
                    location: options.location ?? this.config.location,
                    radius: options.radius ?? this.config.radiusM,
                    type: options.categoryFilter,
                    pagetoken: pageToken,
                    key: this.apiKey,
                });
                page++;

                const parsed = TextSearchResponseSchema.safeParse(raw);
                if (!parsed.success) {
                    throw new ParseError(`Unexpected text search payload on page ${page}`, { query });
                }

                const data = parsed.data;
                if (data.status !== 'OK') {
                    this.logger.warn(`[Places] Text search returned ${data.status} on page ${page}`, {
                        query,
                        api_message: data.error_message,
                    });
                    break;
                }

                for (const record of data.results) {
                    if (prospects.length >= maxResults) break;
                    const prospect = this.toProspect(record, query);
                    if (prospect) prospects.push(prospect);
                }

                pageToken = data.next_page_token;
                if (!pageToken) break;
            }
        } catch (e) {
            this.logger.logError(`[Places] Search failed for "${query}"`, toError(e), { query });
        }

        this.logger.info(`[Places] "${query}" -> ${prospects.length} prospects (${page} page(s))`, { query });
        return prospects;
    }

    /**
     * Searches using a place type as both query text and type filter.
     */
    async searchByCategory(category: PlaceCategory | string, options: Omit<SearchPlacesOptions, 'categoryFilter'> = {}): Promise<Prospect[]> {
        return this.searchPlaces(category, { ...options, categoryFilter: category });
    }

    async getPlaceDetails(placeId: string): Promise<Prospect | undefined> {
        if (!placeId.trim()) {
            this.logger.warn('[Places] Empty place id, skipping details lookup');
            return undefined;
        }

        try {
            const raw = await this.get(`${this.config.baseUrl}/details/json`, {
                place_id: placeId,
                fields: DETAIL_FIELDS,
                key: this.apiKey,
            });

            const parsed = DetailsResponseSchema.safeParse(raw);
            if (!parsed.success) {
                throw new ParseError('Unexpected details payload', { place_id: placeId });
            }
            if (parsed.data.status !== 'OK' || parsed.data.result === undefined) {
                this.logger.warn(`[Places] Details for ${placeId} returned ${parsed.data.status}`, {
                    api_message: parsed.data.error_message,
                });
                return undefined;
            }

            return this.toProspect(parsed.data.result, placeId) ?? undefined;
        } catch (e) {
            this.logger.logError(`[Places] Details lookup failed for ${placeId}`, toError(e), { place_id: placeId });
            return undefined;
        }
    }

    private toProspect(record: unknown, query: string): Prospect | null {
        const parsed = PlaceRecordSchema.safeParse(record);
        if (!parsed.success) {
            this.logger.debug('[Places] Skipping malformed place record', { query });
            return null;
        }

        try {
            return placeToProspect(parsed.data);
        } catch (e) {
            this.logger.debug(`[Places] Skipping place record: ${toError(e).message}`, { query });
            return null;
        }
    }
}
