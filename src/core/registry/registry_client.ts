/**
 * 🏛️ CZECH REGISTRY CLIENT
 * Structured lookups against ARES (JSON) and owner mining from the
 * commercial register (HTML, or.justice.cz).
 *
 * Every operation degrades to its "not found" result; nothing is thrown
 * to the caller.
 */

import type { RegistryConfig } from '../../config';
import { Owner, Prospect } from '../../types';
import { ParseError, TransportError, ValidationError, toError } from '../../utils/errors';
import { isValidRegistryId, normalizeRegistryId } from '../../utils/registry_id';
import { EnrichmentMerger } from '../enrichment/merger';
import { HttpClient, HttpClientOptions } from '../http/http_client';
import { OwnerExtractor, extractOwners } from './owner_extractor';
import { AresSearchResponseSchema, aresSubjectToProspect } from './registry_mapper';

const SEARCH_PAGE_SIZE = 10;

export interface RegistryClientOptions extends HttpClientOptions {
    ownerExtractor?: OwnerExtractor;
}

export class RegistryClient extends HttpClient {
    private readonly config: RegistryConfig;
    private readonly ownerExtractor: OwnerExtractor;

    constructor(config: RegistryConfig, options: RegistryClientOptions = {}) {
        super(config, options);
        this.config = config;
        this.ownerExtractor = options.ownerExtractor ?? extractOwners;
    }

    /**
     * ARES full-text search by business name; first hit only.
     */
    async searchByName(name: string): Promise<Prospect | undefined> {
        try {
            if (!name.trim()) {
                throw new ValidationError('Registry search needs a non-empty name');
            }

            const raw = await this.get(`${this.config.aresUrl}/ekonomicke-subjekty/vyhledat`, {
                obchodniJmeno: name,
                pocet: SEARCH_PAGE_SIZE,
                strana: 1,
            });

            const parsed = AresSearchResponseSchema.safeParse(raw);
            if (!parsed.success) {
                throw new ParseError('Unexpected ARES search payload', { name });
            }

            const first = parsed.data.ekonomickeSubjekty?.[0];
            if (first === undefined) {
                this.logger.debug(`[Registry] No ARES match for "${name}"`, { prospect_name: name });
                return undefined;
            }

            return aresSubjectToProspect(first);
        } catch (e) {
            this.report(`[Registry] Name search failed for "${name}"`, e, { prospect_name: name });
            return undefined;
        }
    }

    /**
     * Direct ARES lookup by IČO. Separators are stripped first; anything that
     * is not exactly 8 digits is rejected without a request.
     */
    async searchById(id: string): Promise<Prospect | undefined> {
        const ico = normalizeRegistryId(id);
        if (!isValidRegistryId(ico)) {
            this.logger.warn(`[Registry] Invalid IČO format: "${id}"`, { registry_id: id });
            return undefined;
        }

        try {
            const raw = await this.get(`${this.config.aresUrl}/ekonomicke-subjekty/${ico}`);
            return aresSubjectToProspect(raw);
        } catch (e) {
            if (e instanceof TransportError && e.isNotFound) {
                this.logger.debug(`[Registry] IČO ${ico} not found in ARES`, { registry_id: ico });
                return undefined;
            }
            this.report(`[Registry] IČO lookup failed for ${ico}`, e, { registry_id: ico });
            return undefined;
        }
    }

    /**
     * Owners/directors scraped from the commercial register page for an IČO.
     */
    async getOwners(id: string): Promise<Owner[]> {
        const ico = normalizeRegistryId(id);
        if (!isValidRegistryId(ico)) {
            this.logger.warn(`[Registry] Invalid IČO format for owner lookup: "${id}"`, { registry_id: id });
            return [];
        }

        try {
            const html = await this.get(`${this.config.justiceUrl}/rejstrik-$firma`, { ico }, 'text');
            if (typeof html !== 'string') {
                throw new ParseError('Commercial register returned a non-text body', { registry_id: ico });
            }

            const owners = this.ownerExtractor(html, ico);
            this.logger.debug(`[Registry] Extracted ${owners.length} owner(s) for ${ico}`, { registry_id: ico });
            return owners;
        } catch (e) {
            this.report(`[Registry] Owner lookup failed for ${ico}`, e, { registry_id: ico });
            return [];
        }
    }

    /**
     * Name lookup, field merge, then owners when an IČO is known.
     * Returns the same (mutated) prospect; never throws.
     */
    async enrich(prospect: Prospect): Promise<Prospect> {
        try {
            const record = await this.searchByName(prospect.name);
            if (!record) {
                return prospect;
            }

            const changed = EnrichmentMerger.mergeRegistryRecord(prospect, record);

            if (prospect.registryId) {
                const owners = await this.getOwners(prospect.registryId);
                if (EnrichmentMerger.mergeOwners(prospect, owners)) {
                    changed.push('owners');
                }
            }

            this.logger.info(`[Registry] Enriched "${prospect.name}": ${changed.length ? changed.join(', ') : 'no changes'}`, {
                prospect_name: prospect.name,
                registry_id: prospect.registryId,
            });
        } catch (e) {
            this.logger.logError(`[Registry] Enrichment failed for "${prospect.name}"`, toError(e), {
                prospect_name: prospect.name,
            });
        }

        return prospect;
    }

    private report(msg: string, e: unknown, context: Record<string, string>): void {
        const error = toError(e);
        if (error instanceof ValidationError) {
            this.logger.warn(`${msg}: ${error.message}`, context);
            return;
        }
        this.logger.logError(msg, error, context);
    }
}
