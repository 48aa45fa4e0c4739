import * as http from 'http';
import * as https from 'https';
import axios, { AxiosAdapter, AxiosInstance, ResponseType } from 'axios';
import type { HttpConfig } from '../../config';
import { TransportError } from '../../utils/errors';
import { Logger, defaultLogger } from '../../utils/logger';

export interface HttpClientOptions {
    logger?: Logger;
    /** Replaces the network transport (tests use an in-process adapter). */
    adapter?: AxiosAdapter;
}

export interface Closeable {
    close(): Promise<void>;
}

export type QueryParams = Record<string, string | number | undefined>;

/**
 * Base for the upstream API clients: one axios instance per client with a
 * private keep-alive connection pool, released by close().
 */
export abstract class HttpClient implements Closeable {
    protected readonly http: AxiosInstance;
    protected readonly logger: Logger;
    private readonly httpAgent: http.Agent;
    private readonly httpsAgent: https.Agent;
    private closed = false;

    constructor(config: HttpConfig, options: HttpClientOptions = {}) {
        this.logger = options.logger ?? defaultLogger;
        this.httpAgent = new http.Agent({ keepAlive: true });
        this.httpsAgent = new https.Agent({ keepAlive: true });

        this.http = axios.create({
            timeout: config.timeoutMs,
            maxRedirects: 5,
            httpAgent: this.httpAgent,
            httpsAgent: this.httpsAgent,
            headers: {
                'User-Agent': config.userAgent,
                'Accept-Language': 'cs-CZ,cs;q=0.9,en-US;q=0.8,en;q=0.7',
            },
            ...(options.adapter ? { adapter: options.adapter } : {}),
        });
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /**
     * GET wrapper: every failure surfaces as a TransportError carrying the
     * HTTP status when one was received.
     */
    protected async get(url: string, params: QueryParams = {}, responseType: ResponseType = 'json'): Promise<unknown> {
        if (this.closed) {
            throw new TransportError(`Client is closed, refusing request to ${url}`);
        }

        const started = Date.now();
        try {
            const response = await this.http.get<unknown>(url, {
                params: dropUndefined(params),
                responseType,
            });
            this.logger.debug(`[HTTP] GET ${url} -> ${response.status}`, { url, duration_ms: Date.now() - started });
            return response.data;
        } catch (e) {
            if (axios.isAxiosError(e)) {
                const status = e.response?.status;
                throw new TransportError(
                    status ? `GET ${url} failed with status ${status}` : `GET ${url} failed: ${e.code ?? e.message}`,
                    status,
                    { url, code: e.code }
                );
            }
            throw e;
        }
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        this.httpAgent.destroy();
        this.httpsAgent.destroy();
    }
}

function dropUndefined(params: QueryParams): Record<string, string | number> {
    const out: Record<string, string | number> = {};
    for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) out[key] = value;
    }
    return out;
}

/**
 * Scoped acquisition: the client is closed on every exit path.
 */
export async function withClient<C extends Closeable, T>(client: C, work: (client: C) => Promise<T>): Promise<T> {
    try {
        return await work(client);
    } finally {
        await client.close();
    }
}
