import winston from 'winston';
import type { AppConfig } from '../../config';
import {
    type BatchEntry,
    type BatchResult,
    type EndpointStatus,
    ErrorKind,
    type ErrorOutcome,
    type LookupOutcome,
    type SearchPayload,
    errorOutcome,
    isErrorOutcome,
} from '../../types';
import { TransportError } from '../../utils/errors';
import { ResponseExtractor } from '../extractor';
import { Normalizer } from '../normalizer';
import { Metrics, createLogger } from '../observability';
import type { Transport, TransportResponse } from '../transport';

export type LookupSettings = {
    /** Primary endpoint first, then the fallbacks in priority order. */
    endpoints: string[];
    headers: Record<string, string>;
    timeout_ms: number;
    search_type: string;
    placement: string;
    default_country: string;
    status_probe_number: string;
    delay_ms: number;
    extra_pause_every: number;
    extra_pause_ms: number;
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

export interface OrchestratorDeps {
    transport: Transport;
    logger?: winston.Logger;
    sleep?: Sleep;
    clock?: () => Date;
}

export interface BulkOptions {
    /** Checked between lookups; an aborted batch keeps the outcomes gathered so far. */
    signal?: AbortSignal;
    onProgress?: (index: number, total: number, input: string, outcome: LookupOutcome) => void;
}

export const buildHeaders = (config: AppConfig): Record<string, string> => {
    const headers: Record<string, string> = {
        'User-Agent': config.api.user_agent,
        'Accept': 'application/json',
        'Accept-Language': config.api.accept_language,
        'Content-Type': 'application/json',
    };
    if (config.api.token) headers['Authorization'] = `Bearer ${config.api.token}`;
    return headers;
};

export const settingsFromConfig = (config: AppConfig): LookupSettings => ({
    endpoints: [config.api.primary_url, ...config.api.fallback_urls],
    headers: buildHeaders(config),
    timeout_ms: config.api.timeout_ms,
    search_type: config.api.search_type,
    placement: config.api.placement,
    default_country: config.lookup.default_country,
    status_probe_number: config.api.status_probe_number,
    delay_ms: config.batch.delay_ms,
    extra_pause_every: config.batch.extra_pause_every,
    extra_pause_ms: config.batch.extra_pause_ms,
});

function hostOf(url: string): string {
    try {
        return new URL(url).host;
    } catch {
        return url;
    }
}

function statusOutcome(status: number): ErrorOutcome {
    if (status === 404) return errorOutcome(ErrorKind.NumberNotFound, 'Number not found by the lookup service');
    if (status === 429) return errorOutcome(ErrorKind.RateLimited, 'Rate limited by the lookup service');
    return errorOutcome(ErrorKind.UpstreamError, `Lookup service returned status ${status}`, status);
}

export class LookupOrchestrator {
    readonly metrics = new Metrics();
    private requestCount = 0;
    private readonly transport: Transport;
    private readonly logger: winston.Logger;
    private readonly sleep: Sleep;
    private readonly clock: () => Date;

    constructor(private readonly settings: LookupSettings, deps: OrchestratorDeps) {
        if (settings.endpoints.length === 0) {
            throw new Error('LookupOrchestrator needs at least one endpoint');
        }
        this.transport = deps.transport;
        this.logger = deps.logger ?? createLogger({ silent: true });
        this.sleep = deps.sleep ?? sleep;
        this.clock = deps.clock ?? (() => new Date());
    }

    /** Lookups that got past normalization and were sent upstream. */
    get requestsIssued(): number {
        return this.requestCount;
    }

    get defaultCountry(): string {
        return this.settings.default_country;
    }

    async lookup(rawNumber: string, countryHint: string = this.settings.default_country): Promise<LookupOutcome> {
        const started = Date.now();
        const outcome = await this.resolve(rawNumber, countryHint);
        this.metrics.record(outcome, Date.now() - started);
        return outcome;
    }

    private async resolve(rawNumber: string, countryHint: string): Promise<LookupOutcome> {
        const normalized = Normalizer.normalize(rawNumber, countryHint);
        if (isErrorOutcome(normalized)) {
            this.logger.debug(`Rejected "${rawNumber}": ${normalized.message}`);
            return normalized;
        }

        this.requestCount++;
        const outcome = await this.query(normalized.number, countryHint);
        this.logger.info(`Lookup ${normalized.number}: ${outcome.status === 'OK' ? 'OK' : outcome.kind}`);
        return outcome;
    }

    private payload(number: string, countryHint: string): SearchPayload {
        return {
            query: number,
            countryCode: countryHint.trim().toUpperCase(),
            type: this.settings.search_type,
            placement: this.settings.placement,
            encoding: 'json',
        };
    }

    /**
     * Walks the endpoints in order. Transport failures and 5xx answers move on to the
     * next endpoint; any other answer ends the walk.
     */
    private async query(number: string, countryHint: string): Promise<LookupOutcome> {
        const body = this.payload(number, countryHint);
        let lastServerStatus: number | undefined;

        for (const url of this.settings.endpoints) {
            let response: TransportResponse;
            try {
                response = await this.transport.send({
                    url,
                    body,
                    headers: this.settings.headers,
                    timeout_ms: this.settings.timeout_ms,
                });
            } catch (error: unknown) {
                if (error instanceof TransportError) {
                    this.logger.warn(`Endpoint ${hostOf(url)} unavailable (${error.failure}): ${error.message}`);
                    continue;
                }
                throw error;
            }

            if (response.status >= 200 && response.status < 300) {
                return ResponseExtractor.extractFromBody(response.body, number, {
                    source: hostOf(url),
                    now: this.clock,
                });
            }
            if (response.status >= 500) {
                this.logger.warn(`Endpoint ${hostOf(url)} answered ${response.status}`);
                lastServerStatus = response.status;
                continue;
            }
            return statusOutcome(response.status);
        }

        if (lastServerStatus !== undefined) return statusOutcome(lastServerStatus);
        return errorOutcome(
            ErrorKind.Unreachable,
            `Lookup service unreachable (${this.settings.endpoints.length} endpoint(s) tried)`
        );
    }

    /**
     * Sequential batch: one outcome per input, in input order. A failing input never
     * stops the batch.
     */
    async bulkLookup(
        rawNumbers: readonly string[],
        countryHint: string = this.settings.default_country,
        options: BulkOptions = {}
    ): Promise<BatchResult> {
        const startedAt = this.clock().toISOString();
        const entries: BatchEntry[] = [];
        let cancelled = false;

        for (const [index, input] of rawNumbers.entries()) {
            if (options.signal?.aborted) {
                cancelled = true;
                this.logger.warn(`Batch cancelled after ${entries.length} of ${rawNumbers.length} numbers`);
                break;
            }

            const before = this.requestCount;
            let outcome: LookupOutcome;
            try {
                outcome = await this.lookup(input, countryHint);
            } catch (error: unknown) {
                const err = error instanceof Error ? error : new Error(String(error));
                this.logger.error(`Unexpected failure looking up "${input}"`, { error: err.message, stack: err.stack });
                outcome = errorOutcome(ErrorKind.Unexpected, err.message);
            }

            entries.push(Object.freeze({ input, outcome }));
            options.onProgress?.(index + 1, rawNumbers.length, input, outcome);

            const isLast = index === rawNumbers.length - 1;
            if (this.requestCount > before && !isLast) await this.throttle();
        }

        const successful = entries.filter(e => e.outcome.status === 'OK').length;
        return Object.freeze({
            country: countryHint.trim().toUpperCase(),
            entries: Object.freeze(entries),
            total: entries.length,
            successful_count: successful,
            failed_count: entries.length - successful,
            cancelled,
            started_at: startedAt,
            finished_at: this.clock().toISOString(),
        });
    }

    private async throttle(): Promise<void> {
        await this.sleep(this.settings.delay_ms);
        if (this.requestCount % this.settings.extra_pause_every === 0) {
            this.logger.debug(`Extra pause after ${this.requestCount} requests`);
            await this.sleep(this.settings.extra_pause_ms);
        }
    }

    /** Sends one probe lookup to every endpoint. Any HTTP answer counts as reachable. */
    async checkStatus(): Promise<EndpointStatus[]> {
        const body = this.payload(this.settings.status_probe_number, this.settings.default_country);
        const statuses: EndpointStatus[] = [];

        for (const url of this.settings.endpoints) {
            const started = Date.now();
            try {
                const response = await this.transport.send({
                    url,
                    body,
                    headers: this.settings.headers,
                    timeout_ms: this.settings.timeout_ms,
                });
                statuses.push({ url, reachable: true, http_status: response.status, latency_ms: Date.now() - started });
            } catch (error: unknown) {
                if (!(error instanceof TransportError)) throw error;
                statuses.push({ url, reachable: false, latency_ms: Date.now() - started, error: error.message });
            }
        }
        return statuses;
    }
}
