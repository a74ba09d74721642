/**
 * Bulk Sync Service
 *
 * Walks a paginated downstream collection through the lead-inbox client, so
 * page fetches share the dispatch path's rate limiter and retry loop.
 *
 * A SyncRun is lazy and restartable: every iteration starts again from page 1.
 * A non-success outcome ends the run; records already yielded stay with the
 * caller and `run.terminal` says why it stopped.
 */

import { LeadInboxClient, PageFetchResult } from './leadInboxClient';
import { logger } from './observabilityService';
import { AppError } from '../utils/appError';
import { PaginationHeaderNames } from '../config';
import {
    PageCursor,
    PageResponse,
    RemoteRecord,
    SyncCollection,
    TerminalOutcome,
    isJsonObject
} from '../types';

export interface BulkSyncOptions {
    baseUrl: string;
    pathTemplate: string;
    accessToken: string | null;
    resources: readonly string[];
    pageSize: number;
    maxPages: number;
    itemsPath: string;
    nextLinkPath: string;
    headers: PaginationHeaderNames;
}

export class UnknownResourceError extends AppError {
    constructor(public readonly resource: string) {
        super(`Resource type '${resource}' is not enabled for sync`, 404);
    }
}

/**
 * Read a dotted path (`meta.paging.next`) out of a JSON body.
 */
export function readPath(body: unknown, path: string): unknown {
    let current: unknown = body;
    for (const segment of path.split('.').filter(part => part.length > 0)) {
        if (!isJsonObject(current)) return undefined;
        current = current[segment];
    }
    return current;
}

function readInt(headers: Record<string, string>, name: string): number | null {
    const raw = headers[name.toLowerCase()];
    if (raw === undefined) return null;
    const value = Number.parseInt(raw, 10);
    return Number.isNaN(value) ? null : value;
}

// ============================================================================
// SYNC RUN
// ============================================================================

export class SyncRun implements AsyncIterable<RemoteRecord> {
    terminal: TerminalOutcome | null = null;
    pagesFetched = 0;

    constructor(
        readonly resource: string,
        private readonly client: LeadInboxClient,
        private readonly options: BulkSyncOptions,
        private readonly signal?: AbortSignal
    ) { }

    async *[Symbol.asyncIterator](): AsyncGenerator<RemoteRecord, void, undefined> {
        this.terminal = null;
        this.pagesFetched = 0;

        const log = logger.child({ resource: this.resource });
        const firstUrl = new URL(
            this.options.pathTemplate.replace('{resource}', encodeURIComponent(this.resource)),
            this.options.baseUrl
        ).toString();

        let cursor: PageCursor | null = { type: 'page', page: 1 };

        while (cursor !== null) {
            if (this.pagesFetched >= this.options.maxPages) {
                log.warn('[SYNC] Page limit reached, stopping', { maxPages: this.options.maxPages });
                return;
            }

            const result: PageFetchResult = cursor.type === 'link'
                ? await this.client.fetchPage(cursor.url, undefined, this.authHeaders(), this.signal)
                : await this.client.fetchPage(
                    firstUrl,
                    { page: cursor.page, per_page: this.options.pageSize },
                    this.authHeaders(),
                    this.signal
                );

            if (!result.ok) {
                this.terminal = result.outcome;
                log.warn('[SYNC] Run stopped by a non-success outcome', {
                    outcome: result.outcome.kind,
                    pagesFetched: this.pagesFetched
                });
                return;
            }

            this.pagesFetched++;
            const records: RemoteRecord[] = this.readRecords(result.page);

            log.debug('[SYNC] Page fetched', { page: this.pagesFetched, records: records.length });

            for (const record of records) {
                yield record;
            }

            cursor = this.nextCursor(cursor, result.page, records.length);
        }

        log.info('[SYNC] Run complete', { pagesFetched: this.pagesFetched });
    }

    private authHeaders(): Record<string, string> {
        const headers: Record<string, string> = { Accept: 'application/json' };
        if (this.options.accessToken) {
            headers.Authorization = `Bearer ${this.options.accessToken}`;
        }
        return headers;
    }

    private readRecords(page: PageResponse): RemoteRecord[] {
        const items = readPath(page.body, this.options.itemsPath);
        if (!Array.isArray(items)) return [];
        return items.filter(isJsonObject);
    }

    /**
     * The response decides first: a next link, then the has-next header, then
     * page totals, then a short page against the response's own per-page size.
     * The configured page size is consulted only when the response carries no
     * pagination information at all.
     */
    private nextCursor(current: PageCursor, page: PageResponse, count: number): PageCursor | null {
        if (count === 0) return null;

        const link = readPath(page.body, this.options.nextLinkPath);
        if (typeof link === 'string' && link.length > 0) {
            return { type: 'link', url: new URL(link, this.options.baseUrl).toString() };
        }

        const names = this.options.headers;
        const hasNext = page.headers[names.hasNext.toLowerCase()];
        const currentPage = readInt(page.headers, names.currentPage)
            ?? (current.type === 'page' ? current.page : null);
        const perPage = readInt(page.headers, names.perPage);
        const totalCount = readInt(page.headers, names.totalCount);

        if (hasNext !== undefined) {
            if (hasNext.trim().toLowerCase() !== 'true' || currentPage === null) return null;
            return { type: 'page', page: currentPage + 1 };
        }

        if (currentPage === null) return null;

        if (perPage !== null && totalCount !== null) {
            return currentPage * perPage < totalCount ? { type: 'page', page: currentPage + 1 } : null;
        }

        if (perPage !== null) {
            return count < perPage ? null : { type: 'page', page: currentPage + 1 };
        }

        if (totalCount !== null || current.type === 'link') return null;

        return count < this.options.pageSize ? null : { type: 'page', page: currentPage + 1 };
    }
}

// ============================================================================
// SERVICE
// ============================================================================

export class BulkSyncService {
    constructor(
        private readonly client: LeadInboxClient,
        private readonly options: BulkSyncOptions
    ) { }

    get resources(): readonly string[] {
        return this.options.resources;
    }

    /**
     * @throws UnknownResourceError when the resource is not in the allow-list
     */
    syncAll(resource: string, signal?: AbortSignal): SyncRun {
        if (!this.options.resources.includes(resource)) {
            throw new UnknownResourceError(resource);
        }
        return new SyncRun(resource, this.client, this.options, signal);
    }

    async collectAll(resource: string, signal?: AbortSignal): Promise<SyncCollection> {
        const run = this.syncAll(resource, signal);
        const records: RemoteRecord[] = [];

        for await (const record of run) {
            records.push(record);
        }

        return { resource, records, pages: run.pagesFetched, terminal: run.terminal };
    }
}
