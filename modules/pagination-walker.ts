import type { ClientContext, ListingKind, ListingSource, WalkStatus } from '../types';
import { DEFAULT_USER_AGENT } from '../datas/constants';
import { buildContinuationRequest, DEFAULT_CLIENT } from './continuation-request-builder';
import { boundaryReference } from './item-id-mapper';
import { extractPage } from './page-extractor';
import { logger as defaultLogger, type Logger } from './logger';

type WalkPhase =
    | { kind: 'initial' }
    | { kind: 'continuation'; token: string }
    | { kind: 'failed'; error: unknown }
    | { kind: 'finished' };

interface WalkCursor {
    phase: WalkPhase;
    client: ClientContext;
    seen: Set<string>;
    pages: number;
    status: WalkStatus;
}

export interface PaginationWalkerOptions {
    kind: ListingKind;
    source: ListingSource;
    /** Item id or canonical path; the walk stops right before it. */
    until?: string;
    client?: ClientContext;
    userAgent?: string;
    logger?: Logger;
}

export const mergeClientContext = (base: ClientContext, discovered: Partial<ClientContext>): ClientContext => ({
    clientName: discovered.clientName || base.clientName,
    clientVersion: discovered.clientVersion || base.clientVersion,
    hl: discovered.hl || base.hl,
    gl: discovered.gl || base.gl,
})

/**
 * Walks a channel listing page by page, one batch of references per page.
 *
 * Each page depends on the previous page's continuation token, so calls to
 * `nextBatch` are queued and pages are always requested in order. A page that
 * matches no known layout ends the walk. A failed fetch is not retried: every
 * later `nextBatch` rejects with the same error.
 */
export default class PaginationWalker implements AsyncIterable<string[]> {
    private readonly kind: ListingKind;
    private readonly source: ListingSource;
    private readonly boundary: string | null;
    private readonly userAgent: string;
    private readonly logger: Logger;
    private cursor: WalkCursor;
    private queue: Promise<unknown> = Promise.resolve();

    constructor(options: PaginationWalkerOptions) {
        this.kind = options.kind
        this.source = options.source
        this.boundary = options.until ? boundaryReference(options.until, options.kind) : null
        this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT
        this.logger = options.logger ?? defaultLogger.child({ module: 'pagination-walker' })
        this.cursor = {
            phase: { kind: 'initial' },
            client: options.client ?? DEFAULT_CLIENT,
            seen: new Set(),
            pages: 0,
            status: 'pending',
        }
    }

    get status(): WalkStatus {
        return this.cursor.status
    }

    get pageCount(): number {
        return this.cursor.pages
    }

    get isFinished(): boolean {
        return this.cursor.phase.kind === 'finished' || this.cursor.phase.kind === 'failed'
    }

    /** Resolves to the next page's new references, or `null` once the walk is over. */
    nextBatch = (): Promise<string[] | null> => {
        const step = this.queue.then(this.advance, this.advance)
        this.queue = step
        return step
    }

    async *[Symbol.asyncIterator](): AsyncGenerator<string[]> {
        let batch = await this.nextBatch()
        while (batch !== null) {
            yield batch
            batch = await this.nextBatch()
        }
    }

    private advance = async (): Promise<string[] | null> => {
        const cursor = this.cursor
        if (cursor.phase.kind === 'finished') return null
        if (cursor.phase.kind === 'failed') throw cursor.phase.error

        let raw: unknown
        try {
            raw = await this.loadPage(cursor.phase)
        } catch (err) {
            cursor.phase = { kind: 'failed', error: err }
            cursor.status = 'failed'
            // logged at error level by the fetcher
            this.logger.debug({ err, page: cursor.pages + 1 }, 'listing page fetch failed')
            throw err
        }
        cursor.pages++

        const page = extractPage(raw, this.kind)
        if (!page) {
            this.logger.warn({ page: cursor.pages, kind: this.kind }, 'no known listing shape matched, ending walk')
            this.finish('unresolvable')
            return []
        }
        if (page.dropped > 0) {
            this.logger.debug({ page: cursor.pages, dropped: page.dropped }, 'dropped entries without a known item shape')
        }

        const boundaryIndex = this.boundary ? page.references.indexOf(this.boundary) : -1
        if (boundaryIndex !== -1) {
            this.finish('boundary')
            return this.takeUnseen(page.references.slice(0, boundaryIndex))
        }

        const batch = this.takeUnseen(page.references)
        if (page.continuation) {
            cursor.phase = { kind: 'continuation', token: page.continuation }
        } else {
            if (page.markerUnrecognized) {
                this.logger.warn({ page: cursor.pages }, 'trailing continuation marker has an unknown shape, results may be truncated')
            }
            this.finish(page.markerUnrecognized ? 'truncated' : 'exhausted')
        }

        this.logger.debug({
            page: cursor.pages,
            shape: page.shape,
            references: batch.length,
            hasContinuation: page.continuation !== null,
        }, 'listing page extracted')
        return batch
    }

    private loadPage = async (phase: Extract<WalkPhase, { kind: 'initial' | 'continuation' }>): Promise<unknown> => {
        if (phase.kind === 'initial') {
            const initial = await this.source.loadInitialPage()
            this.cursor.client = mergeClientContext(this.cursor.client, initial.client)
            return initial.data
        }
        const request = buildContinuationRequest(phase.token, this.cursor.client, this.userAgent)
        return this.source.fetchContinuation(request)
    }

    private takeUnseen = (references: string[]): string[] => {
        const { seen } = this.cursor
        return references.filter(reference => {
            if (seen.has(reference)) return false
            seen.add(reference)
            return true
        })
    }

    private finish = (status: WalkStatus) => {
        this.cursor.phase = { kind: 'finished' }
        this.cursor.status = status
    }
}
