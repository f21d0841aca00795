import type { ChannelConfig, ChannelMetadata, InitialPage, ListingKind, ListingSource, PageFetcher, WalkStatus } from '../types';
import { loadConfig } from './config';
import { createLogger, type Logger } from './logger';
import { channelUri, channelUrl, listingUrl, toWatchUrl } from './channel-url';
import { parseChannelMetadata } from './channel-metadata';
import ChannelPageFetcher from './channel-page-fetcher';
import DeferredList from './deferred-list';
import PaginationWalker from './pagination-walker';

export interface ChannelListingOptions {
    fetcher?: PageFetcher;
    config?: ChannelConfig;
    logger?: Logger;
}

interface ListingWalk {
    walker: PaginationWalker;
    references: DeferredList<string>;
}

/**
 * The videos or shorts of one channel.
 *
 * Reference lists are built lazily and cached per boundary, so asking for the
 * same list twice walks the channel once. A list whose walk failed keeps
 * rejecting; asking for it again starts a fresh walk. The initial page is
 * shared by every list and by `metadata()`.
 */
export default class ChannelListing {
    readonly channelUri: string;
    readonly channelUrl: string;
    readonly listingUrl: string;

    private readonly fetcher: PageFetcher;
    private readonly config: ChannelConfig;
    private readonly logger: Logger;
    private readonly walks: Map<string, ListingWalk> = new Map();
    private initialPage: Promise<InitialPage> | null = null;

    constructor(url: string, readonly kind: ListingKind = 'videos', options: ChannelListingOptions = {}) {
        this.channelUri = channelUri(url)
        this.channelUrl = channelUrl(this.channelUri)
        this.listingUrl = listingUrl(this.channelUri, kind)
        this.config = options.config ?? loadConfig()
        this.logger = (options.logger ?? createLogger('channel-listing', this.config.logLevel)).child({ channel: this.channelUri, kind })
        this.fetcher = options.fetcher ?? new ChannelPageFetcher({ config: this.config, logger: this.logger })
    }

    /** Canonical reference paths in discovery order, stopping before `until` when given. */
    itemReferences = (until?: string): DeferredList<string> => this.walk(until).references

    async *itemUrls(until?: string): AsyncGenerator<string> {
        for await (const reference of this.itemReferences(until)) {
            yield toWatchUrl(reference)
        }
    }

    /** Fetches every page of the listing. */
    count = (): Promise<number> => this.itemReferences().length()

    status = (until?: string): WalkStatus => this.walks.get(until ?? '')?.walker.status ?? 'pending'

    metadata = async (): Promise<ChannelMetadata | null> => {
        const { data } = await this.loadInitialPage()
        return parseChannelMetadata(data)
    }

    private walk = (until?: string): ListingWalk => {
        const key = until ?? ''
        const cached = this.walks.get(key)
        if (cached && cached.walker.status !== 'failed') return cached

        const source: ListingSource = {
            loadInitialPage: this.loadInitialPage,
            fetchContinuation: (request) => this.fetcher.fetchContinuation(request),
        }
        const walker = new PaginationWalker({
            kind: this.kind,
            source,
            until,
            client: this.config.client,
            userAgent: this.config.userAgent,
            logger: this.logger,
        })
        const walk = { walker, references: new DeferredList(walker.nextBatch) }
        this.walks.set(key, walk)
        return walk
    }

    private loadInitialPage = (): Promise<InitialPage> => {
        if (!this.initialPage) {
            this.initialPage = this.fetcher.fetchInitialPage(this.listingUrl).catch((err: unknown) => {
                this.initialPage = null
                throw err
            })
        }
        return this.initialPage
    }
}
