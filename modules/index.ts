import ChannelListing from './channel-listing';
import ChannelPageFetcher from './channel-page-fetcher';
import PaginationWalker from './pagination-walker';
import DeferredList from './deferred-list';

export { resolveEntries, createShapePatterns } from './shape-resolver';
export { splitContinuation } from './continuation-extractor';
export { mapEntry, canonicalReference, boundaryReference } from './item-id-mapper';
export { buildContinuationRequest, DEFAULT_CLIENT } from './continuation-request-builder';
export { extractPage } from './page-extractor';
export { extractInitialData, extractClientContext } from './channel-page-fetcher';
export { parseChannelMetadata, findUrls, findEmails } from './channel-metadata';
export { channelUri, channelUrl, listingUrl, toWatchUrl, ChannelUrlError } from './channel-url';
export { collectChannelReferences } from './channel-batch';
export { mergeClientContext } from './pagination-walker';
export { loadConfig } from './config';
export { createLogger } from './logger';
export { uniqueify } from './utils';

export type {
    ListingKind,
    WalkStatus,
    ClientContext,
    ContinuationRequest,
    InitialPage,
    PageExtraction,
    ListingSource,
    PageFetcher,
    ChannelConfig,
    ChannelMetadata,
    ChannelCollection,
} from '../types';

export { ChannelListing, ChannelPageFetcher, PaginationWalker, DeferredList }

export const Services = {
    ChannelListing, ChannelPageFetcher, PaginationWalker, DeferredList
}
