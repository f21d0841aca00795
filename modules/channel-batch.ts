import pLimit from 'p-limit';
import type { ChannelCollection, ListingKind } from '../types';
import { MAX_CONCURRENT_CHANNELS } from '../datas/constants';
import ChannelListing, { type ChannelListingOptions } from './channel-listing';
import { logger as defaultLogger } from './logger';

export interface CollectOptions extends ChannelListingOptions {
    concurrency?: number;
    until?: string;
}

/**
 * Walks several channels at once. Each channel is still paginated page by page;
 * a channel that fails is reported with its error instead of failing the batch.
 */
export const collectChannelReferences = async (
    urls: string[],
    kind: ListingKind = 'videos',
    options: CollectOptions = {},
): Promise<ChannelCollection[]> => {
    const { concurrency = MAX_CONCURRENT_CHANNELS, until, ...listingOptions } = options
    const logger = listingOptions.logger ?? defaultLogger
    const limit = pLimit(concurrency)

    return Promise.all(urls.map(url => limit(async (): Promise<ChannelCollection> => {
        try {
            const listing = new ChannelListing(url, kind, listingOptions)
            const references = await listing.itemReferences(until).toArray()
            return { url, references, status: listing.status(until) }
        } catch (err) {
            logger.error({ err, url }, 'channel collection failed')
            return { url, references: [], status: 'failed', error: err instanceof Error ? err.message : String(err) }
        }
    })))
}
