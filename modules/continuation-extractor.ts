import { z } from 'zod';
import type { ContinuationSplit } from '../types';
import { isRecord } from './utils';

const ContinuationMarkerSchema = z.object({
    continuationItemRenderer: z.object({
        continuationEndpoint: z.object({
            continuationCommand: z.object({
                token: z.string().min(1),
            }),
        }),
    }),
})

/**
 * Splits the trailing continuation marker off a page of entries.
 *
 * Only the last entry is inspected. The marker does not look like an item, so
 * it has to go before entries are mapped to references.
 */
export const splitContinuation = (entries: unknown[]): ContinuationSplit => {
    const last = entries.at(-1)
    const marker = ContinuationMarkerSchema.safeParse(last)
    if (marker.success) {
        return {
            entries: entries.slice(0, -1),
            continuation: marker.data.continuationItemRenderer.continuationEndpoint.continuationCommand.token,
            markerUnrecognized: false,
        }
    }
    return {
        entries,
        continuation: null,
        markerUnrecognized: isRecord(last) && 'continuationItemRenderer' in last,
    }
}
