import type { ListingKind, PageExtraction } from '../types';
import { resolveEntries } from './shape-resolver';
import { splitContinuation } from './continuation-extractor';
import { mapEntry } from './item-id-mapper';
import { uniqueify } from './utils';

/**
 * Pulls the item references and the continuation token out of one raw page.
 * Returns `null` when no known layout matches.
 */
export const extractPage = (raw: unknown, kind: ListingKind): PageExtraction | null => {
    const resolved = resolveEntries(raw, kind)
    if (!resolved) return null

    const { entries, continuation, markerUnrecognized } = splitContinuation(resolved.entries)
    const references = entries
        .map(entry => mapEntry(entry, kind))
        .filter((reference): reference is string => reference !== null)

    return {
        shape: resolved.shape,
        references: uniqueify(references),
        continuation,
        markerUnrecognized,
        dropped: entries.length - references.length,
    }
}
