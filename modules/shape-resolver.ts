import { z } from 'zod';
import type { ListingKind, ResolvedEntries, ShapeName } from '../types';
import { LISTING_TAB_INDEX } from '../datas/constants';

export interface ShapePattern {
    name: ShapeName;
    match: (raw: unknown) => unknown[] | null;
}

const EntriesSchema = z.array(z.unknown())

const BrowseResultsSchema = z.object({
    contents: z.object({
        twoColumnBrowseResultsRenderer: z.object({
            tabs: z.array(z.unknown()),
        }),
    }),
})

const GridTabSchema = z.object({
    tabRenderer: z.object({
        content: z.object({
            richGridRenderer: z.object({
                contents: EntriesSchema,
            }),
        }),
    }),
})

const AppendActionSchema = z.object({
    appendContinuationItemsAction: z.object({
        continuationItems: EntriesSchema,
    }),
})

// only the first received action is inspected
const ContinuationResponseSchema = z.object({
    onResponseReceivedActions: z.tuple([AppendActionSchema]).rest(z.unknown()),
})

const LegacyContinuationResponseSchema = z.tuple([
    z.unknown(),
    z.object({ response: ContinuationResponseSchema }),
]).rest(z.unknown())

const initialPattern = (tabIndex: number): ShapePattern => ({
    name: 'initial',
    match: (raw) => {
        const browse = BrowseResultsSchema.safeParse(raw)
        if (!browse.success) return null
        const tab = GridTabSchema.safeParse(browse.data.contents.twoColumnBrowseResultsRenderer.tabs[tabIndex])
        return tab.success ? tab.data.tabRenderer.content.richGridRenderer.contents : null
    },
})

const legacyContinuationPattern: ShapePattern = {
    name: 'continuation-legacy',
    match: (raw) => {
        const parsed = LegacyContinuationResponseSchema.safeParse(raw)
        if (!parsed.success) return null
        return parsed.data[1].response.onResponseReceivedActions[0].appendContinuationItemsAction.continuationItems
    },
}

const continuationPattern: ShapePattern = {
    name: 'continuation',
    match: (raw) => {
        const parsed = ContinuationResponseSchema.safeParse(raw)
        if (!parsed.success) return null
        return parsed.data.onResponseReceivedActions[0].appendContinuationItemsAction.continuationItems
    },
}

/**
 * Known layouts of a listing page, in the order they are tried.
 *
 * The initial page embedded in the HTML nests the grid under the listing's tab;
 * "load more" responses come either wrapped in an indexed array with a `response`
 * key (older front end) or as a bare object.
 */
export const createShapePatterns = (kind: ListingKind): ShapePattern[] => [
    initialPattern(LISTING_TAB_INDEX[kind]),
    legacyContinuationPattern,
    continuationPattern,
]

export const resolveEntries = (
    raw: unknown,
    kind: ListingKind,
    patterns: ShapePattern[] = createShapePatterns(kind),
): ResolvedEntries | null => {
    for (const pattern of patterns) {
        const entries = pattern.match(raw)
        if (entries) return { shape: pattern.name, entries }
    }
    return null
}
