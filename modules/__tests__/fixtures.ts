import { vi } from 'vitest';
import pino from 'pino';
import type { ContinuationRequest, InitialPage, ListingKind } from '../../types';
import { LISTING_TAB_INDEX } from '../../datas/constants';

export const silentLogger = pino({ level: 'silent' })

export const videoEntry = (videoId: string) => ({
    richItemRenderer: {
        content: {
            videoRenderer: {
                videoId,
                title: { runs: [{ text: `video ${videoId}` }] },
            },
        },
    },
})

export const shortsEntry = (videoId: string, url: string = `/shorts/${videoId}`) => ({
    richItemRenderer: {
        content: {
            shortsLockupViewModel: {
                entityId: `shorts-shelf-item-${videoId}`,
                onTap: {
                    innertubeCommand: {
                        commandMetadata: { webCommandMetadata: { url } },
                    },
                },
            },
        },
    },
})

export const continuationEntry = (token: string) => ({
    continuationItemRenderer: {
        trigger: 'CONTINUATION_TRIGGER_ON_ITEM_SHOWN',
        continuationEndpoint: {
            continuationCommand: { token, request: 'CONTINUATION_REQUEST_TYPE_BROWSE' },
        },
    },
})

export const videoEntries = (ids: string[], token?: string): unknown[] =>
    [...ids.map(id => videoEntry(id)), ...(token ? [continuationEntry(token)] : [])]

export const shortsEntries = (ids: string[], token?: string): unknown[] =>
    [...ids.map(id => shortsEntry(id)), ...(token ? [continuationEntry(token)] : [])]

export const initialPage = (entries: unknown[], kind: ListingKind = 'videos') => {
    const tabs: unknown[] = [
        { tabRenderer: { title: 'Home' } },
        { tabRenderer: { title: 'Videos' } },
        { tabRenderer: { title: 'Shorts' } },
    ]
    tabs[LISTING_TAB_INDEX[kind]] = {
        tabRenderer: {
            title: kind,
            selected: true,
            content: { richGridRenderer: { contents: entries } },
        },
    }
    return { contents: { twoColumnBrowseResultsRenderer: { tabs } } }
}

export const continuationPage = (entries: unknown[]) => ({
    onResponseReceivedActions: [
        { appendContinuationItemsAction: { targetId: 'browse-feed', continuationItems: entries } },
    ],
})

export const legacyContinuationPage = (entries: unknown[]) => [
    { page: 'browse' },
    { response: continuationPage(entries) },
]

/** Listing source serving `initial` first, then continuation pages keyed by token. */
export const fakeSource = (initial: unknown, pages: Record<string, unknown> = {}, client: InitialPage['client'] = {}) => ({
    loadInitialPage: vi.fn(async (): Promise<InitialPage> => ({ data: initial, client })),
    fetchContinuation: vi.fn(async (request: ContinuationRequest): Promise<unknown> => {
        const token = request.body.continuation
        if (!(token in pages)) throw new Error(`unexpected continuation ${token}`)
        return pages[token]
    }),
})

/** Page fetcher with the same behavior, for channel listings. */
export const fakeFetcher = (initial: unknown, pages: Record<string, unknown> = {}) => {
    const source = fakeSource(initial, pages)
    return {
        fetchInitialPage: vi.fn(async (_url: string): Promise<InitialPage> => source.loadInitialPage()),
        fetchContinuation: source.fetchContinuation,
    }
}
