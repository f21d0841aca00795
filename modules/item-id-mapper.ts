import { z } from 'zod';
import type { ListingKind } from '../types';

const VideoEntrySchema = z.object({
    richItemRenderer: z.object({
        content: z.object({
            videoRenderer: z.object({ videoId: z.string().min(1) }),
        }),
    }),
})

const shortsLockup = <T extends z.ZodTypeAny>(innertubeCommand: T) => z.object({
    richItemRenderer: z.object({
        content: z.object({
            shortsLockupViewModel: z.object({
                onTap: z.object({ innertubeCommand }),
            }),
        }),
    }),
})

const ShortsCommandUrlSchema = shortsLockup(z.object({
    commandMetadata: z.object({
        webCommandMetadata: z.object({ url: z.string().min(1) }),
    }),
}))

const ShortsReelWatchSchema = shortsLockup(z.object({
    reelWatchEndpoint: z.object({ videoId: z.string().min(1) }),
}))

const ReelItemSchema = z.object({
    richItemRenderer: z.object({
        content: z.object({
            reelItemRenderer: z.object({ videoId: z.string().min(1) }),
        }),
    }),
})

type IdMatcher = (entry: unknown) => string | null

const videoMatchers: IdMatcher[] = [
    (entry) => {
        const parsed = VideoEntrySchema.safeParse(entry)
        return parsed.success ? parsed.data.richItemRenderer.content.videoRenderer.videoId : null
    },
]

const shortsMatchers: IdMatcher[] = [
    (entry) => {
        const parsed = ShortsCommandUrlSchema.safeParse(entry)
        if (!parsed.success) return null
        const url = parsed.data.richItemRenderer.content.shortsLockupViewModel.onTap.innertubeCommand.commandMetadata.webCommandMetadata.url
        return url.split('?')[0].split('/').at(-1) || null
    },
    (entry) => {
        const parsed = ShortsReelWatchSchema.safeParse(entry)
        return parsed.success
            ? parsed.data.richItemRenderer.content.shortsLockupViewModel.onTap.innertubeCommand.reelWatchEndpoint.videoId
            : null
    },
    (entry) => {
        const parsed = ReelItemSchema.safeParse(entry)
        return parsed.success ? parsed.data.richItemRenderer.content.reelItemRenderer.videoId : null
    },
]

const matchersByKind: Record<ListingKind, IdMatcher[]> = {
    videos: videoMatchers,
    shorts: shortsMatchers,
}

export const canonicalReference = (id: string, kind: ListingKind): string =>
    kind === 'videos' ? `/watch?v=${id}` : `/shorts/${id}`

/** `until` may be a canonical path (`/watch?v=...`, `/shorts/...`) or a bare item id. */
export const boundaryReference = (until: string, kind: ListingKind): string =>
    until.startsWith('/') ? until : canonicalReference(until, kind)

/** Maps one listing row to its canonical reference, or `null` when the row has no known item shape. */
export const mapEntry = (entry: unknown, kind: ListingKind): string | null => {
    for (const matcher of matchersByKind[kind]) {
        const id = matcher(entry)
        if (id) return canonicalReference(id, kind)
    }
    return null
}
