import { z } from 'zod';
import type { ChannelMetadata } from '../types';
import { EMAIL_REGEX, URL_REGEX } from '../datas/constants';
import { uniqueify } from './utils';

const ChannelMetadataRendererSchema = z.object({
    metadata: z.object({
        channelMetadataRenderer: z.object({
            title: z.string(),
            externalId: z.string(),
            vanityChannelUrl: z.string().optional(),
            description: z.string().optional(),
            avatar: z.object({
                thumbnails: z.array(z.object({ url: z.string() })),
            }).optional(),
        }),
    }),
})

const MicroformatSchema = z.object({
    microformat: z.object({
        microformatDataRenderer: z.object({
            tags: z.array(z.string()),
        }),
    }),
})

export const findUrls = (text: string): string[] => uniqueify(text.match(URL_REGEX) ?? [])

export const findEmails = (text: string): string[] =>
    uniqueify((text.match(EMAIL_REGEX) ?? []).filter(email => !email.startsWith('http')))

/** Reads the channel header fields from a listing page's initial data; `null` when the page has no channel metadata. */
export const parseChannelMetadata = (initialData: unknown): ChannelMetadata | null => {
    const parsed = ChannelMetadataRendererSchema.safeParse(initialData)
    if (!parsed.success) return null

    const renderer = parsed.data.metadata.channelMetadataRenderer
    const microformat = MicroformatSchema.safeParse(initialData)
    const description = renderer.description || null

    return {
        channelName: renderer.title,
        channelId: renderer.externalId,
        vanityUrl: renderer.vanityChannelUrl ?? null,
        description,
        avatarUrl: renderer.avatar?.thumbnails.at(-1)?.url ?? null,
        keywords: microformat.success ? microformat.data.microformat.microformatDataRenderer.tags : [],
        urls: description ? findUrls(description) : [],
        emails: description ? findEmails(description) : [],
    }
}
