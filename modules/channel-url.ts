import type { ListingKind } from '../types';
import { YOUTUBE_BASE_URL } from '../datas/constants';

export class ChannelUrlError extends Error {
    constructor(readonly input: string) {
        super(`Unrecognized channel URL: ${input}`)
        this.name = 'ChannelUrlError'
    }
}

const CHANNEL_URI_PATTERNS: RegExp[] = [
    /\/(c)\/([%\w-]+)(\/.*)?/,
    /\/(channel)\/([%\w-]+)(\/.*)?/,
    /\/(u)\/([%\w-]+)(\/.*)?/,
    /\/(user)\/([%\w-]+)(\/.*)?/,
]
const HANDLE_PATTERN = /\/@([%\w.-]+)(\/.*)?/
const CHANNEL_ID_PATTERN = /^UC[\w-]{22}$/

/**
 * Normalizes a channel URL, handle (`@name`) or channel id (`UC...`) to the
 * channel's path, e.g. `/channel/UC...`, `/c/name` or `/@handle`.
 */
export const channelUri = (input: string): string => {
    const value = input.trim()
    if (/^@[%\w.-]+$/.test(value)) return `/${value}`
    if (CHANNEL_ID_PATTERN.test(value)) return `/channel/${value}`

    for (const pattern of CHANNEL_URI_PATTERNS) {
        const matched = value.match(pattern)
        if (matched) return `/${matched[1]}/${matched[2]}`
    }
    const handle = value.match(HANDLE_PATTERN)
    if (handle) return `/@${handle[1]}`

    throw new ChannelUrlError(input)
}

export const channelUrl = (uri: string): string => `${YOUTUBE_BASE_URL}${uri}`

export const listingUrl = (uri: string, kind: ListingKind): string => `${channelUrl(uri)}/${kind}`

export const toWatchUrl = (reference: string): string => `${YOUTUBE_BASE_URL}${reference}`
