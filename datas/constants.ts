import appRootPath from 'app-root-path';
import type { ListingKind } from '../types';

export const ENV_FILE_PATH = `${appRootPath}/env/.env`

export const YOUTUBE_BASE_URL = 'https://www.youtube.com'
export const BROWSE_API_URL = `${YOUTUBE_BASE_URL}/youtubei/v1/browse`

export const DEFAULT_CLIENT_NAME = 'WEB'
export const DEFAULT_CLIENT_VERSION = '2.20250331.01.00'
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/139.0.0.0 Safari/537.36'
export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000

// numeric ids sent in X-YouTube-Client-Name
export const CLIENT_NAME_IDS: Record<string, string> = {
    WEB: '1',
    MWEB: '2',
    ANDROID: '3',
    IOS: '5',
}

// position of each listing's tab inside twoColumnBrowseResultsRenderer.tabs
export const LISTING_TAB_INDEX: Record<ListingKind, number> = {
    videos: 1,
    shorts: 2,
}

export const MAX_CONCURRENT_CHANNELS = 4

export const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g
export const URL_REGEX = /https?:\/\/(?:www\.)?[-a-zA-Z0-9@:%._+~#=]{1,256}\.[a-zA-Z0-9()]{1,6}\b(?:[-a-zA-Z0-9()@:%_+.~#?&/=]*)/g
export const CLIENT_VERSION_REGEX = /"INNERTUBE_CLIENT_VERSION":"([^"]+)"/
