import axios, { isAxiosError, type AxiosInstance } from 'axios'
import * as cheerio from 'cheerio'
import { z } from 'zod';
import type { ChannelConfig, ClientContext, ContinuationRequest, InitialPage, PageFetcher } from '../types';
import { CLIENT_VERSION_REGEX } from '../datas/constants';
import { loadConfig } from './config';
import { logger as defaultLogger, type Logger } from './logger';

const ServiceTrackingSchema = z.object({
    responseContext: z.object({
        serviceTrackingParams: z.array(z.object({
            service: z.string(),
            params: z.array(z.object({ key: z.string(), value: z.string() })).default([]),
        })),
    }),
})

const INITIAL_DATA_ASSIGNMENT = /^\s*(?:var\s+\w+|window\[['"]\w+['"]\])\s*=\s*/

/**
 * Parses the `ytInitialData` state embedded in a page's script tag.
 * Returns `null` when the page has no such script; throws `SyntaxError` when its payload is not JSON.
 */
export const extractInitialData = (html: string): unknown => {
    const $ = cheerio.load(html)
    const scriptEl = $('script')
        .toArray()
        .find(el => $(el).text().slice(0, 100).includes('ytInitialData'))
    if (!scriptEl) return null

    const scriptJson = $(scriptEl).text().replace(INITIAL_DATA_ASSIGNMENT, '').trim().replace(/;$/, '')
    return JSON.parse(scriptJson)
}

/** Client name and version the page was rendered for, as reported in its CSI tracking params. */
export const extractClientContext = (initialData: unknown, html: string = ''): Partial<ClientContext> => {
    const tracking = ServiceTrackingSchema.safeParse(initialData)
    const csiParams = tracking.success
        ? tracking.data.responseContext.serviceTrackingParams.find(x => x.service === 'CSI')?.params ?? []
        : []

    const clientName = csiParams.find(x => x.key === 'c')?.value
    const clientVersion = csiParams.find(x => x.key === 'cver')?.value ?? html.match(CLIENT_VERSION_REGEX)?.[1]

    const client: Partial<ClientContext> = {}
    if (clientName) client.clientName = clientName
    if (clientVersion) client.clientVersion = clientVersion
    return client
}

export interface ChannelPageFetcherOptions {
    config?: ChannelConfig;
    http?: AxiosInstance;
    logger?: Logger;
}

/**
 * Fetches listing pages over axios. The configured timeout, user agent and
 * language go on every request, so an injected `http` instance gets them too.
 */
export default class ChannelPageFetcher implements PageFetcher {
    private http: AxiosInstance;
    private logger: Logger;
    private timeout: number;
    private headers: Record<string, string>;

    constructor(options: ChannelPageFetcherOptions = {}) {
        const config = options.config ?? loadConfig()
        this.logger = options.logger ?? defaultLogger.child({ module: 'channel-page-fetcher' })
        this.http = options.http ?? axios.create()
        this.timeout = config.requestTimeoutMs
        this.headers = {
            'User-Agent': config.userAgent,
            'Accept-Language': `${config.client.hl},en;q=0.9`,
        }
    }

    fetchInitialPage = async (url: string): Promise<InitialPage> => {
        const html = await this.fetchHtml(url)
        const data = this.parseInitialData(html, url)
        return { data, client: extractClientContext(data, html) }
    }

    fetchContinuation = async (request: ContinuationRequest): Promise<unknown> => {
        try {
            const { data } = await this.http.post<unknown>(request.url, request.body, {
                timeout: this.timeout,
                headers: { ...this.headers, ...request.headers },
            })
            return typeof data === 'string' ? this.parseResponseBody(data, request.url) : data
        } catch (err) {
            this.logFailure(err, request.url)
            throw err
        }
    }

    private fetchHtml = async (url: string): Promise<string> => {
        try {
            const { data } = await this.http.get<string>(url, { responseType: 'text', timeout: this.timeout, headers: this.headers })
            return data
        } catch (err) {
            this.logFailure(err, url)
            throw err
        }
    }

    private parseInitialData = (html: string, url: string): unknown => {
        try {
            const data = extractInitialData(html)
            if (data === null) this.logger.warn({ url }, 'ytInitialData script not found')
            return data
        } catch (err) {
            this.logger.warn({ err, url }, 'ytInitialData is not valid JSON')
            return null
        }
    }

    private parseResponseBody = (body: string, url: string): unknown => {
        try {
            return JSON.parse(body)
        } catch (err) {
            this.logger.warn({ err, url }, 'continuation response is not valid JSON')
            return null
        }
    }

    private logFailure = (err: unknown, url: string) => {
        if (isAxiosError(err)) this.logger.error({ url, status: err.response?.status, code: err.code }, err.message)
        else this.logger.error({ err, url }, 'request failed')
    }
}
