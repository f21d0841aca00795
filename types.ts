export type ListingKind = 'videos' | 'shorts';

export type ShapeName = 'initial' | 'continuation-legacy' | 'continuation';

export type WalkStatus =
    | 'pending'
    | 'exhausted'       // last page carried no continuation marker
    | 'boundary'        // the boundary item was reached
    | 'unresolvable'    // no known shape matched a page
    | 'truncated'       // trailing entry looked like a marker but carried no token
    | 'failed';         // a fetch rejected

export interface ClientContext {
    clientName: string;
    clientVersion: string;
    hl: string;
    gl: string;
}

export interface ContinuationRequestBody {
    context: {
        client: ClientContext;
    };
    continuation: string;
}

export interface ContinuationRequest {
    url: string;
    headers: Record<string, string>;
    body: ContinuationRequestBody;
}

export interface InitialPage {
    data: unknown;
    client: Partial<ClientContext>;
}

export interface ResolvedEntries {
    shape: ShapeName;
    entries: unknown[];
}

export interface ContinuationSplit {
    entries: unknown[];
    continuation: string | null;
    markerUnrecognized: boolean;
}

export interface PageExtraction {
    shape: ShapeName;
    references: string[];
    continuation: string | null;
    markerUnrecognized: boolean;
    dropped: number;
}

/** Where a walker reads its pages from. */
export interface ListingSource {
    loadInitialPage: () => Promise<InitialPage>;
    fetchContinuation: (request: ContinuationRequest) => Promise<unknown>;
}

/** Transport collaborator used by a channel listing. */
export interface PageFetcher {
    fetchInitialPage: (url: string) => Promise<InitialPage>;
    fetchContinuation: (request: ContinuationRequest) => Promise<unknown>;
}

export interface ChannelConfig {
    client: ClientContext;
    requestTimeoutMs: number;
    userAgent: string;
    logLevel: string;
}

export interface ChannelMetadata {
    channelName: string;
    channelId: string;
    vanityUrl: string | null;
    description: string | null;
    avatarUrl: string | null;
    keywords: string[];
    urls: string[];
    emails: string[];
}

export interface ChannelCollection {
    url: string;
    references: string[];
    status: WalkStatus;
    error?: string;
}
