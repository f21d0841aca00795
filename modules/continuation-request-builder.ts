import type { ClientContext, ContinuationRequest } from '../types';
import {
    BROWSE_API_URL,
    CLIENT_NAME_IDS,
    DEFAULT_CLIENT_NAME,
    DEFAULT_CLIENT_VERSION,
    DEFAULT_USER_AGENT,
} from '../datas/constants';

export const DEFAULT_CLIENT: ClientContext = {
    clientName: DEFAULT_CLIENT_NAME,
    clientVersion: DEFAULT_CLIENT_VERSION,
    hl: 'en',
    gl: 'US',
}

export const buildContinuationRequest = (
    token: string,
    client: ClientContext = DEFAULT_CLIENT,
    userAgent: string = DEFAULT_USER_AGENT,
): ContinuationRequest => {
    const headers: Record<string, string> = {
        'Content-Type': 'application/json',
        'User-Agent': userAgent,
        'X-YouTube-Client-Version': client.clientVersion,
    }
    const clientNameId = CLIENT_NAME_IDS[client.clientName]
    if (clientNameId) headers['X-YouTube-Client-Name'] = clientNameId

    return {
        url: `${BROWSE_API_URL}?prettyPrint=false`,
        headers,
        body: {
            context: {
                client: { ...client },
            },
            continuation: token,
        },
    }
}
