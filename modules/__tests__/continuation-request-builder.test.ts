import { describe, it, expect } from 'vitest';
import { buildContinuationRequest, DEFAULT_CLIENT } from '../continuation-request-builder';
import { DEFAULT_USER_AGENT } from '../../datas/constants';

describe('buildContinuationRequest', () => {
    it('describes a POST to the browse endpoint carrying the token', () => {
        expect(buildContinuationRequest('T1')).toEqual({
            url: 'https://www.youtube.com/youtubei/v1/browse?prettyPrint=false',
            headers: {
                'Content-Type': 'application/json',
                'User-Agent': DEFAULT_USER_AGENT,
                'X-YouTube-Client-Version': '2.20250331.01.00',
                'X-YouTube-Client-Name': '1',
            },
            body: {
                context: {
                    client: { clientName: 'WEB', clientVersion: '2.20250331.01.00', hl: 'en', gl: 'US' },
                },
                continuation: 'T1',
            },
        })
    })

    it('identifies the client it was given', () => {
        const client = { clientName: 'ANDROID', clientVersion: '19.29.37', hl: 'ko', gl: 'KR' }
        const request = buildContinuationRequest('T2', client, 'test-agent')
        expect(request.headers['X-YouTube-Client-Name']).toBe('3')
        expect(request.headers['X-YouTube-Client-Version']).toBe('19.29.37')
        expect(request.headers['User-Agent']).toBe('test-agent')
        expect(request.body.context.client).toEqual(client)
        expect(request.body.context.client).not.toBe(client)
    })

    it('leaves out the numeric client name when it is not known', () => {
        const request = buildContinuationRequest('T3', { ...DEFAULT_CLIENT, clientName: 'TVHTML5_TEST' })
        expect(request.headers).not.toHaveProperty('X-YouTube-Client-Name')
    })

    it('is deterministic', () => {
        expect(buildContinuationRequest('T4')).toEqual(buildContinuationRequest('T4'))
    })
})
