import { describe, it, expect } from 'vitest';
import { ChannelUrlError, channelUri, channelUrl, listingUrl, toWatchUrl } from '../channel-url';

describe('channelUri', () => {
    it.each([
        ['https://www.youtube.com/c/ExampleChannel', '/c/ExampleChannel'],
        ['https://www.youtube.com/c/ExampleChannel/videos', '/c/ExampleChannel'],
        ['https://www.youtube.com/channel/UCabcdefghijklmnopqrstuv', '/channel/UCabcdefghijklmnopqrstuv'],
        ['https://www.youtube.com/user/example_user/shorts', '/user/example_user'],
        ['https://youtube.com/u/someone', '/u/someone'],
        ['https://www.youtube.com/@example.handle/videos', '/@example.handle'],
        ['@example-handle', '/@example-handle'],
        ['UCabcdefghijklmnopqrstuv', '/channel/UCabcdefghijklmnopqrstuv'],
        ['  https://m.youtube.com/@example  ', '/@example'],
    ])('normalizes %s', (input, expected) => {
        expect(channelUri(input)).toBe(expected)
    })

    it('rejects input that names no channel', () => {
        expect(() => channelUri('https://www.youtube.com/watch?v=abc')).toThrow(ChannelUrlError)
        expect(() => channelUri('not a channel')).toThrow('Unrecognized channel URL: not a channel')
    })
})

describe('channel urls', () => {
    it('builds absolute channel and listing urls', () => {
        expect(channelUrl('/@example')).toBe('https://www.youtube.com/@example')
        expect(listingUrl('/@example', 'videos')).toBe('https://www.youtube.com/@example/videos')
        expect(listingUrl('/channel/UCabcdefghijklmnopqrstuv', 'shorts')).toBe('https://www.youtube.com/channel/UCabcdefghijklmnopqrstuv/shorts')
    })

    it('turns a reference into a watch url', () => {
        expect(toWatchUrl('/watch?v=abc')).toBe('https://www.youtube.com/watch?v=abc')
        expect(toWatchUrl('/shorts/xyz')).toBe('https://www.youtube.com/shorts/xyz')
    })
})
