import { describe, it, expect } from 'vitest';
import { boundaryReference, canonicalReference, mapEntry } from '../item-id-mapper';
import { continuationEntry, shortsEntry, videoEntry } from './fixtures';

describe('mapEntry', () => {
    it('maps a video row to its watch path', () => {
        expect(mapEntry(videoEntry('abc'), 'videos')).toBe('/watch?v=abc')
    })

    it('maps a shorts lockup to its shorts path', () => {
        expect(mapEntry(shortsEntry('xyz'), 'shorts')).toBe('/shorts/xyz')
    })

    it('drops the query string of a shorts command url', () => {
        expect(mapEntry(shortsEntry('xyz', '/shorts/xyz?feature=share'), 'shorts')).toBe('/shorts/xyz')
    })

    it('falls back to the reel watch endpoint of a shorts lockup', () => {
        const entry = {
            richItemRenderer: {
                content: {
                    shortsLockupViewModel: {
                        onTap: { innertubeCommand: { reelWatchEndpoint: { videoId: 'r1' } } },
                    },
                },
            },
        }
        expect(mapEntry(entry, 'shorts')).toBe('/shorts/r1')
    })

    it('maps an older reel item row', () => {
        const entry = { richItemRenderer: { content: { reelItemRenderer: { videoId: 'r2' } } } }
        expect(mapEntry(entry, 'shorts')).toBe('/shorts/r2')
    })

    it('does not map rows of the other listing kind', () => {
        expect(mapEntry(videoEntry('abc'), 'shorts')).toBeNull()
        expect(mapEntry(shortsEntry('xyz'), 'videos')).toBeNull()
    })

    it.each([
        ['null', null],
        ['an empty object', {}],
        ['a numeric video id', { richItemRenderer: { content: { videoRenderer: { videoId: 7 } } } }],
        ['an empty video id', { richItemRenderer: { content: { videoRenderer: { videoId: '' } } } }],
        ['a continuation marker', continuationEntry('T1')],
    ])('returns null for %s', (_label, entry) => {
        expect(mapEntry(entry, 'videos')).toBeNull()
    })
})

describe('boundaryReference', () => {
    it('builds the canonical path from an item id', () => {
        expect(boundaryReference('b', 'videos')).toBe('/watch?v=b')
        expect(boundaryReference('b', 'shorts')).toBe('/shorts/b')
    })

    it('keeps a canonical path as it is', () => {
        expect(boundaryReference('/shorts/x', 'videos')).toBe('/shorts/x')
        expect(canonicalReference('x', 'shorts')).toBe('/shorts/x')
    })
})
