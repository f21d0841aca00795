/** Drops repeated items, keeping the first occurrence of each in its original position. */
export const uniqueify = <T>(items: readonly T[]): T[] => {
    const seen: Set<T> = new Set()
    return items.filter(item => {
        if (seen.has(item)) return false
        seen.add(item)
        return true
    })
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value)
