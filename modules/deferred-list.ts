export type BatchProducer<T> = () => Promise<T[] | null>;

/**
 * Append-only list filled batch by batch from a producer, only as far as it is read.
 *
 * Items are cached once produced, so iterating again or indexing never asks the
 * producer twice for the same batch. Pulls are serialized: several consumers may
 * read the list at once and they all see the same items in the same order.
 */
export default class DeferredList<T> implements AsyncIterable<T> {
    private readonly items: T[] = [];
    private complete = false;
    private pending: Promise<boolean> | null = null;

    constructor(private readonly produce: BatchProducer<T>) {}

    get materialized(): readonly T[] {
        return this.items
    }

    get isComplete(): boolean {
        return this.complete
    }

    /** Item at `index`, fetching pages until it exists. Negative indices count from the end of the full list. */
    at = async (index: number): Promise<T | undefined> => {
        if (index < 0) {
            await this.drain()
            return this.items.at(index)
        }
        while (this.items.length <= index) {
            if (!(await this.pull())) break
        }
        return this.items[index]
    }

    /** Total item count; fetches every remaining page. */
    length = async (): Promise<number> => {
        await this.drain()
        return this.items.length
    }

    toArray = async (): Promise<T[]> => {
        await this.drain()
        return [...this.items]
    }

    async *[Symbol.asyncIterator](): AsyncGenerator<T> {
        let position = 0
        while (true) {
            if (position < this.items.length) {
                yield this.items[position++]
                continue
            }
            if (!(await this.pull())) return
        }
    }

    private drain = async () => {
        let more = await this.pull()
        while (more) more = await this.pull()
    }

    // resolves to false once the producer is exhausted
    private pull = (): Promise<boolean> => {
        if (this.complete) return Promise.resolve(false)
        if (!this.pending) {
            this.pending = this.produceBatch().finally(() => {
                this.pending = null
            })
        }
        return this.pending
    }

    private produceBatch = async (): Promise<boolean> => {
        const batch = await this.produce()
        if (batch === null) {
            this.complete = true
            return false
        }
        this.items.push(...batch)
        return true
    }
}
