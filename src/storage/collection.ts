import type { z } from "zod";
import { InvalidRecordError } from "../errors";
import type { ItemKey, KeyValueStore, StoredItem } from "./store";

export type Versioned<T> = {
    key: ItemKey;
    value: T;
    version: number;
};

/** One record family over the raw store, validated with its schema on every read. */
export class Collection<T> {
    constructor(
        private readonly store: KeyValueStore,
        private readonly family: string,
        private readonly schema: z.ZodType<T>
    ) {}

    async get(key: ItemKey): Promise<Versioned<T> | undefined> {
        const item = await this.store.get(key);
        return item ? this.decode(item) : undefined;
    }

    async put(key: ItemKey, value: T): Promise<Versioned<T>> {
        return this.decode(await this.store.put(key, value));
    }

    async create(key: ItemKey, value: T): Promise<Versioned<T>> {
        return this.decode(await this.store.conditionalPut(key, value));
    }

    async update(key: ItemKey, value: T, expectedVersion: number): Promise<Versioned<T>> {
        return this.decode(await this.store.conditionalUpdate(key, value, expectedVersion));
    }

    async list(partition: string): Promise<Versioned<T>[]> {
        const out: Versioned<T>[] = [];
        for await (const item of this.store.queryByPartition(partition)) {
            out.push(this.decode(item));
        }
        return out;
    }

    private decode(item: StoredItem): Versioned<T> {
        const parsed = this.schema.safeParse(item.value);
        if (!parsed.success) {
            throw new InvalidRecordError(this.family, item.key, parsed.error.issues[0]?.message ?? "unknown");
        }
        return { key: item.key, value: parsed.data, version: item.version };
    }
}
