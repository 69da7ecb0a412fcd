/**
 * Key-value store capability the ledger and services are written against.
 *
 * Every call is atomic for a single item and nothing more: there is no
 * multi-item transaction, so callers build consistency out of the two
 * conditional writes below.
 */

export type ItemKey = {
    partition: string;
    sort: string;
};

export type StoredItem = {
    key: ItemKey;
    value: unknown;
    /** Starts at 1 on creation and increases by one on every write. */
    version: number;
};

export interface KeyValueStore {
    get(key: ItemKey): Promise<StoredItem | undefined>;

    /** Unconditional write. Reserved for seeding and first writes. */
    put(key: ItemKey, value: unknown): Promise<StoredItem>;

    /** Writes only if the key is absent; rejects with AlreadyExistsError otherwise. */
    conditionalPut(key: ItemKey, value: unknown): Promise<StoredItem>;

    /** Writes only if the stored version equals expectedVersion; rejects with VersionConflictError otherwise. */
    conditionalUpdate(key: ItemKey, value: unknown, expectedVersion: number): Promise<StoredItem>;

    /** Items of one partition in sort-key order. */
    queryByPartition(partition: string): AsyncIterable<StoredItem>;
}
