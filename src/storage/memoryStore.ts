import { AlreadyExistsError, VersionConflictError } from "../errors";
import type { ItemKey, KeyValueStore, StoredItem } from "./store";

type Cell = { value: unknown; version: number };

// Each call yields once before touching state, the way a network round-trip
// would, so concurrent callers interleave between their reads and writes.
const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

export class MemoryStore implements KeyValueStore {
    private partitions = new Map<string, Map<string, Cell>>();

    async get(key: ItemKey): Promise<StoredItem | undefined> {
        await tick();
        const cell = this.cell(key);
        return cell ? this.snapshot(key, cell) : undefined;
    }

    async put(key: ItemKey, value: unknown): Promise<StoredItem> {
        await tick();
        const prev = this.cell(key);
        return this.write(key, value, (prev?.version ?? 0) + 1);
    }

    async conditionalPut(key: ItemKey, value: unknown): Promise<StoredItem> {
        await tick();
        if (this.cell(key)) throw new AlreadyExistsError(key);
        return this.write(key, value, 1);
    }

    async conditionalUpdate(key: ItemKey, value: unknown, expectedVersion: number): Promise<StoredItem> {
        await tick();
        const prev = this.cell(key);
        if (!prev || prev.version !== expectedVersion) {
            throw new VersionConflictError(key, expectedVersion, prev?.version);
        }
        return this.write(key, value, prev.version + 1);
    }

    async *queryByPartition(partition: string): AsyncIterable<StoredItem> {
        await tick();
        const rows = this.partitions.get(partition);
        if (!rows) return;
        const sorts = [...rows.keys()].sort();
        for (const sort of sorts) {
            const cell = rows.get(sort);
            if (cell) yield this.snapshot({ partition, sort }, cell);
        }
    }

    /** Number of items currently held; used by tests and diagnostics. */
    size(): number {
        let n = 0;
        for (const rows of this.partitions.values()) n += rows.size;
        return n;
    }

    private cell(key: ItemKey): Cell | undefined {
        return this.partitions.get(key.partition)?.get(key.sort);
    }

    private write(key: ItemKey, value: unknown, version: number): StoredItem {
        let rows = this.partitions.get(key.partition);
        if (!rows) {
            rows = new Map();
            this.partitions.set(key.partition, rows);
        }
        const cell: Cell = { value: structuredClone(value), version };
        rows.set(key.sort, cell);
        return this.snapshot(key, cell);
    }

    private snapshot(key: ItemKey, cell: Cell): StoredItem {
        return { key: { ...key }, value: structuredClone(cell.value), version: cell.version };
    }
}
