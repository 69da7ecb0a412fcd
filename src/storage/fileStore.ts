import { promises as fs } from "fs";
import * as path from "path";
import { z } from "zod";
import { AlreadyExistsError, StoreUnavailableError, VersionConflictError, errorMessage } from "../errors";
import { withLock } from "../locking";
import { logger } from "../logger";
import type { ItemKey, KeyValueStore, StoredItem } from "./store";

type Cell = { value: unknown; version: number };
type Table = Map<string, Map<string, Cell>>;

const EnvelopeSchema = z.object({
    version: z.literal(1),
    items: z.unknown(),
    updatedAt: z.string(),
});

const CellSchema = z.object({ value: z.unknown(), version: z.number().int().positive() });

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Walked by hand: keys are arbitrary ids, "__proto__" included, and must come
// back as own entries.
function decodeTable(items: unknown): Table {
    if (!isObject(items)) throw new Error("items must be an object");
    const table: Table = new Map();
    for (const [partition, rows] of Object.entries(items)) {
        if (!isObject(rows)) throw new Error(`partition ${partition} must be an object`);
        const cells = new Map<string, Cell>();
        for (const [sort, raw] of Object.entries(rows)) {
            const cell = CellSchema.safeParse(raw);
            if (!cell.success) throw new Error(`${partition}/${sort}: ${cell.error.issues[0]?.message ?? "invalid cell"}`);
            cells.set(sort, { value: cell.data.value, version: cell.data.version });
        }
        table.set(partition, cells);
    }
    return table;
}

function encodeTable(table: Table): Record<string, Record<string, Cell>> {
    return Object.fromEntries([...table].map(([partition, rows]) => [partition, Object.fromEntries(rows)] as const));
}

function isMissingFile(e: unknown): boolean {
    return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}

/**
 * JSON-file backed store for single-host deployments and local runs.
 * State is held in memory and rewritten atomically (tmp file + rename)
 * after every mutation; a failed save rolls the mutation back.
 */
export class FileStore implements KeyValueStore {
    private items: Table = new Map();
    private readonly filePath: string;
    private readonly lockKey: string;

    constructor(dataDir: string, stateFile: string) {
        this.filePath = path.join(dataDir, stateFile);
        this.lockKey = `file:${this.filePath}`;
    }

    async init() {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        let raw: string;
        try {
            raw = await fs.readFile(this.filePath, "utf8");
        } catch (e) {
            if (!isMissingFile(e)) throw new StoreUnavailableError("init", e);
            logger.warn("No existing store file; creating new", { file: this.filePath });
            await this.save(this.items);
            return;
        }

        let table: Table;
        try {
            const envelope = EnvelopeSchema.parse(JSON.parse(raw));
            table = decodeTable(envelope.items);
        } catch (e) {
            throw new Error(`Store file ${this.filePath} is malformed: ${errorMessage(e)}`);
        }
        this.items = table;
        logger.info("Store loaded", { file: this.filePath, partitions: table.size });
    }

    async get(key: ItemKey): Promise<StoredItem | undefined> {
        const cell = this.items.get(key.partition)?.get(key.sort);
        return cell ? snapshot(key, cell) : undefined;
    }

    async put(key: ItemKey, value: unknown): Promise<StoredItem> {
        return this.mutate("put", key, (prev) => (prev?.version ?? 0) + 1, value);
    }

    async conditionalPut(key: ItemKey, value: unknown): Promise<StoredItem> {
        return this.mutate("conditionalPut", key, (prev) => {
            if (prev) throw new AlreadyExistsError(key);
            return 1;
        }, value);
    }

    async conditionalUpdate(key: ItemKey, value: unknown, expectedVersion: number): Promise<StoredItem> {
        return this.mutate("conditionalUpdate", key, (prev) => {
            if (!prev || prev.version !== expectedVersion) {
                throw new VersionConflictError(key, expectedVersion, prev?.version);
            }
            return prev.version + 1;
        }, value);
    }

    async *queryByPartition(partition: string): AsyncIterable<StoredItem> {
        const rows = this.items.get(partition);
        if (!rows) return;
        for (const sort of [...rows.keys()].sort()) {
            const cell = rows.get(sort);
            if (cell) yield snapshot({ partition, sort }, cell);
        }
    }

    private async mutate(
        operation: string,
        key: ItemKey,
        nextVersion: (prev: Cell | undefined) => number,
        value: unknown
    ): Promise<StoredItem> {
        return withLock(this.lockKey, async () => {
            const rows = this.items.get(key.partition);
            const prev = rows?.get(key.sort);
            const cell: Cell = { value: structuredClone(value), version: nextVersion(prev) };

            const next: Table = new Map(this.items);
            next.set(key.partition, new Map<string, Cell>(rows).set(key.sort, cell));
            try {
                await this.save(next);
            } catch (e) {
                logger.error("Store save failed", { operation, file: this.filePath, error: errorMessage(e) });
                throw new StoreUnavailableError(operation, e);
            }
            this.items = next;
            return snapshot(key, cell);
        });
    }

    private async save(items: Table) {
        const body = { version: 1, items: encodeTable(items), updatedAt: new Date().toISOString() };
        const tmp = this.filePath + ".tmp";
        await fs.writeFile(tmp, JSON.stringify(body, null, 2), "utf8");
        await fs.rename(tmp, this.filePath);
        logger.debug("Store saved", { file: this.filePath });
    }
}

function snapshot(key: ItemKey, cell: Cell): StoredItem {
    return { key: { ...key }, value: structuredClone(cell.value), version: cell.version };
}
