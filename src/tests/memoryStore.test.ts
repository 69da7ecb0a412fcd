import { describe, it, expect, beforeEach } from "vitest";
import { AlreadyExistsError, VersionConflictError } from "../errors";
import { MemoryStore } from "../storage/memoryStore";

const key = { partition: "p1", sort: "a" };

describe("MemoryStore", () => {
    let store: MemoryStore;

    beforeEach(() => {
        store = new MemoryStore();
    });

    it("returns undefined for a missing key", async () => {
        expect(await store.get(key)).toBeUndefined();
    });

    it("creates with conditionalPut at version 1 and refuses a second create", async () => {
        const created = await store.conditionalPut(key, { n: 1 });
        expect(created).toEqual({ key, value: { n: 1 }, version: 1 });

        await expect(store.conditionalPut(key, { n: 2 })).rejects.toBeInstanceOf(AlreadyExistsError);
        expect((await store.get(key))?.value).toEqual({ n: 1 });
    });

    it("applies conditionalUpdate only on the expected version", async () => {
        await store.conditionalPut(key, { n: 1 });
        const updated = await store.conditionalUpdate(key, { n: 2 }, 1);
        expect(updated.version).toBe(2);

        const stale = store.conditionalUpdate(key, { n: 3 }, 1);
        await expect(stale).rejects.toBeInstanceOf(VersionConflictError);
        await expect(stale).rejects.toMatchObject({ expectedVersion: 1, actualVersion: 2 });
        expect((await store.get(key))?.value).toEqual({ n: 2 });
    });

    it("treats conditionalUpdate on a missing key as a conflict", async () => {
        await expect(store.conditionalUpdate(key, { n: 1 }, 1)).rejects.toMatchObject({
            code: "VERSION_CONFLICT",
            actualVersion: undefined,
        });
    });

    it("bumps the version on unconditional put", async () => {
        expect((await store.put(key, { n: 1 })).version).toBe(1);
        expect((await store.put(key, { n: 2 })).version).toBe(2);
    });

    it("queries one partition in sort-key order", async () => {
        await store.put({ partition: "p1", sort: "c" }, 3);
        await store.put({ partition: "p1", sort: "a" }, 1);
        await store.put({ partition: "p2", sort: "b" }, 2);

        const sorts: string[] = [];
        for await (const item of store.queryByPartition("p1")) sorts.push(item.key.sort);
        expect(sorts).toEqual(["a", "c"]);
        expect(store.size()).toBe(3);
    });

    it("hands out copies, never live references", async () => {
        const value = { list: [1] };
        await store.put(key, value);
        value.list.push(2);

        const read = await store.get(key);
        expect(read?.value).toEqual({ list: [1] });
    });
});
