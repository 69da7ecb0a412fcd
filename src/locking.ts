// In-process async lock per key. Only the file-backed store uses it, to keep
// its own read-modify-save cycles from overlapping; the ledger itself never
// locks and relies on conditional writes instead.
const queues = new Map<string, Promise<void>>();

export async function withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = queues.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const held = new Promise<void>((res) => {
        release = res;
    });
    const tail = prev.then(() => held);
    queues.set(key, tail);

    await prev;
    try {
        return await fn();
    } finally {
        release();
        // cleanup if nobody queued behind us
        if (queues.get(key) === tail) queues.delete(key);
    }
}

export function pendingLocks(): number {
    return queues.size;
}
