import { promises as fs } from "fs";
import { CONFIG } from "./config";
import { buildCore, ledgerOptionsFrom } from "./core";
import { errorMessage } from "./errors";
import { setLogFormat, setLogLevel, logger } from "./logger";
import { seedCatalog } from "./rewards";
import { buildSlackApp, startSlackApp } from "./slackApp";
import { FileStore } from "./storage/fileStore";
import { MemoryStore } from "./storage/memoryStore";
import type { KeyValueStore } from "./storage/store";

async function openStore(): Promise<KeyValueStore> {
    if (CONFIG.storeDriver === "memory") return new MemoryStore();
    const store = new FileStore(CONFIG.dataDir, CONFIG.stateFile);
    await store.init();
    return store;
}

async function loadCatalog(store: KeyValueStore, file: string) {
    const raw: unknown = JSON.parse(await fs.readFile(file, "utf8"));
    if (!Array.isArray(raw)) throw new Error(`Catalog file ${file} must hold a JSON array`);
    await seedCatalog(store, raw);
}

async function init() {
    setLogLevel(CONFIG.logLevel);
    setLogFormat(CONFIG.logFormat);

    const store = await openStore();
    if (CONFIG.catalogFile) await loadCatalog(store, CONFIG.catalogFile);

    logger.info("Starting", {
        storeDriver: CONFIG.storeDriver,
        dataDir: CONFIG.dataDir,
        retry: CONFIG.retry,
        appliedWindow: CONFIG.appliedWindow,
    });

    const core = buildCore(store, ledgerOptionsFrom(CONFIG));
    const app = buildSlackApp(CONFIG, { core, adminUserIds: CONFIG.adminUserIds, displayTz: CONFIG.displayTz });
    await startSlackApp(app, CONFIG.slack.port);
}

init().catch((e) => {
    logger.error("Fatal init error", { error: errorMessage(e) });
    process.exit(1);
});
