import type { StorageSettings } from "../config/settings";
import type { Logger } from "../logging";
import { MemoryStore } from "./memory";
import { PostgresStore } from "./postgres";
import type { MonitorStore } from "./types";

export function isMemoryStorageUrl(url: string): boolean {
  return url.startsWith("memory:");
}

/**
 * Opens the store named by `storage.url`. A PostgreSQL store gets its schema applied before it
 * is returned.
 */
export async function openStore(settings: StorageSettings, logger?: Logger): Promise<MonitorStore> {
  if (isMemoryStorageUrl(settings.url)) {
    return new MemoryStore();
  }

  const store = new PostgresStore({
    url: settings.url,
    maxConnections: settings.maxConnections,
    logger,
  });

  try {
    await store.ensureSchema();
  } catch (error) {
    await store.close();
    throw error;
  }

  return store;
}

export { MemoryStore } from "./memory";
export { DELETE_BATCH_SIZE, PostgresStore, SCHEMA_FILE } from "./postgres";
export type { PostgresStoreOptions } from "./postgres";
export type { MonitorStore, RollupTransaction } from "./types";
