/**
 * Minimal durable store for whole documents. `load` resolves undefined when
 * the key has never been saved; `save` replaces the document and rejects with
 * PersistenceError when the write did not happen.
 */
export interface KeyValueStore {
	load(key: string): Promise<unknown>;
	save(key: string, data: unknown): Promise<void>;
}
