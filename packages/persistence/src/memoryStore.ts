import type { KeyValueStore } from "./types";

/** In-process store for dry runs and tests. Documents are deep-copied both ways. */
export class MemoryStore implements KeyValueStore {
	private readonly documents = new Map<string, unknown>();

	constructor(initial: Record<string, unknown> = {}) {
		for (const [key, value] of Object.entries(initial)) {
			this.documents.set(key, structuredClone(value));
		}
	}

	async load(key: string): Promise<unknown> {
		const value = this.documents.get(key);
		return value === undefined ? undefined : structuredClone(value);
	}

	async save(key: string, data: unknown): Promise<void> {
		this.documents.set(key, structuredClone(data));
	}

	keys(): string[] {
		return [...this.documents.keys()];
	}
}
