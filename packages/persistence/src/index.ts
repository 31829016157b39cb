import { JsonFileStore } from "./jsonFileStore";
import { MemoryStore } from "./memoryStore";
import type { KeyValueStore } from "./types";

export type { KeyValueStore } from "./types";
export { JsonFileStore } from "./jsonFileStore";
export { MemoryStore } from "./memoryStore";

export type PersistenceOptions =
	| { driver: "file"; directory: string }
	| { driver: "memory"; initial?: Record<string, unknown> };

export const createPersistenceLayer = (
	options: PersistenceOptions
): KeyValueStore =>
	options.driver === "file"
		? new JsonFileStore(options.directory)
		: new MemoryStore(options.initial);
