import fs from "node:fs/promises";
import path from "node:path";

import { PersistenceError, createLogger, describeError } from "@scalp-signals/core";

import type { KeyValueStore } from "./types";

const logger = createLogger("persistence");

const KEY_PATTERN = /^[A-Za-z0-9_-]+$/;

const isMissingFile = (error: unknown): boolean =>
	error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * One pretty-printed JSON file per key under `directory`. Writes go through a
 * temp file and a rename; the previous document is kept as `<key>.json.bak`.
 */
export class JsonFileStore implements KeyValueStore {
	constructor(private readonly directory: string) {}

	pathFor(key: string): string {
		if (!KEY_PATTERN.test(key)) {
			throw new Error(`Invalid store key "${key}"`);
		}
		return path.join(this.directory, `${key}.json`);
	}

	async load(key: string): Promise<unknown> {
		const file = this.pathFor(key);
		let raw: string;
		try {
			raw = await fs.readFile(file, "utf-8");
		} catch (error) {
			if (isMissingFile(error)) {
				return undefined;
			}
			throw new PersistenceError(key, error);
		}

		try {
			return JSON.parse(raw);
		} catch (error) {
			logger.warn("store_document_unreadable", {
				key,
				file,
				error: describeError(error),
			});
			return undefined;
		}
	}

	async save(key: string, data: unknown): Promise<void> {
		const file = this.pathFor(key);
		const tempFile = `${file}.${process.pid}.tmp`;
		try {
			await fs.mkdir(this.directory, { recursive: true });
			await this.backup(file);
			await fs.writeFile(tempFile, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
			await fs.rename(tempFile, file);
		} catch (error) {
			await fs.rm(tempFile, { force: true }).catch((cleanupError: unknown) =>
				logger.warn("store_temp_cleanup_failed", {
					file: tempFile,
					error: describeError(cleanupError),
				})
			);
			throw new PersistenceError(key, error);
		}
		logger.debug("store_saved", { key, file });
	}

	private async backup(file: string): Promise<void> {
		try {
			await fs.copyFile(file, `${file}.bak`);
		} catch (error) {
			if (!isMissingFile(error)) {
				throw error;
			}
		}
	}
}
