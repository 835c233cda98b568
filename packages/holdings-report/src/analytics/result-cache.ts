/**
 * Session-scoped result cache
 *
 * Write-once map from a caller-chosen key to a ResultTable. The first table
 * stored under a key wins; later writes are ignored. There is no eviction:
 * the cache lives as long as the session that owns it and is passed
 * explicitly to whatever renders from it.
 */

import { log } from "../debug.js";
import { InvalidArgumentError } from "../errors/index.js";
import type { ResultTable } from "./types.js";

export class ResultCache {
	private tables = new Map<string, ResultTable>();

	/**
	 * Store a table unless the key is already taken.
	 *
	 * @returns true if stored, false if an earlier table was kept
	 * @throws InvalidArgumentError if key is empty
	 */
	cache(key: string, table: ResultTable): boolean {
		assertKey(key);

		if (this.tables.has(key)) {
			log.cache("kept existing %s", key);
			return false;
		}

		this.tables.set(key, table);
		log.cache("cached %s (%d rows)", key, table.rowCount);
		return true;
	}

	get(key: string): ResultTable | undefined {
		return this.tables.get(key);
	}

	/**
	 * @throws InvalidArgumentError if nothing is cached under key
	 */
	require(key: string): ResultTable {
		const table = this.tables.get(key);
		if (!table) {
			throw new InvalidArgumentError(`No cached result for ${key}`, {
				reason: key,
				suggestions: ["Run the report that fills this key before rendering it"],
			});
		}
		return table;
	}

	has(key: string): boolean {
		return this.tables.has(key);
	}

	keys(): string[] {
		return [...this.tables.keys()];
	}

	get size(): number {
		return this.tables.size;
	}
}

function assertKey(key: string): void {
	if (typeof key !== "string" || key.length === 0) {
		throw new InvalidArgumentError("Cache key must be a non-empty string");
	}
}
