/**
 * LibSQLAdapter - libSQL implementation of DatabaseAdapter
 *
 * Wraps @libsql/client. Supports file-based, in-memory, and remote (Turso)
 * databases.
 *
 * @example
 * ```typescript
 * // In-memory (for tests)
 * const db = await createLibSQLAdapter({ url: ":memory:" });
 *
 * // File-based
 * const db = await createLibSQLAdapter({ url: "file:./holdings.db" });
 *
 * // Remote
 * const db = await createLibSQLAdapter({
 *   url: "libsql://[database].turso.io",
 *   authToken: process.env.HOLDINGS_DB_AUTH_TOKEN
 * });
 * ```
 */

import type { Client, Config, ResultSet } from "@libsql/client";
import { createClient } from "@libsql/client";
import { log } from "../debug.js";
import type { DatabaseAdapter, SqlParam, WarehouseRows } from "./types.js";

/**
 * LibSQL configuration options
 */
export interface LibSQLConfig {
	/** Database URL - ":memory:", "file:./path.db", or "libsql://..." */
	url: string;
	/** Auth token for remote Turso databases */
	authToken?: string;
}

/**
 * Normalize bare filesystem paths to file: URLs.
 *
 * libSQL requires URL format - bare paths like "/path/to/db.db" fail with URL_INVALID.
 * Valid formats: ":memory:", "file:/path", "file:./path", "libsql://", "http://", "https://"
 */
export function normalizeDatabaseUrl(url: string): string {
	if (
		url === ":memory:" ||
		url.startsWith("file:") ||
		url.startsWith("libsql:") ||
		url.startsWith("http:") ||
		url.startsWith("https:")
	) {
		return url;
	}
	return `file:${url}`;
}

/**
 * Turn libSQL's array-like rows into plain objects keyed by column name.
 */
function toWarehouseRows(result: ResultSet): WarehouseRows {
	const { columns } = result;
	const rows = result.rows.map((row) => {
		const record: Record<string, unknown> = {};
		columns.forEach((column, i) => {
			record[column] = row[i];
		});
		return record;
	});
	return { columns, rows };
}

class LibSQLAdapter implements DatabaseAdapter {
	constructor(private client: Client) {}

	async query(sql: string, params: SqlParam[] = []): Promise<WarehouseRows> {
		const result = await this.client.execute({ sql, args: params });
		return toWarehouseRows(result);
	}

	async exec(sql: string): Promise<void> {
		// executeMultiple handles multi-statement SQL (schema + seed data)
		await this.client.executeMultiple(sql);
	}

	async close(): Promise<void> {
		this.client.close();
	}
}

/**
 * Create a LibSQLAdapter instance
 *
 * Creates the client and verifies the connection with `SELECT 1`.
 *
 * @example
 * ```typescript
 * const db = await createLibSQLAdapter({ url: ":memory:" });
 * await db.exec("CREATE TABLE COMPANY (ID INTEGER PRIMARY KEY)");
 * await db.close();
 * ```
 */
export async function createLibSQLAdapter(
	config: LibSQLConfig,
): Promise<DatabaseAdapter> {
	const url = normalizeDatabaseUrl(config.url);

	const clientConfig: Config = {
		url,
		...(config.authToken ? { authToken: config.authToken } : {}),
	};

	const client = createClient(clientConfig);

	await client.execute("SELECT 1");
	log.execute("connected to %s", url);

	return new LibSQLAdapter(client);
}
