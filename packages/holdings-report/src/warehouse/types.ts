/**
 * Warehouse collaborator contract
 *
 * The reporting code only ever talks to a DatabaseAdapter; the connection is
 * assumed to be established by whoever hands the adapter over.
 */

/** Values that can be bound to a `?` placeholder. */
export type SqlParam = string | number | bigint | boolean | null | Date | Uint8Array;

/**
 * Raw rows as returned by the warehouse.
 */
export interface WarehouseRows {
	/** Column names in select order (may be reported even for zero rows) */
	columns: string[];
	/** Rows as plain objects (column name -> value) */
	rows: Record<string, unknown>[];
}

export interface DatabaseAdapter {
	/** Run a single statement and return its rows. */
	query(sql: string, params?: SqlParam[]): Promise<WarehouseRows>;
	/** Run one or more statements, discarding results (schema setup, seeding). */
	exec(sql: string): Promise<void>;
	close(): Promise<void>;
}
