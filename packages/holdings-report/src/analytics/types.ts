/**
 * Analytics Types
 *
 * Query plans, result tables and output formats shared by the composer,
 * executor, cache and renderers.
 */

import type { SqlParam } from "../warehouse/types.js";

/**
 * One CTE fragment: `alias AS (body)`.
 */
export interface NamedSubquery {
	/** Name later fragments and the final query refer to */
	alias: string;
	/** SQL fragment, valid on its own as a subquery */
	body: string;
}

/**
 * A named question answered by one composed statement.
 */
export interface QueryPlan {
	/** Unique identifier for the plan */
	name: string;
	/** Human-readable description of what the plan answers */
	description: string;
	/** CTE fragments, in dependency order */
	fragments: NamedSubquery[];
	/** Terminal query reading from the fragments */
	finalQuery: string;
	/** Positional parameters for `?` placeholders in the composed statement */
	parameters?: SqlParam[];
}

/**
 * Represents a named analytics query with optional parameters.
 */
export interface AnalyticsQuery {
	/** Unique identifier for the query */
	name: string;
	/** Human-readable description of what the query does */
	description: string;
	/** SQL query string (may include ? placeholders for parameters) */
	sql: string;
	/** Optional positional parameters to bind to the SQL query */
	parameters?: SqlParam[];
}

/**
 * Tabular result of one execution.
 */
export interface ResultTable {
	/** Column names in result set */
	columns: string[];
	/** Result rows as objects (column name -> value) */
	rows: Record<string, unknown>[];
	/** Total number of rows returned */
	rowCount: number;
	/** Query execution time in milliseconds */
	executionTimeMs: number;
}

/**
 * Supported output formats for result tables.
 */
export type OutputFormat = "table" | "json" | "csv" | "jsonl";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["table", "json", "csv", "jsonl"];

/**
 * A table with no columns and no rows.
 */
export function emptyResultTable(): ResultTable {
	return { columns: [], rows: [], rowCount: 0, executionTimeMs: 0 };
}
