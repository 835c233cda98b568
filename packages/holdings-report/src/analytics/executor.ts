/**
 * Query Executor
 *
 * Thin wrapper over the warehouse: runs one statement and turns the outcome
 * into a ResultTable. Warehouse failures never reject; they come back as an
 * ExecutionError next to an empty table so rendering can carry on.
 */

import { composeCTE } from "../compose/cte.js";
import { log } from "../debug.js";
import { ExecutionError, InvalidArgumentError } from "../errors/index.js";
import type { DatabaseAdapter, SqlParam } from "../warehouse/types.js";
import type { AnalyticsQuery, QueryPlan, ResultTable } from "./types.js";
import { emptyResultTable } from "./types.js";

export interface ExecutionOutcome {
	table: ResultTable;
	/** Present when the warehouse call failed; `table` is then empty */
	error?: ExecutionError;
}

/**
 * Execute SQL against the warehouse.
 *
 * @param report - Name recorded in the error context on failure
 * @throws InvalidArgumentError if sql is not a non-empty string
 */
export async function fetchResult(
	db: DatabaseAdapter,
	sql: string,
	params: SqlParam[] = [],
	report?: string,
): Promise<ExecutionOutcome> {
	if (typeof sql !== "string" || sql.trim().length === 0) {
		throw new InvalidArgumentError("Query must be a non-empty string");
	}

	const startTime = Date.now();
	try {
		const result = await db.query(sql, params);
		const executionTimeMs = Date.now() - startTime;
		const columns =
			result.columns.length > 0
				? result.columns
				: Object.keys(result.rows[0] ?? {});

		log.execute("%d row(s) in %dms", result.rows.length, executionTimeMs);

		return {
			table: {
				columns,
				rows: result.rows,
				rowCount: result.rows.length,
				executionTimeMs,
			},
		};
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		log.execute("query failed: %s", reason);

		return {
			table: emptyResultTable(),
			error: new ExecutionError(
				`Error executing query: ${reason}`,
				{
					report,
					sql,
					reason,
					suggestions: ["Check that every referenced table and CTE alias exists"],
				},
				error,
			),
		};
	}
}

/**
 * Execute a built AnalyticsQuery (e.g. from QueryBuilder).
 */
export async function runQuery(
	db: DatabaseAdapter,
	query: AnalyticsQuery,
): Promise<ExecutionOutcome> {
	return fetchResult(db, query.sql, query.parameters, query.name);
}

/**
 * Compose a plan into one CTE statement and execute it.
 *
 * Composer failures are thrown; warehouse failures are returned.
 */
export async function runPlan(
	db: DatabaseAdapter,
	plan: QueryPlan,
): Promise<ExecutionOutcome> {
	const sql = composeCTE(plan.fragments, plan.finalQuery);
	return fetchResult(db, sql, plan.parameters, plan.name);
}
