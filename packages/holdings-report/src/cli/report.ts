/**
 * CLI Report Commands Implementation
 *
 * Implements holdings-report CLI commands:
 * - list: show available reports
 * - run: execute one report and print its table
 * - dashboard: load every report and render the widgets
 * - query: execute raw read-only SQL
 */

import { fetchResult } from "../analytics/executor.js";
import { formatOutput } from "../analytics/formatters.js";
import { paginate } from "../analytics/pagination.js";
import { ResultCache } from "../analytics/result-cache.js";
import type { OutputFormat } from "../analytics/types.js";
import { OUTPUT_FORMATS } from "../analytics/types.js";
import type { TextSink } from "../dashboard/terminal-renderer.js";
import { TerminalRenderer } from "../dashboard/terminal-renderer.js";
import { renderDashboard } from "../dashboard/widgets.js";
import { InvalidArgumentError } from "../errors/index.js";
import { REPORTS, getReport, loadReport, loadReports } from "../reports/index.js";
import { createLibSQLAdapter } from "../warehouse/libsql.js";
import type { DatabaseAdapter } from "../warehouse/types.js";

/**
 * Report command definition
 */
export interface ReportCommand {
	name: string;
	description: string;
}

/**
 * Warehouse connection shared by every command
 */
export interface ConnectionOptions {
	db: string;
	authToken?: string;
}

export interface RunOptions extends ConnectionOptions {
	report: string;
	format: OutputFormat;
	page?: number;
	pageSize?: number;
}

export interface DashboardCommandOptions extends ConnectionOptions {
	top?: number;
	ticker?: string;
	page?: number;
	pageSize?: number;
}

export interface QueryOptions extends ConnectionOptions {
	sql: string;
	format: OutputFormat;
	limit?: number;
}

/**
 * Validate SQL query is read-only (SELECT or WITH ... SELECT).
 *
 * @throws InvalidArgumentError if the query is empty or not a SELECT
 */
export function validateSQL(sql: string): void {
	const trimmed = sql.trim();

	if (trimmed.length === 0) {
		throw new InvalidArgumentError("SQL query cannot be empty");
	}

	if (!trimmed.match(/^(select|with)\s/i)) {
		throw new InvalidArgumentError(
			"Only SELECT queries allowed for safety. Use 'run' for pre-built reports.",
		);
	}
}

/**
 * Parse an --format flag value.
 *
 * @throws InvalidArgumentError for unknown formats
 */
export function parseOutputFormat(value: string): OutputFormat {
	const format = OUTPUT_FORMATS.find((f) => f === value);
	if (!format) {
		throw new InvalidArgumentError(
			`Unknown output format: ${value}. Use one of: ${OUTPUT_FORMATS.join(", ")}`,
		);
	}
	return format;
}

/**
 * List all available reports with descriptions.
 */
export function listReportCommands(): ReportCommand[] {
	return REPORTS.map(({ name, description }) => ({ name, description }));
}

async function withAdapter<T>(
	options: ConnectionOptions,
	fn: (db: DatabaseAdapter) => Promise<T>,
): Promise<T> {
	const adapter = await createLibSQLAdapter({
		url: options.db,
		authToken: options.authToken,
	});
	try {
		return await fn(adapter);
	} finally {
		await adapter.close();
	}
}

/**
 * Execute one report and write its result.
 *
 * The table format prints one page; the other formats print every row and
 * send execution errors to `err` so `out` stays machine-readable.
 */
export async function executeRunCommand(
	options: RunOptions,
	out: TextSink = process.stdout,
	err: TextSink = process.stderr,
): Promise<void> {
	const report = getReport(options.report);
	const renderer = new TerminalRenderer(out);
	const errors = options.format === "table" ? renderer : new TerminalRenderer(err);
	const cache = new ResultCache();

	await withAdapter(options, (db) => loadReport(db, cache, errors, report));

	const table = cache.require(report.cacheKey);

	if (options.format !== "table") {
		out.write(formatOutput(table, options.format));
		return;
	}

	renderer.heading(report.description);
	if (table.rowCount === 0) {
		renderer.warning(`${report.name} returned no rows.`);
		return;
	}
	renderer.table(paginate(table, options.page ?? 1, options.pageSize));
}

/**
 * Load every report into a fresh session cache and render the dashboard.
 */
export async function executeDashboardCommand(
	options: DashboardCommandOptions,
	out: TextSink = process.stdout,
): Promise<void> {
	const renderer = new TerminalRenderer(out);
	const cache = new ResultCache();

	await withAdapter(options, (db) => loadReports(db, cache, renderer));

	renderDashboard(cache, renderer, {
		limit: options.top,
		ticker: options.ticker,
		page: options.page,
		pageSize: options.pageSize,
	});
}

/**
 * Execute a raw SQL query command.
 *
 * @returns Formatted query result
 * @throws ExecutionError if the warehouse rejects the query
 */
export async function executeQueryCommand(options: QueryOptions): Promise<string> {
	const { sql, format, limit = 1000 } = options;

	validateSQL(sql);

	// Wrap so user-supplied LIMITs, trailing semicolons and trailing
	// line comments stay valid
	const inner = sql.trim().replace(/;\s*$/, "");
	const limitedSQL = `SELECT * FROM (\n${inner}\n) LIMIT ${limit}`;

	const { table, error } = await withAdapter(options, (db) => fetchResult(db, limitedSQL));
	if (error) {
		throw error;
	}

	return formatOutput(table, format);
}
