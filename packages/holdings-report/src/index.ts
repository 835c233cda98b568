/**
 * holdings-report
 *
 * Composes CTE queries, runs them against a libSQL warehouse, caches the
 * tables for the session and renders them.
 *
 * ## Usage
 *
 * ```typescript
 * import {
 *   ResultCache,
 *   TerminalRenderer,
 *   createLibSQLAdapter,
 *   loadReports,
 *   renderDashboard,
 * } from "holdings-report";
 *
 * const db = await createLibSQLAdapter({ url: "file:./holdings.db" });
 * const cache = new ResultCache();
 * const renderer = new TerminalRenderer();
 *
 * await loadReports(db, cache, renderer);
 * renderDashboard(cache, renderer, { ticker: "AAPL" });
 * await db.close();
 * ```
 *
 * @module holdings-report
 */

export type { ExecutionOutcome } from "./analytics/executor.js";
export { fetchResult, runPlan, runQuery } from "./analytics/executor.js";
export {
	cellText,
	formatCSV,
	formatJSON,
	formatJSONL,
	formatOutput,
	formatTable,
} from "./analytics/formatters.js";
export type { Page } from "./analytics/pagination.js";
export { DEFAULT_PAGE_SIZE, paginate, totalPages } from "./analytics/pagination.js";
export { QueryBuilder } from "./analytics/query-builder.js";
export { ResultCache } from "./analytics/result-cache.js";
export type {
	AnalyticsQuery,
	NamedSubquery,
	OutputFormat,
	QueryPlan,
	ResultTable,
} from "./analytics/types.js";
export { OUTPUT_FORMATS, emptyResultTable } from "./analytics/types.js";
export { composeCTE, composeFragment, composeSequence } from "./compose/cte.js";
export type { ReportConfig } from "./config.js";
export { ConfigSchema, loadConfig } from "./config.js";
export type { ChartSpec, ReportRenderer } from "./dashboard/renderer.js";
export type { TerminalRendererOptions, TextSink } from "./dashboard/terminal-renderer.js";
export { TerminalRenderer } from "./dashboard/terminal-renderer.js";
export type {
	CompanyTimelineOptions,
	DashboardOptions,
	SectorLeaderboardOptions,
	TopCompaniesOptions,
} from "./dashboard/widgets.js";
export {
	listCompanies,
	renderDashboard,
	showCompanyTimeline,
	showSectorLeaderboard,
	showTopCompanies,
} from "./dashboard/widgets.js";
export { log } from "./debug.js";
export * from "./errors/index.js";
export * from "./reports/index.js";
export type { LibSQLConfig } from "./warehouse/libsql.js";
export { createLibSQLAdapter, normalizeDatabaseUrl } from "./warehouse/libsql.js";
export type { DatabaseAdapter, SqlParam, WarehouseRows } from "./warehouse/types.js";
