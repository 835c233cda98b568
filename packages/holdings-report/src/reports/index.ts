/**
 * Holdings reports
 *
 * Registry of the pre-built plans and the loader that runs each one once
 * and caches its table for the session.
 */

import { runPlan } from "../analytics/executor.js";
import type { ResultCache } from "../analytics/result-cache.js";
import type { QueryPlan } from "../analytics/types.js";
import type { ReportRenderer } from "../dashboard/renderer.js";
import { log } from "../debug.js";
import { InvalidArgumentError } from "../errors/index.js";
import type { DatabaseAdapter } from "../warehouse/types.js";
import { dailyPositions } from "./daily-positions.js";
import { sectorPositions } from "./sector-positions.js";
import { topQuartileCompanies } from "./top-quartile-companies.js";

export { dailyPositions } from "./daily-positions.js";
export * from "./fragments.js";
export { sectorPositions } from "./sector-positions.js";
export type { TopQuartileFilters } from "./top-quartile-companies.js";
export { topQuartileCompanies } from "./top-quartile-companies.js";

export const DAILY_POSITIONS_KEY = "df_question_1";
export const TOP_COMPANIES_KEY = "df_question_2";
export const SECTOR_POSITIONS_KEY = "df_question_3";

export interface ReportDefinition {
	name: string;
	description: string;
	/** ResultCache key the table is stored under */
	cacheKey: string;
	plan: () => QueryPlan;
}

export const REPORTS: readonly ReportDefinition[] = [
	{
		name: "daily-positions",
		description: "Daily USD position per company, forward-filling missing closes",
		cacheKey: DAILY_POSITIONS_KEY,
		plan: dailyPositions,
	},
	{
		name: "top-quartile-companies",
		description: "Top 25% of companies by average USD position over the last year",
		cacheKey: TOP_COMPANIES_KEY,
		plan: () => topQuartileCompanies(),
	},
	{
		name: "sector-positions",
		description: "Daily USD position summed per sector",
		cacheKey: SECTOR_POSITIONS_KEY,
		plan: sectorPositions,
	},
];

/**
 * Look up a report by name.
 *
 * @throws InvalidArgumentError for unknown names
 */
export function getReport(name: string): ReportDefinition {
	const report = REPORTS.find((r) => r.name === name);
	if (!report) {
		throw new InvalidArgumentError(`Unknown report: ${name}`, {
			report: name,
			suggestions: REPORTS.map((r) => r.name),
		});
	}
	return report;
}

/**
 * Run a report once and cache its table. A key that is already cached is
 * not re-queried. Execution errors go to the renderer and an empty table is
 * cached in their place.
 */
export async function loadReport(
	db: DatabaseAdapter,
	cache: ResultCache,
	renderer: Pick<ReportRenderer, "error">,
	report: ReportDefinition,
): Promise<void> {
	if (cache.has(report.cacheKey)) {
		log.cache("skip %s, %s already cached", report.name, report.cacheKey);
		return;
	}

	const { table, error } = await runPlan(db, report.plan());
	if (error) {
		renderer.error(error);
	}
	cache.cache(report.cacheKey, table);
}

/**
 * Load every registered report, in registry order.
 */
export async function loadReports(
	db: DatabaseAdapter,
	cache: ResultCache,
	renderer: Pick<ReportRenderer, "error">,
): Promise<void> {
	for (const report of REPORTS) {
		await loadReport(db, cache, renderer, report);
	}
}
