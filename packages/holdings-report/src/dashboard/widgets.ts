/**
 * Dashboard widgets
 *
 * Each widget reads its table from the session ResultCache it is handed and
 * describes the output to a ReportRenderer. Missing or empty tables produce
 * a warning and nothing else.
 */

import { paginate } from "../analytics/pagination.js";
import type { ResultCache } from "../analytics/result-cache.js";
import type { ResultTable } from "../analytics/types.js";
import { EmptyResultError, InvalidArgumentError } from "../errors/index.js";
import {
	DAILY_POSITIONS_KEY,
	SECTOR_POSITIONS_KEY,
	TOP_COMPANIES_KEY,
} from "../reports/index.js";
import type { ReportRenderer } from "./renderer.js";

export interface SectorLeaderboardOptions {
	/** Number of sectors to chart (default 10) */
	limit?: number;
}

export interface TopCompaniesOptions {
	page?: number;
	pageSize?: number;
}

export interface CompanyTimelineOptions {
	/** Ticker to chart; defaults to the first ticker in the table */
	ticker?: string;
}

export interface DashboardOptions
	extends SectorLeaderboardOptions,
		TopCompaniesOptions,
		CompanyTimelineOptions {}

/**
 * Fetch a cached table, warning when it is absent or has no rows.
 */
function nonEmptyTable(
	cache: ResultCache,
	renderer: ReportRenderer,
	key: string,
	message: string,
): ResultTable | undefined {
	const table = cache.get(key);
	if (!table || table.rowCount === 0) {
		renderer.warning(new EmptyResultError(message, { reason: key }).message);
		return undefined;
	}
	return table;
}

function withRows(table: ResultTable, rows: Record<string, unknown>[]): ResultTable {
	return { ...table, rows, rowCount: rows.length };
}

/**
 * Horizontal bar chart of the largest sectors on the most recent date.
 *
 * @returns The charted rows, or undefined when there was nothing to chart
 */
export function showSectorLeaderboard(
	cache: ResultCache,
	renderer: ReportRenderer,
	options: SectorLeaderboardOptions = {},
): ResultTable | undefined {
	const limit = options.limit ?? 10;
	const table = nonEmptyTable(
		cache,
		renderer,
		SECTOR_POSITIONS_KEY,
		"No sector position data available.",
	);
	if (!table) {
		return undefined;
	}

	const dates = table.rows.map((row) => String(row.DATE));
	const mostRecentDate = dates.reduce((latest, date) => (date > latest ? date : latest));

	const top = table.rows
		.filter((row) => String(row.DATE) === mostRecentDate)
		.sort((a, b) => Number(b.USD_POSITION) - Number(a.USD_POSITION))
		.slice(0, limit);
	const leaderboard = withRows(table, top);

	renderer.heading(`Top ${limit} Sectors by Position on ${mostRecentDate}`);
	renderer.chart(
		{
			kind: "bar",
			title: `Top ${limit} Sectors by USD Position`,
			x: "USD_POSITION",
			y: "SECTOR_NAME",
			orientation: "h",
			labels: { USD_POSITION: "Position (USD)", SECTOR_NAME: "Sector" },
		},
		leaderboard,
	);

	return leaderboard;
}

/**
 * Paginated grid of the top-quartile companies. A page outside the grid is
 * reported to the renderer and nothing is drawn.
 */
export function showTopCompanies(
	cache: ResultCache,
	renderer: ReportRenderer,
	options: TopCompaniesOptions = {},
): void {
	renderer.heading("Top 25% Companies by Average Position (Last Year)");

	const table = nonEmptyTable(
		cache,
		renderer,
		TOP_COMPANIES_KEY,
		"No company ranking data available.",
	);
	if (!table) {
		return;
	}

	try {
		renderer.table(paginate(table, options.page ?? 1, options.pageSize));
	} catch (error) {
		if (!(error instanceof InvalidArgumentError)) {
			throw error;
		}
		renderer.error(error);
	}
}

/**
 * Distinct tickers in first-seen order.
 */
export function listCompanies(table: ResultTable): string[] {
	return [...new Set(table.rows.map((row) => String(row.TICKER)))];
}

/**
 * Line chart of one company's daily USD position, oldest first.
 *
 * @returns The charted rows, or undefined when there was nothing to chart
 */
export function showCompanyTimeline(
	cache: ResultCache,
	renderer: ReportRenderer,
	options: CompanyTimelineOptions = {},
): ResultTable | undefined {
	const table = nonEmptyTable(
		cache,
		renderer,
		DAILY_POSITIONS_KEY,
		"No company position data available.",
	);
	if (!table) {
		return undefined;
	}

	const companies = listCompanies(table);
	const selected = options.ticker ?? companies[0];
	if (selected === undefined || !companies.includes(selected)) {
		renderer.warning(`No positions found for ${selected ?? "any company"}.`);
		return undefined;
	}

	const rows = table.rows
		.filter((row) => String(row.TICKER) === selected)
		.sort((a, b) => String(a.DATE).localeCompare(String(b.DATE)));
	const timeline = withRows(table, rows);

	renderer.heading(`Daily Close Price for ${selected}`);
	renderer.chart(
		{
			kind: "line",
			title: `Daily Close Price of ${selected}`,
			x: "DATE",
			y: "CLOSE_USD_POSITION",
			labels: { CLOSE_USD_POSITION: "Close Price (USD)" },
		},
		timeline,
	);

	return timeline;
}

/**
 * All three widgets, in dashboard order.
 */
export function renderDashboard(
	cache: ResultCache,
	renderer: ReportRenderer,
	options: DashboardOptions = {},
): void {
	showSectorLeaderboard(cache, renderer, options);
	showTopCompanies(cache, renderer, options);
	showCompanyTimeline(cache, renderer, options);
}
