/**
 * Top Quartile Companies
 *
 * Ranks companies by their average daily USD position over a trailing
 * window and keeps the top quarter (rounded down).
 */

import { QueryBuilder } from "../analytics/query-builder.js";
import type { QueryPlan } from "../analytics/types.js";
import { InvalidArgumentError } from "../errors/index.js";
import { USD_POSITION_FRAGMENTS } from "./fragments.js";

export interface TopQuartileFilters {
	/** Trailing window in years (default 1) */
	lookbackYears?: number;
}

/**
 * Build the plan for the top 25% of companies by average position.
 *
 * Returns TICKER and AVER (average position, 2 decimals), best first.
 *
 * @param filters - Optional lookback window
 * @throws InvalidArgumentError if lookbackYears is not a non-negative integer
 */
export function topQuartileCompanies(filters?: TopQuartileFilters): QueryPlan {
	const lookbackYears = filters?.lookbackYears ?? 1;
	if (!Number.isInteger(lookbackYears) || lookbackYears < 0) {
		throw new InvalidArgumentError(
			`lookbackYears must be a non-negative integer, got ${lookbackYears}`,
			{ report: "top-quartile-companies" },
		);
	}

	const finalQuery = new QueryBuilder()
		.select(["TICKER", "AVER"])
		.from("TEMP_AVG_POSITIONS_BY_COMPANY")
		.where("RN <= (SELECT CAST(CNT * 0.25 AS INTEGER) FROM TEMP_NUMROWS)")
		.orderBy("RN", "ASC")
		.build();

	return {
		name: "top-quartile-companies",
		description: `Top 25% of companies by average USD position over the last ${lookbackYears} year(s)`,
		fragments: [
			...USD_POSITION_FRAGMENTS,
			{
				alias: "TEMP_CLOSE_USD_POSITIONS_LAST_YEAR",
				body: `
    SELECT CP.TICKER, CP.COMPANY_ID, CP.SECTOR_NAME, CP.DATE, CP.CLOSE_USD_POSITION
    FROM TEMP_CLOSE_USD_POSITIONS CP
    WHERE CP.DATE >= date('now', ?)
  `,
			},
			{
				alias: "TEMP_AVG_POSITIONS_BY_COMPANY",
				body: `
    SELECT
      TICKER,
      ROUND(AVG(CLOSE_USD_POSITION), 2) AS AVER,
      ROW_NUMBER() OVER (ORDER BY AVG(CLOSE_USD_POSITION) DESC) AS RN
    FROM TEMP_CLOSE_USD_POSITIONS_LAST_YEAR
    GROUP BY TICKER
  `,
			},
			{
				alias: "TEMP_NUMROWS",
				body: "SELECT COUNT(*) AS CNT FROM TEMP_AVG_POSITIONS_BY_COMPANY",
			},
		],
		finalQuery: finalQuery.sql,
		parameters: [`-${lookbackYears} year`],
	};
}
