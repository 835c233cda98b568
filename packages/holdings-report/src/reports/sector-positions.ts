/**
 * Sector Positions
 *
 * Daily USD position summed over every company in a sector.
 */

import { QueryBuilder } from "../analytics/query-builder.js";
import type { QueryPlan } from "../analytics/types.js";
import { USD_POSITION_FRAGMENTS } from "./fragments.js";

export function sectorPositions(): QueryPlan {
	const finalQuery = new QueryBuilder()
		.select(["SECTOR_NAME", "DATE", "ROUND(SUM(CLOSE_USD_POSITION), 2) AS USD_POSITION"])
		.from("TEMP_CLOSE_USD_POSITIONS")
		.groupBy("SECTOR_NAME, DATE")
		.orderBy("DATE", "DESC")
		.build();

	return {
		name: "sector-positions",
		description: "Daily USD position per sector, newest first",
		fragments: [...USD_POSITION_FRAGMENTS],
		finalQuery: finalQuery.sql,
	};
}
