/**
 * Daily Positions
 *
 * USD position per company per day: shares times the day's close, or the
 * most recent earlier close when the day has none.
 */

import type { QueryPlan } from "../analytics/types.js";
import { CLEAN_POSITION_FRAGMENTS, TEMP_CLOSE_USD_POSITIONS } from "./fragments.js";

export function dailyPositions(): QueryPlan {
	return {
		name: "daily-positions",
		description: "Daily USD position per company, newest first",
		fragments: [...CLEAN_POSITION_FRAGMENTS],
		finalQuery: TEMP_CLOSE_USD_POSITIONS.body,
	};
}
