/**
 * Holdings reports - composed plans run against seeded libSQL databases
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { seedHoldings, seedRecentHoldings } from "../__tests__/holdings-fixtures.js";
import { runPlan } from "../analytics/executor.js";
import { ResultCache } from "../analytics/result-cache.js";
import type { ResultTable } from "../analytics/types.js";
import type { BaseReportError } from "../errors/index.js";
import { ExecutionError, InvalidArgumentError } from "../errors/index.js";
import { createLibSQLAdapter } from "../warehouse/libsql.js";
import type { DatabaseAdapter } from "../warehouse/types.js";
import {
	DAILY_POSITIONS_KEY,
	REPORTS,
	SECTOR_POSITIONS_KEY,
	TOP_COMPANIES_KEY,
	dailyPositions,
	getReport,
	loadReport,
	loadReports,
	sectorPositions,
	topQuartileCompanies,
} from "./index.js";

function byKeys(table: ResultTable, ...keys: string[]): Record<string, unknown>[] {
	return [...table.rows].sort((a, b) => {
		for (const key of keys) {
			const cmp = String(a[key]).localeCompare(String(b[key]));
			if (cmp !== 0) return cmp;
		}
		return 0;
	});
}

describe("plan composition", () => {
	test("daily positions composes the four clean-up fragments", () => {
		const plan = dailyPositions();

		expect(plan.fragments.map((f) => f.alias)).toEqual([
			"TEMP_CLEAN_COMPANY",
			"TEMP_CLEAN_PRICE",
			"TEMP_CLEAN_POSITION",
			"TEMP_CLOSE_USD_CLEAN",
		]);
	});

	test("top quartile adds the ranking fragments after the position fragments", () => {
		const plan = topQuartileCompanies();

		expect(plan.fragments.map((f) => f.alias)).toEqual([
			"TEMP_CLEAN_COMPANY",
			"TEMP_CLEAN_PRICE",
			"TEMP_CLEAN_POSITION",
			"TEMP_CLOSE_USD_CLEAN",
			"TEMP_CLOSE_USD_POSITIONS",
			"TEMP_CLOSE_USD_POSITIONS_LAST_YEAR",
			"TEMP_AVG_POSITIONS_BY_COMPANY",
			"TEMP_NUMROWS",
		]);
		expect(plan.finalQuery).toBe(
			"SELECT TICKER, AVER FROM TEMP_AVG_POSITIONS_BY_COMPANY WHERE RN <= (SELECT CAST(CNT * 0.25 AS INTEGER) FROM TEMP_NUMROWS) ORDER BY RN ASC",
		);
		expect(plan.parameters).toEqual(["-1 year"]);
	});

	test("sector positions groups by sector and date", () => {
		expect(sectorPositions().finalQuery).toBe(
			"SELECT SECTOR_NAME, DATE, ROUND(SUM(CLOSE_USD_POSITION), 2) AS USD_POSITION FROM TEMP_CLOSE_USD_POSITIONS GROUP BY SECTOR_NAME, DATE ORDER BY DATE DESC",
		);
	});

	test("top quartile rejects a lookback that is not a non-negative integer", () => {
		expect(() => topQuartileCompanies({ lookbackYears: -1 })).toThrow(
			"lookbackYears must be a non-negative integer, got -1",
		);
		expect(() => topQuartileCompanies({ lookbackYears: 1.5 })).toThrow(InvalidArgumentError);
		expect(() => topQuartileCompanies({ lookbackYears: Number.NaN })).toThrow(
			InvalidArgumentError,
		);
		expect(topQuartileCompanies({ lookbackYears: 3 }).parameters).toEqual(["-3 year"]);
	});

	test("plans are built fresh on every call", () => {
		const first = sectorPositions();
		first.fragments.pop();

		expect(sectorPositions().fragments).toHaveLength(5);
	});
});

describe("reports against fixed-date holdings", () => {
	let db: DatabaseAdapter;

	beforeEach(async () => {
		db = await createLibSQLAdapter({ url: ":memory:" });
		await seedHoldings(db);
	});

	afterEach(async () => {
		await db.close();
	});

	test("daily positions forward-fills missing closes and drops incomplete rows", async () => {
		const { table, error } = await runPlan(db, dailyPositions());

		expect(error).toBeUndefined();
		expect(table.columns).toEqual([
			"TICKER",
			"COMPANY_ID",
			"DATE",
			"SECTOR_NAME",
			"CLOSE_USD_POSITION",
		]);
		expect(byKeys(table, "TICKER", "DATE")).toEqual([
			{ TICKER: "AAA", COMPANY_ID: 1, DATE: "2024-03-01", SECTOR_NAME: "Energy", CLOSE_USD_POSITION: 1000 },
			{ TICKER: "AAA", COMPANY_ID: 1, DATE: "2024-03-02", SECTOR_NAME: "Energy", CLOSE_USD_POSITION: 1000 },
			{ TICKER: "AAA", COMPANY_ID: 1, DATE: "2024-03-03", SECTOR_NAME: "Energy", CLOSE_USD_POSITION: 600 },
			{ TICKER: "BBB", COMPANY_ID: 2, DATE: "2024-03-01", SECTOR_NAME: "Energy", CLOSE_USD_POSITION: 200 },
			{ TICKER: "BBB", COMPANY_ID: 2, DATE: "2024-03-02", SECTOR_NAME: "Energy", CLOSE_USD_POSITION: 210 },
			{ TICKER: "BBB", COMPANY_ID: 2, DATE: "2024-03-03", SECTOR_NAME: "Energy", CLOSE_USD_POSITION: 220 },
			{ TICKER: "CCC", COMPANY_ID: 3, DATE: "2024-03-01", SECTOR_NAME: "Tech", CLOSE_USD_POSITION: 5000 },
			{ TICKER: "CCC", COMPANY_ID: 3, DATE: "2024-03-02", SECTOR_NAME: "Tech", CLOSE_USD_POSITION: 5000 },
		]);
	});

	test("daily positions are newest first", async () => {
		const { table } = await runPlan(db, dailyPositions());
		const dates = table.rows.map((row) => String(row.DATE));

		expect(dates).toEqual([...dates].sort().reverse());
	});

	test("sector positions sum companies per day", async () => {
		const { table, error } = await runPlan(db, sectorPositions());

		expect(error).toBeUndefined();
		expect(byKeys(table, "SECTOR_NAME", "DATE")).toEqual([
			{ SECTOR_NAME: "Energy", DATE: "2024-03-01", USD_POSITION: 1200 },
			{ SECTOR_NAME: "Energy", DATE: "2024-03-02", USD_POSITION: 1210 },
			{ SECTOR_NAME: "Energy", DATE: "2024-03-03", USD_POSITION: 820 },
			{ SECTOR_NAME: "Tech", DATE: "2024-03-01", USD_POSITION: 5000 },
			{ SECTOR_NAME: "Tech", DATE: "2024-03-02", USD_POSITION: 5000 },
		]);
		expect(table.rows[0]?.DATE).toBe("2024-03-03");
	});

	test("top quartile is empty when every position is older than the window", async () => {
		const { table, error } = await runPlan(db, topQuartileCompanies({ lookbackYears: 0 }));

		expect(error).toBeUndefined();
		expect(table.rows).toEqual([]);
	});
});

describe("top quartile companies", () => {
	let db: DatabaseAdapter;

	beforeEach(async () => {
		db = await createLibSQLAdapter({ url: ":memory:" });
		await seedRecentHoldings(db);
	});

	afterEach(async () => {
		await db.close();
	});

	test("keeps the best quarter of companies over the last year", async () => {
		const { table, error } = await runPlan(db, topQuartileCompanies());

		expect(error).toBeUndefined();
		expect(table.rows).toEqual([{ TICKER: "AAA", AVER: 200 }]);
	});

	test("a longer window brings older positions back in", async () => {
		const { table } = await runPlan(db, topQuartileCompanies({ lookbackYears: 5 }));

		expect(table.rows).toEqual([{ TICKER: "DDD", AVER: 33340 }]);
	});
});

describe("registry and loading", () => {
	test("registers three reports under distinct cache keys", () => {
		expect(REPORTS.map((r) => r.name)).toEqual([
			"daily-positions",
			"top-quartile-companies",
			"sector-positions",
		]);
		expect(REPORTS.map((r) => r.cacheKey)).toEqual([
			DAILY_POSITIONS_KEY,
			TOP_COMPANIES_KEY,
			SECTOR_POSITIONS_KEY,
		]);
	});

	test("getReport rejects unknown names", () => {
		expect(() => getReport("nope")).toThrow(InvalidArgumentError);
		expect(getReport("sector-positions").cacheKey).toBe("df_question_3");
	});

	test("loadReports caches every table", async () => {
		const db = await createLibSQLAdapter({ url: ":memory:" });
		await seedHoldings(db);
		const cache = new ResultCache();
		const errors: BaseReportError[] = [];

		await loadReports(db, cache, { error: (e) => errors.push(e) });
		await db.close();

		expect(errors).toEqual([]);
		expect(cache.keys()).toEqual(["df_question_1", "df_question_2", "df_question_3"]);
		expect(cache.require(DAILY_POSITIONS_KEY).rowCount).toBe(8);
		expect(cache.require(SECTOR_POSITIONS_KEY).rowCount).toBe(5);
	});

	test("execution failures are reported and an empty table is cached", async () => {
		const db = await createLibSQLAdapter({ url: ":memory:" });
		const cache = new ResultCache();
		const errors: BaseReportError[] = [];

		await loadReport(db, cache, { error: (e) => errors.push(e) }, getReport("sector-positions"));
		await db.close();

		expect(errors).toHaveLength(1);
		expect(errors[0]).toBeInstanceOf(ExecutionError);
		expect(errors[0]?.context.report).toBe("sector-positions");
		expect(cache.require(SECTOR_POSITIONS_KEY).rowCount).toBe(0);
	});

	test("an already cached key is not queried again", async () => {
		const cache = new ResultCache();
		const cached: ResultTable = { columns: ["X"], rows: [{ X: 1 }], rowCount: 1, executionTimeMs: 0 };
		cache.cache(SECTOR_POSITIONS_KEY, cached);
		let queries = 0;
		const db: DatabaseAdapter = {
			async query() {
				queries++;
				return { columns: [], rows: [] };
			},
			async exec() {},
			async close() {},
		};

		await loadReport(db, cache, { error: () => {} }, getReport("sector-positions"));

		expect(queries).toBe(0);
		expect(cache.get(SECTOR_POSITIONS_KEY)).toBe(cached);
	});
});
