/**
 * Query Builder and Formatters - unit tests
 */

import { describe, expect, test } from "vitest";
import { InvalidArgumentError } from "../errors/index.js";
import {
	cellText,
	formatCSV,
	formatJSON,
	formatJSONL,
	formatOutput,
	formatTable,
} from "./formatters.js";
import { QueryBuilder } from "./query-builder.js";
import type { ResultTable } from "./types.js";
import { emptyResultTable } from "./types.js";

const averages: ResultTable = {
	columns: ["TICKER", "AVER"],
	rows: [
		{ TICKER: "AAA", AVER: 150.5 },
		{ TICKER: "BB", AVER: null },
	],
	rowCount: 2,
	executionTimeMs: 10,
};

describe("cellText", () => {
	test("renders null and undefined as empty", () => {
		expect(cellText(null)).toBe("");
		expect(cellText(undefined)).toBe("");
	});

	test("renders dates as ISO strings", () => {
		expect(cellText(new Date(Date.UTC(2024, 0, 2)))).toBe("2024-01-02T00:00:00.000Z");
	});
});

describe("formatTable", () => {
	test("aligns columns under a header and separator", () => {
		expect(formatTable(averages)).toBe(
			[
				"TICKER | AVER ",
				"-------+------",
				"AAA    | 150.5",
				"BB     |      ",
				"(2 rows)",
				"",
			].join("\n"),
		);
	});

	test("shows headers and a zero count for empty results", () => {
		const output = formatTable({
			columns: ["id", "name"],
			rows: [],
			rowCount: 0,
			executionTimeMs: 5,
		});

		expect(output).toBe("id | name\n---+-----\n(0 rows)\n");
	});

	test("handles a table with no columns", () => {
		expect(formatTable(emptyResultTable())).toBe("No columns to display\n(0 rows)\n");
	});
});

describe("formatJSON", () => {
	test("pretty-prints the whole table", () => {
		const output = formatJSON(averages);
		const parsed = JSON.parse(output);

		expect(parsed.columns).toEqual(["TICKER", "AVER"]);
		expect(parsed.rows).toEqual([
			{ TICKER: "AAA", AVER: 150.5 },
			{ TICKER: "BB", AVER: null },
		]);
		expect(parsed.rowCount).toBe(2);
		expect(output).toContain("\n");
	});
});

describe("formatCSV", () => {
	test("writes a header and one line per row", () => {
		expect(formatCSV(averages)).toBe("TICKER,AVER\nAAA,150.5\nBB,\n");
	});

	test("escapes quotes and commas", () => {
		const output = formatCSV({
			columns: ["SECTOR_NAME", "NOTE"],
			rows: [{ SECTOR_NAME: "Oil, Gas", NOTE: 'says "hi"' }],
			rowCount: 1,
			executionTimeMs: 3,
		});

		expect(output).toBe('SECTOR_NAME,NOTE\n"Oil, Gas","says ""hi"""\n');
	});

	test("writes only the header for empty results", () => {
		expect(
			formatCSV({ columns: ["col1", "col2"], rows: [], rowCount: 0, executionTimeMs: 1 }),
		).toBe("col1,col2\n");
	});
});

describe("formatJSONL", () => {
	test("produces one compact JSON object per line", () => {
		expect(formatJSONL(averages)).toBe(
			'{"TICKER":"AAA","AVER":150.5}\n{"TICKER":"BB","AVER":null}\n',
		);
	});

	test("produces an empty string for empty results", () => {
		expect(formatJSONL(emptyResultTable())).toBe("");
	});
});

describe("formatOutput", () => {
	test("dispatches on the format name", () => {
		expect(formatOutput(averages, "csv")).toBe(formatCSV(averages));
		expect(formatOutput(averages, "jsonl")).toBe(formatJSONL(averages));
		expect(formatOutput(averages, "table")).toBe(formatTable(averages));
		expect(formatOutput(averages, "json")).toBe(formatJSON(averages));
	});
});

describe("QueryBuilder", () => {
	test("constructs a simple SELECT", () => {
		const query = new QueryBuilder().select(["TICKER", "SECTOR_NAME"]).from("COMPANY").build();

		expect(query.sql).toBe("SELECT TICKER, SECTOR_NAME FROM COMPANY");
		expect(query.parameters).toBeUndefined();
	});

	test("emits clauses in standard SQL order", () => {
		const query = new QueryBuilder()
			.select(["SECTOR_NAME", "COUNT(*) AS N"])
			.from("COMPANY")
			.where("TICKER IS NOT NULL")
			.groupBy("SECTOR_NAME")
			.having("COUNT(*) > ?", [1])
			.orderBy("N", "DESC")
			.limit(5)
			.build();

		expect(query.sql).toBe(
			"SELECT SECTOR_NAME, COUNT(*) AS N FROM COMPANY WHERE TICKER IS NOT NULL GROUP BY SECTOR_NAME HAVING COUNT(*) > ? ORDER BY N DESC LIMIT 5",
		);
	});

	test("joins multiple WHERE conditions with AND", () => {
		const query = new QueryBuilder()
			.select(["*"])
			.from("PRICE")
			.where("COMPANY_ID = ?", [7])
			.where("DATE >= ?", ["2024-01-01"])
			.build();

		expect(query.sql).toBe("SELECT * FROM PRICE WHERE COMPANY_ID = ? AND DATE >= ?");
	});

	test("accumulates parameters in clause order", () => {
		const query = new QueryBuilder()
			.select(["SECTOR_NAME", "COUNT(*) AS N"])
			.from("COMPANY")
			.where("SECTOR_NAME <> ?", ["Unknown"])
			.groupBy("SECTOR_NAME")
			.having("COUNT(*) > ?", [5])
			.build();

		expect(query.parameters).toEqual(["Unknown", 5]);
	});

	test("defaults ORDER BY direction to ASC", () => {
		const query = new QueryBuilder().select(["*"]).from("PRICE").orderBy("DATE").build();

		expect(query.sql).toBe("SELECT * FROM PRICE ORDER BY DATE ASC");
	});

	test("carries name and description", () => {
		const query = new QueryBuilder()
			.select(["*"])
			.from("POSITION")
			.withName("all-positions")
			.withDescription("Every position row")
			.build();

		expect(query.name).toBe("all-positions");
		expect(query.description).toBe("Every position row");
	});

	test("composes CTE fragments in front of the SELECT", () => {
		const query = new QueryBuilder()
			.with("A", "SELECT 1 AS N")
			.with("B", "SELECT N FROM A")
			.select(["N"])
			.from("B")
			.build();

		expect(query.sql).toBe("WITH A AS (SELECT 1 AS N),B AS (SELECT N FROM A) SELECT N FROM B;");
	});

	test("rejects duplicate CTE aliases at build time", () => {
		const builder = new QueryBuilder()
			.with("A", "SELECT 1")
			.with("A", "SELECT 2")
			.select(["*"])
			.from("A");

		expect(() => builder.build()).toThrow(InvalidArgumentError);
	});
});
