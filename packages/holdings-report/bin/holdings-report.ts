#!/usr/bin/env node
/**
 * holdings-report CLI - portfolio position reports over a libSQL warehouse
 *
 * Commands:
 *   list                    List available reports
 *   run <report>            Run one report and print its table
 *   dashboard               Run every report and render the dashboard widgets
 *   query <sql>             Execute raw SQL (read-only, max 1000 rows)
 *
 * Flags:
 *   --format <fmt>          Output format: table (default), json, csv, jsonl
 *   --db <url>              Database URL (default: $HOLDINGS_DB_URL or file:holdings.db)
 *   --page <n>              Grid page to show (default 1)
 *   --page-size <n>         Rows per grid page (default: $HOLDINGS_PAGE_SIZE or 5)
 *   --top <n>               Sectors in the leaderboard (default: $HOLDINGS_TOP_SECTORS or 10)
 *   --ticker <symbol>       Company for the timeline widget
 *   --help, -h              Show help
 */

import { parseArgs } from "node:util";
import {
	executeDashboardCommand,
	executeQueryCommand,
	executeRunCommand,
	listReportCommands,
	parseOutputFormat,
} from "../src/cli/report.js";
import { loadConfig } from "../src/config.js";
import { InvalidArgumentError } from "../src/errors/index.js";

function showHelp() {
	console.log(`
holdings-report - Portfolio position reports over a libSQL warehouse

USAGE
  holdings-report <command> [options]

COMMANDS
  list                    List all available reports
  run <report>            Run one report and print its table
  dashboard               Run every report and render the dashboard
  query <sql>             Execute raw SQL query (read-only, max 1000 rows)

FLAGS
  --format <fmt>          Output format: table (default), json, csv, jsonl
  --db <url>              Database URL (default: $HOLDINGS_DB_URL or file:holdings.db)
  --page <n>              Grid page to show (default 1)
  --page-size <n>         Rows per grid page (default: $HOLDINGS_PAGE_SIZE or 5)
  --top <n>               Sectors in the leaderboard (default: $HOLDINGS_TOP_SECTORS or 10)
  --ticker <symbol>       Company for the timeline widget
  -h, --help              Show this help message

EXAMPLES
  holdings-report run sector-positions --format csv
  holdings-report run top-quartile-companies --page 2
  holdings-report dashboard --ticker AAPL --top 5
  holdings-report query "SELECT SECTOR_NAME, COUNT(*) AS N FROM COMPANY GROUP BY SECTOR_NAME"

NOTES
  - SQL queries are read-only for safety (SELECT or WITH only)
  - Set DEBUG=report:* to trace composed SQL, queries and cache writes
`);
}

function parseCount(value: string | undefined, flag: string): number | undefined {
	if (value === undefined) {
		return undefined;
	}
	const n = Number(value);
	if (!Number.isInteger(n) || n < 1) {
		throw new InvalidArgumentError(`--${flag} must be a positive integer, got ${value}`);
	}
	return n;
}

async function main() {
	const { values, positionals } = parseArgs({
		args: process.argv.slice(2),
		options: {
			format: { type: "string", default: "table" },
			db: { type: "string" },
			page: { type: "string" },
			"page-size": { type: "string" },
			top: { type: "string" },
			ticker: { type: "string" },
			help: { type: "boolean", short: "h", default: false },
		},
		allowPositionals: true,
	});

	if (values.help || positionals.length === 0) {
		showHelp();
		return 0;
	}

	const command = positionals[0];

	// list needs no warehouse, so it runs before the environment is validated
	if (command === "list") {
		console.log("\nAvailable Reports:\n");
		for (const report of listReportCommands()) {
			console.log(`  ${report.name.padEnd(25)} ${report.description}`);
		}
		console.log(`\nRun 'holdings-report run <report>' to execute a report.\n`);
		return 0;
	}

	const config = loadConfig();
	const format = parseOutputFormat(values.format);
	const connection = { db: values.db ?? config.dbUrl, authToken: config.authToken };
	const page = parseCount(values.page, "page");
	const pageSize = parseCount(values["page-size"], "page-size") ?? config.pageSize;

	if (command === "run") {
		const report = positionals[1];
		if (!report) {
			console.error("Error: report name required");
			console.error("Usage: holdings-report run <report>");
			return 1;
		}
		await executeRunCommand({ ...connection, report, format, page, pageSize });
	} else if (command === "dashboard") {
		await executeDashboardCommand({
			...connection,
			top: parseCount(values.top, "top") ?? config.topSectors,
			ticker: values.ticker,
			page,
			pageSize,
		});
	} else if (command === "query") {
		const sql = positionals[1];
		if (!sql) {
			console.error("Error: SQL query required");
			console.error("Usage: holdings-report query <sql>");
			return 1;
		}
		console.log(await executeQueryCommand({ ...connection, sql, format }));
	} else {
		console.error(`Unknown command: ${command}`);
		console.error("Run 'holdings-report --help' for usage information");
		return 1;
	}

	return 0;
}

main().then(
	(code) => {
		process.exitCode = code;
	},
	(error: unknown) => {
		console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
		process.exitCode = 1;
	},
);
