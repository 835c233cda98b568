/**
 * Result Table Formatters
 *
 * Each formatter takes a ResultTable and returns a string.
 */

import type { OutputFormat, ResultTable } from "./types.js";

/**
 * Render a cell value for text output. null/undefined become "".
 */
export function cellText(value: unknown): string {
	if (value == null) {
		return "";
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	return String(value);
}

/**
 * Format a table as ASCII with aligned columns.
 *
 * Produces a header, a separator, one line per row and a `(n rows)` footer.
 * The footer reports `rowCount`, which may exceed the rows shown for a page.
 */
export function formatTable(table: ResultTable): string {
	const { columns, rows, rowCount } = table;

	if (columns.length === 0) {
		return "No columns to display\n(0 rows)\n";
	}

	// Column width = max of header and all cell values
	const widths: number[] = columns.map((col) => col.length);

	for (const row of rows) {
		columns.forEach((col, i) => {
			widths[i] = Math.max(widths[i] ?? 0, cellText(row[col]).length);
		});
	}

	const headerRow = columns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(" | ");
	const separator = widths.map((w) => "-".repeat(w)).join("-+-");
	const dataRows = rows.map((row) =>
		columns.map((col, i) => cellText(row[col]).padEnd(widths[i] ?? 0)).join(" | "),
	);

	const lines = [headerRow, separator, ...dataRows, `(${rowCount} rows)`];

	return `${lines.join("\n")}\n`;
}

/**
 * Format a table as pretty-printed JSON.
 */
export function formatJSON(table: ResultTable): string {
	return JSON.stringify(table, null, 2);
}

/**
 * Format a table as RFC 4180 compliant CSV.
 *
 * - Header row with column names
 * - Values containing comma, quote or newline are quoted, quotes doubled
 * - Empty strings for null/undefined values
 */
export function formatCSV(table: ResultTable): string {
	const { columns, rows } = table;

	const escape = (value: string): string =>
		value.includes(",") || value.includes('"') || value.includes("\n")
			? `"${value.replace(/"/g, '""')}"`
			: value;

	const headerRow = columns.map(escape).join(",");
	const dataRows = rows.map((row) =>
		columns.map((col) => escape(cellText(row[col]))).join(","),
	);

	return `${[headerRow, ...dataRows].join("\n")}\n`;
}

/**
 * Format a table as newline-delimited JSON, one compact object per row.
 * Empty tables produce an empty string.
 */
export function formatJSONL(table: ResultTable): string {
	const { rows } = table;

	if (rows.length === 0) {
		return "";
	}

	return `${rows.map((row) => JSON.stringify(row)).join("\n")}\n`;
}

/**
 * Format a table in the requested output format.
 */
export function formatOutput(table: ResultTable, format: OutputFormat): string {
	switch (format) {
		case "table":
			return formatTable(table);
		case "json":
			return formatJSON(table);
		case "csv":
			return formatCSV(table);
		case "jsonl":
			return formatJSONL(table);
	}
}
