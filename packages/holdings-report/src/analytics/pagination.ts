/**
 * Fixed-size pagination over a ResultTable.
 */

import { InvalidArgumentError } from "../errors/index.js";
import type { ResultTable } from "./types.js";

export const DEFAULT_PAGE_SIZE = 5;

export interface Page {
	/** 1-based page number */
	page: number;
	pageSize: number;
	totalPages: number;
	/** Index of the first row on this page */
	start: number;
	/** Index one past the last row on this page */
	end: number;
	rows: Record<string, unknown>[];
	/** The table the page was cut from */
	table: ResultTable;
}

/**
 * Number of pages needed for rowCount rows. An empty table still has one
 * (empty) page.
 */
export function totalPages(rowCount: number, pageSize: number): number {
	assertPositiveInteger(pageSize, "pageSize");
	return Math.max(1, Math.ceil(rowCount / pageSize));
}

/**
 * Cut page `page` (1-based) out of a table.
 *
 * @throws InvalidArgumentError if page is outside [1, totalPages] or pageSize is not a positive integer
 *
 * @example
 * ```typescript
 * // 12 rows, 5 per page -> pages of 5, 5 and 2 rows
 * paginate(table, 3).rows.length; // 2
 * ```
 */
export function paginate(
	table: ResultTable,
	page: number,
	pageSize: number = DEFAULT_PAGE_SIZE,
): Page {
	const pages = totalPages(table.rows.length, pageSize);

	if (!Number.isInteger(page) || page < 1 || page > pages) {
		throw new InvalidArgumentError(
			`Page number must be between 1 and ${pages}, got ${page}`,
			{ suggestions: [`Pick a page from 1 to ${pages}`] },
		);
	}

	const start = (page - 1) * pageSize;
	const end = Math.min(start + pageSize, table.rows.length);

	return {
		page,
		pageSize,
		totalPages: pages,
		start,
		end,
		rows: table.rows.slice(start, end),
		table,
	};
}

function assertPositiveInteger(value: number, name: string): void {
	if (!Number.isInteger(value) || value < 1) {
		throw new InvalidArgumentError(`${name} must be a positive integer, got ${value}`);
	}
}
