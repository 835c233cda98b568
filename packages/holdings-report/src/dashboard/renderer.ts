/**
 * Rendering surface contract
 *
 * Widgets describe what to show; a ReportRenderer decides how.
 */

import type { Page } from "../analytics/pagination.js";
import type { ResultTable } from "../analytics/types.js";
import type { BaseReportError } from "../errors/index.js";

/**
 * Display directives for one chart.
 */
export interface ChartSpec {
	kind: "bar" | "line";
	title: string;
	/** Column on the x axis */
	x: string;
	/** Column on the y axis */
	y: string;
	/** "h" draws bars along x with categories on y */
	orientation?: "h" | "v";
	/** Display names for columns, keyed by column */
	labels?: Record<string, string>;
}

export interface ReportRenderer {
	heading(text: string): void;
	/** One page of a grid */
	table(page: Page): void;
	chart(spec: ChartSpec, table: ResultTable): void;
	/** User-visible, non-fatal notice (e.g. no rows) */
	warning(message: string): void;
	/** User-visible failure; rendering carries on */
	error(error: BaseReportError): void;
}

export function axisLabel(spec: ChartSpec, column: string): string {
	return spec.labels?.[column] ?? column;
}
