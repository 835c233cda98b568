/**
 * TerminalRenderer - ReportRenderer writing plain text to a stream
 */

import { cellText, formatTable } from "../analytics/formatters.js";
import type { Page } from "../analytics/pagination.js";
import type { ResultTable } from "../analytics/types.js";
import { log } from "../debug.js";
import type { BaseReportError } from "../errors/index.js";
import type { ChartSpec, ReportRenderer } from "./renderer.js";
import { axisLabel } from "./renderer.js";

export interface TextSink {
	write(chunk: string): unknown;
}

export interface TerminalRendererOptions {
	/** Width of the longest bar in characters */
	barWidth?: number;
}

export class TerminalRenderer implements ReportRenderer {
	private readonly barWidth: number;

	constructor(
		private readonly out: TextSink = process.stdout,
		options: TerminalRendererOptions = {},
	) {
		this.barWidth = options.barWidth ?? 40;
	}

	heading(text: string): void {
		this.out.write(`### ${text}\n`);
	}

	table(page: Page): void {
		log.render("grid page %d/%d", page.page, page.totalPages);
		this.out.write(formatTable({ ...page.table, rows: page.rows }));
		this.out.write(`Page ${page.page} of ${page.totalPages}\n`);
	}

	chart(spec: ChartSpec, table: ResultTable): void {
		log.render("%s chart: %s", spec.kind, spec.title);
		this.out.write(`${spec.title}\n`);
		if (spec.kind === "bar") {
			this.out.write(this.barChart(spec, table));
		} else {
			this.out.write(lineChart(spec, table));
		}
	}

	warning(message: string): void {
		this.out.write(`warning: ${message}\n`);
	}

	error(error: BaseReportError): void {
		this.out.write(`error: ${error.message}\n`);
	}

	/**
	 * One line per row: `label | ####### value`, bars scaled to the largest value.
	 */
	private barChart(spec: ChartSpec, table: ResultTable): string {
		const category = spec.orientation === "h" ? spec.y : spec.x;
		const measure = spec.orientation === "h" ? spec.x : spec.y;

		const bars = table.rows.map((row) => {
			const value = Number(row[measure]);
			return {
				label: cellText(row[category]),
				value: Number.isFinite(value) ? value : 0,
				text: cellText(row[measure]),
			};
		});

		const categoryLabel = axisLabel(spec, category);
		const labelWidth = Math.max(categoryLabel.length, ...bars.map((b) => b.label.length));
		const max = Math.max(0, ...bars.map((b) => b.value));

		const lines = [`${categoryLabel.padEnd(labelWidth)} | ${axisLabel(spec, measure)}`];
		for (const bar of bars) {
			const length = max > 0 && bar.value > 0 ? Math.round((bar.value / max) * this.barWidth) : 0;
			lines.push(`${bar.label.padEnd(labelWidth)} | ${"#".repeat(length)} ${bar.text}`);
		}

		return `${lines.join("\n")}\n`;
	}
}

/**
 * Two-column table of the x and y series under their display labels.
 */
function lineChart(spec: ChartSpec, table: ResultTable): string {
	const xLabel = axisLabel(spec, spec.x);
	const yLabel = axisLabel(spec, spec.y);

	return formatTable({
		columns: [xLabel, yLabel],
		rows: table.rows.map((row) => ({ [xLabel]: row[spec.x], [yLabel]: row[spec.y] })),
		rowCount: table.rowCount,
		executionTimeMs: table.executionTimeMs,
	});
}
