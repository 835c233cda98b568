/**
 * Analytics Query Builder
 *
 * Fluent API for constructing SQL queries with type safety.
 * Produces parameterized queries; CTE fragments added with `with()` are
 * composed in front of the SELECT.
 */

import { composeCTE } from "../compose/cte.js";
import type { SqlParam } from "../warehouse/types.js";
import type { AnalyticsQuery, NamedSubquery } from "./types.js";

/**
 * Fluent query builder for constructing SQL queries.
 *
 * Supports WITH, SELECT, FROM, WHERE, GROUP BY, HAVING, ORDER BY, LIMIT.
 * Accumulates parameters from WHERE and HAVING clauses.
 *
 * @example
 * ```typescript
 * const query = new QueryBuilder()
 *   .with("CLEAN_PRICE", "SELECT * FROM PRICE WHERE CLOSE_USD IS NOT NULL")
 *   .select(["COMPANY_ID", "MAX(DATE) AS LAST_DATE"])
 *   .from("CLEAN_PRICE")
 *   .where("CLOSE_USD > ?", [0])
 *   .groupBy("COMPANY_ID")
 *   .orderBy("LAST_DATE", "DESC")
 *   .limit(10)
 *   .withName("last-priced")
 *   .withDescription("Last priced date per company")
 *   .build();
 * ```
 */
export class QueryBuilder {
	private fragments: NamedSubquery[] = [];
	private selectClause: string[] = [];
	private fromClause = "";
	private whereClauses: string[] = [];
	private groupByClause = "";
	private havingClauses: string[] = [];
	private orderByClause = "";
	private limitClause = "";
	private queryName = "";
	private queryDescription = "";
	private params: SqlParam[] = [];

	/**
	 * Add a CTE fragment. Fragments are emitted in call order.
	 *
	 * @param alias - Name the rest of the query refers to
	 * @param body - Subquery SQL
	 */
	with(alias: string, body: string): this {
		this.fragments.push({ alias, body });
		return this;
	}

	/**
	 * Add SELECT clause with column expressions.
	 *
	 * @param columns - Column names or expressions (e.g., ["TICKER", "AVG(CLOSE_USD) AS AVER"])
	 */
	select(columns: string[]): this {
		this.selectClause = columns;
		return this;
	}

	/**
	 * Set FROM clause (table, CTE alias, or join expression).
	 */
	from(table: string): this {
		this.fromClause = table;
		return this;
	}

	/**
	 * Add WHERE condition with optional parameters.
	 *
	 * Multiple calls are combined with AND.
	 *
	 * @param condition - SQL condition (use ? for parameter placeholders)
	 * @param params - Parameter values to bind
	 */
	where(condition: string, params: SqlParam[] = []): this {
		this.whereClauses.push(condition);
		this.params.push(...params);
		return this;
	}

	/**
	 * Set GROUP BY clause.
	 *
	 * @param columns - Column list (e.g., "SECTOR_NAME, DATE")
	 */
	groupBy(columns: string): this {
		this.groupByClause = columns;
		return this;
	}

	/**
	 * Add HAVING condition with optional parameters.
	 *
	 * Multiple calls are combined with AND.
	 */
	having(condition: string, params: SqlParam[] = []): this {
		this.havingClauses.push(condition);
		this.params.push(...params);
		return this;
	}

	/**
	 * Set ORDER BY clause.
	 */
	orderBy(column: string, direction: "ASC" | "DESC" = "ASC"): this {
		this.orderByClause = `${column} ${direction}`;
		return this;
	}

	/**
	 * Set LIMIT clause.
	 */
	limit(count: number): this {
		this.limitClause = String(count);
		return this;
	}

	withName(name: string): this {
		this.queryName = name;
		return this;
	}

	withDescription(description: string): this {
		this.queryDescription = description;
		return this;
	}

	/**
	 * Build the final AnalyticsQuery object.
	 *
	 * Without fragments the SQL is the bare SELECT; with fragments it is the
	 * composed `WITH ... SELECT ...;` statement.
	 */
	build(): AnalyticsQuery {
		const parts: string[] = [];

		if (this.selectClause.length > 0) {
			parts.push(`SELECT ${this.selectClause.join(", ")}`);
		}

		if (this.fromClause) {
			parts.push(`FROM ${this.fromClause}`);
		}

		if (this.whereClauses.length > 0) {
			parts.push(`WHERE ${this.whereClauses.join(" AND ")}`);
		}

		if (this.groupByClause) {
			parts.push(`GROUP BY ${this.groupByClause}`);
		}

		if (this.havingClauses.length > 0) {
			parts.push(`HAVING ${this.havingClauses.join(" AND ")}`);
		}

		if (this.orderByClause) {
			parts.push(`ORDER BY ${this.orderByClause}`);
		}

		if (this.limitClause) {
			parts.push(`LIMIT ${this.limitClause}`);
		}

		const select = parts.join(" ");
		const sql =
			this.fragments.length > 0 ? composeCTE(this.fragments, select) : select;

		return {
			name: this.queryName,
			description: this.queryDescription,
			sql,
			parameters: this.params.length > 0 ? [...this.params] : undefined,
		};
	}
}
