/**
 * CTE composition
 *
 * Stitches an ordered list of named subqueries and a terminal query into a
 * single `WITH ... SELECT ...;` statement.
 *
 * @example
 * ```typescript
 * composeCTE(
 *   [
 *     { alias: "CLEAN_PRICE", body: "SELECT * FROM PRICE WHERE CLOSE_USD IS NOT NULL" },
 *     { alias: "LATEST", body: "SELECT MAX(DATE) AS DATE FROM CLEAN_PRICE" },
 *   ],
 *   "SELECT * FROM CLEAN_PRICE WHERE DATE = (SELECT DATE FROM LATEST)",
 * );
 * // WITH CLEAN_PRICE AS (...),LATEST AS (...) SELECT * FROM CLEAN_PRICE WHERE ...;
 * ```
 */

import { log } from "../debug.js";
import { InvalidArgumentError } from "../errors/index.js";
import type { NamedSubquery } from "../analytics/types.js";

/**
 * Render one fragment as `alias AS (body)`.
 *
 * @throws InvalidArgumentError if alias is empty or body is not a non-empty string
 */
export function composeFragment(alias: string, body: string): string {
	if (typeof alias !== "string" || alias.trim().length === 0) {
		throw new InvalidArgumentError("CTE alias must be a non-empty string", {
			alias: String(alias),
			suggestions: ["Name every fragment, e.g. { alias: \"CLEAN_PRICE\", body: \"SELECT ...\" }"],
		});
	}

	if (typeof body !== "string" || body.trim().length === 0) {
		throw new InvalidArgumentError(`CTE body for ${alias} must be a non-empty string`, {
			alias,
		});
	}

	return `${alias} AS (${body})`;
}

/**
 * Join fragments with `,` in the given order.
 *
 * Aliases must be unique (compared case-insensitively); whether a body refers
 * to an earlier alias is left to the warehouse.
 *
 * @throws InvalidArgumentError on an empty list, malformed entry or duplicate alias
 */
export function composeSequence(fragments: readonly NamedSubquery[]): string {
	if (!Array.isArray(fragments) || fragments.length === 0) {
		throw new InvalidArgumentError("CTE fragment list must not be empty", {
			suggestions: ["Pass at least one { alias, body } fragment"],
		});
	}

	const seen = new Set<string>();
	const parts = fragments.map((fragment, index) => {
		if (typeof fragment !== "object" || fragment === null) {
			throw new InvalidArgumentError(
				`CTE fragment at position ${index} must be an { alias, body } object`,
			);
		}

		const sql = composeFragment(fragment.alias, fragment.body);

		const key = fragment.alias.trim().toUpperCase();
		if (seen.has(key)) {
			throw new InvalidArgumentError(`Duplicate CTE alias: ${fragment.alias}`, {
				alias: fragment.alias,
				suggestions: ["Rename one of the fragments or drop the repeated entry"],
			});
		}
		seen.add(key);

		return sql;
	});

	return parts.join(",");
}

/**
 * Build the full statement: `WITH <sequence> <finalQuery>;`
 *
 * @throws InvalidArgumentError if finalQuery is empty or the fragments are invalid
 */
export function composeCTE(
	fragments: readonly NamedSubquery[],
	finalQuery: string,
): string {
	if (typeof finalQuery !== "string" || finalQuery.trim().length === 0) {
		throw new InvalidArgumentError("Final CTE query must be a non-empty string", {
			suggestions: ["Pass the SELECT that reads from the composed fragments"],
		});
	}

	const sql = `WITH ${composeSequence(fragments)} ${finalQuery};`;
	log.compose(
		"composed %d fragment(s): %s",
		fragments.length,
		fragments.map((f) => f.alias).join(", "),
	);
	return sql;
}
