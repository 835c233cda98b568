/**
 * Runtime configuration
 *
 * Read once from the environment and validated with zod.
 *
 * - HOLDINGS_DB_URL         warehouse URL (":memory:", "file:./x.db", "libsql://...")
 * - HOLDINGS_DB_AUTH_TOKEN  auth token for remote databases
 * - HOLDINGS_PAGE_SIZE      rows per grid page
 * - HOLDINGS_TOP_SECTORS    bars in the sector leaderboard
 */

import { z } from "zod";
import { InvalidArgumentError } from "./errors/index.js";

export const ConfigSchema = z.object({
	HOLDINGS_DB_URL: z.string().min(1).default("file:holdings.db"),
	// Exported but empty counts as unset
	HOLDINGS_DB_AUTH_TOKEN: z
		.string()
		.optional()
		.transform((token) => (token === "" ? undefined : token)),
	HOLDINGS_PAGE_SIZE: z.coerce.number().int().positive().default(5),
	HOLDINGS_TOP_SECTORS: z.coerce.number().int().positive().default(10),
});

export interface ReportConfig {
	dbUrl: string;
	authToken?: string;
	pageSize: number;
	topSectors: number;
}

/**
 * Load configuration from an environment map.
 *
 * @param env - Defaults to process.env
 * @throws InvalidArgumentError listing every invalid variable
 */
export function loadConfig(
	env: Record<string, string | undefined> = process.env,
): ReportConfig {
	const parsed = ConfigSchema.safeParse(env);

	if (!parsed.success) {
		const issues = parsed.error.issues.map(
			(issue) => `${issue.path.join(".")}: ${issue.message}`,
		);
		throw new InvalidArgumentError(`Invalid configuration: ${issues.join("; ")}`, {
			reason: "config",
			suggestions: issues,
		});
	}

	return {
		dbUrl: parsed.data.HOLDINGS_DB_URL,
		authToken: parsed.data.HOLDINGS_DB_AUTH_TOKEN,
		pageSize: parsed.data.HOLDINGS_PAGE_SIZE,
		topSectors: parsed.data.HOLDINGS_TOP_SECTORS,
	};
}
