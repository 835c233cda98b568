import type { ErrorContext } from "./base-error.js";
import { BaseReportError } from "./base-error.js";

/**
 * Error thrown when a composer, cache or pagination input is malformed
 * (empty alias, empty CTE list, page out of range, ...).
 */
export class InvalidArgumentError extends BaseReportError {
	constructor(message: string, context?: Partial<ErrorContext>) {
		super(message, context);
		this.name = "InvalidArgumentError";
	}
}
