import type { ErrorContext } from "./base-error.js";
import { BaseReportError } from "./base-error.js";

/**
 * A query returned no rows. Surfaced as a warning, never thrown.
 */
export class EmptyResultError extends BaseReportError {
	constructor(message: string, context?: Partial<ErrorContext>) {
		super(message, context);
		this.name = "EmptyResultError";
	}
}
