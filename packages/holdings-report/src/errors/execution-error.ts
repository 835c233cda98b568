import type { ErrorContext } from "./base-error.js";
import { BaseReportError } from "./base-error.js";

/**
 * Error produced when the warehouse rejects or fails a query.
 *
 * Returned to callers rather than thrown; the original failure is kept as `cause`.
 */
export class ExecutionError extends BaseReportError {
	constructor(message: string, context?: Partial<ErrorContext>, cause?: unknown) {
		super(message, context, { cause });
		this.name = "ExecutionError";
	}
}
