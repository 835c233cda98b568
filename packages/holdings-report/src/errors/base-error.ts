/**
 * Context information attached to report errors for debugging and observability.
 */
export interface ErrorContext {
	/** Report name (e.g., "sector-positions") */
	report?: string;
	/** CTE alias involved in the failure */
	alias?: string;
	/** SQL text sent to (or about to be sent to) the warehouse */
	sql?: string;
	/** Unix timestamp in milliseconds */
	timestamp: number;
	/** Human-readable reason for error */
	reason?: string;
	/** Actionable suggestions for resolving the error */
	suggestions: string[];
}

/**
 * Base class for all report errors with rich context.
 */
export class BaseReportError extends Error {
	public readonly context: ErrorContext;

	constructor(
		message: string,
		context?: Partial<ErrorContext>,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "BaseReportError";

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}

		this.context = {
			...context,
			timestamp: context?.timestamp ?? Date.now(),
			suggestions: context?.suggestions ?? [],
		};
	}

	/**
	 * Serialize error to JSON for logging and transmission.
	 */
	toJSON() {
		return {
			name: this.name,
			message: this.message,
			context: this.context,
			stack: this.stack,
		};
	}
}
