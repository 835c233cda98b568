/**
 * Structured error classes for holdings reports.
 *
 * All errors include a timestamp, optional report / alias / SQL for
 * correlation, and actionable suggestions.
 *
 * @example
 * ```typescript
 * import { InvalidArgumentError } from './errors';
 *
 * throw new InvalidArgumentError("Duplicate CTE alias: PRICES", {
 *   alias: "PRICES",
 *   suggestions: ["Rename one of the fragments"],
 * });
 * ```
 */

export type { ErrorContext } from "./base-error.js";
export { BaseReportError } from "./base-error.js";
export { EmptyResultError } from "./empty-result-error.js";
export { ExecutionError } from "./execution-error.js";
export { InvalidArgumentError } from "./invalid-argument-error.js";
