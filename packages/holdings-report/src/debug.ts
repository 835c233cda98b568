import debug from "debug";

/**
 * Debug logging for report subsystems.
 * Enable with DEBUG environment variable:
 *
 * - DEBUG=report:* - Enable all subsystems
 * - DEBUG=report:execute - Enable only warehouse calls
 * - DEBUG=report:compose,report:cache - Enable multiple subsystems
 *
 * Output goes to stderr. User-facing messages go through a ReportRenderer instead.
 */
export const log = {
	compose: debug("report:compose"),
	execute: debug("report:execute"),
	cache: debug("report:cache"),
	render: debug("report:render"),
};
