// CHANGE: Console reporting for the harness
// WHY: Keep console I/O in SHELL; CORE only renders text
// PURITY: SHELL
// INVARIANT: Progress lines go to stdout, one per checked file, in run order

import { formatFault } from "../../core/format/messages.js";
import type { HarnessError } from "../../core/errors.js";

// CHANGE: Optional debug tracing controlled by env BACKBONE_CHECK_DEBUG
// WHY: Show spawned commands and exit statuses without changing normal output
const isDebugEnabled = (): boolean =>
	process.env["BACKBONE_CHECK_DEBUG"] === "1";

export function debugLog(message: string): void {
	if (isDebugEnabled()) {
		console.error("[DEBUG]", message);
	}
}

/**
 * Print the path of a file whose solver run has finished.
 */
export function reportProgress(file: string): void {
	console.log(file);
}

export function reportWarning(message: string): void {
	console.warn(`⚠️  ${message}`);
}

/**
 * Print the diagnostic for the fault that ended a run.
 *
 * @pure false (console output)
 */
export function reportFault(error: HarnessError): void {
	const diagnostic = formatFault(error);
	if (diagnostic.stream === "stdout") {
		console.log(diagnostic.text);
	} else {
		console.error(`❌ ${diagnostic.text}`);
	}
}
