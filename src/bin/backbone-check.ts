#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns ExitCode; BIN exits the process
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE

import { Effect } from "effect";

import { main } from "../main.js";

/**
 * CLI entry point for backbone-check.
 *
 * @remarks
 * - @postcondition process terminates exactly once with the run's ExitCode
 * - Defects (bugs, not faults) are reported as "Fatal error" with exit code 1
 */
void (async (): Promise<void> => {
	try {
		const code = await Effect.runPromise(main());
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
