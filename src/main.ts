// CHANGE: Thin APP delegator from argv to harness run
// WHY: main parses CLI options and delegates orchestration to app/runHarness
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value
// COMPLEXITY: O(1)

import { Effect, Either } from "effect";

import { runHarness } from "./app/runHarness.js";
import { exitCodeFor } from "./core/decision.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs, USAGE } from "./shell/config/index.js";
import { reportFault } from "./shell/output/reporter.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param args Arguments after the node executable and script path
 * @returns ExitCode; usage errors print the usage text and return 2
 */
export function main(
	args: ReadonlyArray<string> = process.argv.slice(2),
): Effect.Effect<ExitCode, never> {
	const parsed = parseCLIArgs(args);
	if (Either.isLeft(parsed)) {
		const usageError = parsed.left;
		return Effect.sync(() => {
			reportFault(usageError);
			console.error(USAGE);
			return exitCodeFor(usageError);
		});
	}
	const command = parsed.right;
	if (command.kind === "help") {
		return Effect.sync((): ExitCode => {
			console.log(USAGE);
			return 0;
		});
	}
	return runHarness(command.config);
}
