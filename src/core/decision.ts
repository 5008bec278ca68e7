// CHANGE: Pure mapping from run outcome to process exit code
// WHY: Centralize termination codes in Functional Core; SHELL only calls process.exit
// FORMAT THEOREM: ∀e ∈ HarnessError: exitCodeFor(e) ≠ 0
// PURITY: CORE
// INVARIANT: Unparsable output keeps exit status 1
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { HarnessError } from "./errors.js";
import type { ExitCode } from "./models.js";

export const EXIT_SUCCESS: ExitCode = 0;

/**
 * Exit code for the fault that ended a run.
 *
 * @pure true
 * @invariant result ∈ {1,2,3,4,5}
 *
 * @example
 * ```ts
 * exitCodeFor(new UnparsableOutputError({ file: "a.cnf", line: "UNSAT" })); // 1
 * ```
 */
export const exitCodeFor = (error: HarnessError): ExitCode =>
	match(error)
		.returnType<ExitCode>()
		.with({ _tag: "UnparsableOutputError" }, () => 1)
		.with({ _tag: "CliUsageError" }, () => 2)
		.with({ _tag: "BackboneCountMismatchError" }, () => 3)
		.with({ _tag: "SolverInvocationError" }, () => 4)
		.with({ _tag: "DiscoveryError" }, { _tag: "PreflightFailed" }, () => 5)
		.exhaustive();
