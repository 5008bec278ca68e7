// CHANGE: Pure rendering of faults into console diagnostics
// WHY: Keep wording testable without capturing console output
// PURITY: CORE
// INVARIANT: Every diagnostic names the offending file, directory or binary
// COMPLEXITY: O(k) where k = number of preflight issues

import { match } from "ts-pattern";

import type {
	HarnessError,
	PreflightIssue,
	SolverInvocationReason,
} from "../errors.js";

/**
 * Which console stream a diagnostic belongs on. Unparsable output goes to
 * stdout next to the progress lines; everything else is an error report.
 */
export type DiagnosticStream = "stdout" | "stderr";

export interface Diagnostic {
	readonly stream: DiagnosticStream;
	readonly text: string;
}

const describeReason = (reason: SolverInvocationReason): string =>
	match(reason)
		.with("input-unreadable", () => "cannot read input file")
		.with("spawn-failed", () => "cannot start solver")
		.with("no-output", () => "solver produced no output")
		.exhaustive();

export const formatPreflightIssue = (issue: PreflightIssue): string =>
	match(issue)
		.with(
			{ kind: "missingDirectory" },
			({ path }) => `input directory not found: ${path}`,
		)
		.with({ kind: "missingBinary" }, ({ path }) => `solver binary not found: ${path}`)
		.with(
			{ kind: "binaryNotExecutable" },
			({ path }) => `solver binary is not executable: ${path}`,
		)
		.exhaustive();

/**
 * Render the fault that ended a run.
 *
 * @pure true
 *
 * @example
 * ```ts
 * formatFault(new BackboneCountMismatchError({ file: "c.cnf", actual: 2n, expected: 3n }));
 * // { stream: "stderr", text: "Wrong backbone count: 2, expected 3 (c.cnf)" }
 * ```
 */
export const formatFault = (error: HarnessError): Diagnostic =>
	match(error)
		.returnType<Diagnostic>()
		.with({ _tag: "UnparsableOutputError" }, ({ line }) => ({
			stream: "stdout",
			text: `Failed to parse line: ${line}`,
		}))
		.with({ _tag: "BackboneCountMismatchError" }, (e) => ({
			stream: "stderr",
			text: `Wrong backbone count: ${e.actual}, expected ${e.expected} (${e.file})`,
		}))
		.with({ _tag: "SolverInvocationError" }, (e) => ({
			stream: "stderr",
			text: `${describeReason(e.reason)} for ${e.file} (${e.command}): ${e.detail}`,
		}))
		.with({ _tag: "DiscoveryError" }, (e) => ({
			stream: "stderr",
			text: `Unable to read input directory ${e.directory}: ${e.detail}`,
		}))
		.with({ _tag: "PreflightFailed" }, ({ issues }) => ({
			stream: "stderr",
			text: [
				"Preflight failed:",
				...issues.map((issue) => `  - ${formatPreflightIssue(issue)}`),
			].join("\n"),
		}))
		.with({ _tag: "CliUsageError" }, ({ detail }) => ({
			stream: "stderr",
			text: `error: ${detail}`,
		}))
		.exhaustive();
