// CHANGE: Functional Core domain models for the backbone harness
// WHY: CORE holds only immutable data shared by SHELL and APP layers
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

import type { Option } from "effect";

/**
 * Process exit code of a harness run.
 *
 * @remarks
 * - 0: every file reported the expected backbone count
 * - 1: solver output could not be parsed
 * - 2: command-line usage error
 * - 3: backbone count mismatch
 * - 4: solver could not be run or produced no output
 * - 5: input directory or binary unavailable
 */
export type ExitCode = 0 | 1 | 2 | 3 | 4 | 5;

/**
 * Harness configuration, parsed once from process arguments.
 *
 * @property inputDirectory Root directory searched recursively for `*.cnf`
 * @property solverName Backend name passed as the sole argument to the binary
 * @property binaryPath External executable to invoke
 * @property expectedBackboneCount Count every file must report
 * @property preflight Whether to check the directory and binary before running
 */
export interface HarnessConfig {
	readonly inputDirectory: string;
	readonly solverName: string;
	readonly binaryPath: string;
	readonly expectedBackboneCount: bigint;
	readonly preflight: boolean;
}

/**
 * One solver run for one input file.
 */
export interface SolverRequest {
	readonly binaryPath: string;
	readonly solverName: string;
	readonly file: string;
}

/**
 * Raw capture of a finished solver process. Exit status is recorded for
 * diagnostics only; it never decides pass or fail.
 */
export interface SolverOutput {
	readonly stdout: Uint8Array;
	readonly exitCode: number | null;
	readonly signal: string | null;
}

/**
 * First-line view of a solver run.
 *
 * @invariant parsedCount is Some iff rawFirstLine matches the backbone pattern
 */
export interface InvocationResult {
	readonly sourceFile: string;
	readonly rawFirstLine: string;
	readonly parsedCount: Option.Option<bigint>;
}

/**
 * Summary of a successful run.
 */
export interface RunSummary {
	readonly filesChecked: number;
}
