// CHANGE: Typed fault ADT for the harness using Effect.Data
// WHY: Faults travel in the Effect error channel instead of as thrown exceptions
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Command-line arguments could not be turned into a configuration.
 *
 * @invariant detail.length > 0
 */
export class CliUsageError extends Data.TaggedError("CliUsageError")<{
	readonly detail: string;
}> {}

export type PreflightIssue =
	| { readonly kind: "missingDirectory"; readonly path: string }
	| { readonly kind: "missingBinary"; readonly path: string }
	| { readonly kind: "binaryNotExecutable"; readonly path: string };

/**
 * Preflight detected that the run cannot start.
 *
 * @invariant issues.length > 0
 */
export class PreflightFailed extends Data.TaggedError("PreflightFailed")<{
	readonly issues: readonly PreflightIssue[];
}> {}

/**
 * The input directory (or one of its subdirectories) could not be listed.
 */
export class DiscoveryError extends Data.TaggedError("DiscoveryError")<{
	readonly directory: string;
	readonly detail: string;
}> {}

/**
 * Why a solver run yielded nothing to inspect.
 *
 * - input-unreadable: the `.cnf` file could not be opened
 * - spawn-failed: the binary could not be started
 * - no-output: the process exited without writing to stdout
 */
export type SolverInvocationReason =
	| "input-unreadable"
	| "spawn-failed"
	| "no-output";

export class SolverInvocationError extends Data.TaggedError(
	"SolverInvocationError",
)<{
	readonly file: string;
	readonly command: string;
	readonly reason: SolverInvocationReason;
	readonly detail: string;
}> {}

/**
 * First line of solver output does not carry a backbone count.
 */
export class UnparsableOutputError extends Data.TaggedError(
	"UnparsableOutputError",
)<{
	readonly file: string;
	readonly line: string;
}> {}

/**
 * Solver reported a backbone count different from the expected one.
 *
 * @invariant actual !== expected
 */
export class BackboneCountMismatchError extends Data.TaggedError(
	"BackboneCountMismatchError",
)<{
	readonly file: string;
	readonly actual: bigint;
	readonly expected: bigint;
}> {}

/**
 * Faults raised while checking a single file.
 */
export type FileCheckError =
	| SolverInvocationError
	| UnparsableOutputError
	| BackboneCountMismatchError;

/**
 * Union of every fault a harness run can end with.
 */
export type HarnessError =
	| CliUsageError
	| PreflightFailed
	| DiscoveryError
	| FileCheckError;
