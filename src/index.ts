// Public API for programmatic use: APP orchestration, CORE checks and types.

/**
 * Run the harness against a parsed configuration.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runHarness } from "backbone-check";
 *
 * const exitCode = await Effect.runPromise(
 *   runHarness({
 *     inputDirectory: "tests",
 *     solverName: "oxisat",
 *     binaryPath: "./target/release/backbones",
 *     expectedBackboneCount: 3n,
 *     preflight: true,
 *   }),
 * );
 * ```
 */
export {
	type HarnessServices,
	runHarness,
	runHarnessEffect,
	shellServices,
} from "./app/runHarness.js";
export { main } from "./main.js";

export type {
	ExitCode,
	HarnessConfig,
	InvocationResult,
	RunSummary,
	SolverOutput,
	SolverRequest,
} from "./core/models.js";
export {
	BackboneCountMismatchError,
	CliUsageError,
	DiscoveryError,
	type FileCheckError,
	type HarnessError,
	PreflightFailed,
	type PreflightIssue,
	SolverInvocationError,
	type SolverInvocationReason,
	UnparsableOutputError,
} from "./core/errors.js";
export {
	BACKBONE_PATTERN,
	checkBackboneCount,
	firstLine,
	parseBackboneCount,
	readInvocation,
} from "./core/backbones.js";
export { EXIT_SUCCESS, exitCodeFor } from "./core/decision.js";
export { DEFAULT_SOLVER, KNOWN_SOLVER_BACKENDS } from "./core/solvers.js";
export { type CliCommand, parseCLIArgs, USAGE } from "./shell/config/index.js";
