// CHANGE: Application layer orchestration of a harness run
// WHY: APP composes pure CORE checks with SHELL integrations and returns an ExitCode as a value
// PURITY: APP (no process.exit)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Files are processed sequentially; the first fault ends the run
// COMPLEXITY: O(n) solver runs where n = discovered files

import { Effect } from "effect";

import { checkBackboneCount, readInvocation } from "../core/backbones.js";
import { EXIT_SUCCESS, exitCodeFor } from "../core/decision.js";
import type {
	DiscoveryError,
	FileCheckError,
	HarnessError,
	PreflightFailed,
	SolverInvocationError,
} from "../core/errors.js";
import type {
	ExitCode,
	HarnessConfig,
	InvocationResult,
	RunSummary,
	SolverOutput,
	SolverRequest,
} from "../core/models.js";
import { isKnownSolverBackend } from "../core/solvers.js";
import { runPreflight } from "../shell/analysis/preflight.js";
import { discoverCnfFiles } from "../shell/fs/discovery.js";
import {
	debugLog,
	reportFault,
	reportProgress,
	reportWarning,
} from "../shell/output/reporter.js";
import { describeCommand, invokeSolver } from "../shell/solver/invoke.js";

/**
 * Effects the harness depends on. Production code uses the SHELL
 * implementations; tests substitute in-process fakes.
 */
export interface HarnessServices {
	readonly preflight: (
		config: HarnessConfig,
	) => Effect.Effect<void, PreflightFailed>;
	readonly discover: (
		inputDirectory: string,
	) => Effect.Effect<ReadonlyArray<string>, DiscoveryError>;
	readonly invoke: (
		request: SolverRequest,
	) => Effect.Effect<SolverOutput, SolverInvocationError>;
}

export const shellServices: HarnessServices = {
	preflight: runPreflight,
	discover: discoverCnfFiles,
	invoke: invokeSolver,
};

/**
 * Run the solver on one file and check its first output line.
 *
 * Progress is printed once the solver has returned, before its output is
 * inspected, so every diagnostic follows the path it refers to.
 *
 * @effect Effect<InvocationResult, FileCheckError>
 */
function checkFile(
	config: HarnessConfig,
	services: HarnessServices,
	file: string,
): Effect.Effect<InvocationResult, FileCheckError> {
	const request: SolverRequest = {
		binaryPath: config.binaryPath,
		solverName: config.solverName,
		file,
	};
	return Effect.gen(function* () {
		const output = yield* services.invoke(request);
		reportProgress(file);
		const result = yield* readInvocation(file, describeCommand(request), output);
		yield* checkBackboneCount(result, config.expectedBackboneCount);
		return result;
	});
}

/**
 * Check every discovered input, failing fast on the first fault.
 *
 * @effect Effect<RunSummary, HarnessError>
 * @postcondition success ⇒ every file reported config.expectedBackboneCount
 */
export function runHarnessEffect(
	config: HarnessConfig,
	services: HarnessServices = shellServices,
): Effect.Effect<RunSummary, HarnessError> {
	return Effect.gen(function* () {
		if (config.preflight) {
			yield* services.preflight(config);
		}
		if (!isKnownSolverBackend(config.solverName)) {
			reportWarning(
				`unknown solver backend '${config.solverName}'; passing it to the binary unchanged`,
			);
		}

		const files = yield* services.discover(config.inputDirectory);
		debugLog(`discovered ${files.length} input file(s) in ${config.inputDirectory}`);

		yield* Effect.forEach(files, (file) => checkFile(config, services, file), {
			discard: true,
		});
		return { filesChecked: files.length };
	});
}

/**
 * Orchestrates a harness run and returns ExitCode as value (no process.exit).
 *
 * @param config - Parsed harness configuration
 * @param services - Effects to run against; SHELL implementations by default
 * @returns Effect<ExitCode, never> - faults are reported and mapped to exit codes
 *
 * @invariant result = 0 ⇔ no fault occurred
 */
export function runHarness(
	config: HarnessConfig,
	services: HarnessServices = shellServices,
): Effect.Effect<ExitCode, never> {
	return runHarnessEffect(config, services).pipe(
		Effect.matchEffect({
			onFailure: (error) =>
				Effect.sync(() => {
					reportFault(error);
					return exitCodeFor(error);
				}),
			onSuccess: (summary) =>
				Effect.sync(() => {
					debugLog(`checked ${summary.filesChecked} file(s)`);
					return EXIT_SUCCESS;
				}),
		}),
	);
}
