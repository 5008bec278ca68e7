// CHANGE: Run the external solver once per input file
// WHY: The solver is the only external collaborator; isolate spawn + capture behind one Effect
// PURITY: SHELL (spawns a process, opens a file)
// EFFECT: Effect<SolverOutput, SolverInvocationError>
// INVARIANT: The input handle is closed on every path, after the process has exited
// COMPLEXITY: O(n) space where n = stdout length

import { spawn } from "node:child_process";
import * as fs from "node:fs/promises";

import { Effect } from "effect";

import { SolverInvocationError } from "../../core/errors.js";
import type { SolverOutput, SolverRequest } from "../../core/models.js";
import { debugLog } from "../output/reporter.js";

export function describeCommand(request: SolverRequest): string {
	return `${request.binaryPath} ${request.solverName}`;
}

function errorDetail(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function openInput(
	request: SolverRequest,
): Effect.Effect<fs.FileHandle, SolverInvocationError> {
	return Effect.tryPromise({
		try: () => fs.open(request.file, "r"),
		catch: (error) =>
			new SolverInvocationError({
				file: request.file,
				command: describeCommand(request),
				reason: "input-unreadable",
				detail: errorDetail(error),
			}),
	});
}

/**
 * Spawn the binary with the input file as stdin and collect stdout.
 *
 * stderr is discarded. The exit status is recorded but never treated as a
 * failure on its own: only the captured output decides the outcome.
 */
function runProcess(
	request: SolverRequest,
	stdinFd: number,
): Effect.Effect<SolverOutput, SolverInvocationError> {
	return Effect.async<SolverOutput, SolverInvocationError>((resume) => {
		const command = describeCommand(request);
		debugLog(`spawn ${command} < ${request.file}`);

		const chunks: Buffer[] = [];
		let settled = false;
		const settle = (
			outcome: Effect.Effect<SolverOutput, SolverInvocationError>,
		): void => {
			if (settled) return;
			settled = true;
			resume(outcome);
		};

		const child = spawn(request.binaryPath, [request.solverName], {
			stdio: [stdinFd, "pipe", "ignore"],
		});

		// stdout is a pipe here; it is null only for inherited or ignored streams
		child.stdout?.on("data", (chunk: Buffer) => {
			chunks.push(chunk);
		});

		child.on("error", (error) => {
			settle(
				Effect.fail(
					new SolverInvocationError({
						file: request.file,
						command,
						reason: "spawn-failed",
						detail: errorDetail(error),
					}),
				),
			);
		});

		child.on("close", (exitCode, signal) => {
			const stdout = Buffer.concat(chunks);
			debugLog(
				`exit ${exitCode ?? signal ?? "unknown"} with ${stdout.length} bytes of stdout`,
			);
			settle(Effect.succeed({ stdout, exitCode, signal }));
		});
	});
}

/**
 * Run `binaryPath solverName < file` and capture its standard output.
 *
 * @pure false (spawns a process)
 * @effect Effect<SolverOutput, SolverInvocationError>
 * @invariant Exactly one process per call; no timeout
 */
export function invokeSolver(
	request: SolverRequest,
): Effect.Effect<SolverOutput, SolverInvocationError> {
	return Effect.acquireUseRelease(
		openInput(request),
		(handle) => runProcess(request, handle.fd),
		(handle) => Effect.promise(() => handle.close()),
	);
}
