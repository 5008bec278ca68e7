// CHANGE: Preflight checks for the input directory and the solver binary
// WHY: Report a missing directory or binary once, before any file is processed
// PURITY: SHELL (reads filesystem metadata)
// EFFECT: Effect<void, PreflightFailed>
// INVARIANT: Failure carries at least one issue; bare command names are resolved through PATH

import { constants } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";

import { Effect } from "effect";

import { type PreflightIssue, PreflightFailed } from "../../core/errors.js";
import type { HarnessConfig } from "../../core/models.js";

const checkPath = (run: () => Promise<boolean>): Effect.Effect<boolean> =>
	Effect.promise(() => run().catch(() => false));

export function isDirectory(target: string): Effect.Effect<boolean> {
	return checkPath(async () => (await fs.stat(target)).isDirectory());
}

export function isFile(target: string): Effect.Effect<boolean> {
	return checkPath(async () => (await fs.stat(target)).isFile());
}

export function isExecutable(target: string): Effect.Effect<boolean> {
	return checkPath(async () => {
		await fs.access(target, constants.X_OK);
		return true;
	});
}

/**
 * Candidate locations of the binary. A value with a path separator is used
 * as-is; a bare command name is looked up in every PATH entry.
 *
 * @pure true
 */
export function binaryCandidates(
	binaryPath: string,
	searchPath: string | undefined,
): ReadonlyArray<string> {
	if (binaryPath.includes("/") || binaryPath.includes(path.sep)) {
		return [binaryPath];
	}
	return (searchPath ?? "")
		.split(path.delimiter)
		.filter((entry) => entry.length > 0)
		.map((entry) => path.join(entry, binaryPath));
}

function checkBinary(
	binaryPath: string,
): Effect.Effect<PreflightIssue | undefined> {
	return Effect.gen(function* () {
		const candidates = binaryCandidates(binaryPath, process.env["PATH"]);
		let sawFile = false;
		for (const candidate of candidates) {
			if (!(yield* isFile(candidate))) continue;
			sawFile = true;
			if (yield* isExecutable(candidate)) return undefined;
		}
		const issue: PreflightIssue = sawFile
			? { kind: "binaryNotExecutable", path: binaryPath }
			: { kind: "missingBinary", path: binaryPath };
		return issue;
	});
}

/**
 * Verify the input directory exists and the binary can be executed.
 *
 * @pure false (filesystem metadata)
 * @effect Effect<void, PreflightFailed>
 */
export function runPreflight(
	config: HarnessConfig,
): Effect.Effect<void, PreflightFailed> {
	return Effect.gen(function* () {
		const issues: PreflightIssue[] = [];
		if (!(yield* isDirectory(config.inputDirectory))) {
			issues.push({ kind: "missingDirectory", path: config.inputDirectory });
		}
		const binaryIssue = yield* checkBinary(config.binaryPath);
		if (binaryIssue !== undefined) issues.push(binaryIssue);

		if (issues.length > 0) {
			return yield* Effect.fail(new PreflightFailed({ issues }));
		}
	});
}
