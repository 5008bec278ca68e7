// CHANGE: Recursive discovery of `.cnf` inputs
// WHY: Separate IO-bound traversal from pure filtering/ordering in CORE
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<string>, DiscoveryError>
// INVARIANT: Only regular files (or symlinks to them) named *.cnf are returned; symlinked directories are not descended
// INVARIANT: A missing root yields no files; an unreadable directory is skipped with a warning
// COMPLEXITY: O(n log n) where n = entries under the input directory

import type { Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";

import { Effect } from "effect";

import {
	isCnfFileName,
	sortInputPaths,
} from "../../core/discovery.js";
import { DiscoveryError } from "../../core/errors.js";
import { debugLog, reportWarning } from "../output/reporter.js";

const MISSING_CODES: ReadonlySet<string> = new Set(["ENOENT", "ENOTDIR"]);
const UNREADABLE_CODES: ReadonlySet<string> = new Set(["EACCES", "EPERM"]);

/**
 * How a failed directory listing affects the walk.
 *
 * - missing: the root does not exist or is not a directory; nothing to find
 * - unreadable: permission denied; the directory is skipped
 * - fatal: anything else ends the run with DiscoveryError
 */
export type ReadFailure = "missing" | "unreadable" | "fatal";

function errorDetail(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function errorCode(error: unknown): string | undefined {
	return error instanceof Error &&
		"code" in error &&
		typeof error.code === "string"
		? error.code
		: undefined;
}

/**
 * @pure true
 */
export function classifyReadFailure(
	error: unknown,
	isRoot: boolean,
): ReadFailure {
	const code = errorCode(error);
	if (code === undefined) return "fatal";
	if (isRoot && MISSING_CODES.has(code)) return "missing";
	if (UNREADABLE_CODES.has(code)) return "unreadable";
	return "fatal";
}

function readEntries(
	directory: string,
	isRoot: boolean,
): Effect.Effect<ReadonlyArray<Dirent>, DiscoveryError> {
	return Effect.tryPromise({
		try: () => fs.readdir(directory, { withFileTypes: true }),
		catch: (error) => error,
	}).pipe(
		Effect.catchAll((error) => {
			const failure = classifyReadFailure(error, isRoot);
			if (failure === "fatal") {
				return Effect.fail(
					new DiscoveryError({ directory, detail: errorDetail(error) }),
				);
			}
			if (failure === "missing") {
				debugLog(`input directory ${directory} does not exist`);
			} else {
				reportWarning(
					`skipping unreadable directory ${directory}: ${errorDetail(error)}`,
				);
			}
			return Effect.succeed<ReadonlyArray<Dirent>>([]);
		}),
	);
}

// A dangling symlink is skipped rather than failing the whole walk.
function isFileLink(absolutePath: string): Effect.Effect<boolean> {
	return Effect.promise(() =>
		fs.stat(absolutePath).then(
			(stats) => stats.isFile(),
			() => false,
		),
	);
}

function walk(
	root: string,
	segments: ReadonlyArray<string>,
): Effect.Effect<ReadonlyArray<ReadonlyArray<string>>, DiscoveryError> {
	const directory = path.join(root, ...segments);
	return Effect.gen(function* () {
		const entries = yield* readEntries(directory, segments.length === 0);
		const found: ReadonlyArray<string>[] = [];
		for (const entry of entries) {
			const entrySegments = [...segments, entry.name];
			if (entry.isDirectory()) {
				found.push(...(yield* walk(root, entrySegments)));
				continue;
			}
			if (!isCnfFileName(entry.name)) continue;
			if (entry.isFile()) {
				found.push(entrySegments);
			} else if (
				entry.isSymbolicLink() &&
				(yield* isFileLink(path.join(directory, entry.name)))
			) {
				found.push(entrySegments);
			}
		}
		return found;
	});
}

/**
 * Find every `.cnf` file below `inputDirectory`, in run order.
 *
 * Returned paths are `path.join(inputDirectory, ...segments)`, so a relative
 * directory argument yields relative paths.
 *
 * @pure false (reads the filesystem)
 * @effect Effect<ReadonlyArray<string>, DiscoveryError>
 */
export function discoverCnfFiles(
	inputDirectory: string,
): Effect.Effect<ReadonlyArray<string>, DiscoveryError> {
	return walk(inputDirectory, []).pipe(
		Effect.map((found) =>
			sortInputPaths(found).map((segments) =>
				path.join(inputDirectory, ...segments),
			),
		),
	);
}
