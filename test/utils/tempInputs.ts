// CHANGE: Test helper to materialize CNF input trees in isolated temp directories
// WHY: Discovery and invocation invariants are checked against a real filesystem, not mocks

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Result of creating a temporary input tree.
 *
 * Postconditions:
 * - root points to the directory containing every written file
 * - cleanup() removes the directory recursively
 */
export interface TempInputs {
	readonly root: string;
	readonly cleanup: () => void;
}

/**
 * Write `files` (relative path → content) below a fresh temp directory.
 */
export function createTempInputs(
	files: Readonly<Record<string, string>>,
): TempInputs {
	const root = fs.mkdtempSync(path.join(os.tmpdir(), "backbone-check-"));
	for (const [relative, content] of Object.entries(files)) {
		const target = path.join(root, relative);
		fs.mkdirSync(path.dirname(target), { recursive: true });
		fs.writeFileSync(target, content, { encoding: "utf-8" });
	}
	return {
		root,
		cleanup: () => fs.rmSync(root, { recursive: true, force: true }),
	};
}

/**
 * Minimal satisfiable CNF carrying directives for the fake solver.
 */
export function cnf(...directives: ReadonlyArray<string>): string {
	return [...directives.map((d) => `c ${d}`), "p cnf 2 1", "1 2 0", ""].join(
		"\n",
	);
}

export const FAKE_SOLVER = fileURLToPath(
	new URL("../fixtures/fake-solver.mjs", import.meta.url),
);

export const NODE_BINARY = process.execPath;
