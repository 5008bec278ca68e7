import { describe, expect, it } from "vitest";

import { EXIT_SUCCESS, exitCodeFor } from "../../src/core/decision.js";
import {
	BackboneCountMismatchError,
	CliUsageError,
	DiscoveryError,
	PreflightFailed,
	SolverInvocationError,
	UnparsableOutputError,
} from "../../src/core/errors.js";

describe("exitCodeFor", () => {
	it("keeps status 1 for unparsable solver output", () => {
		expect(exitCodeFor(new UnparsableOutputError({ file: "a.cnf", line: "UNSAT" }))).toBe(1);
	});

	it("gives every other fault its own non-zero code", () => {
		expect(exitCodeFor(new CliUsageError({ detail: "x" }))).toBe(2);
		expect(
			exitCodeFor(new BackboneCountMismatchError({ file: "a.cnf", actual: 2n, expected: 3n })),
		).toBe(3);
		expect(
			exitCodeFor(
				new SolverInvocationError({
					file: "a.cnf",
					command: "bin oxisat",
					reason: "spawn-failed",
					detail: "spawn bin ENOENT",
				}),
			),
		).toBe(4);
		expect(exitCodeFor(new DiscoveryError({ directory: "d", detail: "EACCES" }))).toBe(5);
		expect(
			exitCodeFor(new PreflightFailed({ issues: [{ kind: "missingDirectory", path: "d" }] })),
		).toBe(5);
	});

	it("reserves 0 for success", () => {
		expect(EXIT_SUCCESS).toBe(0);
	});
});
