// CHANGE: Verify the input file handle is released on every invocation path
// WHY: invokeSolver acquires a FileHandle per run; a leaked handle would survive a failed spawn
// INVARIANT: ∀ run: handles opened = handles closed, each closed exactly once
// NOTE: ESM namespaces cannot be spied on, so `open` is replaced through a partial module mock

import type { FileHandle } from "node:fs/promises";
import * as fsp from "node:fs/promises";
import * as path from "node:path";

import { Effect, Either } from "effect";
import { afterEach, describe, expect, it, vi } from "vitest";

import type { SolverRequest } from "../../../src/core/models.js";
import { invokeSolver } from "../../../src/shell/solver/invoke.js";
import {
	cnf,
	createTempInputs,
	FAKE_SOLVER,
	NODE_BINARY,
	type TempInputs,
} from "../../utils/tempInputs.js";

vi.mock("node:fs/promises", async (importOriginal) => {
	const actual = await importOriginal<typeof import("node:fs/promises")>();
	return { ...actual, open: vi.fn() };
});

const actualFs =
	await vi.importActual<typeof import("node:fs/promises")>("node:fs/promises");

let inputs: TempInputs | undefined;

afterEach(() => {
	inputs?.cleanup();
	inputs = undefined;
});

// Route `open` to the real implementation and keep every handle it returns,
// with a spy on its close method. Set per test: mockReset clears it between tests.
function trackOpenedHandles(): FileHandle[] {
	const opened: FileHandle[] = [];
	vi.mocked(fsp.open).mockImplementation(async (...args) => {
		const handle = await actualFs.open(...args);
		vi.spyOn(handle, "close");
		opened.push(handle);
		return handle;
	});
	return opened;
}

function requestIn(root: string, binaryPath: string): SolverRequest {
	return {
		binaryPath,
		solverName: FAKE_SOLVER,
		file: path.join(root, "a.cnf"),
	};
}

describe("invokeSolver: input handle release", () => {
	it("closes the handle once after a normal run", async () => {
		const opened = trackOpenedHandles();
		inputs = createTempInputs({ "a.cnf": cnf("backbones 2") });
		const result = await Effect.runPromise(
			Effect.either(invokeSolver(requestIn(inputs.root, NODE_BINARY))),
		);
		expect(Either.isRight(result)).toBe(true);
		expect(opened).toHaveLength(1);
		expect(opened[0]?.close).toHaveBeenCalledTimes(1);
	});

	it("closes the handle once after the binary fails to start", async () => {
		const opened = trackOpenedHandles();
		inputs = createTempInputs({ "a.cnf": cnf("backbones 2") });
		const missingBinary = path.join(inputs.root, "no-such-solver");
		const result = await Effect.runPromise(
			Effect.either(invokeSolver(requestIn(inputs.root, missingBinary))),
		);
		expect(Either.isLeft(result)).toBe(true);
		expect(opened).toHaveLength(1);
		expect(opened[0]?.close).toHaveBeenCalledTimes(1);
	});

	it("closes the handle once when the solver prints nothing", async () => {
		const opened = trackOpenedHandles();
		inputs = createTempInputs({ "a.cnf": cnf("silent", "exit 3") });
		const output = await Effect.runPromise(
			invokeSolver(requestIn(inputs.root, NODE_BINARY)),
		);
		expect(output.stdout.length).toBe(0);
		expect(opened[0]?.close).toHaveBeenCalledTimes(1);
	});

	it("has nothing to close when the input cannot be opened", async () => {
		const opened = trackOpenedHandles();
		inputs = createTempInputs({});
		const result = await Effect.runPromise(
			Effect.either(invokeSolver(requestIn(inputs.root, NODE_BINARY))),
		);
		expect(Either.isLeft(result)).toBe(true);
		expect(opened).toEqual([]);
	});
});
