// CHANGE: End-to-end runs of main() with real discovery and a Node stand-in solver
// WHY: Verify that CLI parsing, discovery, invocation and reporting compose into the documented exit codes

import * as path from "node:path";

import { Effect } from "effect";
import { afterEach, describe, expect, it } from "vitest";

import { main } from "../../src/main.js";
import { USAGE } from "../../src/shell/config/index.js";
import { captureConsole, linesOf } from "../utils/console.js";
import {
	cnf,
	createTempInputs,
	FAKE_SOLVER,
	NODE_BINARY,
	type TempInputs,
} from "../utils/tempInputs.js";

let inputs: TempInputs | undefined;

afterEach(() => {
	inputs?.cleanup();
	inputs = undefined;
});

const argsFor = (dir: string, expected: string): string[] => [
	"--dir",
	dir,
	"--bin",
	NODE_BINARY,
	"--solver",
	FAKE_SOLVER,
	"--expected",
	expected,
];

describe("backbone-check end to end", () => {
	it("passes when every input reports the expected count", async () => {
		const out = captureConsole();
		inputs = createTempInputs({
			"b.cnf": cnf("backbones 2"),
			"a.cnf": cnf("backbones 2"),
			"nested/c.cnf": cnf("backbones 2"),
			"nested/skip.txt": cnf("backbones 9"),
		});
		const { root } = inputs;
		expect(await Effect.runPromise(main(argsFor(root, "2")))).toBe(0);
		expect(linesOf(out.log)).toEqual([
			path.join(root, "a.cnf"),
			path.join(root, "b.cnf"),
			path.join(root, "nested", "c.cnf"),
		]);
	});

	it("stops at the first mismatch", async () => {
		const out = captureConsole();
		inputs = createTempInputs({
			"a.cnf": cnf("backbones 3"),
			"b.cnf": cnf("backbones 3"),
			"c.cnf": cnf("backbones 2"),
			"d.cnf": cnf("backbones 3"),
		});
		const { root } = inputs;
		expect(await Effect.runPromise(main(argsFor(root, "3")))).toBe(3);
		expect(linesOf(out.log)).toEqual([
			path.join(root, "a.cnf"),
			path.join(root, "b.cnf"),
			path.join(root, "c.cnf"),
		]);
		expect(linesOf(out.error)).toEqual([
			`❌ Wrong backbone count: 2, expected 3 (${path.join(root, "c.cnf")})`,
		]);
	});

	it("exits 1 on output without a backbone line", async () => {
		const out = captureConsole();
		inputs = createTempInputs({ "a.cnf": cnf('output "UNSAT\\nFound 1 backbones:\\n"') });
		const { root } = inputs;
		expect(await Effect.runPromise(main(argsFor(root, "1")))).toBe(1);
		expect(linesOf(out.log)).toEqual([path.join(root, "a.cnf"), "Failed to parse line: UNSAT"]);
	});

	it("exits 0 without running the solver for an empty directory", async () => {
		const out = captureConsole();
		inputs = createTempInputs({});
		expect(await Effect.runPromise(main(argsFor(inputs.root, "5")))).toBe(0);
		expect(out.log).not.toHaveBeenCalled();
	});

	it("treats a missing directory as empty when preflight is off", async () => {
		const out = captureConsole();
		inputs = createTempInputs({});
		const missing = path.join(inputs.root, "absent");
		expect(await Effect.runPromise(main([...argsFor(missing, "1"), "--no-preflight"]))).toBe(0);
		expect(out.log).not.toHaveBeenCalled();
		expect(out.error).not.toHaveBeenCalled();
	});

	it("rejects a missing directory during preflight", async () => {
		const out = captureConsole();
		inputs = createTempInputs({});
		const missing = path.join(inputs.root, "absent");
		expect(await Effect.runPromise(main(argsFor(missing, "1")))).toBe(5);
		expect(linesOf(out.error)).toEqual([
			`❌ Preflight failed:\n  - input directory not found: ${missing}`,
		]);
	});

	it("prints usage and exits 2 on bad arguments", async () => {
		const out = captureConsole();
		expect(await Effect.runPromise(main(["--dir", "x"]))).toBe(2);
		expect(linesOf(out.error)).toEqual([
			"❌ error: the following arguments are required: --bin, --expected",
			USAGE,
		]);
	});

	it("prints usage and exits 0 for --help", async () => {
		const out = captureConsole();
		expect(await Effect.runPromise(main(["--help"]))).toBe(0);
		expect(linesOf(out.log)).toEqual([USAGE]);
	});
});
