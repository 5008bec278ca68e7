// CHANGE: Command-line parsing for the harness
// WHY: Turn argv into an immutable HarnessConfig or a typed usage error, never a thrown exception
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: Repeated flags keep their last value; every required flag is present in a "run" command
// COMPLEXITY: O(n) where n = |argv|

import { Either } from "effect";

import { CliUsageError } from "../../core/errors.js";
import type { HarnessConfig } from "../../core/models.js";
import { DEFAULT_SOLVER } from "../../core/solvers.js";

export const USAGE = [
	"usage: backbone-check --dir <path> --bin <path> --expected <int> [--solver <name>] [--no-preflight]",
	"",
	"options:",
	"  --dir <path>       directory searched recursively for *.cnf inputs",
	`  --solver <name>    solver backend passed to the binary (default: ${DEFAULT_SOLVER})`,
	"  --bin <path>       binary to run for every input",
	"  --expected <int>   backbone count every input must report",
	"  --no-preflight     skip directory and binary checks",
	"  -h, --help         show this message and exit",
].join("\n");

export type CliCommand =
	| { readonly kind: "help" }
	| { readonly kind: "run"; readonly config: HarnessConfig };

type ValueFlag = "--dir" | "--solver" | "--bin" | "--expected";

const VALUE_FLAGS: ReadonlyArray<ValueFlag> = [
	"--dir",
	"--solver",
	"--bin",
	"--expected",
];

const REQUIRED_FLAGS: ReadonlyArray<ValueFlag> = ["--dir", "--bin", "--expected"];

const INTEGER = /^[+-]?\d+$/u;

interface ParseState {
	readonly values: ReadonlyMap<ValueFlag, string>;
	readonly preflight: boolean;
	readonly help: boolean;
	readonly unrecognized: ReadonlyArray<string>;
}

function isValueFlag(flag: string): flag is ValueFlag {
	return VALUE_FLAGS.some((known) => known === flag);
}

// Split `--flag=value` into its parts; plain tokens have no inline value.
function splitInline(arg: string): {
	readonly flag: string;
	readonly inline: string | undefined;
} {
	const eq = arg.indexOf("=");
	if (!arg.startsWith("--") || eq === -1) return { flag: arg, inline: undefined };
	return { flag: arg.slice(0, eq), inline: arg.slice(eq + 1) };
}

function withValue(
	state: ParseState,
	flag: ValueFlag,
	value: string,
): ParseState {
	const values = new Map(state.values);
	values.set(flag, value);
	return { ...state, values };
}

function scan(args: ReadonlyArray<string>): Either.Either<ParseState, CliUsageError> {
	let state: ParseState = {
		values: new Map(),
		preflight: true,
		help: false,
		unrecognized: [],
	};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? "";
		const { flag, inline } = splitInline(arg);

		if (isValueFlag(flag)) {
			if (inline !== undefined) {
				state = withValue(state, flag, inline);
				continue;
			}
			const next = args[i + 1];
			if (next === undefined || next.startsWith("--")) {
				return Either.left(
					new CliUsageError({ detail: `argument ${flag}: expected one argument` }),
				);
			}
			state = withValue(state, flag, next);
			i++;
			continue;
		}

		if (arg === "-h" || arg === "--help") {
			state = { ...state, help: true };
		} else if (arg === "--no-preflight") {
			state = { ...state, preflight: false };
		} else {
			state = { ...state, unrecognized: [...state.unrecognized, arg] };
		}
	}
	return Either.right(state);
}

function toConfig(state: ParseState): Either.Either<HarnessConfig, CliUsageError> {
	if (state.unrecognized.length > 0) {
		return Either.left(
			new CliUsageError({
				detail: `unrecognized arguments: ${state.unrecognized.join(" ")}`,
			}),
		);
	}

	const missing = REQUIRED_FLAGS.filter((flag) => !state.values.has(flag));
	const inputDirectory = state.values.get("--dir");
	const binaryPath = state.values.get("--bin");
	const expected = state.values.get("--expected");
	if (
		missing.length > 0 ||
		inputDirectory === undefined ||
		binaryPath === undefined ||
		expected === undefined
	) {
		return Either.left(
			new CliUsageError({
				detail: `the following arguments are required: ${missing.join(", ")}`,
			}),
		);
	}

	if (!INTEGER.test(expected.trim())) {
		return Either.left(
			new CliUsageError({
				detail: `argument --expected: invalid int value: '${expected}'`,
			}),
		);
	}

	return Either.right({
		inputDirectory,
		solverName: state.values.get("--solver") ?? DEFAULT_SOLVER,
		binaryPath,
		expectedBackboneCount: BigInt(expected.trim().replace(/^\+/u, "")),
		preflight: state.preflight,
	});
}

/**
 * Parse command-line arguments.
 *
 * `--help` takes precedence over missing or unrecognized arguments.
 *
 * @param args Arguments after the node executable and script path
 *
 * @example
 * ```ts
 * // Command: backbone-check --dir tests --bin ./target/release/backbones --expected 3
 * parseCLIArgs();
 * // Right({ kind: "run", config: { inputDirectory: "tests", solverName: "oxisat", ... } })
 * ```
 */
export function parseCLIArgs(
	args: ReadonlyArray<string> = process.argv.slice(2),
): Either.Either<CliCommand, CliUsageError> {
	return Either.flatMap(scan(args), (state) =>
		state.help
			? Either.right<CliCommand>({ kind: "help" })
			: Either.map(toConfig(state), (config): CliCommand => ({ kind: "run", config })),
	);
}
