// CHANGE: Pure extraction of the backbone count from solver output
// WHY: The first-line pattern is the only contract between harness and solver
// FORMAT THEOREM: ∀out: check(out, k) = Right(k) ⇔ firstLine(out) matches `Found k backbones`
// PURITY: CORE
// INVARIANT: Only the first line of stdout is ever consulted
// COMPLEXITY: O(n) where n = length of the first line

import { Either, Option, pipe } from "effect";

import {
	BackboneCountMismatchError,
	SolverInvocationError,
	UnparsableOutputError,
} from "./errors.js";
import type { InvocationResult, SolverOutput } from "./models.js";

// Any Unicode decimal digit counts, as in `int()` on the solver's text.
export const BACKBONE_PATTERN = /Found (\p{Nd}+) backbones/u;

const DECIMAL_DIGIT = /^\p{Nd}$/u;

const LINE_FEED = 0x0a;
const CARRIAGE_RETURN = 0x0d;

const utf8 = new TextDecoder("utf-8");

/**
 * Decode the first line of raw process output.
 *
 * Lines end at `\n`, `\r\n` or a lone `\r`. Empty output has no first line;
 * output starting with a line break has an empty one.
 *
 * @pure true
 * @complexity O(n)
 */
export function firstLine(stdout: Uint8Array): Option.Option<string> {
	if (stdout.length === 0) return Option.none();
	let end = 0;
	while (
		end < stdout.length &&
		stdout[end] !== LINE_FEED &&
		stdout[end] !== CARRIAGE_RETURN
	) {
		end++;
	}
	return Option.some(utf8.decode(stdout.subarray(0, end)));
}

// Nd digits are encoded in contiguous runs of whole 0..9 blocks, so a digit's
// value is its distance from the start of its run, modulo 10.
function digitValue(codePoint: number): number {
	let start = codePoint;
	while (start > 0 && DECIMAL_DIGIT.test(String.fromCodePoint(start - 1))) {
		start--;
	}
	return (codePoint - start) % 10;
}

/**
 * Rewrite decimal digits of any script as ASCII digits.
 *
 * @example
 * ```ts
 * toAsciiDigits("١٢"); // "12"
 * ```
 */
export function toAsciiDigits(digits: string): string {
	return Array.from(digits, (digit) =>
		String(digitValue(digit.codePointAt(0) ?? 0)),
	).join("");
}

/**
 * Extract the backbone count from a single line.
 *
 * @example
 * ```ts
 * parseBackboneCount("Found 12 backbones:"); // Option.some(12n)
 * parseBackboneCount("UNSAT");               // Option.none()
 * ```
 */
export function parseBackboneCount(line: string): Option.Option<bigint> {
	const digits = BACKBONE_PATTERN.exec(line)?.[1];
	return digits === undefined
		? Option.none()
		: Option.some(BigInt(toAsciiDigits(digits)));
}

/**
 * Turn a finished solver run into its first-line view.
 *
 * @returns Left(SolverInvocationError) with reason "no-output" when stdout is empty
 * @pure true
 */
export function readInvocation(
	file: string,
	command: string,
	output: SolverOutput,
): Either.Either<InvocationResult, SolverInvocationError> {
	return Option.match(firstLine(output.stdout), {
		onNone: () =>
			Either.left(
				new SolverInvocationError({
					file,
					command,
					reason: "no-output",
					detail: describeTermination(output),
				}),
			),
		onSome: (line) =>
			Either.right({
				sourceFile: file,
				rawFirstLine: line,
				parsedCount: parseBackboneCount(line),
			}),
	});
}

/**
 * Compare the parsed count against the expectation.
 *
 * @postcondition Right(n) ⇒ n === expected
 */
export function checkBackboneCount(
	result: InvocationResult,
	expected: bigint,
): Either.Either<bigint, UnparsableOutputError | BackboneCountMismatchError> {
	return pipe(
		result.parsedCount,
		Option.match({
			onNone: () =>
				Either.left(
					new UnparsableOutputError({
						file: result.sourceFile,
						line: result.rawFirstLine,
					}),
				),
			onSome: (actual) =>
				actual === expected
					? Either.right(actual)
					: Either.left(
							new BackboneCountMismatchError({
								file: result.sourceFile,
								actual,
								expected,
							}),
						),
		}),
	);
}

function describeTermination(output: SolverOutput): string {
	if (output.signal !== null) {
		return `process was terminated by ${output.signal} without writing to stdout`;
	}
	const status = output.exitCode === null ? "unknown" : String(output.exitCode);
	return `process exited with status ${status} without writing to stdout`;
}
