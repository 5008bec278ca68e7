// Backend names understood by the backbone binary. Anything else is opaque to
// the harness and still passed through; the binary falls back to kissat.

export const DEFAULT_SOLVER = "oxisat";

export const KNOWN_SOLVER_BACKENDS: ReadonlyArray<string> = [
	"kissat",
	"cadical",
	"oxisat",
	"oxisat-dpll",
	"glucose",
	"glucose-syrup",
];

export function isKnownSolverBackend(name: string): boolean {
	return KNOWN_SOLVER_BACKENDS.includes(name);
}
