export type { CliCommand } from "./cli.js";
export { parseCLIArgs, USAGE } from "./cli.js";
