// CHANGE: Programmatic entry that runs the CLI without terminating the process
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { runCli } from "./app/runCli.js";
import type { ExitCode } from "./core/models.js";

/**
 * @param argv Arguments after the program name; defaults to process.argv
 * @returns ExitCode (0 | 1)
 */
export async function main(argv?: readonly string[]): Promise<ExitCode> {
	return Effect.runPromise(runCli(argv));
}
