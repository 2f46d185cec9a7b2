#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect } from "effect";

import { runCli } from "../app/runCli.js";

/**
 * CLI entry point for prefscope.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @invariant exit code is 0 when the command succeeded, otherwise 1
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void (async (): Promise<void> => {
	try {
		const code = await Effect.runPromise(runCli());
		process.exit(code);
	} catch (error) {
		// Defects only; typed failures were already reported by runCli
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
