// CHANGE: execFile wrapped in Effect; a non-zero exit is a result, not a failure
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<CommandResult, ExecError, never>
// INVARIANT: ∀ command: runCommand(command) → CommandResult ∨ ExecError(spawn failure)
// COMPLEXITY: O(1) time, O(n) space where n = output length

import { Effect } from "effect";

import { ExecError } from "../../core/errors.js";
import { execFile, promisify } from "./node-mods.js";

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 64 * 1024 * 1024;

export interface CommandResult {
	readonly stdout: string;
	readonly stderr: string;
	readonly exitCode: number;
}

/**
 * Injectable process runner; the unzip reader takes one so tests can fake it.
 */
export type CommandRunner = (
	command: string,
	args: readonly string[],
) => Effect.Effect<CommandResult, ExecError>;

function textField(error: Error, field: "stdout" | "stderr"): string {
	if (!(field in error)) return "";
	const value: unknown = Reflect.get(error, field);
	return typeof value === "string" ? value : "";
}

/**
 * Recover the result of a process that ran but exited non-zero.
 *
 * @pure true
 * @returns undefined when the process never started (ENOENT, EACCES, ...)
 */
function exitedWithStatus(error: unknown): CommandResult | undefined {
	if (!(error instanceof Error) || !("code" in error)) return undefined;
	const code: unknown = error.code;
	if (typeof code !== "number") return undefined;
	return {
		stdout: textField(error, "stdout"),
		stderr: textField(error, "stderr"),
		exitCode: code,
	};
}

/**
 * Run a command without a shell.
 *
 * @pure false (executes external command)
 * @effect Effect<CommandResult, ExecError>
 * @invariant exitCode = 0 on the success path of execFile
 */
export const runCommand: CommandRunner = (command, args) =>
	Effect.tryPromise({
		try: () =>
			execFileAsync(command, [...args], { maxBuffer: MAX_BUFFER, encoding: "utf8" }),
		catch: (error) => error,
	}).pipe(
		Effect.map(({ stdout, stderr }): CommandResult => ({ stdout, stderr, exitCode: 0 })),
		Effect.catchAll((error) => {
			const exited = exitedWithStatus(error);
			if (exited !== undefined) return Effect.succeed(exited);
			const detail = error instanceof Error ? error.message : String(error);
			return Effect.fail(new ExecError({ command: [command, ...args].join(" "), detail }));
		}),
	);
