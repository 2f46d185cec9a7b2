// CHANGE: Read a whole input stream (stdin by default) as UTF-8 text
// PURITY: SHELL
// EFFECT: Effect<string, IoError>

import { Effect } from "effect";

import { IoError } from "../../core/errors.js";

export function readAll(
	input: NodeJS.ReadableStream = process.stdin,
): Effect.Effect<string, IoError> {
	return Effect.tryPromise({
		try: async () => {
			const chunks: Buffer[] = [];
			for await (const chunk of input) {
				chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
			}
			return Buffer.concat(chunks).toString("utf8");
		},
		catch: (error) =>
			new IoError({
				detail: `Failed to read standard input: ${error instanceof Error ? error.message : String(error)}`,
			}),
	});
}
