// CHANGE: Read and parse one preference file from disk
// PURITY: SHELL (filesystem I/O)
// EFFECT: Effect<readonly PrefEntry[], PrefFileNotFound | IoError | ParserError>
// COMPLEXITY: O(n) over the file size

import { Effect } from "effect";

import type { ParserError } from "../../core/errors.js";
import { IoError, PrefFileNotFound } from "../../core/errors.js";
import { parsePrefs } from "../../core/prefs/parser.js";
import type { PrefEntry } from "../../core/prefs/types.js";
import { fs } from "../utils/node-mods.js";

export function readTextFile(file: string): Effect.Effect<string, PrefFileNotFound | IoError> {
	return Effect.gen(function* () {
		if (!fs.existsSync(file)) return yield* Effect.fail(new PrefFileNotFound({ file }));
		return yield* Effect.tryPromise({
			try: () => fs.promises.readFile(file, "utf8"),
			catch: (error) =>
				new IoError({
					detail: error instanceof Error ? error.message : String(error),
					path: file,
				}),
		});
	});
}

/**
 * @pure false (reads `file`)
 * @invariant result ≡ parsePrefs(contents(file))
 */
export function parsePrefsFile(
	file: string,
): Effect.Effect<readonly PrefEntry[], PrefFileNotFound | IoError | ParserError> {
	return Effect.gen(function* () {
		const text = yield* readTextFile(file);
		return yield* parsePrefs(text);
	});
}
