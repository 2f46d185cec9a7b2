// CHANGE: Filter preference entries by glob patterns over their keys
// PURITY: CORE
// INVARIANT: All patterns compile before any entry is examined; the first invalid one is returned
// INVARIANT: An entry is kept when ANY pattern matches (OR semantics)
// COMPLEXITY: O(p + n·p) where p = |patterns|, n = |entries|

import { Either } from "effect";

import type { InvalidGlobPattern } from "../errors.js";
import type { PrefEntry } from "../prefs/types.js";
import { compileGlob } from "./glob.js";

/**
 * @pure true
 * @example
 * ```ts
 * queryPreferences(entries, ["network.*", "browser.startup.*"]);
 * ```
 */
export function queryPreferences(
	entries: readonly PrefEntry[],
	patterns: readonly string[],
): Either.Either<readonly PrefEntry[], InvalidGlobPattern> {
	return Either.map(Either.all(patterns.map(compileGlob)), (compiled) =>
		entries.filter((entry) => compiled.some((re) => re.test(entry.key))),
	);
}
