// CHANGE: Pure rendering of preference entries, profiles and installations to CLI text
// PURITY: CORE
// INVARIANT: Rendering never reorders entries; explanations are attached here and nowhere else
// COMPLEXITY: O(n) over the rendered entries

import { Either } from "effect";

import { InvalidPreference } from "../errors.js";
import type { Installation } from "../installation/layout.js";
import { getPreferenceExplanation } from "../prefs/explanations.js";
import type { PrefEntry } from "../prefs/types.js";
import { formatRawValue, prefValueToJson } from "../prefs/value.js";
import type { JsonScalar } from "../prefs/value.js";
import type { ProfileInfo } from "../profiles/profiles.js";

export type OutputType = "json-object" | "json-array";

export const OUTPUT_TYPES: readonly OutputType[] = ["json-object", "json-array"];

export type JsonValue =
	| JsonScalar
	| readonly JsonValue[]
	| { readonly [key: string]: JsonValue };

/**
 * Entry with its explanation filled from the static table (an explanation
 * already present on the entry is kept).
 *
 * @pure true
 */
export function explainEntry(entry: PrefEntry): PrefEntry {
	if (entry.explanation !== undefined) return entry;
	const explanation = getPreferenceExplanation(entry.key);
	return explanation === undefined ? entry : { ...entry, explanation };
}

/**
 * @pure true
 * @invariant ∀e ∈ result: getPreferenceExplanation(e.key) = undefined
 */
export function filterUnexplained(entries: readonly PrefEntry[]): readonly PrefEntry[] {
	return entries.filter((entry) => getPreferenceExplanation(entry.key) === undefined);
}

function entryToJson(entry: PrefEntry): JsonValue {
	const explained = explainEntry(entry);
	return {
		key: explained.key,
		value: prefValueToJson(explained.value),
		pref_type: explained.prefType,
		...(explained.explanation === undefined ? {} : { explanation: explained.explanation }),
		...(explained.source === undefined ? {} : { source: explained.source }),
		...(explained.sourceFile === undefined ? {} : { source_file: explained.sourceFile }),
	};
}

export function renderJson(value: JsonValue): string {
	return JSON.stringify(value, null, 2);
}

/**
 * `json-object`: `{ key: value }`; `json-array`: one record per entry.
 *
 * @pure true
 * @invariant a key that occurs twice keeps its last value in json-object
 */
export function renderEntries(entries: readonly PrefEntry[], outputType: OutputType): string {
	if (outputType === "json-array") return renderJson(entries.map(entryToJson));
	return renderJson(
		Object.fromEntries(entries.map((entry) => [entry.key, prefValueToJson(entry.value)])),
	);
}

/**
 * Raw value of one key, as printed by `--get`.
 *
 * @pure true
 */
export function renderGet(
	entries: readonly PrefEntry[],
	key: string,
	unexplainedOnly: boolean,
): Either.Either<string, InvalidPreference> {
	// Last entry wins, so unmerged single-file input behaves like the merged map
	const entry = entries.findLast((candidate) => candidate.key === key);
	if (entry === undefined) {
		return Either.left(new InvalidPreference({ detail: `Preference '${key}' not found` }));
	}
	if (unexplainedOnly && getPreferenceExplanation(key) !== undefined) {
		return Either.left(
			new InvalidPreference({
				detail: `Preference '${key}' has an explanation, but --unexplained-only was specified`,
			}),
		);
	}
	return Either.right(formatRawValue(entry.value));
}

export function renderProfiles(profiles: readonly ProfileInfo[]): string {
	return renderJson(
		profiles.map((profile) => ({
			name: profile.name,
			path: profile.path,
			is_default: profile.isDefault,
			is_relative: profile.isRelative,
			locked_to_install: profile.lockedToInstall ?? null,
		})),
	);
}

export function renderInstallations(installations: readonly Installation[]): string {
	return renderJson(
		installations.map((install) => ({
			path: install.path,
			version: install.version,
			omni_ja: install.omniJa ?? null,
			greprefs: install.greprefs ?? null,
		})),
	);
}
