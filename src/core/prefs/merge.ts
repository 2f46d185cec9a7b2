// CHANGE: Pure merge primitives shared by the merge orchestrator and tests
// PURITY: CORE
// INVARIANT: Tiers are applied low → high precedence; a later insert for the same key replaces the earlier one
// COMPLEXITY: O(n log n) for the final sort where n = |distinct keys|

import type { PrefEntry, PrefSource } from "./types.js";

/**
 * Provenance-stamped copy of each entry.
 *
 * @pure true
 * @invariant ∀i: result[i].key = entries[i].key ∧ result[i].source = source
 */
export function stampSource(
	entries: readonly PrefEntry[],
	source: PrefSource,
	sourceFile: string,
): readonly PrefEntry[] {
	return entries.map((entry) => ({ ...entry, source, sourceFile }));
}

/**
 * Insert a tier into the key → entry map.
 *
 * @pure false (mutates `map`, which is owned by the caller's merge)
 * @complexity O(|entries|)
 */
export function applyTier(
	map: Map<string, PrefEntry>,
	entries: readonly PrefEntry[],
): void {
	for (const entry of entries) {
		map.set(entry.key, entry);
	}
}

/**
 * Materialize merged values sorted ascending by key (code unit order).
 *
 * @pure true
 */
export function sortEntries(entries: Iterable<PrefEntry>): readonly PrefEntry[] {
	return [...entries].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
}

/**
 * Collapse tiers given low → high into one sorted, key-unique sequence.
 *
 * @pure true
 */
export function mergeTiers(
	tiers: readonly (readonly PrefEntry[])[],
): readonly PrefEntry[] {
	const map = new Map<string, PrefEntry>();
	for (const tier of tiers) applyTier(map, tier);
	return sortEntries(map.values());
}

/**
 * First entry with the given key.
 *
 * @pure true
 * @complexity O(n)
 */
export function getEffectivePref(
	entries: readonly PrefEntry[],
	key: string,
): PrefEntry | undefined {
	return entries.find((entry) => entry.key === key);
}
