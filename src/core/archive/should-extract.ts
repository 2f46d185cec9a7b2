// CHANGE: Entry selection and safety predicates for resource-bundle extraction
// PURITY: CORE
// INVARIANT: An unsafe entry name is never extracted, whatever the target patterns say
// COMPLEXITY: O(|targets| · |name|)

/** Per-entry uncompressed size ceiling (decompression-bomb heuristic). */
export const MAX_ENTRY_UNCOMPRESSED_SIZE = 10 * 1024 * 1024;

const WILDCARD_SUFFIX = "*.js";

/**
 * Path traversal check on a raw archive entry name.
 *
 * @pure true
 * @invariant contains("..") ∨ startsWith("/") ∨ startsWith("\\") ⇒ unsafe
 */
export function isUnsafeEntryName(name: string): boolean {
	return name.includes("..") || name.startsWith("/") || name.startsWith("\\");
}

export function isJsFile(name: string): boolean {
	return name.endsWith(".js");
}

function isGreprefs(name: string): boolean {
	return name === "greprefs.js" || name.endsWith("/greprefs.js");
}

/**
 * Whether an archive entry is a preference file worth extracting.
 *
 * - `greprefs.js` (at any depth) always matches
 * - no targets: any `.js` entry matches
 * - `prefix/*.js`: prefix match plus `.js` suffix
 * - anything else: exact match
 *
 * @pure true
 * @example shouldExtract("defaults/pref/browser.js", ["defaults/pref/*.js"]) === true
 */
export function shouldExtract(
	name: string,
	targetFiles: readonly string[],
): boolean {
	if (isGreprefs(name)) return true;
	if (targetFiles.length === 0) return isJsFile(name);

	return targetFiles.some((pattern) => {
		if (pattern.endsWith(WILDCARD_SUFFIX)) {
			const prefix = pattern.slice(0, -WILDCARD_SUFFIX.length);
			return name.startsWith(prefix) && isJsFile(name);
		}
		return name === pattern;
	});
}

/**
 * Full admission test for one entry as read from the archive directory.
 *
 * @pure true
 * @invariant size is consulted only for entries that pass both the path and pattern checks
 */
export function admitEntry(
	name: string,
	uncompressedSize: number,
	targetFiles: readonly string[],
): "extract" | "unsafe" | "unmatched" | "oversized" {
	if (isUnsafeEntryName(name)) return "unsafe";
	if (!shouldExtract(name, targetFiles)) return "unmatched";
	if (uncompressedSize > MAX_ENTRY_UNCOMPRESSED_SIZE) return "oversized";
	return "extract";
}
