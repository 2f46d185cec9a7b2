// CHANGE: Parse the table printed by `unzip -l`
// PURITY: CORE
// INVARIANT: Header, separator and blank lines never yield names
// COMPLEXITY: O(n) over the output length

/**
 * Extract `.js` entry names from `unzip -l` output.
 *
 * The name is the text after the last space of each row, so names that
 * contain spaces are truncated to their final segment.
 *
 * @pure true
 * @example
 * ```ts
 * parseUnzipListing("  Length  Date  Time  Name\n---------\n  12  2024-01-01 00:00  greprefs.js\n");
 * // ["greprefs.js"]
 * ```
 */
export function parseUnzipListing(stdout: string): readonly string[] {
	const names: string[] = [];
	for (const line of stdout.split(/\r?\n/u)) {
		if (line.trim().length === 0) continue;
		if (line.toLowerCase().includes("length") || line.includes("---")) continue;
		const lastSpace = line.lastIndexOf(" ");
		if (lastSpace < 0) continue;
		const name = line.slice(lastSpace + 1);
		if (name.endsWith(".js")) names.push(name);
	}
	return names;
}
