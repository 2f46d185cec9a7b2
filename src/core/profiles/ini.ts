// CHANGE: Minimal INI reader for profiles.ini / application.ini
// PURITY: CORE
// INVARIANT: Keys are lower-cased (lookups are case-insensitive); section names keep their case
// COMPLEXITY: O(n) over the text

export interface IniSection {
	readonly name: string;
	readonly values: ReadonlyMap<string, string>;
}

const SECTION_HEADER = /^\[(.+)\]$/u;

/**
 * Parse INI text into sections in file order.
 *
 * Lines starting with `;` or `#` are comments; key/value pairs before the
 * first section header are ignored; a leading BOM is stripped.
 *
 * @pure true
 */
export function parseIni(text: string): readonly IniSection[] {
	const sections: IniSection[] = [];
	let current: Map<string, string> | undefined;

	for (const rawLine of text.replace(/^\uFEFF/u, "").split(/\r?\n/u)) {
		const line = rawLine.trim();
		if (line.length === 0 || line.startsWith(";") || line.startsWith("#")) continue;

		const header = SECTION_HEADER.exec(line);
		if (header !== null) {
			current = new Map();
			sections.push({ name: (header[1] ?? "").trim(), values: current });
			continue;
		}

		const eq = line.indexOf("=");
		if (current === undefined || eq <= 0) continue;
		current.set(line.slice(0, eq).trim().toLowerCase(), line.slice(eq + 1).trim());
	}
	return sections;
}

export function iniValue(section: IniSection, key: string): string | undefined {
	return section.values.get(key.toLowerCase());
}

/**
 * Unsigned integer value of a key, or `fallback` when absent or malformed.
 *
 * @pure true
 */
export function iniUint(section: IniSection, key: string, fallback: number): number {
	const raw = iniValue(section, key);
	return raw !== undefined && /^\d+$/u.test(raw) ? Number.parseInt(raw, 10) : fallback;
}
