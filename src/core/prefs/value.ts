// CHANGE: Pure helpers over the preference value/type model
// PURITY: CORE
// INVARIANT: prefValueFromNumber is the single place that decides Integer vs Float
// COMPLEXITY: O(1) per value

import { match } from "ts-pattern";

import type { PrefSource, PrefType } from "./types.js";
import { PrefValue } from "./types.js";

const I64_MIN = -(2 ** 63);
const I64_LIMIT = 2 ** 63;

/**
 * Map a decoded numeric literal onto Integer or Float.
 *
 * @pure true
 * @invariant Number.isInteger(n) ∧ n ∈ [-2^63, 2^63) ⇔ result is Integer
 */
export function prefValueFromNumber(n: number): PrefValue {
	if (Number.isInteger(n) && n >= I64_MIN && n < I64_LIMIT) {
		// BigInt(-0) is 0n
		return PrefValue.Integer({ value: BigInt(n) });
	}
	return PrefValue.Float({ value: n });
}

const FUNCTION_TYPES: ReadonlyMap<string, PrefType> = new Map([
	["user_pref", "user"],
	["pref", "default"],
	["lock_pref", "locked"],
	["sticky_pref", "sticky"],
]);

/**
 * Statement function name → PrefType; undefined for anything else.
 *
 * @pure true
 */
export function prefTypeFromFunction(name: string): PrefType | undefined {
	return FUNCTION_TYPES.get(name);
}

export const PREF_FUNCTION_NAMES: readonly string[] = [
	...FUNCTION_TYPES.keys(),
];

/**
 * Inverse of {@link prefTypeFromFunction}.
 *
 * @pure true
 */
export function functionNameOf(prefType: PrefType): string {
	return match(prefType)
		.with("user", () => "user_pref")
		.with("default", () => "pref")
		.with("locked", () => "lock_pref")
		.with("sticky", () => "sticky_pref")
		.exhaustive();
}

/**
 * Precedence rank; higher wins on overwrite.
 *
 * @pure true
 * @invariant rank(BuiltIn) < rank(GlobalDefault) < rank(User)
 */
export function sourceRank(source: PrefSource): number {
	return match(source)
		.with("BuiltIn", () => 0)
		.with("GlobalDefault", () => 1)
		.with("User", () => 2)
		.with("SystemPolicy", () => 3)
		.exhaustive();
}

export type JsonScalar = string | number | boolean | null;

/**
 * JSON projection of a value. Integers outside the safe range lose precision,
 * matching what any JSON number consumer would read.
 *
 * @pure true
 */
export function prefValueToJson(value: PrefValue): JsonScalar {
	return match(value)
		.with({ _tag: "Bool" }, (v) => v.value)
		.with({ _tag: "Integer" }, (v) => Number(v.value))
		.with({ _tag: "Float" }, (v) => v.value)
		.with({ _tag: "String" }, (v) => v.value)
		.with({ _tag: "Null" }, () => null)
		.exhaustive();
}

/**
 * Text printed by `--get`: strings unquoted, integers without a decimal point.
 *
 * @pure true
 * @example formatRawValue(PrefValue.Integer({ value: 3n })) === "3"
 */
export function formatRawValue(value: PrefValue): string {
	return match(value)
		.with({ _tag: "Bool" }, (v) => (v.value ? "true" : "false"))
		.with({ _tag: "Integer" }, (v) => v.value.toString())
		.with({ _tag: "Float" }, (v) => String(v.value))
		.with({ _tag: "String" }, (v) => v.value)
		.with({ _tag: "Null" }, () => "null")
		.exhaustive();
}

/**
 * Render a value back into DSL literal syntax.
 *
 * @pure true
 * @invariant parse(renderLiteral(v)) ≡ v for every finite value
 */
export function renderLiteral(value: PrefValue): string {
	return match(value)
		.with({ _tag: "Bool" }, (v) => (v.value ? "true" : "false"))
		.with({ _tag: "Integer" }, (v) => v.value.toString())
		.with({ _tag: "Float" }, (v) => String(v.value))
		.with({ _tag: "String" }, (v) => quoteString(v.value))
		.with({ _tag: "Null" }, () => "null")
		.exhaustive();
}

/**
 * Quote a string as a DSL literal using only escapes the lexer accepts.
 *
 * @pure true
 * @complexity O(n)
 */
export function quoteString(text: string): string {
	let out = '"';
	for (const ch of text) {
		const code = ch.codePointAt(0) ?? 0;
		if (ch === '"') out += '\\"';
		else if (ch === "\\") out += "\\\\";
		else if (ch === "\n") out += "\\n";
		else if (ch === "\r") out += "\\r";
		else if (ch === "\t") out += "\\t";
		else if (code < 0x20 || code === 0x7f) {
			out += `\\x${code.toString(16).padStart(2, "0")}`;
		} else out += ch;
	}
	return `${out}"`;
}
