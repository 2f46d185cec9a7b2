// CHANGE: Unit tests for value classification, formatting and quoting

import { describe, expect, it } from "vitest";

import { PrefValue } from "../../../src/core/prefs/types.js";
import {
	formatRawValue,
	functionNameOf,
	prefTypeFromFunction,
	prefValueFromNumber,
	prefValueToJson,
	quoteString,
	renderLiteral,
	sourceRank,
} from "../../../src/core/prefs/value.js";

describe("prefValueFromNumber", () => {
	it("classifies integral numbers inside the signed 64-bit range as Integer", () => {
		expect(prefValueFromNumber(3)).toEqual(PrefValue.Integer({ value: 3n }));
		expect(prefValueFromNumber(-(2 ** 63))).toEqual(PrefValue.Integer({ value: -(2n ** 63n) }));
	});

	it("classifies fractional and out-of-range numbers as Float", () => {
		expect(prefValueFromNumber(0.5)).toEqual(PrefValue.Float({ value: 0.5 }));
		expect(prefValueFromNumber(2 ** 63)).toEqual(PrefValue.Float({ value: 2 ** 63 }));
		expect(prefValueFromNumber(-(2 ** 64))).toEqual(PrefValue.Float({ value: -(2 ** 64) }));
	});
});

describe("function names", () => {
	it("round-trips every preference type", () => {
		for (const name of ["user_pref", "pref", "lock_pref", "sticky_pref"]) {
			const prefType = prefTypeFromFunction(name);
			expect(prefType).toBeDefined();
			if (prefType !== undefined) expect(functionNameOf(prefType)).toBe(name);
		}
	});

	it("rejects other identifiers", () => {
		expect(prefTypeFromFunction("defaultPref")).toBeUndefined();
	});
});

describe("sourceRank", () => {
	it("orders built-in below global below user", () => {
		expect(sourceRank("BuiltIn")).toBeLessThan(sourceRank("GlobalDefault"));
		expect(sourceRank("GlobalDefault")).toBeLessThan(sourceRank("User"));
	});
});

describe("formatRawValue", () => {
	it("prints integers without a decimal point and strings unquoted", () => {
		expect(formatRawValue(PrefValue.Integer({ value: -42n }))).toBe("-42");
		expect(formatRawValue(PrefValue.Float({ value: 3.14 }))).toBe("3.14");
		expect(formatRawValue(PrefValue.String({ value: "test value" }))).toBe("test value");
		expect(formatRawValue(PrefValue.Bool({ value: false }))).toBe("false");
		expect(formatRawValue(PrefValue.Null())).toBe("null");
	});
});

describe("prefValueToJson", () => {
	it("projects values onto JSON scalars", () => {
		expect(prefValueToJson(PrefValue.Integer({ value: 7n }))).toBe(7);
		expect(prefValueToJson(PrefValue.Null())).toBeNull();
		expect(prefValueToJson(PrefValue.String({ value: "x" }))).toBe("x");
	});
});

describe("quoteString / renderLiteral", () => {
	it("escapes quotes, backslashes and control characters", () => {
		expect(quoteString('a"b\\c\n\u0001')).toBe('"a\\"b\\\\c\\n\\x01"');
	});

	it("leaves non-ASCII text as is", () => {
		expect(quoteString("héllo")).toBe('"héllo"');
	});

	it("renders each literal kind", () => {
		expect(renderLiteral(PrefValue.Bool({ value: true }))).toBe("true");
		expect(renderLiteral(PrefValue.Integer({ value: 10n }))).toBe("10");
		expect(renderLiteral(PrefValue.String({ value: "x" }))).toBe('"x"');
		expect(renderLiteral(PrefValue.Null())).toBe("null");
	});
});
