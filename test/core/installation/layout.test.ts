// CHANGE: Unit tests for installation layout constants and version parsing

import { describe, expect, it } from "vitest";

import { defaultSearchPaths, parseIniVersion } from "../../../src/core/installation/layout.js";

describe("installation layout", () => {
	it("reads the first Version line of an ini file", () => {
		expect(parseIniVersion("[App]\nName=Firefox\nVersion=128.0.3\n")).toBe("128.0.3");
		expect(parseIniVersion("[App]\nVersion = 115.0esr\n")).toBe("115.0esr");
		expect(parseIniVersion("[App]\nName=Firefox\n")).toBeUndefined();
	});

	it("has platform-specific search paths", () => {
		expect(defaultSearchPaths("linux")).toContain("/usr/lib/firefox");
		expect(defaultSearchPaths("darwin")).toContain("/Applications/Firefox.app/Contents/Resources");
	});
});
