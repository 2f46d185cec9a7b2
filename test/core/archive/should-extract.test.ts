// CHANGE: Unit tests for archive entry admission

import { describe, expect, it } from "vitest";

import {
	admitEntry,
	isUnsafeEntryName,
	MAX_ENTRY_UNCOMPRESSED_SIZE,
	shouldExtract,
} from "../../../src/core/archive/should-extract.js";
import { parseUnzipListing } from "../../../src/core/archive/unzip-listing.js";

describe("isUnsafeEntryName", () => {
	it("flags traversal and absolute names", () => {
		expect(isUnsafeEntryName("../etc/passwd")).toBe(true);
		expect(isUnsafeEntryName("defaults/../../x.js")).toBe(true);
		expect(isUnsafeEntryName("/etc/passwd")).toBe(true);
		expect(isUnsafeEntryName("\\windows\\x.js")).toBe(true);
		expect(isUnsafeEntryName("defaults/pref/browser.js")).toBe(false);
	});
});

describe("shouldExtract", () => {
	const targets = ["defaults/pref/*.js", "modules/exact.js"];

	it("matches a prefix wildcard only for .js names", () => {
		expect(shouldExtract("defaults/pref/browser.js", targets)).toBe(true);
		expect(shouldExtract("defaults/pref/nested/deep.js", targets)).toBe(true);
		expect(shouldExtract("defaults/pref/readme.txt", targets)).toBe(false);
	});

	it("matches other targets exactly", () => {
		expect(shouldExtract("modules/exact.js", targets)).toBe(true);
		expect(shouldExtract("modules/other.js", targets)).toBe(false);
	});

	it("always takes greprefs.js", () => {
		expect(shouldExtract("greprefs.js", targets)).toBe(true);
		expect(shouldExtract("browser/greprefs.js", targets)).toBe(true);
	});

	it("takes every .js entry when there are no targets", () => {
		expect(shouldExtract("anything/at/all.js", [])).toBe(true);
		expect(shouldExtract("chrome.manifest", [])).toBe(false);
	});
});

describe("admitEntry", () => {
	it("checks safety, then the pattern, then the size", () => {
		expect(admitEntry("../x.js", 0, [])).toBe("unsafe");
		expect(admitEntry("x.txt", MAX_ENTRY_UNCOMPRESSED_SIZE + 1, [])).toBe("unmatched");
		expect(admitEntry("x.js", MAX_ENTRY_UNCOMPRESSED_SIZE + 1, [])).toBe("oversized");
		expect(admitEntry("x.js", MAX_ENTRY_UNCOMPRESSED_SIZE, [])).toBe("extract");
	});
});

describe("parseUnzipListing", () => {
	it("keeps .js names from the table body", () => {
		const stdout = [
			"Archive:  omni.ja",
			"  Length      Date    Time    Name",
			"---------  ---------- -----   ----",
			"      120  2024-01-01 00:00   defaults/pref/browser.js",
			"       10  2024-01-01 00:00   chrome.manifest",
			"       64  2024-01-01 00:00   greprefs.js",
			"",
			"---------                     -------",
			"      194                     3 files",
		].join("\n");
		expect(parseUnzipListing(stdout)).toEqual(["defaults/pref/browser.js", "greprefs.js"]);
	});
});
