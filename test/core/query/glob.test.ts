// CHANGE: Unit tests for glob compilation and preference queries

import { describe, expect, it } from "vitest";

import { compileGlob } from "../../../src/core/query/glob.js";
import { queryPreferences } from "../../../src/core/query/query.js";
import { intPref, keysOf } from "../../utils/builders.js";
import { expectLeft, expectRight } from "../../utils/either.js";

const matches = (pattern: string, key: string): boolean => expectRight(compileGlob(pattern)).test(key);

describe("compileGlob: wildcards", () => {
	it("matches any run of characters with *", () => {
		expect(matches("network.*", "network.proxy.type")).toBe(true);
		expect(matches("network.*", "network.")).toBe(true);
		expect(matches("network.*", "networkX")).toBe(false);
		expect(matches("*", "")).toBe(true);
	});

	it("treats dots and other regex syntax literally", () => {
		expect(matches("a.b", "aXb")).toBe(false);
		expect(matches("a+(b)", "a+(b)")).toBe(true);
	});

	it("matches exactly one character with ?", () => {
		expect(matches("a?c", "abc")).toBe(true);
		expect(matches("a?c", "ac")).toBe(false);
		expect(matches("a?c", "aéc")).toBe(true);
	});

	it("anchors both ends", () => {
		expect(matches("proxy", "network.proxy")).toBe(false);
	});
});

describe("compileGlob: character classes", () => {
	it("supports sets, ranges and negation", () => {
		expect(matches("[abc]x", "bx")).toBe(true);
		expect(matches("[abc]x", "dx")).toBe(false);
		expect(matches("v[0-9]", "v7")).toBe(true);
		expect(matches("[!a]b", "ab")).toBe(false);
		expect(matches("[!a]b", "cb")).toBe(true);
	});

	it("reads a leading ] as a member", () => {
		expect(matches("[]]", "]")).toBe(true);
	});

	it("rejects an unclosed class", () => {
		const error = expectLeft(compileGlob("[abc"));
		expect(error.pattern).toBe("[abc");
		expect(error.detail).toBe("unmatched '['");
	});

	it("rejects a reversed range", () => {
		expect(expectLeft(compileGlob("[z-a]")).detail).toBe("invalid range 'z-a'");
	});
});

describe("compileGlob: recursive wildcards", () => {
	it("accepts ** as a whole path component", () => {
		expect(matches("a/**/b", "a/b")).toBe(true);
		expect(matches("a/**/b", "a/x/y/b")).toBe(true);
		expect(matches("**", "anything/at/all")).toBe(true);
	});

	it("rejects ** inside a component and runs of three stars", () => {
		expect(expectLeft(compileGlob("a**")).detail).toBe(
			"recursive wildcards must form a single path component",
		);
		expect(expectLeft(compileGlob("a/***")).detail).toBe(
			"wildcards are either regular '*' or recursive '**'",
		);
	});
});

describe("queryPreferences", () => {
	const entries = [
		intPref("browser.startup.page", 1),
		intPref("network.proxy.type", 0),
		intPref("privacy.sanitize.pending", 2),
	];

	it("keeps entries matching any pattern, in input order", () => {
		const result = expectRight(queryPreferences(entries, ["privacy.*", "browser.*"]));
		expect(keysOf(result)).toEqual(["browser.startup.page", "privacy.sanitize.pending"]);
	});

	it("returns nothing for an empty pattern list", () => {
		expect(expectRight(queryPreferences(entries, []))).toEqual([]);
	});

	it("fails on the first invalid pattern before matching anything", () => {
		const error = expectLeft(queryPreferences(entries, ["network.*", "[oops", "a**"]));
		expect(error.pattern).toBe("[oops");
	});
});
