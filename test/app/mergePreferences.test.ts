import * as path from "node:path";

import { Effect, Either } from "effect";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { mergeAllPreferences } from "../../src/app/mergePreferences.js";
import type { Installation } from "../../src/core/installation/layout.js";
import type { MergeConfig, PrefEntry } from "../../src/core/prefs/types.js";
import { DEFAULT_MERGE_CONFIG } from "../../src/core/prefs/types.js";
import { prefValueToJson } from "../../src/core/prefs/value.js";
import { expectLeft, runEither } from "../utils/either.js";
import { createInstallation, createTempDir, type TempDir } from "../utils/tempDir.js";

const BUILTIN = 'pref("a.only.builtin", 1);\npref("b.shared", 1);\npref("c.shared", 1);\n';
const GREPREFS = 'pref("b.shared", 2);\npref("c.shared", 2);\n';
const USER = 'user_pref("c.shared", 3);\nuser_pref("d.only.user", "mine");\n';

const STRICT: MergeConfig = { ...DEFAULT_MERGE_CONFIG, continueOnError: false };

let dir: TempDir;

beforeEach(() => {
	dir = createTempDir();
});

afterEach(() => {
	dir.cleanup();
});

function summary(entries: readonly PrefEntry[]) {
	return entries.map((entry) => [entry.key, prefValueToJson(entry.value), entry.source, entry.sourceFile]);
}

function createProfile(prefs?: string): string {
	const profile = dir.mkdir("profile");
	if (prefs !== undefined) dir.write("profile/prefs.js", prefs);
	return profile;
}

function cacheOptions() {
	return { extract: { cacheDir: path.join(dir.root, "cache") } };
}

describe("mergeAllPreferences", () => {
	it("layers built-in, global and user tiers in that order", async () => {
		const install = createInstallation(dir, {
			omni: { "defaults/pref/browser.js": BUILTIN },
			greprefs: GREPREFS,
		});
		const profile = createProfile(USER);

		const merged = await Effect.runPromise(
			mergeAllPreferences(profile, install, DEFAULT_MERGE_CONFIG, cacheOptions()),
		);

		expect(summary(merged.entries)).toEqual([
			["a.only.builtin", 1, "BuiltIn", "omni.ja:defaults/pref/browser.js"],
			["b.shared", 2, "GlobalDefault", "greprefs.js"],
			["c.shared", 3, "User", "prefs.js"],
			["d.only.user", "mine", "User", "prefs.js"],
		]);
		expect(merged.loadedSources).toEqual(["BuiltIn", "GlobalDefault", "User"]);
		expect(merged.warnings).toEqual([]);
		expect(merged.installPath).toBe(install);
		expect(merged.profilePath).toBe(profile);
	});

	it("records BuiltIn twice for a located installation", async () => {
		const install = createInstallation(dir, {
			omni: { "defaults/pref/browser.js": BUILTIN },
			greprefs: GREPREFS,
			version: "128.0",
		});
		const located: Installation = { path: install, version: "128.0" };
		const merged = await Effect.runPromise(
			mergeAllPreferences(createProfile(USER), undefined, DEFAULT_MERGE_CONFIG, {
				...cacheOptions(),
				locateInstallation: () => Effect.succeed(located),
			}),
		);

		expect(merged.loadedSources).toEqual(["BuiltIn", "BuiltIn", "GlobalDefault", "User"]);
		expect(merged.installPath).toBe(install);
	});

	it("does not look for an installation when only the user tier is wanted", async () => {
		const locate = vi.fn(() => Effect.succeed(undefined));
		const merged = await Effect.runPromise(
			mergeAllPreferences(
				createProfile(USER),
				undefined,
				{ ...DEFAULT_MERGE_CONFIG, includeBuiltins: false, includeGlobals: false },
				{ locateInstallation: locate },
			),
		);

		expect(locate).not.toHaveBeenCalled();
		expect(merged.loadedSources).toEqual(["User"]);
		expect(merged.installPath).toBeUndefined();
	});

	it("collects warnings for missing sources", async () => {
		const install = createInstallation(dir, { omni: { "defaults/pref/browser.js": BUILTIN } });
		const profile = createProfile();
		const prefsPath = path.join(profile, "prefs.js");

		const merged = await Effect.runPromise(
			mergeAllPreferences(profile, install, DEFAULT_MERGE_CONFIG, cacheOptions()),
		);

		expect(merged.warnings).toEqual([
			"greprefs.js not found in browser installation",
			"Failed to load global preferences: Preference file not found: greprefs.js",
			`prefs.js not found at ${prefsPath}`,
			`Failed to load user preferences: Preference file not found: ${prefsPath}`,
		]);
		expect(merged.loadedSources).toEqual(["BuiltIn"]);
		expect(merged.entries.map((entry) => entry.key)).toEqual(["a.only.builtin", "b.shared", "c.shared"]);
	});

	it("skips an archive file that does not parse and keeps the rest", async () => {
		const install = createInstallation(dir, {
			omni: { "defaults/pref/bad.js": "pref(", "defaults/pref/good.js": 'pref("ok", true);\n' },
		});
		const merged = await Effect.runPromise(
			mergeAllPreferences(createProfile(), install, DEFAULT_MERGE_CONFIG, cacheOptions()),
		);

		const badPath = path.join(dir.root, "cache", "defaults", "pref", "bad.js");
		expect(merged.entries.map((entry) => entry.key)).toEqual(["ok"]);
		expect(merged.warnings[0]?.startsWith(`Failed to parse ${badPath}: Parser error at line 1`)).toBe(true);
	});

	it("warns when no installation is found", async () => {
		const merged = await Effect.runPromise(
			mergeAllPreferences(createProfile(USER), undefined, DEFAULT_MERGE_CONFIG, {
				locateInstallation: () => Effect.succeed(undefined),
			}),
		);

		expect(merged.warnings).toEqual(["Browser installation not found"]);
		expect(merged.loadedSources).toEqual(["User"]);
	});
});

describe("mergeAllPreferences in strict mode", () => {
	it("fails when no installation is found", async () => {
		const searched = [path.join(dir.root, "nowhere")];
		const result = await runEither(
			mergeAllPreferences(createProfile(USER), undefined, STRICT, {
				searchPaths: searched,
				locateInstallation: () => Effect.succeed(undefined),
			}),
		);
		expect(expectLeft(result)).toMatchObject({ _tag: "InstallationNotFound", searched });
	});

	it("fails on a missing prefs.js", async () => {
		const install = createInstallation(dir, {
			omni: { "defaults/pref/browser.js": BUILTIN },
			greprefs: GREPREFS,
		});
		const profile = createProfile();
		const result = await runEither(mergeAllPreferences(profile, install, STRICT, cacheOptions()));
		expect(expectLeft(result)).toMatchObject({
			_tag: "PrefFileNotFound",
			file: path.join(profile, "prefs.js"),
		});
	});

	it("fails on a missing greprefs.js", async () => {
		const install = createInstallation(dir, { omni: { "defaults/pref/browser.js": BUILTIN } });
		const result = await runEither(mergeAllPreferences(createProfile(USER), install, STRICT, cacheOptions()));
		expect(expectLeft(result)).toMatchObject({ _tag: "PrefFileNotFound", file: "greprefs.js" });
	});

	it("fails with OmniJaError when the archive is unusable", async () => {
		const install = createInstallation(dir, { greprefs: GREPREFS });
		const result = await runEither(mergeAllPreferences(createProfile(USER), install, STRICT, cacheOptions()));
		expect(expectLeft(result)).toMatchObject({
			_tag: "OmniJaError",
			detail: "Failed to load built-in preferences: Preference file not found: omni.ja",
		});
	});

	it("succeeds when every source loads", async () => {
		const install = createInstallation(dir, {
			omni: { "defaults/pref/browser.js": BUILTIN },
			greprefs: GREPREFS,
		});
		const result = await runEither(mergeAllPreferences(createProfile(USER), install, STRICT, cacheOptions()));
		expect(Either.isRight(result)).toBe(true);
	});
});
