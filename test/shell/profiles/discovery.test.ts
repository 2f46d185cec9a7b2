import * as path from "node:path";

import { Effect, Either } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { findProfilePath, listProfiles, resolveProfilesDirectory } from "../../../src/shell/profiles/discovery.js";
import { expectLeft, runEither } from "../../utils/either.js";
import { createTempDir, type TempDir } from "../../utils/tempDir.js";

const PROFILES_INI = [
	"[Install4F96D1932A9F858E]",
	"Default=Profiles/abcd1234.work",
	"Locked=1",
	"",
	"[Profile1]",
	"Name=work",
	"IsRelative=1",
	"Path=Profiles/abcd1234.work",
	"",
	"[Profile0]",
	"Name=default",
	"IsRelative=1",
	"Path=Profiles/wxyz9876.default",
	"Default=1",
	"",
	"[General]",
	"StartWithLastProfile=1",
	"Version=2",
	"",
].join("\n");

let dir: TempDir;

beforeEach(() => {
	dir = createTempDir();
});

afterEach(() => {
	dir.cleanup();
});

describe("listProfiles", () => {
	it("reads profiles.ini and marks install locks", async () => {
		dir.write("profiles.ini", PROFILES_INI);
		const profiles = await Effect.runPromise(listProfiles(dir.root));

		expect(profiles).toEqual([
			{
				name: "work",
				path: "Profiles/abcd1234.work",
				isRelative: true,
				isDefault: false,
				lockedToInstall: "Install4F96D1932A9F858E",
			},
			{
				name: "default",
				path: "Profiles/wxyz9876.default",
				isRelative: true,
				isDefault: true,
			},
		]);
	});

	it("fails with an IoError when profiles.ini is missing", async () => {
		const error = expectLeft(await runEither(listProfiles(dir.root)));
		expect(error).toMatchObject({
			_tag: "IoError",
			detail:
				"profiles.ini not found or unreadable. The browser may not be installed or this is not a standard setup.",
			path: path.join(dir.root, "profiles.ini"),
		});
	});
});

describe("findProfilePath", () => {
	it("resolves a profiles.ini entry whose directory exists", async () => {
		dir.write("profiles.ini", PROFILES_INI);
		const expected = dir.mkdir("Profiles/abcd1234.work");
		expect(await Effect.runPromise(findProfilePath("work", dir.root))).toBe(expected);
	});

	it("scans the directory when profiles.ini is absent", async () => {
		dir.mkdir("k3j2h1.dev-edition-default");
		dir.mkdir("q9w8e7.default-release");
		const found = await Effect.runPromise(findProfilePath("default-release", dir.root));
		expect(found).toBe(path.join(dir.root, "q9w8e7.default-release"));
	});

	it("scans the directory when the profiles.ini entry points nowhere", async () => {
		dir.write("profiles.ini", PROFILES_INI);
		dir.mkdir("wxyz9876.default");
		const found = await Effect.runPromise(findProfilePath("default", dir.root));
		expect(found).toBe(path.join(dir.root, "wxyz9876.default"));
	});

	it("reports an ambiguous name", async () => {
		dir.mkdir("aaa.test");
		dir.mkdir("bbb.test");
		const error = expectLeft(await runEither(findProfilePath("test", dir.root)));
		expect(error).toMatchObject({
			_tag: "UsageError",
			detail: "Multiple profiles match 'test': aaa.test, bbb.test. Use the full directory name.",
		});
	});

	it("reports a missing profile", async () => {
		dir.mkdir("aaa.other");
		const error = expectLeft(await runEither(findProfilePath("nope", dir.root)));
		expect(error).toMatchObject({ _tag: "ProfileNotFound", name: "nope", directory: dir.root });
	});
});

describe("resolveProfilesDirectory", () => {
	it("uses an explicit directory as is", async () => {
		expect(await Effect.runPromise(resolveProfilesDirectory("/srv/profiles"))).toBe("/srv/profiles");
	});

	it("derives the directory from HOME on Linux", async () => {
		const result = await runEither(resolveProfilesDirectory(undefined, "linux", { HOME: "/home/tester" }));
		expect(Either.getOrThrow(result)).toBe(path.join("/home/tester", ".mozilla", "firefox"));
	});

	it("fails on Windows without APPDATA", async () => {
		const error = expectLeft(await runEither(resolveProfilesDirectory(undefined, "win32", {})));
		expect(error.detail).toBe("APPDATA environment variable not set");
	});
});
