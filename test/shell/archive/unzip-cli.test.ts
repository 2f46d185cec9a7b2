import * as fs from "node:fs";
import * as path from "node:path";

import { Effect, Either } from "effect";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ExecError } from "../../../src/core/errors.js";
import { unzipReader } from "../../../src/shell/archive/unzip-cli.js";
import type { CommandResult, CommandRunner } from "../../../src/shell/utils/exec.js";
import { expectLeft, runEither } from "../../utils/either.js";
import { createTempDir, type TempDir } from "../../utils/tempDir.js";

let dir: TempDir;

beforeEach(() => {
	dir = createTempDir();
});

afterEach(() => {
	dir.cleanup();
});

/**
 * Runner that records its calls and, for an extraction, writes `files`
 * into the `-d` destination the way unzip would.
 */
function fakeUnzip(
	result: CommandResult,
	files: Readonly<Record<string, string>> = {},
): { readonly run: CommandRunner; readonly calls: (readonly string[])[] } {
	const calls: (readonly string[])[] = [];
	const run: CommandRunner = (_command, args) =>
		Effect.sync(() => {
			calls.push(args);
			const target = args.indexOf("-d");
			const destination = target === -1 ? undefined : args[target + 1];
			if (destination !== undefined) {
				for (const [name, content] of Object.entries(files)) {
					const file = path.join(destination, ...name.split("/"));
					fs.mkdirSync(path.dirname(file), { recursive: true });
					fs.writeFileSync(file, content);
				}
			}
			return result;
		});
	return { run, calls };
}

const OK: CommandResult = { stdout: "", stderr: "", exitCode: 0 };

describe("unzipReader.extract", () => {
	it("keeps matching .js files and removes the other .js files", async () => {
		const destination = dir.mkdir("out");
		const fake = fakeUnzip(OK, {
			"defaults/pref/a.js": "x",
			"modules/b.js": "y",
			"chrome.manifest": "z",
		});
		const files = Either.getOrThrow(
			await runEither(
				unzipReader(fake.run).extract({
					archivePath: "/opt/browser/omni.ja",
					destination,
					targetFiles: ["defaults/pref/*.js"],
				}),
			),
		);

		expect(fake.calls).toEqual([["-q", "-o", "/opt/browser/omni.ja", "-d", destination]]);
		expect(files).toEqual([
			{ path: path.join(destination, "defaults", "pref", "a.js"), entryName: "defaults/pref/a.js" },
		]);
		expect(fs.existsSync(path.join(destination, "modules", "b.js"))).toBe(false);
		expect(fs.existsSync(path.join(destination, "chrome.manifest"))).toBe(true);
	});

	it("warns on a non-zero exit and still returns what was written", async () => {
		const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
		const destination = dir.mkdir("out");
		const fake = fakeUnzip({ stdout: "", stderr: "bad CRC\n", exitCode: 1 }, { "a.js": "x" });
		const files = Either.getOrThrow(
			await runEither(
				unzipReader(fake.run).extract({ archivePath: "omni.ja", destination, targetFiles: [] }),
			),
		);

		expect(files.map((file) => file.entryName)).toEqual(["a.js"]);
		expect(errors).toHaveBeenCalledWith("Warning: unzip command had warnings (exit status 1): bad CRC");
	});

	it("fails when no target file survives", async () => {
		const destination = dir.mkdir("out");
		const fake = fakeUnzip(OK, { "modules/b.js": "y" });
		const result = await runEither(
			unzipReader(fake.run).extract({
				archivePath: "omni.ja",
				destination,
				targetFiles: ["defaults/pref/*.js"],
			}),
		);
		expect(expectLeft(result)).toMatchObject({
			_tag: "ExtractionFailed",
			detail: "No .js files were extracted from omni.ja",
		});
	});

	it("maps a spawn failure to ExtractionFailed", async () => {
		const run: CommandRunner = () =>
			Effect.fail(new ExecError({ command: "unzip -l omni.ja", detail: "spawn unzip ENOENT" }));
		const result = await runEither(unzipReader(run).list("omni.ja"));
		expect(expectLeft(result)).toMatchObject({
			_tag: "ExtractionFailed",
			detail: "unzip command failed: Command failed: unzip -l omni.ja: spawn unzip ENOENT",
		});
	});
});

describe("unzipReader.list", () => {
	it("parses the .js names out of the listing", async () => {
		const stdout = [
			"Archive:  omni.ja",
			"  Length      Date    Time    Name",
			"---------  ---------- -----   ----",
			"      120  2024-01-01 00:00   defaults/pref/browser.js",
			"       10  2024-01-01 00:00   chrome.manifest",
			"---------                     -------",
			"      130                     2 files",
		].join("\n");
		const fake = fakeUnzip({ stdout, stderr: "", exitCode: 0 });
		const names = Either.getOrThrow(await runEither(unzipReader(fake.run).list("omni.ja")));

		expect(fake.calls).toEqual([["-l", "omni.ja"]]);
		expect(names).toEqual(["defaults/pref/browser.js"]);
	});

	it("fails on a non-zero exit", async () => {
		const fake = fakeUnzip({ stdout: "", stderr: "  cannot find zipfile\n", exitCode: 9 });
		const result = await runEither(unzipReader(fake.run).list("omni.ja"));
		expect(expectLeft(result)).toMatchObject({
			_tag: "ExtractionFailed",
			detail: "unzip command failed: cannot find zipfile",
		});
	});
});
