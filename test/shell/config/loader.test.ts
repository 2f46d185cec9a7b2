import * as path from "node:path";

import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { loadFileConfig, toFileConfig } from "../../../src/shell/config/index.js";
import { createTempDir, type TempDir } from "../../utils/tempDir.js";

let dir: TempDir;

beforeEach(() => {
	dir = createTempDir();
});

afterEach(() => {
	dir.cleanup();
});

describe("toFileConfig", () => {
	it("keeps well-typed keys", () => {
		expect(
			toFileConfig({
				maxOmniSize: 1024,
				cacheDir: "/tmp/c",
				targetFiles: ["defaults/pref/*.js"],
				continueOnError: false,
				profilesDir: "/p",
				installDir: "/i",
			}),
		).toEqual({
			maxOmniSize: 1024,
			cacheDir: "/tmp/c",
			targetFiles: ["defaults/pref/*.js"],
			continueOnError: false,
			profilesDir: "/p",
			installDir: "/i",
		});
	});

	it("drops wrongly typed values with a warning", () => {
		const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
		expect(toFileConfig({ maxOmniSize: -5, targetFiles: ["a", 1], cacheDir: "/c" })).toEqual({
			cacheDir: "/c",
		});
		expect(errors).toHaveBeenCalledWith(
			"Warning: Ignoring 'maxOmniSize' in prefscope.config.json: unexpected value -5",
		);
		expect(errors).toHaveBeenCalledWith(
			'Warning: Ignoring \'targetFiles\' in prefscope.config.json: unexpected value ["a",1]',
		);
	});

	it("rejects non-objects", () => {
		expect(toFileConfig([1, 2])).toBeNull();
		expect(toFileConfig("text")).toBeNull();
	});
});

describe("loadFileConfig", () => {
	it("returns {} for a missing file", async () => {
		expect(await Effect.runPromise(loadFileConfig(path.join(dir.root, "none.json")))).toEqual({});
	});

	it("loads a valid file", async () => {
		const file = dir.write("prefscope.config.json", JSON.stringify({ continueOnError: false }));
		expect(await Effect.runPromise(loadFileConfig(file))).toEqual({ continueOnError: false });
	});

	it("ignores a file that is not an object", async () => {
		const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
		const file = dir.write("prefscope.config.json", "[]");
		expect(await Effect.runPromise(loadFileConfig(file))).toEqual({});
		expect(errors).toHaveBeenCalledWith(`Warning: Ignoring ${file}: expected a JSON object`);
	});

	it("ignores malformed JSON", async () => {
		const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
		const file = dir.write("prefscope.config.json", "{ not json");
		expect(await Effect.runPromise(loadFileConfig(file))).toEqual({});
		expect(errors).toHaveBeenCalledTimes(1);
		expect(String(errors.mock.calls[0]?.[0]).startsWith(`Warning: Ignoring malformed ${file}: `)).toBe(true);
	});
});
