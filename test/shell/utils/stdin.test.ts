import { Readable } from "node:stream";

import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import { readAll } from "../../../src/shell/utils/stdin.js";
import { expectLeft, runEither } from "../../utils/either.js";

describe("readAll", () => {
	it("joins string and buffer chunks as UTF-8", async () => {
		const input = Readable.from(['user_pref("a", ', Buffer.from('"é");\n', "utf8")]);
		expect(await Effect.runPromise(readAll(input))).toBe('user_pref("a", "é");\n');
	});

	it("maps a stream error to IoError", async () => {
		const input = new Readable({
			read() {
				this.destroy(new Error("broken pipe"));
			},
		});
		expect(expectLeft(await runEither(readAll(input)))).toMatchObject({
			_tag: "IoError",
			detail: "Failed to read standard input: broken pipe",
		});
	});
});
