// CHANGE: Degraded-mode archive reader that shells out to `unzip`
// PURITY: SHELL (process execution, filesystem I/O)
// EFFECT: Effect<readonly ExtractedFile[], ExtractionFailed | IoError>
// INVARIANT: A non-zero unzip exit is a warning; zero surviving target files is ExtractionFailed

import { Effect } from "effect";

import { shouldExtract } from "../../core/archive/should-extract.js";
import { parseUnzipListing } from "../../core/archive/unzip-listing.js";
import { describeError, ExtractionFailed } from "../../core/errors.js";
import type { CommandRunner } from "../utils/exec.js";
import { runCommand } from "../utils/exec.js";
import { warn } from "../utils/log.js";
import { listFilesRecursive, removeFile, toExtractedFile } from "./cache.js";
import type { ArchiveReader, ExtractedFile } from "./reader.js";

const UNZIP = "unzip";

/**
 * @param run process runner (injected by tests)
 */
export function unzipReader(run: CommandRunner = runCommand): ArchiveReader {
	const invoke = (args: readonly string[]) =>
		run(UNZIP, args).pipe(
			Effect.mapError(
				(error) => new ExtractionFailed({ detail: `unzip command failed: ${describeError(error)}` }),
			),
		);

	return {
		name: "unzip",

		list: (archivePath) =>
			Effect.gen(function* () {
				const result = yield* invoke(["-l", archivePath]);
				if (result.exitCode !== 0) {
					return yield* Effect.fail(
						new ExtractionFailed({ detail: `unzip command failed: ${result.stderr.trim()}` }),
					);
				}
				return parseUnzipListing(result.stdout);
			}),

		extract: (request) =>
			Effect.gen(function* () {
				const result = yield* invoke(["-q", "-o", request.archivePath, "-d", request.destination]);
				if (result.exitCode !== 0) {
					warn(
						`unzip command had warnings (exit status ${result.exitCode}): ${result.stderr.trim()}`,
					);
				}

				const files = yield* listFilesRecursive(request.destination);
				const kept: ExtractedFile[] = [];
				for (const name of files) {
					if (!name.endsWith(".js")) continue;
					if (shouldExtract(name, request.targetFiles)) {
						kept.push(toExtractedFile(request.destination, name));
					} else {
						yield* removeFile(toExtractedFile(request.destination, name).path);
					}
				}

				if (kept.length === 0) {
					return yield* Effect.fail(
						new ExtractionFailed({ detail: "No .js files were extracted from omni.ja" }),
					);
				}
				return kept;
			}),
	};
}
