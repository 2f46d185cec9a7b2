// CHANGE: In-process ZIP reader backed by adm-zip
// PURITY: SHELL (filesystem I/O)
// EFFECT: Effect<readonly ExtractedFile[], ExtractionFailed | IoError>
// INVARIANT: Unsafe names are skipped before the pattern filter; the size guard runs only on matches
// COMPLEXITY: O(e + b) where e = entries, b = bytes written

import AdmZip from "adm-zip";
import { Effect } from "effect";

import { admitEntry, isJsFile } from "../../core/archive/should-extract.js";
import { ExtractionFailed, IoError } from "../../core/errors.js";
import { debugLog } from "../utils/log.js";
import { fs, path } from "../utils/node-mods.js";
import { toExtractedFile } from "./cache.js";
import type { ArchiveReader, ExtractedFile, ExtractRequest } from "./reader.js";

function messageOf(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Parse the central directory; throws inside adm-zip for non-standard archives.
 */
function openZip(archivePath: string): Effect.Effect<AdmZip, ExtractionFailed> {
	return Effect.try({
		try: () => new AdmZip(archivePath),
		catch: (error) => new ExtractionFailed({ detail: messageOf(error) }),
	});
}

function writeEntry(
	entry: AdmZip.IZipEntry,
	request: ExtractRequest,
): Effect.Effect<ExtractedFile, ExtractionFailed | IoError> {
	return Effect.gen(function* () {
		const data = yield* Effect.try({
			try: () => entry.getData(),
			catch: (error) =>
				new ExtractionFailed({ detail: `${entry.entryName}: ${messageOf(error)}` }),
		});
		const file = toExtractedFile(request.destination, entry.entryName);
		yield* Effect.try({
			try: () => {
				fs.mkdirSync(path.dirname(file.path), { recursive: true });
				fs.writeFileSync(file.path, data);
			},
			catch: (error) => new IoError({ detail: messageOf(error), path: file.path }),
		});
		return file;
	});
}

export const nativeReader: ArchiveReader = {
	name: "native",

	list: (archivePath) =>
		openZip(archivePath).pipe(
			Effect.map((zip) =>
				zip
					.getEntries()
					.filter((entry) => !entry.isDirectory && isJsFile(entry.entryName))
					.map((entry) => entry.entryName),
			),
		),

	extract: (request) =>
		Effect.gen(function* () {
			const zip = yield* openZip(request.archivePath);
			const extracted: ExtractedFile[] = [];
			for (const entry of zip.getEntries()) {
				if (entry.isDirectory) continue;
				const verdict = admitEntry(entry.entryName, entry.header.size, request.targetFiles);
				if (verdict === "unsafe" || verdict === "oversized") {
					debugLog(`skipping ${verdict} archive entry ${JSON.stringify(entry.entryName)}`);
				}
				if (verdict !== "extract") continue;
				extracted.push(yield* writeEntry(entry, request));
			}
			return extracted;
		}),
};
