// CHANGE: Capability interface for archive readers (native decoder, external unzip)
// PURITY: SHELL (interface only)
// INVARIANT: Readers are tried in order; the first that succeeds wins

import type { Effect } from "effect";

import type { ExtractionFailed, IoError } from "../../core/errors.js";

/** One file written into the cache directory. */
export interface ExtractedFile {
	/** Absolute path on disk. */
	readonly path: string;
	/** Archive-relative name with `/` separators. */
	readonly entryName: string;
}

export interface ExtractRequest {
	readonly archivePath: string;
	readonly destination: string;
	readonly targetFiles: readonly string[];
}

export interface ArchiveReader {
	readonly name: string;
	/** Names of the `.js` entries. */
	readonly list: (archivePath: string) => Effect.Effect<readonly string[], ExtractionFailed>;
	/** Write the admitted entries under `destination`, preserving archive-relative paths. */
	readonly extract: (
		request: ExtractRequest,
	) => Effect.Effect<readonly ExtractedFile[], ExtractionFailed | IoError>;
}
