// CHANGE: Archive extractor owning a cache directory and a chain of readers
// PURITY: SHELL (filesystem I/O, process execution via readers)
// EFFECT: Effect<readonly ExtractedFile[], ExtractionFailed | IoError>
// INVARIANT: Size ceiling and existence are checked at open, before any entry is read
// INVARIANT: Cache reuse requires fresh mtime and at least one matching file
// COMPLEXITY: O(e) per extraction where e = archive entries

import { Effect, Either } from "effect";

import {
	describeError,
	ExtractionFailed,
	IoError,
	OmniJaTooLarge,
	PrefFileNotFound,
} from "../../core/errors.js";
import type { ExtractConfig } from "../../core/prefs/types.js";
import { DEFAULT_EXTRACT_CONFIG } from "../../core/prefs/types.js";
import { debugLog, warn } from "../utils/log.js";
import { fs, os, path } from "../utils/node-mods.js";
import { ensureDir, loadFromCache, removeDir } from "./cache.js";
import { nativeReader } from "./native-reader.js";
import type { ArchiveReader, ExtractedFile } from "./reader.js";
import { unzipReader } from "./unzip-cli.js";

export interface OmniExtractorOptions {
	/** Reader strategies, tried in order. Defaults to native then unzip. */
	readonly readers?: readonly ArchiveReader[];
}

export const DEFAULT_READERS: readonly ArchiveReader[] = [nativeReader, unzipReader()];

export type OpenError = PrefFileNotFound | OmniJaTooLarge | IoError;

function statSize(archivePath: string): Effect.Effect<number, IoError> {
	return Effect.try({
		try: () => fs.statSync(archivePath).size,
		catch: (error) =>
			new IoError({
				detail: error instanceof Error ? error.message : String(error),
				path: archivePath,
			}),
	});
}

function createOwnTempDir(): Effect.Effect<string | undefined> {
	return Effect.try(() => fs.mkdtempSync(path.join(os.tmpdir(), "prefscope-omni-"))).pipe(
		Effect.orElseSucceed(() => undefined),
	);
}

/**
 * Run `attempt` against each reader in order, returning the first success.
 */
function firstSuccessful<A>(
	readers: readonly ArchiveReader[],
	attempt: (reader: ArchiveReader) => Effect.Effect<A, ExtractionFailed | IoError>,
): Effect.Effect<A, ExtractionFailed | IoError> {
	return Effect.gen(function* () {
		let lastError: ExtractionFailed | IoError = new ExtractionFailed({
			detail: "no archive reader configured",
		});
		for (const [index, reader] of readers.entries()) {
			const result = yield* Effect.either(attempt(reader));
			if (Either.isRight(result)) return result.right;
			lastError = result.left;
			const next = readers[index + 1];
			if (next !== undefined) {
				warn(
					`${reader.name} reader failed: ${describeError(lastError)}. Falling back to ${next.name}.`,
				);
			}
		}
		return yield* Effect.fail(lastError);
	});
}

/**
 * Secure extractor for preference files inside an omni.ja bundle.
 *
 * @example
 * ```ts
 * const files = yield* Effect.acquireUseRelease(
 *   OmniExtractor.open("/usr/lib/firefox/browser/omni.ja", { targetFiles: ["defaults/pref/*.js"] }),
 *   (extractor) => extractor.extractPrefs(),
 *   (extractor) => extractor.releaseQuietly(),
 * );
 * ```
 */
export class OmniExtractor {
	private constructor(
		readonly archivePath: string,
		readonly config: ExtractConfig,
		private readonly ownTempDir: string | undefined,
		private readonly readers: readonly ArchiveReader[],
	) {}

	/**
	 * @effect fails with PrefFileNotFound for a missing archive and
	 *         OmniJaTooLarge when size > maxOmniSize
	 */
	static open(
		archivePath: string,
		config: Partial<ExtractConfig> = {},
		options: OmniExtractorOptions = {},
	): Effect.Effect<OmniExtractor, OpenError> {
		const resolved: ExtractConfig = { ...DEFAULT_EXTRACT_CONFIG, ...config };
		return Effect.gen(function* () {
			if (!fs.existsSync(archivePath)) {
				return yield* Effect.fail(new PrefFileNotFound({ file: archivePath }));
			}
			const size = yield* statSize(archivePath);
			if (size > resolved.maxOmniSize) {
				return yield* Effect.fail(
					new OmniJaTooLarge({ actual: size, limit: resolved.maxOmniSize }),
				);
			}
			const ownTempDir =
				resolved.cacheDir === undefined ? yield* createOwnTempDir() : undefined;
			return new OmniExtractor(
				archivePath,
				resolved,
				ownTempDir,
				options.readers ?? DEFAULT_READERS,
			);
		});
	}

	/**
	 * Explicit cache dir, else this instance's temp dir, else a keyed path
	 * under the system temp directory.
	 */
	cachePath(): Effect.Effect<string, IoError> {
		if (this.config.cacheDir !== undefined) return Effect.succeed(this.config.cacheDir);
		if (this.ownTempDir !== undefined) return Effect.succeed(this.ownTempDir);
		const stamp = Math.floor(Date.now() / 1000);
		const keyed = path.join(
			os.tmpdir(),
			"prefscope",
			"omni",
			`${path.basename(this.archivePath)}_${stamp}`,
		);
		return ensureDir(keyed);
	}

	/**
	 * Extract matching preference files, reusing a fresh cache unless forceRefresh.
	 *
	 * @effect ExtractionFailed when every reader fails
	 */
	extractPrefs(): Effect.Effect<readonly ExtractedFile[], ExtractionFailed | IoError> {
		const { archivePath, config, readers } = this;
		return Effect.gen(this, function* () {
			const cacheDir = yield* this.cachePath();
			if (!config.forceRefresh) {
				const cached = yield* loadFromCache(cacheDir, archivePath, config.targetFiles);
				if (cached !== undefined) {
					debugLog(`reusing ${cached.length} cached file(s) from ${cacheDir}`);
					return cached;
				}
			}
			yield* ensureDir(cacheDir);
			return yield* firstSuccessful(readers, (reader) =>
				reader.extract({ archivePath, destination: cacheDir, targetFiles: config.targetFiles }),
			);
		});
	}

	/** Names of the `.js` entries (native listing first, `unzip -l` second). */
	listJsFiles(): Effect.Effect<readonly string[], ExtractionFailed | IoError> {
		return firstSuccessful(this.readers, (reader) => reader.list(this.archivePath));
	}

	clearCache(): Effect.Effect<void, IoError> {
		return Effect.flatMap(this.cachePath(), removeDir);
	}

	/** Remove the instance-owned temp dir; an explicit cacheDir is left in place. */
	release(): Effect.Effect<void, IoError> {
		return this.ownTempDir === undefined ? Effect.void : removeDir(this.ownTempDir);
	}

	/** {@link release} with failures reported as a warning. */
	releaseQuietly(): Effect.Effect<void> {
		return this.release().pipe(
			Effect.catchAll((error) => Effect.sync(() => warn(describeError(error)))),
		);
	}
}
