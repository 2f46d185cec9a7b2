// CHANGE: On-disk cache directory helpers (walk, freshness, removal)
// PURITY: SHELL (filesystem I/O)
// INVARIANT: No locking; concurrent processes sharing one cache directory can race
// COMPLEXITY: O(n) where n = files under the cache directory

import { Effect } from "effect";

import { shouldExtract } from "../../core/archive/should-extract.js";
import { IoError } from "../../core/errors.js";
import { fs, path } from "../utils/node-mods.js";
import type { ExtractedFile } from "./reader.js";

function ioError(error: unknown, target: string): IoError {
	const detail = error instanceof Error ? error.message : String(error);
	return new IoError({ detail, path: target });
}

function walk(root: string, relative: string, out: string[]): void {
	const entries = fs.readdirSync(path.join(root, relative), { withFileTypes: true });
	for (const entry of entries) {
		const child = relative.length === 0 ? entry.name : `${relative}/${entry.name}`;
		if (entry.isDirectory()) walk(root, child, out);
		else if (entry.isFile()) out.push(child);
	}
}

/**
 * Every regular file under `root`, as `/`-separated paths relative to it.
 *
 * @pure false (reads directory tree)
 */
export function listFilesRecursive(root: string): Effect.Effect<readonly string[], IoError> {
	return Effect.try({
		try: () => {
			const out: string[] = [];
			walk(root, "", out);
			return out.sort();
		},
		catch: (error) => ioError(error, root),
	});
}

export function toExtractedFile(root: string, entryName: string): ExtractedFile {
	return { path: path.join(root, ...entryName.split("/")), entryName };
}

/**
 * A cache is fresh when it exists and its mtime is not older than the archive's.
 *
 * @pure false (stat)
 */
export function isCacheFresh(cacheDir: string, archivePath: string): Effect.Effect<boolean> {
	return Effect.sync(() => {
		if (!fs.existsSync(cacheDir)) return false;
		const cache = fs.statSync(cacheDir);
		const archive = fs.statSync(archivePath);
		return cache.isDirectory() && cache.mtimeMs >= archive.mtimeMs;
	}).pipe(Effect.catchAllDefect(() => Effect.succeed(false)));
}

/**
 * Previously extracted files that still match the targets, or undefined when
 * the cache is missing, stale or holds no matching file.
 */
export function loadFromCache(
	cacheDir: string,
	archivePath: string,
	targetFiles: readonly string[],
): Effect.Effect<readonly ExtractedFile[] | undefined> {
	return Effect.gen(function* () {
		const fresh = yield* isCacheFresh(cacheDir, archivePath);
		if (!fresh) return undefined;
		const files = yield* listFilesRecursive(cacheDir).pipe(
			Effect.orElseSucceed((): readonly string[] => []),
		);
		const matching = files
			.filter((name) => name.endsWith(".js") && shouldExtract(name, targetFiles))
			.map((name) => toExtractedFile(cacheDir, name));
		return matching.length === 0 ? undefined : matching;
	});
}

export function ensureDir(dir: string): Effect.Effect<string, IoError> {
	return Effect.try({
		try: () => {
			fs.mkdirSync(dir, { recursive: true });
			return dir;
		},
		catch: (error) => ioError(error, dir),
	});
}

export function removeDir(dir: string): Effect.Effect<void, IoError> {
	return Effect.try({
		try: () => fs.rmSync(dir, { recursive: true, force: true }),
		catch: (error) => ioError(error, dir),
	});
}

export function removeFile(file: string): Effect.Effect<void, IoError> {
	return Effect.try({
		try: () => fs.rmSync(file, { force: true }),
		catch: (error) => ioError(error, file),
	});
}
