// CHANGE: Three-tier preference merge (omni.ja → greprefs.js → prefs.js)
// PURITY: APP (composes SHELL loaders with CORE merge primitives)
// EFFECT: Effect<MergedPreferences, MergeError>
// INVARIANT: Later tiers overwrite earlier ones key by key; the result is sorted by key
// INVARIANT: With continueOnError every tier failure becomes a warning
// COMPLEXITY: O(n log n) where n = total parsed entries

import { Effect, Either } from "effect";

import type { AppError, IoError, MergeError } from "../core/errors.js";
import {
	describeError,
	InstallationNotFound,
	OmniJaError,
	PrefFileNotFound,
} from "../core/errors.js";
import type { Installation } from "../core/installation/layout.js";
import { applyTier, sortEntries, stampSource } from "../core/prefs/merge.js";
import type {
	ExtractConfig,
	MergeConfig,
	MergedPreferences,
	PrefEntry,
	PrefSource,
} from "../core/prefs/types.js";
import { DEFAULT_MERGE_CONFIG } from "../core/prefs/types.js";
import type { ArchiveReader } from "../shell/archive/reader.js";
import { OmniExtractor } from "../shell/archive/extractor.js";
import {
	findGreprefs,
	findInstallation,
	findOmniJa,
	searchPaths,
} from "../shell/installation/locator.js";
import { parsePrefsFile } from "../shell/prefs/load.js";
import { debugLog } from "../shell/utils/log.js";
import { fs, path } from "../shell/utils/node-mods.js";

export interface MergeOptions {
	/** Installation lookup used when no install path is given. */
	readonly locateInstallation?: () => Effect.Effect<Installation | undefined, IoError>;
	/** Directories probed by the default lookup and reported when nothing is found. */
	readonly searchPaths?: readonly string[];
	readonly extract?: Partial<ExtractConfig>;
	readonly readers?: readonly ArchiveReader[];
}

export const PREFS_FILE = "prefs.js";
export const GREPREFS_FILE = "greprefs.js";

type Warnings = string[];

function loadBuiltinTier(
	installPath: string,
	options: MergeOptions,
	warnings: Warnings,
): Effect.Effect<readonly PrefEntry[], AppError> {
	const omniPath = findOmniJa(installPath);
	if (omniPath === undefined) {
		warnings.push("omni.ja not found in browser installation");
		return Effect.fail(new PrefFileNotFound({ file: "omni.ja" }));
	}
	return Effect.acquireUseRelease(
		OmniExtractor.open(
			omniPath,
			options.extract,
			options.readers === undefined ? {} : { readers: options.readers },
		),
		(extractor) =>
			Effect.gen(function* () {
				const files = yield* extractor.extractPrefs();
				const entries: PrefEntry[] = [];
				for (const file of files) {
					const parsed = yield* Effect.either(parsePrefsFile(file.path));
					if (Either.isLeft(parsed)) {
						warnings.push(`Failed to parse ${file.path}: ${describeError(parsed.left)}`);
						continue;
					}
					entries.push(...stampSource(parsed.right, "BuiltIn", `omni.ja:${file.entryName}`));
				}
				return entries;
			}),
		(extractor) => extractor.releaseQuietly(),
	);
}

function loadGlobalTier(
	installPath: string,
	warnings: Warnings,
): Effect.Effect<readonly PrefEntry[], AppError> {
	const greprefs = findGreprefs(installPath);
	if (greprefs === undefined) {
		warnings.push(`${GREPREFS_FILE} not found in browser installation`);
		return Effect.fail(new PrefFileNotFound({ file: GREPREFS_FILE }));
	}
	return Effect.map(parsePrefsFile(greprefs), (entries) =>
		stampSource(entries, "GlobalDefault", GREPREFS_FILE),
	);
}

function loadUserTier(
	profilePath: string,
	warnings: Warnings,
): Effect.Effect<readonly PrefEntry[], MergeError> {
	const prefsPath = path.join(profilePath, PREFS_FILE);
	if (!fs.existsSync(prefsPath)) {
		warnings.push(`${PREFS_FILE} not found at ${prefsPath}`);
		return Effect.fail(new PrefFileNotFound({ file: prefsPath }));
	}
	return Effect.map(parsePrefsFile(prefsPath), (entries) =>
		stampSource(entries, "User", PREFS_FILE),
	);
}

/**
 * Merge built-in, global and user preferences for one profile.
 *
 * @param profilePath Profile directory holding prefs.js
 * @param installPath Browser installation; located automatically when omitted
 *
 * @invariant precedence BuiltIn < GlobalDefault < User
 * @invariant a located installation records BuiltIn in loadedSources once on
 *            discovery and once more when the built-in tier loads
 *
 * @example
 * ```ts
 * const merged = yield* mergeAllPreferences("/home/me/.mozilla/firefox/abc.default", undefined);
 * getEffectivePref(merged.entries, "browser.startup.homepage");
 * ```
 */
export function mergeAllPreferences(
	profilePath: string,
	installPath: string | undefined,
	config: MergeConfig = DEFAULT_MERGE_CONFIG,
	options: MergeOptions = {},
): Effect.Effect<MergedPreferences, MergeError> {
	return Effect.gen(function* () {
		const warnings: Warnings = [];
		const loadedSources: PrefSource[] = [];
		const merged = new Map<string, PrefEntry>();
		const probed = options.searchPaths ?? searchPaths();
		const locate = options.locateInstallation ?? (() => findInstallation(probed));

		let resolvedInstall = installPath;
		if (resolvedInstall === undefined && (config.includeBuiltins || config.includeGlobals)) {
			const located = yield* Effect.either(locate());
			if (Either.isLeft(located)) {
				warnings.push(`Failed to locate browser installation: ${describeError(located.left)}`);
			} else if (located.right === undefined) {
				warnings.push("Browser installation not found");
			} else {
				debugLog(`Found browser ${located.right.version} at ${located.right.path}`);
				loadedSources.push("BuiltIn");
				resolvedInstall = located.right.path;
			}
			if (resolvedInstall === undefined && !config.continueOnError) {
				return yield* Effect.fail(new InstallationNotFound({ searched: probed }));
			}
		}

		if (config.includeBuiltins && resolvedInstall !== undefined) {
			const builtins = yield* Effect.either(loadBuiltinTier(resolvedInstall, options, warnings));
			if (Either.isRight(builtins)) {
				debugLog(`Loaded ${builtins.right.length} built-in preferences from omni.ja`);
				applyTier(merged, builtins.right);
				loadedSources.push("BuiltIn");
			} else {
				const message = `Failed to load built-in preferences: ${describeError(builtins.left)}`;
				warnings.push(message);
				if (!config.continueOnError) return yield* Effect.fail(new OmniJaError({ detail: message }));
			}
		}

		if (config.includeGlobals && resolvedInstall !== undefined) {
			const globals = yield* Effect.either(loadGlobalTier(resolvedInstall, warnings));
			if (Either.isRight(globals)) {
				debugLog(`Loaded ${globals.right.length} global preferences from ${GREPREFS_FILE}`);
				applyTier(merged, globals.right);
				loadedSources.push("GlobalDefault");
			} else {
				warnings.push(`Failed to load global preferences: ${describeError(globals.left)}`);
				if (!config.continueOnError) {
					return yield* Effect.fail(new PrefFileNotFound({ file: GREPREFS_FILE }));
				}
			}
		}

		if (config.includeUser) {
			const user = yield* Effect.either(loadUserTier(profilePath, warnings));
			if (Either.isRight(user)) {
				debugLog(`Loaded ${user.right.length} user preferences from ${PREFS_FILE}`);
				applyTier(merged, user.right);
				loadedSources.push("User");
			} else {
				warnings.push(`Failed to load user preferences: ${describeError(user.left)}`);
				if (!config.continueOnError) return yield* Effect.fail(user.left);
			}
		}

		return {
			entries: sortEntries(merged.values()),
			profilePath,
			loadedSources,
			warnings,
			...(resolvedInstall === undefined ? {} : { installPath: resolvedInstall }),
		};
	});
}
