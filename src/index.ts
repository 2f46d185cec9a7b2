// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: SHELL internals stay private except the loaders a caller needs
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION (Programmatic Entry Points)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Merge built-in, global and user preferences of one profile.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { getEffectivePref, mergeAllPreferences } from "prefscope";
 *
 * const merged = await Effect.runPromise(
 *   mergeAllPreferences("/home/me/.mozilla/firefox/abc.default", undefined),
 * );
 * console.log(getEffectivePref(merged.entries, "browser.startup.homepage"));
 * ```
 *
 * @pure false - reads the installation, the archive and prefs.js
 */
export type { MergeOptions } from "./app/mergePreferences.js";
export { mergeAllPreferences } from "./app/mergePreferences.js";
export { executeCommand, runCli } from "./app/runCli.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type { ExitCode } from "./core/models.js";
export type {
	ExtractConfig,
	MergeConfig,
	MergedPreferences,
	PrefEntry,
	PrefSource,
	PrefType,
} from "./core/prefs/types.js";
export {
	DEFAULT_EXTRACT_CONFIG,
	DEFAULT_MAX_OMNI_SIZE,
	DEFAULT_MERGE_CONFIG,
	PrefValue,
	Token,
} from "./core/prefs/types.js";
export type { Installation } from "./core/installation/layout.js";
export type { ProfileInfo, ProfileRecord } from "./core/profiles/profiles.js";
export type { CliCommand, ConfigOptions, FileConfig } from "./core/types/index.js";

/**
 * Every error is a tagged value; `describeError` renders any of them.
 *
 * @pure true
 */
export type { AppError, MergeError, PrefParseError } from "./core/errors.js";
export {
	describeError,
	ExecError,
	ExtractionFailed,
	InstallationNotFound,
	InvalidGlobPattern,
	InvalidPreference,
	IoError,
	LexerError,
	OmniJaError,
	OmniJaTooLarge,
	ParserError,
	PrefFileNotFound,
	ProfileNotFound,
	UsageError,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE FUNCTIONS (Pure)
// ═══════════════════════════════════════════════════════════════════════════════

export { Lexer, tokenize } from "./core/prefs/lexer.js";
export { parsePrefs } from "./core/prefs/parser.js";
export { getEffectivePref, mergeTiers } from "./core/prefs/merge.js";
export {
	formatRawValue,
	prefValueFromNumber,
	prefValueToJson,
	renderLiteral,
} from "./core/prefs/value.js";
export { getPreferenceExplanation } from "./core/prefs/explanations.js";
export { compileGlob } from "./core/query/glob.js";
export { queryPreferences } from "./core/query/query.js";
export { parseIni } from "./core/profiles/ini.js";
export { parseInstallsIni, parseProfilesIni, profilesDirectory } from "./core/profiles/profiles.js";
export { defaultSearchPaths } from "./core/installation/layout.js";
export type { OutputType } from "./core/output/render.js";
export { renderEntries, renderGet } from "./core/output/render.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL LOADERS (Effectful)
// ═══════════════════════════════════════════════════════════════════════════════

export type { OmniExtractorOptions } from "./shell/archive/extractor.js";
export { OmniExtractor } from "./shell/archive/extractor.js";
export type { ArchiveReader, ExtractedFile } from "./shell/archive/reader.js";
export { nativeReader } from "./shell/archive/native-reader.js";
export { unzipReader } from "./shell/archive/unzip-cli.js";
export {
	findInstallation,
	listInstallations,
	readInstallationVersion,
} from "./shell/installation/locator.js";
export { findProfilePath, listProfiles } from "./shell/profiles/discovery.js";
export { parsePrefsFile } from "./shell/prefs/load.js";
