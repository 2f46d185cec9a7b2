// CHANGE: Typed domain error ADT for preference parsing, extraction and merging
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";
import { match } from "ts-pattern";

/**
 * Tokenization failure inside preference DSL text.
 *
 * @pure true (Data class)
 * @invariant line ≥ 1 ∧ column ≥ 1
 */
export class LexerError extends Data.TaggedError("LexerError")<{
	readonly line: number;
	readonly column: number;
	readonly message: string;
}> {}

/**
 * Grammar failure; lexer failures are re-tagged into this error with the
 * lexer's position.
 *
 * @pure true (Data class)
 * @invariant line ≥ 1 ∧ column ≥ 1
 */
export class ParserError extends Data.TaggedError("ParserError")<{
	readonly line: number;
	readonly column: number;
	readonly message: string;
}> {}

export class InvalidPreference extends Data.TaggedError("InvalidPreference")<{
	readonly detail: string;
}> {}

/**
 * Filesystem operation error
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class IoError extends Data.TaggedError("IoError")<{
	readonly detail: string;
	readonly path?: string;
}> {}

export class InvalidGlobPattern extends Data.TaggedError("InvalidGlobPattern")<{
	readonly pattern: string;
	readonly detail: string;
}> {}

/**
 * Built-in tier failure (archive missing, unreadable or empty).
 */
export class OmniJaError extends Data.TaggedError("OmniJaError")<{
	readonly detail: string;
}> {}

export class PrefFileNotFound extends Data.TaggedError("PrefFileNotFound")<{
	readonly file: string;
}> {}

export class ExtractionFailed extends Data.TaggedError("ExtractionFailed")<{
	readonly detail: string;
}> {}

/**
 * Archive exceeds the configured size ceiling.
 *
 * @invariant actual > limit
 */
export class OmniJaTooLarge extends Data.TaggedError("OmniJaTooLarge")<{
	readonly actual: number;
	readonly limit: number;
}> {}

export class ProfileNotFound extends Data.TaggedError("ProfileNotFound")<{
	readonly name: string;
	readonly directory: string;
}> {}

export class InstallationNotFound extends Data.TaggedError(
	"InstallationNotFound",
)<{
	readonly searched: readonly string[];
}> {}

/**
 * Command execution error (spawn failure, not a non-zero exit)
 *
 * @invariant command.length > 0 ∧ detail.length > 0
 */
export class ExecError extends Data.TaggedError("ExecError")<{
	readonly command: string;
	readonly detail: string;
}> {}

export class UsageError extends Data.TaggedError("UsageError")<{
	readonly detail: string;
}> {}

/** Errors a single-file parse can produce. */
export type PrefParseError = LexerError | ParserError;

/** Errors a merge can abort with when `continueOnError` is false. */
export type MergeError =
	| OmniJaError
	| PrefFileNotFound
	| IoError
	| ParserError
	| InstallationNotFound;

/**
 * Union type of all application errors for Effect signatures
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type AppError =
	| LexerError
	| ParserError
	| InvalidPreference
	| IoError
	| InvalidGlobPattern
	| OmniJaError
	| PrefFileNotFound
	| ExtractionFailed
	| OmniJaTooLarge
	| ProfileNotFound
	| InstallationNotFound
	| ExecError
	| UsageError;

const MIB = 1024 * 1024;

/**
 * Human-readable rendering of any application error.
 *
 * @pure true
 * @invariant exhaustive over AppError["_tag"]
 * @complexity O(|detail|)
 */
export function describeError(error: AppError): string {
	return match(error)
		.with(
			{ _tag: "LexerError" },
			(e) => `Lexer error at line ${e.line}, column ${e.column}: ${e.message}`,
		)
		.with(
			{ _tag: "ParserError" },
			(e) => `Parser error at line ${e.line}, column ${e.column}: ${e.message}`,
		)
		.with({ _tag: "InvalidPreference" }, (e) => `Invalid preference: ${e.detail}`)
		.with({ _tag: "IoError" }, (e) =>
			e.path === undefined
				? `I/O error: ${e.detail}`
				: `I/O error: ${e.detail} (${e.path})`,
		)
		.with(
			{ _tag: "InvalidGlobPattern" },
			(e) => `Invalid glob pattern: ${e.pattern}: ${e.detail}`,
		)
		.with({ _tag: "OmniJaError" }, (e) => `omni.ja error: ${e.detail}`)
		.with(
			{ _tag: "PrefFileNotFound" },
			(e) => `Preference file not found: ${e.file}`,
		)
		.with(
			{ _tag: "ExtractionFailed" },
			(e) => `File extraction failed: ${e.detail}`,
		)
		.with(
			{ _tag: "OmniJaTooLarge" },
			(e) =>
				`omni.ja file is too large (${e.actual} bytes). Maximum safe size is ${e.limit} bytes (${Math.floor(e.limit / MIB)} MiB). Raise the limit with --max-file-size.`,
		)
		.with(
			{ _tag: "ProfileNotFound" },
			(e) => `Profile '${e.name}' not found in ${e.directory}`,
		)
		.with(
			{ _tag: "InstallationNotFound" },
			(e) =>
				`Browser installation not found. Searched paths: ${e.searched.join(", ")}`,
		)
		.with(
			{ _tag: "ExecError" },
			(e) => `Command failed: ${e.command}: ${e.detail}`,
		)
		.with({ _tag: "UsageError" }, (e) => `Usage error: ${e.detail}`)
		.exhaustive();
}
