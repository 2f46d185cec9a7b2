// CHANGE: Closed value/type/source model for browser preferences
// PURITY: CORE
// INVARIANT: Variants are closed; every consumer matches exhaustively on `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Lexical token of the preference DSL.
 *
 * @remarks
 * Number tokens carry the decoded f64 value; Integer/Float disambiguation
 * happens when the parser turns them into a {@link PrefValue}.
 */
export type Token = Data.TaggedEnum<{
	Identifier: { readonly text: string };
	String: { readonly value: string };
	Number: { readonly value: number };
	Boolean: { readonly value: boolean };
	Null: {};
	LeftParen: {};
	RightParen: {};
	Comma: {};
	Semicolon: {};
	Eof: {};
}>;

export const Token = Data.taggedEnum<Token>();

/**
 * Preference value.
 *
 * @invariant Integer.value ∈ [-2^63, 2^63)
 * @invariant a numeric literal with zero fractional part inside that range is
 *            always Integer, never Float
 */
export type PrefValue = Data.TaggedEnum<{
	Bool: { readonly value: boolean };
	Integer: { readonly value: bigint };
	Float: { readonly value: number };
	String: { readonly value: string };
	Null: {};
}>;

export const PrefValue = Data.taggedEnum<PrefValue>();

/**
 * Statement kind: `user_pref` → user, `pref` → default, `lock_pref` → locked,
 * `sticky_pref` → sticky.
 */
export type PrefType = "user" | "default" | "locked" | "sticky";

/**
 * Provenance tier. Precedence is BuiltIn < GlobalDefault < User;
 * SystemPolicy is reserved and never produced by the merge pipeline.
 */
export type PrefSource = "BuiltIn" | "GlobalDefault" | "User" | "SystemPolicy";

/**
 * One parsed preference statement.
 *
 * @invariant key is the decoded string literal of the statement
 */
export interface PrefEntry {
	readonly key: string;
	readonly value: PrefValue;
	readonly prefType: PrefType;
	readonly explanation?: string;
	readonly source?: PrefSource;
	readonly sourceFile?: string;
}

export interface MergeConfig {
	readonly includeBuiltins: boolean;
	readonly includeGlobals: boolean;
	readonly includeUser: boolean;
	readonly continueOnError: boolean;
}

export const DEFAULT_MERGE_CONFIG: MergeConfig = {
	includeBuiltins: true,
	includeGlobals: true,
	includeUser: true,
	continueOnError: true,
};

export interface ExtractConfig {
	/** Archive size ceiling in bytes. */
	readonly maxOmniSize: number;
	readonly cacheDir?: string;
	/** Empty means "every .js entry". */
	readonly targetFiles: readonly string[];
	readonly forceRefresh: boolean;
}

export const DEFAULT_MAX_OMNI_SIZE = 100 * 1024 * 1024;

export const DEFAULT_EXTRACT_CONFIG: ExtractConfig = {
	maxOmniSize: DEFAULT_MAX_OMNI_SIZE,
	targetFiles: [],
	forceRefresh: false,
};

/**
 * Result of one merge invocation.
 *
 * @invariant entries are sorted ascending by key and key-unique
 */
export interface MergedPreferences {
	readonly entries: readonly PrefEntry[];
	readonly installPath?: string;
	readonly profilePath: string;
	readonly loadedSources: readonly PrefSource[];
	readonly warnings: readonly string[];
}
