// CHANGE: Command-line and config-file option types for prefscope
// PURITY: CORE
// INVARIANT: Exactly one command per invocation; optional settings are absent rather than undefined

import type { OutputType } from "../output/render.js";

/**
 * Where the user tier comes from.
 */
export type ProfileSelector =
	| { readonly _tag: "ByName"; readonly name: string }
	| { readonly _tag: "ByPath"; readonly path: string }
	| { readonly _tag: "Stdin" };

export const DEFAULT_PROFILE_NAME = "default";

/**
 * Options of `prefscope config`.
 *
 * @property queries Glob patterns; empty means no filtering
 * @property get Key whose raw value is printed instead of JSON
 */
export interface ConfigOptions {
	readonly profile: ProfileSelector;
	readonly profilesDir?: string;
	readonly installDir?: string;
	readonly maxFileSize?: number;
	readonly cacheDir?: string;
	readonly refresh: boolean;
	readonly queries: readonly string[];
	readonly get?: string;
	readonly outputType: OutputType;
	readonly unexplainedOnly: boolean;
	readonly noBuiltins: boolean;
	readonly noGlobals: boolean;
	readonly strict: boolean;
}

export type CliCommand =
	| { readonly _tag: "Help" }
	| { readonly _tag: "Profile"; readonly profilesDir?: string }
	| { readonly _tag: "Installations" }
	| { readonly _tag: "Archive"; readonly archivePath: string }
	| ({ readonly _tag: "Config" } & ConfigOptions);

export type CommandName = "profile" | "installations" | "archive" | "config";

/**
 * Settings read from prefscope.config.json. Every key is optional; unknown
 * keys never reach this type.
 */
export interface FileConfig {
	readonly maxOmniSize?: number;
	readonly cacheDir?: string;
	readonly targetFiles?: readonly string[];
	readonly continueOnError?: boolean;
	readonly profilesDir?: string;
	readonly installDir?: string;
}

export const CONFIG_FILE_NAME = "prefscope.config.json";

/** Archive entries loaded for the built-in tier unless the config file says otherwise. */
export const DEFAULT_TARGET_FILES: readonly string[] = ["defaults/pref/*.js"];
