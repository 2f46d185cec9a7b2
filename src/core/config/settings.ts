// CHANGE: Layer CLI flags over config-file values over built-in defaults
// PURITY: CORE
// INVARIANT: A CLI flag always beats the config file; the config file always beats a default
// COMPLEXITY: O(1)

import type { ExtractConfig, MergeConfig } from "../prefs/types.js";
import { DEFAULT_MAX_OMNI_SIZE } from "../prefs/types.js";
import type { ConfigOptions, FileConfig } from "../types/config.js";
import { DEFAULT_TARGET_FILES } from "../types/config.js";

export interface ResolvedSettings {
	readonly merge: MergeConfig;
	readonly extract: ExtractConfig;
	readonly profilesDir?: string;
	readonly installDir?: string;
}

function firstDefined<T>(...values: readonly (T | undefined)[]): T | undefined {
	return values.find((value) => value !== undefined);
}

/**
 * @pure true
 * @invariant options.strict ⇒ merge.continueOnError = false
 */
export function resolveSettings(options: ConfigOptions, file: FileConfig): ResolvedSettings {
	const cacheDir = firstDefined(options.cacheDir, file.cacheDir);
	const profilesDir = firstDefined(options.profilesDir, file.profilesDir);
	const installDir = firstDefined(options.installDir, file.installDir);

	const extract: ExtractConfig = {
		maxOmniSize: options.maxFileSize ?? file.maxOmniSize ?? DEFAULT_MAX_OMNI_SIZE,
		targetFiles: file.targetFiles ?? DEFAULT_TARGET_FILES,
		forceRefresh: options.refresh,
		...(cacheDir === undefined ? {} : { cacheDir }),
	};

	return {
		merge: {
			includeBuiltins: !options.noBuiltins,
			includeGlobals: !options.noGlobals,
			includeUser: true,
			continueOnError: options.strict ? false : (file.continueOnError ?? true),
		},
		extract,
		...(profilesDir === undefined ? {} : { profilesDir }),
		...(installDir === undefined ? {} : { installDir }),
	};
}
