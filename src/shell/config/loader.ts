// CHANGE: Load prefscope.config.json from the working directory
// PURITY: SHELL (filesystem I/O)
// EFFECT: Effect<FileConfig> (never fails; a malformed file is reported and ignored)
// INVARIANT: Unknown keys and wrongly typed values never reach FileConfig

import { Effect } from "effect";

import type { FileConfig } from "../../core/types/index.js";
import { CONFIG_FILE_NAME } from "../../core/types/index.js";
import { debugLog, warn } from "../utils/log.js";
import { fs, path } from "../utils/node-mods.js";

/**
 * Type representing any valid JSON value.
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isString(value: JSONValue): value is string {
	return typeof value === "string";
}

function isBoolean(value: JSONValue): value is boolean {
	return typeof value === "boolean";
}

function isPositiveInteger(value: JSONValue): value is number {
	return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}

function isStringArray(value: JSONValue): value is ReadonlyArray<string> {
	return Array.isArray(value) && value.every((item: JSONValue) => isString(item));
}

/**
 * Read one key through a guard, dropping it when the guard rejects the value.
 */
function pick<T extends JSONValue>(
	object: JSONObject,
	key: keyof FileConfig,
	guard: (value: JSONValue) => value is T,
): T | undefined {
	const value = object[key];
	if (value === undefined) return undefined;
	if (guard(value)) return value;
	warn(`Ignoring '${key}' in ${CONFIG_FILE_NAME}: unexpected value ${JSON.stringify(value)}`);
	return undefined;
}

/**
 * Validate parsed JSON into a FileConfig.
 *
 * @pure false (warns about rejected values)
 */
export function toFileConfig(parsed: JSONValue): FileConfig | null {
	if (!isJSONObject(parsed)) return null;

	const maxOmniSize = pick(parsed, "maxOmniSize", isPositiveInteger);
	const cacheDir = pick(parsed, "cacheDir", isString);
	const targetFiles = pick(parsed, "targetFiles", isStringArray);
	const continueOnError = pick(parsed, "continueOnError", isBoolean);
	const profilesDir = pick(parsed, "profilesDir", isString);
	const installDir = pick(parsed, "installDir", isString);

	return {
		...(maxOmniSize === undefined ? {} : { maxOmniSize }),
		...(cacheDir === undefined ? {} : { cacheDir }),
		...(targetFiles === undefined ? {} : { targetFiles }),
		...(continueOnError === undefined ? {} : { continueOnError }),
		...(profilesDir === undefined ? {} : { profilesDir }),
		...(installDir === undefined ? {} : { installDir }),
	};
}

/**
 * Load prefscope.config.json.
 *
 * @param configPath Path of the config file
 * @returns Parsed settings, or `{}` when the file is missing or malformed
 */
export function loadFileConfig(
	configPath = path.resolve(process.cwd(), CONFIG_FILE_NAME),
): Effect.Effect<FileConfig> {
	if (!fs.existsSync(configPath)) {
		debugLog(`no ${CONFIG_FILE_NAME} at ${configPath}`);
		return Effect.succeed({});
	}
	return Effect.try({
		try: () => JSON.parse(fs.readFileSync(configPath, "utf8")) as JSONValue,
		catch: (error) => (error instanceof Error ? error.message : String(error)),
	}).pipe(
		Effect.map((parsed) => {
			const config = toFileConfig(parsed);
			if (config === null) warn(`Ignoring ${configPath}: expected a JSON object`);
			return config ?? {};
		}),
		Effect.catchAll((detail) =>
			Effect.sync((): FileConfig => {
				warn(`Ignoring malformed ${configPath}: ${detail}`);
				return {};
			}),
		),
	);
}
