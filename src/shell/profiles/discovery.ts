// CHANGE: Profile discovery: profiles.ini first, directory scan second
// PURITY: SHELL (filesystem I/O, environment)
// EFFECT: Effect<string, ProfileNotFound | UsageError | IoError>
// COMPLEXITY: O(p + d) where p = profiles in profiles.ini, d = entries in the profiles directory

import { Effect } from "effect";

import type { ProfileNotFound, UsageError } from "../../core/errors.js";
import { IoError } from "../../core/errors.js";
import type { Environment, ProfileInfo } from "../../core/profiles/profiles.js";
import {
	matchProfileDirectory,
	parseInstallsIni,
	parseProfilesIni,
	profilesDirectory,
	resolveProfileRecord,
	withInstallLocks,
} from "../../core/profiles/profiles.js";
import { debugLog } from "../utils/log.js";
import { fs, path } from "../utils/node-mods.js";

export const PROFILES_INI = "profiles.ini";

export function resolveProfilesDirectory(
	override?: string,
	platform: NodeJS.Platform = process.platform,
	env: Environment = process.env,
): Effect.Effect<string, IoError> {
	return override === undefined ? profilesDirectory(platform, env) : Effect.succeed(override);
}

function readProfilesIni(profilesDir: string): Effect.Effect<string, IoError> {
	const iniPath = path.join(profilesDir, PROFILES_INI);
	return Effect.try({
		try: () => fs.readFileSync(iniPath, "utf8"),
		catch: () =>
			new IoError({
				detail: `${PROFILES_INI} not found or unreadable. The browser may not be installed or this is not a standard setup.`,
				path: iniPath,
			}),
	});
}

/**
 * Profiles declared in profiles.ini, each marked with the install hash it is
 * the default of.
 */
export function listProfiles(profilesDir?: string): Effect.Effect<readonly ProfileInfo[], IoError> {
	return Effect.gen(function* () {
		const dir = yield* resolveProfilesDirectory(profilesDir);
		const text = yield* readProfilesIni(dir);
		return withInstallLocks(parseProfilesIni(text), parseInstallsIni(text));
	});
}

function listDirectories(dir: string): Effect.Effect<readonly string[], IoError> {
	return Effect.try({
		try: () =>
			fs
				.readdirSync(dir, { withFileTypes: true })
				.filter((entry) => entry.isDirectory())
				.map((entry) => entry.name)
				.sort(),
		catch: (error) =>
			new IoError({
				detail: `Failed to read profiles directory: ${error instanceof Error ? error.message : String(error)}`,
				path: dir,
			}),
	});
}

/**
 * Absolute directory of the named profile.
 *
 * @invariant a profiles.ini match is used only when its directory exists
 */
export function findProfilePath(
	name: string,
	profilesDir?: string,
): Effect.Effect<string, ProfileNotFound | UsageError | IoError> {
	return Effect.gen(function* () {
		const dir = yield* resolveProfilesDirectory(profilesDir);

		const fromIni = yield* readProfilesIni(dir).pipe(
			Effect.map((text) => parseProfilesIni(text).find((profile) => profile.name === name)),
			Effect.catchAll((error) => {
				debugLog(`${PROFILES_INI} unavailable, scanning directory: ${error.detail}`);
				return Effect.succeed(undefined);
			}),
		);
		if (fromIni !== undefined) {
			const resolved = resolveProfileRecord(fromIni, dir);
			if (fs.existsSync(resolved)) return resolved;
			debugLog(`profile '${name}' points at missing directory ${resolved}`);
		}

		const directories = yield* listDirectories(dir);
		const match = yield* matchProfileDirectory(directories, name, dir);
		return path.join(dir, match);
	});
}
