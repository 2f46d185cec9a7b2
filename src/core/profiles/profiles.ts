// CHANGE: Profile records from profiles.ini plus the directory-name matching rules
// PURITY: CORE
// INVARIANT: Only sections named profile* produce profiles; install sections map hash → default profile path
// COMPLEXITY: O(s + p·i) where s = |sections|, p = |profiles|, i = |installs|

import * as path from "node:path";

import { Either } from "effect";

import { IoError, ProfileNotFound, UsageError } from "../errors.js";
import { iniUint, iniValue, parseIni } from "./ini.js";

export interface ProfileRecord {
	readonly name: string;
	/** As written in profiles.ini; relative to the profiles directory when isRelative. */
	readonly path: string;
	readonly isRelative: boolean;
	readonly isDefault: boolean;
}

export interface ProfileInfo extends ProfileRecord {
	/** Install hash whose Default points at this profile. */
	readonly lockedToInstall?: string;
}

/**
 * `[ProfileN]` sections with a non-empty Name and Path.
 *
 * @pure true
 * @invariant IsRelative defaults to 1, Default defaults to 0
 */
export function parseProfilesIni(text: string): readonly ProfileRecord[] {
	return parseIni(text)
		.filter((section) => section.name.toLowerCase().startsWith("profile"))
		.flatMap((section) => {
			const name = iniValue(section, "Name") ?? "";
			const profilePath = iniValue(section, "Path") ?? "";
			if (name.length === 0 || profilePath.length === 0) return [];
			return [
				{
					name,
					path: profilePath,
					isRelative: iniUint(section, "IsRelative", 1) === 1,
					isDefault: iniUint(section, "Default", 0) === 1,
				},
			];
		});
}

/**
 * Install sections (neither `profile*` nor `General`) that carry a Default key.
 *
 * @pure true
 * @returns install hash → default profile path, in file order
 */
export function parseInstallsIni(text: string): ReadonlyMap<string, string> {
	const installs = new Map<string, string>();
	for (const section of parseIni(text)) {
		const lower = section.name.toLowerCase();
		if (lower.startsWith("profile") || lower === "general") continue;
		const defaultProfile = iniValue(section, "Default");
		if (defaultProfile !== undefined) installs.set(section.name, defaultProfile);
	}
	return installs;
}

/**
 * @pure true
 */
export function withInstallLocks(
	profiles: readonly ProfileRecord[],
	installs: ReadonlyMap<string, string>,
): readonly ProfileInfo[] {
	return profiles.map((profile) => {
		const hash = [...installs].find(([, target]) => target === profile.path)?.[0];
		return hash === undefined ? profile : { ...profile, lockedToInstall: hash };
	});
}

/**
 * Absolute location of a profile record.
 *
 * @pure true
 */
export function resolveProfileRecord(profile: ProfileRecord, profilesDir: string): string {
	return profile.isRelative ? path.join(profilesDir, profile.path) : profile.path;
}

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Per-platform directory holding profiles.ini.
 *
 * @pure true
 */
export function profilesDirectory(
	platform: NodeJS.Platform,
	env: Environment,
): Either.Either<string, IoError> {
	if (platform === "win32") {
		const appData = env["APPDATA"];
		return appData === undefined || appData.length === 0
			? Either.left(new IoError({ detail: "APPDATA environment variable not set" }))
			: Either.right(path.join(appData, "Mozilla", "Firefox"));
	}
	const home = env["HOME"];
	if (home === undefined || home.length === 0) {
		return Either.left(new IoError({ detail: "HOME environment variable not set" }));
	}
	if (platform === "darwin") {
		return Either.right(path.join(home, "Library", "Application Support", "Firefox"));
	}
	return Either.right(path.join(home, ".mozilla", "firefox"));
}

/**
 * Pick a profile directory by name: an exact directory name wins, otherwise
 * exactly one `<salt>.<name>` directory.
 *
 * @pure true
 * @invariant more than one suffix match is a UsageError listing the candidates
 */
export function matchProfileDirectory(
	directoryNames: readonly string[],
	name: string,
	profilesDir: string,
): Either.Either<string, ProfileNotFound | UsageError> {
	if (directoryNames.includes(name)) return Either.right(name);

	const suffix = `.${name}`;
	const candidates = directoryNames.filter((dir) => dir.endsWith(suffix));
	const [only, ...rest] = candidates;
	if (only !== undefined && rest.length === 0) return Either.right(only);
	if (only !== undefined) {
		return Either.left(
			new UsageError({
				detail: `Multiple profiles match '${name}': ${candidates.join(", ")}. Use the full directory name.`,
			}),
		);
	}
	return Either.left(new ProfileNotFound({ name, directory: profilesDir }));
}
