// CHANGE: Locate browser installations on disk
// PURITY: SHELL (filesystem I/O)
// EFFECT: Effect<Installation | undefined>
// INVARIANT: Search order is the platform list, then Nix launcher targets (Linux only)
// COMPLEXITY: O(p) stats where p = |search paths|

import { Effect } from "effect";

import type { Installation } from "../../core/installation/layout.js";
import {
	defaultSearchPaths,
	GREPREFS_CANDIDATES,
	NIX_LAUNCHERS,
	OMNI_JA_CANDIDATES,
	parseIniVersion,
	VERSION_FILES,
} from "../../core/installation/layout.js";
import { debugLog } from "../utils/log.js";
import { fs, path } from "../utils/node-mods.js";

function firstExisting(dir: string, candidates: readonly string[]): string | undefined {
	return candidates
		.map((relative) => path.join(dir, ...relative.split("/")))
		.find((candidate) => fs.existsSync(candidate));
}

export function findOmniJa(installPath: string): string | undefined {
	return firstExisting(installPath, OMNI_JA_CANDIDATES);
}

export function findGreprefs(installPath: string): string | undefined {
	return firstExisting(installPath, GREPREFS_CANDIDATES);
}

/**
 * Parent directories of Nix launcher symlink targets.
 */
export function nixStorePaths(launchers: readonly string[] = NIX_LAUNCHERS): readonly string[] {
	return launchers.flatMap((launcher) => {
		try {
			const target = fs.readlinkSync(launcher);
			return [path.dirname(path.resolve(path.dirname(launcher), target))];
		} catch (error) {
			debugLog(`no Nix launcher at ${launcher}: ${String(error)}`);
			return [];
		}
	});
}

export function searchPaths(platform: NodeJS.Platform = process.platform): readonly string[] {
	const base = defaultSearchPaths(platform);
	return platform === "linux" ? [...base, ...nixStorePaths()] : base;
}

/**
 * Version from application.ini, then platform.ini; "unknown" otherwise.
 */
export function readInstallationVersion(installPath: string): Effect.Effect<string> {
	return Effect.sync(() => {
		for (const name of VERSION_FILES) {
			const file = path.join(installPath, name);
			if (!fs.existsSync(file)) continue;
			// The first ini file present decides, as in the browser's own lookup
			return parseIniVersion(fs.readFileSync(file, "utf8")) ?? "unknown";
		}
		return "unknown";
	}).pipe(Effect.catchAllDefect(() => Effect.succeed("unknown")));
}

/**
 * Describe `dir` as an installation, or undefined when it is not one.
 */
export function inspectInstallation(dir: string): Effect.Effect<Installation | undefined> {
	return Effect.gen(function* () {
		if (!fs.existsSync(dir)) return undefined;
		const omniJa = findOmniJa(dir);
		const greprefs = findGreprefs(dir);
		if (omniJa === undefined && greprefs === undefined) return undefined;
		const version = yield* readInstallationVersion(dir);
		return {
			path: dir,
			version,
			...(omniJa === undefined ? {} : { omniJa }),
			...(greprefs === undefined ? {} : { greprefs }),
		};
	});
}

/**
 * @effect never fails; absence is `undefined`
 */
export function findInstallation(
	paths: readonly string[] = searchPaths(),
): Effect.Effect<Installation | undefined> {
	return Effect.gen(function* () {
		for (const dir of paths) {
			const install = yield* inspectInstallation(dir);
			if (install !== undefined) return install;
		}
		return undefined;
	});
}

export function listInstallations(
	paths: readonly string[] = searchPaths(),
): Effect.Effect<readonly Installation[]> {
	return Effect.forEach(paths, inspectInstallation).pipe(
		Effect.map((found) => found.filter((install): install is Installation => install !== undefined)),
	);
}
