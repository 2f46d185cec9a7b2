// CHANGE: Known installation locations and on-disk layout of a browser installation
// PURITY: CORE
// INVARIANT: A directory is an installation iff it holds omni.ja or greprefs.js (directly or under browser/)

export interface Installation {
	readonly path: string;
	/** From application.ini or platform.ini; "unknown" when neither names one. */
	readonly version: string;
	readonly omniJa?: string;
	readonly greprefs?: string;
}

/** Relative candidates, in lookup order. */
export const OMNI_JA_CANDIDATES: readonly string[] = ["browser/omni.ja", "omni.ja"];
export const GREPREFS_CANDIDATES: readonly string[] = ["greprefs.js", "browser/greprefs.js"];
export const VERSION_FILES: readonly string[] = ["application.ini", "platform.ini"];

const LINUX_PATHS: readonly string[] = [
	"/usr/lib/firefox",
	"/usr/lib64/firefox",
	"/opt/firefox",
	"/usr/local/firefox",
	"/opt/firefox-beta",
	"/opt/firefox-esr",
];

const DARWIN_PATHS: readonly string[] = [
	"/Applications/Firefox.app/Contents/Resources",
	"/Applications/Firefox Beta.app/Contents/Resources",
	"/Applications/Firefox Developer Edition.app/Contents/Resources",
	"/Applications/Firefox ESR.app/Contents/Resources",
];

const WIN32_PATHS: readonly string[] = [
	"C:\\Program Files\\Mozilla Firefox",
	"C:\\Program Files\\Firefox Beta",
	"C:\\Program Files\\Firefox ESR",
	"C:\\Program Files\\Mozilla Firefox ESR",
	"C:\\Program Files (x86)\\Mozilla Firefox",
	"C:\\Program Files (x86)\\Firefox Beta",
	"C:\\Program Files (x86)\\Firefox ESR",
	"C:\\Program Files (x86)\\Mozilla Firefox ESR",
	"C:\\Program Files\\Mozilla Firefox Developer Edition",
];

/** Launcher symlinks into the Nix store; their targets' parent directories are candidates. */
export const NIX_LAUNCHERS: readonly string[] = [
	"/nix/var/nix/profiles/default/bin/firefox",
	"/run/current-system/sw/bin/firefox",
];

/**
 * @pure true
 */
export function defaultSearchPaths(platform: NodeJS.Platform): readonly string[] {
	if (platform === "darwin") return DARWIN_PATHS;
	if (platform === "win32") return WIN32_PATHS;
	return LINUX_PATHS;
}

/**
 * First `Version=` value in an ini file's text.
 *
 * @pure true
 * @example parseIniVersion("[App]\nVersion=128.0\n") === "128.0"
 */
export function parseIniVersion(text: string): string | undefined {
	for (const raw of text.split(/\r?\n/u)) {
		const line = raw.trim();
		if (line.startsWith("Version=") || line.startsWith("Version =")) {
			const version = line.slice(line.indexOf("=") + 1).trim();
			if (version.length > 0) return version;
		}
	}
	return undefined;
}
