// CHANGE: Static explanation table consulted when rendering output
// PURITY: CORE
// INVARIANT: Read-only; never consulted by the parser or the merger

const EXPLANATIONS: ReadonlyMap<string, string> = new Map([
	[
		"javascript.enabled",
		"Master switch to enable or disable JavaScript execution. When true, JavaScript can run in web pages. When false, JavaScript is completely disabled, which breaks many sites that depend on it.",
	],
	[
		"privacy.trackingprotection.enabled",
		"Enables built-in tracking protection. When true, known tracking scripts and third-party tracking cookies are blocked. When false, trackers may follow browsing activity across sites.",
	],
	[
		"browser.startup.homepage",
		"The page or pipe-separated list of pages opened at startup and by the Home button.",
	],
	[
		"network.proxy.type",
		"Proxy mode: 0 direct connection, 1 manual configuration, 2 automatic configuration URL, 4 auto-detect, 5 use system settings.",
	],
	[
		"network.cookie.cookieBehavior",
		"Which cookies are accepted: 0 all, 1 first-party only, 2 none, 3 from visited sites, 4 block cross-site trackers, 5 partition cross-site cookies.",
	],
	[
		"dom.webnotifications.enabled",
		"When false, web pages cannot request permission to show desktop notifications.",
	],
	[
		"media.autoplay.default",
		"Default autoplay policy: 0 allow, 1 block audible media, 5 block all media.",
	],
	[
		"browser.cache.disk.enable",
		"When false, nothing is written to the disk cache; only the memory cache is used.",
	],
	[
		"geo.enabled",
		"When false, the Geolocation API is disabled and sites cannot request the device location.",
	],
	[
		"extensions.update.enabled",
		"When true, installed add-ons are checked for updates automatically.",
	],
]);

/**
 * Explanation text for a preference key, if one is known.
 *
 * @pure true
 * @complexity O(1)
 */
export function getPreferenceExplanation(key: string): string | undefined {
	return EXPLANATIONS.get(key);
}

export function hasExplanation(key: string): boolean {
	return EXPLANATIONS.has(key);
}
