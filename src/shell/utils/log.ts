// CHANGE: Console logging for the SHELL layer; debug output gated by PREFSCOPE_DEBUG
// PURITY: SHELL (console I/O)
// INVARIANT: Results go to stdout; warnings and diagnostics go to stderr

const ENV: NodeJS.ProcessEnv & { PREFSCOPE_DEBUG?: string } = process.env;

export function isDebugEnabled(): boolean {
	return ENV.PREFSCOPE_DEBUG === "1";
}

/**
 * Logging is a side effect only when the flag is set.
 */
export function debugLog(message: string): void {
	if (isDebugEnabled()) {
		console.error("[prefscope]", message);
	}
}

export function warn(message: string): void {
	console.error(`Warning: ${message}`);
}

export function printLine(text: string): void {
	console.log(text);
}

export function printError(text: string): void {
	console.error(text);
}
