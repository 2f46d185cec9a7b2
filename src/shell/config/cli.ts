// CHANGE: prefscope argument parsing (commands, value flags, switches)
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: Every flag is checked against the flags its command accepts
// COMPLEXITY: O(n) where n = |argv|

import { Either } from "effect";

import { UsageError } from "../../core/errors.js";
import type { OutputType } from "../../core/output/render.js";
import { OUTPUT_TYPES } from "../../core/output/render.js";
import type {
	CliCommand,
	CommandName,
	ConfigOptions,
	ProfileSelector,
} from "../../core/types/index.js";
import { DEFAULT_PROFILE_NAME } from "../../core/types/index.js";

type ValueFlag =
	| "--profile"
	| "--profile-path"
	| "--profiles-dir"
	| "--install-dir"
	| "--max-file-size"
	| "--cache-dir"
	| "--query"
	| "--get"
	| "--output-type";

type SwitchFlag =
	| "--stdin"
	| "--refresh"
	| "--unexplained-only"
	| "--no-builtins"
	| "--no-globals"
	| "--strict"
	| "--help";

type Flag = ValueFlag | SwitchFlag;

const VALUE_FLAGS: ReadonlySet<string> = new Set<ValueFlag>([
	"--profile",
	"--profile-path",
	"--profiles-dir",
	"--install-dir",
	"--max-file-size",
	"--cache-dir",
	"--query",
	"--get",
	"--output-type",
]);

const SWITCH_FLAGS: ReadonlySet<string> = new Set<SwitchFlag>([
	"--stdin",
	"--refresh",
	"--unexplained-only",
	"--no-builtins",
	"--no-globals",
	"--strict",
	"--help",
]);

const ALIASES: Readonly<Record<string, Flag>> = {
	"-p": "--profile",
	"-q": "--query",
	"-h": "--help",
};

const COMMAND_FLAGS: Readonly<Record<CommandName, ReadonlySet<Flag>>> = {
	profile: new Set<Flag>(["--profiles-dir"]),
	installations: new Set<Flag>(),
	archive: new Set<Flag>(),
	config: new Set<Flag>([
		"--profile",
		"--profile-path",
		"--stdin",
		"--profiles-dir",
		"--install-dir",
		"--max-file-size",
		"--cache-dir",
		"--refresh",
		"--query",
		"--get",
		"--output-type",
		"--unexplained-only",
		"--no-builtins",
		"--no-globals",
		"--strict",
	]),
};

/**
 * Raw tokens grouped before any command-specific validation.
 */
interface ArgState {
	readonly positionals: readonly string[];
	readonly values: ReadonlyMap<ValueFlag, readonly string[]>;
	readonly switches: ReadonlySet<SwitchFlag>;
}

type ArgStep = Either.Either<{ readonly state: ArgState; readonly consumed: number }, UsageError>;

function isValueFlag(flag: string): flag is ValueFlag {
	return VALUE_FLAGS.has(flag);
}

function isSwitchFlag(flag: string): flag is SwitchFlag {
	return SWITCH_FLAGS.has(flag);
}

function isCommandName(word: string): word is CommandName {
	return Object.hasOwn(COMMAND_FLAGS, word);
}

function usage(detail: string): UsageError {
	return new UsageError({ detail });
}

function withValue(state: ArgState, flag: ValueFlag, value: string): ArgState {
	const values = new Map(state.values);
	values.set(flag, [...(state.values.get(flag) ?? []), value]);
	return { ...state, values };
}

/**
 * Consume one argument (and its value, for value flags).
 * Accepts `--flag value` and `--flag=value`.
 */
function processArgument(args: readonly string[], index: number, state: ArgState): ArgStep {
	const arg = args[index] ?? "";
	if (!arg.startsWith("-") || arg === "-") {
		return Either.right({ state: { ...state, positionals: [...state.positionals, arg] }, consumed: 1 });
	}

	const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
	const name = eq === -1 ? arg : arg.slice(0, eq);
	const flag = ALIASES[name] ?? name;

	if (isSwitchFlag(flag)) {
		if (eq !== -1) return Either.left(usage(`Option '${flag}' does not take a value`));
		const switches = new Set(state.switches);
		switches.add(flag);
		return Either.right({ state: { ...state, switches }, consumed: 1 });
	}
	if (isValueFlag(flag)) {
		if (eq !== -1) return Either.right({ state: withValue(state, flag, arg.slice(eq + 1)), consumed: 1 });
		const value = args[index + 1];
		if (value === undefined) return Either.left(usage(`Option '${flag}' requires a value`));
		return Either.right({ state: withValue(state, flag, value), consumed: 2 });
	}
	return Either.left(usage(`Unknown option '${name}'`));
}

function collect(args: readonly string[]): Either.Either<ArgState, UsageError> {
	let state: ArgState = { positionals: [], values: new Map(), switches: new Set() };
	let index = 0;
	while (index < args.length) {
		const step = processArgument(args, index, state);
		if (Either.isLeft(step)) return Either.left(step.left);
		state = step.right.state;
		index += step.right.consumed;
	}
	return Either.right(state);
}

function lastValue(state: ArgState, flag: ValueFlag): string | undefined {
	return state.values.get(flag)?.at(-1);
}

function checkFlags(command: CommandName, state: ArgState): Either.Either<void, UsageError> {
	const allowed = COMMAND_FLAGS[command];
	const given: readonly Flag[] = [...state.values.keys(), ...state.switches];
	const rejected = given.find((flag) => !allowed.has(flag));
	return rejected === undefined
		? Either.right(undefined)
		: Either.left(usage(`Option '${rejected}' is not valid for '${command}'`));
}

function parseMaxFileSize(raw: string | undefined): Either.Either<number | undefined, UsageError> {
	if (raw === undefined) return Either.right(undefined);
	const size = /^\d+$/u.test(raw) ? Number(raw) : Number.NaN;
	if (!Number.isSafeInteger(size) || size <= 0) {
		return Either.left(usage(`Invalid --max-file-size '${raw}': expected a positive number of bytes`));
	}
	return Either.right(size);
}

function parseOutputType(raw: string | undefined): Either.Either<OutputType, UsageError> {
	if (raw === undefined) return Either.right("json-object");
	const outputType = OUTPUT_TYPES.find((candidate) => candidate === raw);
	return outputType === undefined
		? Either.left(usage(`Invalid --output-type '${raw}': expected ${OUTPUT_TYPES.join(" or ")}`))
		: Either.right(outputType);
}

function parseProfileSelector(state: ArgState): Either.Either<ProfileSelector, UsageError> {
	const name = lastValue(state, "--profile");
	const profilePath = lastValue(state, "--profile-path");
	const stdin = state.switches.has("--stdin");
	const chosen = [name !== undefined, profilePath !== undefined, stdin].filter(Boolean).length;
	if (chosen > 1) {
		return Either.left(usage("Use only one of --profile, --profile-path or --stdin"));
	}
	if (stdin) return Either.right({ _tag: "Stdin" });
	if (profilePath !== undefined) return Either.right({ _tag: "ByPath", path: profilePath });
	return Either.right({ _tag: "ByName", name: name ?? DEFAULT_PROFILE_NAME });
}

function buildConfigOptions(state: ArgState): Either.Either<ConfigOptions, UsageError> {
	return Either.gen(function* () {
		const profile = yield* parseProfileSelector(state);
		const maxFileSize = yield* parseMaxFileSize(lastValue(state, "--max-file-size"));
		const outputType = yield* parseOutputType(lastValue(state, "--output-type"));
		const profilesDir = lastValue(state, "--profiles-dir");
		const installDir = lastValue(state, "--install-dir");
		const cacheDir = lastValue(state, "--cache-dir");
		const get = lastValue(state, "--get");
		return {
			profile,
			refresh: state.switches.has("--refresh"),
			queries: state.values.get("--query") ?? [],
			outputType,
			unexplainedOnly: state.switches.has("--unexplained-only"),
			noBuiltins: state.switches.has("--no-builtins"),
			noGlobals: state.switches.has("--no-globals"),
			strict: state.switches.has("--strict"),
			...(profilesDir === undefined ? {} : { profilesDir }),
			...(installDir === undefined ? {} : { installDir }),
			...(maxFileSize === undefined ? {} : { maxFileSize }),
			...(cacheDir === undefined ? {} : { cacheDir }),
			...(get === undefined ? {} : { get }),
		};
	});
}

function buildCommand(command: CommandName, state: ArgState): Either.Either<CliCommand, UsageError> {
	const extra = state.positionals.slice(command === "archive" ? 2 : 1);
	if (extra.length > 0) {
		return Either.left(usage(`Unexpected argument '${extra.join(" ")}' for '${command}'`));
	}
	switch (command) {
		case "profile": {
			const profilesDir = lastValue(state, "--profiles-dir");
			return Either.right({ _tag: "Profile", ...(profilesDir === undefined ? {} : { profilesDir }) });
		}
		case "installations":
			return Either.right({ _tag: "Installations" });
		case "archive": {
			const archivePath = state.positionals[1];
			return archivePath === undefined
				? Either.left(usage("'archive' requires the path of an omni.ja file"))
				: Either.right({ _tag: "Archive", archivePath });
		}
		case "config":
			return Either.map(buildConfigOptions(state), (options): CliCommand => ({ _tag: "Config", ...options }));
	}
}

/**
 * Parse command-line arguments.
 *
 * @returns The selected command, or a UsageError describing the first problem
 *
 * @example
 * ```ts
 * // Command: prefscope config --profile work --query "network.*"
 * parseCLIArgs(); // Right({ _tag: "Config", profile: { _tag: "ByName", name: "work" }, queries: ["network.*"], ... })
 * ```
 */
export function parseCLIArgs(
	argv: readonly string[] = process.argv.slice(2),
): Either.Either<CliCommand, UsageError> {
	return Either.gen(function* () {
		const state = yield* collect(argv);
		if (state.switches.has("--help")) return { _tag: "Help" } satisfies CliCommand;

		const word = state.positionals[0];
		if (word === undefined) return yield* Either.left(usage("No command given"));
		if (!isCommandName(word)) return yield* Either.left(usage(`Unknown command '${word}'`));

		yield* checkFlags(word, state);
		return yield* buildCommand(word, state);
	});
}

export const USAGE = `Usage: prefscope <command> [options]

Commands:
  profile [--profiles-dir DIR]     List browser profiles as JSON
  installations                    List detected browser installations as JSON
  archive <omni.ja>                List the .js entries of an omni.ja archive
  config [options]                 Print the effective preferences of a profile

Config options:
  -p, --profile NAME               Profile name (default: "default")
  --profile-path DIR               Profile directory, bypassing discovery
  --stdin                          Parse preferences from standard input, no merge
  --profiles-dir DIR               Directory holding profiles.ini
  --install-dir DIR                Browser installation directory
  --max-file-size BYTES            Largest omni.ja accepted (default: 104857600)
  --cache-dir DIR                  Where extracted archive files are kept
  --refresh                        Ignore cached archive files
  -q, --query PATTERN              Keep keys matching a glob; repeatable
  --get KEY                        Print one raw value
  --output-type TYPE               json-object (default) or json-array
  --unexplained-only               Drop preferences that have an explanation
  --no-builtins                    Skip omni.ja defaults
  --no-globals                     Skip greprefs.js
  --strict                         Fail on the first unreadable source
  -h, --help                       Show this help`;
