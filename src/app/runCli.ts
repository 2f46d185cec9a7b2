// CHANGE: Application orchestration for the prefscope commands
// PURITY: APP (no process.exit; prints through the SHELL logger)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Every failure is printed once to stderr and mapped to exit code 1
// COMPLEXITY: O(n log n) for `config`, where n = merged entries

import { Effect, Either } from "effect";
import { match } from "ts-pattern";

import { resolveSettings } from "../core/config/settings.js";
import type { AppError } from "../core/errors.js";
import { describeError } from "../core/errors.js";
import type { ExitCode } from "../core/models.js";
import {
	filterUnexplained,
	renderEntries,
	renderGet,
	renderInstallations,
	renderJson,
	renderProfiles,
} from "../core/output/render.js";
import { parsePrefs } from "../core/prefs/parser.js";
import type { PrefEntry } from "../core/prefs/types.js";
import { queryPreferences } from "../core/query/query.js";
import type { CliCommand, ConfigOptions, FileConfig } from "../core/types/index.js";
import { OmniExtractor } from "../shell/archive/extractor.js";
import { loadFileConfig, parseCLIArgs, USAGE } from "../shell/config/index.js";
import { listInstallations } from "../shell/installation/locator.js";
import { findProfilePath, listProfiles } from "../shell/profiles/discovery.js";
import { printError, printLine, warn } from "../shell/utils/log.js";
import { readAll } from "../shell/utils/stdin.js";
import { mergeAllPreferences } from "./mergePreferences.js";

/**
 * Entries selected by the config command's profile selector.
 *
 * @effect standard input is parsed as a single user file, with no merge
 */
function loadEntries(
	options: ConfigOptions,
	fileConfig: FileConfig,
): Effect.Effect<readonly PrefEntry[], AppError> {
	const settings = resolveSettings(options, fileConfig);
	return Effect.gen(function* () {
		if (options.profile._tag === "Stdin") {
			const text = yield* readAll();
			return yield* parsePrefs(text);
		}
		const profilePath =
			options.profile._tag === "ByPath"
				? options.profile.path
				: yield* findProfilePath(options.profile.name, settings.profilesDir);

		const merged = yield* mergeAllPreferences(profilePath, settings.installDir, settings.merge, {
			extract: settings.extract,
		});
		for (const warning of merged.warnings) warn(warning);
		return merged.entries;
	});
}

function selectEntries(
	entries: readonly PrefEntry[],
	options: ConfigOptions,
): Either.Either<readonly PrefEntry[], AppError> {
	const queried: Either.Either<readonly PrefEntry[], AppError> =
		options.queries.length === 0 ? Either.right(entries) : queryPreferences(entries, options.queries);
	return options.unexplainedOnly ? Either.map(queried, filterUnexplained) : queried;
}

function runConfig(options: ConfigOptions): Effect.Effect<string, AppError> {
	return Effect.gen(function* () {
		const fileConfig = yield* loadFileConfig();
		const entries = yield* loadEntries(options, fileConfig);
		if (options.get !== undefined) {
			return yield* renderGet(entries, options.get, options.unexplainedOnly);
		}
		const selected = yield* selectEntries(entries, options);
		return renderEntries(selected, options.outputType);
	});
}

function runArchive(archivePath: string): Effect.Effect<string, AppError> {
	return Effect.gen(function* () {
		const fileConfig = yield* loadFileConfig();
		const names = yield* Effect.acquireUseRelease(
			OmniExtractor.open(
				archivePath,
				fileConfig.maxOmniSize === undefined ? {} : { maxOmniSize: fileConfig.maxOmniSize },
			),
			(extractor) => extractor.listJsFiles(),
			(extractor) => extractor.releaseQuietly(),
		);
		return renderJson([...names]);
	});
}

/**
 * Text a command prints to stdout on success.
 */
export function executeCommand(command: CliCommand): Effect.Effect<string, AppError> {
	return match<CliCommand, Effect.Effect<string, AppError>>(command)
		.with({ _tag: "Help" }, () => Effect.succeed(USAGE))
		.with({ _tag: "Profile" }, (cmd) => Effect.map(listProfiles(cmd.profilesDir), renderProfiles))
		.with({ _tag: "Installations" }, () => Effect.map(listInstallations(), renderInstallations))
		.with({ _tag: "Archive" }, (cmd) => runArchive(cmd.archivePath))
		.with({ _tag: "Config" }, (cmd) => runConfig(cmd))
		.exhaustive();
}

/**
 * Parse arguments, run the command and report the outcome.
 *
 * @returns Effect<ExitCode, never>
 * @pure false (console I/O), but does not terminate the process
 * @invariant ExitCode ∈ {0,1}
 */
export function runCli(argv?: readonly string[]): Effect.Effect<ExitCode> {
	const parsed = parseCLIArgs(argv);
	if (Either.isLeft(parsed)) {
		return Effect.sync((): ExitCode => {
			printError(describeError(parsed.left));
			printError(USAGE);
			return 1;
		});
	}
	return executeCommand(parsed.right).pipe(
		Effect.match({
			onFailure: (error): ExitCode => {
				printError(`Error: ${describeError(error)}`);
				return 1;
			},
			onSuccess: (output): ExitCode => {
				printLine(output);
				return 0;
			},
		}),
	);
}
