// CHANGE: Central export point for option types

export type {
	CliCommand,
	CommandName,
	ConfigOptions,
	FileConfig,
	ProfileSelector,
} from "./config.js";
export {
	CONFIG_FILE_NAME,
	DEFAULT_PROFILE_NAME,
	DEFAULT_TARGET_FILES,
} from "./config.js";
