// CHANGE: Public surface of the configuration shell

export { parseCLIArgs, USAGE } from "./cli.js";
export { loadFileConfig, toFileConfig } from "./loader.js";
