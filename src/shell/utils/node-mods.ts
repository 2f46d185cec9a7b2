/**
 * CHANGE: Centralized re-exports of the Node built-ins used by the SHELL layer
 *
 * Invariant: export compatible objects/functions, avoiding `export *` for modules declared with `export =`.
 */
import * as fsNS from "node:fs";
import * as osNS from "node:os";
import * as pathNS from "node:path";

export { execFile } from "node:child_process";
export { promisify } from "node:util";

// NOTE: node:path (and often node:fs) use `export =`, which is incompatible with `export *`
export const fs = fsNS;
export const os = osNS;
export const path = pathNS;
