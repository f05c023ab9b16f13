/**
 * earthdata-netrc: create a NASA EarthData `~/.netrc` from interactive input.
 *
 * Re-exports the public API surface from a single entry point.
 */

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export type { Config, ResolvedConfig } from './config.js';
export {
  parseConfig,
  resolveConfig,
  resolveNetrcPath,
  DEFAULT_CONFIG,
  EARTHDATA_HOST,
  NETRC_FILENAME,
} from './config.js';
export type { LoadConfigOptions } from './app/config.js';
export { loadConfig, defaultConfigPath, configOutput } from './app/config.js';

// ---------------------------------------------------------------------------
// netrc
// ---------------------------------------------------------------------------

export type { Credentials, NetrcEntry } from './netrc/format.js';
export { formatNetrcLine, parseNetrc, findNetrcEntry } from './netrc/format.js';
export { NetrcExistsError, PromptCancelledError } from './netrc/errors.js';
export type { Reporter } from './netrc/writer.js';
export { NETRC_MODE, netrcExists, assertNetrcAbsent, writeNetrcFile } from './netrc/writer.js';

// ---------------------------------------------------------------------------
// Prompts
// ---------------------------------------------------------------------------

export type { Prompter } from './prompts/prompter.js';
export { ClackPrompter, clackReporter } from './prompts/prompter.js';

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

export type { MakeNetrcOptions, MakeNetrcResult } from './app/make-netrc.js';
export { makeNetrc, LOGIN_PROMPT, PASSWORD_PROMPT } from './app/make-netrc.js';
export type { CheckNetrcResult } from './app/check.js';
export { checkNetrc, checkPassed } from './app/check.js';
