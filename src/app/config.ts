/**
 * Config file discovery and loading for the CLI.
 *
 * `../config.js` parses TOML text; this module finds the file on disk, layers
 * the `--netrc` override on top and shapes the `config` command's output.
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

import {
  type Config,
  type ResolvedConfig,
  DEFAULT_CONFIG,
  parseConfig,
  resolveConfig,
} from '../config.js';

// ---------------------------------------------------------------------------
// Default config path discovery
// ---------------------------------------------------------------------------

/**
 * Determine the default configuration file path:
 * `$XDG_CONFIG_HOME/earthdata-netrc/config.toml`, or
 * `~/.config/earthdata-netrc/config.toml` when `XDG_CONFIG_HOME` is unset.
 * The file does not have to exist.
 */
export function defaultConfigPath(): string {
  const xdg = process.env.XDG_CONFIG_HOME;
  const configHome = xdg && xdg.trim() !== '' ? xdg : path.join(os.homedir(), '.config');
  return path.join(configHome, 'earthdata-netrc', 'config.toml');
}

// ---------------------------------------------------------------------------
// Config loading
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  /** Explicit TOML config path. Defaults to {@link defaultConfigPath}. */
  configPath?: string;
  /** Overrides `netrc_path` from the file. */
  netrcPath?: string;
  /** Defaults to `os.homedir()`. */
  homeDir?: string;
}

/**
 * Load and resolve the configuration.
 *
 * A missing default config file means built-in defaults. A missing file
 * named explicitly is an error.
 */
export async function loadConfig(
  options: LoadConfigOptions = {},
): Promise<{ configPath: string; config: ResolvedConfig }> {
  const resolvedPath = options.configPath ? path.resolve(options.configPath) : defaultConfigPath();
  const homeDir = options.homeDir ?? os.homedir();

  let parsed: Config = { ...DEFAULT_CONFIG };
  if (fs.existsSync(resolvedPath)) {
    parsed = parseConfig(await fs.promises.readFile(resolvedPath, 'utf-8'));
  } else if (options.configPath) {
    throw new Error(`Config file not found: ${resolvedPath}`);
  }

  if (options.netrcPath !== undefined) {
    // CLI paths are relative to the working directory, not home.
    parsed = { ...parsed, netrc_path: path.resolve(options.netrcPath) };
  }

  return { configPath: resolvedPath, config: resolveConfig(parsed, homeDir) };
}

// ---------------------------------------------------------------------------
// CLI output
// ---------------------------------------------------------------------------

/** Build the JSON-serialisable output object for the `config` CLI command. */
export function configOutput(configPath: string, config: ResolvedConfig): object {
  return {
    config_file: configPath,
    host: config.host,
    netrc_path: config.netrc_path,
  };
}
