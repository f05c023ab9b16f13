/**
 * Configuration module for earthdata-netrc.
 *
 * Parses the optional TOML configuration and fills in defaults. Without a
 * config file the tool writes `~/.netrc` for the EarthData login host.
 */

import path from 'node:path';
import toml from 'toml';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface Config {
  /** Hostname placed after `machine` in the written line. */
  host: string;
  /** Optional target path. `~/` and relative paths resolve against home. */
  netrc_path?: string;
}

export interface ResolvedConfig {
  host: string;
  /** Absolute path of the netrc file to write. */
  netrc_path: string;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const EARTHDATA_HOST = 'urs.earthdata.nasa.gov';

export const NETRC_FILENAME = '.netrc';

export const DEFAULT_CONFIG: Config = {
  host: EARTHDATA_HOST,
  netrc_path: undefined,
};

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse a TOML configuration string into a `Config`.
 *
 * Missing or mistyped fields fall back to defaults; blank strings count as
 * missing.
 */
export function parseConfig(tomlStr: string): Config {
  // toml.parse throws on invalid TOML; an empty string yields an empty object.
  const raw: Record<string, unknown> =
    tomlStr.trim().length === 0 ? {} : (toml.parse(tomlStr) as Record<string, unknown>);

  const config: Config = {
    host:
      typeof raw.host === 'string' && raw.host.trim() !== ''
        ? raw.host.trim()
        : DEFAULT_CONFIG.host,
  };

  if (typeof raw.netrc_path === 'string' && raw.netrc_path.trim() !== '') {
    config.netrc_path = raw.netrc_path.trim();
  }

  return config;
}

// ---------------------------------------------------------------------------
// Path resolution
// ---------------------------------------------------------------------------

/**
 * Resolve the netrc target path.
 *
 * - Unset: `<homeDir>/.netrc`.
 * - `~` or `~/...`: expanded against `homeDir`.
 * - Absolute: returned as-is.
 * - Relative: joined with `homeDir`.
 */
export function resolveNetrcPath(netrcPath: string | undefined, homeDir: string): string {
  if (netrcPath == null) {
    return path.join(homeDir, NETRC_FILENAME);
  }

  if (netrcPath === '~') {
    return homeDir;
  }
  if (netrcPath.startsWith('~/')) {
    return path.join(homeDir, netrcPath.slice(2));
  }

  if (path.isAbsolute(netrcPath)) {
    return netrcPath;
  }
  return path.join(homeDir, netrcPath);
}

/** Apply path resolution to a parsed config. */
export function resolveConfig(config: Config, homeDir: string): ResolvedConfig {
  return {
    host: config.host,
    netrc_path: resolveNetrcPath(config.netrc_path, homeDir),
  };
}
