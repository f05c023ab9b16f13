import * as fs from 'node:fs/promises';

import { findNetrcEntry, parseNetrc } from '../netrc/format.js';
import { netrcExists } from '../netrc/writer.js';

export interface CheckNetrcResult {
  path: string;
  exists: boolean;
  /** Octal permission bits, e.g. "600"; null when the file is missing. */
  mode: string | null;
  owner_only: boolean;
  has_host_entry: boolean;
  login: string | null;
}

/** Inspect an existing netrc file without modifying it. */
export async function checkNetrc(options: { path: string; host: string }): Promise<CheckNetrcResult> {
  const { path, host } = options;

  if (!(await netrcExists(path))) {
    return {
      path,
      exists: false,
      mode: null,
      owner_only: false,
      has_host_entry: false,
      login: null,
    };
  }

  const stat = await fs.stat(path);
  const bits = stat.mode & 0o777;
  const entry = findNetrcEntry(parseNetrc(await fs.readFile(path, 'utf8')), host);

  return {
    path,
    exists: true,
    mode: bits.toString(8).padStart(3, '0'),
    owner_only: (bits & 0o077) === 0,
    has_host_entry: entry?.machine === host,
    login: entry?.machine === host ? (entry.login ?? null) : null,
  };
}

/** Whether a check result describes a usable credential file. */
export function checkPassed(result: CheckNetrcResult): boolean {
  return result.exists && result.owner_only && result.has_host_entry;
}
