import * as fs from 'node:fs/promises';

import { NetrcExistsError } from './errors.js';

/** Owner read/write only. */
export const NETRC_MODE = 0o600;

export interface Reporter {
  info(message: string): void;
  warn(message: string): void;
}

/** Whether anything (file, directory or dangling link) exists at `file`. */
export async function netrcExists(file: string): Promise<boolean> {
  try {
    await fs.lstat(file);
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

/** Throw {@link NetrcExistsError} when `file` is already present. */
export async function assertNetrcAbsent(file: string): Promise<void> {
  if (await netrcExists(file)) {
    throw new NetrcExistsError(file);
  }
}

/**
 * Write `content` as the whole of a new netrc file, then restrict it to
 * {@link NETRC_MODE}.
 *
 * The `wx` flag makes creation fail with EEXIST if the file appeared after
 * the existence check; that case is reported as {@link NetrcExistsError}.
 */
export async function writeNetrcFile(
  file: string,
  content: string,
  reporter: Reporter,
): Promise<void> {
  reporter.info(`Writing EarthData credentials supplied to ${file}`);
  try {
    await fs.writeFile(file, content, { encoding: 'utf8', flag: 'wx', mode: NETRC_MODE });
  } catch (err) {
    if (hasCode(err, 'EEXIST')) throw new NetrcExistsError(file);
    throw err;
  }

  reporter.info(`Modifying permissions on ${file}`);
  // The create mode is filtered by the umask; chmod is not.
  await fs.chmod(file, NETRC_MODE);
}

function isNotFound(err: unknown): boolean {
  return hasCode(err, 'ENOENT') || hasCode(err, 'ENOTDIR');
}

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
