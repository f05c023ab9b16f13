import { formatNetrcLine } from '../netrc/format.js';
import { assertNetrcAbsent, writeNetrcFile, type Reporter } from '../netrc/writer.js';
import type { Prompter } from '../prompts/prompter.js';

export const LOGIN_PROMPT = 'NASA EarthData login:';
export const PASSWORD_PROMPT = 'NASA EarthData password:';

export interface MakeNetrcOptions {
  /** Absolute path of the netrc file to create. */
  path: string;
  host: string;
  prompter: Prompter;
  reporter: Reporter;
}

export interface MakeNetrcResult {
  path: string;
  host: string;
  username: string;
}

/**
 * Prompt for EarthData credentials and write them to a new netrc file.
 *
 * Fails with `NetrcExistsError` before prompting when `path` already exists.
 * The password is never returned or reported.
 */
export async function makeNetrc(options: MakeNetrcOptions): Promise<MakeNetrcResult> {
  const { path, host, prompter, reporter } = options;

  await assertNetrcAbsent(path);

  const username = await prompter.text(LOGIN_PROMPT);
  const password = await prompter.password(PASSWORD_PROMPT);

  await writeNetrcFile(path, formatNetrcLine(host, { username, password }), reporter);

  return { path, host, username };
}
