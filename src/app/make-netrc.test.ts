import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { makeNetrc, LOGIN_PROMPT, PASSWORD_PROMPT } from './make-netrc.js';
import { NetrcExistsError, PromptCancelledError } from '../netrc/errors.js';
import type { Prompter } from '../prompts/prompter.js';
import type { Reporter } from '../netrc/writer.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const HOST = 'urs.earthdata.nasa.gov';

class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];

  constructor(
    private readonly login: string | Error,
    private readonly secret: string | Error,
  ) {}

  async text(message: string): Promise<string> {
    this.asked.push(`text: ${message}`);
    if (this.login instanceof Error) throw this.login;
    return this.login;
  }

  async password(message: string): Promise<string> {
    this.asked.push(`password: ${message}`);
    if (this.secret instanceof Error) throw this.secret;
    return this.secret;
  }
}

function recordingReporter(): Reporter & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(message),
    warn: (message) => lines.push(`warn: ${message}`),
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('makeNetrc', () => {
  let tmpDir: string;
  let target: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'earthdata-netrc-make-'));
    target = path.join(tmpDir, '.netrc');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('writes the credential line with owner-only permissions', async () => {
    const prompter = new ScriptedPrompter('alice', 's3cr3t');
    const reporter = recordingReporter();

    const result = await makeNetrc({ path: target, host: HOST, prompter, reporter });

    expect(result).toEqual({ path: target, host: HOST, username: 'alice' });
    expect(await fs.readFile(target, 'utf8')).toBe(
      'machine urs.earthdata.nasa.gov login alice password s3cr3t\n',
    );
    expect((await fs.stat(target)).mode & 0o777).toBe(0o600);
  });

  it('asks for login then password', async () => {
    const prompter = new ScriptedPrompter('alice', 's3cr3t');
    await makeNetrc({ path: target, host: HOST, prompter, reporter: recordingReporter() });

    expect(prompter.asked).toEqual([`text: ${LOGIN_PROMPT}`, `password: ${PASSWORD_PROMPT}`]);
  });

  it('never reports the password', async () => {
    const reporter = recordingReporter();
    await makeNetrc({
      path: target,
      host: HOST,
      prompter: new ScriptedPrompter('alice', 's3cr3t'),
      reporter,
    });

    expect(reporter.lines).toEqual([
      `Writing EarthData credentials supplied to ${target}`,
      `Modifying permissions on ${target}`,
    ]);
  });

  it('fails without prompting when the file exists', async () => {
    await fs.writeFile(target, 'machine other.test login bob password hunter2\n');
    const prompter = new ScriptedPrompter('alice', 's3cr3t');
    const reporter = recordingReporter();

    await expect(makeNetrc({ path: target, host: HOST, prompter, reporter })).rejects.toBeInstanceOf(
      NetrcExistsError,
    );

    expect(prompter.asked).toEqual([]);
    expect(reporter.lines).toEqual([]);
    expect(await fs.readFile(target, 'utf8')).toBe(
      'machine other.test login bob password hunter2\n',
    );
  });

  it('leaves the first result in place on a second run', async () => {
    await makeNetrc({
      path: target,
      host: HOST,
      prompter: new ScriptedPrompter('alice', 's3cr3t'),
      reporter: recordingReporter(),
    });
    const second = makeNetrc({
      path: target,
      host: HOST,
      prompter: new ScriptedPrompter('mallory', 'other'),
      reporter: recordingReporter(),
    });

    await expect(second).rejects.toBeInstanceOf(NetrcExistsError);
    expect(await fs.readFile(target, 'utf8')).toBe(
      'machine urs.earthdata.nasa.gov login alice password s3cr3t\n',
    );
  });

  it('writes nothing when a prompt is cancelled', async () => {
    const prompter = new ScriptedPrompter('alice', new PromptCancelledError());

    await expect(
      makeNetrc({ path: target, host: HOST, prompter, reporter: recordingReporter() }),
    ).rejects.toBeInstanceOf(PromptCancelledError);
    await expect(fs.access(target)).rejects.toHaveProperty('code', 'ENOENT');
  });

  it('uses a custom host', async () => {
    await makeNetrc({
      path: target,
      host: 'example.test',
      prompter: new ScriptedPrompter('u', 'p'),
      reporter: recordingReporter(),
    });

    expect(await fs.readFile(target, 'utf8')).toBe('machine example.test login u password p\n');
  });
});
