import { Command } from 'commander';

import { loadConfig, configOutput } from '../app/config.js';
import { makeNetrc } from '../app/make-netrc.js';
import { checkNetrc, checkPassed } from '../app/check.js';
import { NetrcExistsError, PromptCancelledError } from '../netrc/errors.js';
import type { Reporter } from '../netrc/writer.js';
import type { Prompter } from '../prompts/prompter.js';

export interface CliDeps {
  prompter: Prompter;
  reporter: Reporter;
  /** Receives JSON output of the `check` and `config` commands. */
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  exit: (code: number) => void;
  /** Home directory override; defaults to `os.homedir()`. */
  homeDir?: string;
}

type GlobalOptions = {
  config?: string;
  netrc?: string;
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function existsWarning(path: string): string {
  return [
    `Warning: ${path} exists already (this tool won't overwrite).`,
    `Back up ${path} first & delete to avoid losing credentials.`,
  ].join('\n');
}

async function run(deps: CliDeps, fn: () => Promise<number>): Promise<void> {
  let code: number;
  try {
    code = await fn();
  } catch (err) {
    if (err instanceof NetrcExistsError) {
      deps.reporter.warn(existsWarning(err.path));
    } else if (err instanceof PromptCancelledError) {
      deps.reporter.warn(err.message);
    } else {
      const message = err instanceof Error ? err.message : String(err);
      deps.stderr(`Error: ${message}`);
    }
    code = 1;
  }
  if (code !== 0) deps.exit(code);
}

function printJson(deps: CliDeps, value: unknown): void {
  deps.stdout(JSON.stringify(value, null, 2));
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

export function buildProgram(deps: CliDeps): Command {
  const program = new Command();

  const load = () => {
    const opts = program.opts<GlobalOptions>();
    return loadConfig({ configPath: opts.config, netrcPath: opts.netrc, homeDir: deps.homeDir });
  };

  program
    .name('earthdata-netrc')
    .description('Write NASA EarthData login credentials to a new ~/.netrc')
    .version('0.1.0')
    .option('-c, --config <path>', 'path to TOML config file')
    .option('--netrc <path>', 'netrc file to create (default: ~/.netrc)');

  program
    .command('write', { isDefault: true })
    .description('Prompt for credentials and create the netrc file')
    .action(async () => {
      await run(deps, async () => {
        const { config } = await load();
        await makeNetrc({
          path: config.netrc_path,
          host: config.host,
          prompter: deps.prompter,
          reporter: deps.reporter,
        });
        return 0;
      });
    });

  program
    .command('check')
    .description('Inspect the netrc file as JSON; exits 1 unless it is usable')
    .action(async () => {
      await run(deps, async () => {
        const { config } = await load();
        const result = await checkNetrc({ path: config.netrc_path, host: config.host });
        printJson(deps, result);
        return checkPassed(result) ? 0 : 1;
      });
    });

  program
    .command('config')
    .description('Print configuration as JSON')
    .action(async () => {
      await run(deps, async () => {
        const { configPath, config } = await load();
        printJson(deps, configOutput(configPath, config));
        return 0;
      });
    });

  return program;
}
