/**
 * Interactive prompt port.
 *
 * The app layer asks for input through {@link Prompter}; the CLI supplies
 * {@link ClackPrompter}, tests supply a scripted fake.
 */
import * as clack from '@clack/prompts';

import { PromptCancelledError } from '../netrc/errors.js';
import type { Reporter } from '../netrc/writer.js';

export interface Prompter {
  /** Ask for a value shown as it is typed. */
  text(message: string): Promise<string>;

  /** Ask for a value without echoing it. */
  password(message: string): Promise<string>;
}

/** Terminal prompts rendered by `@clack/prompts`. */
export class ClackPrompter implements Prompter {
  async text(message: string): Promise<string> {
    return unwrap(await clack.text({ message }));
  }

  async password(message: string): Promise<string> {
    return unwrap(await clack.password({ message }));
  }
}

/** Reporter writing through clack's log so messages line up with prompts. */
export const clackReporter: Reporter = {
  info(message) {
    clack.log.info(message);
  },
  warn(message) {
    clack.log.warn(message);
  },
};

function unwrap(value: string | symbol): string {
  if (clack.isCancel(value)) {
    throw new PromptCancelledError();
  }
  // Submitting an empty field yields undefined on some clack releases.
  return typeof value === 'string' ? value : '';
}
