/** The netrc target already exists; nothing was written. */
export class NetrcExistsError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`${path} exists already (this tool won't overwrite)`);
    this.name = 'NetrcExistsError';
    this.path = path;
  }
}

/** The user cancelled an interactive prompt. */
export class PromptCancelledError extends Error {
  constructor(message = 'Canceled.') {
    super(message);
    this.name = 'PromptCancelledError';
  }
}
