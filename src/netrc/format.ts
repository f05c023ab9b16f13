/**
 * netrc line formatting and parsing.
 *
 * The writer emits a single `machine <host> login <user> password <pass>`
 * line. Values are substituted verbatim: whitespace inside a username or
 * password is not quoted, so it splits the field when the file is read back.
 */

export interface Credentials {
  readonly username: string;
  readonly password: string;
}

/** One `machine` (or `default`) block. `machine: null` is the default entry. */
export interface NetrcEntry {
  machine: string | null;
  login?: string;
  password?: string;
  account?: string;
}

/** Render the single credential line, including its trailing newline. */
export function formatNetrcLine(host: string, credentials: Credentials): string {
  const fields = ['machine', host, 'login', credentials.username, 'password', credentials.password];
  return fields.join(' ') + '\n';
}

/**
 * Parse netrc text into its entries.
 *
 * Tokens are whitespace-separated. `macdef` bodies run until the next blank
 * line and are skipped. Unknown tokens are ignored.
 */
export function parseNetrc(content: string): NetrcEntry[] {
  const entries: NetrcEntry[] = [];
  let current: NetrcEntry | null = null;

  const lines = content.split(/\r?\n/);
  let inMacro = false;
  const tokens: string[] = [];
  for (const line of lines) {
    if (inMacro) {
      if (line.trim() === '') inMacro = false;
      continue;
    }
    const lineTokens = line.split(/\s+/).filter((t) => t !== '');
    for (let i = 0; i < lineTokens.length; i++) {
      if (lineTokens[i] === 'macdef') {
        // The macro name is on this line; the body follows.
        inMacro = true;
        break;
      }
      tokens.push(lineTokens[i]);
    }
  }

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    switch (token) {
      case 'machine': {
        const machine = tokens[i + 1];
        if (machine === undefined) return entries;
        current = { machine };
        entries.push(current);
        i++;
        break;
      }
      case 'default':
        current = { machine: null };
        entries.push(current);
        break;
      case 'login':
      case 'password':
      case 'account': {
        const value = tokens[i + 1];
        if (value === undefined) return entries;
        if (current !== null) current[token] = value;
        i++;
        break;
      }
      default:
        break;
    }
  }

  return entries;
}

/** First entry for `host`, falling back to the `default` entry. */
export function findNetrcEntry(entries: NetrcEntry[], host: string): NetrcEntry | null {
  return (
    entries.find((e) => e.machine === host) ?? entries.find((e) => e.machine === null) ?? null
  );
}
