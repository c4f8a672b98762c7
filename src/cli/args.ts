import { UsageError } from '../errors.js';

/** Flags that take a value, as `--flag value` or `--flag=value`. */
export const VALUE_FLAGS = [
  'name',
  'host',
  'port',
  'user',
  'remote',
  'mount',
  'key',
  'options',
] as const;

export type ValueFlag = (typeof VALUE_FLAGS)[number];

const SWITCHES: Record<string, string> = {
  '--yes': 'yes',
  '-y': 'yes',
  '--help': 'help',
  '-h': 'help',
};

export interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  values: Partial<Record<ValueFlag, string>>;
  switches: Set<string>;
}

function isValueFlag(name: string): name is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === name);
}

/**
 * Parse `process.argv.slice(2)`. The first positional is the command.
 * A value flag always consumes the next token, so option strings that
 * start with `-` can be passed as `--options "-o reconnect"`.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const values: Partial<Record<ValueFlag, string>> = {};
  const switches = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];

    const switchName = SWITCHES[token];
    if (switchName) {
      switches.add(switchName);
      continue;
    }

    if (token.startsWith('--')) {
      const eq = token.indexOf('=');
      const name = eq >= 0 ? token.slice(2, eq) : token.slice(2);
      if (!isValueFlag(name)) throw new UsageError(`Unknown option: --${name}`);

      if (eq >= 0) {
        values[name] = token.slice(eq + 1);
      } else {
        const next = argv[i + 1];
        if (next === undefined) throw new UsageError(`Option --${name} needs a value`);
        values[name] = next;
        i++;
      }
      continue;
    }

    if (token.startsWith('-') && token !== '-') {
      throw new UsageError(`Unknown option: ${token}`);
    }
    positionals.push(token);
  }

  const [command, ...rest] = positionals;
  return { command, positionals: rest, values, switches };
}
