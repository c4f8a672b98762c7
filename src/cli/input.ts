import { splitExtraArgs, withDefaults } from '../connections/connection-codec.js';
import type { ConnectionDefinition, ConnectionInput } from '../connections/types.js';
import { validateConnection } from '../connections/validation.js';
import { ConnectionValidationError } from '../errors.js';
import type { ParsedArgs } from './args.js';

function parsePort(raw: string): number {
  const trimmed = raw.trim();
  return /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
}

/**
 * Build a connection from command-line flags, on top of `base` when editing.
 * Text fields are trimmed. Throws ConnectionValidationError listing every
 * problem found.
 */
export function connectionFromFlags(
  values: ParsedArgs['values'],
  base?: ConnectionDefinition,
): ConnectionInput {
  const input = withDefaults({
    name: values.name?.trim() ?? base?.name ?? '',
    host: values.host?.trim() ?? base?.host ?? '',
    port: values.port !== undefined ? parsePort(values.port) : base?.port,
    username: values.user?.trim() ?? base?.username ?? '',
    remotePath: values.remote?.trim() ?? base?.remotePath,
    localMountPoint: values.mount?.trim() ?? base?.localMountPoint ?? '',
    identityFile: values.key?.trim() ?? base?.identityFile,
    extraArgs: values.options !== undefined ? splitExtraArgs(values.options) : base?.extraArgs,
  });

  const problems = validateConnection(input);
  if (problems.length > 0) throw new ConnectionValidationError(problems);
  return input;
}
