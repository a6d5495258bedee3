/**
 * Command line arguments
 */

import { ConfigError } from './utils/errors.js';

export interface CliArgs {
  /** Restrict the run to this configured channel */
  channel: string | undefined;
  schedule: boolean;
  dryRun: boolean;
}

const KNOWN_FLAGS = new Set(['--schedule', '--dry-run']);

export function parseArgs(argv: readonly string[]): CliArgs {
  const flags = argv.filter((arg) => arg.startsWith('--'));
  const positional = argv.filter((arg) => !arg.startsWith('--'));

  const unknown = flags.filter((flag) => !KNOWN_FLAGS.has(flag));
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown option: ${unknown.join(', ')}`);
  }
  if (positional.length > 1) {
    throw new ConfigError(`Expected at most one channel, got: ${positional.join(', ')}`);
  }

  return {
    channel: positional[0],
    schedule: flags.includes('--schedule'),
    dryRun: flags.includes('--dry-run'),
  };
}
