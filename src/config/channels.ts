/**
 * Channel configuration
 *
 * Channels are declared as a comma separated list of `name:strategy` pairs,
 * e.g. `Ahboyreads:scrape,somechannel:translate`. A bare name uses `scrape`.
 */

import { ConfigError } from '../utils/errors.js';
import type { ChannelSpec, ChannelStrategy } from '../types/index.js';

export const CHANNEL_STRATEGIES: readonly ChannelStrategy[] = ['scrape', 'translate'];

const DEFAULT_STRATEGY: ChannelStrategy = 'scrape';

function isChannelStrategy(value: string): value is ChannelStrategy {
  return CHANNEL_STRATEGIES.some((strategy) => strategy === value);
}

export function parseChannelSpecs(value: string): ChannelSpec[] {
  const specs: ChannelSpec[] = [];
  const seen = new Set<string>();

  for (const entry of value.split(',')) {
    const trimmed = entry.trim();
    if (!trimmed) {
      continue;
    }

    const [rawName = '', rawStrategy] = trimmed.split(':');
    const name = rawName.trim().replace(/^@/, '');
    const strategy = rawStrategy?.trim().toLowerCase() || DEFAULT_STRATEGY;

    if (!name) {
      throw new ConfigError(`Invalid channel entry "${trimmed}"`);
    }
    if (!isChannelStrategy(strategy)) {
      throw new ConfigError(
        `Unknown strategy "${strategy}" for channel ${name} (expected ${CHANNEL_STRATEGIES.join(' or ')})`,
        { channel: name }
      );
    }
    if (seen.has(name.toLowerCase())) {
      throw new ConfigError(`Channel ${name} is configured twice`, { channel: name });
    }

    seen.add(name.toLowerCase());
    specs.push(Object.freeze({ name, strategy }));
  }

  if (specs.length === 0) {
    throw new ConfigError('TELEGRAM_CHANNELS does not name any channel');
  }

  return specs;
}

/**
 * Restrict the configured channels to the one named on the command line
 */
export function resolveChannels(
  channels: readonly ChannelSpec[],
  filter: string | undefined
): readonly ChannelSpec[] {
  if (filter === undefined) {
    return channels;
  }

  const wanted = filter.trim().replace(/^@/, '').toLowerCase();
  const match = channels.find((channel) => channel.name.toLowerCase() === wanted);

  if (!match) {
    throw new ConfigError(
      `Unknown channel "${filter}". Configured channels: ${channels.map((c) => c.name).join(', ')}`,
      { channel: filter }
    );
  }

  return [match];
}
