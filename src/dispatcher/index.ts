/**
 * Dispatcher Module
 */

export {
  processMessage,
  processChannel,
  type ArticleFetcher,
  type DispatcherDeps,
  type ChannelProcessResult,
} from './strategy.js';
