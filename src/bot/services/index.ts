/**
 * Bot Services Index
 * Re-exports the relay pipeline services
 */

// Resolver
export { ResolverService, botResolverBuildUrl, botResolverParsePayload } from './resolverService';
export type { ResolverServiceOptions } from './resolverService';

// Fetcher
export { FetchService, parseContentLength } from './fetchService';
export type { FetchCallbacks, FetchServiceOptions } from './fetchService';

// Relay
export {
  RelayService,
  DirectUrlStrategy,
  DownloadUploadStrategy,
  relayWithFallback,
  botRelayCreateTempFile,
  botRelayRemoveTempFile,
  botRelayErrorMessage,
} from './relayService';

export type {
  RelayJob,
  RelayOutcome,
  RelayRequest,
  RelayResult,
  RelayServiceDeps,
  RelayStrategy,
  RelayStrategyName,
} from './relayService';

// Deletion
export { DeletionScheduler } from './deletionScheduler';
export type { DeleteMessageFn, DeletionSchedulerOptions } from './deletionScheduler';

// Telegram
export { createTelegramGateway } from './telegramGateway';
