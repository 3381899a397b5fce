/**
 * Newsdesk — Type Exports
 *
 * Re-exports all types and schemas from the types module.
 */

// Feeds
export type { FeedSource, Article, FetchErrorKind } from './feed';
export { FeedSourceSchema } from './feed';

// Interests, scoring, selection
export type {
  Interest,
  InterestInput,
  KeywordMatchCounts,
  ScoredArticle,
  CapScope,
  MultiInterestPolicy,
  SelectionConfig,
} from './interest';
export {
  InterestSchema,
  CapScopeSchema,
  MultiInterestPolicySchema,
  SelectionConfigSchema,
} from './interest';

// Configuration
export type {
  LogLevel,
  LogFormat,
  FetchOptions,
  OutputConfig,
  LoggingConfig,
  AppConfig,
} from './config';
export {
  LogLevelSchema,
  LogFormatSchema,
  FetchOptionsSchema,
  OutputConfigSchema,
  LoggingConfigSchema,
  AppConfigSchema,
} from './config';
