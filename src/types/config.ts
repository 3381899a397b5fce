/**
 * Newsdesk — Configuration Types
 *
 * Shape of config/config.json. Every section except feeds and
 * interests is optional and filled with defaults on load.
 */

import { z } from 'zod';
import { FeedSourceSchema } from './feed';
import { InterestSchema, SelectionConfigSchema } from './interest';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['pretty', 'json']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

export const FetchOptionsSchema = z.object({
  timeoutMs: z.number().int().positive().default(10_000),
  maxConcurrency: z.number().int().positive().default(5),
  runTimeoutMs: z.number().int().positive().optional(),
  userAgent: z.string().min(1).default('Newsdesk/1.0'),
  categories: z.array(z.string().trim().min(1)).default([]),
});
export type FetchOptions = z.infer<typeof FetchOptionsSchema>;

export const OutputConfigSchema = z.object({
  directory: z.string().min(1).default('output'),
  filenamePrefix: z.string().min(1).default('newsdesk_report'),
  title: z.string().min(1).default('Newsdesk Report'),
});
export type OutputConfig = z.infer<typeof OutputConfigSchema>;

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  format: LogFormatSchema.default('pretty'),
  file: z.string().min(1).optional(),
});
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const AppConfigSchema = z.object({
  feeds: z.array(FeedSourceSchema).min(1, 'At least one feed is required'),
  interests: z.array(InterestSchema).min(1, 'At least one interest is required'),
  fetching: FetchOptionsSchema.default({}),
  selection: SelectionConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});
export type AppConfig = z.infer<typeof AppConfigSchema>;
