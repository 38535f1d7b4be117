import { z } from 'zod';

/**
 * Zod schema for PhishScope configuration.
 * Used to validate environment variables and config file values.
 */
export const PhishScopeConfigSchema = z.object({
  /** HTTP listener. */
  server: z.object({
    host: z.string().min(1).default('127.0.0.1'),
    port: z.number().int().min(0).max(65535).default(5000),
  }).default({}),

  /** SQLite database file. Defaults to ~/.phishscope/phishscope.db. */
  database: z.object({
    path: z.string().min(1).optional(),
  }).default({}),

  /** Stage 1 verdict cache. */
  cache: z.object({
    ttlHours: z.number().positive().default(24),
    dir: z.string().optional(),
  }).default({}),

  /** Stage 2 classifier scoring service. */
  classifier: z.object({
    enabled: z.boolean().default(false),
    apiUrl: z.string().url().default('http://127.0.0.1:8000'),
    timeoutMs: z.number().int().positive().default(5000),
  }).default({}),

  /** Stage 3 reasoning service. Without an API key the keyword fallback is used. */
  reasoning: z.object({
    apiKey: z.string().min(1).optional(),
    model: z.string().min(1).default('claude-3-5-haiku-latest'),
    maxTokens: z.number().int().positive().default(1024),
    timeoutMs: z.number().int().positive().default(15000),
  }).default({}),

  /** Pipeline stage switches. Stage 1 always runs. */
  stages: z.object({
    layer2Enabled: z.boolean().default(true),
    layer3Enabled: z.boolean().default(true),
  }).default({}),

  /** Conversation monitoring window opened for flagged senders. */
  conversation: z.object({
    timeoutHours: z.number().positive().default(10),
  }).default({}),

  /** Input limits applied by the email normalizer. */
  limits: z.object({
    maxBodyLength: z.number().int().positive().default(50_000),
    maxUrls: z.number().int().positive().default(10),
  }).default({}),

  /** Audit logging. */
  audit: z.object({
    enabled: z.boolean().default(true),
    logDir: z.string().optional(),
  }).default({}),

  /** Logging level. */
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type PhishScopeConfig = z.infer<typeof PhishScopeConfigSchema>;

/** Config sections that are merged key by key between file and environment. */
export const CONFIG_SECTIONS = [
  'server',
  'database',
  'cache',
  'classifier',
  'reasoning',
  'stages',
  'conversation',
  'limits',
  'audit',
] as const;
