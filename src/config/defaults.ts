import { PhishScopeConfigSchema, type PhishScopeConfig } from './schema.js';

/**
 * Default PhishScope configuration values.
 * Used as the fallback when the merged configuration fails validation.
 */
export const DEFAULT_CONFIG: PhishScopeConfig = PhishScopeConfigSchema.parse({});
