import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { CONFIG_SECTIONS, PhishScopeConfigSchema, type PhishScopeConfig } from './schema.js';
import { DEFAULT_CONFIG } from './defaults.js';

type ConfigRecord = Record<string, unknown>;

/**
 * Load PhishScope configuration from environment variables and optional config file.
 *
 * Priority: Environment variables > config file > defaults.
 *
 * Config file locations (first found wins):
 *   1. PHISHSCOPE_CONFIG env var
 *   2. ~/.phishscope/config.json
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PhishScopeConfig {
  const fileCfg = loadConfigFile(env) ?? {};
  const envCfg = loadEnvConfig(env);

  // Merge: env overrides file per section, schema provides defaults
  const merged: ConfigRecord = { ...fileCfg, ...envCfg };
  for (const section of CONFIG_SECTIONS) {
    merged[section] = { ...sectionOf(fileCfg, section), ...sectionOf(envCfg, section) };
  }

  const result = PhishScopeConfigSchema.safeParse(merged);

  if (!result.success) {
    const errors = result.error.issues
      .map(i => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    process.stderr.write(`[PhishScope] Configuration errors:\n${errors}\n`);
    process.stderr.write('[PhishScope] Using defaults.\n');
    return DEFAULT_CONFIG;
  }

  return result.data;
}

/** State directory shared by the database, cache and audit logs. */
export function defaultStateDir(): string {
  return path.join(os.homedir(), '.phishscope');
}

function loadConfigFile(env: NodeJS.ProcessEnv): ConfigRecord | undefined {
  const configPath = env.PHISHSCOPE_CONFIG ?? path.join(defaultStateDir(), 'config.json');

  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return isRecord(parsed) ? parsed : undefined;
  } catch (error) {
    process.stderr.write(
      `[PhishScope] Ignoring unreadable config file ${configPath}: ${error instanceof Error ? error.message : error}\n`,
    );
    return undefined;
  }
}

function loadEnvConfig(env: NodeJS.ProcessEnv): ConfigRecord {
  const config: ConfigRecord = {};

  if (env.PHISHSCOPE_LOG_LEVEL) config.logLevel = env.PHISHSCOPE_LOG_LEVEL;

  // Server
  const server: ConfigRecord = {};
  if (env.PHISHSCOPE_HOST) server.host = env.PHISHSCOPE_HOST;
  if (env.PHISHSCOPE_PORT) server.port = parseInt(env.PHISHSCOPE_PORT, 10);
  if (Object.keys(server).length > 0) config.server = server;

  // Database
  if (env.PHISHSCOPE_DB_PATH) config.database = { path: env.PHISHSCOPE_DB_PATH };

  // Cache
  const cache: ConfigRecord = {};
  if (env.PHISHSCOPE_CACHE_TTL_HOURS) cache.ttlHours = parseFloat(env.PHISHSCOPE_CACHE_TTL_HOURS);
  if (env.PHISHSCOPE_CACHE_DIR) cache.dir = env.PHISHSCOPE_CACHE_DIR;
  if (Object.keys(cache).length > 0) config.cache = cache;

  // Classifier: setting a URL enables it unless explicitly disabled
  const classifier: ConfigRecord = {};
  if (env.PHISHSCOPE_CLASSIFIER_URL) {
    classifier.apiUrl = env.PHISHSCOPE_CLASSIFIER_URL;
    classifier.enabled = true;
  }
  if (env.PHISHSCOPE_CLASSIFIER !== undefined) {
    classifier.enabled = env.PHISHSCOPE_CLASSIFIER === 'true';
  }
  if (env.PHISHSCOPE_CLASSIFIER_TIMEOUT_MS) {
    classifier.timeoutMs = parseInt(env.PHISHSCOPE_CLASSIFIER_TIMEOUT_MS, 10);
  }
  if (Object.keys(classifier).length > 0) config.classifier = classifier;

  // Reasoning
  const reasoning: ConfigRecord = {};
  if (env.ANTHROPIC_API_KEY) reasoning.apiKey = env.ANTHROPIC_API_KEY;
  if (env.PHISHSCOPE_REASONING_MODEL) reasoning.model = env.PHISHSCOPE_REASONING_MODEL;
  if (env.PHISHSCOPE_REASONING_TIMEOUT_MS) {
    reasoning.timeoutMs = parseInt(env.PHISHSCOPE_REASONING_TIMEOUT_MS, 10);
  }
  if (Object.keys(reasoning).length > 0) config.reasoning = reasoning;

  // Stages
  const stages: ConfigRecord = {};
  if (env.PHISHSCOPE_LAYER2_ENABLED !== undefined) {
    stages.layer2Enabled = env.PHISHSCOPE_LAYER2_ENABLED !== 'false';
  }
  if (env.PHISHSCOPE_LAYER3_ENABLED !== undefined) {
    stages.layer3Enabled = env.PHISHSCOPE_LAYER3_ENABLED !== 'false';
  }
  if (Object.keys(stages).length > 0) config.stages = stages;

  // Conversation
  if (env.PHISHSCOPE_CONVERSATION_TIMEOUT_HOURS) {
    config.conversation = { timeoutHours: parseFloat(env.PHISHSCOPE_CONVERSATION_TIMEOUT_HOURS) };
  }

  // Limits
  const limits: ConfigRecord = {};
  if (env.PHISHSCOPE_MAX_BODY_LENGTH) limits.maxBodyLength = parseInt(env.PHISHSCOPE_MAX_BODY_LENGTH, 10);
  if (env.PHISHSCOPE_MAX_URLS) limits.maxUrls = parseInt(env.PHISHSCOPE_MAX_URLS, 10);
  if (Object.keys(limits).length > 0) config.limits = limits;

  // Audit
  const audit: ConfigRecord = {};
  if (env.PHISHSCOPE_AUDIT_ENABLED !== undefined) {
    audit.enabled = env.PHISHSCOPE_AUDIT_ENABLED !== 'false';
  }
  if (env.PHISHSCOPE_AUDIT_DIR) audit.logDir = env.PHISHSCOPE_AUDIT_DIR;
  if (Object.keys(audit).length > 0) config.audit = audit;

  return config;
}

function sectionOf(cfg: ConfigRecord, key: string): ConfigRecord {
  const value = cfg[key];
  return isRecord(value) ? value : {};
}

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
