/**
 * Runtime configuration: CLI flags > environment > JSON config file > defaults.
 * The config file is validated with Ajv.
 */

import AjvModule from 'ajv';
import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { DEFAULTS } from './db/defaults.js';
import { ConfigError, errorMessage } from './errors.js';
import type { SqlKind } from './policy/parse.js';

const Ajv = AjvModule.default;

export interface FileConfig {
  databasePath?: string;
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  schemaMaxChars?: number;
  readOnly?: boolean;
  allow?: SqlKind[];
  historyPath?: string;
}

export interface AppConfig {
  databasePath?: string;
  apiKey?: string;
  model: string;
  baseUrl?: string;
  timeoutMs: number;
  maxRetries: number;
  schemaMaxChars: number;
  readOnly: boolean;
  allow?: SqlKind[];
  historyPath: string;
  /** Config file that was read, if any */
  configPath?: string;
}

export type ConfigFlags = Partial<Pick<AppConfig, 'databasePath' | 'model' | 'baseUrl' | 'readOnly'>>;

export type Env = Record<string, string | undefined>;

export const fileConfigSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    databasePath: { type: 'string', minLength: 1 },
    apiKey: { type: 'string', minLength: 1 },
    model: { type: 'string', minLength: 1 },
    baseUrl: { type: 'string', minLength: 1 },
    timeoutMs: { type: 'integer', minimum: 0 },
    maxRetries: { type: 'integer', minimum: 0 },
    schemaMaxChars: { type: 'integer', minimum: 0 },
    readOnly: { type: 'boolean' },
    allow: {
      type: 'array',
      items: {
        type: 'string',
        enum: ['select', 'insert', 'replace', 'update', 'delete', 'create', 'alter', 'drop'],
      },
    },
    historyPath: { type: 'string', minLength: 1 },
  },
} as const;

const ajv = new Ajv({ allErrors: true });
const validateFileConfig = ajv.compile<FileConfig>(fileConfigSchema);

export function defaultConfigDir(): string {
  return join(homedir(), '.askdb');
}

export function defaultConfigPath(): string {
  return join(defaultConfigDir(), 'config.json');
}

export function defaultHistoryPath(): string {
  return join(defaultConfigDir(), 'history.db');
}

export function parseFileConfig(json: string, source = 'config'): FileConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err: unknown) {
    throw new ConfigError(`${source}: invalid JSON (${errorMessage(err)})`);
  }
  if (validateFileConfig(parsed)) {
    return parsed;
  }
  const errors = (validateFileConfig.errors ?? [])
    .map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`)
    .join('; ');
  throw new ConfigError(`${source}: ${errors || 'invalid config'}`, validateFileConfig.errors);
}

function intEnv(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}".`);
  }
  return Number(raw);
}

function boolEnv(env: Env, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return undefined;
  if (raw === '1' || raw === 'true') return true;
  if (raw === '0' || raw === 'false') return false;
  throw new ConfigError(`${name} must be one of 1, 0, true, false; got "${raw}".`);
}

function strEnv(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

export interface LoadConfigInput {
  env?: Env;
  /** Explicit --config path; missing file is an error */
  configPath?: string;
  flags?: ConfigFlags;
}

export function loadConfig(input: LoadConfigInput = {}): AppConfig {
  const env = input.env ?? process.env;
  const flags = input.flags ?? {};

  const explicitPath = input.configPath ?? strEnv(env, 'ASKDB_CONFIG');
  const configPath = explicitPath ?? (existsSync(defaultConfigPath()) ? defaultConfigPath() : undefined);

  let file: FileConfig = {};
  if (configPath) {
    let text: string;
    try {
      text = readFileSync(configPath, 'utf-8');
    } catch (err: unknown) {
      throw new ConfigError(`Cannot read config file ${configPath}: ${errorMessage(err)}`);
    }
    file = parseFileConfig(text, configPath);
  }

  return {
    databasePath: flags.databasePath ?? strEnv(env, 'ASKDB_DATABASE') ?? file.databasePath,
    apiKey: strEnv(env, 'ASKDB_API_KEY') ?? strEnv(env, 'OPENAI_API_KEY') ?? file.apiKey,
    model: flags.model ?? strEnv(env, 'ASKDB_MODEL') ?? file.model ?? DEFAULTS.model,
    baseUrl: flags.baseUrl ?? strEnv(env, 'ASKDB_BASE_URL') ?? file.baseUrl,
    timeoutMs: intEnv(env, 'ASKDB_TIMEOUT_MS') ?? file.timeoutMs ?? DEFAULTS.timeoutMs,
    maxRetries: intEnv(env, 'ASKDB_MAX_RETRIES') ?? file.maxRetries ?? DEFAULTS.maxRetries,
    schemaMaxChars: intEnv(env, 'ASKDB_SCHEMA_MAX_CHARS') ?? file.schemaMaxChars ?? DEFAULTS.schemaMaxChars,
    readOnly: flags.readOnly ?? boolEnv(env, 'ASKDB_READ_ONLY') ?? file.readOnly ?? false,
    allow: file.allow,
    historyPath: strEnv(env, 'ASKDB_HISTORY') ?? file.historyPath ?? defaultHistoryPath(),
    configPath,
  };
}

export function requireDatabasePath(config: AppConfig): string {
  if (!config.databasePath) {
    throw new ConfigError('No database configured. Pass --db <path> or set ASKDB_DATABASE.');
  }
  return config.databasePath;
}

export function requireApiKey(config: AppConfig): string {
  if (!config.apiKey) {
    throw new ConfigError('No completion API key configured. Set ASKDB_API_KEY (or OPENAI_API_KEY).');
  }
  return config.apiKey;
}
