import * as fs from 'node:fs';
import type { Result } from '../core/result';
import { ok, fail } from '../core/result';
import type { ScmAuth, ScmOptions } from '../domain/models/scmOptions';
import { defaultScmOptions } from '../domain/models/scmOptions';
import type { ScmError } from '../domain/models/scmError';
import { isRecord } from '../domain/parsers/wire';

/**
 * Raw settings as found in the environment or a config file, before
 * defaults and validation.
 */
export interface ScmSettings {
  provider?: string;
  endpoint?: string;
  token?: string;
  username?: string;
  password?: string;
  timeoutMs?: number;
  maxConnections?: number;
  debug?: boolean;
}

export type ScmEnv = Record<string, string | undefined>;

/** Environment variable naming a JSON settings file. */
export const CONFIG_FILE_ENV = 'SCM_CONFIG';

const configError = (message: string, field?: string): ScmError => ({ code: 'Configuration', message, field });

function parsePositiveInt(raw: string, field: string): Result<number, ScmError> {
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value <= 0) {
    return fail(configError(`'${field}' must be a positive integer, got '${raw}'`, field));
  }
  return ok(value);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Reads settings from `SCM_*` environment variables.
 *
 * | Variable | Setting |
 * |---|---|
 * | SCM_PROVIDER | provider |
 * | SCM_ENDPOINT | endpoint |
 * | SCM_TOKEN | token |
 * | SCM_USERNAME / SCM_PASSWORD | basic credentials |
 * | SCM_TIMEOUT_MS | timeoutMs |
 * | SCM_MAX_CONNECTIONS | maxConnections |
 * | SCM_LOG_DEBUG | debug ("true" or "1") |
 */
export function readScmSettingsFromEnv(env: ScmEnv): Result<ScmSettings, ScmError> {
  const settings: ScmSettings = {
    provider: nonEmpty(env.SCM_PROVIDER)?.toLowerCase(),
    endpoint: nonEmpty(env.SCM_ENDPOINT),
    token: nonEmpty(env.SCM_TOKEN),
    username: nonEmpty(env.SCM_USERNAME),
    password: env.SCM_PASSWORD || undefined,
  };

  const timeout = nonEmpty(env.SCM_TIMEOUT_MS);
  if (timeout !== undefined) {
    const parsed = parsePositiveInt(timeout, 'timeoutMs');
    if (!parsed.success) return parsed;
    settings.timeoutMs = parsed.value;
  }

  const connections = nonEmpty(env.SCM_MAX_CONNECTIONS);
  if (connections !== undefined) {
    const parsed = parsePositiveInt(connections, 'maxConnections');
    if (!parsed.success) return parsed;
    settings.maxConnections = parsed.value;
  }

  const debug = nonEmpty(env.SCM_LOG_DEBUG);
  if (debug !== undefined) {
    settings.debug = debug === '1' || debug.toLowerCase() === 'true';
  }

  return ok(settings);
}

/**
 * Parses a JSON settings document (camelCase keys matching {@link ScmSettings}).
 *
 * @param source - File name used in error messages
 */
export function parseScmSettingsJson(text: string, source: string): Result<ScmSettings, ScmError> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    return fail(configError(`${source}: invalid JSON (${error instanceof Error ? error.message : String(error)})`));
  }
  if (!isRecord(json)) {
    return fail(configError(`${source}: expected a JSON object`));
  }

  const settings: ScmSettings = {};
  for (const key of ['provider', 'endpoint', 'token', 'username', 'password'] as const) {
    const value = json[key];
    if (value === undefined) continue;
    if (typeof value !== 'string') {
      return fail(configError(`${source}: '${key}' must be a string`, key));
    }
    settings[key] = key === 'provider' ? value.toLowerCase() : value;
  }
  for (const key of ['timeoutMs', 'maxConnections'] as const) {
    const value = json[key];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
      return fail(configError(`${source}: '${key}' must be a positive integer`, key));
    }
    settings[key] = value;
  }
  if (json.debug !== undefined) {
    if (typeof json.debug !== 'boolean') {
      return fail(configError(`${source}: 'debug' must be a boolean`, 'debug'));
    }
    settings.debug = json.debug;
  }

  return ok(settings);
}

/**
 * Reads a JSON settings file.
 */
export function readScmSettingsFile(configPath: string): Result<ScmSettings, ScmError> {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    return fail(
      configError(`Cannot read config file '${configPath}': ${error instanceof Error ? error.message : String(error)}`),
    );
  }
  return parseScmSettingsJson(text, configPath);
}

/**
 * Merges settings; defined values of `override` win.
 */
export function mergeScmSettings(base: ScmSettings, override: ScmSettings): ScmSettings {
  const merged: ScmSettings = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }
  return merged;
}

/**
 * Applies defaults and derives credentials. A token wins over basic
 * credentials when both are set.
 */
export function toScmOptions(settings: ScmSettings): Result<ScmOptions, ScmError> {
  let auth: ScmAuth = { type: 'none' };
  if (settings.token) {
    auth = { type: 'bearer', token: settings.token };
  } else if (settings.username !== undefined || settings.password !== undefined) {
    if (!settings.username || !settings.password) {
      return fail(configError('Basic credentials need both a username and a password', 'auth'));
    }
    auth = { type: 'basic', username: settings.username, password: settings.password };
  }

  return ok({
    provider: settings.provider ?? defaultScmOptions.provider,
    endpoint: settings.endpoint,
    auth,
    timeoutMs: settings.timeoutMs ?? defaultScmOptions.timeoutMs,
    maxConnections: settings.maxConnections ?? defaultScmOptions.maxConnections,
    debug: settings.debug ?? defaultScmOptions.debug,
  });
}

/**
 * Reads the driver options for this process.
 *
 * Priority order (highest to lowest):
 * 1. `SCM_*` environment variables
 * 2. JSON file named by `SCM_CONFIG`
 * 3. Built-in defaults
 */
export function getScmOptions(env: ScmEnv = process.env): Result<ScmOptions, ScmError> {
  const envSettings = readScmSettingsFromEnv(env);
  if (!envSettings.success) return envSettings;

  let fileSettings: ScmSettings = {};
  const configPath = nonEmpty(env[CONFIG_FILE_ENV]);
  if (configPath !== undefined) {
    const fromFile = readScmSettingsFile(configPath);
    if (!fromFile.success) return fromFile;
    fileSettings = fromFile.value;
  }

  return toScmOptions(mergeScmSettings(fileSettings, envSettings.value));
}
