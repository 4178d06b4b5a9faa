import fs from 'node:fs';
import path from 'node:path';

import { Ajv2020 } from 'ajv/dist/2020.js';

import { isLogLevel } from '../logging/logger.js';
import { ConfigError } from './errors.js';
import type { AccessConfig, ResolvedAccessConfig } from './types.js';

export const DEFAULT_DENIAL_MESSAGE = 'You are not allowed to access this action.';

const ACCESS_CONFIG_SCHEMA_2020_12 = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: false,
  properties: {
    $schema: { type: 'string' },
    app: {
      type: 'object',
      additionalProperties: false,
      properties: {
        name: { type: 'string' },
        env: { enum: ['development', 'test', 'staging', 'production'] },
      },
    },
    denial: {
      type: 'object',
      additionalProperties: false,
      properties: {
        status: { enum: [403, 404] },
        message: { type: 'string', minLength: 1 },
      },
    },
    declarations: {
      type: 'object',
      required: ['dir'],
      additionalProperties: false,
      properties: { dir: { type: 'string', minLength: 1 } },
    },
    logging: {
      type: 'object',
      additionalProperties: false,
      properties: { level: { enum: ['debug', 'info', 'warn', 'error', 'silent'] } },
    },
  },
};

const validateConfig = new Ajv2020({ allErrors: true }).compile<AccessConfig>(ACCESS_CONFIG_SCHEMA_2020_12);

export function resolveAccessConfig(
  config: AccessConfig = {},
  env: Record<string, string | undefined> = process.env,
): ResolvedAccessConfig {
  const appEnv = config.app?.env ?? 'development';
  const envLevel = env.ACTIONGATE_LOG_LEVEL?.trim().toLowerCase();
  if (envLevel && !isLogLevel(envLevel)) throw new ConfigError(`Invalid ACTIONGATE_LOG_LEVEL: ${envLevel}`);

  return {
    app: { name: config.app?.name ?? 'actiongate', env: appEnv },
    denial: {
      status: config.denial?.status ?? 403,
      message: config.denial?.message ?? DEFAULT_DENIAL_MESSAGE,
    },
    declarations: config.declarations ? { dir: config.declarations.dir } : null,
    logging: {
      level: isLogLevel(envLevel) ? envLevel : (config.logging?.level ?? (appEnv === 'test' ? 'silent' : 'info')),
    },
  };
}

/**
 * Reads a JSON config file. Relative `declarations.dir` paths resolve against the
 * file's directory.
 */
export function loadAccessConfig(
  filePath: string,
  env: Record<string, string | undefined> = process.env,
): ResolvedAccessConfig {
  const abs = path.resolve(filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(abs, 'utf8'));
  } catch (e) {
    throw new ConfigError(`Failed to read config: ${abs}`, { filePath: abs, cause: e });
  }
  if (!validateConfig(raw)) {
    throw new ConfigError(`Invalid config: ${abs}`, { filePath: abs, errors: validateConfig.errors ?? [] });
  }

  const resolved = resolveAccessConfig(raw, env);
  if (resolved.declarations && !path.isAbsolute(resolved.declarations.dir)) {
    resolved.declarations = { dir: path.join(path.dirname(abs), resolved.declarations.dir) };
  }
  return resolved;
}
