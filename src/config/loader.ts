import { readFileSync } from 'node:fs';
import { ZodError } from 'zod';
import { ConfigSchema, type Config } from './schema.js';
import { getLogger } from '../utils/logger.js';

const ENV_PATTERN = /\$\{([^}]+)}/g;

export function substituteEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return obj.replace(ENV_PATTERN, (match: string, varName: string) => {
      const value = process.env[varName];
      if (value === undefined) {
        getLogger('config').warn({ varName }, `Environment variable ${varName} is not set`);
        return match;
      }
      return value;
    });
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVars);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVars(value);
    }
    return result;
  }
  return obj;
}

function readConfigFile(configPath: string): unknown {
  const raw = readFileSync(configPath, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  return substituteEnvVars(parsed);
}

export function loadConfig(configPath: string): Config {
  return ConfigSchema.parse(readConfigFile(configPath));
}

/** Flattens a load failure into `path: message` lines for display. */
export function describeConfigError(err: unknown): string[] {
  if (err instanceof ZodError) {
    return err.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message);
  }
  if (err instanceof Error) {
    return [err.message];
  }
  return ['Unknown error'];
}

export function validateConfig(configPath: string): { valid: boolean; errors?: string[] } {
  try {
    ConfigSchema.parse(readConfigFile(configPath));
    return { valid: true };
  } catch (err) {
    return { valid: false, errors: describeConfigError(err) };
  }
}
