import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { binderConfigSchema, type BinderConfigParsed } from './schema.js';

const ENV_PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Replace `${VAR}` placeholders in every string of a decoded YAML value.
 */
function resolveEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_PLACEHOLDER, (_match, name: string) => {
      const resolved = process.env[name];
      if (resolved === undefined) {
        throw new Error(`Environment variable ${name} is not set`);
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map(resolveEnvVars);
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, resolveEnvVars(v)]));
  }
  return value;
}

/**
 * Load and validate a binder-config.yaml file.
 */
export function loadConfig(path: string): BinderConfigParsed {
  const raw: unknown = parseYaml(readFileSync(path, 'utf-8'));
  return binderConfigSchema.parse(resolveEnvVars(raw ?? {}));
}
