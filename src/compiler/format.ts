import type { EnvBindings } from './compiler.js';

const NEEDS_QUOTES = /[\s#"'=\\]/;

function quote(value: string): string {
  if (value === '' || !NEEDS_QUOTES.test(value)) return value;
  const escaped = value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
  return `"${escaped}"`;
}

/**
 * Render bindings as dotenv lines (`KEY=value`), in mapping order.
 */
export function formatDotenv(bindings: EnvBindings): string {
  return Object.entries(bindings)
    .map(([key, value]) => `${key}=${quote(value)}`)
    .join('\n');
}

export function formatJson(bindings: EnvBindings): string {
  return JSON.stringify(bindings, null, 2);
}
