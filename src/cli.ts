#!/usr/bin/env node
/**
 * storage-binder CLI: compile FDL manifests into storage environment bindings.
 *
 * Usage:
 *   storage-binder compile <manifest.yaml> [--format env|json] [--id-strategy sequential|hash|random]
 *   storage-binder check <manifest.yaml>
 *   storage-binder serve [binder-config.yaml]
 */

import { readFileSync, realpathSync } from 'node:fs';
import { basename, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseManifest } from './manifest/parser.js';
import { compileManifest, type CompiledSnapshot } from './compiler/compiler.js';
import { formatDotenv, formatJson } from './compiler/format.js';
import { CompilationError, ValidationError } from './errors.js';
import { ID_STRATEGIES, type IdStrategyName } from './storage/ids.js';
import { startFromConfig, VERSION } from './server/server.js';

export type OutputFormat = 'env' | 'json';

export interface CompileFileOptions {
  format?: OutputFormat;
  idStrategy?: IdStrategyName;
}

export interface CompileFileResult {
  snapshot: CompiledSnapshot;
  output: string;
}

/** The manifest id is the file name without its extension. */
function manifestIdFor(path: string): string {
  return basename(path, extname(path));
}

/**
 * Read, compile and render a manifest file.
 * Throws ValidationError or CompilationError when the manifest is invalid.
 */
export function compileFile(path: string, options: CompileFileOptions = {}): CompileFileResult {
  const manifest = parseManifest(readFileSync(path, 'utf-8'), manifestIdFor(path));
  const snapshot = compileManifest(manifest, { idStrategy: options.idStrategy });
  const output = options.format === 'json' ? formatJson(snapshot.bindings) : formatDotenv(snapshot.bindings);
  return { snapshot, output };
}

export interface CheckResult {
  ok: boolean;
  storages: number;
  functions: number;
  problems: string[];
}

/**
 * Validate a manifest file without printing its bindings.
 */
export function checkFile(path: string): CheckResult {
  try {
    const { snapshot } = compileFile(path);
    return { ok: true, storages: snapshot.storages.length, functions: snapshot.functions.length, problems: [] };
  } catch (err) {
    if (err instanceof CompilationError) {
      return { ok: false, storages: 0, functions: 0, problems: err.report().split('\n') };
    }
    if (err instanceof ValidationError) {
      return { ok: false, storages: 0, functions: 0, problems: err.issues.length > 0 ? err.issues : [err.message] };
    }
    throw err;
  }
}

export interface ParsedArgs {
  command?: string;
  positional: string[];
  format: OutputFormat;
  idStrategy?: IdStrategyName;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const [command, ...rest] = argv;
  const parsed: ParsedArgs = { command, positional: [], format: 'env' };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === '--format') {
      const value = rest[++i];
      if (value !== 'env' && value !== 'json') {
        throw new Error(`--format must be "env" or "json", got "${value ?? ''}"`);
      }
      parsed.format = value;
    } else if (arg === '--id-strategy') {
      const value = rest[++i];
      const strategy = ID_STRATEGIES.find((s) => s === value);
      if (!strategy) {
        throw new Error(`--id-strategy must be one of: ${ID_STRATEGIES.join(', ')}`);
      }
      parsed.idStrategy = strategy;
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      parsed.positional.push(arg);
    }
  }

  return parsed;
}

export function usageText(): string {
  return [
    `storage-binder v${VERSION}`,
    '',
    'Usage:',
    '  storage-binder compile <manifest.yaml> [--format env|json] [--id-strategy sequential|hash|random]',
    '  storage-binder check <manifest.yaml>',
    '  storage-binder serve [binder-config.yaml]',
  ].join('\n');
}

function fail(err: unknown): never {
  if (err instanceof CompilationError) {
    console.error(`Error: ${err.message}`);
    console.error(err.report());
  } else if (err instanceof Error) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error(`Error: ${String(err)}`);
  }
  process.exit(1);
}

// --- CLI runner (only executes when this file is the entry point) ---
// Resolve symlinks so this works through node_modules/.bin
const isDirectRun = (() => {
  try {
    const self = fileURLToPath(import.meta.url);
    const invoked = realpathSync(process.argv[1]);
    return invoked === self;
  } catch {
    return false;
  }
})();

if (isDirectRun) {
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err) {
    fail(err);
  }

  const [file] = args.positional;

  if (args.command === 'compile' && file) {
    try {
      const { output } = compileFile(file, { format: args.format, idStrategy: args.idStrategy });
      console.log(output);
    } catch (err) {
      fail(err);
    }
  } else if (args.command === 'check' && file) {
    let result: CheckResult;
    try {
      result = checkFile(file);
    } catch (err) {
      fail(err);
    }
    if (result.ok) {
      console.log(`\n  ${file}: OK (${result.storages} storage(s), ${result.functions} function(s))\n`);
    } else {
      console.error(`\n  ${file}: ${result.problems.length} problem(s)\n`);
      for (const problem of result.problems) {
        console.error(`    ${problem}`);
      }
      console.error('');
      process.exit(1);
    }
  } else if (args.command === 'serve') {
    try {
      startFromConfig(resolve(file ?? 'binder-config.yaml'));
    } catch (err) {
      fail(err);
    }
  } else {
    console.log(usageText());
  }
}
