import { BinderError, CompilationError } from '../errors.js';
import { validateFunctions } from '../manifest/validator.js';
import type { Manifest, ResolvedBinding, ResolvedFunction } from '../manifest/types.js';
import { createIdGenerator, type IdGenerator, type IdStrategyName } from '../storage/ids.js';
import { StorageRegistry } from '../storage/registry.js';
import type { StorageType } from '../storage/types.js';

export type EnvBindings = Readonly<Record<string, string>>;

export interface CompiledStorage {
  name: string;
  id: string;
  type: StorageType;
}

export interface CompiledSnapshot {
  manifestId: string;
  bindings: EnvBindings;
  storages: CompiledStorage[];
  functions: string[];
}

export interface CompileOptions {
  idStrategy?: IdStrategyName;
  /** Takes precedence over `idStrategy`. */
  idGenerator?: IdGenerator;
}

const FILTER_SEPARATOR = ':';

export function inputPathKey(id: string): string {
  return `STORAGE_PATH_INPUT_${id}`;
}

export function outputPathKey(id: string): string {
  return `STORAGE_PATH_OUTPUT_${id}`;
}

export function authKey(type: StorageType, field: string, id: string): string {
  return `STORAGE_AUTH_${type.toUpperCase()}_${field.toUpperCase()}_${id}`;
}

/**
 * Flatten resolved functions into one environment-variable mapping.
 *
 * Functions are emitted in order, inputs before outputs, followed by the
 * auth fields of every registered storage. When two bindings produce the
 * same key the later one wins; the key keeps its first position.
 */
export function compileBindings(
  registry: StorageRegistry,
  functions: readonly ResolvedFunction[],
): EnvBindings {
  const env = new Map<string, string>();

  for (const fn of functions) {
    for (const binding of fn.inputs) {
      env.set(inputPathKey(binding.storageId), binding.path);
      setFilter(env, binding);
    }
    for (const binding of fn.outputs) {
      env.set(outputPathKey(binding.storageId), binding.path);
      setFilter(env, binding);
    }
  }

  for (const storage of registry.storages()) {
    for (const [field, value] of Object.entries(storage.auth)) {
      if (value === undefined) continue;
      env.set(authKey(storage.type, field, storage.id), value);
    }
  }

  return Object.fromEntries(env);
}

function setFilter(env: Map<string, string>, binding: ResolvedBinding): void {
  const { filter, storageId } = binding;
  if (!filter) return;
  if (filter.suffix !== undefined) {
    env.set(`STORAGE_PATH_SUFFIX_${storageId}`, filter.suffix.join(FILTER_SEPARATOR));
  } else {
    env.set(`STORAGE_PATH_PREFIX_${storageId}`, filter.prefix.join(FILTER_SEPARATOR));
  }
}

/**
 * Register, validate and compile a whole manifest in one run.
 * Every storage and function is checked; if anything failed, a single
 * CompilationError carries all of the errors and no bindings are returned.
 */
export function compileManifest(manifest: Manifest, options: CompileOptions = {}): CompiledSnapshot {
  const registry = new StorageRegistry(
    options.idGenerator ?? createIdGenerator(options.idStrategy ?? 'sequential'),
  );
  const errors: BinderError[] = [];

  for (const storage of manifest.storages) {
    try {
      registry.register(storage.name, storage.type, storage.auth);
    } catch (err) {
      if (!(err instanceof BinderError)) throw err;
      errors.push(err.at({ storage: storage.name }));
    }
  }

  const validation = validateFunctions(registry, manifest.functions);
  errors.push(...validation.errors);

  if (errors.length > 0) {
    throw new CompilationError(errors);
  }

  return {
    manifestId: manifest.id,
    bindings: compileBindings(registry, validation.resolved),
    storages: registry.storages().map(({ name, id, type }) => ({ name, id, type })),
    functions: validation.resolved.map((fn) => fn.name),
  };
}
