import { AmbiguousFilterError, BinderError, DuplicateBindingError } from '../errors.js';
import type { StorageRegistry } from '../storage/registry.js';
import type {
  BindingDecl,
  FileFilter,
  FilterDecl,
  FunctionDecl,
  ResolvedBinding,
  ResolvedFunction,
} from './types.js';

/**
 * Resolve every binding of a function against the registry.
 * Throws on the first invalid binding.
 */
export function validateFunction(registry: StorageRegistry, fn: FunctionDecl): ResolvedFunction {
  return {
    name: fn.name,
    inputs: resolveBindings(registry, fn.inputs, 'input'),
    outputs: resolveBindings(registry, fn.outputs, 'output'),
  };
}

export interface FunctionValidationResult {
  resolved: ResolvedFunction[];
  errors: BinderError[];
}

/**
 * Validate all functions, collecting one error per failing function
 * instead of stopping at the first.
 */
export function validateFunctions(
  registry: StorageRegistry,
  functions: readonly FunctionDecl[],
): FunctionValidationResult {
  const resolved: ResolvedFunction[] = [];
  const errors: BinderError[] = [];

  for (const fn of functions) {
    try {
      resolved.push(validateFunction(registry, fn));
    } catch (err) {
      if (!(err instanceof BinderError)) throw err;
      errors.push(err.at({ function: fn.name }));
    }
  }

  return { resolved, errors };
}

function resolveBindings(
  registry: StorageRegistry,
  bindings: readonly BindingDecl[],
  direction: 'input' | 'output',
): ResolvedBinding[] {
  const seen = new Set<string>();

  return bindings.map((binding) => {
    const storageId = registry.resolve(binding.storage);

    if (seen.has(binding.storage)) {
      throw new DuplicateBindingError(binding.storage, direction);
    }
    seen.add(binding.storage);

    const filter = binding.filter ? toFileFilter(binding.storage, binding.filter) : undefined;
    return filter
      ? { storage: binding.storage, storageId, path: binding.path, filter }
      : { storage: binding.storage, storageId, path: binding.path };
  });
}

/** No filter means every file; an empty declaration is the same. */
function toFileFilter(storage: string, decl: FilterDecl): FileFilter | undefined {
  if (decl.suffix !== undefined && decl.prefix !== undefined) {
    throw new AmbiguousFilterError(storage);
  }
  if (decl.suffix !== undefined) return { suffix: decl.suffix };
  if (decl.prefix !== undefined) return { prefix: decl.prefix };
  return undefined;
}
