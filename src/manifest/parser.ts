import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { BindingDecl, FunctionDecl, Manifest, StorageDecl } from './types.js';

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform(String);

/** A list of strings; YAML `- 01` style scalars are read as text. */
const valueList = z.array(scalar).min(1);

/** Null in YAML (`input:` with nothing under it) reads as an empty list. */
function listOf<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((items) => items ?? []);
}

const filesSchema = z
  .object({
    suffix: valueList.optional(),
    sufix: valueList.optional(),
    prefix: valueList.optional(),
  })
  .strict()
  .refine((files) => files.suffix !== undefined || files.sufix !== undefined || files.prefix !== undefined, {
    message: 'files must declare a suffix or prefix list',
  })
  .refine((files) => files.suffix === undefined || files.sufix === undefined, {
    message: 'files declares both "suffix" and "sufix"',
  });

const bindingSchema = z
  .object({
    storage: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
    path: scalar,
    files: filesSchema.optional(),
  })
  .strict()
  .transform((binding, ctx): BindingDecl => {
    const storage = binding.storage ?? binding.name;
    if (storage === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'binding must name its storage' });
      return z.NEVER;
    }
    if (!binding.files) {
      return { storage, path: binding.path };
    }
    const suffix = binding.files.suffix ?? binding.files.sufix;
    const prefix = binding.files.prefix;
    return { storage, path: binding.path, filter: { suffix, prefix } };
  });

const functionSchema = z
  .object({
    name: z.string().min(1),
    input: listOf(bindingSchema),
    output: listOf(bindingSchema),
  })
  .strict()
  .transform(
    (fn): FunctionDecl => ({ name: fn.name, inputs: fn.input, outputs: fn.output }),
  );

const storageSchema = z
  .object({
    name: z.string().min(1),
    type: z
      .string()
      .min(1)
      .transform((type) => type.toLowerCase()),
    auth: z
      .record(scalar)
      .nullish()
      .transform((auth): StorageDecl['auth'] => auth ?? {}),
  })
  .strict();

export const manifestSchema = z
  .object({
    functions: listOf(functionSchema),
    storages: listOf(storageSchema),
  })
  .strict()
  .superRefine((manifest, ctx) => {
    const seen = new Set<string>();
    manifest.functions.forEach((fn, index) => {
      if (seen.has(fn.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['functions', index, 'name'],
          message: `Duplicate function name: "${fn.name}"`,
        });
      }
      seen.add(fn.name);
    });
  });

/**
 * Check an already-decoded manifest document (from YAML or a JSON request
 * body) and convert it to a Manifest.
 */
export function toManifest(document: unknown, id = 'unnamed'): Manifest {
  if (document === null || document === undefined) {
    throw new ValidationError('Manifest is empty');
  }

  const result = manifestSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new ValidationError(`Invalid manifest: ${issues.join('; ')}`, issues);
  }

  return { id, functions: result.data.functions, storages: result.data.storages };
}

/**
 * Parse FDL text (YAML) into a Manifest.
 */
export function parseManifest(text: string, id?: string): Manifest {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (err) {
    throw new ValidationError(`Manifest is not valid YAML: ${(err as Error).message}`);
  }
  return toManifest(document, id);
}
