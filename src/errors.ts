/**
 * Errors raised while registering storages, validating bindings and
 * compiling a manifest. Every error is a manifest-authoring mistake;
 * none of them is retryable.
 */

export type BinderErrorCode =
  | 'DUPLICATE_STORAGE'
  | 'UNKNOWN_STORAGE'
  | 'UNSUPPORTED_STORAGE_TYPE'
  | 'INVALID_AUTH'
  | 'DUPLICATE_BINDING'
  | 'AMBIGUOUS_FILTER'
  | 'INVALID_MANIFEST'
  | 'COMPILATION_FAILED';

/** Where in the manifest an error was found. */
export interface ErrorLocation {
  function?: string;
  storage?: string;
}

export class BinderError extends Error {
  location: ErrorLocation = {};

  constructor(
    public readonly code: BinderErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'BinderError';
  }

  /** Tag the error with the function or storage it belongs to. */
  at(location: ErrorLocation): this {
    this.location = { ...this.location, ...location };
    return this;
  }

  toJSON(): { code: BinderErrorCode; message: string } & ErrorLocation {
    return { code: this.code, message: this.message, ...this.location };
  }
}

export class DuplicateStorageError extends BinderError {
  constructor(public readonly storageName: string) {
    super('DUPLICATE_STORAGE', `Storage "${storageName}" is declared more than once`);
    this.name = 'DuplicateStorageError';
  }
}

export class UnknownStorageError extends BinderError {
  constructor(public readonly storageName: string) {
    super('UNKNOWN_STORAGE', `Storage "${storageName}" is not declared in the manifest`);
    this.name = 'UnknownStorageError';
  }
}

export class UnsupportedStorageTypeError extends BinderError {
  constructor(public readonly storageType: string) {
    super('UNSUPPORTED_STORAGE_TYPE', `Unsupported storage type: "${storageType}"`);
    this.name = 'UnsupportedStorageTypeError';
  }
}

export class InvalidAuthError extends BinderError {
  constructor(
    public readonly storageType: string,
    public readonly missing: string[],
    public readonly unexpected: string[],
  ) {
    const parts: string[] = [];
    if (missing.length > 0) parts.push(`missing required field(s): ${missing.join(', ')}`);
    if (unexpected.length > 0) parts.push(`unexpected field(s): ${unexpected.join(', ')}`);
    super('INVALID_AUTH', `Invalid auth for storage type "${storageType}": ${parts.join('; ')}`);
    this.name = 'InvalidAuthError';
  }
}

export class DuplicateBindingError extends BinderError {
  constructor(
    public readonly storageName: string,
    public readonly direction: 'input' | 'output',
  ) {
    super('DUPLICATE_BINDING', `Storage "${storageName}" is bound more than once as ${direction}`);
    this.name = 'DuplicateBindingError';
  }
}

export class AmbiguousFilterError extends BinderError {
  constructor(public readonly storageName: string) {
    super('AMBIGUOUS_FILTER', `Binding to "${storageName}" declares both suffix and prefix filters`);
    this.name = 'AmbiguousFilterError';
  }
}

/** A manifest whose shape is malformed, raised at the loading boundary. */
export class ValidationError extends BinderError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super('INVALID_MANIFEST', message);
    this.name = 'ValidationError';
  }
}

/** Every error found during one compilation run. */
export class CompilationError extends BinderError {
  constructor(public readonly errors: BinderError[]) {
    super('COMPILATION_FAILED', `Manifest compilation failed with ${errors.length} error(s)`);
    this.name = 'CompilationError';
  }

  /** Human-readable report, one error per line. */
  report(): string {
    return this.errors
      .map((err) => {
        const where = err.location.function
          ? `function "${err.location.function}"`
          : err.location.storage
            ? `storage "${err.location.storage}"`
            : 'manifest';
        return `${where}: [${err.code}] ${err.message}`;
      })
      .join('\n');
  }
}
