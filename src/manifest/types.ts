/** File-selection rule on a binding: exactly one of suffix or prefix. */
export type FileFilter =
  | { readonly suffix: readonly string[]; readonly prefix?: undefined }
  | { readonly prefix: readonly string[]; readonly suffix?: undefined };

/**
 * A filter as declared, before validation. Both keys may be present;
 * the binding validator rejects that.
 */
export interface FilterDecl {
  readonly suffix?: readonly string[];
  readonly prefix?: readonly string[];
}

export interface BindingDecl {
  readonly storage: string;
  readonly path: string;
  readonly filter?: FilterDecl;
}

export interface FunctionDecl {
  readonly name: string;
  readonly inputs: readonly BindingDecl[];
  readonly outputs: readonly BindingDecl[];
}

export interface StorageDecl {
  readonly name: string;
  readonly type: string;
  readonly auth: Readonly<Record<string, string>>;
}

export interface Manifest {
  readonly id: string;
  readonly functions: readonly FunctionDecl[];
  readonly storages: readonly StorageDecl[];
}

export interface ResolvedBinding {
  readonly storage: string;
  readonly storageId: string;
  readonly path: string;
  readonly filter?: FileFilter;
}

export interface ResolvedFunction {
  readonly name: string;
  readonly inputs: readonly ResolvedBinding[];
  readonly outputs: readonly ResolvedBinding[];
}
