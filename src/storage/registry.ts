import {
  DuplicateStorageError,
  InvalidAuthError,
  UnknownStorageError,
  UnsupportedStorageTypeError,
} from '../errors.js';
import { sequentialIds, type IdGenerator } from './ids.js';
import {
  AUTH_REQUIREMENTS,
  isAuthField,
  isStorageType,
  type AuthField,
  type RegisteredStorage,
  type StorageAuth,
  type StorageType,
} from './types.js';

/** Ids end up in environment-variable names. */
const ENV_SAFE_ID = /^[A-Za-z0-9]+$/;

/**
 * Storages declared by one manifest, keyed by name.
 * A registry belongs to a single compilation run; ids are unique within it.
 */
export class StorageRegistry {
  private byName = new Map<string, RegisteredStorage>();
  private ids = new Set<string>();

  constructor(private nextId: IdGenerator = sequentialIds()) {}

  /**
   * Register a storage and return its id.
   * Throws before anything is recorded if the name is taken, the type is
   * unknown or the auth fields do not fit the type.
   */
  register(name: string, type: string, auth: Readonly<Record<string, string>> = {}): string {
    if (this.byName.has(name)) {
      throw new DuplicateStorageError(name);
    }
    const storageType = parseStorageType(type);
    const validAuth = StorageRegistry.validateAuth(storageType, auth);

    const id = this.nextId(name, this.ids);
    if (this.ids.has(id)) {
      throw new Error(`Id generator returned an id already in use: "${id}"`);
    }
    if (!ENV_SAFE_ID.test(id)) {
      throw new Error(`Id generator returned an id that is not alphanumeric: "${id}"`);
    }

    this.ids.add(id);
    this.byName.set(name, Object.freeze({ name, id, type: storageType, auth: Object.freeze(validAuth) }));
    return id;
  }

  resolve(name: string): string {
    return this.get(name).id;
  }

  get(name: string): RegisteredStorage {
    const storage = this.byName.get(name);
    if (!storage) {
      throw new UnknownStorageError(name);
    }
    return storage;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /** All storages in registration order. */
  storages(): RegisteredStorage[] {
    return [...this.byName.values()];
  }

  get size(): number {
    return this.byName.size;
  }

  /**
   * Check auth fields against the requirements of `type`.
   * Returns the fields narrowed to known capabilities, in declaration order.
   */
  static validateAuth(type: string, auth: Readonly<Record<string, string>>): StorageAuth {
    const { required, optional } = AUTH_REQUIREMENTS[parseStorageType(type)];
    const allowed = new Set([...required, ...optional]);

    const missing = required.filter((field) => !auth[field]);
    const unexpected: string[] = [];
    const valid: Partial<Record<AuthField, string>> = {};

    for (const [field, value] of Object.entries(auth)) {
      if (isAuthField(field) && allowed.has(field)) {
        valid[field] = value;
      } else {
        unexpected.push(field);
      }
    }

    if (missing.length > 0 || unexpected.length > 0) {
      throw new InvalidAuthError(type, missing, unexpected);
    }
    return valid;
  }
}

export function parseStorageType(type: string): StorageType {
  if (!isStorageType(type)) {
    throw new UnsupportedStorageTypeError(type);
  }
  return type;
}
