export const STORAGE_TYPES = ['minio', 's3', 'onedata'] as const;
export type StorageType = (typeof STORAGE_TYPES)[number];

export const AUTH_FIELDS = ['user', 'pass', 'token', 'space', 'host'] as const;
export type AuthField = (typeof AUTH_FIELDS)[number];

export type StorageAuth = Readonly<Partial<Record<AuthField, string>>>;

export interface AuthRequirements {
  required: readonly AuthField[];
  optional: readonly AuthField[];
}

/**
 * Auth capabilities per provider. s3 may rely on ambient credentials,
 * so it requires nothing. minio falls back to the runner's default
 * endpoint when no host is given.
 */
export const AUTH_REQUIREMENTS: Readonly<Record<StorageType, AuthRequirements>> = {
  minio: { required: ['user', 'pass'], optional: ['host', 'token'] },
  s3: { required: [], optional: ['user', 'pass', 'token', 'host'] },
  onedata: { required: ['space', 'token'], optional: ['host'] },
};

export interface RegisteredStorage {
  readonly name: string;
  readonly id: string;
  readonly type: StorageType;
  readonly auth: StorageAuth;
}

export function isStorageType(value: string): value is StorageType {
  return STORAGE_TYPES.some((type) => type === value);
}

export function isAuthField(value: string): value is AuthField {
  return AUTH_FIELDS.some((field) => field === value);
}
