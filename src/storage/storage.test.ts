import { describe, it, expect } from 'vitest';
import { StorageRegistry } from './registry.js';
import { hashIds, randomIds, sequentialIds, createIdGenerator } from './ids.js';
import {
  DuplicateStorageError,
  InvalidAuthError,
  UnknownStorageError,
  UnsupportedStorageTypeError,
} from '../errors.js';

describe('StorageRegistry', () => {
  it('resolve returns the id handed out by register on every call', () => {
    const registry = new StorageRegistry();
    const id = registry.register('minio-local', 'minio', { user: 'muser', pass: 'mpass' });

    expect(registry.resolve('minio-local')).toBe(id);
    expect(registry.resolve('minio-local')).toBe(id);
  });

  it('assigns sequential ids in registration order by default', () => {
    const registry = new StorageRegistry();
    expect(registry.register('a', 's3')).toBe('1');
    expect(registry.register('b', 's3')).toBe('2');
    expect(registry.register('c', 's3')).toBe('3');
  });

  it('rejects a storage name registered twice', () => {
    const registry = new StorageRegistry();
    registry.register('bucket', 's3');

    expect(() => registry.register('bucket', 's3')).toThrow(DuplicateStorageError);
    expect(registry.size).toBe(1);
  });

  it('throws UnknownStorageError when resolving an unregistered name', () => {
    const registry = new StorageRegistry();
    expect(() => registry.resolve('nowhere')).toThrow(UnknownStorageError);
    expect(() => registry.resolve('nowhere')).toThrow('Storage "nowhere" is not declared in the manifest');
  });

  it('rejects unsupported storage types', () => {
    const registry = new StorageRegistry();
    expect(() => registry.register('ftp-box', 'ftp')).toThrow(UnsupportedStorageTypeError);
    expect(registry.has('ftp-box')).toBe(false);
  });

  it('does not record a storage whose auth is invalid', () => {
    const registry = new StorageRegistry();
    expect(() => registry.register('minio-local', 'minio', { pass: 'mpass' })).toThrow(InvalidAuthError);
    expect(registry.has('minio-local')).toBe(false);
    expect(registry.register('minio-local', 'minio', { user: 'muser', pass: 'mpass' })).toBe('1');
  });

  it('lists storages in registration order with frozen auth', () => {
    const registry = new StorageRegistry();
    registry.register('one', 'onedata', { space: 'sp', token: 'test-token' });
    registry.register('bucket', 's3');

    const storages = registry.storages();
    expect(storages.map((s) => s.name)).toEqual(['one', 'bucket']);
    expect(storages[0]).toEqual({
      name: 'one',
      id: '1',
      type: 'onedata',
      auth: { space: 'sp', token: 'test-token' },
    });
    expect(Object.isFrozen(storages[0].auth)).toBe(true);
  });

  it('rejects an id generator that repeats an id', () => {
    const registry = new StorageRegistry(() => 'SAME');
    registry.register('a', 's3');
    expect(() => registry.register('b', 's3')).toThrow('already in use');
  });

  it('rejects an id generator that returns an id unfit for env keys', () => {
    const registry = new StorageRegistry(() => 'a-b');
    expect(() => registry.register('a', 's3')).toThrow(
      'Id generator returned an id that is not alphanumeric: "a-b"',
    );
    expect(registry.has('a')).toBe(false);
  });
});

describe('StorageRegistry.validateAuth', () => {
  it('fails for minio without user', () => {
    expect(() => StorageRegistry.validateAuth('minio', { pass: 'mpass' })).toThrow(InvalidAuthError);
  });

  it('passes for minio once user is present', () => {
    expect(StorageRegistry.validateAuth('minio', { user: 'muser', pass: 'mpass' })).toEqual({
      user: 'muser',
      pass: 'mpass',
    });
  });

  it('treats an empty required value as missing', () => {
    expect(() => StorageRegistry.validateAuth('minio', { user: '', pass: 'mpass' })).toThrow(
      'Invalid auth for storage type "minio": missing required field(s): user',
    );
  });

  it('accepts s3 with no auth at all', () => {
    expect(StorageRegistry.validateAuth('s3', {})).toEqual({});
  });

  it('requires space and token for onedata', () => {
    try {
      StorageRegistry.validateAuth('onedata', { host: 'oneprovider.example' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidAuthError);
      expect((err as InvalidAuthError).missing).toEqual(['space', 'token']);
      expect((err as InvalidAuthError).unexpected).toEqual([]);
    }
  });

  it('rejects fields outside the known capability set', () => {
    expect(() => StorageRegistry.validateAuth('s3', { region: 'eu-west-1' })).toThrow(
      'Invalid auth for storage type "s3": unexpected field(s): region',
    );
  });

  it('rejects known capabilities the type does not take', () => {
    expect(() => StorageRegistry.validateAuth('minio', { user: 'u', pass: 'p', space: 'sp' })).toThrow(
      'unexpected field(s): space',
    );
  });

  it('reports unsupported types before looking at auth', () => {
    expect(() => StorageRegistry.validateAuth('gcs', {})).toThrow(UnsupportedStorageTypeError);
  });
});

describe('Id generators', () => {
  it('sequentialIds skips ids that are already taken', () => {
    const next = sequentialIds();
    expect(next('a', new Set(['1', '2']))).toBe('3');
    expect(next('b', new Set(['1', '2', '3']))).toBe('4');
  });

  it('hashIds is deterministic and alphanumeric', () => {
    const next = hashIds();
    const id = next('minio-local', new Set());
    expect(id).toMatch(/^[0-9A-F]{8}$/);
    expect(hashIds()('minio-local', new Set())).toBe(id);
  });

  it('hashIds grows the id on collision', () => {
    const next = hashIds();
    const first = next('minio-local', new Set());
    const second = next('minio-local', new Set([first]));
    expect(second).toHaveLength(9);
    expect(second.startsWith(first)).toBe(true);
  });

  it('randomIds never returns a taken id', () => {
    const next = randomIds(1);
    const taken = new Set<string>();
    for (let i = 0; i < 200; i++) {
      const id = next('s', taken);
      expect(taken.has(id)).toBe(false);
      expect(id).toMatch(/^[0-9A-F]{2}$/);
      taken.add(id);
    }
  });

  it('different names never share an id in one registry', () => {
    for (const strategy of ['sequential', 'hash', 'random'] as const) {
      const registry = new StorageRegistry(createIdGenerator(strategy));
      const ids = ['a', 'b', 'c', 'd'].map((name) => registry.register(name, 's3'));
      expect(new Set(ids).size).toBe(4);
    }
  });
});
