import { createHash, randomBytes } from 'node:crypto';

export const ID_STRATEGIES = ['sequential', 'hash', 'random'] as const;
export type IdStrategyName = (typeof ID_STRATEGIES)[number];

/**
 * Produces storage identifiers. `taken` holds every id already handed
 * out in the current registry; the returned id must not be in it.
 */
export type IdGenerator = (name: string, taken: ReadonlySet<string>) => string;

export function sequentialIds(): IdGenerator {
  let next = 1;
  return (_name, taken) => {
    while (taken.has(String(next))) next++;
    return String(next++);
  };
}

/**
 * Deterministic ids derived from the storage name. On a prefix collision
 * the id grows by one hex digit until it is free.
 */
export function hashIds(length = 8): IdGenerator {
  return (name, taken) => {
    const digest = createHash('sha256').update(name).digest('hex').toUpperCase();
    for (let len = length; len <= digest.length; len++) {
      const candidate = digest.slice(0, len);
      if (!taken.has(candidate)) return candidate;
    }
    throw new Error(`Could not derive a unique id for storage "${name}"`);
  };
}

export function randomIds(bytes = 4): IdGenerator {
  return (_name, taken) => {
    let candidate: string;
    do {
      candidate = randomBytes(bytes).toString('hex').toUpperCase();
    } while (taken.has(candidate));
    return candidate;
  };
}

export function createIdGenerator(strategy: IdStrategyName): IdGenerator {
  switch (strategy) {
    case 'sequential':
      return sequentialIds();
    case 'hash':
      return hashIds();
    case 'random':
      return randomIds();
  }
}
