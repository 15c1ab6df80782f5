export { HashTable, hashKey, bucketAt } from './storage/hashtable';

export type { HashTableConfig } from './common/Config';
export { DEFAULT_CONFIG, GROWTH_COEFFICIENT, MAX_CAPACITY, resolveConfig } from './common/Config';

export type { InvalidArgumentReason } from './common/Errors';
export { HashTableError, InvalidArgumentError } from './common/Errors';

export type { Result } from './common/Result';
export { ok, err, unwrap, unwrapErr } from './common/Result';

export type { KVPair, Bucket } from './common/Types';

export type {
  IHashTable,
  HashTableDependencies,
  Logger,
  RehashEvent,
  RehashListener,
} from './interfaces/HashTable';
