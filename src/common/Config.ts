import { InvalidArgumentError } from './Errors';
import { Result, ok, err } from './Result';

/**
 * Multiplier applied to the bucket count when the load factor is reached.
 */
export const GROWTH_COEFFICIENT = 2;

/**
 * Largest bucket count: the longest JS array, and the range hashKey reduces into.
 */
export const MAX_CAPACITY = 0xffffffff;

export interface HashTableConfig {
  capacity: number;
  loadFactor: number;
  logRehash: boolean;
}

export const DEFAULT_CONFIG: HashTableConfig = {
  capacity: 8,
  loadFactor: 0.75,
  logRehash: false,
};

export function resolveConfig(
  config?: Partial<HashTableConfig>
): Result<HashTableConfig, InvalidArgumentError> {
  const resolved = { ...DEFAULT_CONFIG, ...config };

  if (!Number.isSafeInteger(resolved.capacity) || resolved.capacity <= 0) {
    return err(new InvalidArgumentError('non-positive capacity', 'capacity', resolved.capacity));
  }
  if (resolved.capacity > MAX_CAPACITY) {
    return err(new InvalidArgumentError('capacity too large', 'capacity', resolved.capacity));
  }
  // NaN fails both comparisons, so test for the valid range instead
  if (!(resolved.loadFactor > 0 && resolved.loadFactor <= 1)) {
    return err(new InvalidArgumentError('load factor out of range', 'loadFactor', resolved.loadFactor));
  }

  return ok(resolved);
}
