/**
 * HashTable - integer keys, string values, separate chaining
 *
 * Each bucket is a small array of pairs. Colliding keys share a bucket and
 * are found by linear scan, so lookups are O(1) expected and O(chain length)
 * at worst.
 *
 * Growth: after an insertion pushes numKeys / capacity up to the load factor,
 * every pair is redistributed into capacity * GROWTH_COEFFICIENT buckets.
 * Overwrites and removals never resize.
 */

import { HashTableConfig, GROWTH_COEFFICIENT, MAX_CAPACITY, resolveConfig } from '../../common/Config';
import { InvalidArgumentError } from '../../common/Errors';
import { Result, ok } from '../../common/Result';
import { Bucket, KVPair } from '../../common/Types';
import { HashTableDependencies, IHashTable, Logger, RehashListener } from '../../interfaces/HashTable';
import { bucketAt } from './hash';

function createBuckets(capacity: number): Bucket[] {
  return Array.from({ length: capacity }, (): Bucket => []);
}

export class HashTable implements IHashTable {
  private buckets: Bucket[];
  private numKeys: number = 0;
  private readonly threshold: number;
  private readonly logRehash: boolean;
  private readonly logger: Logger;
  private readonly onRehash: RehashListener | undefined;

  private constructor(config: HashTableConfig, dependencies: HashTableDependencies) {
    this.buckets = createBuckets(config.capacity);
    this.threshold = config.loadFactor;
    this.logRehash = config.logRehash;
    this.logger = dependencies.logger ?? console;
    this.onRehash = dependencies.onRehash;
  }

  /**
   * Build a table with `capacity` empty buckets.
   * Fails when capacity is not a positive integer or loadFactor is outside (0, 1].
   */
  public static create(
    config: Partial<HashTableConfig> = {},
    dependencies: HashTableDependencies = {}
  ): Result<HashTable, InvalidArgumentError> {
    const resolved = resolveConfig(config);
    if (!resolved.ok) {
      return resolved;
    }
    return ok(new HashTable(resolved.data, dependencies));
  }

  /**
   * Get the value stored for key, or undefined if absent
   * Time complexity: O(1) expected, O(chain length) worst case
   */
  search(key: number): string | undefined {
    if (!Number.isSafeInteger(key)) {
      return undefined;
    }
    return this.bucketFor(key).find(pair => pair.key === key)?.value;
  }

  /**
   * Same answer as search(key) !== undefined
   */
  containsKey(key: number): boolean {
    return this.search(key) !== undefined;
  }

  /**
   * Insert or overwrite. Only an insertion can trigger a rehash.
   * Time complexity: O(1) expected, O(chain length) worst case; O(n) when it rehashes
   * @throws InvalidArgumentError if key is not a safe integer
   */
  put(key: number, value: string): void {
    if (!Number.isSafeInteger(key)) {
      throw new InvalidArgumentError('non-integer key', 'key', key);
    }

    const bucket = this.bucketFor(key);
    const existing = bucket.find(pair => pair.key === key);
    if (existing) {
      existing.value = value;
      return;
    }

    bucket.push({ key, value });
    this.numKeys++;

    const capacity = this.buckets.length;
    if (this.numKeys / capacity >= this.threshold && capacity < MAX_CAPACITY) {
      this.rehash(Math.min(capacity * GROWTH_COEFFICIENT, MAX_CAPACITY));
    }
  }

  /**
   * Remove key and return its value. The table never shrinks.
   * Time complexity: O(1) expected, O(chain length) worst case
   */
  remove(key: number): string | undefined {
    if (!Number.isSafeInteger(key)) {
      return undefined;
    }

    const bucket = this.bucketFor(key);
    const index = bucket.findIndex(pair => pair.key === key);
    if (index === -1) {
      return undefined;
    }

    const [removed] = bucket.splice(index, 1);
    this.numKeys--;
    return removed?.value;
  }

  /**
   * True when no keys are stored
   */
  empty(): boolean {
    return this.numKeys === 0;
  }

  /**
   * Number of distinct keys stored
   */
  size(): number {
    return this.numKeys;
  }

  /**
   * Current bucket count
   */
  capacity(): number {
    return this.buckets.length;
  }

  /**
   * Growth threshold, fixed at construction
   */
  loadFactor(): number {
    return this.threshold;
  }

  /**
   * Time complexity: O(capacity + n)
   */
  keys(): Set<number> {
    const keys = new Set<number>();
    for (const bucket of this.buckets) {
      for (const pair of bucket) {
        keys.add(pair.key);
      }
    }
    return keys;
  }

  /**
   * One value per pair, in bucket traversal order
   * Time complexity: O(capacity + n)
   */
  values(): string[] {
    const values: string[] = [];
    for (const bucket of this.buckets) {
      for (const pair of bucket) {
        values.push(pair.value);
      }
    }
    return values;
  }

  /**
   * Copies of all pairs in bucket traversal order.
   */
  entries(): KVPair[] {
    return Array.from(this, ([key, value]) => ({ key, value }));
  }

  /**
   * Chain length of every bucket, indexed by bucket.
   */
  bucketSizes(): number[] {
    return this.buckets.map(bucket => bucket.length);
  }

  *[Symbol.iterator](): Iterator<[number, string]> {
    for (const bucket of this.buckets) {
      for (const pair of bucket) {
        yield [pair.key, pair.value];
      }
    }
  }

  // === Private helper methods ===

  private bucketFor(key: number): Bucket {
    return bucketAt(this.buckets, key);
  }

  /**
   * Move every pair into a fresh bucket array, then swap it in.
   * Indices are recomputed against the new capacity.
   */
  private rehash(newCapacity: number): void {
    const previousCapacity = this.buckets.length;
    const next = createBuckets(newCapacity);

    for (const bucket of this.buckets) {
      for (const pair of bucket) {
        bucketAt(next, pair.key).push(pair);
      }
    }

    this.buckets = next;

    if (this.logRehash) {
      this.logger.log(
        `HashTable: Rehashed ${this.numKeys} keys from ${previousCapacity} to ${newCapacity} buckets`
      );
    }
    this.onRehash?.({ previousCapacity, capacity: newCapacity, numKeys: this.numKeys });
  }
}
