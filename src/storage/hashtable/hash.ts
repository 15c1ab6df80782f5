/**
 * Bucket index for an integer key.
 *
 * The high 32 bits of a safe integer are folded into the low word before an
 * avalanche mix, so keys that differ only above bit 31 still spread out.
 * Pure function of (key, capacity); rehashing relies on that.
 */
export function hashKey(key: number, capacity: number): number {
  const high = Math.floor(key / 0x100000000) | 0;
  let h = (key | 0) ^ Math.imul(high, 0x9e3779b1);
  h = Math.imul((h >>> 16) ^ h, 0x45d9f3b);
  h = Math.imul((h >>> 16) ^ h, 0x45d9f3b);
  h = (h >>> 16) ^ h;
  return (h >>> 0) % capacity;
}

/**
 * The bucket `key` belongs to in `buckets`.
 * @throws Error if the computed index has no bucket
 */
export function bucketAt<T>(buckets: T[], key: number): T {
  const index = hashKey(key, buckets.length);
  const bucket = buckets[index];
  if (bucket === undefined) {
    throw new Error(`HashTable: bucket index ${index} out of range for key ${key}`);
  }
  return bucket;
}
