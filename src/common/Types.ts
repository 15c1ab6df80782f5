/**
 * Common type definitions for the hash table.
 */

export interface KVPair {
  key: number;
  value: string;
}

/**
 * A chain of pairs sharing one bucket index. Order inside a bucket carries no meaning.
 */
export type Bucket = KVPair[];
