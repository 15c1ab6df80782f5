import { KVPair } from '../common/Types';

export interface IHashTable extends Iterable<[number, string]> {
  search(key: number): string | undefined;
  /**
   * Insert or overwrite the value for key, growing the table when the load factor is reached.
   * @throws InvalidArgumentError if key is not a safe integer
   */
  put(key: number, value: string): void;
  remove(key: number): string | undefined;
  containsKey(key: number): boolean;

  empty(): boolean;
  size(): number;
  capacity(): number;
  loadFactor(): number;

  /**
   * Distinct stored keys; the set's size always equals size().
   */
  keys(): Set<number>;

  /**
   * One value per stored pair, in bucket traversal order.
   * Distinct keys may hold equal values, so duplicates are possible.
   */
  values(): string[];

  entries(): KVPair[];
  bucketSizes(): number[];
}

export interface RehashEvent {
  previousCapacity: number;
  capacity: number;
  numKeys: number;
}

export type RehashListener = (event: RehashEvent) => void;

export interface Logger {
  log(message: string): void;
}

export interface HashTableDependencies {
  logger?: Logger;
  onRehash?: RehashListener | undefined;
}
