export { HashTable } from './HashTable';
export { hashKey, bucketAt } from './hash';
