/**
 * @jdex/storage
 */

export { IndexStorage, type IndexStorageOptions } from './index-storage.js';
export { indexDataSchema, parseIndexData } from './schema.js';
