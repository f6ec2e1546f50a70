/**
 * @jdex/types
 * jdexの共通型定義
 */

// Index data
export type { IndexData, AreaData, CategoryData, IdData } from './index-data.js';

// Tier
export type { Tier } from './tier.js';
export { TIERS, isTier } from './tier.js';

// Config
export type {
  JdexConfig,
  IndexConfig,
  ScanConfig,
  SearchConfig,
  SlotsConfig,
} from './config.js';
export { DEFAULT_CONFIG } from './config.js';
export {
  ConfigLoader,
  CONFIG_FILE_NAMES,
  validateConfig,
  type ResolveConfigOptions,
  type ResolvedConfig,
} from './config/index.js';

// Errors
export {
  IndexStorageError,
  errorMessage,
  isNotFoundError,
  type IndexStorageErrorKind,
} from './errors.js';
