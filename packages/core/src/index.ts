/**
 * @jdex/core
 */

export {
  AREA_PATTERN,
  CATEGORY_PATTERN,
  ID_PATTERN,
  SECTION_MARKER,
  parseArea,
  parseCategory,
  parseId,
  isSectionName,
  detectTier,
  formatIdCode,
  startsWithCode,
  type ParsedName,
  type ParsedIdName,
} from './codes.js';
export {
  JdArea,
  JdCategory,
  JdId,
  JdIndex,
  breadcrumb,
  compareCodes,
  type JdItem,
  type DerivedIndex,
  type IndexCounts,
} from './models.js';
export { scanFilesystem, type ScanOptions } from './scanner.js';
export { resolvePath, findFolderByCode } from './path-resolver.js';
export { search, splitQuery, matchesAllWords, scoreMatch, type SearchOptions, type SearchMatch } from './search.js';
export { nextFreeId, availableSlots, MAX_ID_NUMBER, DEFAULT_SLOT_LIMIT } from './slots.js';
