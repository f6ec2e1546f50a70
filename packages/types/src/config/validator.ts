import type { JdexConfig } from '../config.js';

/**
 * 設定オブジェクトをバリデーション
 */
export function validateConfig(config: unknown): Partial<JdexConfig> {
  if (!isRecord(config)) {
    throw new Error('Config must be an object');
  }

  // バージョンのチェック
  if (config.version !== undefined && typeof config.version !== 'string') {
    throw new Error('config.version must be a string');
  }

  if (config.root !== undefined && typeof config.root !== 'string') {
    throw new Error('config.root must be a string');
  }

  if (config.index !== undefined) {
    validateIndexConfig(config.index);
  }

  if (config.scan !== undefined) {
    validateScanConfig(config.scan);
  }

  if (config.search !== undefined) {
    validateSearchConfig(config.search);
  }

  if (config.slots !== undefined) {
    validateSlotsConfig(config.slots);
  }

  return config as Partial<JdexConfig>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateIndexConfig(index: unknown): void {
  if (!isRecord(index)) {
    throw new Error('config.index must be an object');
  }

  if (index.path !== undefined && typeof index.path !== 'string') {
    throw new Error('config.index.path must be a string');
  }
}

function validateScanConfig(scan: unknown): void {
  if (!isRecord(scan)) {
    throw new Error('config.scan must be an object');
  }

  if (scan.exclude !== undefined) {
    if (!Array.isArray(scan.exclude)) {
      throw new Error('config.scan.exclude must be an array');
    }
    if (!scan.exclude.every((item) => typeof item === 'string')) {
      throw new Error('config.scan.exclude must be an array of strings');
    }
  }
}

function validateSearchConfig(search: unknown): void {
  if (!isRecord(search)) {
    throw new Error('config.search must be an object');
  }

  if (search.defaultLimit !== undefined) {
    if (typeof search.defaultLimit !== 'number') {
      throw new Error('config.search.defaultLimit must be a number');
    }
    if (!Number.isInteger(search.defaultLimit) || search.defaultLimit < 1) {
      throw new Error('config.search.defaultLimit must be a positive integer');
    }
  }
}

function validateSlotsConfig(slots: unknown): void {
  if (!isRecord(slots)) {
    throw new Error('config.slots must be an object');
  }

  if (slots.limit !== undefined) {
    if (typeof slots.limit !== 'number') {
      throw new Error('config.slots.limit must be a number');
    }
    // 0番台は最大10枠
    if (!Number.isInteger(slots.limit) || slots.limit < 0 || slots.limit > 10) {
      throw new Error('config.slots.limit must be an integer between 0 and 10');
    }
  }
}
