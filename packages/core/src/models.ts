/**
 * Johnny Decimalインデックスのモデル
 *
 * - ID（`JdId`）
 * - カテゴリ（`JdCategory`）
 * - エリア（`JdArea`）
 * - インデックス全体（`JdIndex`）
 *
 * 親は子を排他的に所有する。子から親への参照は上方向の参照専用で、
 * 子が取り外されるとクリアされる。
 */

import type { AreaData, CategoryData, IdData, IndexData } from '@jdex/types';
import { SECTION_MARKER, formatIdCode } from './codes.js';

export type JdItem = JdArea | JdCategory | JdId;

/**
 * コード順の比較（コードユニット順）
 */
export function compareCodes(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function sortedValues<T>(map: ReadonlyMap<string, T>): T[] {
  return [...map.entries()]
    .sort(([a], [b]) => compareCodes(a, b))
    .map(([, value]) => value);
}

/**
 * ID（例: 11.01）
 * JDシステムの最小単位となるフォルダ
 */
export class JdId {
  readonly tier = 'id';
  private _category: JdCategory | null = null;

  constructor(
    readonly code: string,
    readonly name: string,
    readonly section: boolean = false
  ) {}

  /** 所属カテゴリ（読み取り専用） */
  get category(): JdCategory | null {
    return this._category;
  }

  get categoryCode(): string {
    return this.code.split('.')[0];
  }

  /** 番号部分（0-99） */
  get idNumber(): number {
    return Number(this.code.split('.')[1]);
  }

  /** 番台（0, 10, ..., 90） */
  get decade(): number {
    return Math.floor(this.idNumber / 10) * 10;
  }

  /** この番台のセクション見出し（0番台にはない） */
  get sectionHeader(): JdId | null {
    return this._category?.sectionHeaderFor(this.idNumber) ?? null;
  }

  /** セクション見出しの名前（マーカー除去済み） */
  get sectionName(): string | null {
    return this._category?.sectionNameFor(this.code) ?? null;
  }

  toData(): IdData {
    return this.section ? { name: this.name, section: true } : { name: this.name };
  }

  /** @internal 親カテゴリの付け替え（JdCategoryからのみ呼ぶ） */
  attachTo(category: JdCategory | null): void {
    this._category = category;
  }
}

/**
 * カテゴリ（例: 11 Finance）
 * 0-99のIDを番台ごとのセクションで整理する
 */
export class JdCategory {
  readonly tier = 'category';
  private readonly _ids = new Map<string, JdId>();
  private _area: JdArea | null = null;

  constructor(
    readonly code: string,
    readonly name: string
  ) {}

  /** 所属エリア（読み取り専用） */
  get area(): JdArea | null {
    return this._area;
  }

  get ids(): ReadonlyMap<string, JdId> {
    return this._ids;
  }

  get size(): number {
    return this._ids.size;
  }

  /** コード順に走査 */
  *[Symbol.iterator](): IterableIterator<JdId> {
    yield* sortedValues(this._ids);
  }

  getId(code: string): JdId | null {
    return this._ids.get(code) ?? null;
  }

  /**
   * IDを追加
   * 同じコードのIDがあれば置き換え、古いIDは取り外す
   */
  addId(id: JdId): void {
    id.category?.removeId(id.code);
    this._ids.get(id.code)?.attachTo(null);
    id.attachTo(this);
    this._ids.set(id.code, id);
    this.touch();
  }

  removeId(code: string): JdId | null {
    const id = this._ids.get(code);
    if (!id) {
      return null;
    }
    this._ids.delete(code);
    id.attachTo(null);
    this.touch();
    return id;
  }

  /** セクション見出し以外のID */
  get regularIds(): JdId[] {
    return [...this].filter((id) => !id.section);
  }

  /** セクション見出しのID */
  get sectionIds(): JdId[] {
    return [...this].filter((id) => id.section);
  }

  /** セクション見出しを持つ番台 */
  get sectionDecades(): Set<number> {
    return new Set(this.sectionIds.map((id) => id.decade));
  }

  /** 使用済みの番号（セクション見出しを含む） */
  get usedSlots(): Set<number> {
    return new Set([...this._ids.values()].map((id) => id.idNumber));
  }

  /**
   * 番号が属する番台のセクション見出し
   * 見出しは `CC.D0` に存在し、section フラグを持つものに限る
   */
  sectionHeaderFor(num: number): JdId | null {
    const decade = Math.floor(num / 10) * 10;
    if (decade === 0) {
      return null;
    }
    const header = this.getId(formatIdCode(this.code, decade));
    return header?.section ? header : null;
  }

  /**
   * IDコードが属するセクションの名前
   * 未使用のコードにも使える（新規IDの配置先表示用）
   */
  sectionNameFor(idCode: string): string | null {
    const header = this.sectionHeaderFor(Number(idCode.split('.')[1]));
    return header ? header.name.replaceAll(`${SECTION_MARKER} `, '') : null;
  }

  toData(): CategoryData {
    const ids: Record<string, IdData> = {};
    for (const id of this) {
      ids[id.code] = id.toData();
    }
    return { name: this.name, ids };
  }

  /** @internal 親エリアの付け替え（JdAreaからのみ呼ぶ） */
  attachTo(area: JdArea | null): void {
    this._area = area;
  }

  private touch(): void {
    this._area?.index?.invalidateDerivedIndex();
  }
}

/**
 * エリア（例: 10-19 Life admin）
 * 最大10個のカテゴリ（X0-X9）を持つ
 */
export class JdArea {
  readonly tier = 'area';
  private readonly _categories = new Map<string, JdCategory>();
  private _index: JdIndex | null = null;

  constructor(
    readonly code: string,
    readonly name: string
  ) {}

  /** 所属インデックス（読み取り専用） */
  get index(): JdIndex | null {
    return this._index;
  }

  get categories(): ReadonlyMap<string, JdCategory> {
    return this._categories;
  }

  /** 対象の番台（10-19 → 10） */
  get decade(): number {
    return Number(this.code.split('-')[0]);
  }

  get size(): number {
    return this._categories.size;
  }

  *[Symbol.iterator](): IterableIterator<JdCategory> {
    yield* sortedValues(this._categories);
  }

  getCategory(code: string): JdCategory | null {
    return this._categories.get(code) ?? null;
  }

  addCategory(category: JdCategory): void {
    category.area?.removeCategory(category.code);
    this._categories.get(category.code)?.attachTo(null);
    category.attachTo(this);
    this._categories.set(category.code, category);
    this.touch();
  }

  removeCategory(code: string): JdCategory | null {
    const category = this._categories.get(code);
    if (!category) {
      return null;
    }
    this._categories.delete(code);
    category.attachTo(null);
    this.touch();
    return category;
  }

  containsCategory(code: string): boolean {
    return this._categories.has(code);
  }

  /** 全カテゴリのID数合計 */
  get idCount(): number {
    let count = 0;
    for (const category of this._categories.values()) {
      count += category.size;
    }
    return count;
  }

  toData(): AreaData {
    const categories: Record<string, CategoryData> = {};
    for (const category of this) {
      categories[category.code] = category.toData();
    }
    return { name: this.name, categories };
  }

  /** @internal 親インデックスの付け替え（JdIndexからのみ呼ぶ） */
  attachTo(index: JdIndex | null): void {
    this._index = index;
  }

  private touch(): void {
    this._index?.invalidateDerivedIndex();
  }
}

/**
 * ツリー全体を平坦化した参照用インデックス
 */
export interface DerivedIndex {
  categories: ReadonlyMap<string, JdCategory>;
  ids: ReadonlyMap<string, JdId>;
}

export interface IndexCounts {
  areas: number;
  categories: number;
  ids: number;
}

/**
 * インデックスのルート
 *
 * カテゴリ・IDの平坦化ビューは初回参照時に構築し、
 * ツリーのどこかが変更されると破棄する。
 */
export class JdIndex {
  private readonly _areas = new Map<string, JdArea>();
  private derived: DerivedIndex | null = null;

  get areas(): ReadonlyMap<string, JdArea> {
    return this._areas;
  }

  get size(): number {
    return this._areas.size;
  }

  *[Symbol.iterator](): IterableIterator<JdArea> {
    yield* sortedValues(this._areas);
  }

  getArea(code: string): JdArea | null {
    return this._areas.get(code) ?? null;
  }

  addArea(area: JdArea): void {
    area.index?.removeArea(area.code);
    this._areas.get(area.code)?.attachTo(null);
    area.attachTo(this);
    this._areas.set(area.code, area);
    this.invalidateDerivedIndex();
  }

  removeArea(code: string): JdArea | null {
    const area = this._areas.get(code);
    if (!area) {
      return null;
    }
    this._areas.delete(code);
    area.attachTo(null);
    this.invalidateDerivedIndex();
    return area;
  }

  // --- 平坦化ビュー ---

  /**
   * 平坦化ビューを再構築
   * 同じカテゴリコードが複数のエリアにある場合はコード順で後のエリアが優先
   */
  rebuildDerivedIndex(): DerivedIndex {
    const categories = new Map<string, JdCategory>();
    for (const area of this) {
      for (const category of area) {
        categories.set(category.code, category);
      }
    }

    const ids = new Map<string, JdId>();
    for (const category of categories.values()) {
      for (const id of category) {
        ids.set(id.code, id);
      }
    }

    this.derived = { categories, ids };
    return this.derived;
  }

  invalidateDerivedIndex(): void {
    this.derived = null;
  }

  private get derivedIndex(): DerivedIndex {
    return this.derived ?? this.rebuildDerivedIndex();
  }

  /** 全エリアのカテゴリ */
  get categories(): ReadonlyMap<string, JdCategory> {
    return this.derivedIndex.categories;
  }

  getCategory(code: string): JdCategory | null {
    return this.categories.get(code) ?? null;
  }

  getAreaForCategory(categoryCode: string): JdArea | null {
    return this.getCategory(categoryCode)?.area ?? null;
  }

  /** 全カテゴリのID */
  get ids(): ReadonlyMap<string, JdId> {
    return this.derivedIndex.ids;
  }

  getId(code: string): JdId | null {
    return this.ids.get(code) ?? null;
  }

  /**
   * コードから要素を検索
   * - "10-19" → エリア
   * - "11.01" → ID
   * - "11" → カテゴリ
   */
  find(code: string): JdItem | null {
    if (code.includes('-')) {
      return this.getArea(code);
    }
    if (code.includes('.')) {
      return this.getId(code);
    }
    return this.getCategory(code);
  }

  count(): IndexCounts {
    return {
      areas: this._areas.size,
      categories: this.categories.size,
      ids: this.ids.size,
    };
  }

  // --- シリアライズ ---

  /** 永続化形式に変換（キーはコード順） */
  toData(): IndexData {
    const areas: Record<string, AreaData> = {};
    for (const area of this) {
      areas[area.code] = area.toData();
    }
    return { areas };
  }

  static fromData(data: IndexData): JdIndex {
    const index = new JdIndex();

    for (const [areaCode, areaData] of Object.entries(data.areas)) {
      const area = new JdArea(areaCode, areaData.name);

      for (const [categoryCode, categoryData] of Object.entries(areaData.categories)) {
        const category = new JdCategory(categoryCode, categoryData.name);

        for (const [idCode, idData] of Object.entries(categoryData.ids)) {
          category.addId(new JdId(idCode, idData.name, idData.section ?? false));
        }

        area.addCategory(category);
      }

      index.addArea(area);
    }

    return index;
  }
}

/**
 * 表示用のサブタイトル（パンくず）
 * - エリア: 空文字
 * - カテゴリ: エリア名
 * - ID: エリア名 → カテゴリ名（→ セクション名）
 */
export function breadcrumb(item: JdItem): string {
  switch (item.tier) {
    case 'area':
      return '';
    case 'category':
      return item.area?.name ?? '';
    case 'id': {
      const category = item.category;
      if (!category) {
        return '';
      }
      const parts = [category.name];
      if (category.area) {
        parts.unshift(category.area.name);
      }
      const sectionName = item.sectionName;
      if (sectionName) {
        parts.push(sectionName);
      }
      return parts.join(' → ');
    }
  }
}
