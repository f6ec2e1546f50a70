/**
 * 階層の種別
 */
export type Tier = 'area' | 'category' | 'id';

export const TIERS: readonly Tier[] = ['area', 'category', 'id'];

export function isTier(value: string): value is Tier {
  return TIERS.some((tier) => tier === value);
}
