/**
 * Default search terms per listing domain
 *
 * Matching is plain substring containment against the topic title, so the
 * Chinese terms are case-sensitive by nature. Overridable through
 * NAIL_KEYWORDS / RENTAL_KEYWORDS / RESTAURANT_KEYWORDS.
 */

export const DOMAIN_KEYWORDS = {
  nail: [
    '美甲',
    '指甲',
    'nail',
    '甲店',
    '美甲师',
    '指甲师',
    '美甲店',
    '指甲店',
    '美甲工作',
    '指甲工作',
    '美甲请人',
    '指甲请人',
    '美甲招聘',
    '指甲招聘',
    '美甲学徒',
    '指甲学徒',
    '美甲助理',
    '指甲助理',
    '美甲师傅',
    '指甲师傅',
    '小工',
    '大工',
  ],

  rental: [
    '出租',
    '租房',
    '房屋出租',
    '公寓出租',
    '房间出租',
    '整租',
    '分租',
    '单间',
    '一室',
    '两室',
    '三室',
    'studio',
    '1b1b',
    '2b1b',
    '3b1b',
    '近地铁',
    '包水电',
    '长租',
    '短租',
    '月租',
    'rent',
    'lease',
  ],

  restaurant: ['餐厅', '餐馆', '厨师', '企台', '收银', '打杂', '油锅', '寿司', '铁板', '外卖'],
} as const;

export type DomainName = keyof typeof DOMAIN_KEYWORDS;

export const DOMAIN_NAMES: readonly DomainName[] = ['nail', 'rental', 'restaurant'];

export function isDomainName(value: string): value is DomainName {
  return DOMAIN_NAMES.some((name) => name === value);
}
