/**
 * Han per pattern.
 *
 * - `han`: concealed value, `openHan`: value once the hand has an open meld (食い下がり)
 * - `yakuman`: 1 for a yakuman, 2 for a double yakuman; these bypass han/fu arithmetic
 * - `bonus`: dora-type entries, dropped on the yakuman path
 */
type YakuSpec = { han: number; openHan: number; yakuman?: 1 | 2; bonus?: true };

export const YAKU_TABLE = {
  // 1 han
  'riichi': { han: 1, openHan: 0 },
  'ippatsu': { han: 1, openHan: 0 },
  'menzen-tsumo': { han: 1, openHan: 0 },
  'pinfu': { han: 1, openHan: 0 },
  'iipeikou': { han: 1, openHan: 0 },
  'haitei': { han: 1, openHan: 1 },
  'houtei': { han: 1, openHan: 1 },
  'rinshan': { han: 1, openHan: 1 },
  'chankan': { han: 1, openHan: 1 },
  'tanyao': { han: 1, openHan: 1 },
  'yakuhai-seat': { han: 1, openHan: 1 },
  'yakuhai-round': { han: 1, openHan: 1 },
  'yakuhai-dragon': { han: 1, openHan: 1 },

  // 2 han
  'double-riichi': { han: 2, openHan: 0 },
  'chiitoitsu': { han: 2, openHan: 0 },
  'toitoi': { han: 2, openHan: 2 },
  'sanankou': { han: 2, openHan: 2 },
  'sanshoku-doukou': { han: 2, openHan: 2 },
  'sankantsu': { han: 2, openHan: 2 },
  'shousangen': { han: 2, openHan: 2 },
  'honroutou': { han: 2, openHan: 2 },
  'sanshoku': { han: 2, openHan: 1 },
  'ittsu': { han: 2, openHan: 1 },
  'chanta': { han: 2, openHan: 1 },

  // 3 han
  'ryanpeikou': { han: 3, openHan: 0 },
  'junchan': { han: 3, openHan: 2 },
  'honitsu': { han: 3, openHan: 2 },

  // 6 han
  'chinitsu': { han: 6, openHan: 5 },

  // yakuman
  'tenhou': { han: 0, openHan: 0, yakuman: 1 },
  'chiihou': { han: 0, openHan: 0, yakuman: 1 },
  'renhou': { han: 0, openHan: 0, yakuman: 1 },
  'daisangen': { han: 0, openHan: 0, yakuman: 1 },
  'suuankou': { han: 0, openHan: 0, yakuman: 1 },
  'daisuushi': { han: 0, openHan: 0, yakuman: 1 },
  'shousuushi': { han: 0, openHan: 0, yakuman: 1 },
  'tsuuiisou': { han: 0, openHan: 0, yakuman: 1 },
  'chinroutou': { han: 0, openHan: 0, yakuman: 1 },
  'ryuuiisou': { han: 0, openHan: 0, yakuman: 1 },
  'suukantsu': { han: 0, openHan: 0, yakuman: 1 },
  'kokushi': { han: 0, openHan: 0, yakuman: 1 },
  'chuuren': { han: 0, openHan: 0, yakuman: 1 },
  'suuankou-tanki': { han: 0, openHan: 0, yakuman: 2 },
  'kokushi-13': { han: 0, openHan: 0, yakuman: 2 },
  'junsei-chuuren': { han: 0, openHan: 0, yakuman: 2 },

  // bonus tiles
  'dora': { han: 1, openHan: 1, bonus: true },
  'ura-dora': { han: 1, openHan: 1, bonus: true },
  'aka-dora': { han: 1, openHan: 1, bonus: true },
} as const satisfies Record<string, YakuSpec>;

export type Yaku = keyof typeof YAKU_TABLE;

const SPECS: Record<Yaku, YakuSpec> = YAKU_TABLE;

export function hanOf(yaku: Yaku, concealed: boolean): number {
  const spec = SPECS[yaku];
  return concealed ? spec.han : spec.openHan;
}

export function yakumanWeight(yaku: Yaku): number {
  return SPECS[yaku].yakuman ?? 0;
}

export function isBonusYaku(yaku: Yaku): boolean {
  return SPECS[yaku].bonus === true;
}

/** Double yakuman count twice. */
export function countYakuman(list: Yaku[]): number {
  return list.reduce((n, y) => n + yakumanWeight(y), 0);
}
