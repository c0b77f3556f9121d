import type { Tile } from '../domain/Tile';
import { isDragon, isTerminalOrHonor, isWind } from '../domain/Tile';
import type { Meld, Wait } from '../domain/Meld';
import type { HandStructure } from '../rules/RuleStrategy';
import { countYakuman, hanOf, isBonusYaku, type Yaku } from '../rules/yaku';
import type { PlayerContext, RoundContext, WinMethod } from './context';

export type LimitName =
  | 'mangan'
  | 'haneman'
  | 'baiman'
  | 'sanbaiman'
  | 'kazoe-yakuman'
  | 'yakuman'
  | 'double-yakuman'
  | 'multiple-yakuman';

export type ScoreInput = {
  yaku: Yaku[];
  akaDora: number;
  structure: HandStructure;
  player: PlayerContext;
  round: RoundContext;
  method: WinMethod;
};

export type Payments = {
  /** Ron: the whole payment incl. honba. Tsumo: one non-dealer's share (each opponent's, for a dealer). */
  basePayment: number;
  /** Dealer tsumo: paid by each opponent. Non-dealer tsumo: paid by the dealer. Ron: 0. */
  dealerPayment: number;
  /** Non-dealer tsumo: paid by each other non-dealer. Otherwise 0. */
  nonDealerPayment: number;
  totalPayment: number;
};

export type ScoreResult = Payments & {
  han: number;
  fu: number;
  yaku: Yaku[];
  akaDora: number;
  limit: LimitName | null;
  /** 基本点: fu x 2^(han+2), or the limit's fixed value. */
  basicPoints: number;
};

const YAKUMAN_BASIC = 8000;
const MANGAN_BASIC = 2000;

// open simple / open terminal-honor / concealed simple / concealed terminal-honor; quads are 4x
const TRIPLET_FU = { openSimple: 2, openYaochu: 4, closedSimple: 4, closedYaochu: 8 } as const;
const QUAD_FACTOR = 4;

const WAIT_FU: Record<Wait, number> = {
  ryanmen: 0,
  shanpon: 0,
  kanchan: 2,
  penchan: 2,
  tanki: 2,
  'kokushi': 0,
  'kokushi-13': 0,
};

export function roundUpToHundreds(points: number): number {
  return Math.ceil(points / 100) * 100;
}

export function roundUpToTens(fu: number): number {
  return Math.ceil(fu / 10) * 10;
}

export function isConcealedStructure(structure: HandStructure): boolean {
  if (structure.kind !== 'standard') return true;
  return structure.hand.melds.every((m) => !m.open);
}

export function calculateHan(yaku: Yaku[], concealed: boolean): number {
  return yaku.reduce((sum, y) => sum + hanOf(y, concealed), 0);
}

export function meldFu(meld: Meld): number {
  if (meld.kind === 'sequence') return 0;
  const yaochu = isTerminalOrHonor(meld.tiles[0]);
  const base = meld.open
    ? (yaochu ? TRIPLET_FU.openYaochu : TRIPLET_FU.openSimple)
    : (yaochu ? TRIPLET_FU.closedYaochu : TRIPLET_FU.closedSimple);
  return meld.kind === 'quad' ? base * QUAD_FACTOR : base;
}

/** Dragon pair 2; a wind pair 2 for the round wind plus 2 for the seat wind. */
export function pairFu(tile: Tile, player: PlayerContext, round: RoundContext): number {
  if (isDragon(tile)) return 2;
  if (!isWind(tile)) return 0;
  let fu = 0;
  if (tile === round.roundWind) fu += 2;
  if (tile === player.seatWind) fu += 2;
  return fu;
}

export function calculateFu(input: Omit<ScoreInput, 'akaDora'>): number {
  const { structure, yaku, player, round, method } = input;

  if (yaku.includes('chiitoitsu') || structure.kind === 'chiitoitsu') return 25;
  if (yaku.includes('pinfu')) return method === 'tsumo' ? 20 : 30;
  if (structure.kind === 'kokushi') return 0;

  const hand = structure.hand;
  let fu = 20;

  if (method === 'tsumo') fu += 2;
  else if (isConcealedStructure(structure)) fu += 10;

  for (const m of hand.melds) fu += meldFu(m);
  fu += pairFu(hand.pair[0], player, round);
  fu += WAIT_FU[hand.wait];

  return roundUpToTens(fu);
}

/** Limits by han; below mangan the formula value is capped at mangan. */
export function basicPointsFor(han: number, fu: number): { basicPoints: number; limit: LimitName | null } {
  if (han >= 13) return { basicPoints: YAKUMAN_BASIC, limit: 'kazoe-yakuman' };
  if (han >= 11) return { basicPoints: 6000, limit: 'sanbaiman' };
  if (han >= 8) return { basicPoints: 4000, limit: 'baiman' };
  if (han >= 6) return { basicPoints: 3000, limit: 'haneman' };
  if (han === 5) return { basicPoints: MANGAN_BASIC, limit: 'mangan' };

  const basicPoints = fu * Math.pow(2, han + 2);
  if (basicPoints >= MANGAN_BASIC) return { basicPoints: MANGAN_BASIC, limit: 'mangan' };
  return { basicPoints, limit: null };
}

/**
 * Split the basic points between payers. Each payment is rounded up to 100 on its own;
 * honba adds 100 per payer on tsumo and 300 on ron.
 */
export function splitPayments(basicPoints: number, isDealer: boolean, method: WinMethod, honba: number): Payments {
  const tsumoBonus = honba * 100;
  const ronBonus = honba * 300;

  if (method === 'tsumo') {
    if (isDealer) {
      const each = roundUpToHundreds(basicPoints * 2);
      return { basePayment: each, dealerPayment: each, nonDealerPayment: 0, totalPayment: (each + tsumoBonus) * 3 };
    }
    const dealer = roundUpToHundreds(basicPoints * 2);
    const other = roundUpToHundreds(basicPoints);
    return {
      basePayment: other,
      dealerPayment: dealer,
      nonDealerPayment: other,
      totalPayment: (dealer + tsumoBonus) + (other + tsumoBonus) * 2,
    };
  }

  const total = roundUpToHundreds(basicPoints * (isDealer ? 6 : 4)) + ronBonus;
  return { basePayment: total, dealerPayment: 0, nonDealerPayment: 0, totalPayment: total };
}

function yakumanLimit(count: number): LimitName {
  if (count === 1) return 'yakuman';
  if (count === 2) return 'double-yakuman';
  return 'multiple-yakuman';
}

/**
 * Score a recognized hand. Never fails: the hand has been validated and has at least one yaku.
 */
export function calculateScore(input: ScoreInput): ScoreResult {
  const { player, round, method } = input;

  const yakuman = countYakuman(input.yaku);
  if (yakuman > 0) {
    const basicPoints = YAKUMAN_BASIC * yakuman;
    return {
      han: 13 * yakuman,
      fu: 0,
      yaku: input.yaku.filter((y) => !isBonusYaku(y)),
      akaDora: 0,
      limit: yakumanLimit(yakuman),
      basicPoints,
      ...splitPayments(basicPoints, player.isDealer, method, round.honba),
    };
  }

  const han = calculateHan(input.yaku, isConcealedStructure(input.structure));
  const fu = calculateFu(input);
  const { basicPoints, limit } = basicPointsFor(han, fu);

  return {
    han,
    fu,
    yaku: input.yaku.slice(),
    akaDora: input.akaDora,
    limit,
    basicPoints,
    ...splitPayments(basicPoints, player.isDealer, method, round.honba),
  };
}
