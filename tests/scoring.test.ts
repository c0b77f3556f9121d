import type { Tile } from '../src/domain/Tile';
import { tileIndex } from '../src/domain/Tile';
import type { Meld, Wait } from '../src/domain/Meld';
import { quadOf, sequenceFrom, toMelds, tripletOf } from '../src/domain/Meld';
import type { PlayerContext, RoundContext, WinMethod } from '../src/game/context';
import {
  basicPointsFor,
  calculateFu,
  calculateHan,
  calculateScore,
  meldFu,
  pairFu,
  splitPayments,
} from '../src/game/scoring';
import type { HandStructure } from '../src/rules/RuleStrategy';
import type { Yaku } from '../src/rules/yaku';
import { winInput } from './helpers';

const { player, round } = winInput('234m567m345p678p44s', 'p8');
const run = (start: Tile, open = false) => sequenceFrom(tileIndex(start), open);

function standard(melds: Meld[], pairTile: Tile, winTile: Tile, wait: Wait): HandStructure {
  return { kind: 'standard', hand: { kind: 'regular', melds: toMelds(melds), pair: [pairTile, pairTile], winTile, wait } };
}

function fuOf(structure: HandStructure, yaku: Yaku[], method: WinMethod, p: PlayerContext = player, r: RoundContext = round) {
  return calculateFu({ structure, yaku, method, player: p, round: r });
}

describe('fu', () => {
  it('values triplets and quads by openness and tile', () => {
    expect(meldFu(run('m2'))).toBe(0);
    expect(meldFu(tripletOf('m5', true))).toBe(2);
    expect(meldFu(tripletOf('z3', true))).toBe(4);
    expect(meldFu(tripletOf('p5', false))).toBe(4);
    expect(meldFu(tripletOf('s9', false))).toBe(8);
    expect(meldFu(quadOf('m5', true))).toBe(8);
    expect(meldFu(quadOf('z7', false))).toBe(32);
  });

  it('values the pair by dragon and wind roles', () => {
    expect(pairFu('z5', player, round)).toBe(2);
    expect(pairFu('z1', player, round)).toBe(2);
    expect(pairFu('z2', player, round)).toBe(2);
    expect(pairFu('z2', player, { ...round, roundWind: 'z2' })).toBe(4);
    expect(pairFu('z4', player, round)).toBe(0);
    expect(pairFu('m5', player, round)).toBe(0);
  });

  it('fixes pinfu at 20 on tsumo and 30 on ron', () => {
    const s = standard([run('m2'), run('m5'), run('p3'), run('p6')], 's4', 'p8', 'ryanmen');
    expect(fuOf(s, ['pinfu'], 'tsumo')).toBe(20);
    expect(fuOf(s, ['pinfu'], 'ron')).toBe(30);
  });

  it('fixes seven pairs at 25', () => {
    const s: HandStructure = { kind: 'chiitoitsu', pairs: ['m2', 'm6', 'p4', 'p8', 's3', 's5', 's7'], winTile: 's7', wait: 'tanki' };
    expect(fuOf(s, ['chiitoitsu'], 'ron')).toBe(25);
  });

  it('adds the concealed ron bonus and rounds up to 10', () => {
    // 20 + 10 + concealed dragon triplet 8 = 38
    const s = standard([tripletOf('z5', false), run('m2'), run('p2'), run('s2')], 'm9', 'm4', 'ryanmen');
    expect(fuOf(s, ['yakuhai-dragon'], 'ron')).toBe(40);
  });

  it('gives an open ron no concealed bonus', () => {
    // 20 + open simple triplet 2 + kanchan 2 = 24
    const s = standard([tripletOf('m2', true), run('p3'), run('s4'), run('s6')], 'p9', 's7', 'kanchan');
    expect(fuOf(s, ['tanyao'], 'ron')).toBe(30);
  });

  it('adds tsumo, quad, pair and wait fu together', () => {
    // 20 + tsumo 2 + concealed honor quad 32 + double wind pair 4 + tanki 2 = 60
    const dealer: PlayerContext = { ...player, seatWind: 'z1', isDealer: true };
    const s = standard([quadOf('z7', false), run('m2'), run('p2'), run('s2')], 'z1', 'z1', 'tanki');
    expect(fuOf(s, ['yakuhai-dragon'], 'tsumo', dealer)).toBe(60);
  });
});

describe('han and limits', () => {
  it('lowers han for open hands', () => {
    expect(calculateHan(['chinitsu', 'ittsu'], true)).toBe(8);
    expect(calculateHan(['chinitsu', 'ittsu'], false)).toBe(6);
    expect(calculateHan(['riichi', 'tanyao', 'dora', 'dora'], true)).toBe(4);
  });

  it('computes basic points below mangan', () => {
    expect(basicPointsFor(1, 30)).toEqual({ basicPoints: 240, limit: null });
    expect(basicPointsFor(3, 30)).toEqual({ basicPoints: 960, limit: null });
    expect(basicPointsFor(4, 30)).toEqual({ basicPoints: 1920, limit: null });
  });

  it('caps at mangan and steps through the limits', () => {
    expect(basicPointsFor(4, 40)).toEqual({ basicPoints: 2000, limit: 'mangan' });
    expect(basicPointsFor(3, 70)).toEqual({ basicPoints: 2000, limit: 'mangan' });
    expect(basicPointsFor(5, 30)).toEqual({ basicPoints: 2000, limit: 'mangan' });
    expect(basicPointsFor(7, 20)).toEqual({ basicPoints: 3000, limit: 'haneman' });
    expect(basicPointsFor(10, 30)).toEqual({ basicPoints: 4000, limit: 'baiman' });
    expect(basicPointsFor(12, 30)).toEqual({ basicPoints: 6000, limit: 'sanbaiman' });
    expect(basicPointsFor(13, 30)).toEqual({ basicPoints: 8000, limit: 'kazoe-yakuman' });
  });
});

describe('payments', () => {
  it('rounds each payment up to 100', () => {
    expect(splitPayments(240, false, 'ron', 0)).toEqual({ basePayment: 1000, dealerPayment: 0, nonDealerPayment: 0, totalPayment: 1000 });
    expect(splitPayments(240, true, 'ron', 0).totalPayment).toBe(1500);
    expect(splitPayments(240, false, 'tsumo', 0)).toEqual({ basePayment: 300, dealerPayment: 500, nonDealerPayment: 300, totalPayment: 1100 });
    expect(splitPayments(240, true, 'tsumo', 0)).toEqual({ basePayment: 500, dealerPayment: 500, nonDealerPayment: 0, totalPayment: 1500 });
  });

  it('adds honba per payer', () => {
    expect(splitPayments(2000, false, 'ron', 2).totalPayment).toBe(8600);
    expect(splitPayments(3000, false, 'tsumo', 1)).toEqual({ basePayment: 3000, dealerPayment: 6000, nonDealerPayment: 3000, totalPayment: 12300 });
    expect(splitPayments(2000, true, 'tsumo', 3).totalPayment).toBe(12900);
  });

  it('collects exactly what the payers owe on tsumo', () => {
    for (const han of [1, 2, 3, 4]) {
      for (const fu of [20, 30, 40, 50, 60, 70, 110]) {
        for (const honba of [0, 1, 4]) {
          const { basicPoints } = basicPointsFor(han, fu);
          const child = splitPayments(basicPoints, false, 'tsumo', honba);
          expect(child.totalPayment).toBe(child.dealerPayment + 2 * child.nonDealerPayment + 300 * honba);
          const dealer = splitPayments(basicPoints, true, 'tsumo', honba);
          expect(dealer.totalPayment).toBe(3 * dealer.dealerPayment + 300 * honba);
        }
      }
    }
  });
});

describe('calculateScore', () => {
  const s = standard([tripletOf('z5', false), tripletOf('z6', false), tripletOf('z7', false), run('m2')], 'p9', 'm4', 'ryanmen');

  it('pays a yakuman from its fixed value and drops bonus tiles', () => {
    const r = calculateScore({ yaku: ['daisangen', 'dora'], akaDora: 1, structure: s, player, round, method: 'ron' });
    expect(r).toMatchObject({ han: 13, fu: 0, yaku: ['daisangen'], akaDora: 0, limit: 'yakuman', basicPoints: 8000, totalPayment: 32000 });
  });

  it('counts a double yakuman twice', () => {
    const dealer: PlayerContext = { ...player, isDealer: true };
    const r = calculateScore({ yaku: ['suuankou-tanki'], akaDora: 0, structure: s, player: dealer, round, method: 'tsumo' });
    expect(r).toMatchObject({ han: 26, limit: 'double-yakuman', basicPoints: 16000, dealerPayment: 32000, totalPayment: 96000 });
  });

  it('stacks three or more yakuman as a multiple yakuman', () => {
    const r = calculateScore({ yaku: ['daisangen', 'tsuuiisou', 'suuankou-tanki'], akaDora: 0, structure: s, player, round, method: 'ron' });
    expect(r).toMatchObject({ han: 52, fu: 0, limit: 'multiple-yakuman', basicPoints: 32000, totalPayment: 128000 });
  });

  it('returns the same result for the same input', () => {
    const input = { yaku: ['yakuhai-dragon', 'dora'] satisfies Yaku[], akaDora: 0, structure: s, player, round, method: 'ron' as const };
    expect(calculateScore(input)).toEqual(calculateScore(input));
  });
});
