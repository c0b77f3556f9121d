import type { Tile } from '../domain/Tile';
import {
  TILE_KINDS,
  doraFromIndicator,
  indexToTile,
  isDragon,
  isHonor,
  isSimple,
  isTerminal,
  isTerminalOrHonor,
  isWind,
  rankOf,
  suitOf,
  tileIndex,
} from '../domain/Tile';
import type { HandOrganization, IrregularHand, RegularHand } from '../domain/Meld';
import { handTiles, isTripletLike, meldHead } from '../domain/Meld';
import { reject } from '../domain/rejection';
import { callCount, isConcealed, type WinInput } from '../game/context';
import type { HandStructure, PatternRecognizer, Recognition } from './RuleStrategy';
import { hanOf, type Yaku } from './yaku';

const ORPHAN_INDICES = [0, 8, 9, 17, 18, 26, 27, 28, 29, 30, 31, 32, 33];
const GREEN_TILES = new Set<Tile>(['s2', 's3', 's4', 's6', 's8', 'z6']);
const CHUUREN_SHAPE = [3, 1, 1, 1, 1, 1, 1, 1, 3];

function numberedSuits(tiles: Tile[]): Set<string> {
  return new Set(tiles.filter((t) => !isHonor(t)).map((t) => suitOf(t)));
}

/**
 * Riichi mahjong yaku list.
 *
 * Yakuman are exclusive: when any applies, the regular yaku and bonus tiles are not listed.
 * Situational yaku come straight from the declared flags; the validator has already
 * rejected contradictory ones.
 */
export class RiichiRule implements PatternRecognizer {
  readonly id = 'riichi';
  readonly name = 'Riichi Mahjong';

  recognize(hand: HandOrganization, input: WinInput): Recognition {
    const structure: HandStructure | null =
      hand.kind === 'regular' ? { kind: 'standard', hand } : this.readIrregular(hand, input);
    if (!structure) {
      return reject('no-yaku', 'tiles form neither 4 sets + pair, seven pairs nor thirteen orphans');
    }

    const yakuman = this.yakuman(structure, input);
    if (yakuman.length > 0) return { ok: true, structure, yaku: yakuman, akaDora: 0 };

    const yaku = this.regularYaku(structure, input);
    if (yaku.length === 0) return reject('no-yaku', 'hand has no yaku; bonus tiles alone do not make a win');
    // open-hand reductions can bring every listed yaku to 0 han
    const concealed = isConcealed(input);
    if (yaku.every((y) => hanOf(y, concealed) === 0)) {
      return reject('no-yaku', 'listed yaku are worth no han on an open hand');
    }

    return { ok: true, structure, yaku: [...yaku, ...this.bonusTiles(input)], akaDora: input.round.akaDora };
  }

  private readIrregular(hand: IrregularHand, input: WinInput): HandStructure | null {
    if (callCount(input) > 0) return null;
    const counts = hand.counts;
    const total = counts.reduce((a, c) => a + c, 0);
    if (total !== 14) return null;

    const orphanTotal = ORPHAN_INDICES.reduce((a, i) => a + (counts[i] ?? 0), 0);
    if (orphanTotal === 14 && ORPHAN_INDICES.every((i) => (counts[i] ?? 0) >= 1)) {
      const thirteenSided = (counts[tileIndex(hand.winTile)] ?? 0) === 2;
      return { kind: 'kokushi', winTile: hand.winTile, wait: thirteenSided ? 'kokushi-13' : 'kokushi' };
    }

    const pairs: Tile[] = [];
    for (let i = 0; i < TILE_KINDS; i++) {
      const c = counts[i] ?? 0;
      if (c === 0) continue;
      if (c !== 2) return null;
      pairs.push(indexToTile(i));
    }
    if (pairs.length !== 7) return null;
    return { kind: 'chiitoitsu', pairs, winTile: hand.winTile, wait: 'tanki' };
  }

  private yakuman(structure: HandStructure, input: WinInput): Yaku[] {
    const out: Yaku[] = [];
    const r = input.round;
    if (r.tenhou) out.push('tenhou');
    if (r.chiihou) out.push('chiihou');
    if (r.renhou) out.push('renhou');

    if (structure.kind === 'kokushi') {
      out.push(structure.wait === 'kokushi-13' ? 'kokushi-13' : 'kokushi');
      return out;
    }

    if (structure.kind === 'chiitoitsu') {
      if (structure.pairs.every(isHonor)) out.push('tsuuiisou');
      return out;
    }

    const hand = structure.hand;
    const tiles = handTiles(hand);
    const trips = hand.melds.filter(isTripletLike).map(meldHead);

    if (trips.filter(isDragon).length === 3) out.push('daisangen');

    if (this.concealedTriplets(hand, input) === 4) out.push(hand.wait === 'tanki' ? 'suuankou-tanki' : 'suuankou');

    const windTrips = trips.filter(isWind).length;
    if (windTrips === 4) out.push('daisuushi');
    else if (windTrips === 3 && isWind(hand.pair[0])) out.push('shousuushi');

    if (tiles.every(isHonor)) out.push('tsuuiisou');
    if (tiles.every(isTerminal)) out.push('chinroutou');
    if (tiles.every((t) => GREEN_TILES.has(t))) out.push('ryuuiisou');
    if (hand.melds.filter((m) => m.kind === 'quad').length === 4) out.push('suukantsu');

    const chuuren = this.chuuren(hand, input);
    if (chuuren) out.push(chuuren);

    return out;
  }

  /** 九蓮宝燈: concealed one-suit 1112345678999 + any tile of that suit; junsei when the 13 before the win were exactly that shape. */
  private chuuren(hand: RegularHand, input: WinInput): Yaku | null {
    if (callCount(input) > 0) return null;
    const tiles = handTiles(hand);
    const suits = numberedSuits(tiles);
    if (suits.size !== 1 || tiles.some(isHonor)) return null;

    const byRank = new Array<number>(9).fill(0);
    for (const t of tiles) byRank[rankOf(t) - 1] = (byRank[rankOf(t) - 1] ?? 0) + 1;
    if (!CHUUREN_SHAPE.every((need, i) => (byRank[i] ?? 0) >= need)) return null;

    const winRank = rankOf(hand.winTile) - 1;
    byRank[winRank] = (byRank[winRank] ?? 0) - 1;
    const junsei = CHUUREN_SHAPE.every((need, i) => byRank[i] === need);
    return junsei ? 'junsei-chuuren' : 'chuuren';
  }

  /** A triplet finished by ron on a shanpon wait counts as open. */
  private concealedTriplets(hand: RegularHand, input: WinInput): number {
    let n = 0;
    let ronTripletSkipped = false;
    for (const m of hand.melds) {
      if (!isTripletLike(m) || m.open) continue;
      if (input.method === 'ron' && hand.wait === 'shanpon' && !ronTripletSkipped && meldHead(m) === hand.winTile) {
        ronTripletSkipped = true;
        continue;
      }
      n += 1;
    }
    return n;
  }

  private regularYaku(structure: HandStructure, input: WinInput): Yaku[] {
    const out: Yaku[] = [];
    if (structure.kind === 'kokushi') return out;

    const { player: p, round: r, method } = input;
    const concealed = isConcealed(input);

    if (p.doubleRiichi) out.push('double-riichi');
    else if (p.riichi) out.push('riichi');
    if (p.ippatsu) out.push('ippatsu');
    if (method === 'tsumo' && concealed) out.push('menzen-tsumo');
    if (r.haitei) out.push('haitei');
    if (r.houtei) out.push('houtei');
    if (r.rinshan) out.push('rinshan');
    if (r.chankan) out.push('chankan');

    if (structure.kind === 'chiitoitsu') {
      out.push('chiitoitsu');
      const tiles = structure.pairs;
      if (tiles.every(isSimple)) out.push('tanyao');
      if (tiles.every(isTerminalOrHonor)) out.push('honroutou');
      out.push(...this.flush(tiles));
      return out;
    }

    const hand = structure.hand;
    const tiles = handTiles(hand);
    const melds = hand.melds;
    const pairTile = hand.pair[0];
    const seqs = melds.filter((m) => m.kind === 'sequence');
    const trips = melds.filter(isTripletLike).map(meldHead);
    const valuePair = isDragon(pairTile) || pairTile === p.seatWind || pairTile === r.roundWind;

    if (concealed && seqs.length === 4 && !valuePair && hand.wait === 'ryanmen') out.push('pinfu');
    if (tiles.every(isSimple)) out.push('tanyao');

    if (concealed) {
      const seen = new Map<string, number>();
      for (const head of seqs.map(meldHead)) seen.set(head, (seen.get(head) ?? 0) + 1);
      const twins = [...seen.values()].reduce((a, n) => a + Math.floor(n / 2), 0);
      if (twins >= 2) out.push('ryanpeikou');
      else if (twins === 1) out.push('iipeikou');
    }

    for (const t of trips) {
      if (isDragon(t)) out.push('yakuhai-dragon');
      if (t === p.seatWind) out.push('yakuhai-seat');
      if (t === r.roundWind) out.push('yakuhai-round');
    }

    if (trips.length === 4) out.push('toitoi');
    if (this.concealedTriplets(hand, input) === 3) out.push('sanankou');
    if (melds.filter((m) => m.kind === 'quad').length === 3) out.push('sankantsu');

    const seqHeads = new Set<string>(seqs.map(meldHead));
    const hasRunFrom = (suit: string, rank: number) => seqHeads.has(`${suit}${rank}`);
    for (let rank = 1; rank <= 7; rank++) {
      if (hasRunFrom('m', rank) && hasRunFrom('p', rank) && hasRunFrom('s', rank)) {
        out.push('sanshoku');
        break;
      }
    }
    for (let rank = 1; rank <= 9; rank++) {
      const suited = trips.filter((t) => !isHonor(t) && rankOf(t) === rank);
      if (new Set(suited.map(suitOf)).size === 3) {
        out.push('sanshoku-doukou');
        break;
      }
    }
    for (const suit of ['m', 'p', 's']) {
      if (hasRunFrom(suit, 1) && hasRunFrom(suit, 4) && hasRunFrom(suit, 7)) {
        out.push('ittsu');
        break;
      }
    }

    // chanta/junchan need at least one run; without runs the hand is honroutou
    const groups: Tile[][] = [...melds.map((m): Tile[] => m.tiles), hand.pair];
    if (seqs.length > 0 && groups.every((g) => g.some(isTerminalOrHonor))) {
      out.push(tiles.some(isHonor) ? 'chanta' : 'junchan');
    }

    if (isDragon(pairTile) && trips.filter(isDragon).length === 2) out.push('shousangen');
    if (tiles.every(isTerminalOrHonor)) out.push('honroutou');
    out.push(...this.flush(tiles));

    return out;
  }

  private flush(tiles: Tile[]): Yaku[] {
    if (numberedSuits(tiles).size !== 1) return [];
    return tiles.some(isHonor) ? ['honitsu'] : ['chinitsu'];
  }

  private bonusTiles(input: WinInput): Yaku[] {
    const out: Yaku[] = [];
    const held = (indicators: Tile[]) =>
      indicators.reduce((n, ind) => {
        const dora = doraFromIndicator(ind);
        return n + input.tiles.filter((t) => t === dora).length;
      }, 0);

    for (let i = held(input.round.doraIndicators); i > 0; i--) out.push('dora');
    if (input.player.riichi || input.player.doubleRiichi) {
      for (let i = held(input.round.uraDoraIndicators); i > 0; i--) out.push('ura-dora');
    }
    for (let i = input.round.akaDora; i > 0; i--) out.push('aka-dora');
    return out;
  }
}
