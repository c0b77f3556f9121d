import type { Tile } from './Tile';
import { TILE_KINDS, indexToTile, rankOfIndex, suitOfIndex, tileIndex } from './Tile';
import type { HandOrganization, Meld, Pair } from './Meld';
import { quadOf, sequenceFrom, toMelds, tripletOf } from './Meld';
import { classifyWait } from './WaitClassifier';
import { reject, type Rejection } from './rejection';
import type { WinInput } from '../game/context';

export type OrganizeResult = { ok: true; hand: HandOrganization } | Rejection;

/**
 * Take one copy of each index, run `body`, and put the copies back whatever it returns.
 */
function withTaken(counts: number[], indices: number[], body: () => boolean): boolean {
  for (const i of indices) counts[i] = (counts[i] ?? 0) - 1;
  try {
    return body();
  } finally {
    for (const i of indices) counts[i] = (counts[i] ?? 0) + 1;
  }
}

export class HandDecomposer {
  /**
   * Strip declared calls out of the full hand, then search the concealed remainder.
   * `counts` is the count vector of every held tile (validated beforehand).
   */
  static organize(input: WinInput, counts: number[]): OrganizeResult {
    const concealed = counts.slice();
    const declared: Meld[] = [];

    for (const tile of input.closedKans) {
      const idx = tileIndex(tile);
      if ((concealed[idx] ?? 0) < 4) return reject('meld-not-in-hand', `closed kan of ${tile} is not in the hand`);
      concealed[idx] = (concealed[idx] ?? 0) - 4;
      declared.push(quadOf(tile, false));
    }

    for (const m of input.openMelds) {
      const idx = tileIndex(m.tile);
      if (m.kind === 'pon') {
        if ((concealed[idx] ?? 0) < 3) return reject('meld-not-in-hand', `pon of ${m.tile} is not in the hand`);
        concealed[idx] = (concealed[idx] ?? 0) - 3;
        declared.push(tripletOf(m.tile, true));
      } else if (m.kind === 'kan') {
        if ((concealed[idx] ?? 0) < 4) return reject('meld-not-in-hand', `open kan of ${m.tile} is not in the hand`);
        concealed[idx] = (concealed[idx] ?? 0) - 4;
        declared.push(quadOf(m.tile, true));
      } else {
        if (suitOfIndex(idx) === 'z' || rankOfIndex(idx) > 7) {
          return reject('invalid-chi-tile', `chi must start at rank 1-7 of a numbered suit, got ${m.tile}`);
        }
        const run = [idx, idx + 1, idx + 2];
        if (run.some((i) => (concealed[i] ?? 0) < 1)) return reject('meld-not-in-hand', `chi from ${m.tile} is not in the hand`);
        for (const i of run) concealed[i] = (concealed[i] ?? 0) - 1;
        declared.push(sequenceFrom(idx, true));
      }
    }

    return this.decompose(concealed, declared, input.winTile, counts);
  }

  /**
   * Four sets + one pair, or the irregular marker.
   *
   * Pair candidates are tried in tile order and the first one whose remainder splits into
   * exactly the missing number of sets wins; alternative splits are not explored.
   */
  static decompose(concealed: number[], declared: Meld[], winTile: Tile, fullCounts: number[]): OrganizeResult {
    const needed = 4 - declared.length;
    const handSize = fullCounts.reduce((a, c) => a + c, 0);

    if (needed === 0) {
      for (let i = 0; i < TILE_KINDS; i++) {
        if ((concealed[i] ?? 0) !== 2) continue;
        const t = indexToTile(i);
        return { ok: true, hand: { kind: 'regular', melds: toMelds(declared), pair: [t, t], winTile, wait: 'tanki' } };
      }
      if (handSize !== 14) return reject('no-pair', 'four melds declared but the remaining tiles are not a pair');
    } else {
      for (let i = 0; i < TILE_KINDS; i++) {
        if ((concealed[i] ?? 0) < 2) continue;

        const rest = concealed.slice();
        rest[i] = (rest[i] ?? 0) - 2;
        const found: Meld[] = [];
        if (!this.findMelds(rest, found, needed)) continue;

        const t = indexToTile(i);
        const pair: Pair = [t, t];
        const melds = toMelds([...declared, ...found]);
        return { ok: true, hand: { kind: 'regular', melds, pair, winTile, wait: classifyWait(melds, pair, winTile) } };
      }
    }

    return { ok: true, hand: { kind: 'irregular', counts: fullCounts.slice(), winTile } };
  }

  /**
   * Backtracking over the lowest remaining tile: triplet first, then a sequence starting there.
   * Succeeds only once every tile is used and exactly `needed` sets were formed.
   */
  private static findMelds(counts: number[], found: Meld[], needed: number): boolean {
    let i = -1;
    for (let k = 0; k < TILE_KINDS; k++) {
      if ((counts[k] ?? 0) > 0) { i = k; break; }
    }
    if (i === -1) return found.length === needed;
    if (found.length >= needed) return false;

    if ((counts[i] ?? 0) >= 3) {
      found.push(tripletOf(indexToTile(i), false));
      if (withTaken(counts, [i, i, i], () => this.findMelds(counts, found, needed))) return true;
      found.pop();
    }

    if (suitOfIndex(i) !== 'z' && rankOfIndex(i) <= 7 && (counts[i + 1] ?? 0) > 0 && (counts[i + 2] ?? 0) > 0) {
      found.push(sequenceFrom(i, false));
      if (withTaken(counts, [i, i + 1, i + 2], () => this.findMelds(counts, found, needed))) return true;
      found.pop();
    }

    return false;
  }
}
