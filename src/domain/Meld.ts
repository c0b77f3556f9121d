import type { Tile } from './Tile';
import { indexToTile } from './Tile';

export type Sequence = { kind: 'sequence'; tiles: [Tile, Tile, Tile]; open: boolean };
export type Triplet = { kind: 'triplet'; tiles: [Tile, Tile, Tile]; open: boolean };
export type Quad = { kind: 'quad'; tiles: [Tile, Tile, Tile, Tile]; open: boolean };
export type Meld = Sequence | Triplet | Quad;

export type Pair = [Tile, Tile];

/**
 * 待ち.
 * - ryanmen: two-sided, kanchan: closed, penchan: edge
 * - shanpon: the winning tile turned one of two pairs into a triplet
 * - tanki: the winning tile completed the pair
 * - kokushi / kokushi-13: thirteen orphans, single or thirteen-sided
 */
export type Wait = 'ryanmen' | 'kanchan' | 'penchan' | 'shanpon' | 'tanki' | 'kokushi' | 'kokushi-13';

export type Melds = [Meld, Meld, Meld, Meld];

export type RegularHand = {
  kind: 'regular';
  melds: Melds;
  pair: Pair;
  winTile: Tile;
  wait: Wait;
};

/** No 4-set + pair split exists; the recognizer decides from the raw counts. */
export type IrregularHand = {
  kind: 'irregular';
  counts: number[];
  winTile: Tile;
};

export type HandOrganization = RegularHand | IrregularHand;

export function sequenceFrom(startIndex: number, open: boolean): Sequence {
  return {
    kind: 'sequence',
    tiles: [indexToTile(startIndex), indexToTile(startIndex + 1), indexToTile(startIndex + 2)],
    open,
  };
}

export function tripletOf(tile: Tile, open: boolean): Triplet {
  return { kind: 'triplet', tiles: [tile, tile, tile], open };
}

export function quadOf(tile: Tile, open: boolean): Quad {
  return { kind: 'quad', tiles: [tile, tile, tile, tile], open };
}

export function meldContains(meld: Meld, tile: Tile): boolean {
  if (meld.kind === 'sequence') return meld.tiles.includes(tile);
  return meld.tiles[0] === tile;
}

export function isTripletLike(meld: Meld): meld is Triplet | Quad {
  return meld.kind === 'triplet' || meld.kind === 'quad';
}

/** Lowest tile of a sequence, the repeated tile otherwise. */
export function meldHead(meld: Meld): Tile {
  return meld.tiles[0];
}

export function handTiles(hand: RegularHand): Tile[] {
  return [...hand.melds.flatMap((m): Tile[] => m.tiles), ...hand.pair];
}

export function toMelds(list: Meld[]): Melds {
  const [a, b, c, d, ...rest] = list;
  if (!a || !b || !c || !d || rest.length > 0) {
    throw new Error(`hand must have exactly 4 melds, got ${list.length}`);
  }
  return [a, b, c, d];
}
