export type Suit = 'm' | 'p' | 's' | 'z';
export type Tile = `${Suit}${number}`; // m/p/s:1-9, z:1-7 (z1-z4 winds ESWN, z5-z7 dragons white/green/red)

export type Wind = 'z1' | 'z2' | 'z3' | 'z4';
export type Dragon = 'z5' | 'z6' | 'z7';

export const TILE_KINDS = 34;

export function isTile(t: string): t is Tile {
  return /^(?:[mps][1-9]|z[1-7])$/.test(t);
}

export function isWind(t: string): t is Wind {
  return t === 'z1' || t === 'z2' || t === 'z3' || t === 'z4';
}

export function isDragon(t: string): t is Dragon {
  return t === 'z5' || t === 'z6' || t === 'z7';
}

export function suitOf(t: Tile): Suit {
  const s = t[0];
  if (s === 'm' || s === 'p' || s === 's') return s;
  return 'z';
}

export function rankOf(t: Tile): number {
  return Number(t.slice(1));
}

export function tileIndex(t: Tile): number {
  const suit = suitOf(t);
  const n = rankOf(t);
  if (suit === 'm') return 0 + (n - 1);
  if (suit === 'p') return 9 + (n - 1);
  if (suit === 's') return 18 + (n - 1);
  return 27 + (n - 1);
}

export function indexToTile(i: number): Tile {
  if (!Number.isInteger(i) || i < 0 || i >= TILE_KINDS) throw new Error(`bad tile index ${i}`);
  if (i < 9) return `m${i + 1}` as const;
  if (i < 18) return `p${i - 9 + 1}` as const;
  if (i < 27) return `s${i - 18 + 1}` as const;
  return `z${i - 27 + 1}` as const;
}

export function suitOfIndex(i: number): Suit {
  if (i < 9) return 'm';
  if (i < 18) return 'p';
  if (i < 27) return 's';
  return 'z';
}

export function rankOfIndex(i: number): number {
  if (i < 9) return i + 1;
  if (i < 18) return i - 9 + 1;
  if (i < 27) return i - 18 + 1;
  return i - 27 + 1;
}

export function isHonor(t: Tile): boolean {
  return suitOf(t) === 'z';
}

export function isTerminal(t: Tile): boolean {
  if (isHonor(t)) return false;
  const r = rankOf(t);
  return r === 1 || r === 9;
}

/** 幺九牌: rank 1, rank 9 or any honor. */
export function isTerminalOrHonor(t: Tile): boolean {
  return isHonor(t) || isTerminal(t);
}

export function isSimple(t: Tile): boolean {
  return !isTerminalOrHonor(t);
}

export function makeTile(suit: Suit, rank: number): Tile {
  return `${suit}${rank}` as const;
}

export function countTiles(tiles: Tile[]): number[] {
  const counts = new Array<number>(TILE_KINDS).fill(0);
  for (const t of tiles) {
    const idx = tileIndex(t);
    counts[idx] = (counts[idx] ?? 0) + 1;
  }
  return counts;
}

export function sortTiles(tiles: Tile[]): Tile[] {
  return tiles.slice().sort((a, b) => tileIndex(a) - tileIndex(b));
}

/**
 * The tile a dora indicator points at.
 * Numbered suits wrap 9 -> 1, winds E -> S -> W -> N -> E, dragons white -> green -> red -> white.
 */
export function doraFromIndicator(indicator: Tile): Tile {
  const suit = suitOf(indicator);
  const r = rankOf(indicator);
  if (suit !== 'z') return makeTile(suit, r === 9 ? 1 : r + 1);
  if (r <= 4) return makeTile('z', r === 4 ? 1 : r + 1);
  return makeTile('z', r === 7 ? 5 : r + 1);
}

/**
 * Parse compact notation, e.g. `234m567m345p678p44s` or `11122z`.
 * `0` is a red five and is read as `5`. Returns null on any malformed input.
 */
export function parseTiles(text: string): Tile[] | null {
  const compact = text.replace(/\s+/g, '');
  if (!/^(?:[0-9]+[mpsz])*$/.test(compact)) return null;

  const tiles: Tile[] = [];
  for (const group of compact.match(/[0-9]+[mpsz]/g) ?? []) {
    const suit = group.slice(-1);
    for (const d of group.slice(0, -1)) {
      const name = `${suit}${d === '0' ? '5' : d}`;
      if (d === '0' && suit === 'z') return null;
      if (!isTile(name)) return null;
      tiles.push(name);
    }
  }
  return tiles;
}
