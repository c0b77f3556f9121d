import type { Tile, Wind } from '../domain/Tile';

export type WinMethod = 'tsumo' | 'ron';

/**
 * A call declared before the win.
 * `tile` is the representative tile: the lowest tile for chi, the repeated tile for pon/kan.
 */
export type DeclaredMeld = { kind: 'chi' | 'pon' | 'kan'; tile: Tile };

export type PlayerContext = {
  seatWind: Wind;
  isDealer: boolean;
  riichi: boolean;
  doubleRiichi: boolean;
  ippatsu: boolean;
};

export type RoundContext = {
  roundWind: Wind;
  /** 本場 (repeat counter) */
  honba: number;
  doraIndicators: Tile[];
  uraDoraIndicators: Tile[];
  /** Red fives held, declared by the caller. */
  akaDora: number;

  tenhou: boolean;
  chiihou: boolean;
  renhou: boolean;
  haitei: boolean;
  houtei: boolean;
  rinshan: boolean;
  chankan: boolean;
};

export type WinInput = {
  /** Every tile the winner holds, including called tiles and the winning tile. */
  tiles: Tile[];
  winTile: Tile;
  openMelds: DeclaredMeld[];
  /** One representative tile per concealed quad. */
  closedKans: Tile[];
  player: PlayerContext;
  round: RoundContext;
  method: WinMethod;
};

export function callCount(input: WinInput): number {
  return input.openMelds.length + input.closedKans.length;
}

export function isConcealed(input: WinInput): boolean {
  return input.openMelds.length === 0;
}
