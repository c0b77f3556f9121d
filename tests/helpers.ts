import type { Tile, Wind } from '../src/domain/Tile';
import { parseTiles } from '../src/domain/Tile';
import type { DeclaredMeld, PlayerContext, RoundContext, WinInput, WinMethod } from '../src/game/context';

export function tiles(text: string): Tile[] {
  const parsed = parseTiles(text);
  if (!parsed) throw new Error(`bad tile text in test: ${text}`);
  return parsed;
}

export type InputOptions = {
  method?: WinMethod;
  openMelds?: DeclaredMeld[];
  closedKans?: Tile[];
  player?: Partial<PlayerContext>;
  round?: Partial<RoundContext>;
};

/** Non-dealer South seat in an East round, no flags, no indicators. */
export function winInput(hand: string, winTile: Tile, opts: InputOptions = {}): WinInput {
  const seatWind: Wind = 'z2';
  return {
    tiles: tiles(hand),
    winTile,
    openMelds: opts.openMelds ?? [],
    closedKans: opts.closedKans ?? [],
    method: opts.method ?? 'ron',
    player: {
      seatWind,
      isDealer: false,
      riichi: false,
      doubleRiichi: false,
      ippatsu: false,
      ...opts.player,
    },
    round: {
      roundWind: 'z1',
      honba: 0,
      doraIndicators: [],
      uraDoraIndicators: [],
      akaDora: 0,
      tenhou: false,
      chiihou: false,
      renhou: false,
      haitei: false,
      houtei: false,
      rinshan: false,
      chankan: false,
      ...opts.round,
    },
  };
}

/** 234m567m345p678p44s, tsumo on p8, riichi, honba 1, one red five, dora p3, ura m7. */
export function scenarioInput(): WinInput {
  return winInput('234m567m345p678p44s', 'p8', {
    method: 'tsumo',
    player: { riichi: true },
    round: { honba: 1, akaDora: 1, doraIndicators: ['p2'], uraDoraIndicators: ['m6'] },
  });
}
