import { tileIndex } from '../domain/Tile';
import { reject, type Rejection } from '../domain/rejection';
import { callCount, type WinInput } from '../game/context';

export type ValidationResult = { ok: true } | Rejection;

const OK: ValidationResult = { ok: true };

/**
 * Declared flags must agree with each other and with the win method.
 */
export function validateGameState(input: WinInput): ValidationResult {
  const { player: p, round: r, method } = input;
  const hasCalls = callCount(input) > 0;

  if (p.riichi && p.doubleRiichi) return reject('riichi-conflict', 'riichi and double riichi cannot both be declared');
  if (p.ippatsu && !(p.riichi || p.doubleRiichi)) return reject('ippatsu-without-riichi', 'ippatsu requires riichi or double riichi');
  if ((p.riichi || p.doubleRiichi) && input.openMelds.length > 0) {
    return reject('riichi-with-open-melds', 'riichi can only be declared on a concealed hand');
  }

  if (r.haitei && method === 'ron') return reject('haitei-on-ron', 'haitei (last draw) cannot be a ron win');
  if (r.houtei && method === 'tsumo') return reject('houtei-on-tsumo', 'houtei (last discard) cannot be a tsumo win');
  if (r.haitei && r.houtei) return reject('haitei-houtei-conflict', 'haitei and houtei cannot both be set');
  if (r.rinshan && method === 'ron') return reject('rinshan-on-ron', 'rinshan (kan draw) cannot be a ron win');
  if (r.chankan && method === 'tsumo') return reject('chankan-on-tsumo', 'chankan (robbing a kan) cannot be a tsumo win');

  if (r.tenhou) {
    if (!p.isDealer) return reject('tenhou-requires-dealer', 'tenhou requires the dealer seat');
    if (method !== 'tsumo') return reject('tenhou-requires-tsumo', 'tenhou must be a tsumo win');
    if (hasCalls) return reject('tenhou-with-calls', 'tenhou cannot have any calls');
  }
  if (r.chiihou) {
    if (p.isDealer) return reject('chiihou-requires-non-dealer', 'chiihou requires a non-dealer seat');
    if (method !== 'tsumo') return reject('chiihou-requires-tsumo', 'chiihou must be a tsumo win');
    if (hasCalls) return reject('chiihou-with-calls', 'chiihou cannot have any calls');
  }
  if (r.renhou && method !== 'ron') return reject('renhou-requires-ron', 'renhou must be a ron win');

  return OK;
}

/**
 * Tile arithmetic: meld slots, total tile count, winning tile, per-kind limit, red fives.
 */
export function validateComposition(input: WinInput, counts: number[]): ValidationResult {
  if (callCount(input) > 4) {
    return reject('too-many-melds', `${callCount(input)} calls declared; a hand has 4 meld slots`);
  }

  // every quad adds one tile on top of 4 sets x 3 + pair
  const quads = input.closedKans.length + input.openMelds.filter((m) => m.kind === 'kan').length;
  const expected = 3 * (4 - quads) + 4 * quads + 2;
  const handLen = input.tiles.length;
  const irregularCandidate = handLen === 14 && quads === 0;
  if (!irregularCandidate && handLen !== expected) {
    return reject('tile-count-mismatch', `expected ${expected} tiles for ${quads} quad(s), got ${handLen}`);
  }

  if (!input.tiles.includes(input.winTile)) {
    return reject('win-tile-missing', `winning tile ${input.winTile} is not among the held tiles`);
  }

  if (counts.some((c) => c > 4)) {
    return reject('tile-overflow', 'a tile kind appears more than 4 times');
  }

  const fives = (counts[tileIndex('m5')] ?? 0) + (counts[tileIndex('p5')] ?? 0) + (counts[tileIndex('s5')] ?? 0);
  if (input.round.akaDora > fives) {
    return reject('aka-dora-exceeds-fives', `${input.round.akaDora} red fives declared but only ${fives} fives held`);
  }
  if (input.round.akaDora > 4) {
    return reject('aka-dora-over-limit', 'at most 4 red fives exist');
  }

  return OK;
}

/** State checks first, then composition. Nothing downstream runs unless this passes. */
export function validateInput(input: WinInput, counts: number[]): ValidationResult {
  const state = validateGameState(input);
  if (!state.ok) return state;
  return validateComposition(input, counts);
}
