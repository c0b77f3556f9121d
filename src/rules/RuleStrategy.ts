import type { Tile } from '../domain/Tile';
import type { HandOrganization, RegularHand, Wait } from '../domain/Meld';
import type { Rejection } from '../domain/rejection';
import type { WinInput } from '../game/context';
import type { Yaku } from './yaku';

/**
 * What the recognizer settled the hand as.
 * - standard: 4 sets + pair from the decomposer
 * - chiitoitsu / kokushi: read from the irregular counts
 */
export type HandStructure =
  | { kind: 'standard'; hand: RegularHand }
  | { kind: 'chiitoitsu'; pairs: Tile[]; winTile: Tile; wait: 'tanki' }
  | { kind: 'kokushi'; winTile: Tile; wait: Extract<Wait, 'kokushi' | 'kokushi-13'> };

export type Recognition =
  | { ok: true; structure: HandStructure; yaku: Yaku[]; akaDora: number }
  | Rejection;

/**
 * Pattern (yaku) recognizer.
 *
 * Notes:
 * - `hand` is the decomposer output; irregular hands are only scoreable if the rule
 *   recognizes a non-standard shape in them.
 * - A hand with no yaku besides bonus tiles must be rejected.
 */
export interface PatternRecognizer {
  /** Stable id used for request/rule selection. */
  readonly id: string;
  /** Display name. */
  readonly name: string;

  recognize(hand: HandOrganization, input: WinInput): Recognition;
}
