export type RejectCode =
  // request shape
  | 'bad-request'
  // state conflicts
  | 'riichi-conflict'
  | 'ippatsu-without-riichi'
  | 'riichi-with-open-melds'
  | 'haitei-on-ron'
  | 'houtei-on-tsumo'
  | 'haitei-houtei-conflict'
  | 'rinshan-on-ron'
  | 'chankan-on-tsumo'
  | 'tenhou-requires-dealer'
  | 'tenhou-requires-tsumo'
  | 'tenhou-with-calls'
  | 'chiihou-requires-non-dealer'
  | 'chiihou-requires-tsumo'
  | 'chiihou-with-calls'
  | 'renhou-requires-ron'
  // composition
  | 'too-many-melds'
  | 'tile-count-mismatch'
  | 'win-tile-missing'
  | 'tile-overflow'
  | 'aka-dora-exceeds-fives'
  | 'aka-dora-over-limit'
  // organization
  | 'meld-not-in-hand'
  | 'invalid-chi-tile'
  | 'no-pair'
  // recognition
  | 'no-yaku';

export type Rejection = { ok: false; code: RejectCode; message: string };

export function reject(code: RejectCode, message: string): Rejection {
  return { ok: false, code, message };
}
