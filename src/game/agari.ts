import { countTiles } from '../domain/Tile';
import { HandDecomposer } from '../domain/HandDecomposer';
import type { Rejection } from '../domain/rejection';
import { validateInput } from '../rules/inputValidation';
import { getRule } from '../rules/RuleRegistry';
import type { HandStructure, PatternRecognizer } from '../rules/RuleStrategy';
import type { WinInput } from './context';
import { calculateScore, type ScoreResult } from './scoring';

export type AgariResult = { ok: true; result: ScoreResult; structure: HandStructure } | Rejection;

/**
 * validate -> decompose -> recognize -> score.
 * Any rejection ends the pipeline; internal defects throw.
 */
export function calculateAgari(input: WinInput, rule: PatternRecognizer = getRule(null)): AgariResult {
  const counts = countTiles(input.tiles);

  const valid = validateInput(input, counts);
  if (!valid.ok) return valid;

  const organized = HandDecomposer.organize(input, counts);
  if (!organized.ok) return organized;

  const recognized = rule.recognize(organized.hand, input);
  if (!recognized.ok) return recognized;

  const result = calculateScore({
    yaku: recognized.yaku,
    akaDora: recognized.akaDora,
    structure: recognized.structure,
    player: input.player,
    round: input.round,
    method: input.method,
  });
  return { ok: true, result, structure: recognized.structure };
}
