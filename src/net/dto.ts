import type { Tile, Wind } from '../domain/Tile';
import { isTile, isWind, parseTiles } from '../domain/Tile';
import { reject, type Rejection } from '../domain/rejection';
import type { DeclaredMeld, PlayerContext, RoundContext, WinInput, WinMethod } from '../game/context';
import { calculateAgari, type AgariResult } from '../game/agari';
import { getRule } from '../rules/RuleRegistry';

export type ParsedRequest = { ok: true; input: WinInput; rule: string | null } | Rejection;

class BadRequest extends Error {}

const WIND_NAMES: Record<string, Wind> = { east: 'z1', south: 'z2', west: 'z3', north: 'z4' };

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function tileField(v: unknown, field: string): Tile {
  const s = String(v ?? '').trim();
  if (!isTile(s)) throw new BadRequest(`${field}: "${s}" is not a tile`);
  return s;
}

function tileListField(v: unknown, field: string): Tile[] {
  if (v === undefined || v === null) return [];
  if (typeof v === 'string') {
    const tiles = parseTiles(v);
    if (!tiles) throw new BadRequest(`${field}: cannot read "${v}"`);
    return tiles;
  }
  if (!Array.isArray(v)) throw new BadRequest(`${field}: expected a tile list`);
  return v.map((t, i) => tileField(t, `${field}[${i}]`));
}

function windField(v: unknown, field: string): Wind {
  const s = String(v ?? '').trim().toLowerCase();
  const w = WIND_NAMES[s] ?? s;
  if (!isWind(w)) throw new BadRequest(`${field}: "${s}" is not a wind`);
  return w;
}

function flag(v: unknown, field: string): boolean {
  if (v === undefined || v === null) return false;
  if (typeof v !== 'boolean') throw new BadRequest(`${field}: expected true or false`);
  return v;
}

function counter(v: unknown, field: string, fallback = 0): number {
  if (v === undefined || v === null) return fallback;
  const n = typeof v === 'number' ? v : Number(String(v));
  if (!Number.isInteger(n) || n < 0) throw new BadRequest(`${field}: expected a non-negative integer`);
  return n;
}

function methodField(v: unknown): WinMethod {
  if (v === 'tsumo' || v === 'ron') return v;
  throw new BadRequest(`method: expected "tsumo" or "ron"`);
}

function meldsField(v: unknown): DeclaredMeld[] {
  if (v === undefined || v === null) return [];
  if (!Array.isArray(v)) throw new BadRequest('openMelds: expected a list');
  return v.map((m: unknown, i) => {
    if (!isRecord(m)) throw new BadRequest(`openMelds[${i}]: expected an object`);
    const kind = m.kind;
    if (kind === 'chi' || kind === 'pon' || kind === 'kan') {
      return { kind, tile: tileField(m.tile, `openMelds[${i}].tile`) };
    }
    throw new BadRequest(`openMelds[${i}].kind: expected chi, pon or kan`);
  });
}

function redFivesIn(v: unknown): number {
  return typeof v === 'string' ? (v.match(/0/g) ?? []).length : 0;
}

function toWinInput(body: Record<string, unknown>): WinInput {
  const p = isRecord(body.player) ? body.player : {};
  const r = isRecord(body.round) ? body.round : {};

  const player: PlayerContext = {
    seatWind: windField(p.seatWind, 'player.seatWind'),
    isDealer: flag(p.isDealer, 'player.isDealer'),
    riichi: flag(p.riichi, 'player.riichi'),
    doubleRiichi: flag(p.doubleRiichi, 'player.doubleRiichi'),
    ippatsu: flag(p.ippatsu, 'player.ippatsu'),
  };

  const round: RoundContext = {
    roundWind: windField(r.roundWind, 'round.roundWind'),
    honba: counter(r.honba, 'round.honba'),
    doraIndicators: tileListField(r.doraIndicators, 'round.doraIndicators'),
    uraDoraIndicators: tileListField(r.uraDoraIndicators, 'round.uraDoraIndicators'),
    akaDora: counter(r.akaDora, 'round.akaDora', redFivesIn(body.tiles)),
    tenhou: flag(r.tenhou, 'round.tenhou'),
    chiihou: flag(r.chiihou, 'round.chiihou'),
    renhou: flag(r.renhou, 'round.renhou'),
    haitei: flag(r.haitei, 'round.haitei'),
    houtei: flag(r.houtei, 'round.houtei'),
    rinshan: flag(r.rinshan, 'round.rinshan'),
    chankan: flag(r.chankan, 'round.chankan'),
  };

  return {
    tiles: tileListField(body.tiles, 'tiles'),
    winTile: tileField(body.winTile, 'winTile'),
    openMelds: meldsField(body.openMelds),
    closedKans: tileListField(body.closedKans, 'closedKans'),
    player,
    round,
    method: methodField(body.method),
  };
}

/**
 * Read one scoring request.
 *
 * Tiles are tile names (`m1`..`s9`, `z1`..`z7`) or one compact string such as `234m567m44s`;
 * in a compact `tiles` string `0` is a red five and sets the default `round.akaDora`.
 * Winds also accept `east`/`south`/`west`/`north`. Omitted flags are false, omitted counters 0.
 */
export function parseWinRequest(body: unknown): ParsedRequest {
  if (!isRecord(body)) return reject('bad-request', 'request body must be a JSON object');
  try {
    const rule = typeof body.rule === 'string' ? body.rule : null;
    return { ok: true, input: toWinInput(body), rule };
  } catch (e) {
    if (e instanceof BadRequest) return reject('bad-request', e.message);
    throw e;
  }
}

export function handleScoreRequest(body: unknown): AgariResult {
  const parsed = parseWinRequest(body);
  if (!parsed.ok) return parsed;
  return calculateAgari(parsed.input, getRule(parsed.rule));
}
