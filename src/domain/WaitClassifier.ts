import type { Tile } from './Tile';
import { rankOf } from './Tile';
import type { Meld, Melds, Pair, Wait } from './Meld';
import { meldContains } from './Meld';

/**
 * Which element the winning tile completed, and how.
 *
 * The pair is checked first: a winning tile that also sits in a set completed the pair
 * when it matches the pair tile. Concealed sets are searched before declared ones.
 */
export function classifyWait(melds: Melds, pair: Pair, winTile: Tile): Wait {
  if (winTile === pair[0]) return 'tanki';

  const owner: Meld | undefined =
    melds.find((m) => !m.open && meldContains(m, winTile)) ?? melds.find((m) => meldContains(m, winTile));
  if (!owner) throw new Error(`winning tile ${winTile} is in neither the pair nor any meld`);

  if (owner.kind !== 'sequence') return 'shanpon';

  const [low, mid, high] = owner.tiles;
  if (winTile === mid) return 'kanchan';
  if (winTile === low) return rankOf(high) === 9 ? 'penchan' : 'ryanmen';
  if (winTile === high) return rankOf(low) === 1 ? 'penchan' : 'ryanmen';

  throw new Error(`sequence ${owner.tiles.join('')} reported ${winTile} but does not hold it`);
}
