import type { AliasBook } from '../data/nameLists.js';
import { RosterCapacityError } from '../errors.js';
import { logger } from '../logger.js';
import type { AttackRecord, PlayerRecord } from '../types.js';

export type Placement =
  | { status: 'placed'; rank: number; name: string }
  | { status: 'duplicate'; name: string }
  | { status: 'dropped'; name: string; reason: 'alias-exhausted' | 'unnamed' };

interface RosterState {
  slots: (PlayerRecord | null)[];
  playersSeen: Set<string>;
  enemyRanks: Map<string, number>;
  enemiesByRank: Map<number, string>;
  usedAliases: Map<string, Set<string>>;
}

/**
 * Rank-indexed war roster for one session. The first rank a player or enemy
 * name is given sticks; later sightings reuse it instead of renumbering.
 */
export class WarRoster {
  private slots: (PlayerRecord | null)[];
  private playersSeen = new Set<string>();
  private enemyRanks = new Map<string, number>();
  private enemiesByRank = new Map<number, string>();
  private usedAliases = new Map<string, Set<string>>();

  constructor(
    readonly capacity: number,
    private readonly aliases: AliasBook,
  ) {
    this.slots = new Array<PlayerRecord | null>(capacity + 1).fill(null);
  }

  /**
   * Place every record of one image, or none of them: when a placement throws,
   * the roster is restored to its state before the first record.
   */
  placeAll(records: readonly PlayerRecord[]): Placement[] {
    const checkpoint = this._snapshot();
    try {
      return records.map(record => this.place(record));
    } catch (err) {
      this._restore(checkpoint);
      throw err;
    }
  }

  place(extracted: PlayerRecord): Placement {
    const record: PlayerRecord = {
      rank: extracted.rank,
      name: extracted.name.trim(),
      attacks: extracted.attacks.map(a => ({ ...a })),
    };

    const canonical = record.name ? this.aliases.canonicalOf(record.name) : undefined;
    if (canonical !== undefined) {
      const alias = this._resolveAlias(canonical, record.rank);
      if (alias === null) {
        logger.info(`[Roster] Every alias of ${canonical} is in use; dropping extra account at rank ${record.rank}`);
        return { status: 'dropped', name: record.name, reason: 'alias-exhausted' };
      }
      record.name = alias;
    }

    if (!record.name) return { status: 'dropped', name: '', reason: 'unnamed' };
    if (this.playersSeen.has(record.name)) return { status: 'duplicate', name: record.name };

    let rank: number;
    if (record.rank !== null && this._isFreeSlot(record.rank)) {
      rank = record.rank;
    } else {
      rank = this._lowestFreeSlot();
      logger.info(`[Roster] Estimating rank for ${record.name} as ${rank} (read ${record.rank})`);
    }
    record.rank = rank;
    this.slots[rank] = record;
    this.playersSeen.add(record.name);

    for (const attack of record.attacks) this._recordEnemy(attack);
    return { status: 'placed', rank, name: record.name };
  }

  /** Occupied slots in rank order. */
  players(): PlayerRecord[] {
    return this.slots.filter((p): p is PlayerRecord => p !== null);
  }

  at(rank: number): PlayerRecord | null {
    return this.slots[rank] ?? null;
  }

  enemyRank(name: string): number | undefined {
    return this.enemyRanks.get(name);
  }

  // ─── Internals ───

  private _snapshot(): RosterState {
    return {
      slots: [...this.slots],
      playersSeen: new Set(this.playersSeen),
      enemyRanks: new Map(this.enemyRanks),
      enemiesByRank: new Map(this.enemiesByRank),
      usedAliases: new Map([...this.usedAliases].map(([family, used]): [string, Set<string>] => [family, new Set(used)])),
    };
  }

  private _restore(state: RosterState): void {
    this.slots = state.slots;
    this.playersSeen = state.playersSeen;
    this.enemyRanks = state.enemyRanks;
    this.enemiesByRank = state.enemiesByRank;
    this.usedAliases = state.usedAliases;
  }

  private _isFreeSlot(rank: number): boolean {
    return Number.isInteger(rank) && rank >= 1 && rank <= this.capacity && this.slots[rank] === null;
  }

  private _lowestFreeSlot(): number {
    for (let j = 1; j <= this.capacity; j++) {
      if (this.slots[j] === null) return j;
    }
    throw new RosterCapacityError('rank', this.capacity, `All ${this.capacity} roster slots are taken`);
  }

  /** Alias already holding this rank for the family, else the next unused one. */
  private _resolveAlias(canonical: string, rank: number | null): string | null {
    if (rank !== null && rank >= 1 && rank <= this.capacity) {
      const existing = this.slots[rank];
      if (existing && this.aliases.canonicalOf(existing.name) === canonical) return existing.name;
    }
    let used = this.usedAliases.get(canonical);
    if (!used) {
      used = new Set();
      this.usedAliases.set(canonical, used);
    }
    for (const alias of this.aliases.aliasesOf(canonical)) {
      if (!used.has(alias)) {
        used.add(alias);
        return alias;
      }
    }
    return null;
  }

  private _recordEnemy(attack: AttackRecord): void {
    if (attack.score === null || !attack.target) return;

    if (attack.enemyRank === null || attack.enemyRank < 1) {
      const known = this.enemyRanks.get(attack.target);
      if (known !== undefined) {
        attack.enemyRank = known;
      } else {
        let j = 1;
        while (this.enemiesByRank.has(j)) j++;
        attack.enemyRank = j;
        logger.info(`[Roster] Estimating enemy rank for ${attack.target} as ${j}`);
      }
    }

    if (!this.enemiesByRank.has(attack.enemyRank)) this.enemiesByRank.set(attack.enemyRank, attack.target);
    if (!this.enemyRanks.has(attack.target)) this.enemyRanks.set(attack.target, attack.enemyRank);
  }
}
