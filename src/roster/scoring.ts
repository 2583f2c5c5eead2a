import { countStars, NEW_STAR, NO_STAR, OLD_STAR } from '../extraction/glyphs.js';
import { NEGATE_EARNED_STARS, type GameRules, type Penalty } from '../presets.js';
import type { AttackRecord, PlayerRecord } from '../types.js';

export interface ScoredPlayer extends PlayerRecord {
  total: number;
}

function applyPenalty(penalty: Penalty, earned: number): number {
  return penalty === NEGATE_EARNED_STARS ? -earned : penalty;
}

/** Points for one attack by a player at `playerRank`. Unranked or blank attacks score 0. */
export function scoreAttack(playerRank: number, attack: AttackRecord, rules: GameRules): number {
  if (attack.score === null || attack.enemyRank === null) return 0;

  const earned = countStars(attack.score);
  const hasOld = attack.score.includes(OLD_STAR);
  const hasNew = attack.score.includes(NEW_STAR);
  const gap = playerRank - attack.enemyRank;

  let points = earned;
  if (gap <= rules.noThreeStarDroppingThreshold && hasOld) {
    points += applyPenalty(rules.noThreeStarDroppingPenalty, earned);
  }
  if (gap <= rules.droppingForFirstAttackThreshold && !hasNew) {
    points += applyPenalty(rules.droppingForFirstAttackPenalty, earned);
  }
  if (gap >= rules.successfulJumpThreshold && hasOld) {
    points += rules.successfulJumpBonus;
  }
  return points;
}

export function scorePlayer(player: PlayerRecord, rules: GameRules): number {
  const { rank } = player;
  if (rank === null || player.attacks.length === 0) return 0;
  return player.attacks.reduce((sum, attack) => sum + scoreAttack(rank, attack, rules), 0);
}

export function scoreRoster(players: readonly PlayerRecord[], rules: GameRules): ScoredPlayer[] {
  return players.map(p => ({ ...p, total: scorePlayer(p, rules) }));
}

const MISSING_ATTACK = ['No Attack', NO_STAR.repeat(3), '0'];

/** `rank, name, a1rank, a1target, a1score, a2rank, a2target, a2score, total` */
export function tabulatePlayer(player: ScoredPlayer, attacksPerLine = 2): string {
  const cells: string[] = [String(player.rank ?? ''), player.name];
  for (let k = 0; k < attacksPerLine; k++) {
    const attack = player.attacks[k];
    if (!attack || attack.score === null) {
      cells.push(...MISSING_ATTACK);
    } else {
      cells.push(String(attack.enemyRank ?? ''), attack.target, attack.score);
    }
  }
  cells.push(String(player.total));
  return cells.join(', ');
}
