export const ABSENT = '_';

/** One war's entry for a player: their score, or `_` when they sat it out. */
export type ScoreCell = number | typeof ABSENT;

export interface HistoryRow {
  player: string;
  scores: ScoreCell[];
}

export interface HistoryTable {
  wars: string[];
  rows: HistoryRow[];
}

export interface LeaderboardRow extends HistoryRow {
  total: number;
}

export const emptyHistory = (): HistoryTable => ({ wars: [], rows: [] });

/**
 * Append one war. Every existing player gets `_` for it unless they scored;
 * players new to the history get `_` for every earlier war.
 */
export function mergeWar(history: HistoryTable, war: string, newScores: Readonly<Record<string, number>>): HistoryTable {
  const previousWars = history.wars.length;
  const rows: HistoryRow[] = history.rows.map(row => ({ player: row.player, scores: [...row.scores, ABSENT] }));
  const byPlayer = new Map(rows.map((row): [string, HistoryRow] => [row.player, row]));

  for (const [player, score] of Object.entries(newScores)) {
    let row = byPlayer.get(player);
    if (!row) {
      row = { player, scores: new Array<ScoreCell>(previousWars + 1).fill(ABSENT) };
      byPlayer.set(player, row);
      rows.push(row);
    }
    row.scores[previousWars] = score;
  }
  return { wars: [...history.wars, war], rows };
}

export function totalOf(scores: readonly ScoreCell[]): number {
  let total = 0;
  for (const cell of scores) if (typeof cell === 'number') total += cell;
  return total;
}

/** Rows with totals, highest total first, ties by name. */
export function leaderboard(history: HistoryTable): LeaderboardRow[] {
  return history.rows
    .map(row => ({ ...row, total: totalOf(row.scores) }))
    .sort((a, b) => b.total - a.total || (a.player < b.player ? -1 : a.player > b.player ? 1 : 0));
}

function csvCell(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** `Player,War-1,…,War-n,Total`, leaderboard order. */
export function toCsv(history: HistoryTable): string {
  const header = ['Player', ...history.wars.map((_, i) => `War-${i + 1}`), 'Total'];
  const lines = [header.join(',')];
  for (const row of leaderboard(history)) {
    lines.push([csvCell(row.player), ...row.scores.map(String), String(row.total)].join(','));
  }
  return lines.join('\n') + '\n';
}
