import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '../logger.js';
import { emptyHistory, leaderboard, mergeWar, toCsv, type HistoryTable, type LeaderboardRow } from './history.js';

interface WarRow {
  id: number;
  session_id: string;
}

interface ScoreRow {
  war_id: number;
  player: string;
  score: number;
}

/**
 * War history in SQLite with WAL mode. One row per committed war and one per
 * player who scored in it; absent players have no row and read back as `_`.
 */
export class HistoryDb {
  private db: Database.Database;
  private insertWarStmt: Database.Statement<[string, number]>;
  private insertScoreStmt: Database.Statement<[number, string, number]>;
  private findWarStmt: Database.Statement<[string], WarRow>;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');

    this.db.exec(`CREATE TABLE IF NOT EXISTS wars (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      session_id TEXT NOT NULL UNIQUE,
      recorded_at INTEGER NOT NULL
    )`);

    this.db.exec(`CREATE TABLE IF NOT EXISTS war_scores (
      war_id INTEGER NOT NULL REFERENCES wars(id),
      player TEXT NOT NULL,
      score INTEGER NOT NULL,
      PRIMARY KEY (war_id, player)
    )`);

    this.insertWarStmt = this.db.prepare('INSERT INTO wars (session_id, recorded_at) VALUES (?, ?)');
    this.insertScoreStmt = this.db.prepare('INSERT INTO war_scores (war_id, player, score) VALUES (?, ?, ?)');
    this.findWarStmt = this.db.prepare('SELECT id, session_id FROM wars WHERE session_id = ?');

    logger.info(`History database opened: ${dbPath}`);
  }

  /** Append one war's scores atomically. A session can be recorded only once. */
  recordWar(sessionId: string, newScores: Readonly<Record<string, number>>): number {
    const tx = this.db.transaction(() => {
      if (this.findWarStmt.get(sessionId)) {
        throw new Error(`War for session ${sessionId} is already recorded`);
      }
      const warId = Number(this.insertWarStmt.run(sessionId, Date.now()).lastInsertRowid);
      for (const [player, score] of Object.entries(newScores)) {
        this.insertScoreStmt.run(warId, player, score);
      }
      return warId;
    });
    const warId = tx();
    logger.info(`[History] Recorded war ${warId} with ${Object.keys(newScores).length} scores`);
    return warId;
  }

  /** Rebuild the history table by replaying every war in order. */
  load(): HistoryTable {
    const wars = this.db.prepare<[], WarRow>('SELECT id, session_id FROM wars ORDER BY id').all();
    const scores = this.db.prepare<[], ScoreRow>(
      'SELECT war_id, player, score FROM war_scores ORDER BY war_id, rowid').all();

    const byWar = new Map<number, Record<string, number>>();
    for (const row of scores) {
      const war = byWar.get(row.war_id) ?? {};
      war[row.player] = row.score;
      byWar.set(row.war_id, war);
    }

    let history = emptyHistory();
    for (const war of wars) history = mergeWar(history, war.session_id, byWar.get(war.id) ?? {});
    return history;
  }

  leaderboard(): LeaderboardRow[] {
    return leaderboard(this.load());
  }

  exportCsv(): string {
    return toCsv(this.load());
  }

  close(): void {
    this.db.close();
    logger.info('History database closed');
  }
}
