import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { emptyHistory, leaderboard, mergeWar, toCsv, totalOf } from '../src/roster/history.js';
import { HistoryDb } from '../src/roster/HistoryDb.js';

const twoWars = () => mergeWar(mergeWar(emptyHistory(), 'w1', { A: 3, B: 1 }), 'w2', { B: 2, C: 4 });

describe('history', () => {
  describe('mergeWar', () => {
    it('marks absent players and back-fills new ones', () => {
      expect(twoWars()).toEqual({
        wars: ['w1', 'w2'],
        rows: [
          { player: 'A', scores: [3, '_'] },
          { player: 'B', scores: [1, 2] },
          { player: 'C', scores: ['_', 4] },
        ],
      });
    });

    it('leaves the previous table untouched', () => {
      const first = mergeWar(emptyHistory(), 'w1', { A: 3 });
      mergeWar(first, 'w2', { A: 5 });
      expect(first.rows[0].scores).toEqual([3]);
    });
  });

  it('sums numeric entries including negative scores', () => {
    expect(totalOf([3, '_', -2, 0])).toBe(1);
  });

  it('orders by total, then by name', () => {
    expect(leaderboard(twoWars()).map(r => [r.player, r.total])).toEqual([['C', 4], ['A', 3], ['B', 3]]);
  });

  it('renders CSV in leaderboard order', () => {
    expect(toCsv(twoWars())).toBe('Player,War-1,War-2,Total\nC,_,4,4\nA,3,_,3\nB,1,2,3\n');
  });

  it('quotes names that need it', () => {
    const csv = toCsv(mergeWar(emptyHistory(), 'w1', { 'Smith, J': 2 }));
    expect(csv.split('\n')[1]).toBe('"Smith, J",2,2');
  });
});

describe('HistoryDb', () => {
  let db: HistoryDb;

  beforeEach(() => {
    db = new HistoryDb(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('starts empty', () => {
    expect(db.leaderboard()).toEqual([]);
    expect(db.exportCsv()).toBe('Player,Total\n');
  });

  it('replays recorded wars into the leaderboard', () => {
    expect(db.recordWar('s1', { A: 3, B: 1 })).toBe(1);
    expect(db.recordWar('s2', { B: 2, C: 4 })).toBe(2);
    expect(db.leaderboard()).toEqual([
      { player: 'C', scores: ['_', 4], total: 4 },
      { player: 'A', scores: [3, '_'], total: 3 },
      { player: 'B', scores: [1, 2], total: 3 },
    ]);
    expect(db.exportCsv()).toBe('Player,War-1,War-2,Total\nC,_,4,4\nA,3,_,3\nB,1,2,3\n');
  });

  it('refuses to record a session twice', () => {
    db.recordWar('s1', { A: 3 });
    expect(() => db.recordWar('s1', { A: 1 })).toThrow('already recorded');
    expect(db.load().wars).toEqual(['s1']);
  });

  it('keeps a war with no scores as a column of absences', () => {
    db.recordWar('s1', { A: 3 });
    db.recordWar('s2', {});
    expect(db.leaderboard()).toEqual([{ player: 'A', scores: [3, '_'], total: 3 }]);
  });
});
