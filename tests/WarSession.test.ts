import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { AliasBook } from '../src/data/nameLists.js';
import { MeasurementError, RosterCapacityError } from '../src/errors.js';
import { LevenshteinMatcher, type TextRecognizer } from '../src/extraction/recognizers.js';
import { LightnessImage } from '../src/imaging/LightnessImage.js';
import { FallbackStore } from '../src/measurement/FallbackStore.js';
import { DEFAULT_GAME_RULES, DEFAULT_PRESETS, parseProcessingPresets } from '../src/presets.js';
import { WarSession } from '../src/session/WarSession.js';

// ─── Synthetic screenshot ───
// Each attack line is 16 rows: rows 0..7 hold the first attack, 8..15 the second.

const LINE_HEIGHT = 16;

const column = (fill: number, marks: Record<number, number> = {}): number[] =>
  Array.from({ length: LINE_HEIGHT }, (_, y) => marks[y] ?? fill);

const KINDS: Record<string, number[]> = {
  B: column(200), // background
  I: column(200, { 7: 0 }), // text ink
  G: column(190), // shaded enemy/percentage/stars background
  O: column(190, { 2: 0, 3: 0, 4: 0, 5: 0 }), // glyph outline
  D: column(190, { 2: 0, 3: 230, 4: 230, 5: 0 }), // dim glyph core
  W: column(190, { 2: 0, 3: 255, 4: 255, 5: 0 }), // white star core
  J: column(190, { 4: 0 }), // shaded text ink
};

// rank | level | player | enemy (rank glyph, name) | percentage
const LINE_START: Array<[string, number]> = [
  ['I', 3], ['B', 2], ['I', 1], ['B', 2], ['I', 3], ['B', 3], ['I', 4], ['B', 6],
  ['G', 3], ['O', 1], ['D', 3], ['O', 1], ['G', 1], ['J', 4], ['G', 2], ['J', 3], ['G', 2],
];
const LINE_END: Array<[string, number]> = [['G', 5], ['B', 10], ['I', 1]];

const OLD_NEW_NONE: Array<[string, number]> = [
  ['O', 1], ['D', 1], ['O', 1], ['G', 1], ['O', 1], ['W', 1], ['O', 1], ['G', 4],
];
const NEW_NEW_NEW: Array<[string, number]> = [
  ['O', 1], ['W', 1], ['O', 1], ['G', 1], ['O', 1], ['W', 1], ['O', 1], ['G', 1], ['O', 1], ['W', 1], ['O', 1],
];

/**
 * An 85x50 screenshot: a 75x42 panel at (5, 4) on a dark background, one
 * header row of ink, then two attack lines with the given star runs.
 */
function screenshot(stars: Array<Array<[string, number]>>): LightnessImage {
  const width = 85;
  const data = new Uint8Array(width * 50).fill(50);
  for (let y = 4; y < 46; y++) data.fill(200, y * width + 5, y * width + 80);
  data.fill(0, 7 * width + 15, 7 * width + 26);

  stars.forEach((starRuns, i) => {
    const top = 10 + i * (LINE_HEIGHT + 2);
    let x = 7;
    for (const [kind, count] of [...LINE_START, ...starRuns, ...LINE_END]) {
      for (let n = 0; n < count; n++, x++) {
        KINDS[kind].forEach((v, y) => { data[(top + y) * width + x] = v; });
      }
    }
  });
  return new LightnessImage(width, 50, data);
}

const linePresets = (maxWarPlayers: number) =>
  parseProcessingPresets({ pxMargin: 2, outlierMargin: 2, lookAheadMargin: 6, starMargin: 1, maxWarPlayers });

describe('WarSession', () => {
  let fallback: FallbackStore;
  let recognizer: TextRecognizer;
  let session: WarSession;
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'session-'));
    fallback = new FallbackStore(DEFAULT_PRESETS.fallbackTolerance);
    recognizer = { recognize: vi.fn(async () => '') };
    session = new WarSession({
      presets: DEFAULT_PRESETS,
      rules: DEFAULT_GAME_RULES,
      recognizer,
      matcher: new LevenshteinMatcher(),
      aliases: new AliasBook(),
      knownPlayers: ['Alpha'],
      fallback,
    });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('processImage', () => {
    it('reports a fatal measurement as a failed image instead of throwing', async () => {
      const result = await session.processImage(LightnessImage.filled(60, 40, 120));
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.label).toBe('image-1');
        expect(result.error).toBeInstanceOf(MeasurementError);
        expect(result.error.field).toBe('menuTop');
      }
      expect(recognizer.recognize).not.toHaveBeenCalled();
      expect(session.summary().images).toBe(0);
    });

    it('keeps no measurements from a failed image', async () => {
      await session.processImage(LightnessImage.filled(60, 40, 120), 'blank');
      expect(fallback.size).toBe(0);
    });

    it('propagates errors that are not pipeline errors and keeps serving', async () => {
      await expect(session.processImage(Buffer.from('not an image'), 'junk')).rejects.toThrow();
      const next = await session.processImage(LightnessImage.filled(60, 40, 120), 'after');
      expect(next).toMatchObject({ ok: false, label: 'after' });
    });

    it('handles images one at a time in arrival order', async () => {
      const labels: string[] = [];
      const first = session.processImage(LightnessImage.filled(60, 40, 120), 'one').then(r => labels.push(r.label));
      const second = session.processImage(LightnessImage.filled(60, 40, 120), 'two').then(r => labels.push(r.label));
      await Promise.all([first, second]);
      expect(labels).toEqual(['one', 'two']);
    });
  });

  describe('summary', () => {
    it('is empty before any image succeeds', () => {
      expect(session.summary()).toEqual({
        id: session.id,
        createdAt: session.createdAt,
        images: 0,
        committed: false,
        players: [],
        newScores: {},
        lines: [],
      });
    });
  });

  describe('commit', () => {
    it('records the scores and writes the measurements', async () => {
      fallback.set('rankEnd', { cut: 9, fraction: 0.1125 });
      const history = { recordWar: vi.fn(() => 4) };
      const path = join(dir, 'measurements.json');

      await expect(session.commit(history, path)).resolves.toBe(4);
      expect(history.recordWar).toHaveBeenCalledWith(session.id, {});
      expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual({ 'rankEnd Cut': 9, 'rankEnd %': 0.1125 });
      expect(session.isCommitted).toBe(true);
    });

    it('rejects a second commit and further images', async () => {
      const history = { recordWar: vi.fn(() => 1) };
      await session.commit(history);
      await expect(session.commit(history)).rejects.toThrow('already committed');
      await expect(session.processImage(LightnessImage.filled(10, 10, 0))).rejects.toThrow('already committed');
      expect(history.recordWar).toHaveBeenCalledTimes(1);
    });
  });

  describe('a full screenshot', () => {
    let reads: string[];
    let lineFallback: FallbackStore;

    const lineSession = (maxWarPlayers: number) => {
      reads = ['2', 'Alphq', '9', 'Raider', '7', 'Bravo', '', 'Raider'];
      lineFallback = new FallbackStore(0.2);
      return new WarSession({
        presets: linePresets(maxWarPlayers),
        rules: DEFAULT_GAME_RULES,
        recognizer: { recognize: async () => reads.shift() ?? '' },
        matcher: new LevenshteinMatcher(),
        aliases: new AliasBook(),
        knownPlayers: ['Alpha', 'Bravo'],
        fallback: lineFallback,
      });
    };

    it('places and scores every line', async () => {
      const war = lineSession(50);
      const result = await war.processImage(screenshot([OLD_NEW_NONE, NEW_NEW_NEW]), 'shot');

      expect(result).toEqual({
        ok: true,
        label: 'shot',
        placements: [
          { status: 'placed', rank: 2, name: 'Alpha' },
          { status: 'placed', rank: 7, name: 'Bravo' },
        ],
      });
      expect(reads).toEqual([]);

      const summary = war.summary();
      expect(summary.images).toBe(1);
      expect(summary.players.map(p => p.attacks[0])).toEqual([
        { enemyRank: 9, target: 'Raider', score: '★☆_' },
        { enemyRank: 9, target: 'Raider', score: '☆☆☆' },
      ]);
      expect(summary.newScores).toEqual({ Alpha: 1, Bravo: 3 });
      expect(summary.lines).toEqual([
        '2, Alpha, 9, Raider, ★☆_, No Attack, ___, 0, 1',
        '7, Bravo, 9, Raider, ☆☆☆, No Attack, ___, 0, 3',
      ]);
    });

    it('keeps every measured cut once the image succeeds', async () => {
      await lineSession(50).processImage(screenshot([OLD_NEW_NONE, NEW_NEW_NEW]));
      expect(lineFallback.size).toBe(17);
      expect(lineFallback.get('menuTop')).toEqual({ cut: 4, fraction: 4 / 50 });
      expect(lineFallback.get('headerEnd')).toEqual({ cut: 6, fraction: 6 / 42 });
      expect(lineFallback.get('lineBegin')).toEqual({ cut: 2, fraction: 2 / 75 });
      expect(lineFallback.get('rankEnd')).toEqual({ cut: 6, fraction: 6 / 71 });
      expect(lineFallback.get('starsBegin')).toEqual({ cut: 44, fraction: 44 / 71 });
      expect(lineFallback.get('realStarsEnd')).toEqual({ cut: 55, fraction: 55 / 71 });
    });

    it('leaves the roster untouched when the lines overflow it', async () => {
      const war = lineSession(1);
      const result = await war.processImage(screenshot([OLD_NEW_NONE, NEW_NEW_NEW]), 'crowded');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(RosterCapacityError);
        expect(result.error.field).toBe('rank');
      }
      expect(war.summary()).toMatchObject({ images: 0, players: [], newScores: {}, lines: [] });
      expect(lineFallback.size).toBe(0);
    });

    it('commits reviewed score edits over the computed scores', async () => {
      const war = lineSession(50);
      await war.processImage(screenshot([OLD_NEW_NONE, NEW_NEW_NEW]));
      const history = { recordWar: vi.fn(() => 2) };

      await expect(war.commit(history, undefined, { Bravo: 2, Charlie: 1 })).resolves.toBe(2);
      expect(history.recordWar).toHaveBeenCalledWith(war.id, { Alpha: 1, Bravo: 2, Charlie: 1 });
    });
  });
});
